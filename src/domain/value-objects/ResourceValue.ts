/**
 * ResourceValue - Typed value an action writes to a resource.
 *
 * A tagged union so handlers and scoring can narrow on `kind` instead of
 * guessing at the runtime type of a loose value.
 */

import { FanProfile, GpuPowerState, PowerMode } from './HardwareStates.js';

export type RateUnit = 'Hz' | 'mW';

export type ResourceValue =
    | { readonly kind: 'watts'; readonly watts: number }
    | { readonly kind: 'power_mode'; readonly mode: PowerMode }
    | { readonly kind: 'fan_profile'; readonly profile: FanProfile }
    | { readonly kind: 'gpu_power_state'; readonly state: GpuPowerState }
    | { readonly kind: 'flag'; readonly enabled: boolean }
    | { readonly kind: 'level'; readonly percent: number }
    | { readonly kind: 'rate'; readonly value: number; readonly unit: RateUnit };

export type ResourceValueKind = ResourceValue['kind'];

export const ResourceValues = {
    watts(watts: number): ResourceValue {
        return { kind: 'watts', watts };
    },

    powerMode(mode: PowerMode): ResourceValue {
        return { kind: 'power_mode', mode };
    },

    fanProfile(profile: FanProfile): ResourceValue {
        return { kind: 'fan_profile', profile };
    },

    gpuPowerState(state: GpuPowerState): ResourceValue {
        return { kind: 'gpu_power_state', state };
    },

    flag(enabled: boolean): ResourceValue {
        return { kind: 'flag', enabled };
    },

    level(percent: number): ResourceValue {
        return { kind: 'level', percent };
    },

    rate(value: number, unit: RateUnit): ResourceValue {
        return { kind: 'rate', value, unit };
    },

    describe(value: ResourceValue): string {
        switch (value.kind) {
            case 'watts':
                return `${value.watts}W`;
            case 'power_mode':
                return value.mode;
            case 'fan_profile':
                return value.profile;
            case 'gpu_power_state':
                return value.state;
            case 'flag':
                return value.enabled ? 'on' : 'off';
            case 'level':
                return `${value.percent}%`;
            case 'rate':
                return `${value.value}${value.unit}`;
        }
    },
};
