/**
 * ActionScoring - Performance and power heuristics used by arbitration.
 *
 * Targets are matched case-insensitively. An unrecognized target scores a
 * neutral 50 on both axes; a power-limit target whose value is not in watts
 * scores 0.
 */

import { IResourceAction } from '../entities/ResourceAction.js';
import { ResourceValue } from '../value-objects/ResourceValue.js';

const NEUTRAL_SCORE = 50;

/** Reference ceilings used to express a limit as a percentage. */
const WATTS_REFERENCE: Readonly<Record<string, number>> = {
    CPU_PL2: 140,
    CPU_PL1: 55,
    GPU_TGP: 140,
};

const POWER_MODE_PERFORMANCE: Readonly<Record<string, number>> = { performance: 100, balance: 60, quiet: 30 };
const POWER_MODE_POWER: Readonly<Record<string, number>> = { performance: 140, balance: 80, quiet: 40 };

const FAN_PROFILE_PERFORMANCE: Readonly<Record<string, number>> = {
    max_performance: 100,
    aggressive: 80,
    balanced: 50,
    quiet: 20,
};
const FAN_PROFILE_POWER: Readonly<Record<string, number>> = {
    max_performance: 100,
    aggressive: 70,
    balanced: 40,
    quiet: 20,
};

function watts(value: ResourceValue): number {
    return value.kind === 'watts' ? value.watts : 0;
}

function lookup(table: Readonly<Record<string, number>>, key: string | undefined, fallback: number): number {
    if (key === undefined) {
        return fallback;
    }
    return table[key] ?? fallback;
}

function powerModeOf(value: ResourceValue): string | undefined {
    return value.kind === 'power_mode' ? value.mode : undefined;
}

function fanProfileOf(value: ResourceValue): string | undefined {
    return value.kind === 'fan_profile' ? value.profile : undefined;
}

/**
 * Expected performance benefit of an action, roughly 0 to 100.
 */
export function performanceScore(action: IResourceAction): number {
    const target = action.target.toUpperCase();

    switch (target) {
        case 'CPU_PL2':
        case 'CPU_PL1':
        case 'GPU_TGP':
            return (watts(action.value) / WATTS_REFERENCE[target]) * 100;
        case 'POWER_MODE':
            return lookup(POWER_MODE_PERFORMANCE, powerModeOf(action.value), NEUTRAL_SCORE);
        case 'FAN_PROFILE':
            return lookup(FAN_PROFILE_PERFORMANCE, fanProfileOf(action.value), NEUTRAL_SCORE);
        case 'GPU_OVERCLOCK':
            return 90;
        case 'GPU_POWER_STATE':
            return NEUTRAL_SCORE;
        default:
            return NEUTRAL_SCORE;
    }
}

/**
 * Expected power cost of an action, roughly in watts.
 */
export function powerScore(action: IResourceAction): number {
    switch (action.target.toUpperCase()) {
        case 'CPU_PL2':
        case 'CPU_PL1':
        case 'GPU_TGP':
            return watts(action.value);
        case 'POWER_MODE':
            return lookup(POWER_MODE_POWER, powerModeOf(action.value), 80);
        case 'FAN_PROFILE':
            return lookup(FAN_PROFILE_POWER, fanProfileOf(action.value), 40);
        case 'GPU_OVERCLOCK':
            return 120;
        case 'GPU_POWER_STATE':
            return action.value.kind === 'gpu_power_state' && action.value.state === 'd3_cold' ? 5 : NEUTRAL_SCORE;
        default:
            return NEUTRAL_SCORE;
    }
}
