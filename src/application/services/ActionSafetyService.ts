/**
 * ActionSafetyService - Per-action hardware limits and user override checks.
 *
 * Runs on each winning action just before it is applied. A rejected action
 * is skipped; the rest of the plan still executes. This is separate from the
 * whole-plan gate in SafetyValidationService, which runs first.
 */

import { IObservabilityContext } from '../ports/IObservabilityContext.js';
import { AgentCoordinationService } from './AgentCoordinationService.js';
import { UserOverrideService } from './UserOverrideService.js';
import { IResourceAction } from '../../domain/entities/ResourceAction.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import { CoordinationSignals } from '../../domain/entities/CoordinationSignal.js';
import { ResourceValues } from '../../domain/value-objects/ResourceValue.js';
import { ResourceTargets, isCoordinationTarget } from '../../domain/value-objects/ResourceTargets.js';

export type ActionVerdict =
    | { allowed: true }
    | { allowed: false; reason: string };

const ALLOW: ActionVerdict = { allowed: true };

function reject(reason: string): ActionVerdict {
    return { allowed: false, reason };
}

interface Range {
    min: number;
    max: number;
    unit: string;
}

/**
 * Hardware limits.
 */
export const ActionLimits = {
    CPU_PL1: { min: 15, max: 65, unit: 'W' },
    CPU_PL2: { min: 55, max: 140, unit: 'W' },
    CPU_PL4: { min: 55, max: 200, unit: 'W' },
    GPU_TGP: { min: 60, max: 140, unit: 'W' },
    DISPLAY_BRIGHTNESS: { min: 10, max: 100, unit: '%' },
    BATTERY_CHARGE_LIMIT: { min: 50, max: 100, unit: '%' },
    HOT_CPU_C: 95,
    HOT_GPU_C: 85,
    HOT_VRM_C: 90,
    OVERCLOCK_MAX_GPU_C: 75,
    CRITICAL_BATTERY_PERCENT: 15,
    CRITICAL_BATTERY_MAX_TGP_W: 80,
} as const;

/** Targets with no limits of their own. */
const UNRESTRICTED_TARGETS: readonly string[] = [
    ResourceTargets.FAN_PROFILE,
    ResourceTargets.FAN_FULL_SPEED,
    ResourceTargets.POWER_MODE,
    ResourceTargets.GPU_HYBRID_MODE,
    ResourceTargets.GPU_POWER_STATE,
    ResourceTargets.DISPLAY_REFRESH_RATE,
    ResourceTargets.KEYBOARD_BRIGHTNESS,
    ResourceTargets.BATTERY_CONSERVATION_MODE,
];

const SOURCE_NAME = 'ActionSafety';

export class ActionSafetyService {
    constructor(
        private readonly overrides: UserOverrideService,
        private readonly coordination?: AgentCoordinationService,
        private readonly observability?: IObservabilityContext,
        private readonly clock: () => Date = () => new Date()
    ) {}

    validateAction(action: IResourceAction, context: ISystemContext): ActionVerdict {
        if (this.overrides.isOverrideActive(action.target)) {
            this.announceOverride(action, context);
            return reject(`User has manually controlled ${action.target}`);
        }

        if (isCoordinationTarget(action.target) || UNRESTRICTED_TARGETS.includes(action.target)) {
            return ALLOW;
        }

        switch (action.target) {
            case ResourceTargets.CPU_PL1:
                return this.checkCpuPl1(action, context);
            case ResourceTargets.CPU_PL2:
                return this.checkCpuPl2(action, context);
            case ResourceTargets.CPU_PL4:
                return this.checkCpuPl4(action, context);
            case ResourceTargets.GPU_TGP:
                return this.checkGpuTgp(action, context);
            case ResourceTargets.GPU_OVERCLOCK:
                return this.checkGpuOverclock(context);
            case ResourceTargets.DISPLAY_BRIGHTNESS:
                return this.checkLevel(action, ActionLimits.DISPLAY_BRIGHTNESS);
            case ResourceTargets.BATTERY_CHARGE_LIMIT:
                return this.checkLevel(action, ActionLimits.BATTERY_CHARGE_LIMIT);
            default:
                return reject(`Unknown action target: ${action.target}`);
        }
    }

    private checkCpuPl1(action: IResourceAction, context: ISystemContext): ActionVerdict {
        const watts = this.requireWatts(action, ActionLimits.CPU_PL1);
        if (typeof watts !== 'number') return watts;

        if (context.thermal.cpuTempC > ActionLimits.HOT_CPU_C && watts > context.power.cpuPl1) {
            return reject(`CPU too hot (${context.thermal.cpuTempC}°C) for power increase`);
        }
        return ALLOW;
    }

    private checkCpuPl2(action: IResourceAction, context: ISystemContext): ActionVerdict {
        const watts = this.requireWatts(action, ActionLimits.CPU_PL2);
        if (typeof watts !== 'number') return watts;

        if (watts > context.power.cpuPl2) {
            if (context.thermal.cpuTempC > ActionLimits.HOT_CPU_C) {
                return reject(`CPU too hot (${context.thermal.cpuTempC}°C) for power increase`);
            }
            if (context.thermal.vrmTempC > ActionLimits.HOT_VRM_C) {
                return reject(`VRM too hot (${context.thermal.vrmTempC}°C) for power increase`);
            }
        }
        return ALLOW;
    }

    /**
     * The context carries no PL4 reading, so on a hot CPU or VRM the peak
     * limit may not go above the burst limit in force.
     */
    private checkCpuPl4(action: IResourceAction, context: ISystemContext): ActionVerdict {
        const watts = this.requireWatts(action, ActionLimits.CPU_PL4);
        if (typeof watts !== 'number') return watts;

        if (watts > context.power.cpuPl2) {
            if (context.thermal.cpuTempC > ActionLimits.HOT_CPU_C) {
                return reject(`CPU too hot (${context.thermal.cpuTempC}°C) for peak power above PL2`);
            }
            if (context.thermal.vrmTempC > ActionLimits.HOT_VRM_C) {
                return reject(`VRM too hot (${context.thermal.vrmTempC}°C) for peak power above PL2`);
            }
        }
        return ALLOW;
    }

    private checkGpuTgp(action: IResourceAction, context: ISystemContext): ActionVerdict {
        const watts = this.requireWatts(action, ActionLimits.GPU_TGP);
        if (typeof watts !== 'number') return watts;

        if (context.thermal.gpuTempC > ActionLimits.HOT_GPU_C && watts > context.power.gpuTgp) {
            return reject(`GPU too hot (${context.thermal.gpuTempC}°C) for power increase`);
        }
        if (
            context.battery.isOnBattery &&
            context.battery.chargePercent < ActionLimits.CRITICAL_BATTERY_PERCENT &&
            watts > ActionLimits.CRITICAL_BATTERY_MAX_TGP_W
        ) {
            return reject(`Battery critical (${context.battery.chargePercent}%), limiting GPU power`);
        }
        return ALLOW;
    }

    private checkGpuOverclock(context: ISystemContext): ActionVerdict {
        if (context.battery.isOnBattery) {
            return reject('GPU overclocking not allowed on battery power');
        }
        if (context.thermal.gpuTempC > ActionLimits.OVERCLOCK_MAX_GPU_C) {
            return reject(`GPU too hot (${context.thermal.gpuTempC}°C) for overclocking`);
        }
        return ALLOW;
    }

    private checkLevel(action: IResourceAction, range: Range): ActionVerdict {
        if (action.value.kind !== 'level') {
            return reject(`${action.target} expects a percentage, got ${action.value.kind}`);
        }
        return this.checkRange(action.target, action.value.percent, range) ?? ALLOW;
    }

    /**
     * The action's wattage when it is in range, otherwise the rejection.
     */
    private requireWatts(action: IResourceAction, range: Range): number | ActionVerdict {
        if (action.value.kind !== 'watts') {
            return reject(`${action.target} expects watts, got ${action.value.kind}`);
        }
        return this.checkRange(action.target, action.value.watts, range) ?? action.value.watts;
    }

    private checkRange(target: string, value: number, range: Range): ActionVerdict | null {
        if (value < range.min) {
            return reject(`${target} ${value}${range.unit} below minimum ${range.min}${range.unit}`);
        }
        if (value > range.max) {
            return reject(`${target} ${value}${range.unit} exceeds maximum ${range.max}${range.unit}`);
        }
        return null;
    }

    private announceOverride(action: IResourceAction, context: ISystemContext): void {
        this.observability?.logger.info('Action blocked by user override', {
            target: action.target,
            actionType: action.type,
        });

        this.coordination?.broadcast(CoordinationSignals.create('user_override', SOURCE_NAME, this.clock(), {
            context,
            data: {
                overriddenTarget: action.target,
                attemptedType: action.type,
                attemptedValue: ResourceValues.describe(action.value),
                reason: 'User manual control active',
            },
        }));
    }
}
