/**
 * SafetyValidationService - Whole-plan safety gate.
 *
 * A plan is rejected outright when it would push more power into a machine
 * that is already hot, or select performance mode on a nearly empty battery.
 * There is no partial acceptance: the caller drops the entire plan.
 */

import { IObservabilityContext } from '../ports/IObservabilityContext.js';
import { IExecutionPlan } from '../../domain/entities/ExecutionPlan.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import { ResourceTargets } from '../../domain/value-objects/ResourceTargets.js';
import { SafetyViolationKind } from '../../domain/events/ExecutionPlanRejected.js';

export interface SafetyViolation {
    kind: SafetyViolationKind;
    reason: string;
}

export interface SafetyInspection {
    safe: boolean;
    violations: SafetyViolation[];
}

const HOT_CPU_C = 90;
const HOT_GPU_C = 85;
const HIGH_POWER_LIMIT_W = 120;
const LOW_BATTERY_PERCENT = 20;

export class SafetyValidationService {
    constructor(private readonly observability?: IObservabilityContext) {}

    validate(plan: IExecutionPlan, context: ISystemContext): boolean {
        return this.inspect(plan, context).safe;
    }

    /**
     * Evaluate every rule and report each one the plan breaks.
     */
    inspect(plan: IExecutionPlan, context: ISystemContext): SafetyInspection {
        const violations: SafetyViolation[] = [];

        const thermal = this.checkThermal(plan, context);
        if (thermal) violations.push(thermal);

        const battery = this.checkBattery(plan, context);
        if (battery) violations.push(battery);

        if (violations.length > 0) {
            this.observability?.logger.warn('Execution plan failed safety validation', {
                violations: violations.map(v => v.kind),
                cpuTempC: context.thermal.cpuTempC,
                gpuTempC: context.thermal.gpuTempC,
                chargePercent: context.battery.chargePercent,
            });
        }

        return { safe: violations.length === 0, violations };
    }

    private checkThermal(plan: IExecutionPlan, context: ISystemContext): SafetyViolation | null {
        const { cpuTempC, gpuTempC } = context.thermal;
        if (cpuTempC <= HOT_CPU_C && gpuTempC <= HOT_GPU_C) {
            return null;
        }

        const offending = plan.actions.find(a =>
            (a.target === ResourceTargets.CPU_PL2 || a.target === ResourceTargets.GPU_TGP) &&
            a.value.kind === 'watts' &&
            a.value.watts > HIGH_POWER_LIMIT_W
        );
        if (!offending) {
            return null;
        }

        return {
            kind: 'thermal',
            reason: `${offending.target} above ${HIGH_POWER_LIMIT_W}W while CPU ${cpuTempC}°C / GPU ${gpuTempC}°C`,
        };
    }

    private checkBattery(plan: IExecutionPlan, context: ISystemContext): SafetyViolation | null {
        const { isOnBattery, chargePercent } = context.battery;
        if (!isOnBattery || chargePercent >= LOW_BATTERY_PERCENT) {
            return null;
        }

        const performanceMode = plan.actions.some(a =>
            a.target === ResourceTargets.POWER_MODE &&
            a.value.kind === 'power_mode' &&
            a.value.mode === 'performance'
        );
        if (!performanceMode) {
            return null;
        }

        return {
            kind: 'battery',
            reason: `Performance mode requested on battery at ${chargePercent}%`,
        };
    }
}
