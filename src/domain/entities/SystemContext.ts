/**
 * SystemContext - Point-in-time snapshot of the machine.
 *
 * Built once per cycle by the context collector and shared by every agent.
 * The builder refuses an incomplete snapshot and returns a deep-frozen copy,
 * so no agent can change what another agent sees.
 */

import {
    BatteryChargingMode,
    DiscreteGpuState,
    FanProfile,
    PowerMode,
    UserIntent,
    WorkloadType,
} from '../value-objects/HardwareStates.js';
import { ValidationError } from '../../shared/validation/ValidationError.js';
import { ValidationFieldError } from '../../shared/validation/ValidationSchema.js';

export interface ThermalTrend {
    /** °C per second */
    readonly cpuPerSecond: number;
    /** °C per second */
    readonly gpuPerSecond: number;
    readonly isRisingRapidly: boolean;
    readonly isStable: boolean;
    readonly isCooling: boolean;
}

export interface ThermalState {
    readonly cpuTempC: number;
    readonly gpuTempC: number;
    readonly gpuHotspotC: number;
    readonly vrmTempC: number;
    readonly ssdTempC: number;
    readonly batteryTempC: number;
    readonly cpuFanRpm: number;
    readonly gpuFanRpm: number;
    readonly trend: ThermalTrend;
}

export interface PowerState {
    readonly powerMode: PowerMode;
    /** Sustained CPU limit, watts */
    readonly cpuPl1: number;
    /** Burst CPU limit, watts */
    readonly cpuPl2: number;
    /** GPU total graphics power, watts */
    readonly gpuTgp: number;
    readonly totalSystemPowerW: number;
    readonly isAcConnected: boolean;
    readonly fanProfile: FanProfile;
}

export interface GpuState {
    readonly state: DiscreteGpuState;
    readonly utilizationPercent: number;
    readonly memoryUtilizationPercent: number;
    readonly activeProcesses: readonly string[];
}

export interface BatteryState {
    readonly isOnBattery: boolean;
    readonly chargePercent: number;
    /** Positive while charging, negative while discharging */
    readonly chargeRateMw: number;
    readonly estimatedTimeRemainingMs: number;
    readonly designCapacityMwh: number;
    readonly fullChargeCapacityMwh: number;
    readonly chargingMode: BatteryChargingMode;
}

export interface WorkloadProfile {
    readonly type: WorkloadType;
    readonly cpuUtilizationPercent: number;
    readonly gpuUtilizationPercent: number;
    readonly activeApplications: readonly string[];
    readonly isUserActive: boolean;
    readonly timeInWorkloadMs: number;
    /** 0 to 1 */
    readonly confidence: number;
}

export interface ISystemContext {
    readonly thermal: ThermalState;
    readonly power: PowerState;
    readonly gpu: GpuState;
    readonly battery: BatteryState;
    readonly workload: WorkloadProfile;
    readonly userIntent: UserIntent;
    readonly timestamp: Date;
    readonly uptimeMs: number;
    readonly extendedData: Readonly<Record<string, unknown>>;
}

export const STABLE_TREND: ThermalTrend = Object.freeze({
    cpuPerSecond: 0,
    gpuPerSecond: 0,
    isRisingRapidly: false,
    isStable: true,
    isCooling: false,
});

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
    }
    return value;
}

/**
 * Builder for ISystemContext.
 */
export class SystemContextBuilder {
    private thermal?: ThermalState;
    private power?: PowerState;
    private gpu?: GpuState;
    private battery?: BatteryState;
    private workload?: WorkloadProfile;
    private userIntent?: UserIntent;
    private timestamp?: Date;
    private uptimeMs = 0;
    private extendedData: Record<string, unknown> = {};

    private constructor() {}

    static create(): SystemContextBuilder {
        return new SystemContextBuilder();
    }

    /**
     * Start from an existing snapshot, e.g. to re-read after execution.
     */
    static from(context: ISystemContext): SystemContextBuilder {
        return SystemContextBuilder.create()
            .withThermal(context.thermal)
            .withPower(context.power)
            .withGpu(context.gpu)
            .withBattery(context.battery)
            .withWorkload(context.workload)
            .withUserIntent(context.userIntent)
            .withTimestamp(context.timestamp)
            .withUptime(context.uptimeMs)
            .withExtendedData(context.extendedData);
    }

    withThermal(thermal: ThermalState): this {
        this.thermal = thermal;
        return this;
    }

    withPower(power: PowerState): this {
        this.power = power;
        return this;
    }

    withGpu(gpu: GpuState): this {
        this.gpu = gpu;
        return this;
    }

    withBattery(battery: BatteryState): this {
        this.battery = battery;
        return this;
    }

    withWorkload(workload: WorkloadProfile): this {
        this.workload = workload;
        return this;
    }

    withUserIntent(userIntent: UserIntent): this {
        this.userIntent = userIntent;
        return this;
    }

    withTimestamp(timestamp: Date): this {
        this.timestamp = timestamp;
        return this;
    }

    withUptime(uptimeMs: number): this {
        this.uptimeMs = uptimeMs;
        return this;
    }

    withExtendedData(data: Readonly<Record<string, unknown>>): this {
        this.extendedData = { ...this.extendedData, ...data };
        return this;
    }

    /**
     * @throws ValidationError naming every missing section
     */
    build(): ISystemContext {
        const { thermal, power, gpu, battery, workload, userIntent } = this;
        if (!thermal || !power || !gpu || !battery || !workload || !userIntent) {
            const missing: ValidationFieldError[] = Object.entries({ thermal, power, gpu, battery, workload, userIntent })
                .filter(([, section]) => section === undefined)
                .map(([field]) => ({ field, message: `${field} is required` }));
            throw ValidationError.fromFieldErrors(missing);
        }

        const context: ISystemContext = {
            thermal,
            power,
            gpu,
            battery,
            workload,
            userIntent,
            timestamp: this.timestamp ?? new Date(),
            uptimeMs: this.uptimeMs,
            extendedData: this.extendedData,
        };
        return deepFreeze(structuredClone(context));
    }
}
