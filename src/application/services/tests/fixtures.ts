/**
 * Shared builders for service tests.
 */

import {
    BatteryState,
    GpuState,
    ISystemContext,
    PowerState,
    STABLE_TREND,
    SystemContextBuilder,
    ThermalState,
    WorkloadProfile,
} from '../../../domain/entities/SystemContext.js';
import { UserIntent } from '../../../domain/value-objects/HardwareStates.js';
import { IObservabilityContext } from '../../ports/IObservabilityContext.js';
import { IActionHandler } from '../../ports/IActionHandler.js';
import { IResourceAction } from '../../../domain/entities/ResourceAction.js';
import { NullLogger } from '../../../infrastructure/observability/Logger.js';
import { InMemoryMetricsCollector } from '../../../infrastructure/observability/MetricsCollector.js';
import { SimpleTracer } from '../../../infrastructure/observability/Tracer.js';

export const TEST_NOW = new Date('2026-03-01T12:00:00.000Z');

export interface ContextOverrides {
    thermal?: Partial<ThermalState>;
    power?: Partial<PowerState>;
    gpu?: Partial<GpuState>;
    battery?: Partial<BatteryState>;
    workload?: Partial<WorkloadProfile>;
    userIntent?: UserIntent;
}

/**
 * A plugged-in laptop at moderate load and temperature.
 */
export function buildContext(overrides: ContextOverrides = {}): ISystemContext {
    return SystemContextBuilder.create()
        .withThermal({
            cpuTempC: 60,
            gpuTempC: 55,
            gpuHotspotC: 62,
            vrmTempC: 50,
            ssdTempC: 40,
            batteryTempC: 32,
            cpuFanRpm: 2400,
            gpuFanRpm: 2200,
            trend: STABLE_TREND,
            ...overrides.thermal,
        })
        .withPower({
            powerMode: 'balance',
            cpuPl1: 45,
            cpuPl2: 90,
            gpuTgp: 80,
            totalSystemPowerW: 65,
            isAcConnected: true,
            fanProfile: 'balanced',
            ...overrides.power,
        })
        .withGpu({
            state: 'active',
            utilizationPercent: 20,
            memoryUtilizationPercent: 10,
            activeProcesses: [],
            ...overrides.gpu,
        })
        .withBattery({
            isOnBattery: false,
            chargePercent: 80,
            chargeRateMw: 15000,
            estimatedTimeRemainingMs: 0,
            designCapacityMwh: 80000,
            fullChargeCapacityMwh: 76000,
            chargingMode: 'standard',
            ...overrides.battery,
        })
        .withWorkload({
            type: 'light_productivity',
            cpuUtilizationPercent: 25,
            gpuUtilizationPercent: 10,
            activeApplications: ['editor'],
            isUserActive: true,
            timeInWorkloadMs: 60000,
            confidence: 0.8,
            ...overrides.workload,
        })
        .withUserIntent(overrides.userIntent ?? 'balanced')
        .withTimestamp(TEST_NOW)
        .withUptime(3_600_000)
        .build();
}

export interface TestObservability extends IObservabilityContext {
    readonly logger: NullLogger;
    readonly metrics: InMemoryMetricsCollector;
    readonly tracer: SimpleTracer;
}

/**
 * Real in-memory observability so tests can read counters and traces back.
 */
export function createObservability(): TestObservability {
    return {
        logger: new NullLogger(),
        metrics: new InMemoryMetricsCollector(),
        tracer: new SimpleTracer(),
    };
}

/**
 * A clock the test can move forward.
 */
export function createClock(start: Date = TEST_NOW): { now: () => Date; advance: (ms: number) => void } {
    let current = start.getTime();
    return {
        now: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        },
    };
}

/**
 * Handler that records every call as "execute:TARGET" or "rollback:TARGET".
 */
export class RecordingHandler implements IActionHandler {
    readonly calls: string[] = [];
    readonly failExecuteOn = new Set<string>();
    readonly failRollbackOn = new Set<string>();

    constructor(
        readonly name: string,
        readonly supportedTargets: readonly string[],
        private readonly failure: () => Error = () => new Error('write failed')
    ) {}

    async execute(action: IResourceAction): Promise<void> {
        this.calls.push(`execute:${action.target}`);
        if (this.failExecuteOn.has(action.target)) {
            throw this.failure();
        }
    }

    async rollback(action: IResourceAction): Promise<void> {
        this.calls.push(`rollback:${action.target}`);
        if (this.failRollbackOn.has(action.target)) {
            throw new Error('restore failed');
        }
    }
}
