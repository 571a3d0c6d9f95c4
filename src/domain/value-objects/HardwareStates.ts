/**
 * HardwareStates - Closed sets describing machine and user state.
 */

export type UserIntent =
    | 'balanced'
    | 'max_performance'
    | 'battery_saving'
    | 'quiet'
    | 'gaming'
    | 'productivity'
    | 'custom';

export type PowerMode = 'quiet' | 'balance' | 'performance' | 'god_mode';

export type FanProfile = 'quiet' | 'balanced' | 'aggressive' | 'max_performance' | 'custom';

/** PCI power state of the discrete GPU. */
export type GpuPowerState = 'd0' | 'd3_hot' | 'd3_cold';

export type DiscreteGpuState = 'active' | 'inactive' | 'powered_off' | 'unknown';

export type WorkloadType =
    | 'idle'
    | 'light_productivity'
    | 'heavy_productivity'
    | 'gaming'
    | 'ai_workload'
    | 'content_creation'
    | 'mixed'
    | 'unknown';

export type BatteryChargingMode = 'standard' | 'rapid_charge' | 'conservation' | 'custom';

export const PERFORMANCE_INTENTS: readonly UserIntent[] = ['max_performance', 'gaming'];
export const EFFICIENCY_INTENTS: readonly UserIntent[] = ['battery_saving', 'quiet'];
