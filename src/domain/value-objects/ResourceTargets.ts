/**
 * ResourceTargets - Well-known resource identifiers.
 *
 * Actions carry their target as a plain string so new resources need no
 * type change; these constants name the ones the core understands.
 */

export const ResourceTargets = {
    CPU_PL1: 'CPU_PL1',
    CPU_PL2: 'CPU_PL2',
    CPU_PL4: 'CPU_PL4',
    GPU_TGP: 'GPU_TGP',
    GPU_OVERCLOCK: 'GPU_OVERCLOCK',
    GPU_POWER_STATE: 'GPU_POWER_STATE',
    GPU_HYBRID_MODE: 'GPU_HYBRID_MODE',
    POWER_MODE: 'POWER_MODE',
    FAN_PROFILE: 'FAN_PROFILE',
    FAN_FULL_SPEED: 'FAN_FULL_SPEED',
    BATTERY_CHARGE_LIMIT: 'BATTERY_CHARGE_LIMIT',
    BATTERY_CONSERVATION_MODE: 'BATTERY_CONSERVATION_MODE',
    DISPLAY_BRIGHTNESS: 'DISPLAY_BRIGHTNESS',
    DISPLAY_REFRESH_RATE: 'DISPLAY_REFRESH_RATE',
    KEYBOARD_BRIGHTNESS: 'KEYBOARD_BRIGHTNESS',
    COORDINATE_EMERGENCY_MODE: 'COORDINATE_EMERGENCY_MODE',
    COORDINATE_LOW_BATTERY_MODE: 'COORDINATE_LOW_BATTERY_MODE',
    COORDINATE_HIGH_POWER_CONSUMPTION: 'COORDINATE_HIGH_POWER_CONSUMPTION',
    SYSTEM_HIBERNATE_WARNING: 'SYSTEM_HIBERNATE_WARNING',
} as const;

export type KnownResourceTarget = typeof ResourceTargets[keyof typeof ResourceTargets];

export const COORDINATION_TARGETS: readonly string[] = [
    ResourceTargets.COORDINATE_EMERGENCY_MODE,
    ResourceTargets.COORDINATE_LOW_BATTERY_MODE,
    ResourceTargets.COORDINATE_HIGH_POWER_CONSUMPTION,
    ResourceTargets.SYSTEM_HIBERNATE_WARNING,
];

export function isCoordinationTarget(target: string): boolean {
    return COORDINATION_TARGETS.includes(target);
}
