/**
 * HardwareCapability - Control paths a machine may or may not expose.
 */

export type HardwareCapability =
    | 'cpu_power_control'
    | 'fan_control'
    | 'gpu_control'
    | 'display_control'
    | 'battery_control'
    | 'keyboard_lighting';

export const HARDWARE_CAPABILITIES: readonly HardwareCapability[] = [
    'cpu_power_control',
    'fan_control',
    'gpu_control',
    'display_control',
    'battery_control',
    'keyboard_lighting',
];

export type HardwareCapabilities = Readonly<Record<HardwareCapability, boolean>>;

export function noCapabilities(): HardwareCapabilities {
    return {
        cpu_power_control: false,
        fan_control: false,
        gpu_control: false,
        display_control: false,
        battery_control: false,
        keyboard_lighting: false,
    };
}
