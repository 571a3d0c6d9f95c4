/**
 * OptimizationPriority - Relative weights agents use to trade off goals.
 *
 * Weights are in [0, 1] and are not normalized; an agent compares them
 * against each other, not against a budget.
 */

export type CoordinationMode =
    | 'normal'
    | 'emergency'
    | 'battery_saving'
    | 'thermal_management'
    | 'power_optimization';

export interface IOptimizationPriority {
    readonly batteryLife: number;
    readonly performance: number;
    readonly thermalManagement: number;
    readonly userExperience: number;
}

const weights = (
    batteryLife: number,
    performance: number,
    thermalManagement: number,
    userExperience: number
): IOptimizationPriority => Object.freeze({ batteryLife, performance, thermalManagement, userExperience });

export const MODE_PRIORITIES: Readonly<Record<CoordinationMode, IOptimizationPriority>> = {
    emergency: weights(1.0, 0.1, 0.5, 0.3),
    battery_saving: weights(0.9, 0.2, 0.4, 0.5),
    thermal_management: weights(0.5, 0.6, 1.0, 0.7),
    power_optimization: weights(0.7, 0.6, 0.6, 0.8),
    normal: weights(0.4, 0.8, 0.5, 1.0),
};
