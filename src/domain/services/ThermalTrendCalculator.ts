/**
 * ThermalTrendCalculator - Derives the thermal trend from recent readings.
 *
 * Samples are expected about once per second, so a per-sample slope is read
 * as °C per second.
 */

import { STABLE_TREND, ThermalTrend } from '../entities/SystemContext.js';

export interface ThermalSample {
    cpuTempC: number;
    gpuTempC: number;
}

const WINDOW = 30;
const MIN_SAMPLES = 5;
const RISING_RAPIDLY_SLOPE = 0.5;
const COOLING_SLOPE = -0.3;
const STABLE_VARIANCE = 2;

/**
 * Least-squares slope of values against their index.
 */
export function linearSlope(values: readonly number[]): number {
    const n = values.length;
    if (n < 2) {
        return 0;
    }

    let sumX = 0;
    let sumY = 0;
    let sumXY = 0;
    let sumX2 = 0;
    values.forEach((y, x) => {
        sumX += x;
        sumY += y;
        sumXY += x * y;
        sumX2 += x * x;
    });

    return (n * sumXY - sumX * sumY) / (n * sumX2 - sumX * sumX);
}

/**
 * Population variance.
 */
export function variance(values: readonly number[]): number {
    if (values.length < 2) {
        return 0;
    }
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    return values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
}

export class ThermalTrendCalculator {
    private history: ThermalSample[] = [];

    constructor(private readonly maxHistory: number = 300) {}

    addSample(sample: ThermalSample): void {
        this.history.push({ ...sample });
        if (this.history.length > this.maxHistory) {
            this.history.splice(0, this.history.length - this.maxHistory);
        }
    }

    get sampleCount(): number {
        return this.history.length;
    }

    currentTrend(): ThermalTrend {
        if (this.history.length < MIN_SAMPLES) {
            return STABLE_TREND;
        }

        const recent = this.history.slice(-WINDOW);
        const cpu = recent.map(s => s.cpuTempC);
        const gpu = recent.map(s => s.gpuTempC);

        const cpuPerSecond = linearSlope(cpu);
        const gpuPerSecond = linearSlope(gpu);

        return {
            cpuPerSecond,
            gpuPerSecond,
            isRisingRapidly: cpuPerSecond > RISING_RAPIDLY_SLOPE || gpuPerSecond > RISING_RAPIDLY_SLOPE,
            isStable: variance(cpu) < STABLE_VARIANCE && variance(gpu) < STABLE_VARIANCE,
            isCooling: cpuPerSecond < COOLING_SLOPE && gpuPerSecond < COOLING_SLOPE,
        };
    }

    reset(): void {
        this.history = [];
    }
}
