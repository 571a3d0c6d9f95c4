/**
 * MetricsCollector - Metrics collection interface and implementation.
 *
 * Counters, gauges, histograms and timers for the optimization cycle.
 * Histograms keep a bounded window of recent samples since a cycle runs
 * every few hundred milliseconds for the life of the process.
 */

export interface MetricLabels {
    [key: string]: string;
}

export interface HistogramData {
    count: number;
    sum: number;
    min: number;
    max: number;
    avg: number;
    p95: number;
}

export interface MetricsSnapshot {
    timestamp: Date;
    counters: Record<string, number>;
    gauges: Record<string, number>;
    histograms: Record<string, HistogramData>;
}

export interface IMetricsCollector {
    /**
     * Increment a counter metric.
     */
    incrementCounter(name: string, value?: number, labels?: MetricLabels): void;

    /**
     * Set a gauge metric to a specific value.
     */
    setGauge(name: string, value: number, labels?: MetricLabels): void;

    /**
     * Record a value in a histogram.
     */
    recordHistogram(name: string, value: number, labels?: MetricLabels): void;

    /**
     * Start a timer and return a function that stops it, records the
     * elapsed milliseconds and returns them.
     */
    startTimer(name: string, labels?: MetricLabels): () => number;

    getMetrics(): MetricsSnapshot;

    reset(): void;
}

function summarize(values: readonly number[]): HistogramData {
    const sorted = [...values].sort((a, b) => a - b);
    const sum = sorted.reduce((a, b) => a + b, 0);
    const p95Index = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);
    return {
        count: sorted.length,
        sum,
        min: sorted[0],
        max: sorted[sorted.length - 1],
        avg: sum / sorted.length,
        p95: sorted[p95Index],
    };
}

/**
 * In-memory metrics collector.
 */
export class InMemoryMetricsCollector implements IMetricsCollector {
    private counters: Map<string, number> = new Map();
    private gauges: Map<string, number> = new Map();
    private histograms: Map<string, number[]> = new Map();

    constructor(private readonly maxSamples: number = 1000) {}

    private makeKey(name: string, labels?: MetricLabels): string {
        if (!labels || Object.keys(labels).length === 0) {
            return name;
        }
        const labelStr = Object.entries(labels)
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([k, v]) => `${k}="${v}"`)
            .join(',');
        return `${name}{${labelStr}}`;
    }

    incrementCounter(name: string, value: number = 1, labels?: MetricLabels): void {
        const key = this.makeKey(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    }

    setGauge(name: string, value: number, labels?: MetricLabels): void {
        this.gauges.set(this.makeKey(name, labels), value);
    }

    recordHistogram(name: string, value: number, labels?: MetricLabels): void {
        const key = this.makeKey(name, labels);
        const values = this.histograms.get(key) ?? [];
        values.push(value);
        if (values.length > this.maxSamples) {
            values.splice(0, values.length - this.maxSamples);
        }
        this.histograms.set(key, values);
    }

    startTimer(name: string, labels?: MetricLabels): () => number {
        const start = performance.now();
        return () => {
            const duration = performance.now() - start;
            this.recordHistogram(name, duration, labels);
            return duration;
        };
    }

    getMetrics(): MetricsSnapshot {
        const histograms: Record<string, HistogramData> = {};
        this.histograms.forEach((values, key) => {
            if (values.length > 0) {
                histograms[key] = summarize(values);
            }
        });

        return {
            timestamp: new Date(),
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            histograms,
        };
    }

    reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.histograms.clear();
    }

    getCounter(name: string, labels?: MetricLabels): number {
        return this.counters.get(this.makeKey(name, labels)) ?? 0;
    }

    getGauge(name: string, labels?: MetricLabels): number | undefined {
        return this.gauges.get(this.makeKey(name, labels));
    }

    getHistogramData(name: string, labels?: MetricLabels): HistogramData | undefined {
        const values = this.histograms.get(this.makeKey(name, labels));
        if (!values || values.length === 0) return undefined;
        return summarize(values);
    }
}

/**
 * No-op metrics collector for when metrics are disabled.
 */
export class NullMetricsCollector implements IMetricsCollector {
    incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void {}
    setGauge(_name: string, _value: number, _labels?: MetricLabels): void {}
    recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}
    startTimer(_name: string, _labels?: MetricLabels): () => number {
        return () => 0;
    }
    getMetrics(): MetricsSnapshot {
        return { timestamp: new Date(), counters: {}, gauges: {}, histograms: {} };
    }
    reset(): void {}
}
