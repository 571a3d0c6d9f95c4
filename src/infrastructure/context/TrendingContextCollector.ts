/**
 * TrendingContextCollector - Adds the thermal trend to collected snapshots.
 *
 * Wraps the platform collector, keeps the temperature history across cycles,
 * and replaces the snapshot's trend with one computed from that history.
 */

import { IContextCollector } from '../../application/ports/IContextCollector.js';
import { ISystemContext, SystemContextBuilder } from '../../domain/entities/SystemContext.js';
import { ThermalTrendCalculator } from '../../domain/services/ThermalTrendCalculator.js';

export class TrendingContextCollector implements IContextCollector {
    constructor(
        private readonly inner: IContextCollector,
        private readonly trend: ThermalTrendCalculator = new ThermalTrendCalculator()
    ) {}

    async collect(): Promise<ISystemContext> {
        const context = await this.inner.collect();
        this.trend.addSample({
            cpuTempC: context.thermal.cpuTempC,
            gpuTempC: context.thermal.gpuTempC,
        });

        return SystemContextBuilder.from(context)
            .withThermal({ ...context.thermal, trend: this.trend.currentTrend() })
            .build();
    }
}
