/**
 * OptimizationCycleCompleted - Emitted after a cycle that reached execution.
 */

import { IDomainEvent } from './IDomainEvent.js';

export class OptimizationCycleCompleted implements IDomainEvent {
    readonly dateTimeOccurred: Date;

    constructor(
        public readonly cycleId: string,
        public readonly cycleNumber: number,
        public readonly proposalCount: number,
        public readonly executedActionCount: number,
        public readonly conflictCount: number,
        public readonly success: boolean,
        public readonly durationMs: number,
        occurredAt: Date = new Date()
    ) {
        this.dateTimeOccurred = occurredAt;
    }

    getAggregateId(): string {
        return this.cycleId;
    }
}
