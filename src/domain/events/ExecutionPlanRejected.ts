/**
 * ExecutionPlanRejected - Emitted when the safety gate discards a plan.
 */

import { IDomainEvent } from './IDomainEvent.js';

export type SafetyViolationKind = 'thermal' | 'battery';

export class ExecutionPlanRejected implements IDomainEvent {
    readonly dateTimeOccurred: Date;

    constructor(
        public readonly cycleId: string,
        /** Every rule the plan broke */
        public readonly violations: readonly SafetyViolationKind[],
        /** Human-readable explanation, one line per violation */
        public readonly reasons: readonly string[],
        /** Targets the discarded plan would have set */
        public readonly targets: readonly string[],
        occurredAt: Date = new Date()
    ) {
        this.dateTimeOccurred = occurredAt;
    }

    getAggregateId(): string {
        return this.cycleId;
    }
}
