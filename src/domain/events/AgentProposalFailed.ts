/**
 * AgentProposalFailed - An agent timed out or threw while proposing.
 */

import { IDomainEvent } from './IDomainEvent.js';

export class AgentProposalFailed implements IDomainEvent {
    readonly dateTimeOccurred: Date;

    constructor(
        public readonly cycleId: string,
        public readonly agentName: string,
        public readonly errorCode: 'AGENT_TIMEOUT' | 'AGENT_FAILURE',
        public readonly message: string,
        occurredAt: Date = new Date()
    ) {
        this.dateTimeOccurred = occurredAt;
    }

    getAggregateId(): string {
        return this.agentName;
    }
}
