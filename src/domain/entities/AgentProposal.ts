/**
 * AgentProposal - The set of actions one agent wants in one cycle.
 */

import { IResourceAction } from './ResourceAction.js';

/**
 * Informational tier of the proposing agent. Arbitration ranks individual
 * actions by their ActionType, not by this tier.
 */
export type AgentPriority = 'low' | 'normal' | 'high' | 'critical';

export interface IAgentProposal {
    readonly agentName: string;
    readonly priority: AgentPriority;
    readonly actions: readonly IResourceAction[];
}

export const AgentProposal = {
    create(agentName: string, priority: AgentPriority, actions: readonly IResourceAction[]): IAgentProposal {
        return { agentName, priority, actions: [...actions] };
    },

    /**
     * What an agent contributes when it has nothing to do, or failed.
     */
    empty(agentName: string, priority: AgentPriority = 'normal'): IAgentProposal {
        return { agentName, priority, actions: [] };
    },
};
