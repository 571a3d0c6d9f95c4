/**
 * ExecutionPlan - Arbitration output: one winning action per target.
 */

import { IResourceAction } from './ResourceAction.js';

export type ResolutionStrategy =
    | 'Emergency Override'
    | 'Critical Priority'
    | 'User Intent: Performance'
    | 'User Intent: Efficiency'
    | 'Action Type Priority';

export interface IConflict {
    readonly target: string;
    readonly winner: IResourceAction;
    readonly losers: readonly IResourceAction[];
    readonly strategy: ResolutionStrategy;
    readonly winnerAgent: string;
    readonly loserAgents: readonly string[];
}

export interface IArbitrationMetrics {
    readonly totalProposals: number;
    readonly proposedActions: number;
    readonly totalActions: number;
    readonly conflictsResolved: number;
    readonly emergencyActions: number;
}

export interface IExecutionPlan {
    readonly createdAt: Date;
    /** Winning actions in target first-seen order */
    readonly actions: readonly IResourceAction[];
    readonly conflicts: readonly IConflict[];
    readonly metrics: IArbitrationMetrics;
}

export const ExecutionPlan = {
    empty(createdAt: Date = new Date()): IExecutionPlan {
        return {
            createdAt,
            actions: [],
            conflicts: [],
            metrics: {
                totalProposals: 0,
                proposedActions: 0,
                totalActions: 0,
                conflictsResolved: 0,
                emergencyActions: 0,
            },
        };
    },

    hasActions(plan: IExecutionPlan): boolean {
        return plan.actions.length > 0;
    },
};
