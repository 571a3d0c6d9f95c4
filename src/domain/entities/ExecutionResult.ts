/**
 * ExecutionResult - What happened when a plan was applied.
 *
 * Delivered to every agent at the end of a cycle. An executor failure is
 * reported here with success = false; it never surfaces as an exception.
 */

import { IResourceAction } from './ResourceAction.js';
import { IConflict } from './ExecutionPlan.js';
import { ISystemContext } from './SystemContext.js';

export interface IFailedAction {
    readonly action: IResourceAction;
    readonly error: string;
}

export interface IRejectedAction {
    readonly action: IResourceAction;
    readonly reason: string;
}

export interface IExecutionResult {
    readonly success: boolean;
    /** Actions applied and kept; empty after a rollback */
    readonly executedActions: readonly IResourceAction[];
    readonly failedActions: readonly IFailedAction[];
    /** Actions skipped by per-action hardware limits or user overrides */
    readonly rejectedActions: readonly IRejectedAction[];
    readonly rolledBack: boolean;
    readonly resolvedConflicts: readonly IConflict[];
    readonly contextBefore: ISystemContext;
    readonly contextAfter: ISystemContext;
    readonly durationMs: number;
}

export const ExecutionResult = {
    /**
     * Result handed to agents when the safety gate discarded the plan.
     */
    rejected(contextBefore: ISystemContext, conflicts: readonly IConflict[]): IExecutionResult {
        return {
            success: false,
            executedActions: [],
            failedActions: [],
            rejectedActions: [],
            rolledBack: false,
            resolvedConflicts: conflicts,
            contextBefore,
            contextAfter: contextBefore,
            durationMs: 0,
        };
    },
};
