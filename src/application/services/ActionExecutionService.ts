/**
 * ActionExecutionService - Applies a plan through the registered handlers.
 *
 * Actions run one at a time, most urgent first. Each is checked against the
 * per-action hardware limits and skipped if refused. A plan with a target no
 * handler serves is not applied at all. A handler failure rolls back
 * everything already applied in this call, newest first, and the result
 * reports no executed actions.
 *
 * Each handler sits behind its own circuit breaker so a broken control path
 * fails fast instead of being retried every cycle.
 */

import { IObservabilityContext, MetricNames } from '../ports/IObservabilityContext.js';
import { IActionHandler } from '../ports/IActionHandler.js';
import { ActionSafetyService } from './ActionSafetyService.js';
import { IResourceAction, describeAction } from '../../domain/entities/ResourceAction.js';
import { IConflict } from '../../domain/entities/ExecutionPlan.js';
import { IExecutionResult, IFailedAction, IRejectedAction } from '../../domain/entities/ExecutionResult.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import { ActionTypeUtils } from '../../domain/value-objects/ActionType.js';
import { CircuitBreakerRegistry } from '../../infrastructure/resilience/CircuitBreaker.js';
import { OrchestrationError } from '../../shared/errors/OrchestrationError.js';
import { errorMessage, normalizeError, toError } from '../../shared/errors/ErrorNormalizer.js';

interface RoutedAction {
    readonly action: IResourceAction;
    readonly handler: IActionHandler;
}

export class ActionExecutionService {
    private handlers: Map<string, IActionHandler> = new Map();

    constructor(
        handlers: readonly IActionHandler[],
        private readonly actionSafety: ActionSafetyService,
        private readonly breakers: CircuitBreakerRegistry,
        private readonly observability: IObservabilityContext
    ) {
        for (const handler of handlers) {
            this.register(handler);
        }
    }

    /**
     * Route the handler's targets to it. A later handler claiming the same
     * target replaces the earlier one.
     */
    register(handler: IActionHandler): void {
        for (const target of handler.supportedTargets) {
            const previous = this.handlers.get(target);
            if (previous && previous !== handler) {
                this.observability.logger.warn('Action handler replaced', {
                    target,
                    previous: previous.name,
                    handler: handler.name,
                });
            }
            this.handlers.set(target, handler);
        }
    }

    hasHandlerFor(target: string): boolean {
        return this.handlers.has(target);
    }

    async execute(
        actions: readonly IResourceAction[],
        contextBefore: ISystemContext,
        conflicts: readonly IConflict[] = []
    ): Promise<IExecutionResult> {
        const stopTimer = this.observability.metrics.startTimer(MetricNames.EXECUTION_DURATION_MS);
        const ordered = [...actions].sort((a, b) => ActionTypeUtils.byUrgencyDesc(a.type, b.type));

        const rejected: IRejectedAction[] = [];
        const routed: RoutedAction[] = [];
        const unrouted: IFailedAction[] = [];

        // Every action is checked and routed before any handler runs.
        for (const action of ordered) {
            const verdict = this.actionSafety.validateAction(action, contextBefore);
            if (!verdict.allowed) {
                rejected.push({ action, reason: verdict.reason });
                this.observability.metrics.incrementCounter(MetricNames.ACTIONS_REJECTED_TOTAL, 1, { target: action.target });
                this.observability.logger.info('Action rejected by safety limits', {
                    target: action.target,
                    reason: verdict.reason,
                });
                continue;
            }

            const handler = this.handlers.get(action.target);
            if (!handler) {
                unrouted.push({ action, error: OrchestrationError.handlerNotFound(action.target).message });
                continue;
            }
            routed.push({ action, handler });
        }

        if (unrouted.length > 0) {
            this.observability.logger.warn('Plan not applied, targets have no handler', {
                targets: unrouted.map(f => f.action.target),
                errorCode: 'HANDLER_NOT_FOUND',
            });
            return {
                success: false,
                executedActions: [],
                failedActions: unrouted,
                rejectedActions: rejected,
                rolledBack: false,
                resolvedConflicts: conflicts,
                contextBefore,
                contextAfter: contextBefore,
                durationMs: stopTimer(),
            };
        }

        const applied: RoutedAction[] = [];

        for (const entry of routed) {
            const { action, handler } = entry;
            try {
                await this.breakers.getOrCreate(handler.name).execute(() => handler.execute(action));
                applied.push(entry);
                this.observability.metrics.incrementCounter(MetricNames.ACTIONS_EXECUTED_TOTAL, 1, { target: action.target });
                this.observability.logger.debug('Action executed', {
                    target: action.target,
                    action: describeAction(action),
                    reason: action.reason,
                });
            } catch (error) {
                const normalized = normalizeError(error);
                this.observability.metrics.incrementCounter(MetricNames.ACTIONS_FAILED_TOTAL, 1, { target: action.target });
                this.observability.logger.error('Action execution failed, rolling back', toError(error), {
                    target: action.target,
                    errorCode: normalized.code,
                    rollbackCount: applied.length,
                });

                await this.rollback(applied);
                return {
                    success: false,
                    executedActions: [],
                    failedActions: [{ action, error: errorMessage(error) }],
                    rejectedActions: rejected,
                    rolledBack: true,
                    resolvedConflicts: conflicts,
                    contextBefore,
                    contextAfter: contextBefore,
                    durationMs: stopTimer(),
                };
            }
        }

        const executed = applied.map(entry => entry.action);
        const success = executed.length > 0;
        this.observability.logger.info('Execution complete', {
            executed: executed.length,
            requested: actions.length,
            rejected: rejected.length,
            success,
        });

        return {
            success,
            executedActions: executed,
            failedActions: [],
            rejectedActions: rejected,
            rolledBack: false,
            resolvedConflicts: conflicts,
            contextBefore,
            contextAfter: contextBefore,
            durationMs: stopTimer(),
        };
    }

    /**
     * Undo applied actions newest first. A failed rollback is logged and the
     * remaining rollbacks still run.
     */
    private async rollback(applied: readonly RoutedAction[]): Promise<void> {
        for (const { action, handler } of [...applied].reverse()) {
            try {
                await handler.rollback(action);
                this.observability.metrics.incrementCounter(MetricNames.ROLLBACKS_TOTAL, 1, { target: action.target });
                this.observability.logger.info('Action rolled back', { target: action.target });
            } catch (error) {
                this.observability.logger.error('Rollback failed', toError(error), { target: action.target });
            }
        }
    }
}
