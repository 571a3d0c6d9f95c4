/**
 * OptimizationCycleService - Runs one optimization cycle end to end.
 *
 * Steps:
 * 1. Collect the system snapshot (a failure skips the cycle)
 * 2. Ask every enabled, supported agent to propose, concurrently, each
 *    bounded by the agent timeout
 * 3. Arbitrate the proposals into one plan
 * 4. Pass the plan through the safety gate (a rejection discards it whole)
 * 5. Execute the plan
 * 6. Collect the post-execution snapshot
 * 7. Notify every agent of the result
 *
 * Only one cycle runs at a time; a call made while one is in progress
 * returns immediately as skipped. The periodic timer lives outside this
 * service. Nothing thrown inside a cycle escapes runCycle().
 */

import { IObservabilityContext, MetricNames, SpanNames } from '../ports/IObservabilityContext.js';
import { IContextCollector } from '../ports/IContextCollector.js';
import { IEventDispatcher } from '../ports/IEventDispatcher.js';
import { AgentCoordinationService } from './AgentCoordinationService.js';
import { DecisionArbitrationService } from './DecisionArbitrationService.js';
import { SafetyValidationService, SafetyViolation } from './SafetyValidationService.js';
import { ActionExecutionService } from './ActionExecutionService.js';
import { HardwareCapabilityService } from './HardwareCapabilityService.js';
import { IOptimizationAgent } from '../../domain/interfaces/IOptimizationAgent.js';
import { AgentProposal, IAgentProposal } from '../../domain/entities/AgentProposal.js';
import { attributeAction } from '../../domain/entities/ResourceAction.js';
import { AgentStates } from '../../domain/entities/AgentState.js';
import { ExecutionPlan, IExecutionPlan } from '../../domain/entities/ExecutionPlan.js';
import { ExecutionResult, IExecutionResult } from '../../domain/entities/ExecutionResult.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import { AgentProposalFailed } from '../../domain/events/AgentProposalFailed.js';
import { ExecutionPlanRejected } from '../../domain/events/ExecutionPlanRejected.js';
import { OptimizationCycleCompleted } from '../../domain/events/OptimizationCycleCompleted.js';
import { CycleContext } from '../../infrastructure/observability/CycleContext.js';
import { ISpan } from '../../infrastructure/observability/Tracer.js';
import { FeatureFlags } from '../../infrastructure/config/FeatureFlags.js';
import { OrchestrationError } from '../../shared/errors/OrchestrationError.js';
import { errorMessage, normalizeError, toError } from '../../shared/errors/ErrorNormalizer.js';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

export type CycleStatus = 'completed' | 'idle' | 'rejected' | 'skipped' | 'failed';

export type SkipReason = 'busy' | 'context_unavailable';

/**
 * What one call to runCycle() did.
 */
export interface CycleReport {
    cycleId: string;
    cycleNumber: number;
    status: CycleStatus;
    skipReason?: SkipReason;
    /** Agents that timed out or threw while proposing */
    failedAgents: string[];
    plan?: IExecutionPlan;
    violations?: SafetyViolation[];
    result?: IExecutionResult;
    error?: string;
    durationMs: number;
}

export interface OrchestratorStatistics {
    totalCycles: number;
    totalActions: number;
    totalConflicts: number;
    rejectedPlans: number;
    skippedCycles: number;
    failedProposals: number;
    uptimeMs: number;
    lastCycleAt?: Date;
}

export interface OptimizationCycleDependencies {
    agents: readonly IOptimizationAgent[];
    collector: IContextCollector;
    /**
     * Reads the snapshot after execution; defaults to `collector`. Kept apart
     * so a sampling collector records one reading per cycle.
     */
    postExecutionCollector?: IContextCollector;
    arbitration: DecisionArbitrationService;
    coordination: AgentCoordinationService;
    safety: SafetyValidationService;
    executor: ActionExecutionService;
    capabilities: HardwareCapabilityService;
    featureFlags: FeatureFlags;
    eventDispatcher: IEventDispatcher;
    observability: IObservabilityContext;
    agentTimeoutMs: number;
    /** Interval the host runs cycles at; a longer cycle is reported as an overrun */
    cycleIntervalMs?: number;
    clock?: () => Date;
}

interface ProposalOutcome {
    agent: IOptimizationAgent;
    proposal: IAgentProposal;
    failed: boolean;
}

export class OptimizationCycleService {
    private readonly deps: OptimizationCycleDependencies;
    private readonly clock: () => Date;
    private readonly startedAt: Date;
    private running = false;
    private cycleCounter = 0;

    private totalCycles = 0;
    private totalActions = 0;
    private totalConflicts = 0;
    private rejectedPlans = 0;
    private skippedCycles = 0;
    private failedProposals = 0;
    private lastCycleAt?: Date;

    constructor(deps: OptimizationCycleDependencies) {
        this.deps = deps;
        this.clock = deps.clock ?? (() => new Date());
        this.startedAt = this.clock();
    }

    get isRunning(): boolean {
        return this.running;
    }

    getStatistics(): OrchestratorStatistics {
        return {
            totalCycles: this.totalCycles,
            totalActions: this.totalActions,
            totalConflicts: this.totalConflicts,
            rejectedPlans: this.rejectedPlans,
            skippedCycles: this.skippedCycles,
            failedProposals: this.failedProposals,
            uptimeMs: this.clock().getTime() - this.startedAt.getTime(),
            lastCycleAt: this.lastCycleAt,
        };
    }

    /**
     * Run one cycle. Never rejects.
     */
    async runCycle(): Promise<CycleReport> {
        const { logger, metrics, tracer } = this.deps.observability;
        const cycleId = IdGenerator.generate();

        if (this.running) {
            this.skippedCycles++;
            metrics.incrementCounter(MetricNames.CYCLES_SKIPPED_TOTAL, 1, { reason: 'busy' });
            logger.debug('Cycle skipped, previous cycle still running', { cycleId });
            return this.report(cycleId, 0, 'skipped', performance.now(), { skipReason: 'busy' });
        }

        this.running = true;
        const cycleNumber = ++this.cycleCounter;
        const startTime = this.clock();
        const started = performance.now();

        try {
            return await CycleContext.runAsync({ cycleId, cycleNumber, startTime }, () =>
                tracer.withSpan(SpanNames.CYCLE_RUN, span => this.runSteps(cycleId, cycleNumber, started, span))
            );
        } catch (error) {
            const normalized = normalizeError(error);
            logger.error('Optimization cycle failed', toError(error), { cycleId, errorCode: normalized.code });
            return this.report(cycleId, cycleNumber, 'failed', started, { error: normalized.message });
        } finally {
            this.running = false;
            this.lastCycleAt = startTime;
            const durationMs = performance.now() - started;
            metrics.recordHistogram(MetricNames.CYCLE_DURATION_MS, durationMs);

            const { cycleIntervalMs } = this.deps;
            if (cycleIntervalMs !== undefined && durationMs > cycleIntervalMs) {
                metrics.incrementCounter(MetricNames.CYCLE_OVERRUNS_TOTAL, 1);
                logger.warn('Cycle overran its interval', {
                    cycleId,
                    cycleNumber,
                    durationMs: Math.round(durationMs),
                    cycleIntervalMs,
                });
            }
        }
    }

    private async runSteps(cycleId: string, cycleNumber: number, started: number, span: ISpan): Promise<CycleReport> {
        const { logger, metrics, tracer } = this.deps.observability;

        // 1. Snapshot
        let context: ISystemContext;
        try {
            context = await tracer.withSpan(SpanNames.CONTEXT_COLLECT, () => this.deps.collector.collect());
        } catch (error) {
            const failure = OrchestrationError.contextUnavailable(errorMessage(error));
            this.skippedCycles++;
            metrics.incrementCounter(MetricNames.CYCLES_SKIPPED_TOTAL, 1, { reason: 'context_unavailable' });
            logger.warn(failure.message, { errorCode: failure.code });
            span.setAttributes({ 'cycle.status': 'skipped' });
            return this.report(cycleId, cycleNumber, 'skipped', started, { skipReason: 'context_unavailable' });
        }

        // 2. Proposals
        const agents = await this.activeAgents();
        const outcomes = await Promise.all(agents.map(agent => this.proposeFor(cycleId, agent, context)));
        const failedAgents = outcomes.filter(o => o.failed).map(o => o.agent.agentName);
        const proposals = outcomes.map(o => o.proposal);

        // 3. Arbitration
        const plan = await tracer.withSpan(SpanNames.ARBITRATION_RESOLVE, async () =>
            this.deps.arbitration.resolve(proposals, context)
        );
        span.setAttributes({
            'cycle.agents': agents.length,
            'cycle.proposed_actions': plan.metrics.proposedActions,
            'cycle.conflicts': plan.metrics.conflictsResolved,
        });

        if (!ExecutionPlan.hasActions(plan)) {
            this.totalCycles++;
            metrics.incrementCounter(MetricNames.CYCLES_TOTAL, 1, { status: 'idle' });
            logger.debug('No actions proposed this cycle', { agents: agents.length });
            return this.report(cycleId, cycleNumber, 'idle', started, { failedAgents, plan });
        }

        // 4. Safety gate
        const inspection = await tracer.withSpan(SpanNames.SAFETY_VALIDATE, async () =>
            this.deps.safety.inspect(plan, context)
        );
        if (!inspection.safe) {
            this.totalCycles++;
            this.rejectedPlans++;
            this.totalConflicts += plan.conflicts.length;
            metrics.incrementCounter(MetricNames.PLANS_REJECTED_TOTAL, 1);
            metrics.incrementCounter(MetricNames.CYCLES_TOTAL, 1, { status: 'rejected' });
            span.setAttributes({ 'cycle.status': 'rejected' });

            await this.dispatch(new ExecutionPlanRejected(
                cycleId,
                inspection.violations.map(v => v.kind),
                inspection.violations.map(v => v.reason),
                plan.actions.map(a => a.target),
                this.clock()
            ));

            const result = ExecutionResult.rejected(context, plan.conflicts);
            await this.notifyAgents(agents, result);
            this.recordAgentStates(outcomes, result);

            return this.report(cycleId, cycleNumber, 'rejected', started, {
                failedAgents,
                plan,
                violations: inspection.violations,
                result,
            });
        }

        // 5. Execution
        const executed = await tracer.withSpan(SpanNames.EXECUTION_APPLY, () =>
            this.deps.executor.execute(plan.actions, context, plan.conflicts)
        );

        // 6. Post-execution snapshot
        const contextAfter = await this.collectAfter(context);
        const result: IExecutionResult = { ...executed, contextAfter };

        // 7. Notification
        await this.notifyAgents(agents, result);
        this.recordAgentStates(outcomes, result);

        this.totalCycles++;
        this.totalActions += result.executedActions.length;
        this.totalConflicts += plan.conflicts.length;
        metrics.incrementCounter(MetricNames.CYCLES_TOTAL, 1, { status: 'completed' });
        span.setAttributes({ 'cycle.status': 'completed', 'cycle.executed_actions': result.executedActions.length });

        const durationMs = performance.now() - started;
        await this.dispatch(new OptimizationCycleCompleted(
            cycleId,
            cycleNumber,
            proposals.length,
            result.executedActions.length,
            plan.conflicts.length,
            result.success,
            durationMs,
            this.clock()
        ));

        logger.info('Optimization cycle completed', {
            cycleNumber,
            proposals: proposals.length,
            executed: result.executedActions.length,
            conflicts: plan.conflicts.length,
            success: result.success,
        });

        return this.report(cycleId, cycleNumber, 'completed', started, { failedAgents, plan, result });
    }

    /**
     * Agents switched on by feature flags whose required capabilities exist.
     */
    private async activeAgents(): Promise<IOptimizationAgent[]> {
        const { featureFlags, capabilities, observability } = this.deps;
        const active: IOptimizationAgent[] = [];

        for (const agent of this.deps.agents) {
            if (!featureFlags.isAgentEnabled(agent.agentName)) {
                continue;
            }
            if (!(await capabilities.supportsAll(agent.requiredCapabilities ?? []))) {
                observability.metrics.incrementCounter(MetricNames.AGENT_SKIPPED_TOTAL, 1, { agent: agent.agentName });
                observability.logger.debug('Agent skipped, required capability unavailable', {
                    agentName: agent.agentName,
                    required: agent.requiredCapabilities,
                });
                continue;
            }
            active.push(agent);
        }

        return active;
    }

    /**
     * Ask one agent for its proposal. A timeout or failure yields an empty
     * proposal so the other agents' work still counts.
     */
    private async proposeFor(cycleId: string, agent: IOptimizationAgent, context: ISystemContext): Promise<ProposalOutcome> {
        const { logger, metrics, tracer } = this.deps.observability;
        const labels = { agent: agent.agentName };
        const stopTimer = metrics.startTimer(MetricNames.AGENT_PROPOSE_LATENCY_MS, labels);

        try {
            const proposal = await CycleContext.forAgent(agent.agentName, () =>
                tracer.withSpan(SpanNames.AGENT_PROPOSE, async span => {
                    span.setAttributes({ 'agent.name': agent.agentName });
                    return this.withTimeout(agent, context);
                })
            );

            metrics.incrementCounter(MetricNames.AGENT_PROPOSALS_TOTAL, 1, labels);
            metrics.incrementCounter(MetricNames.AGENT_PROPOSED_ACTIONS_TOTAL, proposal.actions.length, labels);
            if (proposal.actions.length > 0) {
                logger.debug('Agent proposed actions', { agentName: agent.agentName, count: proposal.actions.length });
            }
            return {
                agent,
                proposal: { ...proposal, actions: proposal.actions.map(a => attributeAction(a, agent.agentName)) },
                failed: false,
            };
        } catch (error) {
            const failure = error instanceof OrchestrationError && error.code === 'AGENT_TIMEOUT'
                ? error
                : OrchestrationError.agentFailure(agent.agentName, errorMessage(error));

            const code = failure.code === 'AGENT_TIMEOUT' ? 'AGENT_TIMEOUT' : 'AGENT_FAILURE';

            this.failedProposals++;
            metrics.incrementCounter(
                code === 'AGENT_TIMEOUT' ? MetricNames.AGENT_TIMEOUTS_TOTAL : MetricNames.AGENT_FAILURES_TOTAL,
                1,
                labels
            );
            logger.warn('Agent proposal failed, continuing without it', {
                agentName: agent.agentName,
                errorCode: code,
                error: failure.message,
            });

            await this.dispatch(new AgentProposalFailed(cycleId, agent.agentName, code, failure.message, this.clock()));
            return { agent, proposal: AgentProposal.empty(agent.agentName, agent.priority), failed: true };
        } finally {
            stopTimer();
        }
    }

    private async withTimeout(agent: IOptimizationAgent, context: ISystemContext): Promise<IAgentProposal> {
        const timeoutMs = this.deps.agentTimeoutMs;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(OrchestrationError.agentTimeout(agent.agentName, timeoutMs)), timeoutMs);
        });

        try {
            // Promise.resolve().then() turns a synchronous throw into a rejection.
            return await Promise.race([Promise.resolve().then(() => agent.propose(context)), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async collectAfter(contextBefore: ISystemContext): Promise<ISystemContext> {
        const { logger, tracer } = this.deps.observability;
        try {
            const collector = this.deps.postExecutionCollector ?? this.deps.collector;
            return await tracer.withSpan(SpanNames.CONTEXT_COLLECT, () => collector.collect());
        } catch (error) {
            logger.warn('Post-execution snapshot unavailable, reusing pre-execution snapshot', {
                error: errorMessage(error),
            });
            return contextBefore;
        }
    }

    private async notifyAgents(agents: readonly IOptimizationAgent[], result: IExecutionResult): Promise<void> {
        const { logger, tracer } = this.deps.observability;

        const settled = await Promise.allSettled(agents.map(agent =>
            CycleContext.forAgent(agent.agentName, () =>
                tracer.withSpan(SpanNames.AGENT_NOTIFY, () => Promise.resolve().then(() => agent.onExecuted(result)))
            )
        ));

        settled.forEach((outcome, index) => {
            if (outcome.status === 'rejected') {
                logger.warn('Agent failed to process execution result', {
                    agentName: agents[index].agentName,
                    error: errorMessage(outcome.reason),
                });
            }
        });
    }

    /**
     * Fold the cycle into each participating agent's bookkeeping on the bus.
     */
    private recordAgentStates(outcomes: readonly ProposalOutcome[], result: IExecutionResult): void {
        const executed = new Set(result.executedActions);
        const { coordination } = this.deps;

        for (const { agent, proposal } of outcomes) {
            const executedCount = proposal.actions.filter(a => executed.has(a)).length;
            coordination.updateState(
                agent.agentName,
                AgentStates.record(coordination.stateOf(agent.agentName), proposal.actions.length, executedCount)
            );
        }
    }

    /**
     * Event delivery must not fail the cycle.
     */
    private async dispatch(event: IDomainEvent): Promise<void> {
        try {
            await this.deps.eventDispatcher.dispatch(event);
        } catch (error) {
            this.deps.observability.logger.error('Event dispatch failed', toError(error), {
                eventType: event.constructor.name,
            });
        }
    }

    private report(
        cycleId: string,
        cycleNumber: number,
        status: CycleStatus,
        started: number,
        extra: Partial<Omit<CycleReport, 'cycleId' | 'cycleNumber' | 'status' | 'durationMs'>> = {}
    ): CycleReport {
        return {
            cycleId,
            cycleNumber,
            status,
            failedAgents: [],
            ...extra,
            durationMs: performance.now() - started,
        };
    }
}
