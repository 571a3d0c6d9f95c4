/**
 * IObservabilityContext - Bundled observability components.
 *
 * Provides a single injection point for all observability tools:
 * - Logger for structured logging
 * - Metrics for counters, gauges, histograms
 * - Tracer for cycle tracing
 */

import { ILogger } from '../../infrastructure/observability/Logger.js';
import { IMetricsCollector } from '../../infrastructure/observability/MetricsCollector.js';
import { ITracer } from '../../infrastructure/observability/Tracer.js';

export interface IObservabilityContext {
    readonly logger: ILogger;
    readonly metrics: IMetricsCollector;
    readonly tracer: ITracer;
}

/**
 * Standard metric names used across the orchestrator.
 */
export const MetricNames = {
    // Cycle metrics
    CYCLES_TOTAL: 'orchestrator_cycles_total',
    CYCLES_SKIPPED_TOTAL: 'orchestrator_cycles_skipped_total',
    CYCLE_DURATION_MS: 'orchestrator_cycle_duration_ms',
    CYCLE_OVERRUNS_TOTAL: 'orchestrator_cycle_overruns_total',

    // Agent metrics
    AGENT_PROPOSALS_TOTAL: 'agent_proposals_total',
    AGENT_PROPOSED_ACTIONS_TOTAL: 'agent_proposed_actions_total',
    AGENT_FAILURES_TOTAL: 'agent_failures_total',
    AGENT_TIMEOUTS_TOTAL: 'agent_timeouts_total',
    AGENT_PROPOSE_LATENCY_MS: 'agent_propose_latency_ms',
    AGENT_SKIPPED_TOTAL: 'agent_skipped_total',

    // Arbitration metrics
    CONFLICTS_RESOLVED_TOTAL: 'arbitration_conflicts_resolved_total',
    EMERGENCY_ACTIONS_TOTAL: 'arbitration_emergency_actions_total',
    PLANS_REJECTED_TOTAL: 'safety_plans_rejected_total',

    // Execution metrics
    ACTIONS_EXECUTED_TOTAL: 'execution_actions_executed_total',
    ACTIONS_FAILED_TOTAL: 'execution_actions_failed_total',
    ACTIONS_REJECTED_TOTAL: 'execution_actions_rejected_total',
    ROLLBACKS_TOTAL: 'execution_rollbacks_total',
    EXECUTION_DURATION_MS: 'execution_duration_ms',

    // Coordination metrics
    SIGNALS_BROADCAST_TOTAL: 'coordination_signals_broadcast_total',
    ACTIVE_SIGNALS: 'coordination_active_signals',
} as const;

/**
 * Standard span names used for tracing.
 */
export const SpanNames = {
    CYCLE_RUN: 'cycle.run',
    CONTEXT_COLLECT: 'cycle.collect_context',
    AGENT_PROPOSE: 'agent.propose',
    ARBITRATION_RESOLVE: 'arbitration.resolve',
    SAFETY_VALIDATE: 'safety.validate',
    EXECUTION_APPLY: 'execution.apply',
    AGENT_NOTIFY: 'agent.notify',
} as const;
