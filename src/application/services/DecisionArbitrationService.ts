/**
 * DecisionArbitrationService - Merges agent proposals into one plan.
 *
 * At most one action survives per target. Conflicts are settled by a fixed
 * cascade, evaluated in order:
 * 1. Emergency actions override everything
 * 2. Critical actions whose reason mentions the battery
 * 3. Performance-seeking user intent picks the highest performance score
 * 4. Efficiency-seeking user intent picks the lowest power score
 * 5. Otherwise the most urgent action type
 *
 * Ties always go to the earliest candidate (proposal order, then action
 * order within the proposal). The service holds no state between calls.
 */

import { IObservabilityContext, MetricNames } from '../ports/IObservabilityContext.js';
import { IAgentProposal } from '../../domain/entities/AgentProposal.js';
import { IResourceAction } from '../../domain/entities/ResourceAction.js';
import { IConflict, IExecutionPlan, ResolutionStrategy } from '../../domain/entities/ExecutionPlan.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import { ACTION_TYPE_ORDINAL } from '../../domain/value-objects/ActionType.js';
import { EFFICIENCY_INTENTS, PERFORMANCE_INTENTS } from '../../domain/value-objects/HardwareStates.js';
import { performanceScore, powerScore } from '../../domain/services/ActionScoring.js';

/**
 * An action together with the agent that proposed it.
 */
interface Candidate {
    action: IResourceAction;
    agentName: string;
}

interface Resolution {
    winner: Candidate;
    strategy: ResolutionStrategy;
}

/**
 * Index of the first candidate with the best key. `better(a, b)` is true when
 * a strictly beats b, so equal keys keep the earlier candidate.
 */
function pickBest(candidates: readonly Candidate[], key: (c: Candidate) => number, better: (a: number, b: number) => boolean): Candidate {
    let best = candidates[0];
    let bestKey = key(best);
    for (const candidate of candidates.slice(1)) {
        const candidateKey = key(candidate);
        if (better(candidateKey, bestKey)) {
            best = candidate;
            bestKey = candidateKey;
        }
    }
    return best;
}

export class DecisionArbitrationService {
    constructor(
        private readonly observability?: IObservabilityContext,
        private readonly clock: () => Date = () => new Date()
    ) {}

    /**
     * Resolve all proposals into an execution plan.
     */
    resolve(proposals: readonly IAgentProposal[], context: ISystemContext): IExecutionPlan {
        const candidates: Candidate[] = proposals.flatMap(p =>
            p.actions.map(action => ({ action, agentName: p.agentName }))
        );

        // Map preserves insertion order, which gives first-seen target order.
        const groups = new Map<string, Candidate[]>();
        for (const candidate of candidates) {
            const group = groups.get(candidate.action.target);
            if (group) {
                group.push(candidate);
            } else {
                groups.set(candidate.action.target, [candidate]);
            }
        }

        const actions: IResourceAction[] = [];
        const conflicts: IConflict[] = [];

        for (const [target, group] of groups) {
            if (group.length === 1) {
                actions.push(group[0].action);
                continue;
            }

            const { winner, strategy } = this.resolveGroup(group, context);
            const losers = group.filter(c => c !== winner);
            actions.push(winner.action);
            conflicts.push({
                target,
                winner: winner.action,
                losers: losers.map(c => c.action),
                strategy,
                winnerAgent: winner.agentName,
                loserAgents: losers.map(c => c.agentName),
            });

            this.observability?.logger.debug('Resolved conflict', {
                target,
                strategy,
                winnerAgent: winner.agentName,
                loserAgents: losers.map(c => c.agentName),
            });
        }

        const emergencyActions = actions.filter(a => a.type === 'emergency').length;

        this.observability?.metrics.incrementCounter(MetricNames.CONFLICTS_RESOLVED_TOTAL, conflicts.length);
        this.observability?.metrics.incrementCounter(MetricNames.EMERGENCY_ACTIONS_TOTAL, emergencyActions);

        return {
            createdAt: this.clock(),
            actions,
            conflicts,
            metrics: {
                totalProposals: proposals.length,
                proposedActions: candidates.length,
                totalActions: actions.length,
                conflictsResolved: conflicts.length,
                emergencyActions,
            },
        };
    }

    /**
     * Apply the priority cascade to a group of two or more candidates.
     */
    private resolveGroup(group: readonly Candidate[], context: ISystemContext): Resolution {
        const emergency = group.find(c => c.action.type === 'emergency');
        if (emergency) {
            return { winner: emergency, strategy: 'Emergency Override' };
        }

        const batteryCritical = group.find(
            c => c.action.type === 'critical' && c.action.reason.toLowerCase().includes('battery')
        );
        if (batteryCritical) {
            return { winner: batteryCritical, strategy: 'Critical Priority' };
        }

        if (PERFORMANCE_INTENTS.includes(context.userIntent)) {
            return {
                winner: pickBest(group, c => performanceScore(c.action), (a, b) => a > b),
                strategy: 'User Intent: Performance',
            };
        }

        if (EFFICIENCY_INTENTS.includes(context.userIntent)) {
            return {
                winner: pickBest(group, c => powerScore(c.action), (a, b) => a < b),
                strategy: 'User Intent: Efficiency',
            };
        }

        return {
            winner: pickBest(group, c => ACTION_TYPE_ORDINAL[c.action.type], (a, b) => a > b),
            strategy: 'Action Type Priority',
        };
    }
}
