/**
 * AgentCoordinationService - Shared bus for cross-agent signals and state.
 *
 * Responsibilities:
 * - Store coordination signals and expire them after the retention period
 * - Deliver each agent the signals addressed to it
 * - Hold the latest bookkeeping state per agent
 * - Derive the system-wide coordination mode and priority weights
 *
 * The bus owns all signal and state storage. Every operation completes
 * synchronously, so no other caller can interleave with it on the event loop.
 */

import { IObservabilityContext, MetricNames } from '../ports/IObservabilityContext.js';
import { CoordinationSignals, ICoordinationSignal } from '../../domain/entities/CoordinationSignal.js';
import { AgentStateUpdate, IAgentState } from '../../domain/entities/AgentState.js';
import { ISystemContext } from '../../domain/entities/SystemContext.js';
import {
    CoordinationMode,
    IOptimizationPriority,
    MODE_PRIORITIES,
} from '../../domain/value-objects/OptimizationPriority.js';

export interface CoordinationSettings {
    /** Signals older than this are dropped */
    signalRetentionMs: number;
    /** Window for mode derivation and emergency detection */
    recentWindowMs: number;
    /** Distinct agents that must signal an emergency for isEmergency() */
    emergencyCorroboration: number;
}

export const DEFAULT_COORDINATION_SETTINGS: CoordinationSettings = {
    signalRetentionMs: 5 * 60 * 1000,
    recentWindowMs: 2 * 60 * 1000,
    emergencyCorroboration: 2,
};

const LOW_BATTERY_PERCENT = 20;

export class AgentCoordinationService {
    private signals: ICoordinationSignal[] = [];
    private states: Map<string, IAgentState> = new Map();
    private readonly settings: CoordinationSettings;

    constructor(
        settings: Partial<CoordinationSettings> = {},
        private readonly observability?: IObservabilityContext,
        private readonly clock: () => Date = () => new Date()
    ) {
        this.settings = { ...DEFAULT_COORDINATION_SETTINGS, ...settings };
    }

    /**
     * Post a signal, then drop every signal past retention.
     */
    broadcast(signal: ICoordinationSignal): void {
        this.signals.push(signal);
        const now = this.clock().getTime();
        this.signals = this.signals.filter(s => !this.isExpired(s, now));

        this.observability?.metrics.incrementCounter(MetricNames.SIGNALS_BROADCAST_TOTAL, 1, { type: signal.type });
        this.observability?.metrics.setGauge(MetricNames.ACTIVE_SIGNALS, this.signals.length);
        this.observability?.logger.debug('Coordination signal broadcast', {
            signalType: signal.type,
            sourceAgent: signal.sourceAgent,
            targetAgents: signal.targetAgents,
        });
    }

    /**
     * Unexpired signals addressed to the agent, excluding its own.
     */
    activeSignalsFor(agentName: string): ICoordinationSignal[] {
        const now = this.clock().getTime();
        return this.signals.filter(s =>
            !this.isExpired(s, now) &&
            s.sourceAgent !== agentName &&
            CoordinationSignals.isAddressedTo(s, agentName)
        );
    }

    /**
     * Replace the agent's state; lastUpdate is set to the bus clock.
     */
    updateState(agentName: string, state: AgentStateUpdate): void {
        this.states.set(agentName, {
            ...state,
            agentName,
            lastUpdate: this.clock(),
        });
    }

    stateOf(agentName: string): IAgentState | undefined {
        return this.states.get(agentName);
    }

    allStates(): IAgentState[] {
        return Array.from(this.states.values());
    }

    /**
     * True when enough distinct agents raised an emergency recently.
     * Repeated signals from one agent count once.
     */
    isEmergency(): boolean {
        const sources = new Set(
            this.recentSignals()
                .filter(s => s.type === 'emergency')
                .map(s => s.sourceAgent)
        );
        return sources.size >= this.settings.emergencyCorroboration;
    }

    currentMode(): CoordinationMode {
        const recent = this.recentSignals();
        const has = (type: ICoordinationSignal['type']): boolean => recent.some(s => s.type === type);

        if (has('emergency')) return 'emergency';
        if (has('battery_critical')) return 'battery_saving';
        if (has('high_power_consumption')) return 'power_optimization';
        if (has('thermal_throttling')) return 'thermal_management';
        return 'normal';
    }

    /**
     * Priority weights for the current mode. A low battery forces the
     * battery-saving weights unless an emergency is in progress.
     */
    globalPriority(context: ISystemContext): IOptimizationPriority {
        const mode = this.currentMode();

        if (mode === 'emergency') {
            return MODE_PRIORITIES.emergency;
        }
        if (mode === 'battery_saving' || context.battery.chargePercent < LOW_BATTERY_PERCENT) {
            return MODE_PRIORITIES.battery_saving;
        }
        return MODE_PRIORITIES[mode];
    }

    /**
     * Number of signals currently held, expired ones included until the
     * next broadcast evicts them.
     */
    get signalCount(): number {
        return this.signals.length;
    }

    clear(): void {
        this.signals = [];
        this.states.clear();
    }

    private recentSignals(): ICoordinationSignal[] {
        const now = this.clock().getTime();
        return this.signals.filter(s => now - s.timestamp.getTime() < this.settings.recentWindowMs);
    }

    private isExpired(signal: ICoordinationSignal, now: number): boolean {
        return now - signal.timestamp.getTime() > this.settings.signalRetentionMs;
    }
}
