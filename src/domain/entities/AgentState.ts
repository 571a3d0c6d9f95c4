/**
 * AgentState - Last-reported bookkeeping for one agent, held by the bus.
 */

export interface IAgentState {
    readonly agentName: string;
    /** Set by the bus on every update */
    readonly lastUpdate: Date;
    readonly actionsProposed: number;
    readonly actionsExecuted: number;
    /** 0 to 1 */
    readonly successRate: number;
    readonly stateData: Readonly<Record<string, unknown>>;
}

/**
 * Fields an agent or the driver reports; lastUpdate is stamped on write.
 */
export type AgentStateUpdate = Omit<IAgentState, 'lastUpdate' | 'agentName'>;

export const AgentStates = {
    initial(): AgentStateUpdate {
        return { actionsProposed: 0, actionsExecuted: 0, successRate: 0, stateData: {} };
    },

    /**
     * Fold one cycle's outcome into the running totals.
     */
    record(previous: AgentStateUpdate | undefined, proposed: number, executed: number): AgentStateUpdate {
        const base = previous ?? AgentStates.initial();
        const actionsProposed = base.actionsProposed + proposed;
        const actionsExecuted = base.actionsExecuted + executed;
        return {
            actionsProposed,
            actionsExecuted,
            successRate: actionsProposed === 0 ? 0 : actionsExecuted / actionsProposed,
            stateData: base.stateData,
        };
    },
};
