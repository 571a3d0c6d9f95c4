/**
 * CoordinationSignal - Cross-agent notice posted on the coordination bus.
 */

import { ISystemContext } from './SystemContext.js';

export type CoordinationSignalType =
    | 'emergency'
    | 'battery_critical'
    | 'thermal_throttling'
    | 'high_power_consumption'
    | 'user_override'
    | 'workload_change'
    | 'normal';

export interface ICoordinationSignal {
    readonly type: CoordinationSignalType;
    readonly sourceAgent: string;
    /** Absent or empty means broadcast to every agent */
    readonly targetAgents?: readonly string[];
    readonly timestamp: Date;
    readonly context?: ISystemContext;
    readonly data: Readonly<Record<string, unknown>>;
}

export const CoordinationSignals = {
    create(
        type: CoordinationSignalType,
        sourceAgent: string,
        timestamp: Date,
        options: { targetAgents?: readonly string[]; context?: ISystemContext; data?: Record<string, unknown> } = {}
    ): ICoordinationSignal {
        return {
            type,
            sourceAgent,
            targetAgents: options.targetAgents,
            timestamp,
            context: options.context,
            data: options.data ?? {},
        };
    },

    isAddressedTo(signal: ICoordinationSignal, agentName: string): boolean {
        if (!signal.targetAgents || signal.targetAgents.length === 0) {
            return true;
        }
        return signal.targetAgents.includes(agentName);
    },
};
