/**
 * IOptimizationAgent - Contract every optimization agent implements.
 *
 * An agent reads the shared snapshot, proposes resource actions, and is told
 * what happened afterwards. The set of agents is fixed at composition time;
 * optional behaviour is expressed through `requiredCapabilities`, not through
 * extra interfaces.
 */

import { ISystemContext } from '../entities/SystemContext.js';
import { AgentPriority, IAgentProposal } from '../entities/AgentProposal.js';
import { IExecutionResult } from '../entities/ExecutionResult.js';
import { HardwareCapability } from '../value-objects/HardwareCapability.js';

export interface IOptimizationAgent {
    readonly agentName: string;
    readonly priority: AgentPriority;

    /**
     * Capabilities the agent needs; it is skipped for the cycle when any is
     * unavailable on this machine.
     */
    readonly requiredCapabilities?: readonly HardwareCapability[];

    /**
     * Propose actions for this cycle. Should resolve to an empty proposal
     * rather than reject when nothing can be done.
     */
    propose(context: ISystemContext): Promise<IAgentProposal>;

    /**
     * Receive the outcome of the cycle's plan.
     */
    onExecuted(result: IExecutionResult): Promise<void>;
}
