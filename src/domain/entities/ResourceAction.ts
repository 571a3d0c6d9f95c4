/**
 * ResourceAction - A single desired change to one hardware resource.
 */

import { ActionType } from '../value-objects/ActionType.js';
import { ResourceValue, ResourceValues } from '../value-objects/ResourceValue.js';
import { ISystemContext } from './SystemContext.js';

export interface IResourceAction {
    readonly type: ActionType;
    /** Resource identifier, e.g. CPU_PL2 */
    readonly target: string;
    readonly value: ResourceValue;
    /** Free text; arbitration inspects it for the word "battery" */
    readonly reason: string;
    /** Snapshot the action was derived from */
    readonly context?: ISystemContext;
    /** Agent whose proposal carried the action, set when the proposal is accepted */
    readonly sourceAgent?: string;
}

export function createAction(
    type: ActionType,
    target: string,
    value: ResourceValue,
    reason: string,
    context?: ISystemContext
): IResourceAction {
    return { type, target, value, reason, context };
}

export function attributeAction(action: IResourceAction, agentName: string): IResourceAction {
    return { ...action, sourceAgent: agentName };
}

export function describeAction(action: IResourceAction): string {
    return `${action.target}=${ResourceValues.describe(action.value)} (${action.type})`;
}
