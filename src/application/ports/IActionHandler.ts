/**
 * IActionHandler - Applies actions to one family of hardware resources.
 */

import { IResourceAction } from '../../domain/entities/ResourceAction.js';

export interface IActionHandler {
    /** Name used for logging and the handler's circuit breaker */
    readonly name: string;
    /** Targets this handler applies, matched exactly */
    readonly supportedTargets: readonly string[];

    /**
     * Apply the action. Rejects when the hardware refused the change.
     */
    execute(action: IResourceAction): Promise<void>;

    /**
     * Restore whatever the resource held before `execute`.
     */
    rollback(action: IResourceAction): Promise<void>;
}
