/**
 * CoordinationActionHandler - Turns COORDINATE_* actions into bus signals.
 *
 * These targets touch no hardware. Executing one posts a signal, under the
 * proposing agent's name, that every other agent will see next cycle; there
 * is nothing to roll back.
 */

import { IActionHandler } from '../../application/ports/IActionHandler.js';
import { AgentCoordinationService } from '../../application/services/AgentCoordinationService.js';
import { IResourceAction } from '../../domain/entities/ResourceAction.js';
import { CoordinationSignalType, CoordinationSignals } from '../../domain/entities/CoordinationSignal.js';
import { ResourceTargets } from '../../domain/value-objects/ResourceTargets.js';
import { ResourceValues } from '../../domain/value-objects/ResourceValue.js';
import { OrchestrationError } from '../../shared/errors/OrchestrationError.js';
import { ILogger, NullLogger } from '../observability/Logger.js';

const SIGNAL_FOR_TARGET: Readonly<Record<string, CoordinationSignalType>> = {
    [ResourceTargets.COORDINATE_EMERGENCY_MODE]: 'emergency',
    [ResourceTargets.COORDINATE_LOW_BATTERY_MODE]: 'battery_critical',
    [ResourceTargets.COORDINATE_HIGH_POWER_CONSUMPTION]: 'high_power_consumption',
    [ResourceTargets.SYSTEM_HIBERNATE_WARNING]: 'battery_critical',
};

export class CoordinationActionHandler implements IActionHandler {
    readonly name = 'coordination';
    readonly supportedTargets: readonly string[] = Object.keys(SIGNAL_FOR_TARGET);

    constructor(
        private readonly coordination: AgentCoordinationService,
        private readonly logger: ILogger = new NullLogger(),
        private readonly clock: () => Date = () => new Date()
    ) {}

    async execute(action: IResourceAction): Promise<void> {
        const type = SIGNAL_FOR_TARGET[action.target];
        if (type === undefined) {
            throw OrchestrationError.actionRejected(action.target, 'not a coordination target');
        }

        const source = action.sourceAgent ?? this.name;
        this.coordination.broadcast(CoordinationSignals.create(type, source, this.clock(), {
            context: action.context,
            data: {
                target: action.target,
                reason: action.reason,
                value: ResourceValues.describe(action.value),
                hibernateWarning: action.target === ResourceTargets.SYSTEM_HIBERNATE_WARNING,
            },
        }));
        this.logger.debug('Coordination signal raised', { target: action.target, signalType: type, source });
    }

    async rollback(_action: IResourceAction): Promise<void> {}
}
