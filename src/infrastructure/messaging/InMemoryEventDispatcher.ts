import { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import { IEventDispatcher, IEventHandler } from '../../application/ports/IEventDispatcher.js';
import { ILogger, NullLogger } from '../observability/Logger.js';
import { toError } from '../../shared/errors/ErrorNormalizer.js';

/**
 * Dispatches events to handlers subscribed under the event's class name.
 * A failing handler is logged and does not stop the remaining handlers.
 */
export class InMemoryEventDispatcher implements IEventDispatcher {
    private handlers: Map<string, IEventHandler<IDomainEvent>[]> = new Map();

    constructor(private readonly logger: ILogger = new NullLogger()) {}

    async dispatch(event: IDomainEvent): Promise<void> {
        const eventName = event.constructor.name;
        const eventHandlers = this.handlers.get(eventName) ?? [];

        for (const handler of eventHandlers) {
            try {
                await handler.handle(event);
            } catch (error) {
                this.logger.error('Event handler failed', toError(error), {
                    eventType: eventName,
                    aggregateId: event.getAggregateId(),
                });
            }
        }
    }

    subscribe<T extends IDomainEvent>(eventName: string, handler: IEventHandler<T>): void {
        const currentHandlers = this.handlers.get(eventName) ?? [];
        currentHandlers.push(handler);
        this.handlers.set(eventName, currentHandlers);
    }

    getSubscriberCount(): number {
        let count = 0;
        this.handlers.forEach(handlers => count += handlers.length);
        return count;
    }
}
