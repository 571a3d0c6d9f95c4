import { randomUUID } from 'crypto';

/**
 * IdGenerator - Unique identifiers for cycles, plans, spans and events.
 */
export class IdGenerator {
    static generate(): string {
        return randomUUID();
    }
}
