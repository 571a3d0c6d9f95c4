import { ISystemContext } from '../../domain/entities/SystemContext.js';

/**
 * Produces the snapshot every agent reads in a cycle. A rejection skips the
 * cycle.
 */
export interface IContextCollector {
    collect(): Promise<ISystemContext>;
}
