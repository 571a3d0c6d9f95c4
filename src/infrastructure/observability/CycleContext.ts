/**
 * CycleContext - AsyncLocalStorage for cycle-scoped context.
 *
 * Every log line written while a cycle runs, including those from agents and
 * handlers awaited inside it, can be tied back to that cycle.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

/**
 * Context data stored per optimization cycle.
 */
export interface CycleContextData {
    cycleId: string;
    cycleNumber: number;
    startTime: Date;
    agentName?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<CycleContextData>();

function complete(context: Partial<CycleContextData>): CycleContextData {
    return {
        cycleId: context.cycleId ?? IdGenerator.generate(),
        cycleNumber: context.cycleNumber ?? 0,
        startTime: context.startTime ?? new Date(),
        agentName: context.agentName,
    };
}

export class CycleContext {
    /**
     * Run a function with a new cycle context.
     */
    static run<T>(context: Partial<CycleContextData>, fn: () => T): T {
        return asyncLocalStorage.run(complete(context), fn);
    }

    /**
     * Run an async function with a new cycle context.
     */
    static async runAsync<T>(context: Partial<CycleContextData>, fn: () => Promise<T>): Promise<T> {
        return asyncLocalStorage.run(complete(context), fn);
    }

    /**
     * Run an async function scoped to one agent inside the current cycle.
     */
    static async forAgent<T>(agentName: string, fn: () => Promise<T>): Promise<T> {
        const current = asyncLocalStorage.getStore();
        if (!current) {
            return fn();
        }
        return asyncLocalStorage.run({ ...current, agentName }, fn);
    }

    static get(): CycleContextData | undefined {
        return asyncLocalStorage.getStore();
    }

    static getCycleId(): string | undefined {
        return asyncLocalStorage.getStore()?.cycleId;
    }

    /**
     * Get the elapsed time since cycle start in milliseconds.
     */
    static getElapsedMs(): number {
        const ctx = asyncLocalStorage.getStore();
        if (!ctx) return 0;
        return Date.now() - ctx.startTime.getTime();
    }

    static hasContext(): boolean {
        return asyncLocalStorage.getStore() !== undefined;
    }
}
