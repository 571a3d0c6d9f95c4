/**
 * ErrorNormalizer - Convert anything thrown into an OrchestrationError.
 */

import { OrchestrationError } from './OrchestrationError.js';

/**
 * Normalize any error to an OrchestrationError.
 */
export function normalizeError(error: unknown): OrchestrationError {
    if (error instanceof OrchestrationError) {
        return error;
    }

    if (error instanceof Error) {
        return OrchestrationError.internal(error.message);
    }

    if (typeof error === 'string') {
        return OrchestrationError.internal(error);
    }

    return OrchestrationError.internal();
}

/**
 * Message of anything thrown, for log lines and result diagnostics.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Narrow anything thrown to an Error so it can be handed to ILogger.error.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
