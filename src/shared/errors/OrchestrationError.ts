/**
 * OrchestrationError - Base error class for the orchestration core.
 *
 * Provides consistent error structure with code, severity, and optional details.
 */

import { ErrorCode, ErrorSeverity, ERROR_CODE_TO_SEVERITY } from './ErrorCodes.js';

/**
 * Serializable error shape used in logs and cycle diagnostics.
 */
export interface OrchestrationErrorInfo {
    code: string;
    message: string;
    details?: unknown;
}

/**
 * Orchestration error with standardized structure.
 */
export class OrchestrationError extends Error {
    readonly code: ErrorCode;
    readonly severity: ErrorSeverity;
    readonly details?: unknown;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'OrchestrationError';
        this.code = code;
        this.severity = ERROR_CODE_TO_SEVERITY[code] ?? 'error';
        this.details = details;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, OrchestrationError.prototype);
    }

    toInfo(): OrchestrationErrorInfo {
        return {
            code: this.code,
            message: this.message,
            details: this.details,
        };
    }

    static agentTimeout(agentName: string, timeoutMs: number): OrchestrationError {
        return new OrchestrationError(
            'AGENT_TIMEOUT',
            `Agent ${agentName} did not propose within ${timeoutMs}ms`,
            { agentName, timeoutMs }
        );
    }

    static agentFailure(agentName: string, cause: string): OrchestrationError {
        return new OrchestrationError('AGENT_FAILURE', `Agent ${agentName} failed: ${cause}`, { agentName });
    }

    static contextUnavailable(cause: string): OrchestrationError {
        return new OrchestrationError('CONTEXT_UNAVAILABLE', `System context unavailable: ${cause}`);
    }

    static safetyViolation(message: string, details?: unknown): OrchestrationError {
        return new OrchestrationError('SAFETY_VIOLATION', message, details);
    }

    static actionRejected(target: string, reason: string): OrchestrationError {
        return new OrchestrationError('ACTION_REJECTED', `${target}: ${reason}`, { target });
    }

    static handlerNotFound(target: string): OrchestrationError {
        return new OrchestrationError('HANDLER_NOT_FOUND', `No handler registered for ${target}`, { target });
    }

    static executionFailed(target: string, cause: string): OrchestrationError {
        return new OrchestrationError('EXECUTION_FAILED', `${target}: ${cause}`, { target });
    }

    static circuitOpen(handler: string): OrchestrationError {
        return new OrchestrationError('CIRCUIT_OPEN', `Handler ${handler} is temporarily unavailable`);
    }

    static internal(message = 'Unexpected orchestration error'): OrchestrationError {
        return new OrchestrationError('INTERNAL_ERROR', message);
    }
}
