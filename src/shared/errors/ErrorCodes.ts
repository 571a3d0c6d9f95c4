/**
 * ErrorCodes - Error code constants for the orchestration core.
 *
 * Every failure inside a cycle is mapped to one of these codes before it is
 * logged, so diagnostics can group failures without parsing messages.
 */

/**
 * Agent error codes.
 */
export const AGENT_TIMEOUT = 'AGENT_TIMEOUT';
export const AGENT_FAILURE = 'AGENT_FAILURE';

/**
 * Cycle error codes.
 */
export const CONTEXT_UNAVAILABLE = 'CONTEXT_UNAVAILABLE';
export const SAFETY_VIOLATION = 'SAFETY_VIOLATION';

/**
 * Execution error codes.
 */
export const ACTION_REJECTED = 'ACTION_REJECTED';
export const HANDLER_NOT_FOUND = 'HANDLER_NOT_FOUND';
export const EXECUTION_FAILED = 'EXECUTION_FAILED';
export const CIRCUIT_OPEN = 'CIRCUIT_OPEN';

/**
 * Configuration and generic error codes.
 */
export const VALIDATION_ERROR = 'VALIDATION_ERROR';
export const INTERNAL_ERROR = 'INTERNAL_ERROR';

/**
 * Error code type for type safety.
 */
export type ErrorCode =
    | typeof AGENT_TIMEOUT
    | typeof AGENT_FAILURE
    | typeof CONTEXT_UNAVAILABLE
    | typeof SAFETY_VIOLATION
    | typeof ACTION_REJECTED
    | typeof HANDLER_NOT_FOUND
    | typeof EXECUTION_FAILED
    | typeof CIRCUIT_OPEN
    | typeof VALIDATION_ERROR
    | typeof INTERNAL_ERROR;

export type ErrorSeverity = 'warn' | 'error';

/**
 * Map error codes to the log level they are reported at.
 * Degraded-but-expected conditions are warnings.
 */
export const ERROR_CODE_TO_SEVERITY: Record<ErrorCode, ErrorSeverity> = {
    [AGENT_TIMEOUT]: 'warn',
    [AGENT_FAILURE]: 'warn',
    [CONTEXT_UNAVAILABLE]: 'warn',
    [SAFETY_VIOLATION]: 'warn',
    [ACTION_REJECTED]: 'warn',
    [HANDLER_NOT_FOUND]: 'warn',
    [EXECUTION_FAILED]: 'error',
    [CIRCUIT_OPEN]: 'warn',
    [VALIDATION_ERROR]: 'error',
    [INTERNAL_ERROR]: 'error',
};
