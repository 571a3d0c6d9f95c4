/**
 * CircuitBreakerConfig - Circuit breaker configuration types.
 */

import { OrchestrationError } from '../../shared/errors/OrchestrationError.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
    /** Name of the handler family being protected */
    name: string;

    /** Number of consecutive failures before opening the circuit */
    failureThreshold: number;

    /** Time in ms to wait before transitioning from open to half-open */
    recoveryTimeoutMs: number;

    /** Number of successful calls in half-open state before closing */
    halfOpenSuccessThreshold: number;

    /** Number of calls to allow in half-open state */
    halfOpenRequestLimit: number;

    /** Function to determine if an error should trip the breaker */
    shouldTrip?: (error: Error) => boolean;

    /** Function to call when state changes */
    onStateChange?: (from: CircuitState, to: CircuitState) => void;

    /** Clock in epoch milliseconds */
    now?: () => number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
    failureThreshold: 5,
    recoveryTimeoutMs: 30000,
    halfOpenSuccessThreshold: 2,
    halfOpenRequestLimit: 2,
    shouldTrip: () => true,
};

export interface CircuitBreakerStats {
    name: string;
    state: CircuitState;
    failures: number;
    successes: number;
    lastFailureTime?: Date;
    lastSuccessTime?: Date;
    lastStateChangeTime?: Date;
    totalRequests: number;
    totalFailures: number;
    totalSuccesses: number;
}

/**
 * Breaker settings for hardware action handlers.
 *
 * A handler refusing a value it considers invalid is not a hardware fault
 * and does not count towards opening the circuit.
 */
export const HANDLER_CIRCUIT_BREAKER_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
    failureThreshold: 3,
    recoveryTimeoutMs: 30000,
    halfOpenSuccessThreshold: 1,
    halfOpenRequestLimit: 1,
    shouldTrip: (error: Error) =>
        !(error instanceof OrchestrationError && (error.code === 'ACTION_REJECTED' || error.code === 'VALIDATION_ERROR')),
};
