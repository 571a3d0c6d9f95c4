/**
 * CircuitBreaker - Generic circuit breaker implementation.
 *
 * Fails fast on a handler family that keeps failing, so one broken control
 * path does not stall every cycle.
 */

import {
    CircuitBreakerConfig,
    CircuitState,
    CircuitBreakerStats,
    DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from './CircuitBreakerConfig.js';
import { OrchestrationError } from '../../shared/errors/OrchestrationError.js';
import { toError } from '../../shared/errors/ErrorNormalizer.js';

/**
 * Error thrown when circuit is open.
 */
export class CircuitOpenError extends OrchestrationError {
    constructor(public readonly serviceName: string) {
        super('CIRCUIT_OPEN', `Circuit breaker is open for handler: ${serviceName}`, { handler: serviceName });
        this.name = 'CircuitOpenError';
        Object.setPrototypeOf(this, CircuitOpenError.prototype);
    }
}

export class CircuitBreaker {
    private readonly config: CircuitBreakerConfig;
    private readonly now: () => number;
    private state: CircuitState = 'closed';
    private failures = 0;
    private successes = 0;
    private halfOpenRequests = 0;
    private lastFailureTime?: Date;
    private lastSuccessTime?: Date;
    private lastStateChangeTime: Date;
    private totalRequests = 0;
    private totalFailures = 0;
    private totalSuccesses = 0;

    constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
        this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
        this.now = this.config.now ?? Date.now;
        this.lastStateChangeTime = new Date(this.now());
    }

    get name(): string {
        return this.config.name;
    }

    getState(): CircuitState {
        this.checkStateTransition();
        return this.state;
    }

    getStats(): CircuitBreakerStats {
        return {
            name: this.config.name,
            state: this.getState(),
            failures: this.failures,
            successes: this.successes,
            lastFailureTime: this.lastFailureTime,
            lastSuccessTime: this.lastSuccessTime,
            lastStateChangeTime: this.lastStateChangeTime,
            totalRequests: this.totalRequests,
            totalFailures: this.totalFailures,
            totalSuccesses: this.totalSuccesses,
        };
    }

    /**
     * Execute a function through the circuit breaker.
     *
     * @throws CircuitOpenError without calling `fn` while the circuit is open
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        this.checkStateTransition();
        this.totalRequests++;

        if (!this.canExecute()) {
            throw new CircuitOpenError(this.config.name);
        }

        if (this.state === 'half_open') {
            this.halfOpenRequests++;
        }

        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (error) {
            this.recordFailure(toError(error));
            throw error;
        }
    }

    canExecute(): boolean {
        this.checkStateTransition();

        switch (this.state) {
            case 'closed':
                return true;
            case 'open':
                return false;
            case 'half_open':
                return this.halfOpenRequests < this.config.halfOpenRequestLimit;
        }
    }

    private recordSuccess(): void {
        this.lastSuccessTime = new Date(this.now());
        this.totalSuccesses++;
        this.successes++;

        if (this.state === 'half_open') {
            if (this.successes >= this.config.halfOpenSuccessThreshold) {
                this.transitionTo('closed');
            }
        } else if (this.state === 'closed') {
            this.failures = 0;
        }
    }

    private recordFailure(error: Error): void {
        this.lastFailureTime = new Date(this.now());
        this.totalFailures++;

        const shouldTrip = this.config.shouldTrip?.(error) ?? true;
        if (!shouldTrip) {
            return;
        }

        this.failures++;

        if (this.state === 'half_open') {
            this.transitionTo('open');
        } else if (this.state === 'closed' && this.failures >= this.config.failureThreshold) {
            this.transitionTo('open');
        }
    }

    private checkStateTransition(): void {
        if (this.state === 'open') {
            const timeSinceOpen = this.now() - this.lastStateChangeTime.getTime();
            if (timeSinceOpen >= this.config.recoveryTimeoutMs) {
                this.transitionTo('half_open');
            }
        }
    }

    private transitionTo(newState: CircuitState): void {
        if (this.state === newState) return;

        const oldState = this.state;
        this.state = newState;
        this.lastStateChangeTime = new Date(this.now());

        switch (newState) {
            case 'closed':
                this.failures = 0;
                this.successes = 0;
                break;
            case 'open':
                this.successes = 0;
                this.halfOpenRequests = 0;
                break;
            case 'half_open':
                this.successes = 0;
                this.failures = 0;
                this.halfOpenRequests = 0;
                break;
        }

        this.config.onStateChange?.(oldState, newState);
    }

    forceOpen(): void {
        this.transitionTo('open');
    }

    forceClose(): void {
        this.transitionTo('closed');
    }
}

/**
 * Circuit breaker registry, one breaker per name.
 */
export class CircuitBreakerRegistry {
    private breakers: Map<string, CircuitBreaker> = new Map();

    constructor(private readonly defaults: Partial<Omit<CircuitBreakerConfig, 'name'>> = {}) {}

    getOrCreate(name: string): CircuitBreaker {
        let breaker = this.breakers.get(name);
        if (!breaker) {
            breaker = new CircuitBreaker({ ...this.defaults, name });
            this.breakers.set(name, breaker);
        }
        return breaker;
    }

    get(name: string): CircuitBreaker | undefined {
        return this.breakers.get(name);
    }

    getAllStats(): CircuitBreakerStats[] {
        return Array.from(this.breakers.values()).map(b => b.getStats());
    }
}
