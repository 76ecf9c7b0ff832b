/**
 * Resilience utilities - one circuit breaker per external service, per run
 */
import { CircuitBreaker, CircuitState, type CircuitBreakerConfig } from './circuit-breaker.js';
import type { CircuitBreakerSettings } from '../config/index.js';
import { isProviderError } from '../fetchers/errors.js';
import { logger } from '../observability/logger.js';

/**
 * Only failures that say "the service is unhealthy" trip a breaker;
 * auth, schema and 4xx errors mean the service answered
 */
export function isServiceFailure(error: unknown): boolean {
    if (isProviderError(error)) {
        return error.retryable;
    }
    return true;
}

export type CircuitStateName = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

const STATE_NAMES: Record<CircuitState, CircuitStateName> = {
    [CircuitState.CLOSED]: 'CLOSED',
    [CircuitState.OPEN]: 'OPEN',
    [CircuitState.HALF_OPEN]: 'HALF_OPEN',
};

export class CircuitBreakerRegistry {
    private readonly circuitBreakers: Map<string, CircuitBreaker> = new Map();

    constructor(private readonly settings: CircuitBreakerSettings) { }

    /**
     * Get or create a circuit breaker for a dependency
     */
    get(name: string): CircuitBreaker {
        let cb = this.circuitBreakers.get(name);

        if (!cb) {
            const cbConfig: CircuitBreakerConfig = {
                service: name,
                ...this.settings,
                isFailure: isServiceFailure,
            };
            cb = new CircuitBreaker(cbConfig);
            this.circuitBreakers.set(name, cb);
            logger.debug(`Circuit breaker created: ${name}`, { ...this.settings });
        }

        return cb;
    }

    /**
     * Get all circuit breaker states for the run summary
     */
    getAllStates(): Record<string, CircuitStateName> {
        const states: Record<string, CircuitStateName> = {};

        for (const [name, cb] of this.circuitBreakers) {
            states[name] = STATE_NAMES[cb.getState()];
        }

        return states;
    }

    /**
     * Check if any circuit breaker is open
     */
    hasOpenCircuit(): boolean {
        for (const cb of this.circuitBreakers.values()) {
            if (cb.getState() === CircuitState.OPEN) {
                return true;
            }
        }
        return false;
    }
}
