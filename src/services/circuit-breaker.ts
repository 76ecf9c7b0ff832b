/**
 * Per-service circuit breaker
 *
 * CLOSED passes calls through; OPEN fails them fast with CircuitOpenError
 * until the reset timeout passes; HALF_OPEN lets a few trial calls decide
 * whether the service is back.
 */
import { logger } from '../observability/logger.js';
import { circuitState } from '../observability/metrics.js';
import { CircuitOpenError, isProviderError } from '../fetchers/errors.js';

export enum CircuitState {
    CLOSED = 0,
    OPEN = 1,
    HALF_OPEN = 2,
}

export interface CircuitBreakerConfig {
    service: string;               // e.g. 'musicbrainz', 'coverartarchive'
    failureThreshold: number;      // consecutive failures before opening
    resetTimeout: number;          // ms spent OPEN before a trial call
    halfOpenRequests: number;      // trial calls that must succeed to close
    // Errors for which this returns false count as a response from a live service
    isFailure?: (error: unknown) => boolean;
}

const DEFAULT_CONFIG: Omit<CircuitBreakerConfig, 'service'> = {
    failureThreshold: 5,
    resetTimeout: 30000,
    halfOpenRequests: 1,
};

function describeError(error: unknown): string {
    if (isProviderError(error)) return `${error.provider}: ${error.message}`;
    return error instanceof Error ? error.message : String(error);
}

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private consecutiveFailures = 0;
    private trialSuccesses = 0;
    private trialsStarted = 0;
    private openedAt = 0;
    private lastFailure: string | null = null;
    private readonly config: CircuitBreakerConfig;

    constructor(config: Partial<CircuitBreakerConfig> & { service: string }) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.updateMetrics();
    }

    /**
     * Run `fn` unless the circuit is open
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        this.refresh();

        if (this.state === CircuitState.OPEN) {
            throw new CircuitOpenError(this.config.service);
        }
        if (this.state === CircuitState.HALF_OPEN) {
            // Trial slots taken; wait for their outcome
            if (this.trialsStarted >= this.config.halfOpenRequests) {
                throw new CircuitOpenError(this.config.service);
            }
            this.trialsStarted++;
        }

        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (error) {
            if (this.config.isFailure === undefined || this.config.isFailure(error)) {
                this.recordFailure(error);
            } else {
                this.recordSuccess();
            }
            throw error;
        }
    }

    getState(): CircuitState {
        this.refresh();
        return this.state;
    }

    reset(): void {
        this.transitionTo(CircuitState.CLOSED);
    }

    // OPEN becomes HALF_OPEN once the reset timeout has passed
    private refresh(): void {
        if (this.state === CircuitState.OPEN && Date.now() - this.openedAt >= this.config.resetTimeout) {
            this.transitionTo(CircuitState.HALF_OPEN);
        }
    }

    private recordSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.trialSuccesses++;
            if (this.trialSuccesses >= this.config.halfOpenRequests) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            this.consecutiveFailures = 0;
        }
    }

    private recordFailure(error: unknown): void {
        this.consecutiveFailures++;
        this.lastFailure = describeError(error);

        if (this.state === CircuitState.HALF_OPEN
            || (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold)) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(next: CircuitState): void {
        const previous = this.state;
        this.state = next;
        this.trialSuccesses = 0;
        this.trialsStarted = 0;

        if (next === CircuitState.OPEN) {
            this.openedAt = Date.now();
            logger.warn('Circuit opened', {
                service: this.config.service,
                from: CircuitState[previous],
                consecutiveFailures: this.consecutiveFailures,
                lastFailure: this.lastFailure,
                retryInMs: this.config.resetTimeout,
            });
        } else {
            if (next === CircuitState.CLOSED) {
                this.consecutiveFailures = 0;
                this.lastFailure = null;
            }
            logger.info('Circuit state changed', {
                service: this.config.service,
                from: CircuitState[previous],
                to: CircuitState[next],
            });
        }

        this.updateMetrics();
    }

    private updateMetrics(): void {
        circuitState.labels(this.config.service).set(this.state);
    }
}

export { CircuitOpenError };
