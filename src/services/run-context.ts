/**
 * Run-scoped resources shared by adapters and enrichers
 * Nothing here outlives a single run
 */
import { v4 as uuidv4 } from 'uuid';
import type { Config } from '../config/index.js';
import type { ProviderSchemaError } from '../fetchers/errors.js';
import type { FetchContext } from '../fetchers/types.js';
import type { Logger } from '../observability/logger.js';
import { ProviderClient } from './provider-client.js';
import { RequestThrottle } from './rate-limiter.js';
import { CircuitBreakerRegistry } from './resilience.js';

// Services that are called on behalf of another provider
const SERVICE_PROVIDERS: Readonly<Record<string, string>> = {
    twitch: 'igdb',
    coverartarchive: 'musicbrainz',
};

export interface RunContextOptions {
    runId?: string;
    throttle?: RequestThrottle;
    sleep?: (ms: number) => Promise<void>;
}

export class RunContext {
    readonly runId: string;
    readonly logger: Logger;
    readonly breakers: CircuitBreakerRegistry;
    private readonly throttle: RequestThrottle;
    private readonly clients: Map<string, ProviderClient> = new Map();

    constructor(
        readonly config: Config,
        baseLogger: Logger,
        private readonly options: RunContextOptions = {}
    ) {
        this.runId = options.runId ?? uuidv4();
        this.logger = baseLogger.child({ runId: this.runId });
        this.throttle = options.throttle ?? new RequestThrottle();
        this.breakers = new CircuitBreakerRegistry(config.circuitBreaker);
    }

    /**
     * Get or create the client for an external service
     */
    client(service: string): ProviderClient {
        let client = this.clients.get(service);

        if (!client) {
            client = new ProviderClient({
                service,
                provider: SERVICE_PROVIDERS[service] ?? service,
                userAgent: this.config.userAgent,
                timeoutMs: this.config.requestTimeoutMs,
                retry: { ...this.config.retry, sleep: this.options.sleep },
                throttle: this.throttle,
                breaker: this.breakers.get(service),
                logger: this.logger.child({ provider: service }),
            });
            this.clients.set(service, client);
        }

        return client;
    }

    /**
     * Context handed to one adapter invocation
     */
    fetchContext(logger: Logger, onSchemaError: (error: ProviderSchemaError) => void): FetchContext {
        return {
            credentials: this.config.credentials,
            filters: this.config.filters,
            logger,
            client: service => this.client(service),
            reportSchemaError: onSchemaError,
        };
    }
}
