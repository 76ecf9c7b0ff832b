/**
 * HTTP+JSON client shared by all source adapters
 *
 * One instance per external service per run. Each request is throttled,
 * guarded by the service's circuit breaker, bounded by a timeout and retried
 * according to the run's retry policy. HTTP failures are mapped onto the
 * provider error taxonomy.
 */
import type { z } from 'zod';
import {
    ProviderAuthError,
    ProviderRateLimitError,
    ProviderRequestError,
    ProviderSchemaError,
    ProviderTransientError,
    isProviderError,
} from '../fetchers/errors.js';
import type { Logger } from '../observability/logger.js';
import { rateLimitHits } from '../observability/metrics.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import type { RequestThrottle } from './rate-limiter.js';
import { withRetry, type RetryPolicy } from './retry.js';

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
    method?: 'GET' | 'POST';
    query?: Record<string, QueryValue>;
    headers?: Record<string, string>;
    body?: string;
}

export interface ProviderClientOptions {
    service: string;          // throttle and circuit key, e.g. 'coverartarchive'
    provider: string;         // error attribution, e.g. 'musicbrainz'
    userAgent: string;
    timeoutMs: number;
    retry: RetryPolicy;
    throttle: RequestThrottle;
    breaker: CircuitBreaker;
    logger: Logger;
    defaultQuery?: Record<string, string>;
    defaultHeaders?: Record<string, string>;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into ms
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) {
        return Math.round(seconds * 1000);
    }

    const date = Date.parse(header);
    if (Number.isNaN(date)) return null;
    return Math.max(0, date - now);
}

/**
 * Map a non-2xx response to the matching provider error
 */
export function classifyResponse(provider: string, response: Response): Error {
    const { status } = response;
    const message = `${provider} responded with HTTP ${status}`;

    if (status === 401 || status === 403) {
        return new ProviderAuthError(provider, message, { status });
    }
    if (status === 429 || status === 503) {
        return new ProviderRateLimitError(provider, message, {
            status,
            retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        });
    }
    if (status >= 500) {
        return new ProviderTransientError(provider, message, { status });
    }
    return new ProviderRequestError(provider, message, { status });
}

/**
 * Validate a payload against a provider schema
 */
export function parsePayload<T>(
    provider: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload: unknown,
    what: string
): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ProviderSchemaError(provider, `Unexpected ${what} shape from ${provider}`, issues);
    }
    return result.data;
}

export class ProviderClient {
    readonly service: string;
    readonly provider: string;

    constructor(private readonly options: ProviderClientOptions) {
        this.service = options.service;
        this.provider = options.provider;
    }

    buildUrl(url: string, query?: Record<string, QueryValue>): string {
        const target = new URL(url);
        const params = { ...this.options.defaultQuery, ...query };
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) {
                target.searchParams.set(key, String(value));
            }
        }
        return target.toString();
    }

    /**
     * Perform a request and return the decoded JSON body
     */
    async requestJson(url: string, options: RequestOptions = {}): Promise<unknown> {
        const target = this.buildUrl(url, options.query);

        return withRetry(
            this.service,
            () => this.options.breaker.execute(() => this.attempt(target, options)),
            this.options.retry,
            ({ attempt, delayMs, error }) => {
                this.options.logger.warn('Retrying provider request', {
                    service: this.service,
                    url: redactUrl(target),
                    attempt,
                    delayMs,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        );
    }

    /**
     * GET/POST and validate the body against `schema`
     */
    async fetchParsed<T>(
        url: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        what: string,
        options: RequestOptions = {}
    ): Promise<T> {
        const payload = await this.requestJson(url, options);
        return parsePayload(this.provider, schema, payload, what);
    }

    private async attempt(target: string, options: RequestOptions): Promise<unknown> {
        await this.options.throttle.acquire(this.service);

        let response: Response;
        try {
            response = await fetch(target, {
                method: options.method ?? 'GET',
                headers: {
                    'Accept': 'application/json',
                    'User-Agent': this.options.userAgent,
                    ...this.options.defaultHeaders,
                    ...options.headers,
                },
                body: options.body,
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });
        } catch (error) {
            if (isProviderError(error)) throw error;
            const reason = error instanceof Error && error.name === 'TimeoutError'
                ? `timed out after ${this.options.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            throw new ProviderTransientError(this.provider, `${this.service} request failed: ${reason}`, { cause: error });
        }

        if (!response.ok) {
            const error = classifyResponse(this.provider, response);
            if (error instanceof ProviderRateLimitError) {
                rateLimitHits.labels(this.service).inc();
            }
            throw error;
        }

        const text = await response.text();
        try {
            return JSON.parse(text);
        } catch {
            throw new ProviderSchemaError(this.provider, `${this.service} returned a body that is not JSON`);
        }
    }
}

/**
 * Strip credentials carried in query strings before logging
 */
export function redactUrl(url: string): string {
    const parsed = new URL(url);
    for (const key of ['api_key', 'apikey', 'apiKey', 'client_secret', 'key']) {
        if (parsed.searchParams.has(key)) {
            parsed.searchParams.set(key, 'REDACTED');
        }
    }
    return parsed.toString();
}
