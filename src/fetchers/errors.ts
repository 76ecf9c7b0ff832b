/**
 * Provider error taxonomy
 *
 * Every failure an adapter can raise is a ProviderError. `retryable` tells the
 * retry policy whether another attempt may succeed.
 */

export abstract class ProviderError extends Error {
    abstract readonly retryable: boolean;
    readonly provider: string;
    readonly status?: number;

    constructor(provider: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.provider = provider;
        this.status = options?.status;
    }
}

/**
 * Rejected credentials or a failed token exchange. Fatal to one adapter.
 */
export class ProviderAuthError extends ProviderError {
    readonly retryable = false;

    constructor(provider: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(provider, message, options);
        this.name = 'ProviderAuthError';
    }
}

/**
 * 429 or 503 from the provider
 */
export class ProviderRateLimitError extends ProviderError {
    readonly retryable = true;
    readonly retryAfterMs: number | null;

    constructor(provider: string, message: string, options?: { status?: number; retryAfterMs?: number | null }) {
        super(provider, message, options);
        this.name = 'ProviderRateLimitError';
        this.retryAfterMs = options?.retryAfterMs ?? null;
    }
}

/**
 * 5xx, timeouts, and network failures
 */
export class ProviderTransientError extends ProviderError {
    readonly retryable = true;

    constructor(provider: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(provider, message, options);
        this.name = 'ProviderTransientError';
    }
}

/**
 * Response body that is not JSON or does not match the expected shape
 */
export class ProviderSchemaError extends ProviderError {
    readonly retryable = false;
    readonly issues: string[];

    constructor(provider: string, message: string, issues: string[] = []) {
        super(provider, message);
        this.name = 'ProviderSchemaError';
        this.issues = issues;
    }
}

/**
 * Any other 4xx. Repeating the same request will not help.
 */
export class ProviderRequestError extends ProviderError {
    readonly retryable = false;

    constructor(provider: string, message: string, options: { status: number }) {
        super(provider, message, options);
        this.name = 'ProviderRequestError';
    }
}

/**
 * Thrown when the provider's circuit is open
 */
export class CircuitOpenError extends ProviderError {
    readonly retryable = false;

    constructor(circuitName: string) {
        super(circuitName, `Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitOpenError';
    }
}

export function isProviderError(error: unknown): error is ProviderError {
    return error instanceof ProviderError;
}
