/**
 * Bounded retry policy with exponential backoff
 */
import { isProviderError, ProviderRateLimitError } from '../fetchers/errors.js';
import { retryCount } from '../observability/metrics.js';
import type { RetryPolicyConfig } from '../config/index.js';

export interface RetryPolicy extends RetryPolicyConfig {
    sleep?: (ms: number) => Promise<void>;
}

export interface RetryAttempt {
    attempt: number;
    delayMs: number;
    error: unknown;
}

export const defaultSleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows `attempt` (1-based): base, 2x, 4x, ...
 */
export function getBackoffMs(attempt: number, policy: RetryPolicyConfig): number {
    const delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
    return Math.min(delay, policy.maxDelayMs);
}

/**
 * Only provider errors flagged retryable get another attempt
 */
export function isRetryable(error: unknown): boolean {
    return isProviderError(error) && error.retryable;
}

/**
 * Run `fn` up to `policy.maxAttempts` times. The last error is rethrown.
 */
export async function withRetry<T>(
    service: string,
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    onRetry?: (info: RetryAttempt) => void
): Promise<T> {
    const sleep = policy.sleep ?? defaultSleep;
    let attempt = 1;

    for (;;) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (!isRetryable(error) || attempt >= policy.maxAttempts) {
                throw error;
            }

            let delayMs = getBackoffMs(attempt, policy);
            if (error instanceof ProviderRateLimitError && error.retryAfterMs !== null) {
                delayMs = Math.max(delayMs, Math.min(error.retryAfterMs, policy.maxDelayMs));
            }

            retryCount.labels(service, error instanceof ProviderRateLimitError ? 'rate_limit' : 'transient').inc();
            onRetry?.({ attempt, delayMs, error });

            await sleep(delayMs);
            attempt++;
        }
    }
}
