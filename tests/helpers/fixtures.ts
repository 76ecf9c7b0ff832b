/**
 * Shared test fixtures: configuration, HTTP stand-ins and record builders
 */
import { vi } from 'vitest';
import { loadConfig, type Config } from '../../src/config/index.js';
import type { ProviderSchemaError } from '../../src/fetchers/errors.js';
import type { FetchContext, Fetcher, SourceItem } from '../../src/fetchers/types.js';
import type { ReleaseRecord } from '../../src/normalizers/types.js';
import { logger } from '../../src/observability/logger.js';
import { DEFAULT_REQUEST_INTERVALS, RequestThrottle } from '../../src/services/rate-limiter.js';
import { RunContext } from '../../src/services/run-context.js';

export const TEST_ENV: NodeJS.ProcessEnv = {
    TMDB_API_KEY: 'test-tmdb-key',
    IGDB_CLIENT_ID: 'test-client-id',
    IGDB_CLIENT_SECRET: 'test-secret',
    RETRY_MAX_ATTEMPTS: '3',
    RETRY_BASE_DELAY_MS: '1',
    RETRY_MAX_DELAY_MS: '5',
    CB_FAILURE_THRESHOLD: '50',
};

export function testConfig(overrides: NodeJS.ProcessEnv = {}): Config {
    return loadConfig({ ...TEST_ENV, ...overrides });
}

/**
 * Throttle that keeps request order but never waits
 */
export function instantThrottle(): RequestThrottle {
    return new RequestThrottle(DEFAULT_REQUEST_INTERVALS, { now: () => 0, sleep: async () => { } });
}

export const noSleep = async (): Promise<void> => { };

export function createRunContext(config: Config = testConfig()): RunContext {
    return new RunContext(config, logger, { runId: 'test-run', throttle: instantThrottle(), sleep: noSleep });
}

export interface TestFetchContext {
    ctx: FetchContext;
    schemaErrors: ProviderSchemaError[];
}

export function createFetchContext(config: Config = testConfig()): TestFetchContext {
    const schemaErrors: ProviderSchemaError[] = [];
    const ctx = createRunContext(config).fetchContext(logger, error => {
        schemaErrors.push(error);
    });
    return { ctx, schemaErrors };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

export function drain<TItem extends SourceItem>(fetcher: Fetcher<TItem>, targetDate: string, ctx: FetchContext): Promise<TItem[]> {
    return collect(fetcher.fetch({ provider: fetcher.provider, targetDate }, ctx));
}

// ============================================================================
// HTTP
// ============================================================================

export function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json', ...headers },
    });
}

export type FetchInput = string | URL | Request;

export function requestUrl(input: FetchInput): URL {
    if (typeof input === 'string') return new URL(input);
    if (input instanceof URL) return input;
    return new URL(input.url);
}

export type FetchHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/**
 * Stub global fetch with a handler; returns the mock for call assertions
 */
export function stubFetch(handler: FetchHandler) {
    const mockFetch = vi.fn(async (input: FetchInput, init?: RequestInit) => handler(requestUrl(input), init));
    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}

/**
 * URLs of every call made through a stubbed fetch
 */
export function calledUrls(mockFetch: ReturnType<typeof stubFetch>): URL[] {
    return mockFetch.mock.calls.map(([input]) => requestUrl(input));
}

// ============================================================================
// Records
// ============================================================================

export function makeRecord(overrides: Partial<ReleaseRecord> = {}): ReleaseRecord {
    return {
        id: 'movie-0000000000000000',
        mediaType: 'movie',
        source: 'tmdb',
        title: 'Test Title',
        releaseDate: '2026-02-10',
        synopsis: 'A synopsis.',
        genres: [],
        runtimeMinutes: null,
        category: null,
        coverArtUrl: null,
        language: null,
        popularity: null,
        externalIds: {},
        details: {},
        ...overrides,
    };
}
