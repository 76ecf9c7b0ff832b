/**
 * Configuration module with Zod schema validation
 * Loaded once per run; invalid values are fatal before any network call
 */
import { z } from 'zod';

// Custom validators
const nonNegativeIntSchema = z.coerce.number().int().min(0);
const positiveIntSchema = z.coerce.number().int().positive();
const languageCodeSchema = z.string().regex(/^[a-z]{2,3}$/, 'Must be an ISO 639 language code');

const flagSchema = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false', '1', '0', 'yes', 'no'], {
        errorMap: () => ({ message: 'Must be one of true, false, 1, 0, yes, no' }),
    })
        .default(fallback)
        .transform(value => value === 'true' || value === '1' || value === 'yes');

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Flat schema: one key per environment variable
const envSchema = z.object({
    // Filters
    minMovieRuntime: nonNegativeIntSchema.default(40),
    includeTalkShows: flagSchema('false'),
    includeReality: flagSchema('false'),
    includeNews: flagSchema('false'),
    includeSingles: flagSchema('false'),
    musicCoverArtLimit: nonNegativeIntSchema.default(80),
    bookSynopsisLimit: nonNegativeIntSchema.default(60),
    languageFilter: languageCodeSchema.nullable().default(null),
    bookLanguages: z.string()
        .default('eng,en')
        .transform(s => s.split(',').map(part => part.trim().toLowerCase()).filter(Boolean))
        .pipe(z.array(languageCodeSchema).min(1, 'At least one language is required')),

    // Optional - Provider credentials
    tmdbApiKey: z.string().nullable().default(null),
    igdbClientId: z.string().nullable().default(null),
    igdbClientSecret: z.string().nullable().default(null),

    // Optional - Enrichment services
    omdbApiKey: z.string().nullable().default(null),
    watchmodeApiKey: z.string().nullable().default(null),
    omdbLookupLimit: nonNegativeIntSchema.default(40),
    watchmodeLookupLimit: nonNegativeIntSchema.default(20),

    // Output
    outputDir: z.string().min(1).default('./output'),
    metricsFile: z.string().nullable().default(null),

    // Logging
    logLevel: logLevelSchema.default('info'),

    // HTTP behaviour
    userAgent: z.string().min(1).default('unreeled-bot/1.0 (media release tracker)'),
    requestTimeoutMs: positiveIntSchema.default(15000),
    adapterConcurrency: positiveIntSchema.max(5).default(1),

    // Retry policy
    retryMaxAttempts: positiveIntSchema.max(10).default(4),
    retryBaseDelayMs: nonNegativeIntSchema.default(1000),
    retryMaxDelayMs: nonNegativeIntSchema.default(30000),

    // Circuit Breaker Tuning
    cbFailureThreshold: positiveIntSchema.default(5),
    cbResetTimeoutMs: positiveIntSchema.default(30000),
    cbHalfOpenRequests: positiveIntSchema.default(1),
});

type EnvConfig = z.infer<typeof envSchema>;

/**
 * Filter settings applied to every record of a run
 */
export interface FilterConfig {
    readonly minMovieRuntime: number;
    readonly includeTalkShows: boolean;
    readonly includeReality: boolean;
    readonly includeNews: boolean;
    readonly includeSingles: boolean;
    readonly musicCoverArtLimit: number;
    readonly bookSynopsisLimit: number;
    readonly languageFilter: string | null;
    readonly bookLanguages: readonly string[];
}

export interface ProviderCredentials {
    readonly tmdbApiKey: string | null;
    readonly igdbClientId: string | null;
    readonly igdbClientSecret: string | null;
}

/**
 * Keyed rating and streaming lookups; a service without a key is not called
 */
export interface EnrichmentConfig {
    readonly omdbApiKey: string | null;
    readonly watchmodeApiKey: string | null;
    readonly omdbLookupLimit: number;
    readonly watchmodeLookupLimit: number;
}

export interface RetryPolicyConfig {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
}

export interface CircuitBreakerSettings {
    readonly failureThreshold: number;
    readonly resetTimeout: number;
    readonly halfOpenRequests: number;
}

export interface Config {
    readonly outputDir: string;
    readonly metricsFile: string | null;
    readonly logLevel: z.infer<typeof logLevelSchema>;
    readonly userAgent: string;
    readonly requestTimeoutMs: number;
    readonly adapterConcurrency: number;
    readonly retry: RetryPolicyConfig;
    readonly circuitBreaker: CircuitBreakerSettings;
    readonly credentials: ProviderCredentials;
    readonly enrichment: EnrichmentConfig;
    readonly filters: FilterConfig;
}

/**
 * Thrown when one or more environment variables are invalid
 */
export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n${issues.join('\n')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

/**
 * Empty strings count as unset
 */
function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name];
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): string | undefined {
    return read(env, name)?.toLowerCase();
}

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<keyof EnvConfig, unknown> {
    return {
        minMovieRuntime: read(env, 'MIN_MOVIE_RUNTIME'),
        includeTalkShows: readFlag(env, 'INCLUDE_TALK_SHOWS'),
        includeReality: readFlag(env, 'INCLUDE_REALITY'),
        includeNews: readFlag(env, 'INCLUDE_NEWS'),
        includeSingles: readFlag(env, 'INCLUDE_SINGLES'),
        musicCoverArtLimit: read(env, 'MUSIC_COVER_ART_LIMIT'),
        bookSynopsisLimit: read(env, 'BOOK_SYNOPSIS_LIMIT'),
        languageFilter: read(env, 'LANGUAGE_FILTER')?.toLowerCase(),
        bookLanguages: read(env, 'BOOK_LANGUAGES'),

        tmdbApiKey: read(env, 'TMDB_API_KEY'),
        igdbClientId: read(env, 'IGDB_CLIENT_ID'),
        igdbClientSecret: read(env, 'IGDB_CLIENT_SECRET'),

        omdbApiKey: read(env, 'OMDB_API_KEY'),
        watchmodeApiKey: read(env, 'WATCHMODE_API_KEY'),
        omdbLookupLimit: read(env, 'OMDB_LOOKUP_LIMIT'),
        watchmodeLookupLimit: read(env, 'WATCHMODE_LOOKUP_LIMIT'),

        outputDir: read(env, 'OUTPUT_DIR'),
        metricsFile: read(env, 'METRICS_FILE'),
        logLevel: read(env, 'LOG_LEVEL'),

        userAgent: read(env, 'USER_AGENT'),
        requestTimeoutMs: read(env, 'REQUEST_TIMEOUT_MS'),
        adapterConcurrency: read(env, 'ADAPTER_CONCURRENCY'),

        retryMaxAttempts: read(env, 'RETRY_MAX_ATTEMPTS'),
        retryBaseDelayMs: read(env, 'RETRY_BASE_DELAY_MS'),
        retryMaxDelayMs: read(env, 'RETRY_MAX_DELAY_MS'),

        cbFailureThreshold: read(env, 'CB_FAILURE_THRESHOLD'),
        cbResetTimeoutMs: read(env, 'CB_RESET_TIMEOUT_MS'),
        cbHalfOpenRequests: read(env, 'CB_HALF_OPEN_REQUESTS'),
    };
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

function toConfig(parsed: EnvConfig): Config {
    const filters: FilterConfig = Object.freeze({
        minMovieRuntime: parsed.minMovieRuntime,
        includeTalkShows: parsed.includeTalkShows,
        includeReality: parsed.includeReality,
        includeNews: parsed.includeNews,
        includeSingles: parsed.includeSingles,
        musicCoverArtLimit: parsed.musicCoverArtLimit,
        bookSynopsisLimit: parsed.bookSynopsisLimit,
        languageFilter: parsed.languageFilter,
        bookLanguages: Object.freeze([...parsed.bookLanguages]),
    });

    return Object.freeze({
        outputDir: parsed.outputDir,
        metricsFile: parsed.metricsFile,
        logLevel: parsed.logLevel,
        userAgent: parsed.userAgent,
        requestTimeoutMs: parsed.requestTimeoutMs,
        adapterConcurrency: parsed.adapterConcurrency,
        retry: Object.freeze({
            maxAttempts: parsed.retryMaxAttempts,
            baseDelayMs: parsed.retryBaseDelayMs,
            maxDelayMs: parsed.retryMaxDelayMs,
        }),
        circuitBreaker: Object.freeze({
            failureThreshold: parsed.cbFailureThreshold,
            resetTimeout: parsed.cbResetTimeoutMs,
            halfOpenRequests: parsed.cbHalfOpenRequests,
        }),
        credentials: Object.freeze({
            tmdbApiKey: parsed.tmdbApiKey,
            igdbClientId: parsed.igdbClientId,
            igdbClientSecret: parsed.igdbClientSecret,
        }),
        enrichment: Object.freeze({
            omdbApiKey: parsed.omdbApiKey,
            watchmodeApiKey: parsed.watchmodeApiKey,
            omdbLookupLimit: parsed.omdbLookupLimit,
            watchmodeLookupLimit: parsed.watchmodeLookupLimit,
        }),
        filters,
    });
}

/**
 * Load and validate configuration
 * Throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = envSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const envVar = pathToEnvVar(String(issue.path[0] ?? ''));
            return `  - ${envVar}: ${issue.message}`;
        });
        throw new ConfigurationError(issues);
    }

    return toConfig(result.data);
}

/**
 * Print a configuration error the way an operator needs to see it
 */
export function reportConfigurationError(error: ConfigurationError): void {
    console.error('\n❌ Configuration Error\n');
    console.error('The following environment variables are missing or invalid:\n');
    console.error(error.issues.join('\n'));
    console.error('\nSee .env.example for the available settings.\n');
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        outputDir: cfg.outputDir,
        metricsFile: cfg.metricsFile,
        logLevel: cfg.logLevel,
        requestTimeoutMs: cfg.requestTimeoutMs,
        adapterConcurrency: cfg.adapterConcurrency,
        retry: cfg.retry,
        circuitBreaker: cfg.circuitBreaker,
        filters: cfg.filters,
        tmdbApiKey: cfg.credentials.tmdbApiKey ? '[CONFIGURED]' : null,
        igdbClientId: cfg.credentials.igdbClientId ? '[CONFIGURED]' : null,
        igdbClientSecret: cfg.credentials.igdbClientSecret ? '[REDACTED]' : null,
        omdbApiKey: cfg.enrichment.omdbApiKey ? '[CONFIGURED]' : null,
        watchmodeApiKey: cfg.enrichment.watchmodeApiKey ? '[CONFIGURED]' : null,
        omdbLookupLimit: cfg.enrichment.omdbLookupLimit,
        watchmodeLookupLimit: cfg.enrichment.watchmodeLookupLimit,
    };
}
