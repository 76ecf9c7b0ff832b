/**
 * Aggregator Service
 * Runs every adapter for one target date and writes the output batch
 *
 * fetch -> normalize -> filter -> dedup -> enrich -> serialize -> atomic write
 */
import pLimit from 'p-limit';
import type { Config, FilterConfig } from '../config/index.js';
import { createEnrichers, runEnrichers, type Enricher } from '../enrichers/index.js';
import { applyFilters } from '../filters/index.js';
import { getFetchers } from '../fetchers/index.js';
import { MEDIA_TYPES, PROVIDER_NAMES, type Fetcher, type MediaType, type ProviderName, type SourceItem } from '../fetchers/types.js';
import type { ProviderSchemaError } from '../fetchers/errors.js';
import { normalizeBatch, type ReleaseRecord } from '../normalizers/index.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import {
    adapterDuration,
    adapterRuns,
    duplicatesRemoved,
    recordsFetched,
    recordsFiltered,
    recordsWritten,
    schemaErrors,
} from '../observability/metrics.js';
import { screenRecords, writeBatch } from '../storage/batch-writer.js';
import { toOutputRecord, type FiltersApplied, type OutputBatch, type SourceStatOutput } from '../storage/schema.js';
import { isIsoDate } from '../utils/dates.js';
import { deduplicate } from './dedup.service.js';
import { RunContext, type RunContextOptions } from './run-context.js';

export type SourceStatus = 'ok' | 'skipped' | 'failed';

export interface SourceStat {
    status: SourceStatus;
    records: number;          // items contributed to the run
    schemaErrors: number;     // items skipped as malformed
    durationMs: number;
    error?: string;
}

export interface AggregatorOptions extends RunContextOptions {
    fetchers?: readonly Fetcher[];
    enrichers?: readonly Enricher[];
    logger?: Logger;
    now?: () => Date;
}

export interface AggregationResult {
    runId: string;
    targetDate: string;
    outputPath: string;
    batch: OutputBatch;
    stats: Partial<Record<ProviderName, SourceStat>>;
}

interface AdapterOutcome {
    provider: ProviderName;
    items: SourceItem[];
    stat: SourceStat;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Drain one adapter. Its contribution is all-or-nothing: a fatal error
 * discards everything it had yielded.
 */
async function runAdapter(fetcher: Fetcher, targetDate: string, ctx: RunContext): Promise<AdapterOutcome> {
    const provider = fetcher.provider;
    const adapterLogger = ctx.logger.child({ provider, stage: 'fetch' });

    const missing = fetcher.missingCredentials(ctx.config.credentials);
    if (missing.length > 0) {
        adapterLogger.warn('Adapter skipped: missing credentials', { missing });
        adapterRuns.labels(provider, 'skipped').inc();
        return {
            provider,
            items: [],
            stat: { status: 'skipped', records: 0, schemaErrors: 0, durationMs: 0, error: `Missing ${missing.join(', ')}` },
        };
    }

    const startTime = Date.now();
    let malformed = 0;
    const onSchemaError = (error: ProviderSchemaError): void => {
        malformed++;
        schemaErrors.labels(provider).inc();
        adapterLogger.warn('Malformed provider payload skipped', { error: error.message, issues: error.issues.slice(0, 5) });
    };

    const items: SourceItem[] = [];
    try {
        for await (const item of fetcher.fetch({ provider, targetDate }, ctx.fetchContext(adapterLogger, onSchemaError))) {
            items.push(item);
        }
    } catch (error) {
        const durationMs = Date.now() - startTime;
        adapterDuration.labels(provider).observe(durationMs / 1000);
        adapterRuns.labels(provider, 'failed').inc();
        adapterLogger.error('Adapter failed, contribution dropped', error, { discarded: items.length, durationMs });

        return {
            provider,
            items: [],
            stat: { status: 'failed', records: 0, schemaErrors: malformed, durationMs, error: errorMessage(error) },
        };
    }

    const durationMs = Date.now() - startTime;
    adapterDuration.labels(provider).observe(durationMs / 1000);
    adapterRuns.labels(provider, 'ok').inc();
    recordsFetched.labels(provider).inc(items.length);
    adapterLogger.info('Adapter completed', { records: items.length, schemaErrors: malformed, durationMs });

    return {
        provider,
        items,
        stat: { status: 'ok', records: items.length, schemaErrors: malformed, durationMs },
    };
}

/**
 * Count records rejected after fetching against the provider that sent them
 */
function addSchemaErrors(stats: Partial<Record<ProviderName, SourceStat>>, provider: ProviderName, count: number): void {
    const stat = stats[provider];
    if (stat !== undefined) stat.schemaErrors += count;
    schemaErrors.labels(provider).inc(count);
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Output order: popularity desc (unknown last), then title, then id
 */
export function compareForOutput(a: ReleaseRecord, b: ReleaseRecord): number {
    const byPopularity = (b.popularity ?? Number.NEGATIVE_INFINITY) - (a.popularity ?? Number.NEGATIVE_INFINITY);
    if (byPopularity !== 0 && !Number.isNaN(byPopularity)) return byPopularity;
    return compareText(a.title, b.title) || compareText(a.id, b.id);
}

export function groupByMediaType(records: readonly ReleaseRecord[]): Record<MediaType, ReleaseRecord[]> {
    const groups: Record<MediaType, ReleaseRecord[]> = {
        movie: [], tv: [], book: [], game: [], anime: [], music: [],
    };
    for (const record of records) {
        groups[record.mediaType].push(record);
    }
    for (const mediaType of MEDIA_TYPES) {
        groups[mediaType].sort(compareForOutput);
    }
    return groups;
}

export function describeFilters(filters: FilterConfig): FiltersApplied {
    return {
        min_movie_runtime: filters.minMovieRuntime,
        include_talk_shows: filters.includeTalkShows,
        include_reality: filters.includeReality,
        include_news: filters.includeNews,
        include_singles: filters.includeSingles,
        music_cover_art_limit: filters.musicCoverArtLimit,
        book_synopsis_limit: filters.bookSynopsisLimit,
        language_filter: filters.languageFilter,
        book_languages: [...filters.bookLanguages],
    };
}

function toSourceStatOutput(stat: SourceStat): SourceStatOutput {
    const output: SourceStatOutput = {
        status: stat.status,
        records: stat.records,
        schema_errors: stat.schemaErrors,
        duration_ms: Math.round(stat.durationMs),
    };
    if (stat.error !== undefined) output.error = stat.error;
    return output;
}

/**
 * Build the output document from enriched, deduplicated records
 */
export function buildBatch(
    targetDate: string,
    records: readonly ReleaseRecord[],
    stats: Partial<Record<ProviderName, SourceStat>>,
    filters: FilterConfig,
    generatedAt: Date
): OutputBatch {
    const groups = groupByMediaType(records);
    const errors: string[] = [];
    const sourceStats: Partial<Record<ProviderName, SourceStatOutput>> = {};

    for (const provider of PROVIDER_NAMES) {
        const stat = stats[provider];
        if (stat === undefined) continue;
        sourceStats[provider] = toSourceStatOutput(stat);
        if (stat.status === 'failed' && stat.error !== undefined) {
            errors.push(`${provider}: ${stat.error}`);
        }
    }

    const batch: OutputBatch = {
        generated_at: generatedAt.toISOString(),
        date: targetDate,
        total_releases: records.length,
        releases: {
            movie: groups.movie.map(toOutputRecord),
            tv: groups.tv.map(toOutputRecord),
            book: groups.book.map(toOutputRecord),
            game: groups.game.map(toOutputRecord),
            anime: groups.anime.map(toOutputRecord),
            music: groups.music.map(toOutputRecord),
        },
        source_stats: sourceStats,
        filters_applied: describeFilters(filters),
    };
    if (errors.length > 0) batch.errors = errors;
    return batch;
}

/**
 * Run the whole pipeline for one target date. Adapter failures never abort
 * the run; the batch is always written.
 */
export async function runAggregation(
    targetDate: string,
    config: Config,
    options: AggregatorOptions = {}
): Promise<AggregationResult> {
    if (!isIsoDate(targetDate)) {
        throw new RangeError(`Target date must be YYYY-MM-DD, got ${targetDate}`);
    }

    const fetchers = options.fetchers ?? getFetchers();
    const now = options.now ?? (() => new Date());
    const baseLogger = options.logger ?? rootLogger;

    const runCtx = new RunContext(config, baseLogger, options);
    const runLogger = runCtx.logger.child({ targetDate });

    runLogger.info('Aggregation started', {
        providers: fetchers.map(fetcher => fetcher.provider),
        adapterConcurrency: config.adapterConcurrency,
    });

    // 1. Fetch
    const limit = pLimit(config.adapterConcurrency);
    const outcomes = await Promise.all(
        fetchers.map(fetcher => limit(() => runAdapter(fetcher, targetDate, runCtx)))
    );

    const stats: Partial<Record<ProviderName, SourceStat>> = {};
    const items: SourceItem[] = [];
    for (const outcome of outcomes) {
        stats[outcome.provider] = outcome.stat;
        items.push(...outcome.items);
    }

    // 2. Normalize
    const { normalized, rejected } = normalizeBatch(items, targetDate, runLogger.child({ stage: 'normalize' }));
    for (const provider of PROVIDER_NAMES) {
        const count = rejected[provider];
        if (count !== undefined) addSchemaErrors(stats, provider, count);
    }

    // 3. Filter
    const { kept, dropped } = applyFilters(normalized, config.filters);
    for (const { record, rule } of dropped) {
        recordsFiltered.labels(record.mediaType, rule).inc();
    }
    runLogger.child({ stage: 'filter' }).info('Filters applied', { kept: kept.length, dropped: dropped.length });

    // 4. Dedup
    const { records: unique, removed } = deduplicate(kept);
    for (const [mediaType, count] of Object.entries(removed)) {
        duplicatesRemoved.labels(mediaType).inc(count);
    }
    runLogger.child({ stage: 'dedup' }).info('Duplicates removed', { before: kept.length, after: unique.length });

    // 5. Enrich, most prominent records first so budgets go where they show
    const ordered = [...unique].sort(compareForOutput);
    const enrichers = options.enrichers ?? createEnrichers(config);
    const enrichLogger = runLogger.child({ stage: 'enrich' });
    enrichLogger.debug('Enrichers configured', { enrichers: enrichers.map(enricher => enricher.name) });
    const enriched = await runEnrichers(ordered, enrichers, {
        logger: enrichLogger,
        client: service => runCtx.client(service),
    });

    // 6. Serialize and write
    const writeLogger = runLogger.child({ stage: 'write' });
    const { accepted, rejected: unwritable } = screenRecords(enriched);
    for (const { record, issues } of unwritable) {
        addSchemaErrors(stats, record.source, 1);
        writeLogger.warn('Record dropped: does not fit the output schema', { recordId: record.id, provider: record.source, issues });
    }

    const batch = buildBatch(targetDate, accepted, stats, config.filters, now());
    const outputPath = await writeBatch(config.outputDir, batch);

    for (const mediaType of MEDIA_TYPES) {
        recordsWritten.labels(mediaType).set(batch.releases[mediaType].length);
    }

    if (runCtx.breakers.hasOpenCircuit()) {
        writeLogger.warn('Run finished with open circuits', { circuits: runCtx.breakers.getAllStates() });
    }
    writeLogger.info('Aggregation complete', {
        outputPath,
        totalReleases: batch.total_releases,
        failed: Object.entries(stats).filter(([, stat]) => stat?.status === 'failed').map(([provider]) => provider),
        circuits: runCtx.breakers.getAllStates(),
    });

    return { runId: runCtx.runId, targetDate, outputPath, batch, stats };
}
