/**
 * Enrichment runner
 * Spends each enricher's budget on eligible records, in the order given
 */
import type { Config } from '../config/index.js';
import { CircuitOpenError, ProviderAuthError, isProviderError } from '../fetchers/errors.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import { createBookSynopsisEnricher } from './book-synopsis.enricher.js';
import { createCoverArtEnricher } from './cover-art.enricher.js';
import { createOmdbEnricher } from './omdb.enricher.js';
import { createWatchmodeEnricher } from './watchmode.enricher.js';
import type { EnrichContext, Enricher, EnrichmentStats, RecordPatch } from './types.js';

/**
 * One fresh set of enrichers (and budgets) per run. Keyed services are left
 * out when their key is not configured.
 */
export function createEnrichers(config: Pick<Config, 'filters' | 'enrichment'>): Enricher[] {
    const { filters, enrichment } = config;
    const enrichers = [
        createCoverArtEnricher(filters.musicCoverArtLimit),
        createBookSynopsisEnricher(filters.bookSynopsisLimit),
    ];
    if (enrichment.omdbApiKey !== null) {
        enrichers.push(createOmdbEnricher(enrichment.omdbApiKey, enrichment.omdbLookupLimit));
    }
    if (enrichment.watchmodeApiKey !== null) {
        enrichers.push(createWatchmodeEnricher(enrichment.watchmodeApiKey, enrichment.watchmodeLookupLimit));
    }
    return enrichers;
}

export function applyPatch(record: ReleaseRecord, patch: RecordPatch): ReleaseRecord {
    return {
        ...record,
        coverArtUrl: patch.coverArtUrl ?? record.coverArtUrl,
        synopsis: patch.synopsis ?? record.synopsis,
        externalIds: { ...record.externalIds, ...patch.externalIds },
        details: { ...record.details, ...patch.details },
    };
}

/**
 * Apply one enricher. Records keep their position; a failed lookup leaves the
 * record as it was. The budget is spent per attempt, found or not.
 */
export async function enrichRecords(
    records: readonly ReleaseRecord[],
    enricher: Enricher,
    ctx: EnrichContext
): Promise<{ records: ReleaseRecord[]; stats: EnrichmentStats }> {
    const result = [...records];
    const stats: EnrichmentStats = { attempted: 0, enriched: 0, failed: 0, skippedForBudget: 0 };
    // Set once the service refuses every call: open circuit or rejected key
    let halted = false;

    for (let index = 0; index < result.length; index++) {
        const record = result[index];
        if (record === undefined || !enricher.eligible(record)) continue;

        if (halted || !enricher.budget.tryConsume()) {
            stats.skippedForBudget++;
            continue;
        }

        stats.attempted++;
        try {
            const patch = await enricher.lookup(record, ctx);
            if (patch) {
                result[index] = applyPatch(record, patch);
                stats.enriched++;
            }
        } catch (error) {
            if (!isProviderError(error)) throw error;
            stats.failed++;
            ctx.logger.warn('Enrichment lookup failed', {
                enricher: enricher.name,
                recordId: record.id,
                error: error.message,
            });
            if (error instanceof CircuitOpenError || error instanceof ProviderAuthError) halted = true;
        }
    }

    ctx.logger.info('Enrichment complete', { enricher: enricher.name, ...stats, budgetUsed: enricher.budget.used });
    return { records: result, stats };
}

export async function runEnrichers(
    records: readonly ReleaseRecord[],
    enrichers: readonly Enricher[],
    ctx: EnrichContext
): Promise<ReleaseRecord[]> {
    let current = [...records];
    for (const enricher of enrichers) {
        ({ records: current } = await enrichRecords(current, enricher, ctx));
    }
    return current;
}

export * from './types.js';
export { createCoverArtEnricher, pickCoverUrl } from './cover-art.enricher.js';
export { createBookSynopsisEnricher, pickSynopsis } from './book-synopsis.enricher.js';
export { createOmdbEnricher, pickRatings } from './omdb.enricher.js';
export { createWatchmodeEnricher, pickStreaming } from './watchmode.enricher.js';
