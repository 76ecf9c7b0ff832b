/**
 * Normalizer Router
 * Routes each fetched item to its provider's normalizer
 */
import { logger as defaultLogger, type Logger } from '../observability/logger.js';
import { ProviderSchemaError } from '../fetchers/errors.js';
import type { ProviderName, SourceItem } from '../fetchers/types.js';
import { absoluteUrl } from './text.js';
import type { NormalizationResult, ReleaseRecord } from './types.js';

import { tmdbNormalizer } from './tmdb.normalizer.js';
import { openLibraryNormalizer } from './openlibrary.normalizer.js';
import { igdbNormalizer } from './igdb.normalizer.js';
import { jikanNormalizer } from './jikan.normalizer.js';
import { musicBrainzNormalizer } from './musicbrainz.normalizer.js';

/**
 * Normalize a single item
 */
export function normalizeItem(item: SourceItem, targetDate: string): ReleaseRecord {
    switch (item.provider) {
        case 'tmdb':
            return tmdbNormalizer.normalize(item, targetDate);
        case 'open_library':
            return openLibraryNormalizer.normalize(item, targetDate);
        case 'igdb':
            return igdbNormalizer.normalize(item, targetDate);
        case 'jikan':
            return jikanNormalizer.normalize(item, targetDate);
        case 'musicbrainz':
            return musicBrainzNormalizer.normalize(item, targetDate);
        default: {
            const unhandled: never = item;
            throw new Error(`No normalizer for item ${JSON.stringify(unhandled)}`);
        }
    }
}

/**
 * Checks every record must pass whatever its provider: a title left after
 * cleanup, and artwork only as an absolute URL
 */
export function checkRecord(record: ReleaseRecord): ReleaseRecord {
    if (record.title === '') {
        throw new ProviderSchemaError(record.source, 'Title is empty after cleanup');
    }
    const coverArtUrl = absoluteUrl(record.coverArtUrl);
    return coverArtUrl === record.coverArtUrl ? record : { ...record, coverArtUrl };
}

/**
 * Normalize a batch of items; an item that fails is logged, counted against
 * its provider and skipped
 */
export function normalizeBatch(
    items: readonly SourceItem[],
    targetDate: string,
    logger: Logger = defaultLogger
): NormalizationResult {
    const normalized: ReleaseRecord[] = [];
    const errors: string[] = [];
    const rejected: Partial<Record<ProviderName, number>> = {};

    for (const item of items) {
        try {
            normalized.push(checkRecord(normalizeItem(item, targetDate)));
        } catch (error) {
            logger.error('Normalization failed', error, { provider: item.provider, mediaType: item.mediaType });
            errors.push(`${item.provider}: ${error instanceof Error ? error.message : 'Unknown error'}`);
            rejected[item.provider] = (rejected[item.provider] ?? 0) + 1;
        }
    }

    logger.info('Batch normalization complete', {
        total: items.length,
        normalized: normalized.length,
        skipped: errors.length,
    });

    return { normalized, skipped: errors.length, errors, rejected };
}

// Re-export types
export * from './types.js';
