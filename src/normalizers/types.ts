/**
 * Normalizer types and interfaces
 */
import type { MediaType, ProviderName, SourceItem } from '../fetchers/types.js';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Canonical release ready for filtering, dedup and output
 */
export interface ReleaseRecord {
    id: string;
    mediaType: MediaType;
    source: ProviderName;

    // Core fields
    title: string;
    releaseDate: string;          // always the target date

    // Optional metadata: null or empty when the provider has nothing
    synopsis: string | null;
    genres: string[];
    runtimeMinutes: number | null;
    category: string | null;
    coverArtUrl: string | null;
    language: string | null;
    popularity: number | null;

    // Provider identifiers, e.g. { tmdb: '123', imdb: 'tt0001' }
    externalIds: Record<string, string>;
    // Provider-specific extras; providerDate is the date the provider reported
    details: Record<string, JsonValue>;
}

/**
 * Normalizer interface - one per provider
 */
export interface Normalizer<TItem extends SourceItem> {
    provider: ProviderName;
    normalize(item: TItem, targetDate: string): ReleaseRecord;
}

/**
 * Result of normalization for a batch
 */
export interface NormalizationResult {
    normalized: ReleaseRecord[];
    skipped: number;
    errors: string[];
    // Items rejected as malformed, per provider
    rejected: Partial<Record<ProviderName, number>>;
}
