/**
 * Fetcher Registry
 * One fetcher per provider, in the order adapters are scheduled
 */
import type { Fetcher, ProviderName } from './types.js';

import { tmdbFetcher } from './tmdb.fetcher.js';
import { openLibraryFetcher } from './openlibrary.fetcher.js';
import { igdbFetcher } from './igdb.fetcher.js';
import { jikanFetcher } from './jikan.fetcher.js';
import { musicBrainzFetcher } from './musicbrainz.fetcher.js';

// Register all fetchers
const fetchers: Map<ProviderName, Fetcher> = new Map<ProviderName, Fetcher>([
    ['tmdb', tmdbFetcher],
    ['open_library', openLibraryFetcher],
    ['igdb', igdbFetcher],
    ['jikan', jikanFetcher],
    ['musicbrainz', musicBrainzFetcher],
]);

/**
 * All registered fetchers
 */
export function getFetchers(): Fetcher[] {
    return Array.from(fetchers.values());
}

// Re-export types
export * from './types.js';
