/**
 * OMDb Ratings Enricher
 * Rotten Tomatoes, Metacritic and IMDb scores for movies and TV shows
 */
import { ProviderRequestError } from '../fetchers/errors.js';
import { omdbTitleSchema, type OmdbTitle } from '../fetchers/schemas.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import { LookupBudget } from '../services/budget.js';
import type { EnrichContext, Enricher, RecordPatch } from './types.js';

export const OMDB_BASE = 'https://www.omdbapi.com/';

const RATING_SOURCES: ReadonlyArray<[source: string, key: string]> = [
    ['Rotten Tomatoes', 'rotten_tomatoes'],
    ['Metacritic', 'metacritic'],
    ['Internet Movie Database', 'imdb'],
];

export function pickRatings(title: OmdbTitle): Record<string, string> {
    const ratings: Record<string, string> = {};
    for (const rating of title.Ratings) {
        const match = RATING_SOURCES.find(([source]) => rating.Source.includes(source));
        if (match && rating.Value.trim() !== '') {
            ratings[match[1]] = rating.Value.trim();
        }
    }
    return ratings;
}

class OmdbRatingsEnricher implements Enricher {
    readonly name = 'omdb_ratings';
    readonly budget: LookupBudget;

    constructor(private readonly apiKey: string, limit: number) {
        this.budget = new LookupBudget(this.name, limit);
    }

    eligible(record: ReleaseRecord): boolean {
        return record.mediaType === 'movie' || record.mediaType === 'tv';
    }

    async lookup(record: ReleaseRecord, ctx: EnrichContext): Promise<RecordPatch | null> {
        // By IMDb id when TMDB gave one, else by title
        const imdbId = record.externalIds['imdb'];

        let title: OmdbTitle;
        try {
            title = await ctx.client('omdb').fetchParsed(OMDB_BASE, omdbTitleSchema, 'title lookup', {
                query: {
                    apikey: this.apiKey,
                    type: record.mediaType === 'movie' ? 'movie' : 'series',
                    i: imdbId,
                    t: imdbId === undefined ? record.title : undefined,
                },
            });
        } catch (error) {
            if (error instanceof ProviderRequestError && error.status === 404) return null;
            throw error;
        }
        if (title.Response !== 'True') return null;

        const patch: RecordPatch = {};
        const ratings = pickRatings(title);
        if (Object.keys(ratings).length > 0) {
            patch.details = { ratings };
        }
        if (imdbId === undefined && title.imdbID) {
            patch.externalIds = { imdb: title.imdbID };
        }
        return Object.keys(patch).length > 0 ? patch : null;
    }
}

export function createOmdbEnricher(apiKey: string, limit: number): Enricher {
    return new OmdbRatingsEnricher(apiKey, limit);
}
