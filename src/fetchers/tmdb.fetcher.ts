/**
 * TMDB API v3 Fetcher
 * Movies and TV airing on the target date
 */
import type { z } from 'zod';
import type { ProviderClient, QueryValue } from '../services/provider-client.js';
import { ProviderRequestError } from './errors.js';
import { loadEnvelope, parseItems } from './validate.js';
import {
    tmdbGenreListSchema,
    tmdbMovieDetailsSchema,
    tmdbMovieSchema,
    tmdbPageSchema,
    tmdbShowDetailsSchema,
    tmdbShowSchema,
} from './schemas.js';
import type { FetchContext, Fetcher, SourceQuery, TmdbMovieItem, TmdbShowItem } from './types.js';

export const TMDB_API_BASE = 'https://api.themoviedb.org/3';
export const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p/w500';

// TMDB discover results are sorted by popularity; deeper pages are noise
const MAX_PAGES = 5;

type GenreMap = Map<number, string>;

/**
 * TMDB v3 authenticates with an api_key query parameter on every call
 */
class TmdbApi {
    constructor(
        private readonly client: ProviderClient,
        private readonly apiKey: string
    ) { }

    get<T>(
        path: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        what: string,
        query: Record<string, QueryValue> = {}
    ): Promise<T> {
        return this.client.fetchParsed(`${TMDB_API_BASE}${path}`, schema, what, {
            query: { api_key: this.apiKey, ...query },
        });
    }
}

async function loadGenres(api: TmdbApi, kind: 'movie' | 'tv'): Promise<GenreMap> {
    const data = await api.get(`/genre/${kind}/list`, tmdbGenreListSchema, `${kind} genre list`);
    return new Map(data.genres.map(genre => [genre.id, genre.name]));
}

/**
 * Detail lookups enrich an item that is already valid; a missing or
 * malformed detail payload leaves the extra fields empty
 */
async function loadDetails<T>(ctx: FetchContext, what: string, load: () => Promise<T>): Promise<T | null> {
    try {
        return await loadEnvelope(ctx, load);
    } catch (error) {
        if (!(error instanceof ProviderRequestError)) throw error;
        ctx.logger.debug('TMDB detail lookup rejected', { what, status: error.status });
        return null;
    }
}

function resolveGenres(ids: number[], genres: GenreMap): string[] {
    return ids.map(id => genres.get(id) ?? 'Unknown');
}

async function* fetchMovies(
    query: SourceQuery,
    ctx: FetchContext,
    api: TmdbApi
): AsyncGenerator<TmdbMovieItem> {
    const genres = await loadGenres(api, 'movie');
    let page = 1;
    let totalPages = 1;

    while (page <= Math.min(totalPages, MAX_PAGES)) {
        const data = await loadEnvelope(ctx, () => api.get('/discover/movie', tmdbPageSchema, 'movie discover page', {
            'primary_release_date.gte': query.targetDate,
            'primary_release_date.lte': query.targetDate,
            sort_by: 'popularity.desc',
            page,
            with_original_language: ctx.filters.languageFilter ?? undefined,
        }));
        if (!data) return;

        totalPages = data.total_pages;

        for (const movie of parseItems('tmdb', tmdbMovieSchema, data.results, ctx, 'movie')) {
            const details = await loadDetails(ctx, `movie ${movie.id}`,
                () => api.get(`/movie/${movie.id}`, tmdbMovieDetailsSchema, 'movie details'));

            yield {
                provider: 'tmdb',
                mediaType: 'movie',
                movie,
                genreNames: resolveGenres(movie.genre_ids, genres),
                // 0 means TMDB does not know the runtime
                runtime: details?.runtime ? details.runtime : null,
                imdbId: details?.imdb_id ?? null,
            };
        }

        page++;
    }
}

async function* fetchShows(
    query: SourceQuery,
    ctx: FetchContext,
    api: TmdbApi
): AsyncGenerator<TmdbShowItem> {
    const genres = await loadGenres(api, 'tv');
    let page = 1;
    let totalPages = 1;

    while (page <= Math.min(totalPages, MAX_PAGES)) {
        const data = await loadEnvelope(ctx, () => api.get('/discover/tv', tmdbPageSchema, 'tv discover page', {
            'air_date.gte': query.targetDate,
            'air_date.lte': query.targetDate,
            sort_by: 'popularity.desc',
            page,
            with_original_language: ctx.filters.languageFilter ?? undefined,
        }));
        if (!data) return;

        totalPages = data.total_pages;

        for (const show of parseItems('tmdb', tmdbShowSchema, data.results, ctx, 'tv show')) {
            const details = await loadDetails(ctx, `tv ${show.id}`,
                () => api.get(`/tv/${show.id}`, tmdbShowDetailsSchema, 'tv details'));
            const episodeRuntime = details?.episode_run_time.find(minutes => minutes > 0);

            yield {
                provider: 'tmdb',
                mediaType: 'tv',
                show,
                genreNames: resolveGenres(show.genre_ids, genres),
                networks: details?.networks.map(network => network.name) ?? [],
                episodeRuntime: episodeRuntime ?? null,
            };
        }

        page++;
    }
}

export const tmdbFetcher: Fetcher<TmdbMovieItem | TmdbShowItem> = {
    provider: 'tmdb',
    mediaTypes: ['movie', 'tv'],

    missingCredentials(credentials) {
        return credentials.tmdbApiKey ? [] : ['TMDB_API_KEY'];
    },

    async *fetch(query, ctx) {
        const apiKey = ctx.credentials.tmdbApiKey;
        if (!apiKey) return;

        const api = new TmdbApi(ctx.client('tmdb'), apiKey);
        let movies = 0;
        let shows = 0;

        for await (const item of fetchMovies(query, ctx, api)) {
            movies++;
            yield item;
        }
        for await (const item of fetchShows(query, ctx, api)) {
            shows++;
            yield item;
        }

        ctx.logger.info('TMDB releases fetched', { targetDate: query.targetDate, movies, shows });
    },
};
