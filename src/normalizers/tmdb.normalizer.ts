/**
 * TMDB Normalizer
 * Normalizes TMDB movies and TV shows to ReleaseRecord
 */
import { TMDB_IMAGE_BASE } from '../fetchers/tmdb.fetcher.js';
import type { TmdbMovieItem, TmdbShowItem } from '../fetchers/types.js';
import { dedupService } from '../services/dedup.service.js';
import { cleanText, cleanTitle } from './text.js';
import type { Normalizer, ReleaseRecord } from './types.js';

function posterUrl(path: string | null | undefined): string | null {
    return path ? `${TMDB_IMAGE_BASE}${path}` : null;
}

function normalizeMovie(item: TmdbMovieItem, targetDate: string): ReleaseRecord {
    const { movie } = item;
    const title = cleanTitle(movie.title);

    const externalIds: Record<string, string> = { tmdb: String(movie.id) };
    if (item.imdbId) externalIds['imdb'] = item.imdbId;

    return {
        id: dedupService.generateReleaseId('movie', title, targetDate),
        mediaType: 'movie',
        source: 'tmdb',

        title,
        releaseDate: targetDate,

        synopsis: cleanText(movie.overview),
        genres: item.genreNames,
        runtimeMinutes: item.runtime,
        category: null,
        coverArtUrl: posterUrl(movie.poster_path),
        language: cleanText(movie.original_language),
        popularity: movie.popularity ?? null,

        externalIds,
        details: {
            providerDate: cleanText(movie.release_date),
            voteAverage: movie.vote_average ?? null,
            adult: movie.adult ?? false,
        },
    };
}

function normalizeShow(item: TmdbShowItem, targetDate: string): ReleaseRecord {
    const { show } = item;
    const title = cleanTitle(show.name);

    return {
        id: dedupService.generateReleaseId('tv', title, targetDate),
        mediaType: 'tv',
        source: 'tmdb',

        title,
        releaseDate: targetDate,

        synopsis: cleanText(show.overview),
        genres: item.genreNames,
        runtimeMinutes: item.episodeRuntime,
        category: null,
        coverArtUrl: posterUrl(show.poster_path),
        language: cleanText(show.original_language),
        popularity: show.popularity ?? null,

        externalIds: { tmdb: String(show.id) },
        details: {
            // discover/tv matches on episode air date; this is the series premiere
            providerDate: cleanText(show.first_air_date),
            networks: item.networks,
            originCountry: show.origin_country ?? [],
            voteAverage: show.vote_average ?? null,
        },
    };
}

export const tmdbNormalizer: Normalizer<TmdbMovieItem | TmdbShowItem> = {
    provider: 'tmdb',

    normalize(item, targetDate) {
        return item.mediaType === 'movie'
            ? normalizeMovie(item, targetDate)
            : normalizeShow(item, targetDate);
    },
};
