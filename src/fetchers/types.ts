/**
 * Fetcher types and interfaces
 */
import type { FilterConfig, ProviderCredentials } from '../config/index.js';
import type { Logger } from '../observability/logger.js';
import type { ProviderClient } from '../services/provider-client.js';
import type { ProviderSchemaError } from './errors.js';
import type { IgdbGame, JikanAnime, MusicBrainzRelease, OpenLibraryDoc, TmdbMovie, TmdbShow } from './schemas.js';

export const MEDIA_TYPES = ['movie', 'tv', 'book', 'game', 'anime', 'music'] as const;
export type MediaType = typeof MEDIA_TYPES[number];

export const PROVIDER_NAMES = ['tmdb', 'open_library', 'igdb', 'jikan', 'musicbrainz'] as const;
export type ProviderName = typeof PROVIDER_NAMES[number];

/**
 * One adapter invocation
 */
export interface SourceQuery {
    provider: ProviderName;
    targetDate: string;   // YYYY-MM-DD
}

// ============================================================================
// Provider-native items yielded by fetchers
// ============================================================================

export interface TmdbMovieItem {
    provider: 'tmdb';
    mediaType: 'movie';
    movie: TmdbMovie;
    genreNames: string[];
    runtime: number | null;
    imdbId: string | null;
}

export interface TmdbShowItem {
    provider: 'tmdb';
    mediaType: 'tv';
    show: TmdbShow;
    genreNames: string[];
    networks: string[];
    episodeRuntime: number | null;
}

export interface OpenLibraryItem {
    provider: 'open_library';
    mediaType: 'book';
    doc: OpenLibraryDoc;
    subject: string;
    monthMatch: boolean;
}

export interface IgdbItem {
    provider: 'igdb';
    mediaType: 'game';
    game: IgdbGame;
    coverImageId: string | null;
    genreNames: string[];
    platformNames: string[];
}

export interface JikanItem {
    provider: 'jikan';
    mediaType: 'anime';
    anime: JikanAnime;
    weekday: string;
}

export interface MusicBrainzItem {
    provider: 'musicbrainz';
    mediaType: 'music';
    release: MusicBrainzRelease;
}

export type SourceItem =
    | TmdbMovieItem
    | TmdbShowItem
    | OpenLibraryItem
    | IgdbItem
    | JikanItem
    | MusicBrainzItem;

/**
 * Run-scoped services handed to every fetcher
 */
export interface FetchContext {
    credentials: ProviderCredentials;
    filters: FilterConfig;
    logger: Logger;
    client(service: string): ProviderClient;
    reportSchemaError(error: ProviderSchemaError): void;
}

/**
 * Fetcher interface - all source adapters must implement this
 */
export interface Fetcher<TItem extends SourceItem = SourceItem> {
    readonly provider: ProviderName;
    readonly mediaTypes: readonly MediaType[];
    /** Names of required environment variables that are not set */
    missingCredentials(credentials: ProviderCredentials): string[];
    /** Lazily yield the provider's items for the target date */
    fetch(query: SourceQuery, ctx: FetchContext): AsyncGenerator<TItem, void, undefined>;
}
