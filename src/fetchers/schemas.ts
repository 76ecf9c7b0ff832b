/**
 * Provider payload schemas
 *
 * Envelopes are validated as a whole; items inside an envelope are kept as
 * `unknown` and validated one by one so a single malformed item is skipped
 * instead of failing the page.
 */
import { z } from 'zod';

const namedListSchema = z.array(z.object({ name: z.string() })).default([]);
const stringOrListSchema = z.union([z.array(z.string()), z.string()]).nullish();

// ============================================================================
// TMDB
// ============================================================================

export const tmdbGenreListSchema = z.object({
    genres: z.array(z.object({ id: z.number().int(), name: z.string() })).default([]),
});

export const tmdbPageSchema = z.object({
    page: z.number().int().optional(),
    total_pages: z.number().int().nonnegative().default(1),
    results: z.array(z.unknown()).default([]),
});

export const tmdbMovieSchema = z.object({
    id: z.number().int(),
    title: z.string().min(1),
    release_date: z.string().nullish(),
    overview: z.string().nullish(),
    poster_path: z.string().nullish(),
    genre_ids: z.array(z.number().int()).default([]),
    original_language: z.string().nullish(),
    popularity: z.number().nullish(),
    vote_average: z.number().nullish(),
    adult: z.boolean().nullish(),
});

export const tmdbMovieDetailsSchema = z.object({
    runtime: z.number().nullish(),
    imdb_id: z.string().nullish(),
});

export const tmdbShowSchema = z.object({
    id: z.number().int(),
    name: z.string().min(1),
    first_air_date: z.string().nullish(),
    overview: z.string().nullish(),
    poster_path: z.string().nullish(),
    genre_ids: z.array(z.number().int()).default([]),
    original_language: z.string().nullish(),
    origin_country: z.array(z.string()).nullish(),
    popularity: z.number().nullish(),
    vote_average: z.number().nullish(),
});

export const tmdbShowDetailsSchema = z.object({
    networks: namedListSchema,
    episode_run_time: z.array(z.number()).default([]),
});

export type TmdbMovie = z.infer<typeof tmdbMovieSchema>;
export type TmdbShow = z.infer<typeof tmdbShowSchema>;

// ============================================================================
// Open Library
// ============================================================================

export const openLibrarySearchSchema = z.object({
    numFound: z.number().int().optional(),
    docs: z.array(z.unknown()).default([]),
});

export const openLibraryDocSchema = z.object({
    key: z.string().min(1),
    title: z.string().min(1),
    author_name: z.array(z.string()).default([]),
    first_publish_year: z.number().int().nullish(),
    publish_date: stringOrListSchema,
    subject: z.array(z.string()).default([]),
    isbn: z.array(z.string()).default([]),
    number_of_pages_median: z.number().nullish(),
    cover_i: z.number().int().nullish(),
    publisher: z.array(z.string()).default([]),
    language: stringOrListSchema,
    ratings_average: z.number().nullish(),
    ratings_count: z.number().nullish(),
    edition_count: z.number().nullish(),
    first_sentence: stringOrListSchema,
});

const textValueSchema = z.union([z.string(), z.object({ value: z.string() })]).nullish();

export const openLibraryWorkSchema = z.object({
    description: textValueSchema,
    first_sentence: textValueSchema,
});

export type OpenLibraryDoc = z.infer<typeof openLibraryDocSchema>;
export type OpenLibraryWork = z.infer<typeof openLibraryWorkSchema>;

// ============================================================================
// IGDB / Twitch
// ============================================================================

export const twitchTokenSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive().default(3600),
    token_type: z.string().optional(),
});

export const igdbListSchema = z.array(z.unknown());

export const igdbGameSchema = z.object({
    id: z.number().int(),
    name: z.string().min(1),
    summary: z.string().nullish(),
    first_release_date: z.number().int().nullish(),
    rating: z.number().nullish(),
    total_rating_count: z.number().nullish(),
    cover: z.number().int().nullish(),
    genres: z.array(z.number().int()).default([]),
    platforms: z.array(z.number().int()).default([]),
});

export const igdbCoverSchema = z.object({
    id: z.number().int(),
    game: z.number().int().nullish(),
    image_id: z.string().nullish(),
});

export const igdbNamedSchema = z.object({
    id: z.number().int(),
    name: z.string(),
});

export type IgdbGame = z.infer<typeof igdbGameSchema>;

// ============================================================================
// Jikan
// ============================================================================

export const jikanScheduleSchema = z.object({
    data: z.array(z.unknown()).default([]),
    pagination: z.object({
        has_next_page: z.boolean().default(false),
    }).default({}),
});

export const jikanAnimeSchema = z.object({
    mal_id: z.number().int(),
    url: z.string().nullish(),
    title: z.string().min(1),
    title_english: z.string().nullish(),
    title_japanese: z.string().nullish(),
    synopsis: z.string().nullish(),
    type: z.string().nullish(),
    episodes: z.number().int().nullish(),
    status: z.string().nullish(),
    duration: z.string().nullish(),
    rating: z.string().nullish(),
    score: z.number().nullish(),
    members: z.number().nullish(),
    images: z.object({
        jpg: z.object({
            image_url: z.string().nullish(),
            large_image_url: z.string().nullish(),
        }).nullish(),
    }).nullish(),
    genres: namedListSchema,
    themes: namedListSchema,
    studios: namedListSchema,
    streaming: namedListSchema,
});

export type JikanAnime = z.infer<typeof jikanAnimeSchema>;

// ============================================================================
// MusicBrainz / Cover Art Archive
// ============================================================================

export const musicBrainzSearchSchema = z.object({
    count: z.number().int().nonnegative().default(0),
    offset: z.number().int().optional(),
    releases: z.array(z.unknown()).default([]),
});

export const musicBrainzReleaseSchema = z.object({
    id: z.string().min(1),
    title: z.string().min(1),
    date: z.string().nullish(),
    country: z.string().nullish(),
    barcode: z.string().nullish(),
    status: z.string().nullish(),
    score: z.number().nullish(),
    'artist-credit': z.array(z.object({
        name: z.string().nullish(),
        artist: z.object({
            id: z.string().nullish(),
            name: z.string().nullish(),
        }).nullish(),
    })).default([]),
    media: z.array(z.object({
        format: z.string().nullish(),
        'track-count': z.number().int().nullish(),
    })).default([]),
    'label-info': z.array(z.object({
        'catalog-number': z.string().nullish(),
        label: z.object({ name: z.string().nullish() }).nullish(),
    })).default([]),
    'release-group': z.object({
        id: z.string().nullish(),
        'primary-type': z.string().nullish(),
        'secondary-types': z.array(z.string()).nullish(),
    }).nullish(),
    'text-representation': z.object({
        language: z.string().nullish(),
    }).nullish(),
});

export const coverArtSchema = z.object({
    images: z.array(z.object({
        front: z.boolean().default(false),
        image: z.string().nullish(),
        thumbnails: z.record(z.string(), z.string().nullish()).default({}),
    })).default([]),
});

export type MusicBrainzRelease = z.infer<typeof musicBrainzReleaseSchema>;
export type CoverArtListing = z.infer<typeof coverArtSchema>;

// ============================================================================
// OMDb / Watchmode (enrichment only)
// ============================================================================

// OMDb answers 200 with Response "False" when nothing matches
export const omdbTitleSchema = z.object({
    Response: z.string(),
    imdbID: z.string().nullish(),
    Ratings: z.array(z.object({
        Source: z.string(),
        Value: z.string(),
    })).default([]),
});

export const watchmodeSearchSchema = z.object({
    title_results: z.array(z.object({
        id: z.number().int(),
        name: z.string().nullish(),
    })).default([]),
});

export const watchmodeSourcesSchema = z.array(z.object({
    name: z.string().nullish(),
    type: z.string().nullish(),
    web_url: z.string().nullish(),
}));

export type OmdbTitle = z.infer<typeof omdbTitleSchema>;
export type WatchmodeSource = z.infer<typeof watchmodeSourcesSchema>[number];
