/**
 * In-process stand-ins for every provider API, serving one small day of releases
 * for 2026-02-10. Routed by hostname so a test can replace one service.
 */
import { jsonResponse, type FetchHandler } from './fixtures.js';

export const WORLD_DATE = '2026-02-10';
const WORLD_START = 1770681600; // 2026-02-10T00:00:00Z

const tmdb: FetchHandler = url => {
    switch (url.pathname) {
        case '/3/genre/movie/list':
            return jsonResponse({ genres: [{ id: 18, name: 'Drama' }, { id: 878, name: 'Science Fiction' }] });
        case '/3/genre/tv/list':
            return jsonResponse({ genres: [{ id: 18, name: 'Drama' }, { id: 10763, name: 'News' }] });
        case '/3/discover/movie':
            return jsonResponse({
                page: 1,
                total_pages: 1,
                results: [
                    { id: 1, title: 'The Quiet Harbor', overview: 'A keeper finds a letter.', poster_path: '/harbor.jpg', genre_ids: [18], original_language: 'en', popularity: 40 },
                    { id: 2, title: 'Short Film', overview: 'Brief.', genre_ids: [18], original_language: 'en', popularity: 30 },
                    { id: 3, title: 'Dune Sea', overview: 'Sand.', genre_ids: [878], original_language: 'en', popularity: 20 },
                ],
            });
        case '/3/movie/1':
            return jsonResponse({ runtime: 104, imdb_id: 'tt0000001' });
        case '/3/movie/2':
            return jsonResponse({ runtime: 35, imdb_id: null });
        case '/3/movie/3':
            return jsonResponse({ runtime: 150, imdb_id: 'tt0000003' });
        case '/3/discover/tv':
            return jsonResponse({
                page: 1,
                total_pages: 1,
                results: [
                    { id: 10, name: 'Night Desk', overview: 'Headlines.', genre_ids: [10763], popularity: 9 },
                    { id: 11, name: 'Harbor Lights', overview: 'A town by the sea.', genre_ids: [18], original_language: 'en', popularity: 8 },
                ],
            });
        case '/3/tv/10':
        case '/3/tv/11':
            return jsonResponse({ networks: [{ name: 'Channel 9' }], episode_run_time: [42] });
        default:
            return jsonResponse({ status_message: 'not found' }, 404);
    }
};

const openLibrary: FetchHandler = url => {
    if (url.pathname === '/works/OL3W.json') {
        return jsonResponse({ description: { type: '/type/text', value: 'A house under a loud roof.' } });
    }
    if (url.pathname.startsWith('/works/')) {
        return jsonResponse({ error: 'notfound' }, 404);
    }
    if (url.searchParams.get('subject') !== 'fiction') {
        return jsonResponse({ numFound: 0, docs: [] });
    }
    return jsonResponse({
        numFound: 5,
        docs: [
            {
                key: '/works/OL1W',
                title: 'Salt Letters',
                publish_date: ['February 2026'],
                first_publish_year: 2026,
                isbn: ['9780000000001'],
                language: ['eng'],
                ratings_count: 12,
                first_sentence: ['The tide came in twice that day.'],
            },
            { key: '/works/OL2W', title: 'salt  letters ', first_publish_year: 2026, language: ['eng'] },
            { key: '/works/OL3W', title: 'Tin Roof', first_publish_year: 2026, language: ['eng'] },
            { key: '/works/OL4W', title: 'Das Haus', first_publish_year: 2026, language: ['ger'] },
            { key: '/works/OLBAD' },
        ],
    });
};

const twitch: FetchHandler = () =>
    jsonResponse({ access_token: 'test-access-token', expires_in: 3600, token_type: 'bearer' });

const igdb: FetchHandler = url => {
    switch (url.pathname) {
        case '/v4/games':
            return jsonResponse([
                { id: 1, name: 'Orbit Farm', summary: 'Grow crops in orbit.', first_release_date: WORLD_START, rating: 81.5, cover: 77, genres: [5], platforms: [6] },
            ]);
        case '/v4/covers':
            return jsonResponse([{ id: 77, game: 1, image_id: 'co77' }]);
        case '/v4/genres':
            return jsonResponse([{ id: 5, name: 'Simulator' }]);
        case '/v4/platforms':
            return jsonResponse([{ id: 6, name: 'PC (Microsoft Windows)' }]);
        default:
            return jsonResponse([], 404);
    }
};

const jikan: FetchHandler = () => jsonResponse({
    data: [
        { mal_id: 5001, title: 'Star Kitchen', synopsis: 'Cooking in space.', type: 'TV', duration: '23 min per ep', members: 1500, genres: [{ name: 'Comedy' }] },
    ],
    pagination: { has_next_page: false },
});

const musicBrainz: FetchHandler = () => jsonResponse({
    count: 2,
    offset: 0,
    releases: [
        { id: 'mbid-1', title: 'Low Tide', date: WORLD_DATE, 'release-group': { 'primary-type': 'Album' }, media: [{ format: 'CD', 'track-count': 10 }] },
        { id: 'mbid-2', title: 'One Song', date: WORLD_DATE, 'release-group': { 'primary-type': 'Single' } },
    ],
});

const coverArt: FetchHandler = url => {
    if (url.pathname !== '/release/mbid-1') {
        return jsonResponse({ error: 'not found' }, 404);
    }
    return jsonResponse({
        images: [{ front: true, image: 'https://coverartarchive.org/release/mbid-1/1.jpg', thumbnails: { '500': 'https://coverartarchive.org/release/mbid-1/1-500.jpg' } }],
    });
};

export const PROVIDER_HOSTS = {
    tmdb: 'api.themoviedb.org',
    openLibrary: 'openlibrary.org',
    twitch: 'id.twitch.tv',
    igdb: 'api.igdb.com',
    jikan: 'api.jikan.moe',
    musicBrainz: 'musicbrainz.org',
    coverArt: 'coverartarchive.org',
} as const;

const WORLD: Record<string, FetchHandler> = {
    [PROVIDER_HOSTS.tmdb]: tmdb,
    [PROVIDER_HOSTS.openLibrary]: openLibrary,
    [PROVIDER_HOSTS.twitch]: twitch,
    [PROVIDER_HOSTS.igdb]: igdb,
    [PROVIDER_HOSTS.jikan]: jikan,
    [PROVIDER_HOSTS.musicBrainz]: musicBrainz,
    [PROVIDER_HOSTS.coverArt]: coverArt,
};

/**
 * Handler serving the whole world, with some hosts replaced
 */
export function providerWorld(overrides: Record<string, FetchHandler> = {}): FetchHandler {
    return (url, init) => {
        const handler = overrides[url.hostname] ?? WORLD[url.hostname];
        if (!handler) {
            throw new TypeError(`fetch failed: no stand-in for ${url.hostname}`);
        }
        return handler(url, init);
    };
}
