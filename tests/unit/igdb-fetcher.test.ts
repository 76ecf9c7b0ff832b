/**
 * IGDB Fetcher Tests
 */
import { describe, it, expect } from 'vitest';
import { ProviderAuthError } from '../../src/fetchers/errors.js';
import { buildGamesQuery, igdbFetcher } from '../../src/fetchers/igdb.fetcher.js';
import { createFetchContext, drain, jsonResponse, stubFetch, testConfig } from '../helpers/fixtures.js';

const DATE = '2026-02-10';
const START = 1770681600; // 2026-02-10T00:00:00Z

const game = {
    id: 1,
    name: 'Orbit Farm',
    summary: 'Grow crops in orbit.',
    first_release_date: START,
    rating: 81.5,
    cover: 77,
    genres: [5],
    platforms: [6, 999],
};

function bodyOf(init?: RequestInit): string {
    return typeof init?.body === 'string' ? init.body : '';
}

function bearerOf(init?: RequestInit): string | null {
    return new Headers(init?.headers).get('authorization');
}

interface IgdbStub {
    tokens: number;
    gameBodies: string[];
}

/**
 * Twitch issues tok-1, tok-2, ...; `acceptToken` decides which bearer IGDB honours
 */
function stubIgdb(acceptToken: (bearer: string | null) => boolean, games: (body: string) => unknown[] = () => [game]): IgdbStub {
    const state: IgdbStub = { tokens: 0, gameBodies: [] };

    stubFetch((url, init) => {
        if (url.hostname === 'id.twitch.tv') {
            state.tokens++;
            return jsonResponse({ access_token: `tok-${state.tokens}`, expires_in: 3600, token_type: 'bearer' });
        }
        if (!acceptToken(bearerOf(init))) {
            return jsonResponse({ message: 'Authorization Failure' }, 401);
        }

        switch (url.pathname) {
            case '/v4/games':
                state.gameBodies.push(bodyOf(init));
                return jsonResponse(games(bodyOf(init)));
            case '/v4/covers':
                return jsonResponse([{ id: 77, game: 1, image_id: 'co77' }]);
            case '/v4/genres':
                return jsonResponse([{ id: 5, name: 'Shooter' }]);
            case '/v4/platforms':
                return jsonResponse([{ id: 6, name: 'PC (Microsoft Windows)' }]);
            default:
                return jsonResponse([], 404);
        }
    });

    return state;
}

describe('buildGamesQuery', () => {
    it('should select a half-open release window sorted by rating', () => {
        expect(buildGamesQuery(100, 200)).toBe(
            'fields name, summary, first_release_date, rating, total_rating_count, cover, genres, platforms; ' +
            'where first_release_date >= 100 & first_release_date < 200; sort rating desc; limit 50;'
        );
    });
});

describe('IGDB Fetcher', () => {
    it('should require both Twitch credentials', () => {
        expect(igdbFetcher.missingCredentials(testConfig({ IGDB_CLIENT_ID: '', IGDB_CLIENT_SECRET: '' }).credentials))
            .toEqual(['IGDB_CLIENT_ID', 'IGDB_CLIENT_SECRET']);
        expect(igdbFetcher.missingCredentials(testConfig({ IGDB_CLIENT_SECRET: '' }).credentials))
            .toEqual(['IGDB_CLIENT_SECRET']);
    });

    it('should resolve covers, genres and platforms', async () => {
        const state = stubIgdb(() => true);
        const { ctx } = createFetchContext();

        const items = await drain(igdbFetcher, DATE, ctx);

        expect(items).toHaveLength(1);
        expect(items[0]).toMatchObject({
            coverImageId: 'co77',
            genreNames: ['Shooter'],
            platformNames: ['PC (Microsoft Windows)'],
        });
        expect(state.tokens).toBe(1);
        expect(state.gameBodies).toEqual([buildGamesQuery(START, START + 86_400)]);
    });

    it('should refresh the token once after a 401', async () => {
        const state = stubIgdb(bearer => bearer !== 'Bearer tok-1');
        const { ctx } = createFetchContext();

        const items = await drain(igdbFetcher, DATE, ctx);

        expect(items).toHaveLength(1);
        expect(state.tokens).toBe(2);
    });

    it('should give up when a fresh token is rejected too', async () => {
        const state = stubIgdb(() => false);
        const { ctx } = createFetchContext();

        const failure = drain(igdbFetcher, DATE, ctx);

        await expect(failure).rejects.toBeInstanceOf(ProviderAuthError);
        await expect(failure).rejects.toThrow('IGDB rejected a freshly issued token');
        expect(state.tokens).toBe(2);
    });

    it('should widen the window when nothing released on the exact date', async () => {
        const exact = buildGamesQuery(START, START + 86_400);
        const state = stubIgdb(() => true, body => (body === exact ? [] : [game]));
        const { ctx } = createFetchContext();

        const items = await drain(igdbFetcher, DATE, ctx);

        expect(items).toHaveLength(1);
        expect(state.gameBodies).toEqual([exact, buildGamesQuery(START - 86_400, START + 2 * 86_400)]);
    });
});
