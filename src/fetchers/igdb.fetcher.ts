/**
 * IGDB API v4 Fetcher
 * Games first released on the target date, authenticated through Twitch
 */
import type { z } from 'zod';
import type { ProviderClient } from '../services/provider-client.js';
import { TwitchTokenProvider } from '../services/twitch-auth.js';
import { toUnixSeconds } from '../utils/dates.js';
import { ProviderAuthError } from './errors.js';
import { loadEnvelope, parseItems } from './validate.js';
import { igdbCoverSchema, igdbGameSchema, igdbListSchema, igdbNamedSchema, type IgdbGame } from './schemas.js';
import type { FetchContext, Fetcher, IgdbItem } from './types.js';

export const IGDB_API_BASE = 'https://api.igdb.com/v4';
export const IGDB_IMAGE_BASE = 'https://images.igdb.com/igdb/image/upload/t_cover_big';

const DAY_SECONDS = 86_400;
const GAME_LIMIT = 50;
const LOOKUP_LIMIT = 200;

/**
 * Apicalypse body for games released in [start, end)
 */
export function buildGamesQuery(start: number, end: number): string {
    return [
        'fields name, summary, first_release_date, rating, total_rating_count, cover, genres, platforms;',
        `where first_release_date >= ${start} & first_release_date < ${end};`,
        'sort rating desc;',
        `limit ${GAME_LIMIT};`,
    ].join(' ');
}

function buildLookupQuery(fields: string, ids: number[]): string {
    return `fields ${fields}; where id = (${ids.join(',')}); limit ${LOOKUP_LIMIT};`;
}

/**
 * IGDB POSTs with a bearer token. A 401 means the cached token went stale:
 * refresh it once and repeat the call.
 */
class IgdbApi {
    constructor(
        private readonly client: ProviderClient,
        private readonly tokens: TwitchTokenProvider,
        private readonly clientId: string
    ) { }

    async post<T>(endpoint: string, body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
        try {
            return await this.send(endpoint, body, schema, what);
        } catch (error) {
            if (!(error instanceof ProviderAuthError) || error.status !== 401) throw error;
        }

        this.tokens.invalidate();
        try {
            return await this.send(endpoint, body, schema, what);
        } catch (error) {
            if (error instanceof ProviderAuthError) {
                throw new ProviderAuthError('igdb', 'IGDB rejected a freshly issued token', {
                    status: error.status,
                    cause: error,
                });
            }
            throw error;
        }
    }

    private async send<T>(endpoint: string, body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
        const token = await this.tokens.getToken();
        return this.client.fetchParsed(`${IGDB_API_BASE}/${endpoint}`, schema, what, {
            method: 'POST',
            headers: {
                'Client-ID': this.clientId,
                'Authorization': `Bearer ${token}`,
                'Content-Type': 'text/plain',
            },
            body,
        });
    }
}

async function loadNames(
    api: IgdbApi,
    ctx: FetchContext,
    endpoint: 'genres' | 'platforms',
    ids: number[]
): Promise<Map<number, string>> {
    if (ids.length === 0) return new Map();

    const raw = await loadEnvelope(ctx, () => api.post(endpoint, buildLookupQuery('name', ids), igdbListSchema, `${endpoint} lookup`));
    const entries = parseItems('igdb', igdbNamedSchema, raw ?? [], ctx, endpoint.slice(0, -1));
    return new Map(entries.map(entry => [entry.id, entry.name]));
}

async function loadCovers(api: IgdbApi, ctx: FetchContext, ids: number[]): Promise<Map<number, string>> {
    if (ids.length === 0) return new Map();

    const raw = await loadEnvelope(ctx, () => api.post('covers', buildLookupQuery('game, image_id', ids), igdbListSchema, 'covers lookup'));
    const covers = new Map<number, string>();
    for (const cover of parseItems('igdb', igdbCoverSchema, raw ?? [], ctx, 'cover')) {
        if (cover.image_id) covers.set(cover.id, cover.image_id);
    }
    return covers;
}

function uniqueIds(games: IgdbGame[], pick: (game: IgdbGame) => number[]): number[] {
    return [...new Set(games.flatMap(pick))].sort((a, b) => a - b);
}

export const igdbFetcher: Fetcher<IgdbItem> = {
    provider: 'igdb',
    mediaTypes: ['game'],

    missingCredentials(credentials) {
        const missing: string[] = [];
        if (!credentials.igdbClientId) missing.push('IGDB_CLIENT_ID');
        if (!credentials.igdbClientSecret) missing.push('IGDB_CLIENT_SECRET');
        return missing;
    },

    async *fetch(query, ctx) {
        const { igdbClientId: clientId, igdbClientSecret: clientSecret } = ctx.credentials;
        if (!clientId || !clientSecret) return;

        const tokens = new TwitchTokenProvider(ctx.client('twitch'), { clientId, clientSecret });
        const api = new IgdbApi(ctx.client('igdb'), tokens, clientId);

        const start = toUnixSeconds(query.targetDate);
        const loadGames = async (from: number, to: number): Promise<IgdbGame[]> => {
            const raw = await loadEnvelope(ctx, () => api.post('games', buildGamesQuery(from, to), igdbListSchema, 'games list'));
            return parseItems('igdb', igdbGameSchema, raw ?? [], ctx, 'game');
        };

        let games = await loadGames(start, start + DAY_SECONDS);
        if (games.length === 0) {
            ctx.logger.debug('No IGDB games on the exact date, widening window', { targetDate: query.targetDate });
            games = await loadGames(start - DAY_SECONDS, start + 2 * DAY_SECONDS);
        }
        if (games.length === 0) return;

        const covers = await loadCovers(api, ctx, uniqueIds(games, game => (game.cover ? [game.cover] : [])));
        const genres = await loadNames(api, ctx, 'genres', uniqueIds(games, game => game.genres));
        const platforms = await loadNames(api, ctx, 'platforms', uniqueIds(games, game => game.platforms));

        for (const game of games) {
            yield {
                provider: 'igdb',
                mediaType: 'game',
                game,
                coverImageId: game.cover ? covers.get(game.cover) ?? null : null,
                genreNames: game.genres.flatMap(id => genres.get(id) ?? []),
                platformNames: game.platforms.flatMap(id => platforms.get(id) ?? []),
            };
        }

        ctx.logger.info('IGDB games fetched', { targetDate: query.targetDate, games: games.length });
    },
};
