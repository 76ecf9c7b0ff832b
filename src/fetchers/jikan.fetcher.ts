/**
 * Jikan (MyAnimeList) Schedule Fetcher
 * Anime airing on the target date's weekday
 */
import { weekdayOf } from '../utils/dates.js';
import { loadEnvelope, parseItems } from './validate.js';
import { jikanAnimeSchema, jikanScheduleSchema } from './schemas.js';
import type { Fetcher, JikanItem } from './types.js';

export const JIKAN_API_BASE = 'https://api.jikan.moe/v4';

const MAX_PAGES = 3;
const PAGE_SIZE = 25;

export const jikanFetcher: Fetcher<JikanItem> = {
    provider: 'jikan',
    mediaTypes: ['anime'],

    missingCredentials() {
        return [];
    },

    async *fetch(query, ctx) {
        const client = ctx.client('jikan');
        const weekday = weekdayOf(query.targetDate);
        const seen = new Set<number>();

        for (let page = 1; page <= MAX_PAGES; page++) {
            const data = await loadEnvelope(ctx, () => client.fetchParsed(
                `${JIKAN_API_BASE}/schedules`,
                jikanScheduleSchema,
                'schedule page',
                { query: { filter: weekday, page, limit: PAGE_SIZE } }
            ));
            if (!data) break;

            for (const anime of parseItems('jikan', jikanAnimeSchema, data.data, ctx, 'anime')) {
                // Jikan repeats entries across schedule pages
                if (seen.has(anime.mal_id)) continue;
                seen.add(anime.mal_id);
                yield { provider: 'jikan', mediaType: 'anime', anime, weekday };
            }

            if (!data.pagination.has_next_page) break;
        }

        ctx.logger.info('Jikan schedule fetched', { targetDate: query.targetDate, weekday, anime: seen.size });
    },
};
