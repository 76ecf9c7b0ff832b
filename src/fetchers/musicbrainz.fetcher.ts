/**
 * MusicBrainz Release Search Fetcher
 * MusicBrainz allows one request per second and requires a descriptive User-Agent
 */
import { loadEnvelope, parseItems } from './validate.js';
import { musicBrainzReleaseSchema, musicBrainzSearchSchema } from './schemas.js';
import type { Fetcher, MusicBrainzItem } from './types.js';

export const MUSICBRAINZ_API_BASE = 'https://musicbrainz.org/ws/2';

const PAGE_SIZE = 100;
const MAX_RESULTS = 300;

export const musicBrainzFetcher: Fetcher<MusicBrainzItem> = {
    provider: 'musicbrainz',
    mediaTypes: ['music'],

    missingCredentials() {
        return [];
    },

    async *fetch(query, ctx) {
        const client = ctx.client('musicbrainz');
        let offset = 0;
        let total = MAX_RESULTS;
        let releases = 0;

        while (offset < Math.min(total, MAX_RESULTS)) {
            const data = await loadEnvelope(ctx, () => client.fetchParsed(
                `${MUSICBRAINZ_API_BASE}/release`,
                musicBrainzSearchSchema,
                'release search page',
                { query: { query: `date:${query.targetDate}`, fmt: 'json', limit: PAGE_SIZE, offset } }
            ));
            if (!data) break;

            total = data.count;

            for (const release of parseItems('musicbrainz', musicBrainzReleaseSchema, data.releases, ctx, 'release')) {
                releases++;
                yield { provider: 'musicbrainz', mediaType: 'music', release };
            }

            // An empty page means the search index ran out early
            if (data.releases.length === 0) break;
            offset += data.releases.length;
        }

        ctx.logger.info('MusicBrainz releases fetched', { targetDate: query.targetDate, releases });
    },
};
