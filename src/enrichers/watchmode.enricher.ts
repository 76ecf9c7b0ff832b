/**
 * Watchmode Enricher
 * Where a movie or show can be streamed, rented or bought
 */
import { watchmodeSearchSchema, watchmodeSourcesSchema, type WatchmodeSource } from '../fetchers/schemas.js';
import { cleanText } from '../normalizers/text.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import { LookupBudget } from '../services/budget.js';
import type { EnrichContext, Enricher, RecordPatch } from './types.js';

export const WATCHMODE_BASE = 'https://api.watchmode.com/v1';

export type StreamingOffer = {
    type: string | null;
    url: string | null;
};

/**
 * One offer per service name, first listed wins
 */
export function pickStreaming(sources: readonly WatchmodeSource[]): Record<string, StreamingOffer> {
    const streaming: Record<string, StreamingOffer> = {};
    for (const source of sources) {
        const name = cleanText(source.name);
        if (name === null || name in streaming) continue;
        streaming[name] = { type: cleanText(source.type), url: cleanText(source.web_url) };
    }
    return streaming;
}

class WatchmodeEnricher implements Enricher {
    readonly name = 'watchmode_streaming';
    readonly budget: LookupBudget;

    constructor(private readonly apiKey: string, limit: number) {
        this.budget = new LookupBudget(this.name, limit);
    }

    eligible(record: ReleaseRecord): boolean {
        return record.mediaType === 'movie' || record.mediaType === 'tv';
    }

    async lookup(record: ReleaseRecord, ctx: EnrichContext): Promise<RecordPatch | null> {
        const client = ctx.client('watchmode');

        const search = await client.fetchParsed(`${WATCHMODE_BASE}/search/`, watchmodeSearchSchema, 'title search', {
            query: {
                apiKey: this.apiKey,
                search_field: 'name',
                search_value: record.title,
                types: record.mediaType === 'movie' ? 'movie' : 'tv_series',
            },
        });
        const match = search.title_results[0];
        if (!match) return null;

        // The sources call is a second lookup against the same budget
        if (!this.budget.tryConsume()) return null;

        const sources = await client.fetchParsed(
            `${WATCHMODE_BASE}/title/${match.id}/sources/`,
            watchmodeSourcesSchema,
            'title sources',
            { query: { apiKey: this.apiKey } }
        );
        const streaming = pickStreaming(sources);
        if (Object.keys(streaming).length === 0) return null;

        return {
            details: { streaming },
            externalIds: { watchmode: String(match.id) },
        };
    }
}

export function createWatchmodeEnricher(apiKey: string, limit: number): Enricher {
    return new WatchmodeEnricher(apiKey, limit);
}
