/**
 * Open Library Work Enricher
 * Description from the work page for books whose search doc had no synopsis
 */
import { ProviderRequestError } from '../fetchers/errors.js';
import { OPEN_LIBRARY_BASE } from '../fetchers/openlibrary.fetcher.js';
import { openLibraryWorkSchema, type OpenLibraryWork } from '../fetchers/schemas.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import { cleanText } from '../normalizers/text.js';
import { LookupBudget } from '../services/budget.js';
import type { EnrichContext, Enricher, RecordPatch } from './types.js';

type TextValue = OpenLibraryWork['description'];

function textOf(value: TextValue): string | null {
    if (value === null || value === undefined) return null;
    return cleanText(typeof value === 'string' ? value : value.value);
}

/**
 * Description, either plain or { type, value }; first sentence as fallback
 */
export function pickSynopsis(work: OpenLibraryWork): string | null {
    return textOf(work.description) ?? textOf(work.first_sentence);
}

class BookSynopsisEnricher implements Enricher {
    readonly name = 'book_synopsis';
    readonly budget: LookupBudget;

    constructor(limit: number) {
        this.budget = new LookupBudget(this.name, limit);
    }

    eligible(record: ReleaseRecord): boolean {
        return record.mediaType === 'book'
            && record.synopsis === null
            && record.externalIds['open_library'] !== undefined;
    }

    async lookup(record: ReleaseRecord, ctx: EnrichContext): Promise<RecordPatch | null> {
        const workKey = record.externalIds['open_library'];
        if (!workKey) return null;

        try {
            const work = await ctx.client('open_library')
                .fetchParsed(`${OPEN_LIBRARY_BASE}${workKey}.json`, openLibraryWorkSchema, 'work page');
            const synopsis = pickSynopsis(work);
            return synopsis ? { synopsis } : null;
        } catch (error) {
            if (error instanceof ProviderRequestError && error.status === 404) return null;
            throw error;
        }
    }
}

export function createBookSynopsisEnricher(limit: number): Enricher {
    return new BookSynopsisEnricher(limit);
}
