/**
 * Open Library Search Fetcher
 * Subject searches narrowed to works first published in the target year
 */
import { monthLabels, yearOf } from '../utils/dates.js';
import { loadEnvelope, parseItems } from './validate.js';
import { openLibraryDocSchema, openLibrarySearchSchema, type OpenLibraryDoc } from './schemas.js';
import type { Fetcher, OpenLibraryItem } from './types.js';

export const OPEN_LIBRARY_BASE = 'https://openlibrary.org';

export const BOOK_SUBJECTS = [
    'fiction',
    'thriller',
    'science_fiction',
    'fantasy',
    'mystery',
    'romance',
    'biography',
    'history',
    'science',
    'horror',
    'literary_fiction',
    'young_adult',
] as const;

const SEARCH_FIELDS = [
    'key',
    'title',
    'author_name',
    'first_publish_year',
    'publish_date',
    'subject',
    'isbn',
    'number_of_pages_median',
    'cover_i',
    'publisher',
    'language',
    'ratings_average',
    'ratings_count',
    'edition_count',
    'first_sentence',
].join(',');

const RESULTS_PER_SUBJECT = 20;

/**
 * Does any edition's publish date mention the target month or year?
 */
export function matchesPublishDate(doc: OpenLibraryDoc, targetDate: string): { matches: boolean; monthMatch: boolean } {
    const labels = monthLabels(targetDate);
    const long = labels.long.toLowerCase();
    const short = labels.short.toLowerCase();
    const year = String(yearOf(targetDate));
    const rawDates = doc.publish_date === undefined || doc.publish_date === null
        ? []
        : Array.isArray(doc.publish_date) ? doc.publish_date : [doc.publish_date];
    const dates = rawDates.map(date => date.toLowerCase());

    const monthMatch = dates.some(date => date.includes(long) || date.includes(short));
    const yearMatch = dates.some(date => date.includes(year)) || doc.first_publish_year === yearOf(targetDate);

    return { matches: monthMatch || yearMatch, monthMatch };
}

export const openLibraryFetcher: Fetcher<OpenLibraryItem> = {
    provider: 'open_library',
    mediaTypes: ['book'],

    missingCredentials() {
        return [];
    },

    async *fetch(query, ctx) {
        const client = ctx.client('open_library');
        const year = yearOf(query.targetDate);
        const seen = new Set<string>();

        for (const subject of BOOK_SUBJECTS) {
            const data = await loadEnvelope(ctx, () => client.fetchParsed(
                `${OPEN_LIBRARY_BASE}/search.json`,
                openLibrarySearchSchema,
                `${subject} search`,
                {
                    query: {
                        subject,
                        first_publish_year: year,
                        sort: 'new',
                        limit: RESULTS_PER_SUBJECT,
                        fields: SEARCH_FIELDS,
                    },
                }
            ));
            // Subjects are independent searches, not pages
            if (!data) continue;

            for (const doc of parseItems('open_library', openLibraryDocSchema, data.docs, ctx, 'search doc')) {
                if (seen.has(doc.key)) continue;

                const { matches, monthMatch } = matchesPublishDate(doc, query.targetDate);
                if (!matches) continue;

                seen.add(doc.key);
                yield { provider: 'open_library', mediaType: 'book', doc, subject, monthMatch };
            }
        }

        ctx.logger.info('Open Library books fetched', { targetDate: query.targetDate, books: seen.size });
    },
};
