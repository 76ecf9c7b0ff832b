/**
 * Open Library Normalizer
 * Normalizes search docs to book ReleaseRecords
 */
import type { OpenLibraryItem } from '../fetchers/types.js';
import { dedupService } from '../services/dedup.service.js';
import { cleanText, cleanTitle, firstString, nonEmpty } from './text.js';
import type { Normalizer } from './types.js';

const COVERS_BASE = 'https://covers.openlibrary.org/b';

// Library housekeeping, not genres
const GENERIC_SUBJECTS = new Set([
    'fiction',
    'accessible book',
    'protected daisy',
    'in library',
    'large type books',
    'lending library',
]);

const MAX_GENRES = 5;
const MAX_SUBJECT_LENGTH = 40;

/**
 * ISBN-13 preferred, else ISBN-10
 */
export function pickIsbn(isbns: string[]): string | null {
    return isbns.find(isbn => isbn.length === 13)
        ?? isbns.find(isbn => isbn.length === 10)
        ?? null;
}

export function coverUrl(coverId: number | null | undefined, isbn: string | null): string | null {
    if (coverId) return `${COVERS_BASE}/id/${coverId}-L.jpg`;
    if (isbn) return `${COVERS_BASE}/isbn/${isbn}-L.jpg`;
    return null;
}

export function pickGenres(subjects: string[]): string[] {
    return subjects
        .map(subject => subject.trim())
        .filter(subject => subject.length > 0
            && subject.length < MAX_SUBJECT_LENGTH
            && !GENERIC_SUBJECTS.has(subject.toLowerCase()))
        .slice(0, MAX_GENRES);
}

/**
 * Every language the editions are in, lower-cased, first listed first
 */
export function bookLanguages(value: string | string[] | null | undefined): string[] {
    if (value === null || value === undefined) return [];
    const listed = Array.isArray(value) ? value : [value];
    return [...new Set(nonEmpty(listed).map(language => language.toLowerCase()))];
}

/**
 * "science_fiction" -> "Science Fiction"
 */
function subjectLabel(subject: string): string {
    return subject
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}

export const openLibraryNormalizer: Normalizer<OpenLibraryItem> = {
    provider: 'open_library',

    normalize(item, targetDate) {
        const { doc } = item;
        const title = cleanTitle(doc.title);
        const isbn = pickIsbn(doc.isbn);
        const languages = bookLanguages(doc.language);

        const externalIds: Record<string, string> = { open_library: doc.key };
        if (isbn) externalIds['isbn'] = isbn;

        return {
            id: dedupService.generateReleaseId('book', title, targetDate),
            mediaType: 'book',
            source: 'open_library',

            title,
            releaseDate: targetDate,

            synopsis: firstString(doc.first_sentence),
            genres: pickGenres(doc.subject),
            runtimeMinutes: null,
            category: subjectLabel(item.subject),
            coverArtUrl: coverUrl(doc.cover_i, isbn),
            language: languages[0] ?? null,
            // Ratings count is the best relevance signal Open Library offers
            popularity: doc.ratings_count ?? null,

            externalIds,
            details: {
                providerDate: item.monthMatch ? targetDate : String(doc.first_publish_year ?? ''),
                monthMatch: item.monthMatch,
                languages,
                authors: nonEmpty(doc.author_name),
                publisher: cleanText(doc.publisher[0]),
                pageCount: doc.number_of_pages_median ?? null,
                averageRating: doc.ratings_average ?? null,
                editionCount: doc.edition_count ?? null,
                workKey: doc.key,
            },
        };
    },
};
