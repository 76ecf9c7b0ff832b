/**
 * Filter Engine Tests
 */
import { describe, it, expect } from 'vitest';
import { applyFilters, failingRule, shouldKeep } from '../../src/filters/index.js';
import { makeRecord, testConfig } from '../helpers/fixtures.js';

const filters = testConfig().filters;

describe('Filter Engine', () => {
    describe('min-movie-runtime', () => {
        it('should drop a 35 minute movie when the minimum is 40', () => {
            const movie = makeRecord({ runtimeMinutes: 35 });

            expect(failingRule(movie, filters)).toBe('min-movie-runtime');
        });

        it('should keep movies at or above the minimum', () => {
            expect(shouldKeep(makeRecord({ runtimeMinutes: 40 }), filters)).toBe(true);
            expect(shouldKeep(makeRecord({ runtimeMinutes: 120 }), filters)).toBe(true);
        });

        it('should keep movies with unknown runtime', () => {
            expect(shouldKeep(makeRecord({ runtimeMinutes: null }), filters)).toBe(true);
        });

        it('should not apply to other media types', () => {
            const anime = makeRecord({ mediaType: 'anime', source: 'jikan', runtimeMinutes: 24 });

            expect(shouldKeep(anime, filters)).toBe(true);
        });
    });

    describe('needs-synopsis-or-art', () => {
        it('should drop movies and shows with neither synopsis nor cover art', () => {
            const bare = { synopsis: null, coverArtUrl: null };

            expect(failingRule(makeRecord(bare), filters)).toBe('needs-synopsis-or-art');
            expect(failingRule(makeRecord({ ...bare, mediaType: 'tv' }), filters)).toBe('needs-synopsis-or-art');
        });

        it('should keep a record with only cover art', () => {
            const record = makeRecord({ synopsis: null, coverArtUrl: 'https://image.tmdb.org/t/p/w500/poster.jpg' });

            expect(shouldKeep(record, filters)).toBe(true);
        });

        it('should not require a synopsis for music', () => {
            const album = makeRecord({ mediaType: 'music', source: 'musicbrainz', synopsis: null, category: 'Album' });

            expect(shouldKeep(album, filters)).toBe(true);
        });
    });

    describe('excluded-tv-category', () => {
        it('should drop talk, reality and news shows by default', () => {
            for (const genre of ['Talk', 'Reality', 'News']) {
                const show = makeRecord({ mediaType: 'tv', genres: ['Comedy', genre] });
                expect(failingRule(show, filters)).toBe('excluded-tv-category');
            }
        });

        it('should match case-insensitively on genres and category', () => {
            expect(shouldKeep(makeRecord({ mediaType: 'tv', genres: ['talk'] }), filters)).toBe(false);
            expect(shouldKeep(makeRecord({ mediaType: 'tv', category: 'NEWS' }), filters)).toBe(false);
        });

        it('should honour the include toggles', () => {
            const talkShow = makeRecord({ mediaType: 'tv', genres: ['Talk'] });
            const permissive = testConfig({ INCLUDE_TALK_SHOWS: 'true' }).filters;

            expect(shouldKeep(talkShow, permissive)).toBe(true);
            expect(shouldKeep(makeRecord({ mediaType: 'tv', genres: ['Talk', 'News'] }), permissive)).toBe(false);
        });

        it('should not drop movies tagged with an excluded genre', () => {
            expect(shouldKeep(makeRecord({ genres: ['News'] }), filters)).toBe(true);
        });
    });

    describe('exclude-singles', () => {
        it('should drop singles unless included', () => {
            const single = makeRecord({ mediaType: 'music', source: 'musicbrainz', category: 'Single' });

            expect(failingRule(single, filters)).toBe('exclude-singles');
            expect(shouldKeep(single, testConfig({ INCLUDE_SINGLES: 'true' }).filters)).toBe(true);
        });

        it('should keep albums and EPs', () => {
            expect(shouldKeep(makeRecord({ mediaType: 'music', category: 'Album' }), filters)).toBe(true);
            expect(shouldKeep(makeRecord({ mediaType: 'music', category: 'EP' }), filters)).toBe(true);
        });
    });

    describe('language', () => {
        const englishOnly = testConfig({ LANGUAGE_FILTER: 'en' }).filters;

        it('should drop movies in another language when a filter is set', () => {
            expect(failingRule(makeRecord({ language: 'fr' }), englishOnly)).toBe('language');
        });

        it('should keep matching and unknown languages', () => {
            expect(shouldKeep(makeRecord({ language: 'en' }), englishOnly)).toBe(true);
            expect(shouldKeep(makeRecord({ language: null }), englishOnly)).toBe(true);
        });

        it('should keep every language without a filter', () => {
            expect(shouldKeep(makeRecord({ language: 'ko' }), filters)).toBe(true);
        });
    });

    describe('book-language', () => {
        it('should drop books in languages outside the allowed list', () => {
            const book = makeRecord({ mediaType: 'book', source: 'open_library', language: 'ger' });

            expect(failingRule(book, filters)).toBe('book-language');
        });

        it('should keep allowed and unknown book languages', () => {
            expect(shouldKeep(makeRecord({ mediaType: 'book', language: 'eng' }), filters)).toBe(true);
            expect(shouldKeep(makeRecord({ mediaType: 'book', language: null }), filters)).toBe(true);
        });

        it('should keep a book when any of its listed languages is allowed', () => {
            const bilingual = makeRecord({
                mediaType: 'book',
                source: 'open_library',
                language: 'spa',
                details: { languages: ['spa', 'eng'] },
            });
            const spanishOnly = makeRecord({
                mediaType: 'book',
                source: 'open_library',
                language: 'spa',
                details: { languages: ['spa', 'cat'] },
            });

            expect(failingRule(bilingual, filters)).toBeNull();
            expect(failingRule(spanishOnly, filters)).toBe('book-language');
        });
    });

    describe('applyFilters', () => {
        it('should return a subset in input order and name the failing rule', () => {
            const records = [
                makeRecord({ id: 'a', runtimeMinutes: 90 }),
                makeRecord({ id: 'b', runtimeMinutes: 35 }),
                makeRecord({ id: 'c', mediaType: 'tv', genres: ['Reality'] }),
                makeRecord({ id: 'd', mediaType: 'game', source: 'igdb' }),
            ];

            const { kept, dropped } = applyFilters(records, filters);

            expect(kept.map(record => record.id)).toEqual(['a', 'd']);
            expect(dropped.map(({ record, rule }) => [record.id, rule])).toEqual([
                ['b', 'min-movie-runtime'],
                ['c', 'excluded-tv-category'],
            ]);
        });

        it('should be deterministic and leave the input untouched', () => {
            const records = [makeRecord({ id: 'a', runtimeMinutes: 10 }), makeRecord({ id: 'b' })];
            const snapshot = JSON.stringify(records);

            const first = applyFilters(records, filters);
            const second = applyFilters(records, filters);

            expect(first).toEqual(second);
            expect(JSON.stringify(records)).toBe(snapshot);
        });
    });
});
