/**
 * Aggregator Service Tests
 * Ordering, grouping and batch assembly
 */
import { describe, it, expect } from 'vitest';
import {
    buildBatch,
    compareForOutput,
    describeFilters,
    groupByMediaType,
    type SourceStat,
} from '../../src/services/aggregator.service.js';
import type { ProviderName } from '../../src/fetchers/types.js';
import { makeRecord, testConfig } from '../helpers/fixtures.js';

const DATE = '2026-02-10';
const GENERATED_AT = new Date('2026-02-11T06:00:00.000Z');

describe('compareForOutput', () => {
    it('should put the most popular first and unknown popularity last', () => {
        const records = [
            makeRecord({ id: 'movie-a', title: 'Alpha', popularity: null }),
            makeRecord({ id: 'movie-b', title: 'Bravo', popularity: 2 }),
            makeRecord({ id: 'movie-c', title: 'Charlie', popularity: 9 }),
        ];

        expect([...records].sort(compareForOutput).map(record => record.title)).toEqual(['Charlie', 'Bravo', 'Alpha']);
    });

    it('should break ties by title and then id', () => {
        const records = [
            makeRecord({ id: 'movie-2', title: 'Same', popularity: 5 }),
            makeRecord({ id: 'movie-1', title: 'Same', popularity: 5 }),
            makeRecord({ id: 'movie-3', title: 'Earlier', popularity: 5 }),
        ];

        expect([...records].sort(compareForOutput).map(record => record.id)).toEqual(['movie-3', 'movie-1', 'movie-2']);
    });

    it('should order two unknown popularities by title', () => {
        const unknownB = makeRecord({ title: 'B', popularity: null });
        const unknownA = makeRecord({ title: 'A', popularity: null });

        expect(compareForOutput(unknownB, unknownA)).toBeGreaterThan(0);
    });
});

describe('groupByMediaType', () => {
    it('should file every record under its media type', () => {
        const groups = groupByMediaType([
            makeRecord({ id: 'game-1', mediaType: 'game', source: 'igdb' }),
            makeRecord({ id: 'movie-1' }),
            makeRecord({ id: 'game-2', mediaType: 'game', source: 'igdb', popularity: 3 }),
        ]);

        expect(groups.game.map(record => record.id)).toEqual(['game-2', 'game-1']);
        expect(groups.movie.map(record => record.id)).toEqual(['movie-1']);
        expect(groups.music).toEqual([]);
    });
});

describe('buildBatch', () => {
    const stats: Partial<Record<ProviderName, SourceStat>> = {
        musicbrainz: { status: 'ok', records: 1, schemaErrors: 0, durationMs: 40.4 },
        tmdb: { status: 'failed', records: 0, schemaErrors: 2, durationMs: 12.6, error: 'tmdb responded with HTTP 500' },
        igdb: { status: 'skipped', records: 0, schemaErrors: 0, durationMs: 0, error: 'Missing IGDB_CLIENT_ID' },
    };

    it('should report source stats in provider order and list only failures as errors', () => {
        const batch = buildBatch(DATE, [], stats, testConfig().filters, GENERATED_AT);

        expect(Object.keys(batch.source_stats)).toEqual(['tmdb', 'igdb', 'musicbrainz']);
        expect(batch.source_stats.tmdb).toEqual({
            status: 'failed',
            records: 0,
            schema_errors: 2,
            duration_ms: 13,
            error: 'tmdb responded with HTTP 500',
        });
        expect(batch.source_stats.musicbrainz).toEqual({ status: 'ok', records: 1, schema_errors: 0, duration_ms: 40 });
        expect(batch.errors).toEqual(['tmdb: tmdb responded with HTTP 500']);
    });

    it('should omit errors when nothing failed', () => {
        const batch = buildBatch(DATE, [], { jikan: { status: 'ok', records: 0, schemaErrors: 0, durationMs: 1 } }, testConfig().filters, GENERATED_AT);

        expect('errors' in batch).toBe(false);
        expect(batch.total_releases).toBe(0);
        expect(batch.generated_at).toBe('2026-02-11T06:00:00.000Z');
    });

    it('should serialize records in snake_case', () => {
        const batch = buildBatch(
            DATE,
            [makeRecord({ id: 'movie-x', runtimeMinutes: 95, coverArtUrl: 'https://image.tmdb.org/t/p/w500/x.jpg', externalIds: { tmdb: '7' } })],
            {},
            testConfig().filters,
            GENERATED_AT
        );

        expect(batch.total_releases).toBe(1);
        expect(batch.releases.movie).toEqual([{
            id: 'movie-x',
            media_type: 'movie',
            title: 'Test Title',
            release_date: DATE,
            source: 'tmdb',
            synopsis: 'A synopsis.',
            genres: [],
            runtime_minutes: 95,
            category: null,
            cover_art_url: 'https://image.tmdb.org/t/p/w500/x.jpg',
            language: null,
            popularity: null,
            external_ids: { tmdb: '7' },
            details: {},
        }]);
    });
});

describe('describeFilters', () => {
    it('should echo the effective filter settings', () => {
        const applied = describeFilters(testConfig({ INCLUDE_SINGLES: 'yes', LANGUAGE_FILTER: 'EN', BOOK_LANGUAGES: 'eng' }).filters);

        expect(applied).toMatchObject({ include_singles: true, language_filter: 'en', book_languages: ['eng'] });
    });
});
