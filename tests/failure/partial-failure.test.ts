/**
 * Partial Failure Tests
 * Failing providers are reported in the batch; the others still land on disk
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Enricher } from '../../src/enrichers/index.js';
import { runAggregation, type AggregatorOptions } from '../../src/services/aggregator.service.js';
import { LookupBudget } from '../../src/services/budget.js';
import { calledUrls, instantThrottle, jsonResponse, noSleep, stubFetch, testConfig } from '../helpers/fixtures.js';
import { PROVIDER_HOSTS, WORLD_DATE, providerWorld } from '../helpers/providers.js';

const runOptions = (): AggregatorOptions => ({
    runId: 'failure-run',
    throttle: instantThrottle(),
    sleep: noSleep,
    now: () => new Date('2026-02-11T06:00:00.000Z'),
});

describe('Partial provider failure', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await mkdtemp(join(tmpdir(), 'unreeled-failure-'));
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    it('should write the batch when IGDB and Jikan keep answering 503', async () => {
        const mockFetch = stubFetch(providerWorld({
            [PROVIDER_HOSTS.igdb]: () => jsonResponse({ message: 'unavailable' }, 503),
            [PROVIDER_HOSTS.jikan]: () => jsonResponse({ message: 'unavailable' }, 503),
        }));

        const result = await runAggregation(WORLD_DATE, testConfig({ OUTPUT_DIR: outputDir }), runOptions());
        const { batch } = result;

        expect(batch.releases.game).toEqual([]);
        expect(batch.releases.anime).toEqual([]);
        expect(batch.releases.movie).toHaveLength(2);
        expect(batch.releases.book).toHaveLength(2);
        expect(batch.releases.music).toHaveLength(1);

        expect(batch.source_stats.igdb).toMatchObject({ status: 'failed', records: 0, error: 'igdb responded with HTTP 503' });
        expect(batch.source_stats.jikan).toMatchObject({ status: 'failed', records: 0, error: 'jikan responded with HTTP 503' });
        expect(batch.source_stats.tmdb?.status).toBe('ok');
        expect(batch.errors).toEqual([
            'igdb: igdb responded with HTTP 503',
            'jikan: jikan responded with HTTP 503',
        ]);

        // 3 attempts each under the test retry policy
        const hosts = calledUrls(mockFetch).map(url => url.hostname);
        expect(hosts.filter(host => host === PROVIDER_HOSTS.jikan)).toHaveLength(3);
        expect(hosts.filter(host => host === PROVIDER_HOSTS.igdb)).toHaveLength(3);

        const written: unknown = JSON.parse(await readFile(result.outputPath, 'utf-8'));
        expect(written).toMatchObject({ total_releases: 6, errors: batch.errors });
    });

    it('should drop everything an adapter yielded before it failed', async () => {
        let page = 0;
        stubFetch(providerWorld({
            [PROVIDER_HOSTS.musicBrainz]: () => {
                page++;
                return page === 1
                    ? jsonResponse({ count: 200, releases: [{ id: 'mbid-1', title: 'Low Tide', 'release-group': { 'primary-type': 'Album' } }] })
                    : jsonResponse({ error: 'bad gateway' }, 502);
            },
        }));

        const { batch } = await runAggregation(WORLD_DATE, testConfig({ OUTPUT_DIR: outputDir }), runOptions());

        expect(batch.releases.music).toEqual([]);
        expect(batch.source_stats.musicbrainz).toMatchObject({ status: 'failed', records: 0 });
        expect(batch.errors).toEqual(['musicbrainz: musicbrainz responded with HTTP 502']);
    });

    it('should report rejected credentials without affecting other providers', async () => {
        stubFetch(providerWorld({
            [PROVIDER_HOSTS.tmdb]: () => jsonResponse({ status_message: 'Invalid API key' }, 401),
        }));

        const { batch } = await runAggregation(WORLD_DATE, testConfig({ OUTPUT_DIR: outputDir }), runOptions());

        expect(batch.source_stats.tmdb).toMatchObject({ status: 'failed', error: 'tmdb responded with HTTP 401' });
        expect(batch.releases.game).toHaveLength(1);
        expect(batch.total_releases).toBe(5);
    });
});

describe('Malformed records', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await mkdtemp(join(tmpdir(), 'unreeled-records-'));
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    it('should still write the batch when a record has a blank title or a relative image', async () => {
        stubFetch(providerWorld({
            [PROVIDER_HOSTS.jikan]: () => jsonResponse({
                data: [
                    { mal_id: 5001, title: 'Star Kitchen', images: { jpg: { image_url: '/images/anime/1.jpg' } } },
                    { mal_id: 5002, title: '   ' },
                ],
                pagination: { has_next_page: false },
            }),
        }));

        const result = await runAggregation(WORLD_DATE, testConfig({ OUTPUT_DIR: outputDir }), runOptions());
        const { batch } = result;

        expect(batch.releases.anime.map(record => [record.title, record.cover_art_url])).toEqual([['Star Kitchen', null]]);
        expect(batch.source_stats.jikan).toMatchObject({ status: 'ok', records: 2, schema_errors: 1 });
        expect(batch.total_releases).toBe(8);

        const written: unknown = JSON.parse(await readFile(result.outputPath, 'utf-8'));
        expect(written).toMatchObject({ total_releases: 8 });
    });

    it('should drop a record the output schema rejects and write the rest', async () => {
        stubFetch(providerWorld());
        const brokenArt: Enricher = {
            name: 'broken_art',
            budget: new LookupBudget('broken_art', 5),
            eligible: record => record.mediaType === 'game',
            lookup: async () => ({ coverArtUrl: 'cover.jpg' }),
        };

        const result = await runAggregation(WORLD_DATE, testConfig({ OUTPUT_DIR: outputDir }), {
            ...runOptions(),
            enrichers: [brokenArt],
        });

        expect(result.batch.releases.game).toEqual([]);
        expect(result.batch.source_stats.igdb).toMatchObject({ status: 'ok', records: 1, schema_errors: 1 });
        expect(result.batch.total_releases).toBe(7);

        const written: unknown = JSON.parse(await readFile(result.outputPath, 'utf-8'));
        expect(written).toMatchObject({ total_releases: 7 });
    });
});
