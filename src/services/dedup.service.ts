/**
 * Deduplication service
 * Stable release ids and canonical record selection across providers
 */
import { createHash } from 'crypto';
import type { MediaType } from '../fetchers/types.js';
import type { ReleaseRecord } from '../normalizers/types.js';

export interface DedupResult {
    records: ReleaseRecord[];
    removed: Partial<Record<MediaType, number>>;
}

/**
 * Unicode NFKC, trimmed, inner whitespace collapsed, lower-cased
 */
export function normalizeTitle(title: string): string {
    return title.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Same logical release, same id: across runs and across providers
 */
export function generateReleaseId(mediaType: MediaType, title: string, releaseDate: string): string {
    const data = `${mediaType}|${normalizeTitle(title)}|${releaseDate}`;
    return `${mediaType}-${createHash('sha256').update(data).digest('hex').substring(0, 16)}`;
}

function dedupKey(record: ReleaseRecord): string {
    return `${record.mediaType}|${normalizeTitle(record.title)}|${record.releaseDate}`;
}

/**
 * Number of populated optional fields
 */
export function metadataScore(record: ReleaseRecord): number {
    const fields = [
        record.synopsis,
        record.runtimeMinutes,
        record.category,
        record.coverArtUrl,
        record.language,
        record.popularity,
    ];
    return fields.filter(value => value !== null).length + (record.genres.length > 0 ? 1 : 0);
}

function externalIdFingerprint(record: ReleaseRecord): string {
    const entries = Object.entries(record.externalIds).sort(([a], [b]) => compareStrings(a, b));
    return JSON.stringify(entries);
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Total order used to pick the canonical record of a group (lowest wins)
 */
export function compareCanonical(a: ReleaseRecord, b: ReleaseRecord): number {
    return metadataScore(b) - metadataScore(a)
        || compareStrings(a.source, b.source)
        || compareStrings(externalIdFingerprint(a), externalIdFingerprint(b))
        || compareStrings(a.title, b.title)
        || compareStrings(JSON.stringify(a), JSON.stringify(b));
}

/**
 * Collapse records describing the same release into one.
 * Deterministic, independent of input order, and idempotent.
 */
export function deduplicate(records: readonly ReleaseRecord[]): DedupResult {
    const groups = new Map<string, ReleaseRecord>();
    const removed: Partial<Record<MediaType, number>> = {};

    for (const record of records) {
        const key = dedupKey(record);
        const current = groups.get(key);

        if (current === undefined) {
            groups.set(key, record);
            continue;
        }

        removed[record.mediaType] = (removed[record.mediaType] ?? 0) + 1;
        if (compareCanonical(record, current) < 0) {
            groups.set(key, record);
        }
    }

    const kept = Array.from(groups.values()).sort((a, b) => compareStrings(a.id, b.id) || compareCanonical(a, b));
    return { records: kept, removed };
}

export const dedupService = {
    normalizeTitle,
    generateReleaseId,
    deduplicate,
};
