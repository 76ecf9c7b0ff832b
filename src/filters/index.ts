/**
 * Filter Engine
 * Pure per-media-type rules, evaluated as a conjunction
 */
import type { FilterConfig } from '../config/index.js';
import type { MediaType } from '../fetchers/types.js';
import type { ReleaseRecord } from '../normalizers/types.js';

export interface FilterRule {
    name: string;
    appliesTo: readonly MediaType[];
    /** true keeps the record */
    keep(record: ReleaseRecord, config: FilterConfig): boolean;
}

export interface DroppedRecord {
    record: ReleaseRecord;
    rule: string;
}

export interface FilterResult {
    kept: ReleaseRecord[];
    dropped: DroppedRecord[];
}

function hasLabel(record: ReleaseRecord, label: string): boolean {
    const wanted = label.toLowerCase();
    const labels = record.category === null ? record.genres : [...record.genres, record.category];
    return labels.some(value => value.toLowerCase() === wanted);
}

/**
 * The record's language plus any others its provider listed (details.languages)
 */
function knownLanguages(record: ReleaseRecord): string[] {
    const listed = record.details['languages'];
    const extra = Array.isArray(listed)
        ? listed.filter((value): value is string => typeof value === 'string')
        : [];
    const all = record.language === null ? extra : [record.language, ...extra];
    return all.map(language => language.toLowerCase());
}

export const FILTER_RULES: readonly FilterRule[] = [
    {
        name: 'min-movie-runtime',
        appliesTo: ['movie'],
        // Unknown runtime is not evidence of a short film
        keep: (record, config) => record.runtimeMinutes === null || record.runtimeMinutes >= config.minMovieRuntime,
    },
    {
        name: 'needs-synopsis-or-art',
        appliesTo: ['movie', 'tv'],
        keep: record => record.synopsis !== null || record.coverArtUrl !== null,
    },
    {
        name: 'excluded-tv-category',
        appliesTo: ['tv'],
        keep: (record, config) =>
            (config.includeTalkShows || !hasLabel(record, 'Talk'))
            && (config.includeReality || !hasLabel(record, 'Reality'))
            && (config.includeNews || !hasLabel(record, 'News')),
    },
    {
        name: 'exclude-singles',
        appliesTo: ['music'],
        keep: (record, config) => config.includeSingles || record.category?.toLowerCase() !== 'single',
    },
    {
        name: 'language',
        appliesTo: ['movie', 'tv'],
        keep: (record, config) =>
            config.languageFilter === null
            || record.language === null
            || record.language.toLowerCase() === config.languageFilter,
    },
    {
        name: 'book-language',
        appliesTo: ['book'],
        // Kept when any edition is in an allowed language
        keep: (record, config) => {
            const languages = knownLanguages(record);
            return languages.length === 0 || languages.some(language => config.bookLanguages.includes(language));
        },
    },
];

/**
 * Name of the first rule the record fails, or null when it passes all of them
 */
export function failingRule(record: ReleaseRecord, config: FilterConfig): string | null {
    for (const rule of FILTER_RULES) {
        if (rule.appliesTo.includes(record.mediaType) && !rule.keep(record, config)) {
            return rule.name;
        }
    }
    return null;
}

export function shouldKeep(record: ReleaseRecord, config: FilterConfig): boolean {
    return failingRule(record, config) === null;
}

/**
 * Split records into kept (input order preserved) and dropped
 */
export function applyFilters(records: readonly ReleaseRecord[], config: FilterConfig): FilterResult {
    const kept: ReleaseRecord[] = [];
    const dropped: DroppedRecord[] = [];

    for (const record of records) {
        const rule = failingRule(record, config);
        if (rule === null) {
            kept.push(record);
        } else {
            dropped.push({ record, rule });
        }
    }

    return { kept, dropped };
}
