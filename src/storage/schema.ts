/**
 * Output document schema
 * The batch is validated against this before anything touches the disk
 */
import { z } from 'zod';
import { MEDIA_TYPES, PROVIDER_NAMES } from '../fetchers/types.js';
import type { JsonValue, ReleaseRecord } from '../normalizers/types.js';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD');

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(z.string(), jsonValueSchema),
    ])
);

export const outputRecordSchema = z.object({
    id: z.string().min(1),
    media_type: z.enum(MEDIA_TYPES),
    title: z.string().min(1),
    release_date: isoDateSchema,
    source: z.enum(PROVIDER_NAMES),
    synopsis: z.string().nullable(),
    genres: z.array(z.string()),
    runtime_minutes: z.number().positive().nullable(),
    category: z.string().nullable(),
    cover_art_url: z.string().url().nullable(),
    language: z.string().nullable(),
    popularity: z.number().nullable(),
    external_ids: z.record(z.string(), z.string()),
    details: z.record(z.string(), jsonValueSchema),
});

export const sourceStatSchema = z.object({
    status: z.enum(['ok', 'skipped', 'failed']),
    records: z.number().int().nonnegative(),
    schema_errors: z.number().int().nonnegative(),
    duration_ms: z.number().int().nonnegative(),
    error: z.string().optional(),
});

export const filtersAppliedSchema = z.object({
    min_movie_runtime: z.number().int().nonnegative(),
    include_talk_shows: z.boolean(),
    include_reality: z.boolean(),
    include_news: z.boolean(),
    include_singles: z.boolean(),
    music_cover_art_limit: z.number().int().nonnegative(),
    book_synopsis_limit: z.number().int().nonnegative(),
    language_filter: z.string().nullable(),
    book_languages: z.array(z.string()),
});

export const outputBatchSchema = z.object({
    generated_at: z.string().datetime(),
    date: isoDateSchema,
    total_releases: z.number().int().nonnegative(),
    releases: z.object({
        movie: z.array(outputRecordSchema),
        tv: z.array(outputRecordSchema),
        book: z.array(outputRecordSchema),
        game: z.array(outputRecordSchema),
        anime: z.array(outputRecordSchema),
        music: z.array(outputRecordSchema),
    }),
    source_stats: z.record(z.enum(PROVIDER_NAMES), sourceStatSchema),
    filters_applied: filtersAppliedSchema,
    errors: z.array(z.string()).optional(),
}).superRefine((batch, ctx) => {
    const seen = new Set<string>();
    let total = 0;

    for (const mediaType of MEDIA_TYPES) {
        for (const [index, record] of batch.releases[mediaType].entries()) {
            total++;
            if (record.media_type !== mediaType) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['releases', mediaType, index, 'media_type'],
                    message: `Record filed under ${mediaType} has media_type ${record.media_type}`,
                });
            }
            if (record.release_date !== batch.date) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['releases', mediaType, index, 'release_date'],
                    message: `Release date ${record.release_date} differs from batch date ${batch.date}`,
                });
            }
            if (seen.has(record.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['releases', mediaType, index, 'id'],
                    message: `Duplicate id ${record.id}`,
                });
            }
            seen.add(record.id);
        }
    }

    if (total !== batch.total_releases) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['total_releases'],
            message: `total_releases is ${batch.total_releases} but ${total} records are present`,
        });
    }
});

export type OutputRecord = z.infer<typeof outputRecordSchema>;
export type SourceStatOutput = z.infer<typeof sourceStatSchema>;
export type FiltersApplied = z.infer<typeof filtersAppliedSchema>;
export type OutputBatch = z.infer<typeof outputBatchSchema>;

/**
 * snake_case wire form of a record
 */
export function toOutputRecord(record: ReleaseRecord): OutputRecord {
    return {
        id: record.id,
        media_type: record.mediaType,
        title: record.title,
        release_date: record.releaseDate,
        source: record.source,
        synopsis: record.synopsis,
        genres: record.genres,
        runtime_minutes: record.runtimeMinutes,
        category: record.category,
        cover_art_url: record.coverArtUrl,
        language: record.language,
        popularity: record.popularity,
        external_ids: record.externalIds,
        details: record.details,
    };
}
