/**
 * Output batch writer
 * One JSON document per target date, replaced atomically
 */
import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ReleaseRecord } from '../normalizers/types.js';
import { logger } from '../observability/logger.js';
import { outputBatchSchema, outputRecordSchema, toOutputRecord, type OutputBatch } from './schema.js';

/**
 * Raised when the assembled batch does not match the output schema
 */
export class OutputValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Output batch failed validation:\n${issues.join('\n')}`);
        this.name = 'OutputValidationError';
        this.issues = issues;
    }
}

export interface RejectedRecord {
    record: ReleaseRecord;
    issues: string[];
}

/**
 * Split records into those the output schema accepts and those it rejects,
 * so one bad record cannot fail the whole batch
 */
export function screenRecords(records: readonly ReleaseRecord[]): { accepted: ReleaseRecord[]; rejected: RejectedRecord[] } {
    const accepted: ReleaseRecord[] = [];
    const rejected: RejectedRecord[] = [];

    for (const record of records) {
        const result = outputRecordSchema.safeParse(toOutputRecord(record));
        if (result.success) {
            accepted.push(record);
        } else {
            rejected.push({
                record,
                issues: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
            });
        }
    }

    return { accepted, rejected };
}

export function getOutputPath(outputDir: string, date: string): string {
    return join(outputDir, `releases_${date}.json`);
}

export function validateBatch(batch: OutputBatch): OutputBatch {
    const result = outputBatchSchema.safeParse(batch);
    if (!result.success) {
        throw new OutputValidationError(
            result.error.issues.map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}

/**
 * Validate, then write to a temp file in the same directory and rename over
 * the target. Readers see the previous document or the new one, never a mix.
 */
export async function writeBatch(outputDir: string, batch: OutputBatch): Promise<string> {
    const document = validateBatch(batch);
    const filePath = getOutputPath(outputDir, document.date);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await mkdir(outputDir, { recursive: true });

    try {
        await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
        await rename(tempPath, filePath);
    } catch (error) {
        // Clean up temp file on error
        await unlink(tempPath).catch((cleanupError: unknown) => {
            logger.debug('Temp file cleanup failed', {
                tempPath,
                error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
            });
        });
        throw error;
    }

    logger.info('Batch written', { path: filePath, totalReleases: document.total_releases });
    return filePath;
}
