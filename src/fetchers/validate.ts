/**
 * Item and envelope validation shared by fetchers
 */
import type { z } from 'zod';
import { ProviderSchemaError } from './errors.js';
import { parsePayload } from '../services/provider-client.js';
import type { FetchContext } from './types.js';

/**
 * Validate each raw item; malformed items are reported and skipped
 */
export function parseItems<T>(
    provider: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    rawItems: unknown[],
    ctx: FetchContext,
    what: string
): T[] {
    const items: T[] = [];

    for (const raw of rawItems) {
        try {
            items.push(parsePayload(provider, schema, raw, what));
        } catch (error) {
            if (!(error instanceof ProviderSchemaError)) throw error;
            ctx.reportSchemaError(error);
        }
    }

    return items;
}

/**
 * Load a page envelope. A malformed envelope is reported and yields null; the
 * caller stops paginating (or skips that search) and keeps what it already produced.
 */
export async function loadEnvelope<T>(ctx: FetchContext, load: () => Promise<T>): Promise<T | null> {
    try {
        return await load();
    } catch (error) {
        if (!(error instanceof ProviderSchemaError)) throw error;
        ctx.reportSchemaError(error);
        return null;
    }
}
