/**
 * Enricher types and interfaces
 */
import type { Logger } from '../observability/logger.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import type { LookupBudget } from '../services/budget.js';
import type { ProviderClient } from '../services/provider-client.js';

// externalIds and details are merged into the record's, not replaced
export type RecordPatch = Partial<Pick<ReleaseRecord, 'coverArtUrl' | 'synopsis' | 'externalIds' | 'details'>>;

export interface EnrichContext {
    logger: Logger;
    client(service: string): ProviderClient;
}

/**
 * One budget-capped lookup applied to eligible records after dedup
 */
export interface Enricher {
    readonly name: string;
    readonly budget: LookupBudget;
    eligible(record: ReleaseRecord): boolean;
    /** Fields to merge into the record, or null when the lookup found nothing */
    lookup(record: ReleaseRecord, ctx: EnrichContext): Promise<RecordPatch | null>;
}

export interface EnrichmentStats {
    attempted: number;
    enriched: number;
    failed: number;
    skippedForBudget: number;
}
