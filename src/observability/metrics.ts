/**
 * Prometheus metrics for the ingestion run
 * Written once at the end of a run when METRICS_FILE is set
 */
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// ============================================================================
// ADAPTER METRICS
// ============================================================================

/**
 * Counter: Raw items yielded by each adapter
 */
export const recordsFetched = new client.Counter({
    name: 'unreeled_records_fetched_total',
    help: 'Raw items yielded by source adapters',
    labelNames: ['provider'] as const,
    registers: [registry],
});

/**
 * Counter: Items skipped because the provider returned an unexpected shape
 */
export const schemaErrors = new client.Counter({
    name: 'unreeled_schema_errors_total',
    help: 'Provider items skipped because of malformed payloads',
    labelNames: ['provider'] as const,
    registers: [registry],
});

/**
 * Counter: Adapter outcomes
 */
export const adapterRuns = new client.Counter({
    name: 'unreeled_adapter_runs_total',
    help: 'Adapter invocations by outcome',
    labelNames: ['provider', 'status'] as const,
    registers: [registry],
});

/**
 * Histogram: Adapter duration in seconds
 */
export const adapterDuration = new client.Histogram({
    name: 'unreeled_adapter_duration_seconds',
    help: 'Time spent inside a source adapter',
    labelNames: ['provider'] as const,
    buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300, 600],
    registers: [registry],
});

// ============================================================================
// HTTP METRICS
// ============================================================================

/**
 * Counter: Retry attempts
 */
export const retryCount = new client.Counter({
    name: 'unreeled_retry_count',
    help: 'Number of retried provider requests',
    labelNames: ['service', 'reason'] as const,
    registers: [registry],
});

/**
 * Counter: Rate limit responses
 */
export const rateLimitHits = new client.Counter({
    name: 'unreeled_rate_limit_hits_total',
    help: 'Rate limit responses received from providers',
    labelNames: ['service'] as const,
    registers: [registry],
});

/**
 * Gauge: Circuit breaker state (0 = closed, 1 = open, 2 = half-open)
 */
export const circuitState = new client.Gauge({
    name: 'unreeled_circuit_state',
    help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

// ============================================================================
// PIPELINE METRICS
// ============================================================================

/**
 * Counter: Records dropped by the filter engine, by rule
 */
export const recordsFiltered = new client.Counter({
    name: 'unreeled_records_filtered_total',
    help: 'Records dropped by filter rules',
    labelNames: ['media_type', 'rule'] as const,
    registers: [registry],
});

/**
 * Counter: Records collapsed into a canonical record
 */
export const duplicatesRemoved = new client.Counter({
    name: 'unreeled_duplicates_removed_total',
    help: 'Records discarded by deduplication',
    labelNames: ['media_type'] as const,
    registers: [registry],
});

/**
 * Gauge: Records written per media type
 */
export const recordsWritten = new client.Gauge({
    name: 'unreeled_records_written',
    help: 'Records in the last written batch',
    labelNames: ['media_type'] as const,
    registers: [registry],
});

/**
 * Counter: Budgeted lookups spent, by budget name
 */
export const lookupsSpent = new client.Counter({
    name: 'unreeled_lookups_spent_total',
    help: 'Budgeted enrichment lookups consumed',
    labelNames: ['budget'] as const,
    registers: [registry],
});

/**
 * Write all metrics in Prometheus text format (textfile collector style)
 */
export async function writeMetricsFile(path: string): Promise<void> {
    const body = await registry.metrics();
    const tempPath = `${path}.tmp`;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, body, 'utf-8');
    await rename(tempPath, path);
}
