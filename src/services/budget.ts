/**
 * Per-run cap on one kind of enrichment lookup
 *
 * Consumption is synchronous, so lookups started concurrently on the event
 * loop can never overspend.
 */
import { lookupsSpent } from '../observability/metrics.js';

export class LookupBudget {
    private spent = 0;

    constructor(
        readonly name: string,
        readonly limit: number
    ) {
        if (!Number.isInteger(limit) || limit < 0) {
            throw new RangeError(`Budget ${name} needs a non-negative integer limit, got ${limit}`);
        }
    }

    get used(): number {
        return this.spent;
    }

    get remaining(): number {
        return this.limit - this.spent;
    }

    /**
     * Take one unit; false once the budget is exhausted
     */
    tryConsume(): boolean {
        if (this.spent >= this.limit) return false;
        this.spent++;
        lookupsSpent.labels(this.name).inc();
        return true;
    }
}
