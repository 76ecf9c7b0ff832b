/**
 * In-process request throttle
 * Spaces requests to the same service; callers to one service are served in order
 */
import { defaultSleep } from './retry.js';

// Minimum gap between two request starts, per service (ms)
export const DEFAULT_REQUEST_INTERVALS: Readonly<Record<string, number>> = {
    tmdb: 250,           // ~40 req / 10 s
    open_library: 250,
    twitch: 0,
    igdb: 250,           // 4 req / s
    jikan: 350,          // 3 req / s
    musicbrainz: 1100,   // 1 req / s, strictly enforced
    coverartarchive: 500,
    omdb: 150,
    watchmode: 300,
};

const FALLBACK_INTERVAL_MS = 250;

export interface ThrottleClock {
    now: () => number;
    sleep: (ms: number) => Promise<void>;
}

const systemClock: ThrottleClock = {
    now: () => Date.now(),
    sleep: defaultSleep,
};

export class RequestThrottle {
    private readonly lastStart: Map<string, number> = new Map();
    private readonly queues: Map<string, Promise<void>> = new Map();

    constructor(
        private readonly intervals: Readonly<Record<string, number>> = DEFAULT_REQUEST_INTERVALS,
        private readonly clock: ThrottleClock = systemClock
    ) { }

    intervalFor(service: string): number {
        return this.intervals[service] ?? FALLBACK_INTERVAL_MS;
    }

    /**
     * Resolve when the caller may start its request
     */
    acquire(service: string): Promise<void> {
        const previous = this.queues.get(service) ?? Promise.resolve();

        const turn = previous.then(async () => {
            const last = this.lastStart.get(service);
            if (last !== undefined) {
                const waitMs = last + this.intervalFor(service) - this.clock.now();
                if (waitMs > 0) {
                    await this.clock.sleep(waitMs);
                }
            }
            this.lastStart.set(service, this.clock.now());
        });

        this.queues.set(service, turn);
        return turn;
    }
}
