/**
 * In-memory fixed-window rate limiter; state lives for the process lifetime.
 *
 * Each call is a single synchronous read-modify-write on the bucket map, so on
 * the event loop no two calls for the same key can interleave.
 */

const ANONYMOUS_KEY = 'anonymous';
const DEFAULT_LIMIT = 1;
const DEFAULT_WINDOW_MS = 60_000;

interface Bucket {
    windowStart: number;
    count: number;
}

export interface RateLimitDecision {
    allowed: boolean;
    /** Whole seconds until the current window ends; 0 when allowed. */
    retryAfterSec: number;
}

export class FixedWindowRateLimiter {
    readonly limit: number;
    readonly windowMs: number;
    private readonly buckets = new Map<string, Bucket>();

    constructor(limit: number, windowMs: number) {
        this.limit = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : DEFAULT_LIMIT;
        this.windowMs = Number.isFinite(windowMs) && windowMs > 0 ? windowMs : DEFAULT_WINDOW_MS;
    }

    get size(): number {
        return this.buckets.size;
    }

    allow(key: string, now: number = Date.now()): boolean {
        return this.consume(key, now).allowed;
    }

    consume(key: string, now: number = Date.now()): RateLimitDecision {
        const bucketKey = key.trim() === '' ? ANONYMOUS_KEY : key;
        const entry = this.buckets.get(bucketKey);

        if (!entry || now - entry.windowStart >= this.windowMs) {
            this.buckets.set(bucketKey, { windowStart: now, count: 1 });
            this.sweep(now);
            return { allowed: true, retryAfterSec: 0 };
        }

        if (entry.count >= this.limit) {
            const retryAfterSec = Math.ceil((this.windowMs - (now - entry.windowStart)) / 1000);
            return { allowed: false, retryAfterSec };
        }

        entry.count++;
        return { allowed: true, retryAfterSec: 0 };
    }

    /** Drops buckets whose window started at least two windows ago. */
    private sweep(now: number): void {
        const staleAfter = this.windowMs * 2;
        for (const [key, bucket] of this.buckets) {
            if (now - bucket.windowStart >= staleAfter) {
                this.buckets.delete(key);
            }
        }
    }
}
