import { describe, it, expect } from 'vitest';
import { FixedWindowRateLimiter } from './rate-limit';

const T0 = 1_700_000_000_000;

describe('FixedWindowRateLimiter', () => {
    it('admits exactly `limit` calls per window and rejects the next one', () => {
        for (const limit of [1, 3, 20]) {
            const limiter = new FixedWindowRateLimiter(limit, 60_000);
            for (let i = 0; i < limit; i++) {
                expect(limiter.allow('10.0.0.1', T0 + i)).toBe(true);
            }
            expect(limiter.allow('10.0.0.1', T0 + limit)).toBe(false);
        }
    });

    it('rejects the 21st request within a minute at the default limit of 20', () => {
        const limiter = new FixedWindowRateLimiter(20, 60_000);
        const results = Array.from({ length: 21 }, (_, i) => limiter.allow('203.0.113.7', T0 + i * 1000));
        expect(results.slice(0, 20).every(Boolean)).toBe(true);
        expect(results[20]).toBe(false);
    });

    it('starts a fresh window once the previous one has elapsed', () => {
        const limiter = new FixedWindowRateLimiter(2, 1000);
        expect(limiter.allow('k', T0)).toBe(true);
        expect(limiter.allow('k', T0 + 10)).toBe(true);
        expect(limiter.allow('k', T0 + 20)).toBe(false);
        expect(limiter.allow('k', T0 + 999)).toBe(false);
        expect(limiter.allow('k', T0 + 1000)).toBe(true);
        expect(limiter.allow('k', T0 + 1001)).toBe(true);
        expect(limiter.allow('k', T0 + 1002)).toBe(false);
    });

    it('allows a burst of up to twice the limit across a window edge', () => {
        const limiter = new FixedWindowRateLimiter(3, 1000);
        const admitted = [
            limiter.allow('k', T0),
            limiter.allow('k', T0 + 990),
            limiter.allow('k', T0 + 995),
            limiter.allow('k', T0 + 1000),
            limiter.allow('k', T0 + 1001),
            limiter.allow('k', T0 + 1002),
        ];
        expect(admitted).toEqual([true, true, true, true, true, true]);
        expect(limiter.allow('k', T0 + 1003)).toBe(false);
    });

    it('does not mutate state when rejecting', () => {
        const limiter = new FixedWindowRateLimiter(1, 1000);
        expect(limiter.allow('k', T0)).toBe(true);
        for (let i = 1; i < 10; i++) {
            expect(limiter.allow('k', T0 + i)).toBe(false);
        }
        // window start is unchanged by the rejections
        expect(limiter.allow('k', T0 + 1000)).toBe(true);
    });

    it('keeps separate budgets per key', () => {
        const limiter = new FixedWindowRateLimiter(1, 1000);
        expect(limiter.allow('a', T0)).toBe(true);
        expect(limiter.allow('b', T0)).toBe(true);
        expect(limiter.allow('a', T0 + 1)).toBe(false);
        expect(limiter.allow('b', T0 + 1)).toBe(false);
    });

    it('shares one anonymous bucket for empty and blank keys', () => {
        const limiter = new FixedWindowRateLimiter(2, 1000);
        expect(limiter.allow('', T0)).toBe(true);
        expect(limiter.allow('   ', T0 + 1)).toBe(true);
        expect(limiter.allow('anonymous', T0 + 2)).toBe(false);
        expect(limiter.size).toBe(1);
    });

    it('sweeps buckets at least two windows old when a key rolls over', () => {
        const limiter = new FixedWindowRateLimiter(5, 1000);
        for (let i = 0; i < 50; i++) {
            limiter.allow(`transient-${i}`, T0);
        }
        limiter.allow('recent', T0 + 1500);
        expect(limiter.size).toBe(51);

        limiter.allow('fresh', T0 + 2000);
        expect(limiter.size).toBe(2);
    });

    it('does not sweep on calls that stay inside an existing window', () => {
        const limiter = new FixedWindowRateLimiter(5, 1000);
        limiter.allow('old', T0);
        limiter.allow('current', T0 + 1999);
        limiter.allow('current', T0 + 2500);
        expect(limiter.size).toBe(2);
    });

    it('reports seconds until the window ends when rejecting', () => {
        const limiter = new FixedWindowRateLimiter(1, 60_000);
        expect(limiter.consume('k', T0)).toEqual({ allowed: true, retryAfterSec: 0 });
        expect(limiter.consume('k', T0 + 15_500)).toEqual({ allowed: false, retryAfterSec: 45 });
        expect(limiter.consume('k', T0 + 59_999)).toEqual({ allowed: false, retryAfterSec: 1 });
    });

    it('corrects non-positive limit and window to safe defaults', () => {
        const limiter = new FixedWindowRateLimiter(0, -5);
        expect(limiter.limit).toBe(1);
        expect(limiter.windowMs).toBe(60_000);
        expect(limiter.allow('k', T0)).toBe(true);
        expect(limiter.allow('k', T0 + 59_999)).toBe(false);
        expect(limiter.allow('k', T0 + 60_000)).toBe(true);

        expect(new FixedWindowRateLimiter(Number.NaN, Number.POSITIVE_INFINITY).windowMs).toBe(60_000);
    });
});
