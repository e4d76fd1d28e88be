import { describe, expect, it } from 'vitest';

import { RateLimiter } from '../rate-limiter.js';

const createClock = (start = 10_000) => {
    let now = start;
    const sleeps: number[] = [];

    return {
        sleeps,
        now: () => now,
        advance: (ms: number) => {
            now += ms;
        },
        sleep: async (ms: number) => {
            sleeps.push(ms);
            now += ms;
        },
    };
};

describe('RateLimiter', () => {
    it('should not wait on the first call', async () => {
        const clock = createClock();
        const limiter = new RateLimiter({ intervalMs: 1000, now: clock.now, sleep: clock.sleep });

        await limiter.wait();

        expect(clock.sleeps).toEqual([]);
    });

    it('should wait for the rest of the interval when called too early', async () => {
        const clock = createClock();
        const limiter = new RateLimiter({ intervalMs: 1000, now: clock.now, sleep: clock.sleep });

        await limiter.wait();
        clock.advance(200);
        await limiter.wait();

        expect(clock.sleeps).toEqual([800]);
    });

    it('should not wait when the interval has already passed', async () => {
        const clock = createClock();
        const limiter = new RateLimiter({ intervalMs: 1000, now: clock.now, sleep: clock.sleep });

        await limiter.wait();
        clock.advance(1500);
        await limiter.wait();

        expect(clock.sleeps).toEqual([]);
    });

    it('should measure the next gap from the end of the previous wait', async () => {
        const clock = createClock();
        const limiter = new RateLimiter({ intervalMs: 1000, now: clock.now, sleep: clock.sleep });

        await limiter.wait();
        await limiter.wait();
        clock.advance(300);
        await limiter.wait();

        expect(clock.sleeps).toEqual([1000, 700]);
    });

    it('should never wait with a zero interval', async () => {
        const clock = createClock();
        const limiter = new RateLimiter({ intervalMs: 0, now: clock.now, sleep: clock.sleep });

        await limiter.wait();
        await limiter.wait();
        await limiter.wait();

        expect(clock.sleeps).toEqual([]);
    });
});
