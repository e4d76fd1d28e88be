import { setTimeout } from 'node:timers/promises';

export interface RateLimiterOptions {
    intervalMs: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Keeps consecutive outbound requests at least `intervalMs` apart.
 * Call `wait()` right before each request; the first call passes straight through.
 */
export class RateLimiter {
    private readonly intervalMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<unknown>;
    private lastRequestAt: number | null = null;

    constructor({ intervalMs, now = Date.now, sleep = async (ms) => setTimeout(ms) }: RateLimiterOptions) {
        this.intervalMs = intervalMs;
        this.now = now;
        this.sleep = sleep;
    }

    async wait(): Promise<void> {
        if (this.lastRequestAt !== null) {
            const remaining = this.intervalMs - (this.now() - this.lastRequestAt);
            if (remaining > 0) await this.sleep(remaining);
        }
        this.lastRequestAt = this.now();
    }
}
