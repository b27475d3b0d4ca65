export interface RateLimiterOptions {
    /** Calls allowed to start within one interval */
    maxRequests: number;
    /** Sliding window length in milliseconds; 0 disables limiting */
    intervalMs: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Sliding-window rate limiter for outbound provider calls.
 * Calls start in FIFO order, at most `maxRequests` per `intervalMs`.
 */
export class RateLimiter {
    private readonly maxRequests: number;
    private readonly intervalMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly startTimes: number[] = [];
    private queue: Promise<void> = Promise.resolve();

    constructor(options: RateLimiterOptions) {
        if (options.maxRequests < 1) {
            throw new Error('RateLimiter maxRequests must be at least 1');
        }
        this.maxRequests = options.maxRequests;
        this.intervalMs = Math.max(0, options.intervalMs);
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    }

    /**
     * Runs the task once a slot is free. The task's own result or rejection is passed through.
     */
    schedule<T>(task: () => Promise<T>): Promise<T> {
        const slot = this.queue.then(() => this.acquire());
        this.queue = slot;
        return slot.then(task);
    }

    private async acquire(): Promise<void> {
        if (this.intervalMs === 0) {
            return;
        }

        for (;;) {
            const now = this.now();
            while (this.startTimes.length > 0 && now - this.startTimes[0] >= this.intervalMs) {
                this.startTimes.shift();
            }
            if (this.startTimes.length < this.maxRequests) {
                this.startTimes.push(now);
                return;
            }
            await this.sleep(this.startTimes[0] + this.intervalMs - now);
        }
    }
}
