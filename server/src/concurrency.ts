/**
 * Counting semaphore for async tasks.
 * Waiters are released in FIFO order as permits are returned.
 */
export class Semaphore {
    private available: number;
    private waiters: (() => void)[] = [];

    constructor(readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
        }
        this.available = limit;
    }

    /** Wait for a permit. Resolves to a release function that must be called exactly once. */
    async acquire(): Promise<() => void> {
        if (this.available > 0) {
            this.available--;
        } else {
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }

        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this.waiters.shift();
            // Hand the permit straight to the next waiter
            if (next) next();
            else this.available++;
        };
    }

    /** Run a task while holding a permit */
    async run<T>(task: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await task();
        } finally {
            release();
        }
    }

    get inFlight(): number {
        return this.limit - this.available;
    }

    get pending(): number {
        return this.waiters.length;
    }
}
