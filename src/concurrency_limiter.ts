/**
 * Concurrency Limiter (simple semaphore)
 */

export class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Array<() => void> = [];

    constructor(private readonly maxSlots: number) {
        if (!Number.isInteger(maxSlots) || maxSlots < 1) {
            throw new RangeError(`maxSlots must be a positive integer, got ${maxSlots}`);
        }
    }

    async acquireSlot(): Promise<void> {
        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    releaseSlot(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }

    /** Runs `task` once a slot is free; the slot is released however it ends. */
    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquireSlot();
        try {
            return await task();
        } finally {
            this.releaseSlot();
        }
    }

    get active(): number {
        return this.activeCount;
    }
}
