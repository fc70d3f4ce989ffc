/**
 * Mutex
 *
 * Single-permit lock for async critical sections. Waiters are served in
 * arrival order, so an operation queued first always runs first.
 *
 * @example
 * const lock = new Mutex();
 *
 * await lock.runExclusive(() => {
 *     // ... touch shared state
 * });
 */
export class Mutex {
    private locked = false;
    private waiting: (() => void)[] = [];

    /**
     * Acquire the lock, waiting behind earlier callers if it is held
     */
    async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        await new Promise<void>(resolve => {
            this.waiting.push(resolve);
        });
    }

    /**
     * Release the lock, handing it straight to the next waiter if there is one
     */
    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.locked = false;
        }
    }

    /**
     * Run `fn` while holding the lock. The lock is released even if `fn` throws.
     */
    async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    get isLocked(): boolean {
        return this.locked;
    }

    get queueLength(): number {
        return this.waiting.length;
    }
}
