import { sleep } from './retry.js';

/**
 * One inter-request delay for the whole run, shared by every worker.
 *
 * `acquire()` reserves the next start slot (slots are `delayMs` apart) and waits for it;
 * `release()` moves the next free slot to at least `delayMs` after the request finished.
 */
export class RequestThrottle {
    private nextSlot = 0;

    constructor(
        readonly delayMs: number,
        private readonly clock: () => number = Date.now,
        private readonly wait: (ms: number) => Promise<void> = sleep,
    ) {}

    async acquire(): Promise<void> {
        const now = this.clock();
        const slot = Math.max(now, this.nextSlot);
        this.nextSlot = slot + this.delayMs;
        if (slot > now) await this.wait(slot - now);
    }

    release(): void {
        this.nextSlot = Math.max(this.nextSlot, this.clock() + this.delayMs);
    }

    async schedule<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }
}
