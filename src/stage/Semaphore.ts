/**
 * Counting semaphore with a FIFO wait queue.
 * A waiter whose signal aborts leaves the queue without taking a permit.
 */
export class Semaphore {
    private permits: number
    private readonly maxPermits: number
    private readonly waitQueue: Array<() => void> = []

    constructor(maxPermits: number) {
        if (!Number.isInteger(maxPermits) || maxPermits < 1) {
            throw new RangeError(
                `Semaphore needs a positive integer, got ${maxPermits}`
            )
        }
        this.maxPermits = maxPermits
        this.permits = maxPermits
    }

    public acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(signal.reason)
        }
        if (this.permits > 0) {
            this.permits--
            return Promise.resolve()
        }

        return new Promise<void>((resolve, reject) => {
            const waiter = (): void => {
                signal?.removeEventListener("abort", onAbort)
                resolve()
            }
            const onAbort = (): void => {
                const idx = this.waitQueue.indexOf(waiter)
                if (idx !== -1) this.waitQueue.splice(idx, 1)
                reject(signal?.reason)
            }
            signal?.addEventListener("abort", onAbort, { once: true })
            this.waitQueue.push(waiter)
        })
    }

    public release(): void {
        const next = this.waitQueue.shift()
        if (next) {
            next()
        } else {
            this.permits = Math.min(this.permits + 1, this.maxPermits)
        }
    }

    public async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquire(signal)
        try {
            return await fn()
        } finally {
            this.release()
        }
    }

    public getStats(): { available: number; max: number; waiting: number } {
        return {
            available: this.permits,
            max: this.maxPermits,
            waiting: this.waitQueue.length,
        }
    }
}
