import { describe, expect, it } from "vitest"

import { Semaphore } from "../stage/Semaphore.js"

describe("Semaphore", () => {
    it("should reject non-positive or fractional sizes", () => {
        expect(() => new Semaphore(0)).toThrow(RangeError)
        expect(() => new Semaphore(1.5)).toThrow(RangeError)
    })

    it("should hand out permits up to the limit, then queue", async () => {
        const semaphore = new Semaphore(2)
        await semaphore.acquire()
        await semaphore.acquire()
        expect(semaphore.getStats()).toEqual({ available: 0, max: 2, waiting: 0 })

        let third = false
        const pending = semaphore.acquire().then(() => {
            third = true
        })
        await Promise.resolve()
        expect(third).toBe(false)
        expect(semaphore.getStats().waiting).toBe(1)

        semaphore.release()
        await pending
        expect(third).toBe(true)
    })

    it("should wake waiters in FIFO order", async () => {
        const semaphore = new Semaphore(1)
        await semaphore.acquire()
        const order: string[] = []
        const a = semaphore.acquire().then(() => order.push("a"))
        const b = semaphore.acquire().then(() => order.push("b"))

        semaphore.release()
        await a
        semaphore.release()
        await b
        expect(order).toEqual(["a", "b"])
    })

    it("should drop an aborted waiter without consuming a permit", async () => {
        const semaphore = new Semaphore(1)
        await semaphore.acquire()
        const controller = new AbortController()
        const waiting = semaphore.acquire(controller.signal)

        controller.abort(new Error("stop"))
        await expect(waiting).rejects.toThrow("stop")
        expect(semaphore.getStats().waiting).toBe(0)

        semaphore.release()
        expect(semaphore.getStats().available).toBe(1)
    })

    it("should reject at once when the signal is already aborted", async () => {
        const semaphore = new Semaphore(1)
        const controller = new AbortController()
        controller.abort(new Error("already"))
        await expect(semaphore.acquire(controller.signal)).rejects.toThrow(
            "already"
        )
        expect(semaphore.getStats().available).toBe(1)
    })

    it("should release the permit when run() throws", async () => {
        const semaphore = new Semaphore(1)
        await expect(
            semaphore.run(() => Promise.reject(new Error("fail")))
        ).rejects.toThrow("fail")
        expect(semaphore.getStats().available).toBe(1)
    })
})
