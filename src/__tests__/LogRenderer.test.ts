import { describe, expect, it } from "vitest"

import { EventBus } from "../events/EventBus.js"
import { LogRenderer } from "../renderer/LogRenderer.js"

function setup() {
    const lines: string[] = []
    const bus = new EventBus()
    const renderer = new LogRenderer((line) => {
        lines.push(line.replace(/^\[\d{2}:\d{2}\.\d\] /, ""))
    })
    renderer.attach(bus)
    return { bus, lines, renderer }
}

describe("LogRenderer", () => {
    it("should write one line per stage event", () => {
        const { bus, lines } = setup()
        bus.emit({
            type: "stage:complete",
            stage: "parallel_analyze",
            attempt: 1,
            succeeded: ["a", "b"],
            failed: ["c"],
            durationMs: 1500,
        })
        bus.emit({
            type: "stage:retry",
            stage: "sequential_refine",
            attempt: 2,
            maxRetries: 1,
            workers: ["c"],
        })

        expect(lines).toEqual([
            "stage:complete  Analyze           2/3 ok  1.5s\n",
            "stage:retry     Refine            attempt 2/2  c\n",
        ])
    })

    it("should stay quiet for successful workers and token updates", () => {
        const { bus, lines } = setup()
        bus.emit({
            type: "worker:complete",
            stage: "parallel_analyze",
            workerName: "a",
            attempt: 1,
            status: "succeeded",
            durationMs: 10,
        })
        bus.emit({
            type: "token:update",
            workerName: "a",
            model: "gpt-4o",
            usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
        })

        expect(lines).toEqual([])
    })

    it("should report failed workers with their error kind", () => {
        const { bus, lines } = setup()
        bus.emit({
            type: "worker:complete",
            stage: "parallel_analyze",
            workerName: "slow",
            attempt: 1,
            status: "Timeout",
            durationMs: 20,
            detail: "slow exceeded 20ms",
        })

        expect(lines).toEqual(["worker:failed   slow              Timeout  slow exceeded 20ms\n"])
    })

    it("should total the run cost on completion", () => {
        const { bus, lines } = setup()
        bus.emit({
            type: "token:update",
            workerName: "a",
            model: "gpt-4o",
            usage: { promptTokens: 1_000_000, completionTokens: 0, totalTokens: 1_000_000 },
        })
        bus.emit({
            type: "pipeline:complete",
            runId: "r",
            status: "failed",
            durationMs: 2000,
            failureKind: "QuorumNotMet",
        })

        expect(lines).toEqual([
            "pipeline:done   failed (QuorumNotMet)  2.0s  cost $2.50\n",
        ])
    })

    it("should stop writing after detach", () => {
        const { bus, lines, renderer } = setup()
        renderer.detach()
        bus.emit({
            type: "delivery:complete",
            channel: "file",
            ok: true,
        })

        expect(lines).toEqual([])
    })
})
