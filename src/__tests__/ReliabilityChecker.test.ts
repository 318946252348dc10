import { describe, expect, it } from "vitest"

import {
    isQuorumMet,
    ReliabilityChecker,
} from "../reliability/ReliabilityChecker.js"
import type {
    ReliabilityPolicy,
    StageResult,
    WorkerErrorKind,
    WorkerOutcome,
} from "../types.js"

function ok(name: string): WorkerOutcome {
    return { workerName: name, stage: "parallel_analyze", result: "fine", durationMs: 5 }
}

function failed(name: string, kind: WorkerErrorKind = "WorkerFailure"): WorkerOutcome {
    return {
        workerName: name,
        stage: "parallel_analyze",
        error: { kind, detail: `${name} broke` },
        durationMs: 5,
    }
}

function stage(...outcomes: WorkerOutcome[]): StageResult {
    return {
        stage: "parallel_analyze",
        outcomes: new Map(outcomes.map((o) => [o.workerName, o])),
        quorumMet: false,
    }
}

const policy: ReliabilityPolicy = {
    quorumFraction: 0.75,
    maxRetriesPerStage: 1,
    allowDegrade: false,
    timeoutPerWorkerMs: 1000,
}

describe("isQuorumMet", () => {
    it("should be false for an empty stage", () => {
        expect(isQuorumMet([], 0.5)).toBe(false)
    })

    it("should accept a ratio exactly at the quorum", () => {
        expect(isQuorumMet([ok("a"), ok("b"), ok("c"), failed("d")], 0.75)).toBe(true)
    })

    it("should tolerate float error at the boundary", () => {
        const outcomes = [ok("a"), ok("b"), failed("c")]
        expect(isQuorumMet(outcomes, 2 / 3)).toBe(true)
        expect(isQuorumMet(outcomes, 0.67)).toBe(false)
    })

    it("should require every worker when quorum is 1", () => {
        expect(isQuorumMet([ok("a"), failed("b")], 1)).toBe(false)
        expect(isQuorumMet([ok("a"), ok("b")], 1)).toBe(true)
    })
})

describe("ReliabilityChecker", () => {
    const checker = new ReliabilityChecker()

    it("should advance with the succeeded workers when quorum is met", () => {
        const decision = checker.evaluate(
            stage(ok("a"), ok("b"), ok("c"), failed("d")),
            policy,
            0
        )
        expect(decision).toEqual({ type: "advance", workers: ["a", "b", "c"] })
    })

    it("should retry only the failed workers while retries remain", () => {
        const decision = checker.evaluate(
            stage(ok("a"), failed("b"), failed("c", "Timeout")),
            policy,
            0
        )
        expect(decision).toEqual({ type: "retry", workers: ["b", "c"] })
    })

    it("should degrade when retries are spent and degrade is allowed", () => {
        const decision = checker.evaluate(
            stage(ok("a"), failed("b")),
            { ...policy, allowDegrade: true },
            1
        )
        expect(decision).toEqual({ type: "degrade", workers: ["a"] })
    })

    it("should abort when nothing succeeded even if degrade is allowed", () => {
        const decision = checker.evaluate(
            stage(failed("a"), failed("b")),
            { ...policy, allowDegrade: true },
            1
        )
        expect(decision.type).toBe("abort")
    })

    it("should abort with the failing workers and a readable reason", () => {
        const decision = checker.evaluate(
            stage(ok("a"), ok("b"), failed("c", "Timeout"), failed("d")),
            policy,
            1
        )
        expect(decision).toEqual({
            type: "abort",
            reason: "QuorumNotMet in parallel_analyze: 2/4 succeeded, quorum 0.75; failed: c (Timeout), d (WorkerFailure)",
            failedWorkers: [
                { workerName: "c", error: { kind: "Timeout", detail: "c broke" } },
                { workerName: "d", error: { kind: "WorkerFailure", detail: "d broke" } },
            ],
        })
    })

    it("should skip retries entirely when the budget is zero", () => {
        const decision = checker.evaluate(
            stage(ok("a"), failed("b")),
            { ...policy, maxRetriesPerStage: 0, allowDegrade: true },
            0
        )
        expect(decision.type).toBe("degrade")
    })
})
