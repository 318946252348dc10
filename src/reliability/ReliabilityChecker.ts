import { log } from "../core/Logger.js"
import type {
    Decision,
    FailedWorker,
    ReliabilityPolicy,
    StageResult,
    WorkerOutcome,
} from "../types.js"

const QUORUM_EPSILON = 1e-9

export function countSuccesses(outcomes: Iterable<WorkerOutcome>): {
    successes: number
    total: number
} {
    let successes = 0
    let total = 0
    for (const outcome of outcomes) {
        total++
        if (outcome.error === undefined) successes++
    }
    return { successes, total }
}

export function isQuorumMet(
    outcomes: Iterable<WorkerOutcome>,
    quorumFraction: number
): boolean {
    const { successes, total } = countSuccesses(outcomes)
    if (total === 0) return false
    return successes / total >= quorumFraction - QUORUM_EPSILON
}

/**
 * Stage-boundary gate. Turns the merged outcomes of a stage into the
 * controller's next move; never consulted while workers are in flight.
 */
export class ReliabilityChecker {
    public evaluate(
        result: StageResult,
        policy: ReliabilityPolicy,
        retriesUsed: number
    ): Decision {
        const outcomes = [...result.outcomes.values()]
        const succeeded = outcomes
            .filter((o) => o.error === undefined)
            .map((o) => o.workerName)
        const failed: FailedWorker[] = []
        for (const o of outcomes) {
            if (o.error !== undefined) {
                failed.push({ workerName: o.workerName, error: o.error })
            }
        }

        let decision: Decision
        if (isQuorumMet(outcomes, policy.quorumFraction)) {
            decision = { type: "advance", workers: succeeded }
        } else if (retriesUsed < policy.maxRetriesPerStage) {
            decision = {
                type: "retry",
                workers: failed.map((f) => f.workerName),
            }
        } else if (policy.allowDegrade && succeeded.length > 0) {
            decision = { type: "degrade", workers: succeeded }
        } else {
            const names = failed
                .map((f) => `${f.workerName} (${f.error.kind})`)
                .join(", ")
            decision = {
                type: "abort",
                reason: `QuorumNotMet in ${result.stage}: ${succeeded.length}/${outcomes.length} succeeded, quorum ${policy.quorumFraction}; failed: ${names}`,
                failedWorkers: failed,
            }
        }

        log.reliability(
            "%s: %d/%d succeeded after %d retries -> %s",
            result.stage,
            succeeded.length,
            outcomes.length,
            retriesUsed,
            decision.type
        )
        return decision
    }
}
