import {
    classifyWorkerError,
    PipelineAborted,
    toErrorMessage,
    WorkerFailure,
    WorkerTimeout,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import { renderContext } from "../ledger/ConversationLedger.js"
import { isQuorumMet } from "../reliability/ReliabilityChecker.js"
import type {
    ContextEntry,
    ContextLimits,
    StageId,
    StageResult,
    Worker,
    WorkerOutcome,
} from "../types.js"
import { Semaphore } from "./Semaphore.js"

export interface StageRunOptions {
    timeoutPerWorkerMs: number
    quorumFraction: number
    /** Ignored by sequential runs, which are one-at-a-time by definition. */
    maxConcurrency?: number
    stageDeadlineMs?: number
    signal?: AbortSignal
    attempt?: number
    contextLimits?: ContextLimits
}

interface StageScope {
    signal: AbortSignal
    dispose: () => void
}

/**
 * Runs workers for one stage attempt and reports per-worker outcomes.
 * Never touches the ledger: committing results is the controller's job.
 */
export class StageExecutor {
    private readonly eventBus?: EventBus

    constructor(eventBus?: EventBus) {
        this.eventBus = eventBus
    }

    public async runParallel(
        stage: StageId,
        task: string,
        workers: readonly Worker[],
        context: string,
        options: StageRunOptions
    ): Promise<StageResult> {
        const attempt = options.attempt ?? 1
        const semaphore = new Semaphore(
            Math.max(1, options.maxConcurrency ?? workers.length)
        )
        const scope = this.openScope(stage, options)
        log.stage(
            "%s attempt %d: %d workers, concurrency %d",
            stage,
            attempt,
            workers.length,
            semaphore.getStats().max
        )

        try {
            const outcomes = await Promise.all(
                workers.map(async (worker): Promise<WorkerOutcome> => {
                    try {
                        await semaphore.acquire(scope.signal)
                    } catch (reason) {
                        return this.skip(worker, stage, attempt, reason)
                    }
                    if (scope.signal.aborted) {
                        semaphore.release()
                        return this.skip(
                            worker,
                            stage,
                            attempt,
                            scope.signal.reason
                        )
                    }
                    try {
                        return await this.invokeWorker(
                            worker,
                            stage,
                            task,
                            context,
                            options.timeoutPerWorkerMs,
                            scope.signal,
                            attempt
                        )
                    } finally {
                        semaphore.release()
                    }
                })
            )
            return this.buildResult(stage, outcomes, options.quorumFraction)
        } finally {
            scope.dispose()
        }
    }

    /**
     * Workers run one at a time; each one's context is the base entries plus
     * every successful output produced earlier in this call.
     */
    public async runSequential(
        stage: StageId,
        task: string,
        workers: readonly Worker[],
        baseEntries: readonly ContextEntry[],
        options: StageRunOptions
    ): Promise<StageResult> {
        const attempt = options.attempt ?? 1
        const scope = this.openScope(stage, options)
        const produced: ContextEntry[] = []
        const outcomes: WorkerOutcome[] = []
        log.stage(
            "%s attempt %d: %d workers in order",
            stage,
            attempt,
            workers.length
        )

        try {
            for (const worker of workers) {
                if (scope.signal.aborted) {
                    outcomes.push(
                        this.skip(worker, stage, attempt, scope.signal.reason)
                    )
                    continue
                }
                const context = renderContext(
                    [...baseEntries, ...produced],
                    options.contextLimits
                )
                const outcome = await this.invokeWorker(
                    worker,
                    stage,
                    task,
                    context,
                    options.timeoutPerWorkerMs,
                    scope.signal,
                    attempt
                )
                outcomes.push(outcome)
                if (outcome.result !== undefined) {
                    produced.push({
                        workerName: worker.name,
                        stage,
                        content: outcome.result,
                    })
                }
            }
            return this.buildResult(stage, outcomes, options.quorumFraction)
        } finally {
            scope.dispose()
        }
    }

    private openScope(stage: StageId, options: StageRunOptions): StageScope {
        const controller = new AbortController()
        const external = options.signal
        const onExternalAbort = (): void => {
            const reason: unknown = external?.reason
            controller.abort(
                reason instanceof PipelineAborted
                    ? reason
                    : new PipelineAborted(
                          `${stage} cancelled: ${toErrorMessage(reason ?? "aborted")}`
                      )
            )
        }
        if (external?.aborted) {
            onExternalAbort()
        } else {
            external?.addEventListener("abort", onExternalAbort, {
                once: true,
            })
        }

        let deadlineTimer: ReturnType<typeof setTimeout> | null = null
        const deadlineMs = options.stageDeadlineMs
        if (deadlineMs !== undefined && !controller.signal.aborted) {
            deadlineTimer = setTimeout(() => {
                log.stage("%s hit its %dms deadline", stage, deadlineMs)
                controller.abort(
                    new WorkerTimeout(
                        `${stage} deadline of ${deadlineMs}ms exceeded`,
                        deadlineMs
                    )
                )
            }, deadlineMs)
        }

        return {
            signal: controller.signal,
            dispose: (): void => {
                if (deadlineTimer) clearTimeout(deadlineTimer)
                external?.removeEventListener("abort", onExternalAbort)
            },
        }
    }

    private async invokeWorker(
        worker: Worker,
        stage: StageId,
        task: string,
        context: string,
        timeoutMs: number,
        stageSignal: AbortSignal,
        attempt: number
    ): Promise<WorkerOutcome> {
        const controller = new AbortController()
        const startedAt = Date.now()
        const onStageAbort = (): void => controller.abort(stageSignal.reason)
        stageSignal.addEventListener("abort", onStageAbort, { once: true })
        const timer = setTimeout(() => {
            controller.abort(
                new WorkerTimeout(
                    `${worker.name} exceeded ${timeoutMs}ms`,
                    timeoutMs
                )
            )
        }, timeoutMs)
        const aborted = new Promise<never>((_, reject) => {
            controller.signal.addEventListener(
                "abort",
                () => reject(controller.signal.reason),
                { once: true }
            )
        })

        this.eventBus?.emit({
            type: "worker:start",
            stage,
            workerName: worker.name,
            attempt,
        })

        let outcome: WorkerOutcome
        try {
            const invocation = Promise.resolve().then(() =>
                worker.invoke(task, context, {
                    signal: controller.signal,
                    deadline: startedAt + timeoutMs,
                })
            )
            const result: unknown = await Promise.race([invocation, aborted])
            if (typeof result !== "string" || result.trim() === "") {
                throw new WorkerFailure(
                    worker.name,
                    `${worker.name} returned an empty result`
                )
            }
            outcome = {
                workerName: worker.name,
                stage,
                result,
                durationMs: Date.now() - startedAt,
            }
        } catch (error) {
            outcome = {
                workerName: worker.name,
                stage,
                error: {
                    kind: classifyWorkerError(error),
                    detail: toErrorMessage(error),
                },
                durationMs: Date.now() - startedAt,
            }
        } finally {
            clearTimeout(timer)
            stageSignal.removeEventListener("abort", onStageAbort)
        }

        if (outcome.error) {
            log.worker(
                "%s failed in %s (%s): %s",
                worker.name,
                stage,
                outcome.error.kind,
                outcome.error.detail
            )
        }
        this.emitComplete(outcome, attempt)
        return outcome
    }

    private skip(
        worker: Worker,
        stage: StageId,
        attempt: number,
        reason: unknown
    ): WorkerOutcome {
        const outcome: WorkerOutcome = {
            workerName: worker.name,
            stage,
            error: {
                kind: classifyWorkerError(reason),
                detail: `${worker.name} not started: ${toErrorMessage(reason)}`,
            },
            durationMs: 0,
        }
        this.emitComplete(outcome, attempt)
        return outcome
    }

    private emitComplete(outcome: WorkerOutcome, attempt: number): void {
        this.eventBus?.emit({
            type: "worker:complete",
            stage: outcome.stage,
            workerName: outcome.workerName,
            attempt,
            status: outcome.error ? outcome.error.kind : "succeeded",
            durationMs: outcome.durationMs,
            detail: outcome.error?.detail,
        })
    }

    private buildResult(
        stage: StageId,
        outcomes: WorkerOutcome[],
        quorumFraction: number
    ): StageResult {
        const byName = new Map<string, WorkerOutcome>()
        for (const outcome of outcomes) {
            byName.set(outcome.workerName, outcome)
        }
        return {
            stage,
            outcomes: byName,
            quorumMet: isQuorumMet(byName.values(), quorumFraction),
        }
    }
}
