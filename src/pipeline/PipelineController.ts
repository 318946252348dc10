import { randomUUID } from "node:crypto"

import { validatePolicy, validateRunOptions } from "../core/Config.js"
import {
    AggregationFailure,
    ConfigurationError,
    PipelineAborted,
    QuorumNotMet,
    toErrorMessage,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { EventBus } from "../events/EventBus.js"
import {
    ConversationLedger,
    renderContext,
} from "../ledger/ConversationLedger.js"
import {
    isQuorumMet,
    ReliabilityChecker,
} from "../reliability/ReliabilityChecker.js"
import { StageExecutor } from "../stage/StageExecutor.js"
import type { StageRunOptions } from "../stage/StageExecutor.js"
import {
    DOMAIN_STAGES,
    type DeliveryChannel,
    type Diagnostic,
    type DomainStageId,
    type FailedWorker,
    type PipelineFailure,
    type PipelineOptions,
    type PipelineResult,
    type PipelineState,
    type ReliabilityPolicy,
    type StageResult,
    type Worker,
    type WorkerOutcome,
} from "../types.js"

export interface PipelineControllerOptions extends PipelineOptions {
    eventBus?: EventBus
}

interface RunScope {
    runId: string
    task: string
    ledger: ConversationLedger
    diagnostics: Diagnostic[]
    signal: AbortSignal
}

type AggregateOutcome = { report: string } | { failure: PipelineFailure }

/** Workers carried into the next stage, or the terminal failure. */
type DomainStageOutcome =
    | { workers: readonly Worker[] }
    | { failure: PipelineFailure }

/**
 * Drives one report through
 * init → parallel_analyze → sequential_refine → parallel_reanalyze → aggregate.
 *
 * Each `run()` owns a fresh ledger; nothing carries over between runs. One
 * controller drives one run at a time.
 * Stage transitions happen only on an advance or degrade decision; a degrade
 * narrows the workers of every later domain stage to its subset.
 */
export class PipelineController {
    private readonly policy: ReliabilityPolicy
    private readonly maxConcurrency?: number
    private readonly contextLimits: PipelineOptions["contextLimits"]
    private readonly delivery?: DeliveryChannel
    private readonly eventBus: EventBus
    private readonly executor: StageExecutor
    private readonly checker = new ReliabilityChecker()
    private activeRun: AbortController | null = null
    private state: PipelineState = "init"

    constructor(
        policy: ReliabilityPolicy,
        options: PipelineControllerOptions = {}
    ) {
        this.policy = validatePolicy(policy)
        validateRunOptions(options)
        this.maxConcurrency = options.maxConcurrency
        this.contextLimits = options.contextLimits
        this.delivery = options.delivery
        this.eventBus = options.eventBus ?? new EventBus()
        this.executor = new StageExecutor(this.eventBus)
    }

    public getState(): PipelineState {
        return this.state
    }

    /** Cancels the run in flight, which ends as `PipelineAborted`. */
    public abort(reason = "Aborted by caller"): void {
        this.activeRun?.abort(new PipelineAborted(reason))
    }

    public async run(
        task: string,
        domainWorkers: readonly Worker[],
        aggregator: Worker | undefined
    ): Promise<PipelineResult> {
        if (this.activeRun) {
            throw new ConfigurationError(
                "A run is already in progress on this controller"
            )
        }
        const abortController = new AbortController()
        this.activeRun = abortController
        const scope: RunScope = {
            runId: randomUUID(),
            task,
            ledger: new ConversationLedger(),
            diagnostics: [],
            signal: abortController.signal,
        }
        const startedAt = Date.now()
        this.state = "init"

        this.eventBus.emit({
            type: "pipeline:start",
            runId: scope.runId,
            task,
            workers: domainWorkers.map((w) => w.name),
            aggregator: aggregator?.name ?? "",
        })

        let result: PipelineResult
        try {
            const outcome = await this.execute(scope, domainWorkers, aggregator)
            result =
                "report" in outcome
                    ? {
                          status: "completed",
                          runId: scope.runId,
                          report: outcome.report,
                          ledger: scope.ledger.snapshot(),
                          diagnostics: scope.diagnostics,
                          durationMs: Date.now() - startedAt,
                      }
                    : {
                          status: "failed",
                          runId: scope.runId,
                          failure: outcome.failure,
                          partialLedger: scope.ledger.snapshot(),
                          diagnostics: scope.diagnostics,
                          durationMs: Date.now() - startedAt,
                      }
        } finally {
            this.activeRun = null
        }

        this.state = result.status === "completed" ? "done" : "failed"
        log.pipeline(
            "Run %s finished: %s in %dms",
            scope.runId,
            result.status,
            result.durationMs
        )
        await this.deliver(scope, result)
        this.eventBus.emit({
            type: "pipeline:complete",
            runId: scope.runId,
            status: result.status,
            durationMs: result.durationMs,
            failureKind:
                result.status === "failed" ? result.failure.kind : undefined,
        })
        return result
    }

    private async execute(
        scope: RunScope,
        domainWorkers: readonly Worker[],
        aggregator: Worker | undefined
    ): Promise<AggregateOutcome> {
        let validAggregator: Worker
        try {
            validAggregator = this.validateRun(
                scope.task,
                domainWorkers,
                aggregator
            )
        } catch (error) {
            if (!(error instanceof ConfigurationError)) throw error
            log.pipeline("Init rejected run: %s", error.message)
            return {
                failure: {
                    kind: "ConfigurationError",
                    stage: "init",
                    message: error.message,
                    failedWorkers: [],
                    cause: error,
                },
            }
        }

        let active = domainWorkers
        for (const stage of DOMAIN_STAGES) {
            this.transition(stage)
            const outcome = await this.runDomainStage(scope, stage, active)
            if ("failure" in outcome) return outcome
            active = outcome.workers
        }

        this.transition("aggregate")
        return this.runAggregate(scope, validAggregator)
    }

    private validateRun(
        task: string,
        domainWorkers: readonly Worker[],
        aggregator: Worker | undefined
    ): Worker {
        if (task.trim() === "") {
            throw new ConfigurationError("Task must be a non-empty string")
        }
        if (domainWorkers.length === 0) {
            throw new ConfigurationError("At least one domain worker is required")
        }
        if (!aggregator) {
            throw new ConfigurationError("An aggregator worker is required")
        }
        const seen = new Set<string>()
        for (const worker of [...domainWorkers, aggregator]) {
            if (worker.name.trim() === "") {
                throw new ConfigurationError("Worker names must be non-empty")
            }
            if (seen.has(worker.name)) {
                throw new ConfigurationError(
                    `Duplicate worker name: ${worker.name}`
                )
            }
            seen.add(worker.name)
        }
        return aggregator
    }

    private transition(next: PipelineState): void {
        log.pipeline("%s -> %s", this.state, next)
        this.state = next
    }

    private stageOptions(scope: RunScope, attempt: number): StageRunOptions {
        return {
            timeoutPerWorkerMs: this.policy.timeoutPerWorkerMs,
            quorumFraction: this.policy.quorumFraction,
            maxConcurrency: this.maxConcurrency,
            stageDeadlineMs: this.policy.stageDeadlineMs,
            signal: scope.signal,
            attempt,
            contextLimits: this.contextLimits,
        }
    }

    /**
     * Returns the workers for the next stage once this one may advance: all
     * of them on advance, the surviving subset on degrade.
     *
     * Successful outcomes are committed after every attempt, in registration
     * order. Parallel retries reuse the stage-start context; sequential
     * retries read the ledger as it stands, so they see this stage's earlier
     * successes.
     */
    private async runDomainStage(
        scope: RunScope,
        stage: DomainStageId,
        workers: readonly Worker[]
    ): Promise<DomainStageOutcome> {
        const stageStartContext = renderContext(
            scope.ledger.snapshot(),
            this.contextLimits
        )
        const merged = new Map<string, WorkerOutcome>()
        let pending: readonly Worker[] = workers
        let retriesUsed = 0

        for (;;) {
            const attempt = retriesUsed + 1
            const startedAt = Date.now()
            this.eventBus.emit({
                type: "stage:start",
                stage,
                attempt,
                workers: pending.map((w) => w.name),
            })

            const options = this.stageOptions(scope, attempt)
            const attemptResult =
                stage === "sequential_refine"
                    ? await this.executor.runSequential(
                          stage,
                          scope.task,
                          pending,
                          scope.ledger.snapshot(),
                          options
                      )
                    : await this.executor.runParallel(
                          stage,
                          scope.task,
                          pending,
                          stageStartContext,
                          options
                      )

            this.commit(scope, pending, attemptResult, attempt)
            for (const [name, outcome] of attemptResult.outcomes) {
                merged.set(name, outcome)
            }
            this.emitStageComplete(attemptResult, attempt, startedAt)

            if (scope.signal.aborted) {
                return {
                    failure: this.abortedFailure(scope, stage, attemptResult),
                }
            }

            const ordered = new Map<string, WorkerOutcome>()
            for (const worker of workers) {
                const outcome = merged.get(worker.name)
                if (outcome) ordered.set(worker.name, outcome)
            }
            const stageResult: StageResult = {
                stage,
                outcomes: ordered,
                quorumMet: isQuorumMet(
                    ordered.values(),
                    this.policy.quorumFraction
                ),
            }

            const decision = this.checker.evaluate(
                stageResult,
                this.policy,
                retriesUsed
            )
            this.eventBus.emit({
                type: "stage:decision",
                stage,
                decision: decision.type,
                workers:
                    decision.type === "abort"
                        ? decision.failedWorkers.map((f) => f.workerName)
                        : decision.workers,
            })

            switch (decision.type) {
                case "advance":
                    return { workers }
                case "degrade": {
                    const kept = new Set(decision.workers)
                    const subset = workers.filter((w) => kept.has(w.name))
                    log.pipeline(
                        "%s degraded to %d/%d workers",
                        stage,
                        subset.length,
                        workers.length
                    )
                    return { workers: subset }
                }
                case "retry": {
                    retriesUsed++
                    const retrySet = new Set(decision.workers)
                    pending = workers.filter((w) => retrySet.has(w.name))
                    this.eventBus.emit({
                        type: "stage:retry",
                        stage,
                        attempt: retriesUsed + 1,
                        maxRetries: this.policy.maxRetriesPerStage,
                        workers: decision.workers,
                    })
                    break
                }
                case "abort":
                    return {
                        failure: {
                            kind: "QuorumNotMet",
                            stage,
                            message: decision.reason,
                            failedWorkers: decision.failedWorkers,
                            cause: new QuorumNotMet(
                                decision.reason,
                                decision.failedWorkers.map((f) => f.workerName)
                            ),
                        },
                    }
            }
        }
    }

    private commit(
        scope: RunScope,
        workers: readonly Worker[],
        result: StageResult,
        attempt: number
    ): void {
        for (const worker of workers) {
            const outcome = result.outcomes.get(worker.name)
            if (!outcome) continue
            if (outcome.error === undefined) {
                scope.ledger.append({
                    workerName: worker.name,
                    stage: result.stage,
                    content: outcome.result,
                })
            } else {
                scope.diagnostics.push({
                    stage: result.stage,
                    workerName: worker.name,
                    kind: outcome.error.kind,
                    detail: outcome.error.detail,
                    attempt,
                })
            }
        }
    }

    /**
     * The aggregator runs alone against the whole ledger. A failed attempt is
     * recorded and re-run until the stage retry budget is spent.
     */
    private async runAggregate(
        scope: RunScope,
        aggregator: Worker
    ): Promise<AggregateOutcome> {
        const context = renderContext(
            scope.ledger.snapshot(),
            this.contextLimits
        )
        const maxAttempts = this.policy.maxRetriesPerStage + 1
        let lastFailure: FailedWorker | null = null

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const startedAt = Date.now()
            this.eventBus.emit({
                type: "stage:start",
                stage: "aggregate",
                attempt,
                workers: [aggregator.name],
            })
            const result = await this.executor.runParallel(
                "aggregate",
                scope.task,
                [aggregator],
                context,
                { ...this.stageOptions(scope, attempt), quorumFraction: 1 }
            )
            this.emitStageComplete(result, attempt, startedAt)

            const outcome = result.outcomes.get(aggregator.name)
            if (outcome && outcome.error === undefined) {
                scope.ledger.append({
                    workerName: aggregator.name,
                    stage: "aggregate",
                    content: outcome.result,
                })
                return { report: outcome.result }
            }

            if (scope.signal.aborted) {
                return {
                    failure: this.abortedFailure(scope, "aggregate", result),
                }
            }

            const error = outcome?.error ?? {
                kind: "WorkerFailure" as const,
                detail: `${aggregator.name} produced no outcome`,
            }
            lastFailure = { workerName: aggregator.name, error }
            scope.diagnostics.push({
                stage: "aggregate",
                workerName: aggregator.name,
                kind: "AggregationFailure",
                detail: `${error.kind}: ${error.detail}`,
                attempt,
            })
            this.eventBus.emit({
                type: "aggregation:failure",
                workerName: aggregator.name,
                attempt,
                maxRetries: this.policy.maxRetriesPerStage,
                detail: error.detail,
            })

            if (attempt < maxAttempts) {
                this.eventBus.emit({
                    type: "stage:retry",
                    stage: "aggregate",
                    attempt: attempt + 1,
                    maxRetries: this.policy.maxRetriesPerStage,
                    workers: [aggregator.name],
                })
            }
        }

        const message = `${aggregator.name} failed ${maxAttempts} time(s); last error: ${lastFailure?.error.detail ?? "unknown"}`
        return {
            failure: {
                kind: "AggregationFailure",
                stage: "aggregate",
                message,
                failedWorkers: lastFailure ? [lastFailure] : [],
                cause: new AggregationFailure(message),
            },
        }
    }

    private abortedFailure(
        scope: RunScope,
        stage: PipelineState,
        result: StageResult
    ): PipelineFailure {
        const failedWorkers: FailedWorker[] = []
        for (const outcome of result.outcomes.values()) {
            if (outcome.error !== undefined) {
                failedWorkers.push({
                    workerName: outcome.workerName,
                    error: outcome.error,
                })
            }
        }
        const reason: unknown = scope.signal.reason
        const cause =
            reason instanceof PipelineAborted
                ? reason
                : new PipelineAborted(toErrorMessage(reason))
        return {
            kind: "PipelineAborted",
            stage,
            message: cause.message,
            failedWorkers,
            cause,
        }
    }

    private emitStageComplete(
        result: StageResult,
        attempt: number,
        startedAt: number
    ): void {
        const succeeded: string[] = []
        const failed: string[] = []
        for (const outcome of result.outcomes.values()) {
            if (outcome.error === undefined) succeeded.push(outcome.workerName)
            else failed.push(outcome.workerName)
        }
        this.eventBus.emit({
            type: "stage:complete",
            stage: result.stage,
            attempt,
            succeeded,
            failed,
            durationMs: Date.now() - startedAt,
        })
    }

    /** Exactly one delivery per run; a failing channel never changes the result. */
    private async deliver(
        scope: RunScope,
        result: PipelineResult
    ): Promise<void> {
        if (!this.delivery) return
        const channel = this.delivery
        try {
            await channel.deliver({
                runId: scope.runId,
                task: scope.task,
                status: result.status,
                report:
                    result.status === "completed" ? result.report : undefined,
                failure:
                    result.status === "failed" ? result.failure : undefined,
                ledger: scope.ledger.snapshot(),
                diagnostics: [...scope.diagnostics],
            })
            this.eventBus.emit({
                type: "delivery:complete",
                channel: channel.name,
                ok: true,
            })
        } catch (error) {
            const detail = toErrorMessage(error)
            log.delivery("Delivery via %s failed: %s", channel.name, detail)
            scope.diagnostics.push({
                stage: "delivery",
                workerName: channel.name,
                kind: "DeliveryFailure",
                detail,
                attempt: 1,
            })
            this.eventBus.emit({
                type: "delivery:complete",
                channel: channel.name,
                ok: false,
                detail,
            })
        }
    }
}

/**
 * One-shot form of `PipelineController.run` for callers that do not need to
 * abort or observe events.
 */
export async function runPipeline(
    task: string,
    domainWorkers: readonly Worker[],
    aggregator: Worker,
    policy: ReliabilityPolicy,
    options: PipelineControllerOptions = {}
): Promise<PipelineResult> {
    return new PipelineController(policy, options).run(
        task,
        domainWorkers,
        aggregator
    )
}
