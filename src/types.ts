import type { SwarmError } from "./core/errors.js"

export type StageId =
    | "parallel_analyze"
    | "sequential_refine"
    | "parallel_reanalyze"
    | "aggregate"

export type DomainStageId = Exclude<StageId, "aggregate">

export type PipelineState = "init" | StageId | "done" | "failed"

export const DOMAIN_STAGES: readonly DomainStageId[] = [
    "parallel_analyze",
    "sequential_refine",
    "parallel_reanalyze",
]

export type DomainRole =
    | "macro"
    | "equities"
    | "fixed_income"
    | "commodities"
    | "political"

export type WorkerRole = DomainRole | "aggregator"

export type LLMProviderType = "openai" | "anthropic"

export type RendererType = "terminal" | "log" | "none"

export type WorkerErrorKind = "Timeout" | "WorkerFailure" | "Cancelled"

export type FailureKind =
    | "ConfigurationError"
    | "QuorumNotMet"
    | "AggregationFailure"
    | "PipelineAborted"

export type DiagnosticKind =
    | WorkerErrorKind
    | "AggregationFailure"
    | "DeliveryFailure"

export interface InvokeOptions {
    signal: AbortSignal
    /** Epoch milliseconds after which the result is discarded. */
    deadline: number
}

export interface Worker {
    readonly name: string
    invoke(task: string, context: string, options: InvokeOptions): Promise<string>
}

export interface ContextEntry {
    workerName: string
    stage: StageId
    content: string
}

export interface LedgerEntry extends ContextEntry {
    sequence: number
    timestamp: string
}

export interface ContextLimits {
    maxEntries?: number
    maxChars?: number
}

export interface WorkerError {
    kind: WorkerErrorKind
    detail: string
}

export type WorkerOutcome =
    | {
          workerName: string
          stage: StageId
          result: string
          error?: undefined
          durationMs: number
      }
    | {
          workerName: string
          stage: StageId
          result?: undefined
          error: WorkerError
          durationMs: number
      }

export interface StageResult {
    stage: StageId
    outcomes: Map<string, WorkerOutcome>
    quorumMet: boolean
}

export interface ReliabilityPolicy {
    quorumFraction: number
    maxRetriesPerStage: number
    allowDegrade: boolean
    timeoutPerWorkerMs: number
    stageDeadlineMs?: number
}

export interface FailedWorker {
    workerName: string
    error: WorkerError
}

export type Decision =
    | { type: "advance"; workers: string[] }
    | { type: "retry"; workers: string[] }
    | { type: "degrade"; workers: string[] }
    | { type: "abort"; reason: string; failedWorkers: FailedWorker[] }

export interface Diagnostic {
    stage: StageId | "init" | "delivery"
    workerName: string
    kind: DiagnosticKind
    detail: string
    attempt: number
}

export interface PipelineFailure {
    kind: FailureKind
    stage: PipelineState
    message: string
    failedWorkers: FailedWorker[]
    /** Typed counterpart of `kind`, for callers that branch on `instanceof`. */
    cause?: SwarmError
}

export type PipelineResult =
    | {
          status: "completed"
          runId: string
          report: string
          ledger: readonly LedgerEntry[]
          diagnostics: Diagnostic[]
          durationMs: number
      }
    | {
          status: "failed"
          runId: string
          failure: PipelineFailure
          partialLedger: readonly LedgerEntry[]
          diagnostics: Diagnostic[]
          durationMs: number
      }

export interface DeliveryPayload {
    runId: string
    task: string
    status: PipelineResult["status"]
    report?: string
    failure?: PipelineFailure
    ledger: readonly LedgerEntry[]
    diagnostics: Diagnostic[]
}

export interface DeliveryChannel {
    readonly name: string
    deliver(payload: DeliveryPayload): Promise<void>
}

export interface PipelineOptions {
    maxConcurrency?: number
    contextLimits?: ContextLimits
    delivery?: DeliveryChannel
}

export interface ModelConfig {
    provider: LLMProviderType
    model: string
    temperature?: number
    maxTokens?: number
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface CostBreakdown {
    inputCost: number
    outputCost: number
    totalCost: number
}

export interface LLMMessage {
    role: "system" | "user" | "assistant"
    content: string
}

export type StopReason = "end_turn" | "max_tokens"

export interface LLMResponse {
    content: string | null
    usage: TokenUsage
    stopReason: StopReason
}

export interface LLMProvider {
    chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse>
}

export interface SwarmConfig {
    policy: ReliabilityPolicy
    openaiApiKey?: string
    anthropicApiKey?: string
    domains?: DomainRole[]
    defaultProvider?: LLMProviderType
    defaultModel?: string
    renderer?: RendererType
    verbose?: boolean
    maxConcurrency?: number
    contextLimits?: ContextLimits
    outDir?: string
    providers?: Partial<Record<LLMProviderType, LLMProvider>>
    delivery?: DeliveryChannel
}
