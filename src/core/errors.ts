import type { WorkerErrorKind } from "../types.js"

export class SwarmError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "SwarmError"
        this.code = code
        this.cause = cause
    }
}

export class ConfigurationError extends SwarmError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigurationError"
    }
}

export class WorkerFailure extends SwarmError {
    public readonly workerName: string

    constructor(workerName: string, message: string, cause?: Error) {
        super(message, "WORKER_FAILURE", cause)
        this.name = "WorkerFailure"
        this.workerName = workerName
    }
}

export class WorkerTimeout extends SwarmError {
    public readonly timeoutMs: number

    constructor(message: string, timeoutMs: number) {
        super(message, "TIMEOUT")
        this.name = "WorkerTimeout"
        this.timeoutMs = timeoutMs
    }
}

export class AggregationFailure extends SwarmError {
    constructor(message: string, cause?: Error) {
        super(message, "AGGREGATION_FAILURE", cause)
        this.name = "AggregationFailure"
    }
}

export class QuorumNotMet extends SwarmError {
    public readonly failedWorkers: string[]

    constructor(message: string, failedWorkers: string[]) {
        super(message, "QUORUM_NOT_MET")
        this.name = "QuorumNotMet"
        this.failedWorkers = failedWorkers
    }
}

export class PipelineAborted extends SwarmError {
    constructor(message: string) {
        super(message, "PIPELINE_ABORTED")
        this.name = "PipelineAborted"
    }
}

export class LLMError extends SwarmError {
    constructor(message: string, cause?: Error) {
        super(message, "LLM_ERROR", cause)
        this.name = "LLMError"
    }
}

export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}

export function classifyWorkerError(error: unknown): WorkerErrorKind {
    if (error instanceof WorkerTimeout) return "Timeout"
    if (error instanceof PipelineAborted) return "Cancelled"
    return "WorkerFailure"
}
