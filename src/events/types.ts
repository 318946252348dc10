import type {
    Decision,
    FailureKind,
    PipelineResult,
    StageId,
    TokenUsage,
    WorkerErrorKind,
} from "../types.js"

export type WorkerStatus = "succeeded" | WorkerErrorKind

export type SwarmEvent =
    | {
          type: "pipeline:start"
          runId: string
          task: string
          workers: string[]
          aggregator: string
      }
    | {
          type: "pipeline:complete"
          runId: string
          status: PipelineResult["status"]
          durationMs: number
          failureKind?: FailureKind
      }
    | {
          type: "stage:start"
          stage: StageId
          attempt: number
          workers: string[]
      }
    | {
          type: "stage:complete"
          stage: StageId
          attempt: number
          succeeded: string[]
          failed: string[]
          durationMs: number
      }
    | {
          type: "stage:decision"
          stage: StageId
          decision: Decision["type"]
          workers: string[]
      }
    | {
          type: "stage:retry"
          stage: StageId
          attempt: number
          maxRetries: number
          workers: string[]
      }
    | {
          type: "worker:start"
          stage: StageId
          workerName: string
          attempt: number
      }
    | {
          type: "worker:complete"
          stage: StageId
          workerName: string
          attempt: number
          status: WorkerStatus
          durationMs: number
          detail?: string
      }
    | {
          type: "aggregation:failure"
          workerName: string
          attempt: number
          maxRetries: number
          detail: string
      }
    | {
          type: "token:update"
          workerName: string
          model: string
          usage: TokenUsage
      }
    | {
          type: "delivery:complete"
          channel: string
          ok: boolean
          detail?: string
      }
