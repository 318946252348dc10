import { z } from "zod"

import { log } from "../core/Logger.js"
import { FileStore } from "../persistence/FileStore.js"
import type { DeliveryChannel, DeliveryPayload } from "../types.js"

const stageSchema = z.enum([
    "parallel_analyze",
    "sequential_refine",
    "parallel_reanalyze",
    "aggregate",
])

const workerErrorSchema = z.object({
    kind: z.enum(["Timeout", "WorkerFailure", "Cancelled"]),
    detail: z.string(),
})

export const runRecordSchema = z.object({
    runId: z.string(),
    task: z.string(),
    status: z.enum(["completed", "failed"]),
    deliveredAt: z.string(),
    report: z.string().optional(),
    failure: z
        .object({
            kind: z.enum([
                "ConfigurationError",
                "QuorumNotMet",
                "AggregationFailure",
                "PipelineAborted",
            ]),
            stage: z.union([stageSchema, z.enum(["init", "done", "failed"])]),
            message: z.string(),
            failedWorkers: z.array(
                z.object({ workerName: z.string(), error: workerErrorSchema })
            ),
        })
        .optional(),
    ledger: z.array(
        z.object({
            workerName: z.string(),
            stage: stageSchema,
            content: z.string(),
            sequence: z.number().int(),
            timestamp: z.string(),
        })
    ),
    diagnostics: z.array(
        z.object({
            stage: z.union([stageSchema, z.enum(["init", "delivery"])]),
            workerName: z.string(),
            kind: z.enum([
                "Timeout",
                "WorkerFailure",
                "Cancelled",
                "AggregationFailure",
                "DeliveryFailure",
            ]),
            detail: z.string(),
            attempt: z.number().int(),
        })
    ),
})

export type RunRecord = z.infer<typeof runRecordSchema>

/**
 * Persists every run under `<outDir>/runs/`: `<runId>.json` always, and
 * `<runId>-report.md` when a report was produced.
 */
export class FileDelivery implements DeliveryChannel {
    public readonly name = "file"
    private readonly store: FileStore

    constructor(outDir: string) {
        this.store = new FileStore(outDir)
    }

    public async deliver(payload: DeliveryPayload): Promise<void> {
        const record: RunRecord = {
            runId: payload.runId,
            task: payload.task,
            status: payload.status,
            deliveredAt: new Date().toISOString(),
            report: payload.report,
            failure: payload.failure && {
                kind: payload.failure.kind,
                stage: payload.failure.stage,
                message: payload.failure.message,
                failedWorkers: payload.failure.failedWorkers,
            },
            ledger: [...payload.ledger],
            diagnostics: payload.diagnostics,
        }
        const recordPath = await this.store.write(
            `runs/${payload.runId}`,
            record
        )
        log.delivery("Wrote run record %s", recordPath)

        if (payload.report !== undefined) {
            const reportPath = await this.store.writeText(
                `runs/${payload.runId}-report.md`,
                formatReport(payload.task, payload.report)
            )
            log.delivery("Wrote report %s", reportPath)
        }
    }

    public async load(runId: string): Promise<RunRecord | null> {
        return this.store.read(`runs/${runId}`, runRecordSchema)
    }
}

export function formatReport(task: string, report: string): string {
    return `# Economic Summary\n\n> ${task.replace(/\n/g, "\n> ")}\n\n${report}\n`
}
