import { CostTracker, formatCost } from "../core/Pricing.js"
import type { EventBus } from "../events/EventBus.js"
import type { SwarmEvent } from "../events/types.js"
import { getStageLabel } from "./stageLabels.js"
import type { Renderer } from "./types.js"

type LineWriter = (line: string) => void

/**
 * Plain timestamped lines, one per event. Suited to CI logs and pipes where
 * the live terminal view would garble.
 */
export class LogRenderer implements Renderer {
    private bus: EventBus | null = null
    private handler: ((event: SwarmEvent) => void) | null = null
    private startedAt = 0
    private readonly costs = new CostTracker()
    private readonly write: LineWriter

    constructor(write?: LineWriter) {
        this.write = write ?? ((line: string): void => {
            process.stdout.write(line)
        })
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: SwarmEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.bus = null
        this.handler = null
    }

    private handleEvent(event: SwarmEvent): void {
        if (event.type === "token:update") {
            this.costs.record(event.model, event.usage)
        }
        const line = this.formatEvent(event)
        if (line) {
            const elapsed = this.formatElapsed()
            this.write(`[${elapsed}] ${line}\n`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = Date.now()
        const seconds = (Date.now() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }

    private formatEvent(event: SwarmEvent): string | null {
        switch (event.type) {
            case "pipeline:start":
                return `pipeline:start  ${event.runId.slice(0, 8)}  ${event.workers.length}+1 workers  "${truncate(event.task, 60)}"`
            case "pipeline:complete": {
                const kind = event.failureKind ? ` (${event.failureKind})` : ""
                return `pipeline:done   ${event.status}${kind}  ${formatDuration(event.durationMs)}  cost ${formatCost(this.costs.summary().cost.totalCost)}`
            }
            case "stage:start":
                return `stage:start     ${pad(getStageLabel(event.stage))}  attempt ${event.attempt}  ${event.workers.join(", ")}`
            case "stage:complete":
                return `stage:complete  ${pad(getStageLabel(event.stage))}  ${event.succeeded.length}/${event.succeeded.length + event.failed.length} ok  ${formatDuration(event.durationMs)}`
            case "stage:decision":
                return `stage:decision  ${pad(getStageLabel(event.stage))}  ${event.decision}`
            case "stage:retry":
                return `stage:retry     ${pad(getStageLabel(event.stage))}  attempt ${event.attempt}/${event.maxRetries + 1}  ${event.workers.join(", ")}`
            case "worker:complete": {
                if (event.status === "succeeded") return null
                return `worker:failed   ${pad(event.workerName)}  ${event.status}  ${truncate(event.detail ?? "", 80)}`
            }
            case "aggregation:failure":
                return `aggregate:fail  ${pad(event.workerName)}  attempt ${event.attempt}/${event.maxRetries + 1}  ${truncate(event.detail, 80)}`
            case "delivery:complete":
                return `delivery        ${pad(event.channel)}  ${event.ok ? "ok" : `failed: ${event.detail ?? ""}`}`
            case "worker:start":
            case "token:update":
                return null
        }
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}

export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}
