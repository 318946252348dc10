import chalk from "chalk"
import logUpdate from "log-update"

import { addCost, CostTracker, formatCost } from "../core/Pricing.js"
import type { EventBus } from "../events/EventBus.js"
import type { SwarmEvent } from "../events/types.js"
import type { CostBreakdown, TokenUsage } from "../types.js"
import { formatDuration, truncate } from "./LogRenderer.js"
import { getStageLabel } from "./stageLabels.js"
import type {
    CreateRendererOptions,
    Renderer,
    RenderNode,
    RenderNodeStatus,
} from "./types.js"

const STATUS_GLYPHS: Record<RenderNodeStatus, string> = {
    pending: chalk.dim("·"),
    running: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    failed: chalk.red("✗"),
    retrying: chalk.yellow("↻"),
}

type EventOf<T extends SwarmEvent["type"]> = Extract<SwarmEvent, { type: T }>

/**
 * Live stage/worker tree redrawn in place with log-update.
 * One node per stage attempt, one child per worker invocation.
 */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private bus: EventBus | null = null
    private handler: ((event: SwarmEvent) => void) | null = null
    private nodes: RenderNode[] = []
    private stageNodes: Map<string, RenderNode> = new Map()
    private workerNodes: Map<string, RenderNode> = new Map()
    private lastWorkerNode: Map<string, RenderNode> = new Map()
    private task = ""
    private startedAt = 0
    private tickInterval: ReturnType<typeof setInterval> | null = null
    private costs = new CostTracker()
    private finished = false
    private failureLine: string | null = null
    private deliveryLine: string | null = null

    constructor(options?: CreateRendererOptions) {
        this.verbose = options?.verbose ?? false
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
        this.stopTick()
        logUpdate.done()
        this.bus = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: SwarmEvent): void {
        switch (event.type) {
            case "pipeline:start":
                this.task = event.task
                this.startedAt = Date.now()
                this.startTick()
                break
            case "pipeline:complete":
                this.finished = true
                this.failureLine =
                    event.status === "failed"
                        ? `Failed: ${event.failureKind ?? "unknown"}`
                        : null
                this.stopTick()
                break
            case "stage:start":
                this.onStageStart(event)
                break
            case "stage:complete":
                this.onStageComplete(event)
                break
            case "stage:retry":
                this.onStageRetry(event)
                break
            case "stage:decision":
                this.onStageDecision(event)
                break
            case "worker:start":
                this.onWorkerStart(event)
                break
            case "worker:complete":
                this.onWorkerComplete(event)
                break
            case "token:update":
                this.onTokenUpdate(event)
                break
            case "delivery:complete":
                this.deliveryLine = event.ok
                    ? `Delivered via ${event.channel}`
                    : `Delivery via ${event.channel} failed: ${event.detail ?? ""}`
                break
            case "aggregation:failure":
                break
        }
        this.render()
    }

    private onStageStart(event: EventOf<"stage:start">): void {
        const node: RenderNode = {
            id: stageKey(event.stage, event.attempt),
            label:
                event.attempt > 1
                    ? `${getStageLabel(event.stage)} (attempt ${event.attempt})`
                    : getStageLabel(event.stage),
            status: "running",
            startedAt: Date.now(),
            children: event.workers.map((name) => ({
                id: workerKey(event.stage, event.attempt, name),
                label: name,
                status: "pending",
                children: [],
            })),
        }
        for (const child of node.children) {
            this.workerNodes.set(child.id, child)
        }
        this.stageNodes.set(node.id, node)
        this.nodes.push(node)
    }

    private onStageComplete(event: EventOf<"stage:complete">): void {
        const node = this.stageNodes.get(stageKey(event.stage, event.attempt))
        if (!node) return
        node.completedAt = Date.now()
        node.status = event.failed.length === 0 ? "completed" : "failed"
    }

    private onStageRetry(event: EventOf<"stage:retry">): void {
        const previous = this.stageNodes.get(
            stageKey(event.stage, event.attempt - 1)
        )
        if (!previous) return
        previous.status = "retrying"
        previous.retryInfo = { attempt: event.attempt, max: event.maxRetries + 1 }
    }

    private onStageDecision(event: EventOf<"stage:decision">): void {
        if (event.decision === "retry") return
        const latest = [...this.stageNodes.values()]
            .filter((n) => n.id.startsWith(`${event.stage}#`))
            .pop()
        if (!latest) return
        if (event.decision === "abort") {
            latest.status = "failed"
            latest.detail = `quorum not met: ${event.workers.join(", ")}`
            return
        }
        latest.status = "completed"
        if (event.decision === "degrade") {
            latest.detail = `degraded to ${event.workers.join(", ")}`
        }
    }

    private onWorkerStart(event: EventOf<"worker:start">): void {
        const node = this.workerNodes.get(
            workerKey(event.stage, event.attempt, event.workerName)
        )
        if (!node) return
        node.status = "running"
        node.startedAt = Date.now()
        this.lastWorkerNode.set(event.workerName, node)
    }

    private onWorkerComplete(event: EventOf<"worker:complete">): void {
        const node = this.workerNodes.get(
            workerKey(event.stage, event.attempt, event.workerName)
        )
        if (!node) return
        node.completedAt = (node.startedAt ?? Date.now()) + event.durationMs
        node.status = event.status === "succeeded" ? "completed" : "failed"
        node.detail =
            event.status === "succeeded"
                ? undefined
                : `${event.status}: ${event.detail ?? ""}`
    }

    private onTokenUpdate(event: EventOf<"token:update">): void {
        const cost = this.costs.record(event.model, event.usage)
        const node = this.lastWorkerNode.get(event.workerName)
        if (node) {
            node.tokenUsage = addUsage(
                node.tokenUsage ?? emptyUsage(),
                event.usage
            )
            node.cost = addCost(node.cost ?? emptyCost(), cost)
            node.model = event.model
        }
    }

    private render(): void {
        const lines: string[] = []

        lines.push(
            `${chalk.bold.cyan("econ-swarm")}  ${chalk.dim(truncate(this.task, 80))}`
        )
        lines.push(chalk.dim("│"))

        for (let i = 0; i < this.nodes.length; i++) {
            const isLast = i === this.nodes.length - 1
            this.renderNode(
                this.nodes[i],
                lines,
                isLast ? "└" : "├",
                isLast ? " " : "│"
            )
        }

        const { usage, cost } = this.costs.summary()
        const tokenStr = formatTokenCount(usage.totalTokens)
        const costStr = formatCost(cost.totalCost)
        const elapsedStr = this.startedAt
            ? formatDuration(Date.now() - this.startedAt)
            : ""

        lines.push(chalk.dim("│"))
        lines.push(
            chalk.dim(
                `${this.finished ? "├" : "└"}─ ${this.nodes.length} stage attempts  ·  ${tokenStr} tokens  ·  ${costStr}${elapsedStr ? `  ·  ${elapsedStr}` : ""}`
            )
        )

        if (this.finished) {
            this.renderCostBreakdown(lines)
            if (this.deliveryLine) {
                lines.push(chalk.dim(`├─ ${this.deliveryLine}`))
            }
            lines.push(chalk.dim("│"))
            lines.push(
                this.failureLine
                    ? chalk.red(`╰─ ${this.failureLine}`)
                    : chalk.green("╰─ Report ready")
            )
        }

        const output = lines.join("\n")
        logUpdate(output)
    }

    private renderNode(
        node: RenderNode,
        lines: string[],
        connector: string,
        childPrefix: string
    ): void {
        const glyph = STATUS_GLYPHS[node.status]
        const elapsed = formatNodeElapsed(node)
        const tokens = node.tokenUsage
            ? chalk.dim(`${formatTokenCount(node.tokenUsage.totalTokens)} tok`)
            : ""
        const costTag = node.cost
            ? chalk.dim(formatCost(node.cost.totalCost))
            : ""
        const retryTag = node.retryInfo
            ? chalk.yellow(
                  ` ← retrying (${node.retryInfo.attempt}/${node.retryInfo.max})`
              )
            : ""

        lines.push(
            [
                chalk.dim(`${connector}─`),
                glyph,
                node.label,
                elapsed ? chalk.dim(elapsed) : "",
                tokens,
                costTag,
                retryTag,
            ]
                .filter(Boolean)
                .join("  ")
        )

        const details: string[] = []
        if (node.detail) details.push(node.detail)
        if (this.verbose && node.model) details.push(`model: ${node.model}`)

        const hasChildren = node.children.length > 0
        for (let i = 0; i < details.length; i++) {
            const isLastDetail = i === details.length - 1 && !hasChildren
            lines.push(
                chalk.dim(
                    `${childPrefix}  ${isLastDetail ? "└─" : "├─"} ${truncate(details[i], 100)}`
                )
            )
        }

        for (let i = 0; i < node.children.length; i++) {
            const isLastChild = i === node.children.length - 1
            this.renderNode(
                node.children[i],
                lines,
                `${childPrefix}  ${isLastChild ? "└" : "├"}`,
                `${childPrefix}  ${isLastChild ? " " : "│"}`
            )
        }
    }

    private renderCostBreakdown(lines: string[]): void {
        const { usage, cost: totalCost, byModel } = this.costs.summary()
        const total = totalCost.totalCost
        if (Object.keys(byModel).length === 0) return

        lines.push(chalk.dim("│"))
        lines.push(chalk.dim("├─ Cost Breakdown"))
        const modelParts = Object.entries(byModel)
            .sort(([, a], [, b]) => b.totalCost - a.totalCost)
            .map(([model, cost]) => {
                const pct =
                    total > 0 ? Math.round((cost.totalCost / total) * 100) : 0
                const shortModel = model.replace(/-\d{8}$/, "")
                return `${shortModel} ${formatCost(cost.totalCost)} (${pct}%)`
            })
            .join("  ·  ")
        lines.push(chalk.dim(`│  By model:   ${modelParts}`))

        const inTokens = formatTokenCount(usage.promptTokens)
        const outTokens = formatTokenCount(usage.completionTokens)
        lines.push(
            chalk.dim(`│  Tokens:     ${inTokens} in  ·  ${outTokens} out`)
        )
    }
}

function stageKey(stage: string, attempt: number): string {
    return `${stage}#${attempt}`
}

function workerKey(stage: string, attempt: number, name: string): string {
    return `${stage}#${attempt}/${name}`
}

function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

function emptyCost(): CostBreakdown {
    return { inputCost: 0, outputCost: 0, totalCost: 0 }
}

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
    return {
        promptTokens: a.promptTokens + b.promptTokens,
        completionTokens: a.completionTokens + b.completionTokens,
        totalTokens: a.totalTokens + b.totalTokens,
    }
}

function formatNodeElapsed(node: RenderNode): string {
    if (!node.startedAt) return ""
    const end = node.completedAt ?? Date.now()
    return formatDuration(end - node.startedAt)
}

function formatTokenCount(tokens: number): string {
    if (tokens < 1000) return String(tokens)
    return `${(tokens / 1000).toFixed(1)}k`
}
