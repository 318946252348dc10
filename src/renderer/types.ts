import type { EventBus } from "../events/EventBus.js"
import type { CostBreakdown, TokenUsage } from "../types.js"

export type RenderNodeStatus =
    | "pending"
    | "running"
    | "completed"
    | "failed"
    | "retrying"

export interface RenderNode {
    id: string
    label: string
    status: RenderNodeStatus
    startedAt?: number
    completedAt?: number
    tokenUsage?: TokenUsage
    cost?: CostBreakdown
    model?: string
    retryInfo?: { attempt: number; max: number }
    detail?: string
    children: RenderNode[]
}

export interface CreateRendererOptions {
    verbose?: boolean
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
