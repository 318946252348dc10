import type { CostBreakdown, TokenUsage } from "../types.js"
import { log } from "./Logger.js"

export interface ModelPricing {
    inputPerMillion: number
    outputPerMillion: number
}

const DEFAULT_PRICING: ModelPricing = {
    inputPerMillion: 2.5,
    outputPerMillion: 10,
}

// USD per million tokens. Longer keys first so prefix matching picks the
// most specific entry ("gpt-4o-mini-2024-07-18" must not match "gpt-4o").
const MODEL_PRICING: Record<string, ModelPricing> = {
    "gpt-4o-mini": { inputPerMillion: 0.15, outputPerMillion: 0.6 },
    "gpt-4o": { inputPerMillion: 2.5, outputPerMillion: 10 },
    "gpt-4.1-mini": { inputPerMillion: 0.4, outputPerMillion: 1.6 },
    "gpt-4.1-nano": { inputPerMillion: 0.1, outputPerMillion: 0.4 },
    "gpt-4.1": { inputPerMillion: 2, outputPerMillion: 8 },
    "claude-sonnet-4": { inputPerMillion: 3, outputPerMillion: 15 },
    "claude-opus-4": { inputPerMillion: 15, outputPerMillion: 75 },
    "claude-3-5-haiku": { inputPerMillion: 0.8, outputPerMillion: 4 },
}

export function getModelPricing(model: string): ModelPricing {
    const exact = MODEL_PRICING[model]
    if (exact) return exact

    const prefix = Object.keys(MODEL_PRICING).find((key) =>
        model.startsWith(key)
    )
    if (prefix) return MODEL_PRICING[prefix]

    log.llm("Unknown model %s, using default pricing", model)
    return DEFAULT_PRICING
}

export function calculateCost(model: string, usage: TokenUsage): CostBreakdown {
    const pricing = getModelPricing(model)
    const inputCost = (usage.promptTokens / 1_000_000) * pricing.inputPerMillion
    const outputCost =
        (usage.completionTokens / 1_000_000) * pricing.outputPerMillion
    return {
        inputCost,
        outputCost,
        totalCost: inputCost + outputCost,
    }
}

export function formatCost(cost: number): string {
    if (cost < 0.01) return `$${cost.toFixed(4)}`
    return `$${cost.toFixed(2)}`
}

export interface CostSummary {
    usage: TokenUsage
    cost: CostBreakdown
    byModel: Record<string, CostBreakdown>
}

/** Running token and cost totals for one run, fed from `token:update`. */
export class CostTracker {
    private usage: TokenUsage = {
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
    }
    private cost: CostBreakdown = { inputCost: 0, outputCost: 0, totalCost: 0 }
    private byModel: Record<string, CostBreakdown> = {}

    public record(model: string, usage: TokenUsage): CostBreakdown {
        const cost = calculateCost(model, usage)
        this.usage = {
            promptTokens: this.usage.promptTokens + usage.promptTokens,
            completionTokens:
                this.usage.completionTokens + usage.completionTokens,
            totalTokens: this.usage.totalTokens + usage.totalTokens,
        }
        this.cost = addCost(this.cost, cost)
        this.byModel[model] = addCost(
            this.byModel[model] ?? { inputCost: 0, outputCost: 0, totalCost: 0 },
            cost
        )
        return cost
    }

    public summary(): CostSummary {
        return {
            usage: { ...this.usage },
            cost: { ...this.cost },
            byModel: { ...this.byModel },
        }
    }
}

export function addCost(a: CostBreakdown, b: CostBreakdown): CostBreakdown {
    return {
        inputCost: a.inputCost + b.inputCost,
        outputCost: a.outputCost + b.outputCost,
        totalCost: a.totalCost + b.totalCost,
    }
}
