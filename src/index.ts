import { DOMAIN_ROLES, validatePolicy } from "./core/Config.js"
import { ConfigurationError } from "./core/errors.js"
import { CostTracker, type CostSummary } from "./core/Pricing.js"
import { FileDelivery } from "./delivery/FileDelivery.js"
import { EventBus } from "./events/EventBus.js"
import { createLLMProvider } from "./llm/index.js"
import { PipelineController } from "./pipeline/PipelineController.js"
import { createRenderer } from "./renderer/index.js"
import type { Renderer } from "./renderer/types.js"
import type {
    LLMProvider,
    LLMProviderType,
    PipelineResult,
    SwarmConfig,
    Worker,
} from "./types.js"
import { createRoleWorker, type WorkerFactoryOptions } from "./workers/index.js"

export type SwarmRunResult = PipelineResult & { cost: CostSummary }

/**
 * Domain analysts plus an aggregator, run through the four-stage pipeline.
 *
 * Domain workers are keyed by domain; their insertion order is the order of
 * the sequential refinement pass.
 */
export class EconomicSummarySwarm {
    private readonly eventBus: EventBus
    private readonly controller: PipelineController
    private readonly renderer: Renderer | null
    private readonly domainWorkers: Map<string, Worker> = new Map()
    private aggregator: Worker

    constructor(config: SwarmConfig) {
        const policy = validatePolicy(config.policy)
        this.eventBus = new EventBus()

        const factory: WorkerFactoryOptions = {
            providers: resolveProviders(config),
            defaultProvider: config.defaultProvider,
            defaultModel: config.defaultModel,
            eventBus: this.eventBus,
        }
        for (const domain of config.domains ?? DOMAIN_ROLES) {
            this.domainWorkers.set(domain, createRoleWorker(domain, factory))
        }
        this.aggregator = createRoleWorker("aggregator", factory)

        this.controller = new PipelineController(policy, {
            maxConcurrency: config.maxConcurrency,
            contextLimits: config.contextLimits,
            delivery:
                config.delivery ??
                (config.outDir ? new FileDelivery(config.outDir) : undefined),
            eventBus: this.eventBus,
        })

        this.renderer = createRenderer(config.renderer ?? "none", {
            verbose: config.verbose ?? false,
        })
    }

    /** Replaces the worker for an existing domain in place, or appends one. */
    public addDomainWorker(domain: string, worker: Worker): void {
        if (domain.trim() === "") {
            throw new ConfigurationError("Domain name must be non-empty")
        }
        this.domainWorkers.set(domain, worker)
    }

    public setAggregator(worker: Worker): void {
        this.aggregator = worker
    }

    public getDomains(): string[] {
        return [...this.domainWorkers.keys()]
    }

    public getEventBus(): EventBus {
        return this.eventBus
    }

    public async run(task: string): Promise<SwarmRunResult> {
        const costs = new CostTracker()
        const stopTracking = this.eventBus.onType("token:update", (event) => {
            costs.record(event.model, event.usage)
        })
        this.renderer?.attach(this.eventBus)

        try {
            const result = await this.controller.run(
                task,
                [...this.domainWorkers.values()],
                this.aggregator
            )
            return { ...result, cost: costs.summary() }
        } finally {
            stopTracking()
            this.renderer?.detach()
        }
    }

    public abort(): void {
        this.controller.abort()
    }
}

function resolveProviders(
    config: SwarmConfig
): Partial<Record<LLMProviderType, LLMProvider>> {
    if (config.providers && Object.keys(config.providers).length > 0) {
        return config.providers
    }
    const providers: Partial<Record<LLMProviderType, LLMProvider>> = {}
    if (config.openaiApiKey) {
        providers.openai = createLLMProvider("openai", config.openaiApiKey)
    }
    if (config.anthropicApiKey) {
        providers.anthropic = createLLMProvider(
            "anthropic",
            config.anthropicApiKey
        )
    }
    return providers
}

export { DOMAIN_ROLES, validatePolicy } from "./core/Config.js"
export {
    AggregationFailure,
    ConfigurationError,
    LLMError,
    PipelineAborted,
    QuorumNotMet,
    SwarmError,
    WorkerFailure,
    WorkerTimeout,
} from "./core/errors.js"
export type { CostSummary } from "./core/Pricing.js"
export { FileDelivery } from "./delivery/FileDelivery.js"
export type { RunRecord } from "./delivery/FileDelivery.js"
export { EventBus } from "./events/EventBus.js"
export type { SwarmEvent } from "./events/types.js"
export {
    ConversationLedger,
    renderContext,
} from "./ledger/ConversationLedger.js"
export {
    PipelineController,
    runPipeline,
} from "./pipeline/PipelineController.js"
export { ReliabilityChecker } from "./reliability/ReliabilityChecker.js"
export { StageExecutor } from "./stage/StageExecutor.js"
export { LLMWorker } from "./workers/index.js"
export type {
    ContextEntry,
    ContextLimits,
    Decision,
    DeliveryChannel,
    DeliveryPayload,
    Diagnostic,
    DomainRole,
    InvokeOptions,
    LedgerEntry,
    PipelineFailure,
    PipelineResult,
    ReliabilityPolicy,
    StageId,
    StageResult,
    SwarmConfig,
    Worker,
    WorkerOutcome,
} from "./types.js"
