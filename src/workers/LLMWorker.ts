import { LLMError, toErrorMessage, WorkerFailure } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type {
    InvokeOptions,
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    TokenUsage,
    Worker,
    WorkerRole,
} from "../types.js"
import { getSystemPrompt, STOPPING_TOKEN } from "./roles.js"

const DEFAULT_RETRY_DELAYS = [1000, 2000, 4000]

export interface LLMWorkerOptions {
    name: string
    role: WorkerRole
    provider: LLMProvider
    model: ModelConfig
    /** Replaces the role's built-in prompt. */
    systemPrompt?: string
    eventBus?: EventBus
    /** One entry per retry of a transient provider error. */
    retryDelaysMs?: number[]
}

/**
 * A pipeline worker backed by a single chat completion per invocation.
 */
export class LLMWorker implements Worker {
    public readonly name: string
    public readonly role: WorkerRole
    private readonly provider: LLMProvider
    private readonly model: ModelConfig
    private readonly systemPrompt: string
    private readonly eventBus?: EventBus
    private readonly retryDelaysMs: number[]
    private cumulativeUsage: TokenUsage = {
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
    }

    constructor(options: LLMWorkerOptions) {
        this.name = options.name
        this.role = options.role
        this.provider = options.provider
        this.model = options.model
        this.systemPrompt = options.systemPrompt ?? getSystemPrompt(options.role)
        this.eventBus = options.eventBus
        this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS
    }

    public async invoke(
        task: string,
        context: string,
        options: InvokeOptions
    ): Promise<string> {
        const messages: LLMMessage[] = [
            { role: "system", content: this.systemPrompt },
            { role: "user", content: buildUserMessage(this.role, task, context) },
        ]

        const response = await this.callWithRetry(messages, options.signal)
        this.recordUsage(response.usage)
        if (response.stopReason === "max_tokens") {
            log.worker("%s hit the token limit; answer may be cut off", this.name)
        }

        const answer = stripStoppingToken(response.content ?? "")
        if (answer === "") {
            throw new WorkerFailure(this.name, `${this.name} returned an empty answer`)
        }
        return answer
    }

    public getUsage(): TokenUsage {
        return { ...this.cumulativeUsage }
    }

    private async callWithRetry(
        messages: LLMMessage[],
        signal: AbortSignal
    ): Promise<LLMResponse> {
        const maxRetries = this.retryDelaysMs.length
        for (let attempt = 0; ; attempt++) {
            try {
                return await this.provider.chat(messages, this.model, signal)
            } catch (error) {
                if (signal.aborted) throw signal.reason
                const errorMsg = toErrorMessage(error)
                if (!isRetryableError(error) || attempt >= maxRetries) {
                    log.llm(
                        "%s: LLM call failed (attempt %d/%d): %s",
                        this.name,
                        attempt + 1,
                        maxRetries + 1,
                        errorMsg
                    )
                    throw new WorkerFailure(
                        this.name,
                        `${this.name}: ${errorMsg}`,
                        error instanceof Error ? error : undefined
                    )
                }
                const delay = this.retryDelaysMs[attempt] ?? 0
                log.llm(
                    "%s: LLM call failed (attempt %d/%d), retrying in %dms: %s",
                    this.name,
                    attempt + 1,
                    maxRetries + 1,
                    delay,
                    errorMsg
                )
                await sleep(delay, signal)
            }
        }
    }

    private recordUsage(usage: TokenUsage): void {
        this.cumulativeUsage = {
            promptTokens: this.cumulativeUsage.promptTokens + usage.promptTokens,
            completionTokens:
                this.cumulativeUsage.completionTokens + usage.completionTokens,
            totalTokens: this.cumulativeUsage.totalTokens + usage.totalTokens,
        }
        this.eventBus?.emit({
            type: "token:update",
            workerName: this.name,
            model: this.model.model,
            usage,
        })
    }
}

export function buildUserMessage(
    role: WorkerRole,
    task: string,
    context: string
): string {
    const header =
        role === "aggregator"
            ? "## Team analyses"
            : "## Notes from the other analysts"
    const body = context.trim() === "" ? "(none yet)" : context
    return `## Task\n${task}\n\n${header}\n${body}`
}

export function stripStoppingToken(content: string): string {
    return content.split(STOPPING_TOKEN).join("").trim()
}

function isRetryableError(error: unknown): boolean {
    if (!(error instanceof LLMError)) return false
    const msg = error.message.toLowerCase()
    if (msg.includes("429") || msg.includes("rate limit")) return true
    if (msg.includes("500") || msg.includes("502") || msg.includes("503"))
        return true
    return msg.includes("timeout") || msg.includes("econnreset")
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer)
            reject(signal.reason)
        }
        const timer = setTimeout(() => {
            signal.removeEventListener("abort", onAbort)
            resolve()
        }, ms)
        signal.addEventListener("abort", onAbort, { once: true })
    })
}
