import { getDefaultModel } from "../core/Config.js"
import { ConfigurationError } from "../core/errors.js"
import type { EventBus } from "../events/EventBus.js"
import type { LLMProvider, LLMProviderType, WorkerRole } from "../types.js"
import { LLMWorker } from "./LLMWorker.js"
import { getWorkerName } from "./roles.js"

export interface WorkerFactoryOptions {
    providers: Partial<Record<LLMProviderType, LLMProvider>>
    defaultProvider?: LLMProviderType
    defaultModel?: string
    eventBus?: EventBus
}

export function createRoleWorker(
    role: WorkerRole,
    options: WorkerFactoryOptions
): LLMWorker {
    const model = getDefaultModel(
        role,
        options.defaultProvider,
        options.defaultModel
    )
    const provider = options.providers[model.provider]
    if (!provider) {
        throw new ConfigurationError(
            `No ${model.provider} provider configured for ${role}`
        )
    }
    return new LLMWorker({
        name: getWorkerName(role),
        role,
        provider,
        model,
        eventBus: options.eventBus,
    })
}

export { buildUserMessage, LLMWorker, stripStoppingToken } from "./LLMWorker.js"
export type { LLMWorkerOptions } from "./LLMWorker.js"
export { getSystemPrompt, getWorkerName, STOPPING_TOKEN } from "./roles.js"
