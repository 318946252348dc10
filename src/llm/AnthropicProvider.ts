import Anthropic from "@anthropic-ai/sdk"

import { LLMError, toErrorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    TokenUsage,
} from "../types.js"

export class AnthropicProvider implements LLMProvider {
    private client: Anthropic

    constructor(apiKey: string) {
        this.client = new Anthropic({ apiKey })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const { system, anthropicMessages } = convertMessages(messages)

            const response = await this.client.messages.create(
                {
                    model: model.model,
                    system: system || undefined,
                    messages: anthropicMessages,
                    temperature: model.temperature,
                    max_tokens: model.maxTokens ?? 4096,
                },
                { signal }
            )

            let textContent = ""
            for (const block of response.content) {
                if (block.type === "text") {
                    textContent += block.text
                }
            }

            const usage: TokenUsage = {
                promptTokens: response.usage.input_tokens,
                completionTokens: response.usage.output_tokens,
                totalTokens:
                    response.usage.input_tokens + response.usage.output_tokens,
            }
            log.llm(
                "anthropic %s: %d tokens, stop %s",
                model.model,
                usage.totalTokens,
                response.stop_reason
            )

            return {
                content: textContent || null,
                usage,
                stopReason:
                    response.stop_reason === "max_tokens"
                        ? "max_tokens"
                        : "end_turn",
            }
        } catch (error) {
            if (error instanceof LLMError) throw error
            throw new LLMError(
                `Anthropic API error: ${toErrorMessage(error)}`,
                error instanceof Error ? error : undefined
            )
        }
    }
}

interface ConvertedMessages {
    system: string
    anthropicMessages: Anthropic.MessageParam[]
}

/** System messages are lifted into the top-level `system` field. */
function convertMessages(messages: LLMMessage[]): ConvertedMessages {
    let system = ""
    const anthropicMessages: Anthropic.MessageParam[] = []

    for (const msg of messages) {
        if (msg.role === "system") {
            system += (system ? "\n\n" : "") + msg.content
            continue
        }
        anthropicMessages.push({ role: msg.role, content: msg.content })
    }

    return { system, anthropicMessages }
}
