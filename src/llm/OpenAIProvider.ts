import OpenAI from "openai"

import { LLMError, toErrorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    TokenUsage,
} from "../types.js"

export class OpenAIProvider implements LLMProvider {
    private client: OpenAI

    constructor(apiKey: string) {
        this.client = new OpenAI({ apiKey })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: model.model,
                    messages: messages.map(toOpenAIMessage),
                    temperature: model.temperature,
                    max_completion_tokens: model.maxTokens,
                },
                { signal }
            )

            const choice = response.choices[0]
            if (!choice) {
                throw new LLMError("OpenAI returned no choices")
            }

            const usage: TokenUsage = {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0,
                totalTokens: response.usage?.total_tokens ?? 0,
            }
            log.llm(
                "openai %s: %d tokens, finish %s",
                model.model,
                usage.totalTokens,
                choice.finish_reason
            )

            return {
                content: choice.message.content,
                usage,
                stopReason:
                    choice.finish_reason === "length" ? "max_tokens" : "end_turn",
            }
        } catch (error) {
            if (error instanceof LLMError) throw error
            throw new LLMError(
                `OpenAI API error: ${toErrorMessage(error)}`,
                error instanceof Error ? error : undefined
            )
        }
    }
}

function toOpenAIMessage(msg: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (msg.role) {
        case "system":
            return { role: "system", content: msg.content }
        case "user":
            return { role: "user", content: msg.content }
        case "assistant":
            return { role: "assistant", content: msg.content }
    }
}
