import { vi } from "vitest"

import type { LLMMessage, LLMProvider, LLMResponse } from "../../types.js"

export function createMockProvider(
    responses: Array<LLMResponse | Error>
): LLMProvider {
    let callIndex = 0
    return {
        chat: vi.fn((): Promise<LLMResponse> => {
            const response = responses[callIndex]
            if (!response) {
                return Promise.reject(
                    new Error(`No mock response for call index ${callIndex}`)
                )
            }
            callIndex++
            return response instanceof Error
                ? Promise.reject(response)
                : Promise.resolve(response)
        }),
    }
}

/** Answers every call; the text may depend on the system prompt and user message. */
export function createEchoProvider(
    answer: (system: string, user: string) => string
): LLMProvider {
    return {
        chat: vi.fn((messages: LLMMessage[]): Promise<LLMResponse> => {
            const system = messages.find((m) => m.role === "system")?.content ?? ""
            const user = messages.find((m) => m.role === "user")?.content ?? ""
            return Promise.resolve(mockTextResponse(answer(system, user)))
        }),
    }
}

export function mockTextResponse(
    content: string | null,
    stopReason: LLMResponse["stopReason"] = "end_turn"
): LLMResponse {
    return {
        content,
        usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
        stopReason,
    }
}
