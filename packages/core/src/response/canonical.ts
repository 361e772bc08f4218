export const DEFAULT_TOOL_REASONING = 'Calling tools to gather information.'

export interface CanonicalResponseInput {
    reasoning: string
    toolCalls: unknown[] | null
    result?: string | null
    isFinished?: boolean
}

/**
 * Serializes the canonical structured-response JSON every provider dialect is
 * converted into: `{ reasoning, tool_calls, result, is_finished }`.
 */
export function toAgentResponseJson(input: CanonicalResponseInput): string {
    return JSON.stringify({
        reasoning: input.reasoning,
        tool_calls: input.toolCalls,
        result: input.result ?? null,
        is_finished: input.isFinished ?? false,
    })
}
