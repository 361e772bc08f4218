import type { ToolArgs, ToolCall } from '../types'
import { DEFAULT_TOOL_REASONING, toAgentResponseJson } from './canonical'

/**
 * A single dialect parser: returns canonical JSON when it recognises its
 * format, `undefined` otherwise. Must never throw.
 */
export interface ResponseStrategy {
    readonly name: string
    apply(text: string): string | undefined
}

function reasoningBefore(text: string, index: number): string {
    return text.slice(0, index).trim() || DEFAULT_TOOL_REASONING
}

/** int when there is no `.`, float otherwise, untouched when not numeric. */
export function coerceScalar(value: string): string | number {
    if (value.includes('.')) {
        if (/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(value)) return Number.parseFloat(value)
        return value
    }
    if (/^[+-]?\d+$/.test(value)) return Number.parseInt(value, 10)
    return value
}

// ─── <tool_call><function=NAME><parameter=KEY>VALUE</parameter>... ───────────

const TOOL_CALL_BLOCK = /<tool_call>([\s\S]*?)<\/tool_call>/g
const FUNCTION_NAME = /<function=([^>]+)>/
const PARAMETER = /<parameter=([^>]+)>([\s\S]*?)<\/parameter>/g

export const xmlToolCallStrategy: ResponseStrategy = {
    name: 'xml-tool-call',
    apply(text) {
        const blocks = [...text.matchAll(TOOL_CALL_BLOCK)]
        if (blocks.length === 0) return undefined

        const toolCalls: ToolCall[] = []
        blocks.forEach((block, index) => {
            const body = block[1] ?? ''
            const fn = FUNCTION_NAME.exec(body)
            if (!fn?.[1]) return

            const args: ToolArgs = {}
            for (const param of body.matchAll(PARAMETER)) {
                const key = (param[1] ?? '').trim()
                args[key] = coerceScalar((param[2] ?? '').trim())
            }

            toolCalls.push({ id: `call_${index + 1}`, tool: fn[1].trim(), args })
        })

        if (toolCalls.length === 0) return undefined

        return toAgentResponseJson({
            reasoning: reasoningBefore(text, text.indexOf('<tool_call>')),
            toolCalls,
        })
    },
}

// ─── <function_calls>[ ... ]</function_calls> ────────────────────────────────

const FUNCTION_CALLS_BLOCK = /<function_calls>\s*(\[[\s\S]*?\])\s*<\/function_calls>/

export const functionCallsStrategy: ResponseStrategy = {
    name: 'function-calls',
    apply(text) {
        const match = FUNCTION_CALLS_BLOCK.exec(text)
        if (!match?.[1]) return undefined

        let toolCalls: unknown
        try {
            toolCalls = JSON.parse(match[1])
        } catch {
            // Not a JSON array after all; leave it to the generic cleaning steps
            return undefined
        }
        if (!Array.isArray(toolCalls)) return undefined

        return toAgentResponseJson({
            reasoning: reasoningBefore(text, match.index),
            toolCalls,
        })
    },
}

export const defaultStrategies: readonly ResponseStrategy[] = [xmlToolCallStrategy, functionCallsStrategy]
