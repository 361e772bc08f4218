import { z } from 'zod'
import { ErrorCode } from '../types'
import type { AgentResponse, Message } from '../types'

export const ToolCallSchema = z.object({
    id: z.string().describe("Unique identifier for this tool call (e.g., 'call_1', 'call_2')"),
    tool: z.string().describe('The name of the tool to call.'),
    args: z.record(z.string(), z.unknown()).describe('The arguments to pass to the tool.'),
})

/**
 * The structured reply format. Rendered into the system prompt as JSON Schema
 * and used to validate every normalized model response.
 */
export const AgentResponseSchema = z
    .object({
        reasoning: z.string().describe('Use this field to reason about the problem and the solution.'),
        tool_calls: z
            .array(ToolCallSchema)
            .nullish()
            .describe("Use this field to call a tool. If you don't need to call a tool, leave it empty."),
        result: z
            .string()
            .nullish()
            .describe('Use this field to return the response, when is_finished is true.'),
        is_finished: z
            .boolean()
            .describe(
                'Use this field to indicate if the agent has finished its task. ' +
                'If it has finished, set this to true and result must be set.',
            ),
    })
    .describe("The LLM's response format - think out loud, call tools, or finish with an answer.")

export function toAgentResponse(parsed: z.output<typeof AgentResponseSchema>): AgentResponse {
    return {
        reasoning: parsed.reasoning,
        tool_calls: parsed.tool_calls ?? null,
        result: parsed.result ?? null,
        is_finished: parsed.is_finished,
    }
}

// ─── Wire format ─────────────────────────────────────────────────────────────

export const MessageWireSchema = z.object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: z.string(),
    timestamp: z.number(),
    error_code: z.enum(ErrorCode).nullish(),
    tool_calls: z.array(ToolCallSchema).nullish(),
    tool_call_id: z.string().nullish(),
    name: z.string().nullish(),
    tokens_in: z.number().nullish(),
    tokens_out: z.number().nullish(),
    metadata: z.record(z.string(), z.unknown()).nullish(),
})

export type MessageWire = z.infer<typeof MessageWireSchema>

/** snake_case JSON form used by checkpoints and result trajectories. */
export function toWire(message: Message): MessageWire {
    const wire: MessageWire = {
        role: message.role,
        content: message.content,
        timestamp: message.timestamp,
    }
    if (message.errorCode !== undefined) wire.error_code = message.errorCode
    if (message.toolCalls !== undefined) {
        wire.tool_calls = message.toolCalls.map((tc) => ({ id: tc.id, tool: tc.tool, args: { ...tc.args } }))
    }
    if (message.toolCallId !== undefined) wire.tool_call_id = message.toolCallId
    if (message.name !== undefined) wire.name = message.name
    if (message.tokensIn !== undefined) wire.tokens_in = message.tokensIn
    if (message.tokensOut !== undefined) wire.tokens_out = message.tokensOut
    if (message.metadata !== undefined) wire.metadata = { ...message.metadata }
    return wire
}

export function fromWire(wire: MessageWire): Message {
    const message: Message = {
        role: wire.role,
        content: wire.content,
        timestamp: wire.timestamp,
    }
    if (wire.error_code != null) message.errorCode = wire.error_code
    if (wire.tool_calls != null) message.toolCalls = wire.tool_calls
    if (wire.tool_call_id != null) message.toolCallId = wire.tool_call_id
    if (wire.name != null) message.name = wire.name
    if (wire.tokens_in != null) message.tokensIn = wire.tokens_in
    if (wire.tokens_out != null) message.tokensOut = wire.tokens_out
    if (wire.metadata != null) message.metadata = wire.metadata
    return message
}
