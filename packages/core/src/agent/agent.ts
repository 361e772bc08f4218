import { z } from 'zod'
import type {
    AgentConfig,
    AgentObserver,
    AgentResponse,
    AgentTool,
    CheckpointState,
    Logger,
    Message,
    ModelProvider,
    Result,
    RunOptions,
    ToolCall,
} from '../types'
import { ErrorCode, ResultStatus } from '../types'
import { ObserverBus } from '../observer/bus'
import { createMessage } from '../messages/message'
import { AgentResponseSchema, toAgentResponse, toWire } from '../messages/schema'
import { readCheckpoint, writeCheckpoint } from '../checkpoint/checkpoint'
import { DEFAULT_SYSTEM_PROMPT, renderSystemPrompt } from './prompt'

export const MAX_TURNS_MARKER = '[MAX_TURNS] Agent did not complete within turn limit'

const RESPONSE_SHAPE_REMINDER =
    'Respond with a JSON object of the form ' +
    '{"reasoning": "...", "tool_calls": [...] or null, "result": "..." or null, "is_finished": true or false}.'

type ParseOutcome = { ok: true; response: AgentResponse } | { ok: false; detail: string }

/**
 * Drives the reason / act / observe loop.
 *
 * Each turn makes one provider call. Recoverable problems (unparsable output,
 * filtered or empty responses, failing tools) are written into the
 * conversation so the model can correct itself; configuration and exhausted
 * transient errors propagate to the caller.
 */
export class Agent {
    readonly maxTurns: number
    private readonly provider: ModelProvider
    private readonly tools: readonly AgentTool[]
    private readonly bus: ObserverBus
    private readonly logger: Logger
    private readonly systemPrompt: string

    private _messages: Message[] = []
    private _turnCount = 0
    private _tokensUsed = 0
    private _running = false

    constructor(config: AgentConfig) {
        this.provider = config.provider
        this.tools = [...(config.tools ?? [])]
        this.maxTurns = config.maxTurns ?? 10
        this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT
        this.logger = config.logger ?? console
        this.bus = new ObserverBus(config.observers, this.logger)

        if (!Number.isInteger(this.maxTurns) || this.maxTurns < 1) {
            throw new RangeError(`[Agent] maxTurns must be a positive integer, got ${this.maxTurns}`)
        }
    }

    get messages(): readonly Message[] {
        return this._messages
    }

    get turnCount(): number {
        return this._turnCount
    }

    get tokensUsed(): number {
        return this._tokensUsed
    }

    observe(observer: AgentObserver): this {
        this.bus.add(observer)
        return this
    }

    renderSystemPrompt(): string {
        return renderSystemPrompt(this.systemPrompt, this.tools)
    }

    // ─── Run ─────────────────────────────────────────────────────────────────

    async run(options: RunOptions | string): Promise<Result> {
        const opts: RunOptions = typeof options === 'string' ? { input: options } : options

        if (this._running) {
            throw new Error('[Agent] run() called while a previous run is still in progress')
        }
        this._running = true

        try {
            if (!opts.autoCheckpoint) return await this.execute(opts)

            try {
                return await this.execute(opts)
            } catch (err) {
                await this.saveCrashCheckpoint(opts.autoCheckpoint)
                throw err
            }
        } finally {
            this._running = false
        }
    }

    private async execute(opts: RunOptions): Promise<Result> {
        let reset = opts.reset ?? true
        if (opts.checkpoint) {
            await this.loadCheckpoint(opts.checkpoint)
            reset = false
        }

        if (reset || this._messages.length === 0) {
            this._messages = [createMessage('system', this.renderSystemPrompt())]
            this._turnCount = 0
            this._tokensUsed = 0
        }

        this._messages.push(createMessage('user', opts.input))

        while (this._turnCount < this.maxTurns) {
            this._turnCount++
            const turn = this._turnCount

            await this.bus.notify('onTurnStart', { turn, messages: this._messages })

            const response = await this.provider.call(this._messages)
            this._tokensUsed += (response.tokensIn ?? 0) + (response.tokensOut ?? 0)

            if (response.errorCode) {
                await this.recordSemanticError(turn, response, response.errorCode, semanticErrorContent(response))
                continue
            }

            const parsed = parseAgentResponse(response.content)
            if (!parsed.ok) {
                await this.recordSemanticError(turn, response, ErrorCode.PARSE_ERROR, parsed.detail)
                continue
            }

            const agentResponse = parsed.response
            const toolCalls = this.assignCallIds(agentResponse.tool_calls ?? [], turn)

            const assistant = createMessage('assistant', response.content, {
                toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
                tokensIn: response.tokensIn,
                tokensOut: response.tokensOut,
                metadata: {
                    ...response.metadata,
                    reasoning: agentResponse.reasoning,
                    is_finished: agentResponse.is_finished,
                },
            })
            this._messages.push(assistant)
            await this.bus.notify('onLlmResponse', { turn, response: assistant })

            for (const call of toolCalls) {
                await this.executeToolCall(turn, call)
            }

            if (agentResponse.is_finished) {
                return this.finish(agentResponse.result ?? '')
            }
        }

        const exhausted: Result = {
            value: MAX_TURNS_MARKER,
            status: ResultStatus.MAX_TURNS_REACHED,
            error: `Agent did not finish within ${this.maxTurns} turns`,
            metadata: this.runMetadata(),
        }
        await this.bus.notify('onError', { turn: this._turnCount, error: 'Max turns reached' })
        return exhausted
    }

    private async finish(value: string): Promise<Result> {
        const result: Result = {
            value,
            status: ResultStatus.SUCCESS,
            error: null,
            metadata: this.runMetadata(),
        }
        const finalResult = createMessage('assistant', value, { metadata: result.metadata })
        await this.bus.notify('onFinish', { finalResult, allMessages: this._messages })
        return result
    }

    private runMetadata(): Record<string, unknown> {
        return {
            turns: this._turnCount,
            tokens: this._tokensUsed,
            trajectory: this._messages.map(toWire),
        }
    }

    private async recordSemanticError(
        turn: number,
        response: Message,
        errorCode: ErrorCode,
        content: string,
    ): Promise<void> {
        this._messages.push(
            createMessage('assistant', content, {
                errorCode,
                tokensIn: response.tokensIn,
                tokensOut: response.tokensOut,
                metadata: { ...response.metadata, raw_response: response.content },
            }),
        )
        await this.bus.notify('onError', {
            turn,
            error: `Semantic error: ${errorCode}`,
            rawResponse: response.content,
        })
    }

    // ─── Tools ───────────────────────────────────────────────────────────────

    /**
     * Tool call ids must be unique across the whole conversation. Empty or
     * already used ids are replaced with `call_<turn>_<n>`.
     */
    private assignCallIds(calls: readonly ToolCall[], turn: number): ToolCall[] {
        const used = new Set<string>()
        for (const message of this._messages) {
            message.toolCalls?.forEach((tc) => used.add(tc.id))
        }

        let next = 1
        return calls.map((call) => {
            let id = call.id
            if (!id || used.has(id)) {
                do {
                    id = `call_${turn}_${next++}`
                } while (used.has(id))
                this.logger.debug(`[Agent] Reassigned tool call id "${call.id}" to "${id}"`)
            }
            used.add(id)
            return { id, tool: call.tool, args: { ...call.args } }
        })
    }

    private async executeToolCall(turn: number, call: ToolCall): Promise<void> {
        const tool = this.tools.find((t) => t.name === call.tool)
        const outcome = tool
            ? await tool.run(call.args)
            : createMessage(
                'tool',
                `Tool '${call.tool}' not found. Available: [${this.tools.map((t) => t.name).join(', ')}]`,
                { errorCode: ErrorCode.EXECUTION_ERROR },
            )

        const result: Message = { ...outcome, name: call.tool, toolCallId: call.id }
        this._messages.push(result)
        await this.bus.notify('onToolExecution', { turn, toolName: call.tool, result })

        if (result.errorCode) {
            await this.bus.notify('onError', { turn, error: result.content })
        }
    }

    // ─── Checkpoints ─────────────────────────────────────────────────────────

    async saveCheckpoint(path: string): Promise<void> {
        await writeCheckpoint(path, this.snapshot())
    }

    /** Replaces messages and counters with the checkpoint's. */
    async loadCheckpoint(path: string): Promise<void> {
        const state = await readCheckpoint(path)
        this._messages = state.messages
        this._turnCount = state.turnCount
        this._tokensUsed = state.tokensUsed
    }

    private snapshot(): CheckpointState {
        return {
            messages: [...this._messages],
            turnCount: this._turnCount,
            tokensUsed: this._tokensUsed,
        }
    }

    private async saveCrashCheckpoint(path: string): Promise<void> {
        try {
            await this.saveCheckpoint(path)
            this.logger.info(`[Agent] Saved checkpoint to ${path} after failure`)
        } catch (saveErr) {
            this.logger.error(`[Agent] Could not save checkpoint to ${path}`, {
                error: saveErr instanceof Error ? saveErr.message : String(saveErr),
            })
        }
    }
}

// ─── Response parsing ────────────────────────────────────────────────────────

function parseAgentResponse(content: string): ParseOutcome {
    let json: unknown
    try {
        json = JSON.parse(content)
    } catch (err) {
        const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err)
        return { ok: false, detail: invalidFormat(reason) }
    }

    const result = AgentResponseSchema.safeParse(json)
    if (!result.success) {
        return { ok: false, detail: invalidFormat(`schema validation failed\n${z.prettifyError(result.error)}`) }
    }
    return { ok: true, response: toAgentResponse(result.data) }
}

function invalidFormat(reason: string): string {
    return `Invalid response format: ${reason}\n\nPlease respond with valid JSON matching the required schema.`
}

function semanticErrorContent(response: Message): string {
    if (response.errorCode === ErrorCode.EMPTY_RESPONSE) {
        return `${response.content}\n\n${RESPONSE_SHAPE_REMINDER}`
    }
    return response.content
}
