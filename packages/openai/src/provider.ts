import OpenAI from 'openai'
import { z } from 'zod'
import {
    AuthError,
    DEFAULT_BASE_URL,
    ErrorCode,
    InvalidModelError,
    MalformedResponseError,
    ProviderPermissionError,
    TransientProviderError,
    createMessage,
    normalizeResponse,
    toAgentResponseJson,
} from '@turnloop/core'
import type { AppConfig, Message, ModelProvider, ToolCall } from '@turnloop/core'

export const NATIVE_TOOL_REASONING = 'Using tools to gather information.'
export const CONTENT_FILTER_PLACEHOLDER = 'Content was blocked by safety filters'

/** The slice of the SDK the provider uses. Tests hand in a stand-in. */
export interface CompletionsClient {
    create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<unknown>
}

export interface OpenAIProviderConfig {
    apiKey: string
    /** @example 'openai/gpt-4o-mini' */
    model: string
    /** @default 'https://openrouter.ai/api/v1' */
    baseURL?: string | undefined
    /** @default 0 */
    temperature?: number | undefined
    /** @default 1000 */
    maxTokens?: number | undefined
    /**
     * Send `response_format: { type: 'json_object' }`.
     * @default false
     */
    jsonMode?: boolean | undefined
    /**
     * SDK-level retries for rate limits, 5xx and connection failures.
     * @default 2
     */
    maxRetries?: number | undefined
    timeoutMs?: number | undefined
    /** Replaces the SDK client; no request leaves the process. */
    client?: CompletionsClient | undefined
}

// ─── Response shape ──────────────────────────────────────────────────────────

const UsageSchema = z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number().optional(),
})

const NativeToolCallSchema = z.object({
    id: z.string(),
    function: z.object({
        name: z.string(),
        arguments: z.string().nullish(),
    }),
})

const ChoiceSchema = z.object({
    finish_reason: z.string().nullish(),
    message: z
        .object({
            content: z.string().nullish(),
            tool_calls: z.array(NativeToolCallSchema).nullish(),
        })
        .nullish(),
})

const CompletionSchema = z.object({
    model: z.string().nullish(),
    choices: z.array(ChoiceSchema).nullish(),
    usage: UsageSchema.nullish(),
})

type Usage = z.infer<typeof UsageSchema>

function contractViolation(what: string): MalformedResponseError {
    return new MalformedResponseError(`Provider returned ${what}. This is a provider API contract violation.`)
}

// ─── Wire conversion ─────────────────────────────────────────────────────────

export function toOpenAIMessages(messages: readonly Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg) => {
        if (msg.role === 'tool') {
            return {
                role: 'tool',
                content: msg.content,
                tool_call_id: msg.toolCallId ?? '',
            } satisfies OpenAI.Chat.ChatCompletionToolMessageParam
        }

        if (msg.role === 'assistant' && msg.toolCalls?.length) {
            return {
                role: 'assistant',
                content: msg.content || null,
                tool_calls: msg.toolCalls.map((tc) => ({
                    id: tc.id,
                    type: 'function' as const,
                    function: {
                        name: tc.tool,
                        arguments: JSON.stringify(tc.args),
                    },
                })),
            } satisfies OpenAI.Chat.ChatCompletionAssistantMessageParam
        }

        return {
            role: msg.role,
            content: msg.content,
        } satisfies
            | OpenAI.Chat.ChatCompletionSystemMessageParam
            | OpenAI.Chat.ChatCompletionUserMessageParam
            | OpenAI.Chat.ChatCompletionAssistantMessageParam
    })
}

// ─── Error mapping ───────────────────────────────────────────────────────────

/**
 * Maps SDK errors onto the raised-channel taxonomy. Anything unrecognised is
 * returned as-is so it propagates unchanged.
 */
export function mapProviderError(err: unknown, attemptCount: number): unknown {
    if (err instanceof OpenAI.AuthenticationError) {
        return new AuthError(err.message, { cause: err })
    }
    if (err instanceof OpenAI.BadRequestError || err instanceof OpenAI.NotFoundError) {
        return new InvalidModelError(err.message, { cause: err })
    }
    if (err instanceof OpenAI.PermissionDeniedError) {
        return new ProviderPermissionError(err.message, { cause: err })
    }
    if (
        err instanceof OpenAI.RateLimitError ||
        err instanceof OpenAI.InternalServerError ||
        err instanceof OpenAI.APIConnectionError
    ) {
        return new TransientProviderError(err.message, {
            attemptCount,
            errorType: err.constructor.name,
            cause: err,
        })
    }
    return err
}

// ─── Provider ────────────────────────────────────────────────────────────────

export class OpenAIProvider implements ModelProvider {
    readonly name = 'openai'

    private readonly client: CompletionsClient
    private readonly model: string
    private readonly temperature: number
    private readonly maxTokens: number
    private readonly jsonMode: boolean
    private readonly maxRetries: number

    constructor(config: OpenAIProviderConfig) {
        this.model = config.model
        this.temperature = config.temperature ?? 0
        this.maxTokens = config.maxTokens ?? 1000
        this.jsonMode = config.jsonMode ?? false
        this.maxRetries = config.maxRetries ?? 2

        if (config.client) {
            this.client = config.client
        } else {
            const sdk = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseURL ?? DEFAULT_BASE_URL,
                maxRetries: this.maxRetries,
                ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
            })
            this.client = { create: (body) => sdk.chat.completions.create(body) }
        }
    }

    async call(messages: readonly Message[]): Promise<Message> {
        let raw: unknown
        try {
            raw = await this.client.create({
                model: this.model,
                messages: toOpenAIMessages(messages),
                temperature: this.temperature,
                max_tokens: this.maxTokens,
                ...(this.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
            })
        } catch (err) {
            throw mapProviderError(err, this.maxRetries)
        }

        return this.classify(raw)
    }

    private classify(raw: unknown): Message {
        const parsed = CompletionSchema.safeParse(raw)
        if (!parsed.success) {
            throw new MalformedResponseError(
                `Provider response did not match the chat completion shape:\n${z.prettifyError(parsed.error)}`,
                { cause: parsed.error },
            )
        }

        const completion = parsed.data
        const choice = completion.choices?.[0]
        if (!choice) throw contractViolation('response with no choices array')

        const usage = completion.usage
        if (!usage) throw contractViolation('response without usage data')

        const message = choice.message
        if (!message) throw contractViolation('choice without message field')

        const finishReason = choice.finish_reason ?? null
        const tokens = { tokensIn: usage.prompt_tokens, tokensOut: usage.completion_tokens }
        const originalContent = message.content ?? null
        const metadata = this.metadata(completion.model, finishReason, originalContent, usage)
        let content = originalContent

        if (finishReason === 'tool_calls' && message.tool_calls?.length) {
            const toolCalls: ToolCall[] = []
            for (const tc of message.tool_calls) {
                const args = parseArguments(tc.function.arguments)
                if (!args.ok) {
                    return createMessage(
                        'assistant',
                        `Invalid arguments for native tool call '${tc.function.name}': ${args.error}`,
                        { ...tokens, errorCode: ErrorCode.PARSE_ERROR, metadata },
                    )
                }
                toolCalls.push({ id: tc.id, tool: tc.function.name, args: args.value })
            }

            content = toAgentResponseJson({
                reasoning: content?.trim() || NATIVE_TOOL_REASONING,
                toolCalls,
            })
        }

        if (finishReason === 'content_filter') {
            return createMessage('assistant', CONTENT_FILTER_PLACEHOLDER, {
                ...tokens,
                errorCode: ErrorCode.CONTENT_FILTER,
                metadata,
            })
        }

        if (content == null || content.trim() === '') {
            const status = content == null ? 'null' : `empty string (len=${content.length})`
            return createMessage(
                'assistant',
                'API call succeeded but returned empty content. ' +
                `finish_reason=${finishReason}, content=${status}, ` +
                `tokens_in=${usage.prompt_tokens}, tokens_out=${usage.completion_tokens}`,
                {
                    ...tokens,
                    errorCode: ErrorCode.EMPTY_RESPONSE,
                    metadata: {
                        finish_reason: finishReason,
                        content_was_null: content == null,
                        content_length: content?.length ?? 0,
                    },
                },
            )
        }

        return createMessage('assistant', normalizeResponse(content), { ...tokens, metadata })
    }

    private metadata(
        model: string | null | undefined,
        finishReason: string | null,
        rawContent: string | null,
        usage: Usage,
    ): Record<string, unknown> {
        return {
            raw_content: rawContent,
            finish_reason: finishReason,
            model: model ?? this.model,
            usage: {
                prompt_tokens: usage.prompt_tokens,
                completion_tokens: usage.completion_tokens,
                total_tokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens,
            },
        }
    }
}

type ArgumentsOutcome = { ok: true; value: Record<string, unknown> } | { ok: false; error: string }

const ArgumentsSchema = z.record(z.string(), z.unknown())

function parseArguments(text: string | null | undefined): ArgumentsOutcome {
    if (!text) return { ok: true, value: {} }

    let json: unknown
    try {
        json = JSON.parse(text)
    } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) }
    }

    const result = ArgumentsSchema.safeParse(json)
    if (!result.success) return { ok: false, error: 'arguments must be a JSON object' }
    return { ok: true, value: result.data }
}

// ─── Factories ───────────────────────────────────────────────────────────────

/**
 * Create an OpenAI-compatible model provider.
 *
 * @example
 * ```ts
 * const provider = openai({ apiKey: 'test-key', model: 'openai/gpt-4o-mini' })
 * const provider = openai({ apiKey: '...', model: 'gpt-4o', baseURL: 'https://api.openai.com/v1' })
 * ```
 */
export function openai(config: OpenAIProviderConfig): OpenAIProvider {
    return new OpenAIProvider(config)
}

/**
 * Build a provider from the loaded application config.
 *
 * @example
 * ```ts
 * import 'dotenv/config'
 * const provider = createProvider(loadConfig())
 * ```
 */
export function createProvider(
    config: AppConfig,
    overrides: Pick<OpenAIProviderConfig, 'client' | 'timeoutMs'> = {},
): OpenAIProvider {
    return new OpenAIProvider({
        apiKey: config.apiKey,
        model: config.model,
        baseURL: config.baseURL,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        jsonMode: config.jsonMode,
        maxRetries: config.maxRetries,
        ...overrides,
    })
}
