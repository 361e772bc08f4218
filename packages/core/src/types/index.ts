// ─── Message Types ───────────────────────────────────────────────────────────

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool'

/**
 * Error codes tagging a message as a recoverable failure.
 * Messages carrying one are part of the conversation, never thrown.
 */
export const ErrorCode = {
    API_ERROR: 'api_error',
    VALIDATION_ERROR: 'validation_error',
    EXECUTION_ERROR: 'execution_error',
    TIMEOUT: 'timeout',
    MAX_TURNS_REACHED: 'max_turns_reached',
    PARSE_ERROR: 'parse_error',
    CONTENT_FILTER: 'content_filter',
    EMPTY_RESPONSE: 'empty_response',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

export type ToolArgs = Record<string, unknown>

export interface ToolCall {
    /** Unique across the whole conversation; pairs the call with its result */
    id: string
    tool: string
    args: ToolArgs
}

/**
 * One turn in a conversation.
 *
 * Assistant content is the cleaned structured-response JSON text.
 * Tool results carry the id of the call they answer in `toolCallId`.
 */
export interface Message {
    role: MessageRole
    content: string
    /** Epoch milliseconds */
    timestamp: number
    errorCode?: ErrorCode | undefined
    toolCalls?: ToolCall[] | undefined
    toolCallId?: string | undefined
    name?: string | undefined
    tokensIn?: number | undefined
    tokensOut?: number | undefined
    metadata?: Record<string, unknown> | undefined
}

// ─── Result Types ────────────────────────────────────────────────────────────

export const ResultStatus = {
    SUCCESS: 'success',
    ERROR: 'error',
    MAX_TURNS_REACHED: 'max_turns_reached',
} as const

export type ResultStatus = (typeof ResultStatus)[keyof typeof ResultStatus]

export interface Result {
    value: string | null
    status: ResultStatus
    error: string | null
    metadata: Record<string, unknown>
}

/** The structured reply every model turn must parse into. */
export interface AgentResponse {
    reasoning: string
    tool_calls: ToolCall[] | null
    result: string | null
    is_finished: boolean
}

// ─── Model Provider Types ────────────────────────────────────────────────────

/**
 * Issues one model call per invocation.
 *
 * Resolves to an assistant message whose content is normalized JSON, or to
 * one tagged with an error code for recoverable failures. Rejects only with
 * fatal or transient-exhausted errors.
 */
export interface ModelProvider {
    readonly name: string
    call(messages: readonly Message[]): Promise<Message>
}

// ─── Tool Types ──────────────────────────────────────────────────────────────

export interface ToolSchema {
    name: string
    description: string
    parameters: Record<string, unknown> // JSON Schema
}

/** What the agent loop needs from a tool; see `Tool` for the implementation. */
export interface AgentTool {
    readonly name: string
    readonly description: string
    readonly schema: ToolSchema
    /** Never rejects: failures come back as a tool message with an error code */
    run(rawArgs: unknown): Promise<Message>
    renderSchema(): string
}

// ─── Observer Types ──────────────────────────────────────────────────────────

export interface TurnStartEvent {
    turn: number
    messages: readonly Message[]
}

export interface LlmResponseEvent {
    turn: number
    response: Message
}

export interface ToolExecutionEvent {
    turn: number
    toolName: string
    result: Message
}

export interface FinishEvent {
    finalResult: Message
    allMessages: readonly Message[]
}

export interface ErrorEvent {
    turn: number
    error: string
    rawResponse?: string | undefined
}

export interface ObserverEvents {
    onTurnStart: TurnStartEvent
    onLlmResponse: LlmResponseEvent
    onToolExecution: ToolExecutionEvent
    onFinish: FinishEvent
    onError: ErrorEvent
}

export type ObserverHook = keyof ObserverEvents

/**
 * Side-channel hooks the agent loop calls at turn boundaries.
 * Every hook is optional; failures are logged and never reach the loop.
 */
export type AgentObserver = {
    [K in ObserverHook]?: (event: ObserverEvents[K]) => void | Promise<void>
}

// ─── Logging Types ───────────────────────────────────────────────────────────

/** Minimal logging surface. The global `console` satisfies it. */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void
    info(message: string, meta?: Record<string, unknown>): void
    warn(message: string, meta?: Record<string, unknown>): void
    error(message: string, meta?: Record<string, unknown>): void
}

// ─── Agent Config Types ──────────────────────────────────────────────────────

export interface AgentConfig {
    provider: ModelProvider
    tools?: AgentTool[]
    observers?: AgentObserver[]
    /** @default 10 */
    maxTurns?: number
    /**
     * Template with `{tools}` and `{response_format}` placeholders.
     * Defaults to the built-in JSON protocol prompt.
     */
    systemPrompt?: string
    /** @default console */
    logger?: Logger
}

export interface RunOptions {
    input: string
    /**
     * Discard prior messages and counters before running.
     * @default true
     */
    reset?: boolean
    /** Resume from this checkpoint file; forces `reset` to false */
    checkpoint?: string
    /** Save a checkpoint here if the run throws */
    autoCheckpoint?: string
}

export interface CheckpointState {
    messages: Message[]
    turnCount: number
    tokensUsed: number
}
