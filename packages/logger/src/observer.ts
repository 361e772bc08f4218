import type { AgentObserver, Logger } from '@turnloop/core'
import { formatMessage } from '@turnloop/core'

export interface LoggingObserverConfig {
    logger: Logger

    /**
     * Whether to measure and log per-turn and per-run durations.
     * @default true
     */
    timing?: boolean

    /** @default Date.now */
    now?: () => number
}

/**
 * Observer that writes the agent's lifecycle to a `Logger`.
 *
 * Turn boundaries and model responses go to `debug`, tool results to `info`
 * (or `warn` when tagged with an error code), completion to `info` and
 * errors to `error`.
 *
 * @example
 * ```ts
 * agent.observe(createLoggingObserver({ logger: createLogger({ level: 'debug' }) }))
 * ```
 */
export function createLoggingObserver(config: LoggingObserverConfig): AgentObserver {
    const { logger, timing = true, now = Date.now } = config

    let runStartedAt: number | undefined
    let turnStartedAt: number | undefined

    const elapsed = (since: number | undefined): Record<string, unknown> =>
        timing && since !== undefined ? { durationMs: now() - since } : {}

    return {
        onTurnStart({ turn, messages }) {
            if (turn === 1 || runStartedAt === undefined) runStartedAt = now()
            turnStartedAt = now()
            logger.debug(`turn ${turn} started`, { messages: messages.length })
        },

        onLlmResponse({ turn, response }) {
            logger.debug(`turn ${turn} model response`, {
                ...elapsed(turnStartedAt),
                calls: response.toolCalls?.length ?? 0,
                tokensIn: response.tokensIn,
                tokensOut: response.tokensOut,
            })
        },

        onToolExecution({ turn, toolName, result }) {
            const meta = { tool: toolName, callId: result.toolCallId }
            if (result.errorCode) {
                logger.warn(`turn ${turn} tool failed: ${formatMessage(result)}`, meta)
            } else {
                logger.info(`turn ${turn} tool result: ${formatMessage(result)}`, meta)
            }
        },

        onFinish({ finalResult, allMessages }) {
            logger.info('run finished', {
                ...elapsed(runStartedAt),
                messages: allMessages.length,
                result: finalResult.content,
            })
            runStartedAt = undefined
        },

        onError({ turn, error, rawResponse }) {
            logger.error(`turn ${turn}: ${error}`, rawResponse !== undefined ? { rawResponse } : undefined)
        },
    }
}
