import { z } from 'zod'
import { ConfigError } from '../errors'

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'

/**
 * Process-level settings, built once at startup and passed down explicitly.
 * Nothing below the entry point reads the environment.
 */
export interface AppConfig {
    /** @example 'openai/gpt-4o-mini' */
    readonly model: string
    readonly apiKey: string
    /** @default 'https://openrouter.ai/api/v1' */
    readonly baseURL: string
    /** @default 0 */
    readonly temperature: number
    /** @default 1000 */
    readonly maxTokens: number
    /** Ask the endpoint for `response_format: { type: 'json_object' }` @default false */
    readonly jsonMode: boolean
    /** Retries the SDK performs before a transient error surfaces @default 2 */
    readonly maxRetries: number
    /** @default 10 */
    readonly maxTurns: number
}

const EnvSchema = z.object({
    OPENROUTER_MODEL: z.string().min(1),
    OPENROUTER_API_KEY: z.string().min(1),
    OPENROUTER_BASE_URL: z.url().default(DEFAULT_BASE_URL),
    OPENROUTER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    OPENROUTER_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
    OPENROUTER_JSON_MODE: z.stringbool().default(false),
    OPENROUTER_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    AGENT_MAX_TURNS: z.coerce.number().int().positive().default(10),
})

/**
 * Reads configuration from environment variables (load `.env` with
 * `dotenv/config` first if you use one).
 *
 * @throws {ConfigError} listing every missing or invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const result = EnvSchema.safeParse(env)
    if (!result.success) {
        throw new ConfigError(`Invalid configuration:\n${z.prettifyError(result.error)}`, { cause: result.error })
    }

    const vars = result.data
    return Object.freeze({
        model: vars.OPENROUTER_MODEL,
        apiKey: vars.OPENROUTER_API_KEY,
        baseURL: vars.OPENROUTER_BASE_URL,
        temperature: vars.OPENROUTER_TEMPERATURE,
        maxTokens: vars.OPENROUTER_MAX_TOKENS,
        jsonMode: vars.OPENROUTER_JSON_MODE,
        maxRetries: vars.OPENROUTER_MAX_RETRIES,
        maxTurns: vars.AGENT_MAX_TURNS,
    })
}
