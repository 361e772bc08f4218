/**
 * Raised-channel errors.
 *
 * Only unrecoverable failures are thrown: broken configuration and provider
 * contract violations (fatal), and provider failures that outlived the
 * transport's retries (transient). Recoverable failures travel as
 * `ErrorCode`-tagged messages instead.
 */
export class LLMError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = new.target.name
    }
}

// ─── Fatal / config ──────────────────────────────────────────────────────────

export class ConfigError extends LLMError {}

/** Invalid API key or missing credentials. */
export class AuthError extends LLMError {}

/** Model name doesn't exist or the account lacks access to it. */
export class InvalidModelError extends ConfigError {}

/** Valid credentials, insufficient permissions. */
export class ProviderPermissionError extends LLMError {}

/** Provider response broke its documented shape (no choices, no usage...). */
export class MalformedResponseError extends LLMError {}

// ─── Transient ───────────────────────────────────────────────────────────────

export interface TransientProviderErrorOptions extends ErrorOptions {
    attemptCount?: number
    errorType?: string
}

/** Rate limit, 5xx, connection or timeout failure after retries ran out. */
export class TransientProviderError extends LLMError {
    readonly attemptCount: number
    readonly errorType: string

    constructor(message: string, options: TransientProviderErrorOptions = {}) {
        const { attemptCount = 0, errorType = 'unknown', ...rest } = options
        let full = message
        if (attemptCount > 0) full += ` (after ${attemptCount} retries)`
        if (errorType !== 'unknown') full += ` [type: ${errorType}]`
        super(full, rest)
        this.attemptCount = attemptCount
        this.errorType = errorType
    }
}

// ─── Checkpoints ─────────────────────────────────────────────────────────────

export class CheckpointNotFoundError extends Error {
    readonly path: string

    constructor(path: string, options?: ErrorOptions) {
        super(`Checkpoint not found: ${path}`, options)
        this.name = 'CheckpointNotFoundError'
        this.path = path
    }
}

// ─── Classification ──────────────────────────────────────────────────────────

export type ErrorCategory = 'config' | 'transient' | 'unknown'

export function isConfigError(error: unknown): boolean {
    return (
        error instanceof ConfigError ||
        error instanceof AuthError ||
        error instanceof ProviderPermissionError ||
        error instanceof MalformedResponseError
    )
}

export function isTransientError(error: unknown): error is TransientProviderError {
    return error instanceof TransientProviderError
}

/** True for errors that must propagate to the caller rather than become conversation content. */
export function shouldRaise(error: unknown): boolean {
    return isConfigError(error) || isTransientError(error)
}

export function getErrorCategory(error: unknown): ErrorCategory {
    if (isConfigError(error)) return 'config'
    if (isTransientError(error)) return 'transient'
    return 'unknown'
}
