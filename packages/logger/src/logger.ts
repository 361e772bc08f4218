import type { Logger } from '@turnloop/core'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LogEntry {
    level: Exclude<LogLevel, 'silent'>
    message: string
    timestamp: string
    meta?: Record<string, unknown> | undefined
}

export type LogTransport = (entry: LogEntry) => void

export interface LoggerConfig {
    /**
     * Minimum log level to emit.
     * @default 'info'
     */
    level?: LogLevel

    /**
     * Custom transport. Defaults to structured console output.
     */
    transport?: LogTransport

    /**
     * Prefix prepended to all log output (when using default transport).
     * @default '[turnloop]'
     */
    prefix?: string

    /** @default () => new Date() */
    clock?: () => Date
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 99,
}

export function shouldLog(entry: LogLevel, min: LogLevel): boolean {
    return LEVEL_RANK[entry] >= LEVEL_RANK[min]
}

/** `prefix [timestamp] [LEVEL] message {meta}` */
export function formatEntry(prefix: string, entry: LogEntry): string {
    const parts: string[] = [prefix, `[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`, entry.message]
    if (entry.meta && Object.keys(entry.meta).length) parts.push(JSON.stringify(entry.meta))
    return parts.join(' ')
}

function defaultTransport(prefix: string): LogTransport {
    return (entry: LogEntry) => {
        const line = formatEntry(prefix, entry)

        switch (entry.level) {
            case 'debug':
                console.debug(line)
                break
            case 'info':
                console.info(line)
                break
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
        }
    }
}

/**
 * Leveled structured logger. Hand it to an `Agent` (or anything taking a
 * `Logger`) in place of the console.
 *
 * @example
 * ```ts
 * const logger = createLogger()
 * const logger = createLogger({ level: 'debug' })
 * const logger = createLogger({ transport: (entry) => lines.push(entry) })
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
    const {
        level: minLevel = 'info',
        prefix = '[turnloop]',
        transport = defaultTransport(prefix),
        clock = () => new Date(),
    } = config

    const emit = (level: LogEntry['level'], message: string, meta?: Record<string, unknown>): void => {
        if (!shouldLog(level, minLevel)) return
        transport({ level, message, timestamp: clock().toISOString(), meta })
    }

    return {
        debug: (message, meta) => emit('debug', message, meta),
        info: (message, meta) => emit('info', message, meta),
        warn: (message, meta) => emit('warn', message, meta),
        error: (message, meta) => emit('error', message, meta),
    }
}
