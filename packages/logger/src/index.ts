export { createLogger, formatEntry, shouldLog } from './logger'
export type { LogEntry, LogLevel, LogTransport, LoggerConfig } from './logger'
export { createLoggingObserver } from './observer'
export type { LoggingObserverConfig } from './observer'
