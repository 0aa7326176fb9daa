export { consoleTransport, createConsoleLogger, formatEntry, shouldLog } from './console'
export type { ConsoleLoggerConfig, EntryLevel, LogEntry, LogTransport } from './console'
export { createLogger } from './middleware'
export type { LoggerMiddlewareConfig } from './middleware'
