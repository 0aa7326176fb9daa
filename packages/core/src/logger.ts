export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogMeta = Record<string, unknown>

/**
 * Minimal structured logger every runtime component accepts.
 * See `@switchyard/logger` for the console implementation.
 */
export interface Logger {
    debug(message: string, meta?: LogMeta): void
    info(message: string, meta?: LogMeta): void
    warn(message: string, meta?: LogMeta): void
    error(message: string, meta?: LogMeta): void
    /** Derive a logger that adds `bindings` to every entry */
    child(bindings: LogMeta): Logger
}

const noop = (): void => {}

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => silentLogger,
}
