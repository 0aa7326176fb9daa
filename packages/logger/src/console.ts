import type { LogLevel, LogMeta, Logger } from '@switchyard/core'

export type EntryLevel = Exclude<LogLevel, 'silent'>

export interface LogEntry {
    level: EntryLevel
    message: string
    timestamp: string
    meta: LogMeta
}

export type LogTransport = (entry: LogEntry) => void

export interface ConsoleLoggerConfig {
    /**
     * Minimum level to emit.
     * @default 'info'
     */
    level?: LogLevel | undefined

    /**
     * Prefix prepended to every line (default transport only).
     * @default '[switchyard]'
     */
    prefix?: string | undefined

    /**
     * Custom transport. Defaults to one structured line per entry on the
     * matching `console` method.
     */
    transport?: LogTransport | undefined

    /** Fields added to every entry */
    bindings?: LogMeta | undefined

    /** @default () => new Date() */
    clock?: (() => Date) | undefined
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
    const parts = [prefix, `[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`, entry.message]
    if (Object.keys(entry.meta).length) parts.push(JSON.stringify(entry.meta))
    return parts.join(' ')
}

export function consoleTransport(prefix: string): LogTransport {
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
 * Structured console logger for every switchyard component.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: 'debug' })
 * const pool = new AgentPool({ catalog: agents, logger })
 * // [switchyard] [2024-05-01T12:00:00.000Z] [INFO] restored tenant session {"component":"pool","tenantId":"u1","restored":2}
 * ```
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
    const {
        level: minLevel = 'info',
        prefix = '[switchyard]',
        transport = consoleTransport(prefix),
        bindings = {},
        clock = () => new Date(),
    } = config

    const write = (level: EntryLevel, message: string, meta?: LogMeta): void => {
        if (!shouldLog(level, minLevel)) return
        transport({ level, message, timestamp: clock().toISOString(), meta: { ...bindings, ...meta } })
    }

    return {
        debug: (message, meta) => write('debug', message, meta),
        info: (message, meta) => write('info', message, meta),
        warn: (message, meta) => write('warn', message, meta),
        error: (message, meta) => write('error', message, meta),
        child: (extra) =>
            createConsoleLogger({ level: minLevel, prefix, transport, clock, bindings: { ...bindings, ...extra } }),
    }
}
