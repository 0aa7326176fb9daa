import type { LogLevel, Logger, Middleware, MiddlewareContext, MiddlewareScope, NextFn } from '@switchyard/core'
import { createConsoleLogger } from './console'
import type { EntryLevel } from './console'

export interface LoggerMiddlewareConfig {
    /**
     * Minimum level to emit (default logger only).
     * @default 'info'
     */
    level?: LogLevel | undefined

    /**
     * Which middleware scopes to log.
     * Defaults to all scopes.
     */
    scopes?: MiddlewareScope[] | undefined

    /** @default createConsoleLogger({ level }) */
    logger?: Logger | undefined

    /**
     * Whether to measure and log duration per scope pair (e.g. before→after).
     * @default true
     */
    timing?: boolean | undefined
}

function scopeToLevel(scope: MiddlewareScope): EntryLevel {
    switch (scope) {
        case 'run:before':
        case 'run:after':
            return 'info'
        case 'turn:before':
        case 'turn:after':
        case 'tool:before':
        case 'tool:after':
            return 'debug'
    }
}

function timerKey(mCtx: MiddlewareContext): string {
    const base = mCtx.scope.slice(0, mCtx.scope.indexOf(':'))
    return `${mCtx.ctx.sessionId}|${base}|${mCtx.ctx.turn}|${mCtx.tool?.name ?? ''}`
}

/**
 * Logging middleware: one entry per lifecycle scope, with the duration of
 * each before→after pair on the `:after` entry.
 *
 * @example
 * ```ts
 * middleware.use(createLogger())
 * middleware.use(createLogger({ level: 'debug', scopes: ['tool:before', 'tool:after'] }))
 * middleware.use(createLogger({ logger: appLogger.child({ component: 'lifecycle' }) }))
 * ```
 */
export function createLogger(config: LoggerMiddlewareConfig = {}): Middleware {
    const { level: minLevel = 'info', scopes, timing = true } = config
    const logger = config.logger ?? createConsoleLogger({ level: minLevel })

    // scope pair → start time
    const timers = new Map<string, number>()

    return {
        name: 'logger',
        run: async (mCtx: MiddlewareContext, next: NextFn) => {
            const { scope, ctx, tool } = mCtx
            if (scopes && !scopes.includes(scope)) {
                await next()
                return
            }

            const key = timerKey(mCtx)
            const level = scopeToLevel(scope)
            const meta = { sessionId: ctx.sessionId, turn: ctx.turn, tool: tool?.name }

            if (scope.endsWith(':before')) {
                if (timing) timers.set(key, Date.now())
                logger[level](scope, tool ? { ...meta, args: tool.args } : { ...meta, input: ctx.input })
                await next()
                return
            }

            await next()

            const start = timers.get(key)
            timers.delete(key)
            const durationMs = timing && start !== undefined ? Date.now() - start : undefined
            logger[level](scope, {
                ...meta,
                durationMs,
                ...(tool?.result !== undefined ? { result: tool.result } : {}),
                ...(scope === 'run:after' ? { usage: { ...ctx.usage } } : {}),
            })
        },
    }
}
