import { errorMessage } from '@switchyard/core'
import type { CoreEvent, CoreEventMap, EventEmitter, Logger } from '@switchyard/core'

/**
 * Run `task` with a deadline. On expiry the signal handed to the task is
 * aborted and the returned promise rejects with `onTimeout()`; the task
 * itself is not awaited any further.
 */
export async function withTimeout<T>(
    ms: number,
    task: (signal: AbortSignal) => Promise<T>,
    onTimeout: () => Error,
): Promise<T> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = onTimeout()
            controller.abort(error)
            reject(error)
        }, ms)
    })
    try {
        return await Promise.race([task(controller.signal), deadline])
    } finally {
        clearTimeout(timer)
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

const MAX_ARG_CHARS = 100

/**
 * Shorten tool arguments for logs and telemetry. Long strings are clipped,
 * nested values replaced by their JSON when short enough.
 */
export function summarizeArgs(args: Record<string, unknown>): Record<string, unknown> {
    const summary: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(args)) {
        if (typeof value === 'string') {
            summary[key] = value.length > MAX_ARG_CHARS ? `${value.slice(0, MAX_ARG_CHARS)}...` : value
        } else if (value === null || typeof value !== 'object') {
            summary[key] = value
        } else {
            const json = JSON.stringify(value)
            summary[key] = json.length > MAX_ARG_CHARS ? `${json.slice(0, MAX_ARG_CHARS)}...` : value
        }
    }
    return summary
}

/** Render a tool's return value as message text. */
export function stringifyResult(result: unknown): string {
    if (typeof result === 'string') return result
    if (result === undefined) return ''
    return JSON.stringify(result) ?? String(result)
}

/** Emit an event; a failing listener is logged instead of failing the caller. */
export async function notify<K extends CoreEvent>(
    events: EventEmitter,
    logger: Logger,
    event: K,
    payload: CoreEventMap[K],
): Promise<void> {
    try {
        await events.emit(event, payload)
    } catch (err) {
        logger.error('event listener failed', { event, error: errorMessage(err) })
    }
}
