import { MiddlewareError } from '../errors'
import type { Middleware, MiddlewareContext, MiddlewareScope } from '../types'

interface Registered {
    name: string
    middleware: Middleware
}

/**
 * MiddlewarePipeline — Koa-style hooks around runs, turns and tool calls.
 *
 * Middleware runs in registration order and continues the chain by calling
 * `next()` at most once; not calling it stops the chain. A throw is
 * rethrown as a `MiddlewareError` naming the middleware (`middleware#<n>`
 * when it has no name) and the scope.
 *
 * @example
 * ```ts
 * const pipeline = new MiddlewarePipeline().use({
 *     name: 'audit',
 *     scope: 'tool:before',
 *     async run(m, next) {
 *         audit.record(m.ctx.tenantId, m.tool?.name)
 *         await next()
 *     },
 * })
 * ```
 */
export class MiddlewarePipeline {
    private readonly registered: Registered[] = []
    private readonly byScope = new Map<MiddlewareScope, Registered[]>()

    use(middleware: Middleware): this {
        this.registered.push({ name: middleware.name ?? `middleware#${this.registered.length}`, middleware })
        this.byScope.clear()
        return this
    }

    get size(): number {
        return this.registered.length
    }

    /** Names of the middleware that run for `scope`, in order. */
    namesFor(scope: MiddlewareScope): string[] {
        return this.chain(scope).map((r) => r.name)
    }

    async run(mCtx: MiddlewareContext): Promise<void> {
        const chain = this.chain(mCtx.scope)

        const dispatch = async (index: number): Promise<void> => {
            const entry = chain[index]
            if (!entry) return

            let called = false
            const next = async (): Promise<void> => {
                if (called) throw new Error('next() called more than once')
                called = true
                await dispatch(index + 1)
            }

            try {
                await entry.middleware.run(mCtx, next)
            } catch (err) {
                if (err instanceof MiddlewareError) throw err
                throw new MiddlewareError(entry.name, mCtx.scope, err)
            }
        }

        await dispatch(0)
    }

    private chain(scope: MiddlewareScope): Registered[] {
        let chain = this.byScope.get(scope)
        if (!chain) {
            chain = this.registered.filter(({ middleware: m }) => {
                if (!m.scope) return true
                return typeof m.scope === 'string' ? m.scope === scope : m.scope.includes(scope)
            })
            this.byScope.set(scope, chain)
        }
        return chain
    }
}
