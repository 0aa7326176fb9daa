import { randomUUID } from 'node:crypto'

import type { ModelMessage, RunContext, TokenUsage } from '../types'

export function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

export function addUsage(total: TokenUsage, usage: TokenUsage | undefined): void {
    if (!usage) return
    total.promptTokens += usage.promptTokens
    total.completionTokens += usage.completionTokens
    total.totalTokens += usage.totalTokens
}

export interface CreateRunContextOptions {
    tenantId: string
    messages: ModelMessage[]
    /** Defaults to a random UUID per run */
    sessionId?: string | undefined
    /** Defaults to the text of the last user message */
    input?: string | undefined
}

export function createRunContext(opts: CreateRunContextOptions): RunContext {
    let input = opts.input
    if (input === undefined) {
        const lastUser = [...opts.messages].reverse().find((m) => m.role === 'user')
        input = typeof lastUser?.content === 'string' ? lastUser.content : ''
    }
    return {
        tenantId: opts.tenantId,
        sessionId: opts.sessionId ?? randomUUID(),
        input,
        messages: opts.messages,
        turn: 0,
        usage: emptyUsage(),
        startedAt: new Date(),
    }
}
