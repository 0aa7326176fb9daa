import { AgentRegistry, BaseAgent } from '@switchyard/core'
import type { AgentInit, AgentReply, FieldSpec, LogMeta, Logger } from '@switchyard/core'
import type { RedisLike } from '@switchyard/storage'

export const NOTE_FIELDS: FieldSpec[] = [{ name: 'note', type: 'string', required: true }]

/** Waits for a note, then completes with it. */
export class NoteAgent extends BaseAgent {
    constructor(init: AgentInit) {
        super(init, { type: 'note', fields: NOTE_FIELDS })
    }

    protected override async extractFields(message: string): Promise<Record<string, unknown>> {
        return { note: message }
    }

    protected async onRunning(): Promise<AgentReply> {
        return this.complete(`Noted: ${String(this.collectedFields['note'])}`)
    }
}

export function catalog(): AgentRegistry {
    return new AgentRegistry().register({
        type: 'note',
        description: 'Take a note',
        fields: NOTE_FIELDS,
        create: (init) => new NoteAgent(init),
    })
}

/** A note agent already waiting for input. */
export async function waitingNote(id: string, tenantId = 't1', sessionId?: string): Promise<NoteAgent> {
    const agent = new NoteAgent({ id, tenantId, context: sessionId ? { sessionId } : {} })
    await agent.reply('')
    return agent
}

export interface LogRecord {
    level: 'debug' | 'info' | 'warn' | 'error'
    message: string
    meta: LogMeta
}

export function recordingLogger(records: LogRecord[] = [], bindings: LogMeta = {}): Logger & { records: LogRecord[] } {
    const push = (level: LogRecord['level']) => (message: string, meta?: LogMeta) => {
        records.push({ level, message, meta: { ...bindings, ...meta } })
    }
    return {
        records,
        debug: push('debug'),
        info: push('info'),
        warn: push('warn'),
        error: push('error'),
        child: (extra) => recordingLogger(records, { ...bindings, ...extra }),
    }
}

interface Stored<T> {
    value: T
    expiresAt: number | undefined
}

/** In-process Redis with TTLs driven by `now()`. */
export class FakeRedis implements RedisLike {
    readonly strings = new Map<string, Stored<string>>()
    readonly sets = new Map<string, Stored<Set<string>>>()
    quitCalled = false

    constructor(private readonly now: () => number) {}

    private live<T>(map: Map<string, Stored<T>>, key: string): Stored<T> | undefined {
        const item = map.get(key)
        if (item && item.expiresAt !== undefined && item.expiresAt <= this.now()) {
            map.delete(key)
            return undefined
        }
        return item
    }

    async get(key: string): Promise<string | null> {
        return this.live(this.strings, key)?.value ?? null
    }

    async setex(key: string, seconds: number, value: string): Promise<string> {
        this.sets.delete(key)
        this.strings.set(key, { value, expiresAt: this.now() + seconds * 1000 })
        return 'OK'
    }

    async del(keys: string[]): Promise<number> {
        let removed = 0
        for (const key of keys) {
            const existed = this.live(this.strings, key) ?? this.live(this.sets, key)
            this.strings.delete(key)
            this.sets.delete(key)
            if (existed) removed++
        }
        return removed
    }

    async sadd(key: string, members: string[]): Promise<number> {
        const set = this.live(this.sets, key) ?? { value: new Set<string>(), expiresAt: undefined }
        const before = set.value.size
        for (const m of members) set.value.add(m)
        this.sets.set(key, set)
        return set.value.size - before
    }

    async srem(key: string, members: string[]): Promise<number> {
        const set = this.live(this.sets, key)
        if (!set) return 0
        let removed = 0
        for (const m of members) if (set.value.delete(m)) removed++
        if (set.value.size === 0) this.sets.delete(key)
        return removed
    }

    async smembers(key: string): Promise<string[]> {
        return [...(this.live(this.sets, key)?.value ?? [])]
    }

    async scard(key: string): Promise<number> {
        return this.live(this.sets, key)?.value.size ?? 0
    }

    async expire(key: string, seconds: number): Promise<number> {
        const item = this.live(this.strings, key) ?? this.live(this.sets, key)
        if (!item) return 0
        item.expiresAt = this.now() + seconds * 1000
        return 1
    }

    async quit(): Promise<string> {
        this.quitCalled = true
        return 'OK'
    }
}
