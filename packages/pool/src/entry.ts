import { z } from 'zod'
import { AGENT_STATUSES } from '@switchyard/core'
import type { AgentInit, AgentInstance } from '@switchyard/core'

export const PoolEntrySchema = z.object({
    agentId: z.string().min(1),
    agentType: z.string().min(1),
    tenantId: z.string().min(1),
    status: z.enum(AGENT_STATUSES),
    collectedFields: z.record(z.unknown()).default({}),
    executionState: z.record(z.unknown()).default({}),
    context: z.record(z.unknown()).default({}),
    schemaVersion: z.number().int().default(0),
    createdAt: z.coerce.date(),
    lastActivity: z.coerce.date(),
    checkpointId: z.string().nullish(),
})

/** Serializable projection of a live agent plus bookkeeping. */
export type PoolEntry = z.infer<typeof PoolEntrySchema>

export interface ToEntryOptions {
    schemaVersion: number
    checkpointId?: string | undefined
    createdAt?: Date | undefined
    lastActivity?: Date | undefined
}

export function toPoolEntry(agent: AgentInstance, opts: ToEntryOptions): PoolEntry {
    const state = agent.toState()
    const now = new Date()
    return {
        agentId: state.id,
        agentType: state.type,
        tenantId: state.tenantId,
        status: state.status,
        collectedFields: state.collectedFields,
        executionState: state.executionState,
        context: state.context,
        schemaVersion: opts.schemaVersion,
        createdAt: opts.createdAt ?? now,
        lastActivity: opts.lastActivity ?? now,
        checkpointId: opts.checkpointId ?? null,
    }
}

export function entryToInit(entry: PoolEntry): AgentInit {
    return {
        id: entry.agentId,
        tenantId: entry.tenantId,
        status: entry.status,
        collectedFields: entry.collectedFields,
        executionState: entry.executionState,
        context: entry.context,
    }
}

export function serializeEntry(entry: PoolEntry): string {
    return JSON.stringify(entry)
}

/**
 * Parse a stored entry. Returns `undefined` for anything that is not valid
 * JSON or does not match the schema.
 */
export function parseEntry(raw: unknown): PoolEntry | undefined {
    let value: unknown = raw
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw)
        } catch {
            return undefined
        }
    }
    const result = PoolEntrySchema.safeParse(value)
    return result.success ? result.data : undefined
}
