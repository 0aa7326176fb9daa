import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { AGENT_STATUSES, contentText } from '@switchyard/core'
import type { AgentStatus } from '@switchyard/core'

// ─── Schemas ─────────────────────────────────────────────────────────────────

const ToolCallSchema = z.object({
    id: z.string(),
    name: z.string(),
    arguments: z.record(z.unknown()),
})

const ContentPartSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('text'), text: z.string() }),
    z.object({ type: z.literal('image_url'), url: z.string() }),
])

export const MessageSchema = z.object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: z.union([z.string(), z.array(ContentPartSchema)]),
    name: z.string().optional(),
    toolCallId: z.string().optional(),
    toolCalls: z.array(ToolCallSchema).optional(),
})

export const CheckpointResultSchema = z.object({
    status: z.string(),
    text: z.string(),
    metadata: z.record(z.unknown()).default({}),
})

export const CheckpointSchema = z.object({
    id: z.string().min(1),
    agentId: z.string().min(1),
    agentType: z.string().min(1),
    tenantId: z.string().min(1),
    status: z.enum(AGENT_STATUSES),
    collectedFields: z.record(z.unknown()).default({}),
    executionState: z.record(z.unknown()).default({}),
    context: z.record(z.unknown()).default({}),
    /** Message that triggered this checkpoint */
    message: MessageSchema.nullish(),
    /** Reply produced for that message */
    result: CheckpointResultSchema.nullish(),
    messageHistory: z.array(MessageSchema).default([]),
    parentCheckpointId: z.string().nullish(),
    branchLabel: z.string().nullish(),
    timestamp: z.coerce.date(),
    version: z.number().int().default(1),
})

/** Immutable snapshot of an agent after a state transition. */
export type Checkpoint = z.infer<typeof CheckpointSchema>

export type CheckpointResult = z.infer<typeof CheckpointResultSchema>

// ─── Metadata ────────────────────────────────────────────────────────────────

export const MESSAGE_PREVIEW_CHARS = 100

/** Lightweight listing view of a checkpoint. */
export interface CheckpointMetadata {
    id: string
    agentId: string
    agentType: string
    tenantId: string
    status: AgentStatus
    timestamp: Date
    parentCheckpointId: string | undefined
    branchLabel: string | undefined
    fieldsCount: number
    messagePreview: string | undefined
}

export function toMetadata(checkpoint: Checkpoint): CheckpointMetadata {
    return {
        id: checkpoint.id,
        agentId: checkpoint.agentId,
        agentType: checkpoint.agentType,
        tenantId: checkpoint.tenantId,
        status: checkpoint.status,
        timestamp: new Date(checkpoint.timestamp),
        parentCheckpointId: checkpoint.parentCheckpointId ?? undefined,
        branchLabel: checkpoint.branchLabel ?? undefined,
        fieldsCount: Object.keys(checkpoint.collectedFields).length,
        messagePreview: checkpoint.message
            ? contentText(checkpoint.message.content).slice(0, MESSAGE_PREVIEW_CHARS)
            : undefined,
    }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function generateCheckpointId(): string {
    return `ckpt_${randomUUID().replace(/-/g, '').slice(0, 12)}`
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
    return JSON.stringify(checkpoint)
}

/** Returns `undefined` for invalid JSON or a payload that fails validation. */
export function parseCheckpoint(raw: unknown): Checkpoint | undefined {
    let value: unknown = raw
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw)
        } catch {
            return undefined
        }
    }
    const result = CheckpointSchema.safeParse(value)
    return result.success ? result.data : undefined
}

/** Oldest first; ids break timestamp ties so every backend agrees on order. */
export function byTimestamp(a: { timestamp: Date; id: string }, b: { timestamp: Date; id: string }): number {
    const delta = a.timestamp.getTime() - b.timestamp.getTime()
    if (delta !== 0) return delta
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}
