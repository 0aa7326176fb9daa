import { isDeepStrictEqual } from 'node:util'
import type { AgentStatus } from '@switchyard/core'
import type { Checkpoint } from './types'

export interface FieldChange {
    old: unknown
    new: unknown
}

/** What changed between two checkpoints. */
export interface CheckpointDiff {
    fromCheckpointId: string
    toCheckpointId: string
    statusChanged: boolean
    oldStatus: AgentStatus | undefined
    newStatus: AgentStatus | undefined
    fieldsAdded: Record<string, unknown>
    fieldsRemoved: string[]
    fieldsModified: Record<string, FieldChange>
    executionStateChanged: boolean
}

/**
 * Compare the collected fields, status and execution state of two
 * checkpoints. Values are compared structurally.
 *
 * @example
 * ```ts
 * diffCheckpoints(c1, c2).fieldsModified // { name: { old: 'Alice', new: 'Bob' } }
 * ```
 */
export function diffCheckpoints(from: Checkpoint, to: Checkpoint): CheckpointDiff {
    const statusChanged = from.status !== to.status
    const before = from.collectedFields
    const after = to.collectedFields

    const fieldsAdded: Record<string, unknown> = {}
    const fieldsModified: Record<string, FieldChange> = {}
    for (const [key, value] of Object.entries(after)) {
        if (!Object.hasOwn(before, key)) {
            fieldsAdded[key] = value
        } else if (!isDeepStrictEqual(before[key], value)) {
            fieldsModified[key] = { old: before[key], new: value }
        }
    }

    return {
        fromCheckpointId: from.id,
        toCheckpointId: to.id,
        statusChanged,
        oldStatus: statusChanged ? from.status : undefined,
        newStatus: statusChanged ? to.status : undefined,
        fieldsAdded,
        fieldsRemoved: Object.keys(before).filter((key) => !Object.hasOwn(after, key)),
        fieldsModified,
        executionStateChanged: !isDeepStrictEqual(from.executionState, to.executionState),
    }
}

export function hasChanges(diff: CheckpointDiff): boolean {
    return (
        diff.statusChanged ||
        diff.executionStateChanged ||
        diff.fieldsRemoved.length > 0 ||
        Object.keys(diff.fieldsAdded).length > 0 ||
        Object.keys(diff.fieldsModified).length > 0
    )
}
