import type { CheckpointTree } from '../tree'
import type { Checkpoint, CheckpointMetadata } from '../types'

/**
 * Persistence for checkpoints. Every implementation orders listings newest
 * first (ties broken by id), builds trees oldest first and rejects a save
 * whose parent does not exist.
 */
export interface CheckpointStorage {
    readonly name: string
    /** Resolves the saved id */
    save(checkpoint: Checkpoint): Promise<string>
    get(checkpointId: string): Promise<Checkpoint | undefined>
    delete(checkpointId: string): Promise<boolean>
    listByAgent(agentId: string, limit?: number, offset?: number): Promise<CheckpointMetadata[]>
    listByTenant(tenantId: string, limit?: number, offset?: number): Promise<CheckpointMetadata[]>
    getTree(agentId: string): Promise<CheckpointTree | undefined>
    getLatest(agentId: string): Promise<Checkpoint | undefined>
    /** Resolves the number of checkpoints deleted */
    clearAgent(agentId: string): Promise<number>
    clearTenant(tenantId: string): Promise<number>
    close?(): Promise<void>
}

/** @default 100 */
export const DEFAULT_LIST_LIMIT = 100
