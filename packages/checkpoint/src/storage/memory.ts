import { CheckpointError, CheckpointParentMissingError } from '@switchyard/core'
import { CheckpointTree } from '../tree'
import { byTimestamp, toMetadata } from '../types'
import type { Checkpoint, CheckpointMetadata } from '../types'
import { DEFAULT_LIST_LIMIT } from './storage'
import type { CheckpointStorage } from './storage'

export interface MemoryCheckpointStorageConfig {
    /**
     * Oldest checkpoints of an agent are evicted beyond this count.
     * @default 1000
     */
    maxCheckpointsPerAgent?: number | undefined
}

/**
 * MemoryCheckpointStorage — process-lifetime storage.
 * Best for: tests, development, single-process demos.
 */
export class MemoryCheckpointStorage implements CheckpointStorage {
    readonly name = 'memory'

    private readonly checkpoints = new Map<string, Checkpoint>()
    private readonly byAgent = new Map<string, string[]>()
    private readonly byTenant = new Map<string, string[]>()
    private readonly maxPerAgent: number

    constructor(config: MemoryCheckpointStorageConfig = {}) {
        this.maxPerAgent = config.maxCheckpointsPerAgent ?? 1000
    }

    async save(checkpoint: Checkpoint): Promise<string> {
        if (this.checkpoints.has(checkpoint.id)) {
            throw new CheckpointError(`[Checkpoint] "${checkpoint.id}" already exists.`)
        }
        const parent = checkpoint.parentCheckpointId
        if (parent && !this.checkpoints.has(parent)) {
            throw new CheckpointParentMissingError(checkpoint.id, parent)
        }

        this.checkpoints.set(checkpoint.id, structuredClone(checkpoint))
        append(this.byAgent, checkpoint.agentId, checkpoint.id)
        append(this.byTenant, checkpoint.tenantId, checkpoint.id)

        const agentIds = this.byAgent.get(checkpoint.agentId) ?? []
        while (agentIds.length > this.maxPerAgent) {
            const oldest = agentIds[0]
            if (oldest === undefined) break
            await this.delete(oldest)
        }
        return checkpoint.id
    }

    async get(checkpointId: string): Promise<Checkpoint | undefined> {
        const checkpoint = this.checkpoints.get(checkpointId)
        return checkpoint ? structuredClone(checkpoint) : undefined
    }

    async delete(checkpointId: string): Promise<boolean> {
        const checkpoint = this.checkpoints.get(checkpointId)
        if (!checkpoint) return false
        this.checkpoints.delete(checkpointId)
        detach(this.byAgent, checkpoint.agentId, checkpointId)
        detach(this.byTenant, checkpoint.tenantId, checkpointId)
        return true
    }

    async listByAgent(agentId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        return this.newestFirst(this.byAgent.get(agentId))
            .slice(offset, offset + limit)
            .map(toMetadata)
    }

    async listByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        return this.newestFirst(this.byTenant.get(tenantId))
            .slice(offset, offset + limit)
            .map(toMetadata)
    }

    async getTree(agentId: string): Promise<CheckpointTree | undefined> {
        return CheckpointTree.fromCheckpoints(this.resolve(this.byAgent.get(agentId)))
    }

    async getLatest(agentId: string): Promise<Checkpoint | undefined> {
        const latest = this.newestFirst(this.byAgent.get(agentId))[0]
        return latest ? structuredClone(latest) : undefined
    }

    async clearAgent(agentId: string): Promise<number> {
        return this.deleteAll(this.byAgent.get(agentId))
    }

    async clearTenant(tenantId: string): Promise<number> {
        return this.deleteAll(this.byTenant.get(tenantId))
    }

    private resolve(ids: readonly string[] | undefined): Checkpoint[] {
        return (ids ?? []).flatMap((id) => {
            const checkpoint = this.checkpoints.get(id)
            return checkpoint ? [checkpoint] : []
        })
    }

    private newestFirst(ids: readonly string[] | undefined): Checkpoint[] {
        return this.resolve(ids).sort((a, b) => byTimestamp(b, a))
    }

    private async deleteAll(ids: readonly string[] | undefined): Promise<number> {
        let count = 0
        for (const id of [...(ids ?? [])]) {
            if (await this.delete(id)) count++
        }
        return count
    }
}

function append(index: Map<string, string[]>, key: string, id: string): void {
    const ids = index.get(key) ?? []
    ids.push(id)
    index.set(key, ids)
}

function detach(index: Map<string, string[]>, key: string, id: string): void {
    const ids = index.get(key)
    if (!ids) return
    const at = ids.indexOf(id)
    if (at >= 0) ids.splice(at, 1)
    if (ids.length === 0) index.delete(key)
}
