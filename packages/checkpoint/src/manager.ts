import { Mutex } from 'async-mutex'
import { silentLogger } from '@switchyard/core'
import type { AgentCatalog, AgentInstance, AgentReply, AgentState, AgentStatus, Logger, ModelMessage } from '@switchyard/core'
import { diffCheckpoints } from './diff'
import type { CheckpointDiff } from './diff'
import { MemoryCheckpointStorage } from './storage/memory'
import type { CheckpointStorage } from './storage/storage'
import type { CheckpointTree } from './tree'
import { generateCheckpointId } from './types'
import type { Checkpoint, CheckpointMetadata, CheckpointResult } from './types'

export interface CheckpointManagerConfig {
    /** @default MemoryCheckpointStorage */
    storage?: CheckpointStorage | undefined
    /**
     * Whether callers should checkpoint after every transition.
     * @default true
     */
    autoSave?: boolean | undefined
    /** @default Date.now */
    now?: (() => number) | undefined
    logger?: Logger | undefined
}

export interface SaveCheckpointOptions {
    message?: ModelMessage | undefined
    result?: CheckpointResult | undefined
    messageHistory?: ModelMessage[] | undefined
    branchLabel?: string | undefined
}

/** Agent state as captured by a checkpoint, ready to rebuild an instance. */
export interface CheckpointAgentState {
    agentId: string
    agentType: string
    tenantId: string
    status: AgentStatus
    collectedFields: Record<string, unknown>
    executionState: Record<string, unknown>
    context: Record<string, unknown>
    messageHistory: ModelMessage[]
}

export type RestoreFailure =
    | { found: false; checkpointId: string; reason: 'not_found' }
    | { found: false; checkpointId: string; reason: 'unknown_type'; agentType: string }

export type RestoreResult = { found: true; agent: AgentInstance; checkpoint: Checkpoint } | RestoreFailure

export type ReplayResult =
    | { found: true; agent: AgentInstance; reply: AgentReply; checkpointId: string; parentCheckpointId: string }
    | RestoreFailure

/**
 * CheckpointManager — records agent snapshots and tracks, per agent, the
 * checkpoint the next save will hang off. Overriding that parent with
 * `setParentCheckpoint` starts a branch.
 *
 * Replays of the same agent are serialized through a per-agent lock so that
 * two concurrent replays cannot interleave their restore and save steps.
 *
 * Per-agent bookkeeping lives until `forget()`; callers forget an agent once
 * it is finished. A later save for a forgotten agent starts a new root.
 *
 * @example
 * ```ts
 * const manager = new CheckpointManager({ storage: new SQLiteCheckpointStorage() })
 * const first = await manager.saveCheckpoint(agent, { message: { role: 'user', content: 'Hi' } })
 * const replay = await manager.replayFrom(first, 'Actually, make it Friday', registry, 'friday')
 * ```
 */
export class CheckpointManager {
    readonly storage: CheckpointStorage
    readonly autoSave: boolean

    private readonly now: () => number
    private readonly logger: Logger
    private readonly lastCheckpoint = new Map<string, string>()
    private readonly lastTimestamp = new Map<string, number>()
    private readonly replayLocks = new Map<string, Mutex>()
    private readonly agentTenants = new Map<string, string>()

    constructor(config: CheckpointManagerConfig = {}) {
        this.storage = config.storage ?? new MemoryCheckpointStorage()
        this.autoSave = config.autoSave ?? true
        this.now = config.now ?? Date.now
        this.logger = (config.logger ?? silentLogger).child({ component: 'checkpoint' })
    }

    // ─── Saving ──────────────────────────────────────────────────────────────

    /**
     * Snapshot an agent. The parent is the last checkpoint saved, restored
     * or explicitly set for that agent. Resolves the new checkpoint id.
     */
    async saveCheckpoint(agent: AgentState, opts: SaveCheckpointOptions = {}): Promise<string> {
        const parent = this.lastCheckpoint.get(agent.id)
        const checkpoint: Checkpoint = {
            id: generateCheckpointId(),
            agentId: agent.id,
            agentType: agent.type,
            tenantId: agent.tenantId,
            status: agent.status,
            collectedFields: structuredClone(agent.collectedFields),
            executionState: structuredClone(agent.executionState),
            context: structuredClone(agent.context),
            message: opts.message ? structuredClone(opts.message) : null,
            result: opts.result ? structuredClone(opts.result) : null,
            messageHistory: structuredClone(opts.messageHistory ?? []),
            parentCheckpointId: parent ?? null,
            branchLabel: opts.branchLabel ?? null,
            timestamp: new Date(this.nextTimestamp(agent.id)),
            version: 1,
        }

        await this.storage.save(checkpoint)
        this.lastCheckpoint.set(agent.id, checkpoint.id)
        this.agentTenants.set(agent.id, agent.tenantId)
        this.logger.debug('checkpoint saved', {
            checkpointId: checkpoint.id,
            agentId: agent.id,
            status: agent.status,
            parent,
        })
        return checkpoint.id
    }

    /** Make `checkpointId` the parent of the agent's next checkpoint. */
    setParentCheckpoint(agentId: string, checkpointId: string): void {
        this.lastCheckpoint.set(agentId, checkpointId)
    }

    getParentCheckpoint(agentId: string): string | undefined {
        return this.lastCheckpoint.get(agentId)
    }

    /** Drop the in-memory parent and clock of an agent; stored checkpoints stay. */
    forget(agentId: string): void {
        this.lastCheckpoint.delete(agentId)
        this.lastTimestamp.delete(agentId)
        this.agentTenants.delete(agentId)
    }

    /** Number of agents with in-memory bookkeeping. */
    get trackedAgents(): number {
        return new Set([...this.lastCheckpoint.keys(), ...this.lastTimestamp.keys(), ...this.replayLocks.keys()]).size
    }

    // ─── Restore & Replay ────────────────────────────────────────────────────

    async getCheckpoint(checkpointId: string): Promise<Checkpoint | undefined> {
        return this.storage.get(checkpointId)
    }

    async getAgentState(checkpointId: string): Promise<CheckpointAgentState | undefined> {
        const checkpoint = await this.storage.get(checkpointId)
        if (!checkpoint) return undefined
        return {
            agentId: checkpoint.agentId,
            agentType: checkpoint.agentType,
            tenantId: checkpoint.tenantId,
            status: checkpoint.status,
            collectedFields: checkpoint.collectedFields,
            executionState: checkpoint.executionState,
            context: checkpoint.context,
            messageHistory: checkpoint.messageHistory,
        }
    }

    /**
     * Rebuild the agent captured by a checkpoint. The checkpoint becomes the
     * parent of the agent's next save.
     */
    async restoreAgent(checkpointId: string, catalog: AgentCatalog): Promise<RestoreResult> {
        const checkpoint = await this.storage.get(checkpointId)
        if (!checkpoint) {
            this.logger.warn('checkpoint not found', { checkpointId })
            return { found: false, checkpointId, reason: 'not_found' }
        }

        const agent = catalog.restore(checkpoint.agentType, {
            id: checkpoint.agentId,
            tenantId: checkpoint.tenantId,
            status: checkpoint.status,
            collectedFields: checkpoint.collectedFields,
            executionState: checkpoint.executionState,
            context: checkpoint.context,
        })
        if (!agent) {
            this.logger.warn('cannot restore checkpoint of unknown agent type', {
                checkpointId,
                agentType: checkpoint.agentType,
            })
            return { found: false, checkpointId, reason: 'unknown_type', agentType: checkpoint.agentType }
        }

        this.lastCheckpoint.set(agent.id, checkpointId)
        this.agentTenants.set(agent.id, checkpoint.tenantId)
        return { found: true, agent, checkpoint }
    }

    /**
     * Restore a checkpoint, send it a different message and save the outcome
     * as a new branch under that checkpoint.
     */
    async replayFrom(
        checkpointId: string,
        message: string,
        catalog: AgentCatalog,
        branchLabel?: string,
    ): Promise<ReplayResult> {
        const checkpoint = await this.storage.get(checkpointId)
        if (!checkpoint) return { found: false, checkpointId, reason: 'not_found' }

        return this.exclusive(checkpoint.agentId, async (): Promise<ReplayResult> => {
            const restored = await this.restoreAgent(checkpointId, catalog)
            if (!restored.found) return restored

            const { agent } = restored
            const reply = await agent.reply(message)
            const userMessage: ModelMessage = { role: 'user', content: message }
            const newId = await this.saveCheckpoint(agent.toState(), {
                message: userMessage,
                result: reply,
                messageHistory: [...checkpoint.messageHistory, userMessage, { role: 'assistant', content: reply.text }],
                branchLabel,
            })
            this.logger.info('replayed checkpoint', { checkpointId, newCheckpointId: newId, branchLabel })
            return { found: true, agent, reply, checkpointId: newId, parentCheckpointId: checkpointId }
        })
    }

    // ─── Queries ─────────────────────────────────────────────────────────────

    /** `undefined` when either checkpoint is missing. */
    async compareCheckpoints(fromId: string, toId: string): Promise<CheckpointDiff | undefined> {
        const [from, to] = await Promise.all([this.storage.get(fromId), this.storage.get(toId)])
        if (!from || !to) return undefined
        return diffCheckpoints(from, to)
    }

    async listCheckpoints(agentId: string, limit?: number, offset?: number): Promise<CheckpointMetadata[]> {
        return this.storage.listByAgent(agentId, limit, offset)
    }

    async listTenantCheckpoints(tenantId: string, limit?: number, offset?: number): Promise<CheckpointMetadata[]> {
        return this.storage.listByTenant(tenantId, limit, offset)
    }

    async getCheckpointTree(agentId: string): Promise<CheckpointTree | undefined> {
        return this.storage.getTree(agentId)
    }

    async getLatestCheckpoint(agentId: string): Promise<Checkpoint | undefined> {
        return this.storage.getLatest(agentId)
    }

    // ─── Deletion ────────────────────────────────────────────────────────────

    async deleteCheckpoint(checkpointId: string): Promise<boolean> {
        return this.storage.delete(checkpointId)
    }

    async clearAgentHistory(agentId: string): Promise<number> {
        this.forget(agentId)
        return this.storage.clearAgent(agentId)
    }

    async clearTenantHistory(tenantId: string): Promise<number> {
        for (const [agentId, owner] of [...this.agentTenants]) {
            if (owner === tenantId) this.forget(agentId)
        }
        return this.storage.clearTenant(tenantId)
    }

    async close(): Promise<void> {
        await this.storage.close?.()
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private nextTimestamp(agentId: string): number {
        const previous = this.lastTimestamp.get(agentId)
        const now = this.now()
        const timestamp = previous !== undefined && now <= previous ? previous + 1 : now
        this.lastTimestamp.set(agentId, timestamp)
        return timestamp
    }

    private async exclusive<T>(agentId: string, task: () => Promise<T>): Promise<T> {
        let lock = this.replayLocks.get(agentId)
        if (!lock) {
            lock = new Mutex()
            this.replayLocks.set(agentId, lock)
        }
        try {
            return await lock.runExclusive(task)
        } finally {
            if (!lock.isLocked() && this.replayLocks.get(agentId) === lock) this.replayLocks.delete(agentId)
        }
    }
}
