import { Mutex } from 'async-mutex'
import { SessionConfigSchema, errorMessage, isTerminal, isWaiting, silentLogger } from '@switchyard/core'
import type { AgentCatalog, AgentInstance, Logger, SessionConfig } from '@switchyard/core'
import type { PoolBackend } from './backend'
import { MemoryPoolBackend } from './backends/memory'
import { entryToInit, toPoolEntry } from './entry'
import type { PoolEntry } from './entry'

export interface AgentPoolConfig {
    /** Supplies schema versions and rebuilds agents on restore */
    catalog: AgentCatalog
    /** @default MemoryPoolBackend */
    backend?: PoolBackend | undefined
    session?: Partial<SessionConfig> | undefined
    /** @default Date.now */
    now?: (() => number) | undefined
    logger?: Logger | undefined
}

export interface UpdateOptions {
    /** Latest checkpoint taken for this agent */
    checkpointId?: string | undefined
}

interface Slot {
    agent: AgentInstance
    createdAt: Date
    lastActivity: Date
    checkpointId: string | undefined
}

/**
 * AgentPool — per-tenant cache of live agents mirrored into a PoolBackend.
 *
 * The in-memory map is guarded by a single mutex. Backend writes happen
 * after that lock is released, queued per agent so that a removal always
 * lands after any save already under way, and a save is dropped when its
 * slot has left the map by the time it runs. A failed backend write is
 * logged and retried by the next auto-backup.
 *
 * @example
 * ```ts
 * const pool = new AgentPool({ catalog: agents, backend: new RedisPoolBackend({ redis }) })
 * await pool.restoreAllSessions()
 * pool.startBackgroundTasks()
 * ```
 */
export class AgentPool {
    readonly backend: PoolBackend
    readonly session: SessionConfig

    private readonly catalog: AgentCatalog
    private readonly now: () => number
    private readonly logger: Logger
    private readonly mutex = new Mutex()
    private readonly tenants = new Map<string, Map<string, Slot>>()
    private readonly restoredTenants = new Set<string>()
    // tenant → agent → queue of backend writes
    private readonly writeLocks = new Map<string, Map<string, Mutex>>()
    private backupTimer: NodeJS.Timeout | undefined
    private cleanupTimer: NodeJS.Timeout | undefined

    constructor(config: AgentPoolConfig) {
        this.catalog = config.catalog
        this.backend = config.backend ?? new MemoryPoolBackend()
        this.session = SessionConfigSchema.parse(config.session ?? {})
        this.now = config.now ?? Date.now
        this.logger = (config.logger ?? silentLogger).child({ component: 'pool' })
    }

    // ─── Agents ──────────────────────────────────────────────────────────────

    async addAgent(agent: AgentInstance, opts: UpdateOptions = {}): Promise<void> {
        const slot = await this.mutex.runExclusive(() => {
            const agents = this.tenantMap(agent.tenantId)
            const existing = agents.get(agent.id)
            const now = new Date(this.now())
            const next: Slot = {
                agent,
                createdAt: existing?.createdAt ?? now,
                lastActivity: now,
                checkpointId: opts.checkpointId ?? existing?.checkpointId,
            }
            agents.set(agent.id, next)
            return next
        })
        await this.persist(slot)
        this.logger.debug('agent stored', { tenantId: agent.tenantId, agentId: agent.id, status: agent.status })
    }

    /** Same as `addAgent`; the entry is replaced. */
    async updateAgent(agent: AgentInstance, opts: UpdateOptions = {}): Promise<void> {
        await this.addAgent(agent, opts)
    }

    async getAgent(tenantId: string, agentId: string): Promise<AgentInstance | undefined> {
        return this.mutex.runExclusive(() => this.tenants.get(tenantId)?.get(agentId)?.agent)
    }

    async listAgents(tenantId: string): Promise<AgentInstance[]> {
        return this.mutex.runExclusive(() => [...(this.tenants.get(tenantId)?.values() ?? [])].map((s) => s.agent))
    }

    async removeAgent(tenantId: string, agentId: string): Promise<boolean> {
        const removed = await this.mutex.runExclusive(() => {
            const agents = this.tenants.get(tenantId)
            if (!agents) return false
            const deleted = agents.delete(agentId)
            if (agents.size === 0) this.tenants.delete(tenantId)
            return deleted
        })
        if (this.session.enabled) {
            const persisted = await this.serialize(tenantId, agentId, () => this.backend.removeAgent(tenantId, agentId))
            return removed || persisted
        }
        return removed
    }

    async clearTenant(tenantId: string): Promise<number> {
        const inMemory = await this.mutex.runExclusive(() => {
            const count = this.tenants.get(tenantId)?.size ?? 0
            this.tenants.delete(tenantId)
            return count
        })
        if (!this.session.enabled) return inMemory
        const pending = [...(this.writeLocks.get(tenantId)?.values() ?? [])]
        await Promise.all(pending.map((lock) => lock.waitForUnlock()))
        const persisted = await this.backend.clearTenant(tenantId)
        return Math.max(inMemory, persisted)
    }

    hasAgentsInMemory(tenantId: string): boolean {
        return (this.tenants.get(tenantId)?.size ?? 0) > 0
    }

    /** Tenants with agents in memory or in the backend. */
    async getActiveTenants(): Promise<string[]> {
        const persisted = this.session.enabled ? await this.backend.getActiveTenants() : []
        return [...new Set([...this.tenants.keys(), ...persisted])].sort()
    }

    /** Persisted entry, even for agents not loaded in memory. */
    async getEntry(tenantId: string, agentId: string): Promise<PoolEntry | undefined> {
        return this.backend.getAgent(tenantId, agentId)
    }

    async listEntries(tenantId: string): Promise<PoolEntry[]> {
        return this.backend.listAgents(tenantId)
    }

    /**
     * First agent of the tenant waiting for input or approval. With a
     * `sessionId`, only agents whose context carries that session match.
     */
    async getWaitingAgent(tenantId: string, sessionId?: string): Promise<AgentInstance | undefined> {
        return this.mutex.runExclusive(() => {
            for (const { agent } of this.tenants.get(tenantId)?.values() ?? []) {
                if (!isWaiting(agent.status)) continue
                if (sessionId === undefined || agent.context['sessionId'] === sessionId) return agent
            }
            return undefined
        })
    }

    // ─── Restore ─────────────────────────────────────────────────────────────

    isTenantRestored(tenantId: string): boolean {
        return this.restoredTenants.has(tenantId)
    }

    /**
     * Load a tenant's persisted agents into memory. Entries in a terminal
     * status, written under a different schema version, or for types that
     * no longer exist are discarded and removed from the backend. Agents
     * already in memory win.
     */
    async restoreTenantSession(tenantId: string, catalog: AgentCatalog = this.catalog): Promise<number> {
        this.restoredTenants.add(tenantId)
        if (!this.session.enabled) return 0

        const entries = await this.backend.listAgents(tenantId)
        let restored = 0
        for (const entry of entries) {
            if (isTerminal(entry.status)) {
                this.logger.warn('discarded finished agent', { tenantId, agentId: entry.agentId, status: entry.status })
                await this.discard(entry)
                continue
            }

            const current = catalog.schemaVersion(entry.agentType)
            if (entry.schemaVersion !== current) {
                this.logger.warn('discarded stale agent: schema version mismatch', {
                    tenantId,
                    agentId: entry.agentId,
                    stored: entry.schemaVersion,
                    current,
                })
                await this.discard(entry)
                continue
            }

            const agent = catalog.restore(entry.agentType, entryToInit(entry))
            if (!agent) {
                this.logger.warn('discarded agent of unknown type', { tenantId, agentId: entry.agentId, agentType: entry.agentType })
                await this.discard(entry)
                continue
            }

            const added = await this.mutex.runExclusive(() => {
                const agents = this.tenantMap(tenantId)
                if (agents.has(agent.id)) return false
                agents.set(agent.id, {
                    agent,
                    createdAt: entry.createdAt,
                    lastActivity: entry.lastActivity,
                    checkpointId: entry.checkpointId ?? undefined,
                })
                return true
            })
            if (added) restored++
        }

        this.logger.info('restored tenant session', { tenantId, restored })
        return restored
    }

    async restoreAllSessions(catalog: AgentCatalog = this.catalog): Promise<number> {
        if (!this.session.enabled) return 0
        const tenants = await this.backend.getActiveTenants()
        let total = 0
        for (const tenantId of tenants) {
            total += await this.restoreTenantSession(tenantId, catalog)
        }
        this.logger.info('restored sessions', { tenants: tenants.length, agents: total })
        return total
    }

    // ─── Maintenance ─────────────────────────────────────────────────────────

    /** Write every in-memory agent to the backend; resolves the number written. */
    async flush(): Promise<number> {
        const slots = await this.mutex.runExclusive(() =>
            [...this.tenants.values()].flatMap((agents) => [...agents.values()]),
        )
        let written = 0
        for (const slot of slots) {
            if (await this.persist(slot)) written++
        }
        return written
    }

    /**
     * Fail and evict agents that have been waiting for longer than
     * `timeoutSeconds`. Resolves the evicted agent ids.
     */
    async cleanupTimedOutAgents(timeoutSeconds: number = this.session.waitingTimeoutSeconds): Promise<string[]> {
        const now = this.now()
        const expired = await this.mutex.runExclusive(() =>
            [...this.tenants.values()]
                .flatMap((agents) => [...agents.values()])
                .filter((s) => isWaiting(s.agent.status) && now - s.lastActivity.getTime() > timeoutSeconds * 1000),
        )

        const ids: string[] = []
        for (const { agent, lastActivity } of expired) {
            const waited = Math.round((now - lastActivity.getTime()) / 1000)
            this.logger.warn('agent timed out while waiting', {
                tenantId: agent.tenantId,
                agentId: agent.id,
                status: agent.status,
                waitedSeconds: waited,
            })
            agent.fail(`Timed out after ${waited}s in ${agent.status}`)
            await this.removeAgent(agent.tenantId, agent.id)
            ids.push(agent.id)
        }
        return ids
    }

    /** Start the auto-backup and waiting-agent cleanup loops. */
    startBackgroundTasks(): void {
        if (!this.backupTimer && this.session.enabled) {
            this.backupTimer = setInterval(() => {
                void this.runBackup()
            }, this.session.autoBackupIntervalSeconds * 1000)
            this.backupTimer.unref()
        }
        if (!this.cleanupTimer) {
            this.cleanupTimer = setInterval(() => {
                void this.runCleanup()
            }, this.session.cleanupIntervalSeconds * 1000)
            this.cleanupTimer.unref()
        }
    }

    stopBackgroundTasks(): void {
        if (this.backupTimer) clearInterval(this.backupTimer)
        if (this.cleanupTimer) clearInterval(this.cleanupTimer)
        this.backupTimer = undefined
        this.cleanupTimer = undefined
    }

    /** Stop background loops, flush once more and close the backend. */
    async close(): Promise<void> {
        this.stopBackgroundTasks()
        if (this.session.enabled) await this.flush()
        await this.backend.close?.()
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private tenantMap(tenantId: string): Map<string, Slot> {
        let agents = this.tenants.get(tenantId)
        if (!agents) {
            agents = new Map()
            this.tenants.set(tenantId, agents)
        }
        return agents
    }

    /** Run a backend write after every earlier write for the same agent. */
    private async serialize<T>(tenantId: string, agentId: string, write: () => Promise<T>): Promise<T> {
        let agents = this.writeLocks.get(tenantId)
        if (!agents) {
            agents = new Map()
            this.writeLocks.set(tenantId, agents)
        }
        let lock = agents.get(agentId)
        if (!lock) {
            lock = new Mutex()
            agents.set(agentId, lock)
        }
        try {
            return await lock.runExclusive(write)
        } finally {
            if (!lock.isLocked() && agents.get(agentId) === lock) {
                agents.delete(agentId)
                if (agents.size === 0 && this.writeLocks.get(tenantId) === agents) this.writeLocks.delete(tenantId)
            }
        }
    }

    private async persist(slot: Slot): Promise<boolean> {
        if (!this.session.enabled) return false
        const { tenantId, id } = slot.agent
        return this.serialize(tenantId, id, async () => {
            // removed or replaced since the slot was read
            if (this.tenants.get(tenantId)?.get(id) !== slot) return false

            const entry = toPoolEntry(slot.agent, {
                schemaVersion: this.catalog.schemaVersion(slot.agent.type),
                checkpointId: slot.checkpointId,
                createdAt: slot.createdAt,
                lastActivity: slot.lastActivity,
            })
            try {
                await this.backend.saveAgent(entry)
                return true
            } catch (err) {
                this.logger.error('failed to persist agent', {
                    tenantId: entry.tenantId,
                    agentId: entry.agentId,
                    error: errorMessage(err),
                })
                return false
            }
        })
    }

    private async discard(entry: PoolEntry): Promise<void> {
        await this.serialize(entry.tenantId, entry.agentId, () => this.backend.removeAgent(entry.tenantId, entry.agentId))
    }

    private async runBackup(): Promise<void> {
        const written = await this.flush()
        this.logger.debug('auto-backup', { written })
    }

    private async runCleanup(): Promise<void> {
        try {
            await this.cleanupTimedOutAgents()
        } catch (err) {
            this.logger.error('waiting-agent cleanup failed', { error: errorMessage(err) })
        }
    }
}
