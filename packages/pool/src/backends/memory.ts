import type { PoolBackend } from '../backend'
import type { PoolEntry } from '../entry'

/**
 * MemoryPoolBackend — process-lifetime storage with no TTL.
 * Best for: single-process apps, development, testing.
 */
export class MemoryPoolBackend implements PoolBackend {
    readonly name = 'memory'

    private readonly store = new Map<string, Map<string, PoolEntry>>()

    async saveAgent(entry: PoolEntry): Promise<void> {
        const agents = this.store.get(entry.tenantId) ?? new Map<string, PoolEntry>()
        agents.set(entry.agentId, structuredClone(entry))
        this.store.set(entry.tenantId, agents)
    }

    async getAgent(tenantId: string, agentId: string): Promise<PoolEntry | undefined> {
        const entry = this.store.get(tenantId)?.get(agentId)
        return entry ? structuredClone(entry) : undefined
    }

    async listAgents(tenantId: string): Promise<PoolEntry[]> {
        return [...(this.store.get(tenantId)?.values() ?? [])].map((e) => structuredClone(e))
    }

    async removeAgent(tenantId: string, agentId: string): Promise<boolean> {
        const agents = this.store.get(tenantId)
        if (!agents) return false
        const removed = agents.delete(agentId)
        if (agents.size === 0) this.store.delete(tenantId)
        return removed
    }

    async clearTenant(tenantId: string): Promise<number> {
        const count = this.store.get(tenantId)?.size ?? 0
        this.store.delete(tenantId)
        return count
    }

    async getActiveTenants(): Promise<string[]> {
        return [...this.store.keys()]
    }
}
