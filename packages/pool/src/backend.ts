import type { PoolEntry } from './entry'

/**
 * Persistence behind an AgentPool. Implementations must hold at most one
 * entry per `(tenantId, agentId)`; saving again replaces it.
 */
export interface PoolBackend {
    readonly name: string
    saveAgent(entry: PoolEntry): Promise<void>
    getAgent(tenantId: string, agentId: string): Promise<PoolEntry | undefined>
    listAgents(tenantId: string): Promise<PoolEntry[]>
    /** Resolves `true` when an entry was removed */
    removeAgent(tenantId: string, agentId: string): Promise<boolean>
    /** Resolves the number of entries removed */
    clearTenant(tenantId: string): Promise<number>
    getActiveTenants(): Promise<string[]>
    close?(): Promise<void>
}
