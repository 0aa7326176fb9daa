import { silentLogger } from '@switchyard/core'
import type { Logger } from '@switchyard/core'
import type { RedisLike } from '@switchyard/storage'
import type { PoolBackend } from '../backend'
import { parseEntry, serializeEntry } from '../entry'
import type { PoolEntry } from '../entry'

export interface RedisPoolBackendConfig {
    redis: RedisLike
    /**
     * Key prefix.
     * @default 'switchyard:pool'
     */
    prefix?: string | undefined
    /**
     * TTL of the "active" copy, refreshed on every save.
     * @default 600
     */
    activeTtlSeconds?: number | undefined
    /**
     * TTL of the "session" copy, kept for restores after a restart.
     * @default 86400
     */
    sessionTtlSeconds?: number | undefined
    logger?: Logger | undefined
}

/**
 * RedisPoolBackend — entries live under two TTL namespaces:
 *
 *   <prefix>:active:<tenant>:<agent>   short TTL, hot copy
 *   <prefix>:session:<tenant>:<agent>  long TTL, survives idle periods
 *
 * plus a per-tenant id set and a global tenant set. Index sets are pruned
 * lazily when they point at keys that have expired.
 */
export class RedisPoolBackend implements PoolBackend {
    readonly name = 'redis'

    private readonly redis: RedisLike
    private readonly prefix: string
    private readonly activeTtl: number
    private readonly sessionTtl: number
    private readonly logger: Logger

    constructor(config: RedisPoolBackendConfig) {
        this.redis = config.redis
        this.prefix = config.prefix ?? 'switchyard:pool'
        this.activeTtl = config.activeTtlSeconds ?? 600
        this.sessionTtl = config.sessionTtlSeconds ?? 86_400
        this.logger = (config.logger ?? silentLogger).child({ backend: 'redis' })
    }

    activeKey(tenantId: string, agentId: string): string {
        return `${this.prefix}:active:${tenantId}:${agentId}`
    }

    sessionKey(tenantId: string, agentId: string): string {
        return `${this.prefix}:session:${tenantId}:${agentId}`
    }

    tenantKey(tenantId: string): string {
        return `${this.prefix}:tenant:${tenantId}`
    }

    get tenantsKey(): string {
        return `${this.prefix}:tenants`
    }

    async saveAgent(entry: PoolEntry): Promise<void> {
        const payload = serializeEntry(entry)
        await this.redis.setex(this.activeKey(entry.tenantId, entry.agentId), this.activeTtl, payload)
        await this.redis.setex(this.sessionKey(entry.tenantId, entry.agentId), this.sessionTtl, payload)
        await this.redis.sadd(this.tenantKey(entry.tenantId), [entry.agentId])
        await this.redis.expire(this.tenantKey(entry.tenantId), this.sessionTtl)
        await this.redis.sadd(this.tenantsKey, [entry.tenantId])
    }

    async getAgent(tenantId: string, agentId: string): Promise<PoolEntry | undefined> {
        const raw =
            (await this.redis.get(this.activeKey(tenantId, agentId))) ??
            (await this.redis.get(this.sessionKey(tenantId, agentId)))
        if (raw === null) return undefined

        const entry = parseEntry(raw)
        if (!entry) {
            this.logger.warn('unreadable pool entry', { tenantId, agentId })
        }
        return entry
    }

    async listAgents(tenantId: string): Promise<PoolEntry[]> {
        const ids = await this.redis.smembers(this.tenantKey(tenantId))
        const entries: PoolEntry[] = []
        const stale: string[] = []
        for (const id of [...ids].sort()) {
            const entry = await this.getAgent(tenantId, id)
            if (entry) entries.push(entry)
            else stale.push(id)
        }
        if (stale.length) {
            await this.redis.srem(this.tenantKey(tenantId), stale)
            if (entries.length === 0) await this.redis.srem(this.tenantsKey, [tenantId])
        }
        return entries
    }

    async removeAgent(tenantId: string, agentId: string): Promise<boolean> {
        const removed = await this.redis.del([this.activeKey(tenantId, agentId), this.sessionKey(tenantId, agentId)])
        await this.redis.srem(this.tenantKey(tenantId), [agentId])
        if ((await this.redis.scard(this.tenantKey(tenantId))) === 0) {
            await this.redis.srem(this.tenantsKey, [tenantId])
        }
        return removed > 0
    }

    async clearTenant(tenantId: string): Promise<number> {
        const ids = await this.redis.smembers(this.tenantKey(tenantId))
        let count = 0
        for (const id of ids) {
            const removed = await this.redis.del([this.activeKey(tenantId, id), this.sessionKey(tenantId, id)])
            if (removed > 0) count++
        }
        await this.redis.del([this.tenantKey(tenantId)])
        await this.redis.srem(this.tenantsKey, [tenantId])
        return count
    }

    async getActiveTenants(): Promise<string[]> {
        const tenants = await this.redis.smembers(this.tenantsKey)
        const active: string[] = []
        for (const tenantId of [...tenants].sort()) {
            if ((await this.redis.scard(this.tenantKey(tenantId))) > 0) active.push(tenantId)
            else await this.redis.srem(this.tenantsKey, [tenantId])
        }
        return active
    }

    async close(): Promise<void> {
        await this.redis.quit()
    }
}
