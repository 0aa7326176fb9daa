import { silentLogger, errorMessage } from '@switchyard/core'
import type { Logger } from '@switchyard/core'
import type { SqlClient, SqlRow } from '@switchyard/storage'
import type { PoolBackend } from '../backend'
import { parseEntry, serializeEntry } from '../entry'
import type { PoolEntry } from '../entry'

export interface SqlPoolBackendConfig {
    client: SqlClient
    /** @default 'agent_pool' */
    table?: string | undefined
    /**
     * Lifetime of a row after its last save.
     * @default 86400
     */
    sessionTtlSeconds?: number | undefined
    /**
     * Interval of the expired-row sweep started by `startCleanup()`.
     * @default 3600
     */
    cleanupIntervalSeconds?: number | undefined
    /** @default Date.now */
    now?: (() => number) | undefined
    logger?: Logger | undefined
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * SqlPoolBackend — one row per agent, upserted on `(tenant_id, agent_id)`.
 *
 * Expiry is an `expires_at` epoch-ms column filtered at query time; expired
 * rows are physically deleted by `cleanupExpired()` (run periodically after
 * `startCleanup()`).
 *
 * @example
 * ```ts
 * const backend = new SqlPoolBackend({ client: postgresClient(sql) })
 * await backend.initialize()
 * backend.startCleanup()
 * ```
 */
export class SqlPoolBackend implements PoolBackend {
    readonly name = 'sql'

    private readonly client: SqlClient
    private readonly table: string
    private readonly ttlMs: number
    private readonly cleanupIntervalMs: number
    private readonly now: () => number
    private readonly logger: Logger
    private schemaReady: Promise<void> | undefined
    private cleanupTimer: NodeJS.Timeout | undefined

    constructor(config: SqlPoolBackendConfig) {
        const table = config.table ?? 'agent_pool'
        if (!IDENTIFIER.test(table)) throw new Error(`[SqlPoolBackend] Invalid table name "${table}".`)
        this.client = config.client
        this.table = table
        this.ttlMs = (config.sessionTtlSeconds ?? 86_400) * 1000
        this.cleanupIntervalMs = (config.cleanupIntervalSeconds ?? 3600) * 1000
        this.now = config.now ?? Date.now
        this.logger = (config.logger ?? silentLogger).child({ backend: 'sql' })
    }

    /** Create the table and index if missing. Safe to call repeatedly. */
    initialize(): Promise<void> {
        this.schemaReady ??= this.createSchema()
        return this.schemaReady
    }

    private async createSchema(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                tenant_id TEXT NOT NULL,
                agent_id TEXT NOT NULL,
                agent_type TEXT NOT NULL,
                status TEXT NOT NULL,
                schema_version BIGINT NOT NULL DEFAULT 0,
                data TEXT NOT NULL,
                last_activity BIGINT NOT NULL,
                expires_at BIGINT NOT NULL,
                PRIMARY KEY (tenant_id, agent_id)
            )
        `)
        await this.client.query(
            `CREATE INDEX IF NOT EXISTS idx_${this.table}_expires ON ${this.table} (expires_at)`,
        )
    }

    async saveAgent(entry: PoolEntry): Promise<void> {
        await this.initialize()
        await this.client.query(
            `INSERT INTO ${this.table}
                (tenant_id, agent_id, agent_type, status, schema_version, data, last_activity, expires_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (tenant_id, agent_id) DO UPDATE SET
                agent_type = EXCLUDED.agent_type,
                status = EXCLUDED.status,
                schema_version = EXCLUDED.schema_version,
                data = EXCLUDED.data,
                last_activity = EXCLUDED.last_activity,
                expires_at = EXCLUDED.expires_at`,
            [
                entry.tenantId,
                entry.agentId,
                entry.agentType,
                entry.status,
                entry.schemaVersion,
                serializeEntry(entry),
                entry.lastActivity.getTime(),
                this.now() + this.ttlMs,
            ],
        )
    }

    async getAgent(tenantId: string, agentId: string): Promise<PoolEntry | undefined> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT agent_id, data FROM ${this.table} WHERE tenant_id = $1 AND agent_id = $2 AND expires_at > $3`,
            [tenantId, agentId, this.now()],
        )
        const row = rows[0]
        return row ? this.rowToEntry(row) : undefined
    }

    async listAgents(tenantId: string): Promise<PoolEntry[]> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT agent_id, data FROM ${this.table} WHERE tenant_id = $1 AND expires_at > $2 ORDER BY agent_id`,
            [tenantId, this.now()],
        )
        const entries: PoolEntry[] = []
        for (const row of rows) {
            const entry = this.rowToEntry(row)
            if (entry) entries.push(entry)
        }
        return entries
    }

    async removeAgent(tenantId: string, agentId: string): Promise<boolean> {
        await this.initialize()
        const rows = await this.client.query(
            `DELETE FROM ${this.table} WHERE tenant_id = $1 AND agent_id = $2 RETURNING agent_id`,
            [tenantId, agentId],
        )
        return rows.length > 0
    }

    async clearTenant(tenantId: string): Promise<number> {
        await this.initialize()
        const rows = await this.client.query(
            `DELETE FROM ${this.table} WHERE tenant_id = $1 RETURNING agent_id`,
            [tenantId],
        )
        return rows.length
    }

    async getActiveTenants(): Promise<string[]> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT DISTINCT tenant_id FROM ${this.table} WHERE expires_at > $1 ORDER BY tenant_id`,
            [this.now()],
        )
        return rows.flatMap((row) => (typeof row['tenant_id'] === 'string' ? [row['tenant_id']] : []))
    }

    /** Delete expired rows; resolves the number removed. */
    async cleanupExpired(): Promise<number> {
        await this.initialize()
        const rows = await this.client.query(
            `DELETE FROM ${this.table} WHERE expires_at <= $1 RETURNING agent_id`,
            [this.now()],
        )
        if (rows.length) this.logger.info('removed expired pool rows', { count: rows.length })
        return rows.length
    }

    startCleanup(): void {
        if (this.cleanupTimer) return
        this.cleanupTimer = setInterval(() => {
            void this.sweep()
        }, this.cleanupIntervalMs)
        this.cleanupTimer.unref()
    }

    stopCleanup(): void {
        if (!this.cleanupTimer) return
        clearInterval(this.cleanupTimer)
        this.cleanupTimer = undefined
    }

    async close(): Promise<void> {
        this.stopCleanup()
    }

    private async sweep(): Promise<void> {
        try {
            await this.cleanupExpired()
        } catch (err) {
            this.logger.error('expired-row cleanup failed', { error: errorMessage(err) })
        }
    }

    private rowToEntry(row: SqlRow): PoolEntry | undefined {
        const entry = parseEntry(row['data'])
        if (!entry) this.logger.warn('unreadable pool row', { agentId: row['agent_id'] })
        return entry
    }
}
