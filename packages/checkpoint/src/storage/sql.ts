import { CheckpointError, CheckpointParentMissingError, silentLogger } from '@switchyard/core'
import type { Logger } from '@switchyard/core'
import type { SqlClient, SqlRow } from '@switchyard/storage'
import { CheckpointTree } from '../tree'
import { parseCheckpoint, serializeCheckpoint, toMetadata } from '../types'
import type { Checkpoint, CheckpointMetadata } from '../types'
import { DEFAULT_LIST_LIMIT } from './storage'
import type { CheckpointStorage } from './storage'

export interface SqlCheckpointStorageConfig {
    client: SqlClient
    /** @default 'agent_checkpoints' */
    table?: string | undefined
    logger?: Logger | undefined
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * SqlCheckpointStorage — relational storage over a pooled SqlClient
 * (postgres.js in production). The full checkpoint is a JSON `data` column;
 * the indexed columns only serve lookups and ordering.
 *
 * @example
 * ```ts
 * const storage = new SqlCheckpointStorage({ client: postgresClient(sql) })
 * await storage.initialize()
 * ```
 */
export class SqlCheckpointStorage implements CheckpointStorage {
    readonly name = 'sql'

    private readonly client: SqlClient
    private readonly table: string
    private readonly logger: Logger
    private schemaReady: Promise<void> | undefined

    constructor(config: SqlCheckpointStorageConfig) {
        const table = config.table ?? 'agent_checkpoints'
        if (!IDENTIFIER.test(table)) throw new Error(`[SqlCheckpointStorage] Invalid table name "${table}".`)
        this.client = config.client
        this.table = table
        this.logger = (config.logger ?? silentLogger).child({ storage: 'sql' })
    }

    /** Create the table and indexes if missing. Safe to call repeatedly. */
    initialize(): Promise<void> {
        this.schemaReady ??= this.createSchema()
        return this.schemaReady
    }

    private async createSchema(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                id TEXT PRIMARY KEY,
                agent_id TEXT NOT NULL,
                agent_type TEXT NOT NULL,
                tenant_id TEXT NOT NULL,
                status TEXT NOT NULL,
                parent_checkpoint_id TEXT,
                branch_label TEXT,
                created_at BIGINT NOT NULL,
                data TEXT NOT NULL
            )
        `)
        await this.client.query(
            `CREATE INDEX IF NOT EXISTS idx_${this.table}_agent ON ${this.table} (agent_id, created_at)`,
        )
        await this.client.query(
            `CREATE INDEX IF NOT EXISTS idx_${this.table}_tenant ON ${this.table} (tenant_id, created_at)`,
        )
    }

    async save(checkpoint: Checkpoint): Promise<string> {
        await this.initialize()
        const parent = checkpoint.parentCheckpointId
        if (parent) {
            const rows = await this.client.query(`SELECT id FROM ${this.table} WHERE id = $1`, [parent])
            if (rows.length === 0) throw new CheckpointParentMissingError(checkpoint.id, parent)
        }

        const inserted = await this.client.query(
            `INSERT INTO ${this.table}
                (id, agent_id, agent_type, tenant_id, status, parent_checkpoint_id, branch_label, created_at, data)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             ON CONFLICT (id) DO NOTHING
             RETURNING id`,
            [
                checkpoint.id,
                checkpoint.agentId,
                checkpoint.agentType,
                checkpoint.tenantId,
                checkpoint.status,
                parent ?? null,
                checkpoint.branchLabel ?? null,
                checkpoint.timestamp.getTime(),
                serializeCheckpoint(checkpoint),
            ],
        )
        if (inserted.length === 0) throw new CheckpointError(`[Checkpoint] "${checkpoint.id}" already exists.`)
        return checkpoint.id
    }

    async get(checkpointId: string): Promise<Checkpoint | undefined> {
        await this.initialize()
        const rows = await this.client.query(`SELECT id, data FROM ${this.table} WHERE id = $1`, [checkpointId])
        return this.decodeAll(rows)[0]
    }

    async delete(checkpointId: string): Promise<boolean> {
        await this.initialize()
        const rows = await this.client.query(`DELETE FROM ${this.table} WHERE id = $1 RETURNING id`, [checkpointId])
        return rows.length > 0
    }

    async listByAgent(agentId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT id, data FROM ${this.table} WHERE agent_id = $1
             ORDER BY created_at DESC, id DESC LIMIT $2 OFFSET $3`,
            [agentId, limit, offset],
        )
        return this.decodeAll(rows).map(toMetadata)
    }

    async listByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT id, data FROM ${this.table} WHERE tenant_id = $1
             ORDER BY created_at DESC, id DESC LIMIT $2 OFFSET $3`,
            [tenantId, limit, offset],
        )
        return this.decodeAll(rows).map(toMetadata)
    }

    async getTree(agentId: string): Promise<CheckpointTree | undefined> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT id, data FROM ${this.table} WHERE agent_id = $1 ORDER BY created_at ASC, id ASC`,
            [agentId],
        )
        return CheckpointTree.fromCheckpoints(this.decodeAll(rows))
    }

    async getLatest(agentId: string): Promise<Checkpoint | undefined> {
        await this.initialize()
        const rows = await this.client.query(
            `SELECT id, data FROM ${this.table} WHERE agent_id = $1 ORDER BY created_at DESC, id DESC LIMIT 1`,
            [agentId],
        )
        return this.decodeAll(rows)[0]
    }

    async clearAgent(agentId: string): Promise<number> {
        await this.initialize()
        const rows = await this.client.query(`DELETE FROM ${this.table} WHERE agent_id = $1 RETURNING id`, [agentId])
        return rows.length
    }

    async clearTenant(tenantId: string): Promise<number> {
        await this.initialize()
        const rows = await this.client.query(`DELETE FROM ${this.table} WHERE tenant_id = $1 RETURNING id`, [tenantId])
        return rows.length
    }

    private decodeAll(rows: SqlRow[]): Checkpoint[] {
        return rows.flatMap((row) => {
            const checkpoint = parseCheckpoint(row['data'])
            if (!checkpoint) {
                this.logger.warn('unreadable checkpoint row', { checkpointId: row['id'] })
                return []
            }
            return [checkpoint]
        })
    }
}
