import Database from 'better-sqlite3'
import { z } from 'zod'
import { CheckpointError, CheckpointParentMissingError, silentLogger } from '@switchyard/core'
import type { Logger } from '@switchyard/core'
import { CheckpointTree } from '../tree'
import { parseCheckpoint, serializeCheckpoint, toMetadata } from '../types'
import type { Checkpoint, CheckpointMetadata } from '../types'
import { DEFAULT_LIST_LIMIT } from './storage'
import type { CheckpointStorage } from './storage'

export interface SQLiteCheckpointStorageConfig {
    /**
     * Database file. Ignored when `db` is given.
     * @default ':memory:'
     */
    path?: string | undefined
    /** Shared or injected database; the caller keeps ownership */
    db?: Database.Database | undefined
    logger?: Logger | undefined
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS checkpoints (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL,
        agent_type TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        status TEXT NOT NULL,
        parent_checkpoint_id TEXT,
        branch_label TEXT,
        created_at INTEGER NOT NULL,
        data TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_checkpoints_agent ON checkpoints (agent_id, created_at);
    CREATE INDEX IF NOT EXISTS idx_checkpoints_tenant ON checkpoints (tenant_id, created_at);
`

const DataRowSchema = z.object({ id: z.string(), data: z.string() })

type DataRow = z.infer<typeof DataRowSchema>

/**
 * SQLiteCheckpointStorage — embedded, single-file storage on better-sqlite3.
 * Statements are prepared once; the driver is synchronous, so every method
 * completes before its promise resolves.
 *
 * @example
 * ```ts
 * const storage = new SQLiteCheckpointStorage({ path: './checkpoints.db' })
 * const manager = new CheckpointManager({ storage })
 * ```
 */
export class SQLiteCheckpointStorage implements CheckpointStorage {
    readonly name = 'sqlite'

    private readonly db: Database.Database
    private readonly ownsDb: boolean
    private readonly logger: Logger
    private readonly statements

    constructor(config: SQLiteCheckpointStorageConfig = {}) {
        this.ownsDb = !config.db
        this.db = config.db ?? new Database(config.path ?? ':memory:')
        this.logger = (config.logger ?? silentLogger).child({ storage: 'sqlite' })
        this.db.exec(SCHEMA)

        this.statements = {
            insert: this.db.prepare(`
                INSERT INTO checkpoints
                    (id, agent_id, agent_type, tenant_id, status, parent_checkpoint_id, branch_label, created_at, data)
                VALUES
                    (:id, :agentId, :agentType, :tenantId, :status, :parentCheckpointId, :branchLabel, :createdAt, :data)
            `),
            exists: this.db.prepare('SELECT id FROM checkpoints WHERE id = ?'),
            get: this.db.prepare('SELECT id, data FROM checkpoints WHERE id = ?'),
            delete: this.db.prepare('DELETE FROM checkpoints WHERE id = ?'),
            listByAgent: this.db.prepare(
                'SELECT id, data FROM checkpoints WHERE agent_id = ? ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?',
            ),
            listByTenant: this.db.prepare(
                'SELECT id, data FROM checkpoints WHERE tenant_id = ? ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?',
            ),
            tree: this.db.prepare('SELECT id, data FROM checkpoints WHERE agent_id = ? ORDER BY created_at ASC, id ASC'),
            latest: this.db.prepare(
                'SELECT id, data FROM checkpoints WHERE agent_id = ? ORDER BY created_at DESC, id DESC LIMIT 1',
            ),
            clearAgent: this.db.prepare('DELETE FROM checkpoints WHERE agent_id = ?'),
            clearTenant: this.db.prepare('DELETE FROM checkpoints WHERE tenant_id = ?'),
        }
    }

    async save(checkpoint: Checkpoint): Promise<string> {
        if (this.statements.exists.get(checkpoint.id) !== undefined) {
            throw new CheckpointError(`[Checkpoint] "${checkpoint.id}" already exists.`)
        }
        const parent = checkpoint.parentCheckpointId
        if (parent && this.statements.exists.get(parent) === undefined) {
            throw new CheckpointParentMissingError(checkpoint.id, parent)
        }

        this.statements.insert.run({
            id: checkpoint.id,
            agentId: checkpoint.agentId,
            agentType: checkpoint.agentType,
            tenantId: checkpoint.tenantId,
            status: checkpoint.status,
            parentCheckpointId: parent ?? null,
            branchLabel: checkpoint.branchLabel ?? null,
            createdAt: checkpoint.timestamp.getTime(),
            data: serializeCheckpoint(checkpoint),
        })
        return checkpoint.id
    }

    async get(checkpointId: string): Promise<Checkpoint | undefined> {
        return this.readOne(this.statements.get.get(checkpointId))
    }

    async delete(checkpointId: string): Promise<boolean> {
        return this.statements.delete.run(checkpointId).changes > 0
    }

    async listByAgent(agentId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        return this.readAll(this.statements.listByAgent.all(agentId, limit, offset)).map(toMetadata)
    }

    async listByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<CheckpointMetadata[]> {
        return this.readAll(this.statements.listByTenant.all(tenantId, limit, offset)).map(toMetadata)
    }

    async getTree(agentId: string): Promise<CheckpointTree | undefined> {
        return CheckpointTree.fromCheckpoints(this.readAll(this.statements.tree.all(agentId)))
    }

    async getLatest(agentId: string): Promise<Checkpoint | undefined> {
        return this.readOne(this.statements.latest.get(agentId))
    }

    async clearAgent(agentId: string): Promise<number> {
        return this.statements.clearAgent.run(agentId).changes
    }

    async clearTenant(tenantId: string): Promise<number> {
        return this.statements.clearTenant.run(tenantId).changes
    }

    /** Closes the database only when this storage opened it. */
    async close(): Promise<void> {
        if (this.ownsDb) this.db.close()
    }

    // ─── Rows ────────────────────────────────────────────────────────────────

    private readOne(row: unknown): Checkpoint | undefined {
        const parsed = DataRowSchema.safeParse(row)
        return parsed.success ? this.decode(parsed.data) : undefined
    }

    private readAll(rows: unknown[]): Checkpoint[] {
        return rows.flatMap((row) => {
            const checkpoint = this.readOne(row)
            return checkpoint ? [checkpoint] : []
        })
    }

    private decode(row: DataRow): Checkpoint | undefined {
        const checkpoint = parseCheckpoint(row.data)
        if (!checkpoint) this.logger.warn('unreadable checkpoint row', { checkpointId: row.id })
        return checkpoint
    }
}
