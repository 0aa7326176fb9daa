import Database from 'better-sqlite3'
import { describe, it, expect } from 'vitest'
import { CheckpointError, CheckpointParentMissingError } from '@switchyard/core'
import { sqliteClient } from '@switchyard/storage'
import { MemoryCheckpointStorage, SQLiteCheckpointStorage, SqlCheckpointStorage } from '../../src'
import type { CheckpointStorage } from '../../src'
import { T0, makeCheckpoint } from '../helpers'

const backends: [string, () => CheckpointStorage][] = [
    ['memory', () => new MemoryCheckpointStorage()],
    ['sqlite', () => new SQLiteCheckpointStorage()],
    ['sql', () => new SqlCheckpointStorage({ client: sqliteClient(new Database(':memory:')) })],
]

describe.each(backends)('%s checkpoint storage', (_name, create) => {
    it('round-trips a checkpoint', async () => {
        const storage = create()
        const checkpoint = makeCheckpoint({
            id: 'c1',
            status: 'waiting_for_input',
            collectedFields: { name: 'Alice' },
            executionState: { lastPrompt: 'Please provide age.' },
            context: { sessionId: 's1' },
            message: { role: 'user', content: 'name=Alice' },
            result: { status: 'waiting_for_input', text: 'Please provide age.', metadata: { agentId: 'agent_1' } },
            messageHistory: [{ role: 'user', content: 'name=Alice' }],
            branchLabel: 'main',
        })

        expect(await storage.save(checkpoint)).toBe('c1')
        expect(await storage.get('c1')).toEqual(checkpoint)
        expect(await storage.get('missing')).toBeUndefined()
    })

    it('rejects a duplicate id', async () => {
        const storage = create()
        await storage.save(makeCheckpoint({ id: 'c1' }))

        const duplicate = storage.save(makeCheckpoint({ id: 'c1', timestamp: new Date(T0 + 1) }))
        await expect(duplicate).rejects.toBeInstanceOf(CheckpointError)
        await expect(storage.save(makeCheckpoint({ id: 'c1' }))).rejects.toThrow('[Checkpoint] "c1" already exists.')
    })

    it('rejects a checkpoint whose parent does not exist', async () => {
        const storage = create()
        const orphan = storage.save(makeCheckpoint({ id: 'c2', parentCheckpointId: 'c1' }))

        await expect(orphan).rejects.toBeInstanceOf(CheckpointParentMissingError)
        expect(await storage.get('c2')).toBeUndefined()
    })

    it('lists newest first with pagination', async () => {
        const storage = create()
        await storage.save(makeCheckpoint({ id: 'c1', timestamp: new Date(T0) }))
        await storage.save(makeCheckpoint({ id: 'c2', parentCheckpointId: 'c1', timestamp: new Date(T0 + 1) }))
        await storage.save(makeCheckpoint({ id: 'c3', parentCheckpointId: 'c2', timestamp: new Date(T0 + 2) }))
        await storage.save(makeCheckpoint({ id: 'x1', agentId: 'agent_2', tenantId: 't2' }))

        expect((await storage.listByAgent('agent_1')).map((m) => m.id)).toEqual(['c3', 'c2', 'c1'])
        expect((await storage.listByAgent('agent_1', 2, 1)).map((m) => m.id)).toEqual(['c2', 'c1'])
        expect((await storage.listByTenant('t2')).map((m) => m.id)).toEqual(['x1'])
        expect((await storage.getLatest('agent_1'))?.id).toBe('c3')
        expect(await storage.getLatest('agent_9')).toBeUndefined()
    })

    it('breaks timestamp ties by id', async () => {
        const storage = create()
        await storage.save(makeCheckpoint({ id: 'c_a' }))
        await storage.save(makeCheckpoint({ id: 'c_b' }))

        expect((await storage.listByAgent('agent_1')).map((m) => m.id)).toEqual(['c_b', 'c_a'])
        expect((await storage.getTree('agent_1'))?.rootId).toBe('c_a')
    })

    it('returns listing metadata', async () => {
        const storage = create()
        await storage.save(
            makeCheckpoint({
                id: 'c1',
                collectedFields: { name: 'Alice', age: 30 },
                message: { role: 'user', content: 'x'.repeat(150) },
            }),
        )

        expect(await storage.listByAgent('agent_1')).toEqual([
            {
                id: 'c1',
                agentId: 'agent_1',
                agentType: 'profile',
                tenantId: 't1',
                status: 'running',
                timestamp: new Date(T0),
                parentCheckpointId: undefined,
                branchLabel: undefined,
                fieldsCount: 2,
                messagePreview: 'x'.repeat(100),
            },
        ])
    })

    it('builds the tree of an agent', async () => {
        const storage = create()
        await storage.save(makeCheckpoint({ id: 'c1', timestamp: new Date(T0) }))
        await storage.save(makeCheckpoint({ id: 'c2', parentCheckpointId: 'c1', timestamp: new Date(T0 + 1) }))
        await storage.save(makeCheckpoint({ id: 'c3', parentCheckpointId: 'c1', timestamp: new Date(T0 + 2) }))

        const tree = await storage.getTree('agent_1')
        expect(tree?.branches('c1')).toEqual(['c2', 'c3'])
        expect(await storage.getTree('agent_9')).toBeUndefined()
    })

    it('deletes and clears', async () => {
        const storage = create()
        await storage.save(makeCheckpoint({ id: 'c1', timestamp: new Date(T0) }))
        await storage.save(makeCheckpoint({ id: 'c2', timestamp: new Date(T0 + 1) }))
        await storage.save(makeCheckpoint({ id: 'c3', timestamp: new Date(T0 + 2) }))
        await storage.save(makeCheckpoint({ id: 'x1', agentId: 'agent_2' }))
        await storage.save(makeCheckpoint({ id: 'y1', agentId: 'agent_3', tenantId: 't2' }))

        expect(await storage.delete('c1')).toBe(true)
        expect(await storage.delete('c1')).toBe(false)
        expect(await storage.clearAgent('agent_1')).toBe(2)
        expect(await storage.clearTenant('t1')).toBe(1)
        expect(await storage.clearTenant('t1')).toBe(0)
        expect((await storage.listByTenant('t2')).map((m) => m.id)).toEqual(['y1'])
    })
})

describe('MemoryCheckpointStorage', () => {
    it('evicts the oldest checkpoints of an agent beyond the limit', async () => {
        const storage = new MemoryCheckpointStorage({ maxCheckpointsPerAgent: 2 })
        await storage.save(makeCheckpoint({ id: 'c1', timestamp: new Date(T0) }))
        await storage.save(makeCheckpoint({ id: 'c2', timestamp: new Date(T0 + 1) }))
        await storage.save(makeCheckpoint({ id: 'c3', timestamp: new Date(T0 + 2) }))

        expect(await storage.get('c1')).toBeUndefined()
        expect((await storage.listByAgent('agent_1')).map((m) => m.id)).toEqual(['c3', 'c2'])
    })
})

describe('SqlCheckpointStorage', () => {
    it('rejects table names that are not plain identifiers', () => {
        const client = sqliteClient(new Database(':memory:'))
        expect(() => new SqlCheckpointStorage({ client, table: 'checkpoints--' })).toThrow(
            '[SqlCheckpointStorage] Invalid table name "checkpoints--".',
        )
    })

    it('skips rows whose data cannot be read', async () => {
        const client = sqliteClient(new Database(':memory:'))
        const storage = new SqlCheckpointStorage({ client })
        await storage.save(makeCheckpoint({ id: 'c1' }))
        await storage.save(makeCheckpoint({ id: 'c2', timestamp: new Date(T0 + 1) }))
        await client.query('UPDATE agent_checkpoints SET data = $1 WHERE id = $2', ['not json', 'c2'])

        expect(await storage.get('c2')).toBeUndefined()
        expect((await storage.listByAgent('agent_1')).map((m) => m.id)).toEqual(['c1'])
    })
})

describe('SQLiteCheckpointStorage', () => {
    it('leaves an injected database open on close', async () => {
        const db = new Database(':memory:')
        const storage = new SQLiteCheckpointStorage({ db })
        await storage.save(makeCheckpoint({ id: 'c1' }))
        await storage.close()

        expect(db.open).toBe(true)
        expect(db.prepare('SELECT COUNT(*) AS n FROM checkpoints').get()).toEqual({ n: 1 })
    })
})
