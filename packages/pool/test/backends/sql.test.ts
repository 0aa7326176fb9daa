import Database from 'better-sqlite3'
import { describe, it, expect } from 'vitest'
import { sqliteClient } from '@switchyard/storage'
import type { SqlClient } from '@switchyard/storage'
import { SqlPoolBackend, toPoolEntry } from '../../src'
import type { PoolEntry } from '../../src'
import { recordingLogger, waitingNote } from '../helpers'

const T0 = 1_700_000_000_000

async function entry(id: string, tenantId = 't1'): Promise<PoolEntry> {
    return toPoolEntry(await waitingNote(id, tenantId), {
        schemaVersion: 42,
        createdAt: new Date(T0),
        lastActivity: new Date(T0),
        checkpointId: 'ckpt_1',
    })
}

function setup() {
    const clock = { now: T0 }
    const client: SqlClient = sqliteClient(new Database(':memory:'))
    const logger = recordingLogger()
    const backend = new SqlPoolBackend({ client, now: () => clock.now, logger })
    return { backend, client, clock, logger }
}

describe('SqlPoolBackend', () => {
    it('rejects table names that are not plain identifiers', () => {
        expect(() => new SqlPoolBackend({ client: sqliteClient(new Database(':memory:')), table: 'pool; DROP' })).toThrow(
            '[SqlPoolBackend] Invalid table name "pool; DROP".',
        )
    })

    it('round-trips an entry', async () => {
        const { backend } = setup()
        const saved = await entry('a1')
        await backend.saveAgent(saved)

        expect(await backend.getAgent('t1', 'a1')).toEqual(saved)
        expect(await backend.getAgent('t1', 'missing')).toBeUndefined()
    })

    it('upserts on tenant and agent id', async () => {
        const { backend, client } = setup()
        await backend.saveAgent(await entry('a1'))
        await backend.saveAgent({ ...(await entry('a1')), status: 'paused' })

        expect(await client.query('SELECT agent_id, status FROM agent_pool')).toEqual([{ agent_id: 'a1', status: 'paused' }])
    })

    it('hides expired rows until they are cleaned up', async () => {
        const { backend, client, clock, logger } = setup()
        await backend.saveAgent(await entry('a1'))
        clock.now = T0 + 86_400_000

        expect(await backend.listAgents('t1')).toEqual([])
        expect(await backend.getActiveTenants()).toEqual([])
        expect(await client.query('SELECT agent_id FROM agent_pool')).toEqual([{ agent_id: 'a1' }])

        expect(await backend.cleanupExpired()).toBe(1)
        expect(await client.query('SELECT agent_id FROM agent_pool')).toEqual([])
        expect(logger.records).toEqual([
            { level: 'info', message: 'removed expired pool rows', meta: { backend: 'sql', count: 1 } },
        ])
    })

    it('lists agents and tenants in order', async () => {
        const { backend } = setup()
        await backend.saveAgent(await entry('b1', 't2'))
        await backend.saveAgent(await entry('a2'))
        await backend.saveAgent(await entry('a1'))

        expect((await backend.listAgents('t1')).map((a) => a.agentId)).toEqual(['a1', 'a2'])
        expect(await backend.getActiveTenants()).toEqual(['t1', 't2'])
    })

    it('removes agents and clears tenants', async () => {
        const { backend } = setup()
        await backend.saveAgent(await entry('a1'))
        await backend.saveAgent(await entry('a2'))
        await backend.saveAgent(await entry('a3'))

        expect(await backend.removeAgent('t1', 'a1')).toBe(true)
        expect(await backend.removeAgent('t1', 'a1')).toBe(false)
        expect(await backend.clearTenant('t1')).toBe(2)
        expect(await backend.clearTenant('t1')).toBe(0)
    })

    it('skips rows whose data cannot be read', async () => {
        const { backend, client, logger } = setup()
        await backend.saveAgent(await entry('a1'))
        await backend.saveAgent(await entry('a2'))
        await client.query('UPDATE agent_pool SET data = $1 WHERE agent_id = $2', ['{"agentId":"a1"}', 'a1'])

        expect((await backend.listAgents('t1')).map((a) => a.agentId)).toEqual(['a2'])
        expect(logger.records).toEqual([
            { level: 'warn', message: 'unreadable pool row', meta: { backend: 'sql', agentId: 'a1' } },
        ])
    })
})
