import { describe, it, expect } from 'vitest'
import { AgentRegistry, AgentTypeNotFoundError, computeSchemaVersion } from '../../src'
import type { FieldSpec } from '../../src'
import { BOOKING_FIELDS, BookingAgent } from '../helpers'

function registry(): AgentRegistry {
    return new AgentRegistry()
        .register({
            type: 'booking',
            description: 'Book a table',
            fields: BOOKING_FIELDS,
            riskLevel: 'destructive',
            create: (init) => new BookingAgent(init),
        })
        .register({
            type: 'internal',
            description: 'Not visible to the model',
            exposeAsTool: false,
            create: (init) => new BookingAgent(init),
        })
}

describe('computeSchemaVersion', () => {
    it('is 0 for no fields', () => {
        expect(computeSchemaVersion([])).toBe(0)
    })

    it('ignores field order', () => {
        const reversed = [...BOOKING_FIELDS].reverse()
        expect(computeSchemaVersion(reversed)).toBe(computeSchemaVersion(BOOKING_FIELDS))
    })

    it('changes when a field changes', () => {
        const optional: FieldSpec[] = BOOKING_FIELDS.map((f): FieldSpec => (f.name === 'guests' ? { ...f, required: false } : f))
        const retyped: FieldSpec[] = BOOKING_FIELDS.map((f): FieldSpec => (f.name === 'guests' ? { ...f, type: 'string' } : f))

        expect(computeSchemaVersion(optional)).not.toBe(computeSchemaVersion(BOOKING_FIELDS))
        expect(computeSchemaVersion(retyped)).not.toBe(computeSchemaVersion(BOOKING_FIELDS))
    })

    it('ignores descriptions', () => {
        const described = BOOKING_FIELDS.map((f) => ({ ...f, description: 'changed' }))
        expect(computeSchemaVersion(described)).toBe(computeSchemaVersion(BOOKING_FIELDS))
    })
})

describe('AgentRegistry', () => {
    it('reports the schema version of registered types', () => {
        const agents = registry()
        expect(agents.schemaVersion('booking')).toBe(computeSchemaVersion(BOOKING_FIELDS))
        expect(agents.schemaVersion('internal')).toBe(0)
        expect(agents.schemaVersion('unknown')).toBe(0)
    })

    it('rejects duplicate registrations', () => {
        expect(() =>
            registry().register({ type: 'booking', description: 'again', create: (init) => new BookingAgent(init) }),
        ).toThrow('[AgentRegistry] Agent type "booking" is already registered.')
    })

    it('creates agents and fails on unknown types', () => {
        const agents = registry()
        const agent = agents.create('booking', { tenantId: 't1' })

        expect(agent.type).toBe('booking')
        expect(agent.tenantId).toBe('t1')
        expect(() => agents.create('nope', { tenantId: 't1' })).toThrow(AgentTypeNotFoundError)
        expect(agents.restore('nope', { tenantId: 't1' })).toBeUndefined()
    })

    it('exposes agent-tools with a task_instruction parameter', () => {
        const agents = registry()
        const schemas = agents.toolSchemas()

        expect(schemas.map((s) => s.name)).toEqual(['booking'])
        expect(schemas[0]?.parameters['required']).toEqual(['task_instruction'])
        expect(agents.isAgentTool('booking')).toBe(true)
        expect(agents.isAgentTool('internal')).toBe(false)
        expect(agents.isAgentTool('get_weather')).toBe(false)
    })

    it('defaults the risk level to write', () => {
        const agents = registry()
        expect(agents.riskLevel('booking')).toBe('destructive')
        expect(agents.riskLevel('internal')).toBe('write')
    })
})
