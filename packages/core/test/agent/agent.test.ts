import { describe, it, expect } from 'vitest'
import { InvalidTransitionError, canTransition, isTerminal, parseApprovalResponse } from '../../src'
import { BookingAgent } from '../helpers'

describe('BaseAgent', () => {
    it('asks for missing fields one at a time', async () => {
        const agent = new BookingAgent({ tenantId: 't1' })

        const reply = await agent.reply('restaurant=Luigi')

        expect(reply.status).toBe('waiting_for_input')
        expect(reply.text).toBe('Please provide number of guests.')
        expect(reply.metadata['missingFields']).toEqual(['guests'])
        expect(agent.collectedFields).toEqual({ restaurant: 'Luigi' })
    })

    it('completes once every field is collected', async () => {
        const agent = new BookingAgent({ tenantId: 't1' })
        await agent.reply('restaurant=Luigi')

        const reply = await agent.reply('guests=2')

        expect(reply).toEqual({
            status: 'completed',
            text: 'Booked Luigi for 2',
            metadata: { agentId: agent.id, agentType: 'booking' },
        })
    })

    it('waits for approval and runs when approved', async () => {
        const agent = new BookingAgent({ tenantId: 't1' }, { approval: true })

        const pending = await agent.reply('restaurant=Luigi guests=2')
        expect(pending.status).toBe('waiting_for_approval')
        expect(pending.text).toBe('Proceed with booking (restaurant: Luigi, guests: 2)?')
        expect(pending.metadata['requiresApproval']).toBe(true)

        const done = await agent.reply('yes')
        expect(done.status).toBe('completed')
        expect(done.text).toBe('Booked Luigi for 2')
    })

    it('cancels when the approval is rejected', async () => {
        const agent = new BookingAgent({ tenantId: 't1' }, { approval: true })
        await agent.reply('restaurant=Luigi guests=2')

        const reply = await agent.reply('no')

        expect(reply.status).toBe('cancelled')
        expect(reply.text).toBe('Okay, cancelled.')
    })

    it('treats any other approval answer as a modification', async () => {
        const agent = new BookingAgent({ tenantId: 't1' }, { approval: true })
        await agent.reply('restaurant=Luigi guests=2')

        const reply = await agent.reply('guests=4')

        expect(reply.status).toBe('waiting_for_approval')
        expect(reply.text).toBe('Proceed with booking (restaurant: Luigi, guests: 4)?')
    })

    it('pauses and resumes where it left off', async () => {
        const agent = new BookingAgent({ tenantId: 't1' })
        await agent.reply('restaurant=Luigi')

        expect((await agent.pause()).text).toBe('Task paused.')
        expect(agent.status).toBe('paused')
        expect((await agent.reply('guests=2')).text).toBe('This task is paused. Resume it to continue.')

        const resumed = await agent.resume()
        expect(resumed.status).toBe('waiting_for_input')
        expect(resumed.text).toBe('Please provide number of guests.')
    })

    it('resumes a paused approval by asking again', async () => {
        const agent = new BookingAgent({ tenantId: 't1' }, { approval: true })
        await agent.reply('restaurant=Luigi guests=2')
        await agent.pause()

        const resumed = await agent.resume()

        expect(resumed.status).toBe('waiting_for_approval')
        expect(resumed.text).toBe('Proceed with booking (restaurant: Luigi, guests: 2)?')
        expect(agent.executionState['pausedFrom']).toBeUndefined()
    })

    it('resumes straight into a reply when given a message', async () => {
        const agent = new BookingAgent({ tenantId: 't1' })
        await agent.reply('restaurant=Luigi')
        await agent.pause()

        const reply = await agent.resume('guests=3')

        expect(reply.status).toBe('completed')
        expect(reply.text).toBe('Booked Luigi for 3')
    })

    it('moves to error when the task throws', async () => {
        const agent = new BookingAgent({ tenantId: 't1' }, { failWith: 'kitchen closed' })

        const reply = await agent.reply('restaurant=Luigi guests=2')

        expect(reply.status).toBe('error')
        expect(reply.text).toBe('Error: kitchen closed')
        expect(agent.executionState['errorMessage']).toBe('kitchen closed')
        expect((await agent.reply('again')).text).toBe('Error: kitchen closed')
    })

    it('refuses to run again once completed', async () => {
        const agent = new BookingAgent({ tenantId: 't1' })
        await agent.reply('restaurant=Luigi guests=2')

        const reply = await agent.reply('guests=5')

        expect(reply.status).toBe('completed')
        expect(reply.text).toBe('This task is already completed.')
    })

    it('fail() records the reason', () => {
        const agent = new BookingAgent({ tenantId: 't1' })

        const reply = agent.fail('Timed out after 301s in waiting_for_input')

        expect(reply.status).toBe('error')
        expect(reply.metadata['error']).toBe('Timed out after 301s in waiting_for_input')
    })

    it('rebuilds from state', async () => {
        const original = new BookingAgent({ tenantId: 't1' })
        await original.reply('restaurant=Luigi')
        const state = original.toState()

        const restored = new BookingAgent({ ...state })

        expect(restored.id).toBe(original.id)
        expect(restored.status).toBe('waiting_for_input')
        expect((await restored.reply('guests=2')).text).toBe('Booked Luigi for 2')
    })
})

describe('agent status transitions', () => {
    it('allows cancel from anywhere', () => {
        expect(canTransition('running', 'cancelled')).toBe(true)
        expect(canTransition('error', 'cancelled')).toBe(true)
    })

    it('rejects leaving a terminal status', () => {
        expect(canTransition('completed', 'running')).toBe(false)
        expect(canTransition('error', 'running')).toBe(false)
        expect(isTerminal('completed')).toBe(true)
        expect(isTerminal('paused')).toBe(false)
    })

    it('reports invalid transitions', async () => {
        const agent = new BookingAgent({ tenantId: 't1', status: 'completed' })
        await expect(agent.resume()).resolves.toMatchObject({ text: 'Cannot resume a task that is completed.' })
        expect(() => new InvalidTransitionError('completed', 'running')).not.toThrow()
        expect(new InvalidTransitionError('completed', 'running').message).toBe(
            '[Agent] Invalid status transition: completed -> running',
        )
    })
})

describe('parseApprovalResponse', () => {
    it('classifies answers', () => {
        expect(parseApprovalResponse('Yes!')).toBe('approved')
        expect(parseApprovalResponse('  go ahead ')).toBe('approved')
        expect(parseApprovalResponse('Cancel.')).toBe('rejected')
        expect(parseApprovalResponse('make it 7pm')).toBe('modify')
    })
})
