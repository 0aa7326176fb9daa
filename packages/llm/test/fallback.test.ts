import { describe, it, expect } from 'vitest'
import { AllCandidatesExhaustedError, contentText } from '@switchyard/core'
import { FallbackClient } from '../src'
import { ScriptedProvider } from './fakes'
import type { Step } from './fakes'

const request = { messages: [{ role: 'user' as const, content: 'hi' }] }

function setup(primarySteps: Step[], secondarySteps: Step[] = ['from secondary']) {
    let now = 1_000_000
    const primary = new ScriptedProvider('primary', primarySteps)
    const secondary = new ScriptedProvider('secondary', secondarySteps)
    const client = new FallbackClient({
        candidates: [
            { provider: 'openai', model: 'gpt-4o', client: primary },
            { provider: 'openai', model: 'gpt-4o-mini', client: secondary },
        ],
        now: () => now,
    })
    return {
        client,
        primary,
        secondary,
        advance: (ms: number) => {
            now += ms
        },
        now: () => now,
    }
}

const primaryKey = { provider: 'openai', model: 'gpt-4o' }

describe('FallbackClient', () => {
    it('falls through to the next candidate and cools down the failed one', async () => {
        const { client, secondary, now } = setup([new Error('429 Too Many Requests')])

        const response = await client.complete(request)

        expect(contentText(response.message.content)).toBe('from secondary')
        expect(secondary.calls).toBe(1)
        expect(client.getCooldownState(primaryKey)).toEqual({ expiresAt: now() + 60_000, errorCount: 1 })
        expect(client.isInCooldown(primaryKey)).toBe(true)
    })

    it('skips a candidate while it is cooling down', async () => {
        const { client, primary } = setup([new Error('429 Too Many Requests'), 'from primary'])
        await client.complete(request)

        const response = await client.complete(request)

        expect(primary.calls).toBe(1)
        expect(contentText(response.message.content)).toBe('from secondary')
    })

    it('resets the candidate after a success', async () => {
        const { client, primary, advance } = setup([new Error('429 Too Many Requests'), 'from primary'])
        await client.complete(request)
        advance(60_000)

        const response = await client.complete(request)

        expect(primary.calls).toBe(2)
        expect(contentText(response.message.content)).toBe('from primary')
        expect(client.getCooldownState(primaryKey)).toEqual({ expiresAt: undefined, errorCount: 0 })
    })

    it('lengthens the cooldown on repeated failures', async () => {
        const { client, advance, now } = setup([new Error('503 overloaded')])
        await client.complete(request)
        advance(60_000)

        await client.complete(request)

        expect(client.getCooldownState(primaryKey)).toEqual({ expiresAt: now() + 300_000, errorCount: 2 })
        expect(client.cooldownSeconds(3)).toBe(3600)
    })

    it('rethrows context overflows without a cooldown', async () => {
        const overflow = new Error("This model's maximum context length is 8192 tokens")
        const { client, secondary } = setup([overflow])

        await expect(client.complete(request)).rejects.toBe(overflow)
        expect(secondary.calls).toBe(0)
        expect(client.isInCooldown(primaryKey)).toBe(false)
    })

    it('reports every attempt when all candidates fail', async () => {
        const { client } = setup([new Error('401 Unauthorized')], [new Error('Request timed out')])

        const error = await client.complete(request).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(AllCandidatesExhaustedError)
        if (!(error instanceof AllCandidatesExhaustedError)) return
        expect(error.reason).toBe('auth')
        expect(error.attempts.map((a) => [a.model, a.reason])).toEqual([
            ['gpt-4o', 'auth'],
            ['gpt-4o-mini', 'timeout'],
        ])
    })

    it('records skipped candidates as cooldown attempts', async () => {
        const { client } = setup([new Error('429 Too Many Requests')], [new Error('429 Too Many Requests')])
        await client.complete(request).catch(() => undefined)

        const error = await client.complete(request).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(AllCandidatesExhaustedError)
        if (!(error instanceof AllCandidatesExhaustedError)) return
        expect(error.attempts.map((a) => a.reason)).toEqual(['cooldown', 'cooldown'])
        expect(error.attempts[0]?.error).toBe('in cooldown for 60s')
        expect(error.reason).toBe('rate_limit')
    })

    it('tells how long until the first candidate is free again', async () => {
        const { client, advance } = setup([new Error('429 Too Many Requests')], [new Error('503 overloaded')])
        await client.complete(request).catch(() => undefined)
        advance(20_000)

        const error = await client.complete(request).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(AllCandidatesExhaustedError)
        if (!(error instanceof AllCandidatesExhaustedError)) return
        expect(error.retryAfterMs).toBe(40_000)
        advance(40_000)
        expect(client.nextAvailableIn()).toBe(0)
    })

    it('requires at least one candidate', () => {
        expect(() => new FallbackClient({ candidates: [] })).toThrow('[FallbackClient] At least one candidate is required.')
    })
})
