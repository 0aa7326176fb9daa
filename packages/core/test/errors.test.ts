import { describe, it, expect } from 'vitest'
import {
    AllCandidatesExhaustedError,
    CheckpointError,
    CheckpointParentMissingError,
    ContextOverflowError,
    ToolTimeoutError,
    classifyFailure,
    extractStatusCode,
    isContextOverflow,
} from '../src'

describe('classifyFailure', () => {
    it.each([
        ['429 Too Many Requests', 'rate_limit'],
        ['Rate limit reached for gpt-4o', 'rate_limit'],
        ['401 Unauthorized', 'auth'],
        ['Invalid API key provided', 'auth'],
        ['402 Payment Required', 'billing'],
        ['Request timed out', 'timeout'],
        ['malformed tool schema', 'format'],
        ['socket hang up', 'unknown'],
    ])('%s → %s', (message, reason) => {
        expect(classifyFailure(new Error(message))).toBe(reason)
    })

    it('looks at the error name too', () => {
        class RateLimitError extends Error {
            override readonly name = 'RateLimitError'
        }
        expect(classifyFailure(new RateLimitError('slow down'))).toBe('rate_limit')
    })

    it('accepts non-errors', () => {
        expect(classifyFailure('deadline exceeded')).toBe('timeout')
    })
})

describe('extractStatusCode', () => {
    it('reads numeric and three-digit string codes', () => {
        expect(extractStatusCode({ status: 429 })).toBe(429)
        expect(extractStatusCode({ statusCode: 503 })).toBe(503)
        expect(extractStatusCode({ code: '401' })).toBe(401)
    })

    it('ignores anything else', () => {
        expect(extractStatusCode({ code: 'ECONNRESET' })).toBeUndefined()
        expect(extractStatusCode('500')).toBeUndefined()
        expect(extractStatusCode(null)).toBeUndefined()
    })
})

describe('isContextOverflow', () => {
    it('recognises provider messages and its own error', () => {
        expect(isContextOverflow(new Error("This model's maximum context length is 8192 tokens"))).toBe(true)
        expect(isContextOverflow(new Error('context_length_exceeded'))).toBe(true)
        expect(isContextOverflow(new ContextOverflowError())).toBe(true)
        expect(isContextOverflow(new Error('429 Too Many Requests'))).toBe(false)
    })
})

describe('AllCandidatesExhaustedError', () => {
    const attempt = (reason: 'rate_limit' | 'auth' | 'timeout' | 'cooldown') => ({
        provider: 'p',
        model: 'm',
        error: reason,
        reason,
    })

    it('prefers auth over every other reason', () => {
        const err = new AllCandidatesExhaustedError([attempt('cooldown'), attempt('rate_limit'), attempt('auth')])
        expect(err.reason).toBe('auth')
    })

    it('otherwise reports the first real failure', () => {
        const err = new AllCandidatesExhaustedError([attempt('cooldown'), attempt('timeout'), attempt('rate_limit')])
        expect(err.reason).toBe('timeout')
    })

    it('reports rate_limit when every candidate was cooling down', () => {
        expect(new AllCandidatesExhaustedError([attempt('cooldown')]).reason).toBe('rate_limit')
    })

    it('defaults to no wait before a retry', () => {
        expect(new AllCandidatesExhaustedError([attempt('timeout')]).retryAfterMs).toBe(0)
        expect(new AllCandidatesExhaustedError([attempt('cooldown')], 1500).retryAfterMs).toBe(1500)
    })

    it('lists every attempt in the message', () => {
        const err = new AllCandidatesExhaustedError([attempt('auth')])
        expect(err.message).toBe('All LLM candidates exhausted. Attempts:\n  p/m: auth - auth')
        expect(err.attempts).toHaveLength(1)
    })
})

describe('error types', () => {
    it('formats tool timeouts in seconds', () => {
        expect(new ToolTimeoutError('search', 30_000).message).toBe("Tool 'search' timed out after 30s")
    })

    it('makes a missing parent a checkpoint error', () => {
        const err = new CheckpointParentMissingError('ckpt_b', 'ckpt_a')
        expect(err).toBeInstanceOf(CheckpointError)
        expect(err.name).toBe('CheckpointParentMissingError')
        expect(err.message).toBe('[Checkpoint] Parent "ckpt_a" of "ckpt_b" does not exist.')
    })
})
