import { describe, it, expect } from 'vitest'
import { CooldownConfigSchema, RoutingRuleSchema, parseReactLoopConfig, parseSessionConfig } from '../src'

describe('parseReactLoopConfig', () => {
    it('fills in every default', () => {
        expect(parseReactLoopConfig()).toEqual({
            maxTurns: 10,
            toolExecutionTimeout: 30,
            agentToolExecutionTimeout: 120,
            maxToolResultShare: 0.3,
            maxToolResultChars: 400_000,
            contextTokenLimit: 128_000,
            contextTrimThreshold: 0.8,
            maxHistoryMessages: 40,
            llmMaxRetries: 2,
            llmRetryBaseDelay: 1,
            approvalTimeoutMinutes: 30,
        })
    })

    it('keeps overrides and rejects out-of-range values', () => {
        expect(parseReactLoopConfig({ maxTurns: 3 }).maxTurns).toBe(3)
        expect(() => parseReactLoopConfig({ maxTurns: 0 })).toThrow()
        expect(() => parseReactLoopConfig({ maxToolResultShare: 1.5 })).toThrow()
    })
})

describe('parseSessionConfig', () => {
    it('defaults to persistent sessions', () => {
        const session = parseSessionConfig({ waitingTimeoutSeconds: 60 })

        expect(session.enabled).toBe(true)
        expect(session.sessionTtlSeconds).toBe(86_400)
        expect(session.activeTtlSeconds).toBe(600)
        expect(session.waitingTimeoutSeconds).toBe(60)
    })
})

describe('CooldownConfigSchema', () => {
    it('defaults to one minute growing fivefold up to an hour', () => {
        expect(CooldownConfigSchema.parse({})).toEqual({ baseSeconds: 60, multiplier: 5, maxSeconds: 3600 })
    })
})

describe('RoutingRuleSchema', () => {
    it('rejects an inverted score range', () => {
        const result = RoutingRuleSchema.safeParse({ minScore: 70, maxScore: 40, provider: 'strong' })

        expect(result.success).toBe(false)
        expect(result.error?.issues[0]?.message).toBe('minScore must not exceed maxScore')
    })
})
