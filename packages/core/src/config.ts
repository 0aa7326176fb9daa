import { z } from 'zod'

// ─── ReAct Loop ──────────────────────────────────────────────────────────────

export const ReactLoopConfigSchema = z.object({
    maxTurns: z.number().int().positive().default(10),
    /** Plain tool timeout, seconds */
    toolExecutionTimeout: z.number().positive().default(30),
    /** Agent-tool timeout, seconds */
    agentToolExecutionTimeout: z.number().positive().default(120),
    /** Share of the context window a single tool result may take */
    maxToolResultShare: z.number().gt(0).lte(1).default(0.3),
    maxToolResultChars: z.number().int().positive().default(400_000),
    contextTokenLimit: z.number().int().positive().default(128_000),
    contextTrimThreshold: z.number().gt(0).lte(1).default(0.8),
    maxHistoryMessages: z.number().int().positive().default(40),
    llmMaxRetries: z.number().int().nonnegative().default(2),
    /** Base delay for rate-limit backoff, seconds */
    llmRetryBaseDelay: z.number().nonnegative().default(1),
    approvalTimeoutMinutes: z.number().int().positive().default(30),
})

export type ReactLoopConfig = z.infer<typeof ReactLoopConfigSchema>

export function parseReactLoopConfig(input: unknown = {}): ReactLoopConfig {
    return ReactLoopConfigSchema.parse(input)
}

// ─── Sessions ────────────────────────────────────────────────────────────────

export const SessionConfigSchema = z.object({
    enabled: z.boolean().default(true),
    sessionTtlSeconds: z.number().int().positive().default(86_400),
    activeTtlSeconds: z.number().int().positive().default(600),
    autoBackupIntervalSeconds: z.number().positive().default(60),
    autoRestoreOnStart: z.boolean().default(true),
    lazyRestore: z.boolean().default(true),
    /** Agents waiting longer than this are moved to error and evicted */
    waitingTimeoutSeconds: z.number().positive().default(300),
    cleanupIntervalSeconds: z.number().positive().default(60),
})

export type SessionConfig = z.infer<typeof SessionConfigSchema>

export function parseSessionConfig(input: unknown = {}): SessionConfig {
    return SessionConfigSchema.parse(input)
}

// ─── Model Failover ──────────────────────────────────────────────────────────

export const CooldownConfigSchema = z.object({
    baseSeconds: z.number().nonnegative().default(60),
    multiplier: z.number().positive().default(5),
    maxSeconds: z.number().nonnegative().default(3600),
})

export type CooldownConfig = z.infer<typeof CooldownConfigSchema>

export const RoutingRuleSchema = z
    .object({
        minScore: z.number().int().min(1).max(100),
        maxScore: z.number().int().min(1).max(100),
        provider: z.string().min(1),
    })
    .refine((r) => r.minScore <= r.maxScore, { message: 'minScore must not exceed maxScore' })

export type RoutingRule = z.infer<typeof RoutingRuleSchema>
