// ─── Failure Classification ──────────────────────────────────────────────────

export type FailureReason = 'rate_limit' | 'auth' | 'billing' | 'timeout' | 'format' | 'unknown'

/** Checked in declaration order; the first reason with a matching pattern wins. */
const FAILURE_PATTERNS: ReadonlyArray<[Exclude<FailureReason, 'unknown'>, readonly string[]]> = [
    ['rate_limit', ['rate limit', '429', 'too many requests', 'ratelimit']],
    ['auth', ['401', '403', 'invalid api key', 'unauthorized', 'authentication']],
    ['billing', ['402', 'payment required', 'insufficient credits', 'billing', 'quota exceeded']],
    ['timeout', ['timeout', 'timed out', 'deadline exceeded']],
    ['format', ['400', 'invalid request', 'bad request', 'malformed']],
]

const CONTEXT_OVERFLOW_PATTERNS = [
    'context length',
    'context_length_exceeded',
    'maximum context',
    'context window',
    'too many tokens',
    'prompt is too long',
]

function describe(error: unknown): { name: string; message: string } {
    if (error instanceof Error) return { name: error.name, message: error.message }
    return { name: typeof error, message: String(error) }
}

/**
 * Classify an upstream failure by substring matching on its type name and message.
 *
 * @example
 * ```ts
 * classifyFailure(new Error('429 Too Many Requests')) // 'rate_limit'
 * ```
 */
export function classifyFailure(error: unknown): FailureReason {
    const { name, message } = describe(error)
    const haystack = `${name} ${message}`.toLowerCase()
    for (const [reason, patterns] of FAILURE_PATTERNS) {
        if (patterns.some((p) => haystack.includes(p))) return reason
    }
    return 'unknown'
}

/**
 * Read an HTTP-like status code from an error object, if the client attached one.
 */
export function extractStatusCode(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined
    for (const key of ['status', 'statusCode', 'code']) {
        const value: unknown = Reflect.get(error, key)
        if (typeof value === 'number' && Number.isInteger(value)) return value
        if (typeof value === 'string' && /^\d{3}$/.test(value)) return Number(value)
    }
    return undefined
}

export function isContextOverflow(error: unknown): boolean {
    if (error instanceof ContextOverflowError) return true
    const message = describe(error).message.toLowerCase()
    return CONTEXT_OVERFLOW_PATTERNS.some((p) => message.includes(p))
}

// ─── Error Types ─────────────────────────────────────────────────────────────

export class ContextOverflowError extends Error {
    override readonly name = 'ContextOverflowError'

    constructor(message = 'Context window exceeded after all recovery steps', options?: ErrorOptions) {
        super(message, options)
    }
}

export class ToolTimeoutError extends Error {
    override readonly name = 'ToolTimeoutError'

    constructor(
        readonly toolName: string,
        readonly timeoutMs: number,
    ) {
        super(`Tool '${toolName}' timed out after ${Math.round(timeoutMs / 1000)}s`)
    }
}

/** One failed (or skipped) candidate inside a failover chain. */
export interface FallbackAttempt {
    provider: string
    model: string
    error: string
    reason: FailureReason | 'cooldown'
    statusCode?: number | undefined
}

export class AllCandidatesExhaustedError extends Error {
    override readonly name = 'AllCandidatesExhaustedError'

    /**
     * @param retryAfterMs - Time until the first candidate leaves cooldown; 0 when one is free now
     */
    constructor(
        readonly attempts: FallbackAttempt[],
        readonly retryAfterMs = 0,
    ) {
        const lines = attempts.map((a) => `  ${a.provider}/${a.model}: ${a.reason} - ${a.error}`)
        super(`All LLM candidates exhausted. Attempts:\n${lines.join('\n')}`)
    }

    /**
     * The dominant failure reason across attempts, ignoring skipped candidates.
     * Auth wins over everything else since retrying cannot fix it.
     */
    get reason(): FailureReason {
        const reasons = this.attempts
            .map((a) => a.reason)
            .filter((r): r is FailureReason => r !== 'cooldown')
        if (reasons.includes('auth')) return 'auth'
        return reasons[0] ?? 'rate_limit'
    }
}

export class AgentTypeNotFoundError extends Error {
    override readonly name = 'AgentTypeNotFoundError'

    constructor(readonly agentType: string) {
        super(`[AgentRegistry] Agent type "${agentType}" is not registered.`)
    }
}

export class InvalidTransitionError extends Error {
    override readonly name = 'InvalidTransitionError'

    constructor(
        readonly from: string,
        readonly to: string,
    ) {
        super(`[Agent] Invalid status transition: ${from} -> ${to}`)
    }
}

export class MiddlewareError extends Error {
    override readonly name = 'MiddlewareError'

    constructor(
        readonly middleware: string,
        readonly scope: string,
        cause: unknown,
    ) {
        super(`[Middleware] '${middleware}' failed during ${scope}: ${errorMessage(cause)}`, { cause })
    }
}

export class CheckpointError extends Error {
    override readonly name: string = 'CheckpointError'
}

export class CheckpointParentMissingError extends CheckpointError {
    override readonly name = 'CheckpointParentMissingError'

    constructor(
        readonly checkpointId: string,
        readonly parentCheckpointId: string,
    ) {
        super(`[Checkpoint] Parent "${parentCheckpointId}" of "${checkpointId}" does not exist.`)
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
