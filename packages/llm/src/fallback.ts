import {
    AllCandidatesExhaustedError,
    CooldownConfigSchema,
    classifyFailure,
    errorMessage,
    extractStatusCode,
    isContextOverflow,
    silentLogger,
} from '@switchyard/core'
import type {
    CooldownConfig,
    FallbackAttempt,
    Logger,
    ModelProvider,
    ModelRequest,
    ModelResponse,
} from '@switchyard/core'

export interface ModelCandidate {
    provider: string
    model: string
    client: ModelProvider
    /** Distinguishes several keys for the same provider/model */
    apiKeyId?: string | undefined
}

export interface CooldownState {
    /** Epoch ms until which the candidate is skipped */
    expiresAt?: number | undefined
    errorCount: number
}

export interface FallbackClientConfig {
    /** Tried in order */
    candidates: ModelCandidate[]
    cooldown?: Partial<CooldownConfig> | undefined
    /** @default Date.now */
    now?: (() => number) | undefined
    logger?: Logger | undefined
}

export function candidateKey(candidate: Pick<ModelCandidate, 'provider' | 'model' | 'apiKeyId'>): string {
    const base = `${candidate.provider}:${candidate.model}`
    return candidate.apiKeyId ? `${base}:${candidate.apiKeyId}` : base
}

/**
 * FallbackClient — a ModelProvider over an ordered list of candidates.
 *
 * A failing candidate is put in cooldown for
 * `min(baseSeconds * multiplier^errorCount, maxSeconds)` and skipped until it
 * expires. A success clears the candidate's state. When nothing is left to
 * try, an `AllCandidatesExhaustedError` carries every attempt and how long
 * until the first cooldown ends.
 *
 * Context-overflow errors are rethrown immediately without a cooldown: the
 * request is at fault, not the candidate, and the caller is expected to trim
 * and retry.
 *
 * @example
 * ```ts
 * const llm = new FallbackClient({
 *     candidates: [
 *         { provider: 'openai', model: 'gpt-4o', client: openai({ apiKey, model: 'gpt-4o' }) },
 *         { provider: 'openai', model: 'gpt-4o-mini', client: openai({ apiKey, model: 'gpt-4o-mini' }) },
 *     ],
 * })
 * ```
 */
export class FallbackClient implements ModelProvider {
    readonly name = 'fallback'

    private readonly candidates: ModelCandidate[]
    private readonly cooldown: CooldownConfig
    private readonly now: () => number
    private readonly logger: Logger
    private readonly cooldownUntil = new Map<string, number>()
    private readonly errorCounts = new Map<string, number>()

    constructor(config: FallbackClientConfig) {
        if (config.candidates.length === 0) {
            throw new Error('[FallbackClient] At least one candidate is required.')
        }
        this.candidates = config.candidates
        this.cooldown = CooldownConfigSchema.parse(config.cooldown ?? {})
        this.now = config.now ?? Date.now
        this.logger = (config.logger ?? silentLogger).child({ component: 'fallback' })
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const attempts: FallbackAttempt[] = []

        for (const candidate of this.candidates) {
            const key = candidateKey(candidate)
            const until = this.cooldownUntil.get(key)
            if (until !== undefined && this.now() < until) {
                const remaining = Math.ceil((until - this.now()) / 1000)
                attempts.push({
                    provider: candidate.provider,
                    model: candidate.model,
                    error: `in cooldown for ${remaining}s`,
                    reason: 'cooldown',
                })
                continue
            }

            try {
                const response = await candidate.client.complete(request)
                this.reset(key)
                return response
            } catch (err) {
                if (isContextOverflow(err)) throw err

                const reason = classifyFailure(err)
                const statusCode = extractStatusCode(err)
                attempts.push({
                    provider: candidate.provider,
                    model: candidate.model,
                    error: errorMessage(err),
                    reason,
                    statusCode,
                })
                const seconds = this.recordFailure(key)
                this.logger.warn('candidate failed', {
                    candidate: key,
                    reason,
                    statusCode,
                    cooldownSeconds: seconds,
                })
            }
        }

        throw new AllCandidatesExhaustedError(attempts, this.nextAvailableIn())
    }

    /** Milliseconds until some candidate can be tried again; 0 when one already can. */
    nextAvailableIn(): number {
        const now = this.now()
        const waits = this.candidates.map((c) => Math.max(0, (this.cooldownUntil.get(candidateKey(c)) ?? now) - now))
        return Math.min(...waits)
    }

    getCooldownState(candidate: Pick<ModelCandidate, 'provider' | 'model' | 'apiKeyId'>): CooldownState {
        const key = candidateKey(candidate)
        return {
            expiresAt: this.cooldownUntil.get(key),
            errorCount: this.errorCounts.get(key) ?? 0,
        }
    }

    isInCooldown(candidate: Pick<ModelCandidate, 'provider' | 'model' | 'apiKeyId'>): boolean {
        const until = this.cooldownUntil.get(candidateKey(candidate))
        return until !== undefined && this.now() < until
    }

    /** Cooldown length for a candidate that has already failed `errorCount` times. */
    cooldownSeconds(errorCount: number): number {
        const { baseSeconds, multiplier, maxSeconds } = this.cooldown
        return Math.min(baseSeconds * multiplier ** errorCount, maxSeconds)
    }

    private recordFailure(key: string): number {
        const count = this.errorCounts.get(key) ?? 0
        const seconds = this.cooldownSeconds(count)
        this.cooldownUntil.set(key, this.now() + seconds * 1000)
        this.errorCounts.set(key, count + 1)
        return seconds
    }

    private reset(key: string): void {
        this.cooldownUntil.delete(key)
        this.errorCounts.delete(key)
    }
}
