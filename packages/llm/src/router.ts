import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { RoutingRuleSchema, contentText, errorMessage, silentLogger } from '@switchyard/core'
import type { Logger, ModelMessage, ModelProvider, RoutingRule } from '@switchyard/core'
import type { ProviderRegistry } from './registry'

export interface RoutingDecision {
    provider: string
    /** 1-100, or -1 when the classifier could not be used */
    score: number
    reasoning: string
    latencyMs: number
}

export interface ModelRouterConfig {
    providers: ProviderRegistry
    /**
     * Provider used to score requests. Should be fast and cheap.
     * @default 'fast'
     */
    classifierProvider?: string | undefined
    /**
     * Used when no rule matches, the classifier fails, or a rule names an
     * unregistered provider.
     * @default 'fast'
     */
    defaultProvider?: string | undefined
    /** Ordered; first match wins. */
    rules?: RoutingRule[] | undefined
    /**
     * Recent user/assistant messages forwarded to the classifier.
     * @default 4
     */
    historyTurns?: number | undefined
    /** Overrides the bundled classifier prompt */
    systemPrompt?: string | undefined
    now?: (() => number) | undefined
    logger?: Logger | undefined
}

export const DEFAULT_ROUTING_RULES: RoutingRule[] = [
    { minScore: 1, maxScore: 30, provider: 'cheap' },
    { minScore: 31, maxScore: 70, provider: 'fast' },
    { minScore: 71, maxScore: 100, provider: 'strong' },
]

const ClassifierOutput = z.object({
    reasoning: z.string().default(''),
    score: z.coerce.number().finite(),
})

export type ClassifierOutput = z.infer<typeof ClassifierOutput>

let bundledPrompt: string | undefined

function loadBundledPrompt(): string {
    bundledPrompt ??= readFileSync(new URL('../data/classifier-prompt.txt', import.meta.url), 'utf8')
    return bundledPrompt
}

/** First balanced `{...}` substring, ignoring braces inside strings. */
export function extractJsonObject(text: string): string | undefined {
    const start = text.indexOf('{')
    if (start === -1) return undefined

    let depth = 0
    let inString = false
    let escaped = false
    for (let i = start; i < text.length; i++) {
        const ch = text[i]
        if (inString) {
            if (escaped) escaped = false
            else if (ch === '\\') escaped = true
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === '{') depth++
        else if (ch === '}') {
            depth--
            if (depth === 0) return text.slice(start, i + 1)
        }
    }
    return undefined
}

function tryParse(text: string): ClassifierOutput | undefined {
    let value: unknown
    try {
        value = JSON.parse(text)
    } catch {
        return undefined
    }
    const result = ClassifierOutput.safeParse(value)
    if (!result.success) return undefined
    return { reasoning: result.data.reasoning, score: Math.trunc(result.data.score) }
}

/**
 * Parse the classifier's `{reasoning, score}` answer: direct JSON first, then
 * the first balanced object in the text (covers code fences and chatter).
 */
export function parseClassifierOutput(text: string): ClassifierOutput {
    const trimmed = text.trim()
    const direct = tryParse(trimmed)
    if (direct) return direct

    const embedded = extractJsonObject(trimmed)
    const parsed = embedded ? tryParse(embedded) : undefined
    if (parsed) return parsed

    throw new Error(`Could not parse classifier response: ${JSON.stringify(trimmed.slice(0, 200))}`)
}

/**
 * ModelRouter — scores request complexity with a small classifier model and
 * maps the score to a provider name.
 *
 * @example
 * ```ts
 * const router = new ModelRouter({ providers })
 * const { decision, model } = await router.select(messages)
 * ```
 */
export class ModelRouter {
    private readonly providers: ProviderRegistry
    private readonly classifierProvider: string
    private readonly defaultProvider: string
    private readonly rules: RoutingRule[]
    private readonly historyTurns: number
    private readonly systemPrompt: string
    private readonly now: () => number
    private readonly logger: Logger

    constructor(config: ModelRouterConfig) {
        this.providers = config.providers
        this.classifierProvider = config.classifierProvider ?? 'fast'
        this.defaultProvider = config.defaultProvider ?? 'fast'
        this.rules = (config.rules ?? DEFAULT_ROUTING_RULES).map((r) => RoutingRuleSchema.parse(r))
        this.historyTurns = config.historyTurns ?? 4
        this.systemPrompt = config.systemPrompt ?? loadBundledPrompt()
        this.now = config.now ?? (() => performance.now())
        this.logger = (config.logger ?? silentLogger).child({ component: 'router' })
    }

    async route(messages: ModelMessage[]): Promise<RoutingDecision> {
        const start = this.now()
        try {
            const classifier = this.providers.get(this.classifierProvider)
            if (!classifier) {
                throw new Error(`Classifier provider '${this.classifierProvider}' is not registered`)
            }

            const recent = messages
                .filter((m) => m.role === 'user' || m.role === 'assistant')
                .filter((m) => !m.toolCalls?.length)
                .slice(-this.historyTurns)
                .map((m): ModelMessage => ({ role: m.role, content: contentText(m.content) }))

            const response = await classifier.complete({
                messages: [{ role: 'system', content: this.systemPrompt }, ...recent],
                options: { temperature: 0, maxTokens: 150 },
            })
            const { score, reasoning } = parseClassifierOutput(contentText(response.message.content))

            const rule = this.rules.find((r) => r.minScore <= score && score <= r.maxScore)
            let provider = rule?.provider ?? this.defaultProvider
            if (!this.providers.has(provider)) {
                this.logger.warn('routed provider not registered, using default', {
                    provider,
                    defaultProvider: this.defaultProvider,
                })
                provider = this.defaultProvider
            }

            const latencyMs = this.now() - start
            this.logger.info('routed', { score, provider, latencyMs })
            return { provider, score, reasoning, latencyMs }
        } catch (err) {
            const latencyMs = this.now() - start
            this.logger.warn('classification failed, using default provider', {
                error: errorMessage(err),
                defaultProvider: this.defaultProvider,
            })
            return {
                provider: this.defaultProvider,
                score: -1,
                reasoning: `fallback: ${errorMessage(err)}`,
                latencyMs,
            }
        }
    }

    /** Route and resolve the provider in one step. */
    async select(messages: ModelMessage[]): Promise<{ decision: RoutingDecision; model: ModelProvider }> {
        const decision = await this.route(messages)
        const model = this.providers.get(decision.provider)
        if (!model) {
            throw new Error(`[ModelRouter] Default provider '${decision.provider}' is not registered.`)
        }
        return { decision, model }
    }
}
