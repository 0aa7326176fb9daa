import OpenAI from 'openai'
import type { ModelMessage, ModelProvider, ModelRequest, ModelResponse } from '@switchyard/core'
import { extractToolCalls, extractUsage, toOpenAIMessages, toOpenAITools } from './convert'

export interface OpenAIProviderConfig {
    apiKey: string
    /** @default 'gpt-4o' */
    model?: string | undefined
    baseURL?: string | undefined
    organization?: string | undefined
    /** @default 0.7 */
    temperature?: number | undefined
    maxTokens?: number | undefined
    /** Provider name reported to the fallback client and logs. @default 'openai' */
    name?: string | undefined
}

export class OpenAIProvider implements ModelProvider {
    readonly name: string
    readonly model: string

    private readonly client: OpenAI
    private readonly temperature: number
    private readonly maxTokens: number | undefined

    constructor(config: OpenAIProviderConfig) {
        this.name = config.name ?? 'openai'
        this.model = config.model ?? 'gpt-4o'
        this.temperature = config.temperature ?? 0.7
        this.maxTokens = config.maxTokens

        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            organization: config.organization,
        })
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const temperature = request.options?.temperature ?? this.temperature
        const maxTokens = request.options?.maxTokens ?? this.maxTokens
        const tools = toOpenAITools(request.tools)

        const completion = await this.client.chat.completions.create({
            model: this.model,
            temperature,
            messages: toOpenAIMessages(request.messages, this.model),
            ...(maxTokens ? { max_tokens: maxTokens } : {}),
            ...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
        })

        const choice = completion.choices[0]
        if (!choice) throw new Error('[OpenAIProvider] Empty response from API.')

        const toolCalls = extractToolCalls(choice.message)
        const message: ModelMessage = {
            role: 'assistant',
            content: choice.message.content ?? '',
            toolCalls,
        }

        return {
            message,
            toolCalls,
            usage: extractUsage(completion.usage),
            raw: completion,
        }
    }
}

/**
 * Create an OpenAI model provider.
 *
 * @example
 * ```ts
 * const llm = openai({ apiKey: process.env['OPENAI_API_KEY'] ?? '' })
 * const mini = openai({ apiKey: '...', model: 'gpt-4o-mini', name: 'openai-mini' })
 * ```
 */
export function openai(config: OpenAIProviderConfig): OpenAIProvider {
    return new OpenAIProvider(config)
}
