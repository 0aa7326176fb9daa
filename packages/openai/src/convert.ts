import type OpenAI from 'openai'
import { contentText } from '@switchyard/core'
import type { ContentPart, ModelMessage, ModelRequest, TokenUsage, ToolCall } from '@switchyard/core'

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Models that reject the system role and expect the prompt as a user message. */
function lacksSystemRole(model: string | undefined): boolean {
    return model?.startsWith('o1') === true || model?.startsWith('o3') === true
}

function toContentParts(parts: ContentPart[]): OpenAI.Chat.ChatCompletionContentPart[] {
    return parts.map((part) =>
        part.type === 'text'
            ? { type: 'text', text: part.text }
            : { type: 'image_url', image_url: { url: part.url } },
    )
}

export function toOpenAIMessages(messages: ModelMessage[], model?: string): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'tool':
                return {
                    role: 'tool',
                    content: contentText(msg.content),
                    tool_call_id: msg.toolCallId ?? '',
                }
            case 'assistant':
                if (msg.toolCalls?.length) {
                    return {
                        role: 'assistant',
                        content: contentText(msg.content) || null,
                        tool_calls: msg.toolCalls.map((tc) => ({
                            id: tc.id,
                            type: 'function',
                            function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
                        })),
                    }
                }
                return { role: 'assistant', content: contentText(msg.content) }
            case 'system':
                if (lacksSystemRole(model)) return { role: 'user', content: contentText(msg.content) }
                return { role: 'system', content: contentText(msg.content) }
            case 'user':
                return {
                    role: 'user',
                    content: typeof msg.content === 'string' ? msg.content : toContentParts(msg.content),
                }
        }
    })
}

export function toOpenAITools(tools: ModelRequest['tools']): OpenAI.Chat.ChatCompletionTool[] {
    if (!tools || tools.length === 0) return []
    return tools.map((t) => ({
        type: 'function',
        function: {
            name: t.name,
            description: t.description,
            parameters: t.parameters,
        },
    }))
}

/** Tool arguments as an object; anything that is not a JSON object becomes `{}`. */
export function parseToolArguments(raw: string): Record<string, unknown> {
    let parsed: unknown
    try {
        parsed = JSON.parse(raw)
    } catch {
        return {}
    }
    return isRecord(parsed) ? parsed : {}
}

export function extractToolCalls(message: OpenAI.Chat.ChatCompletionMessage): ToolCall[] | undefined {
    const calls = message.tool_calls
    if (!calls?.length) return undefined
    return calls.map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: parseToolArguments(tc.function.arguments),
    }))
}

export function extractUsage(usage: OpenAI.CompletionUsage | undefined): TokenUsage | undefined {
    if (!usage) return undefined
    return {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
    }
}
