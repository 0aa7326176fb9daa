import { describe, it, expect } from 'vitest'
import type OpenAI from 'openai'
import { extractToolCalls, extractUsage, parseToolArguments, toOpenAIMessages, toOpenAITools } from '../src'

describe('toOpenAIMessages', () => {
    it('maps tool results and assistant tool calls', () => {
        const messages = toOpenAIMessages([
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Book Nopa' },
            { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'book_table', arguments: { task_instruction: 'Nopa' } }] },
            { role: 'tool', content: 'Booked', toolCallId: 'c1' },
            { role: 'assistant', content: 'Done.' },
        ])

        expect(messages).toEqual([
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'Book Nopa' },
            {
                role: 'assistant',
                content: null,
                tool_calls: [
                    { id: 'c1', type: 'function', function: { name: 'book_table', arguments: '{"task_instruction":"Nopa"}' } },
                ],
            },
            { role: 'tool', content: 'Booked', tool_call_id: 'c1' },
            { role: 'assistant', content: 'Done.' },
        ])
    })

    it('sends the system prompt as a user message to models without a system role', () => {
        expect(toOpenAIMessages([{ role: 'system', content: 'Be brief.' }], 'o1-mini')).toEqual([
            { role: 'user', content: 'Be brief.' },
        ])
    })

    it('keeps user content parts', () => {
        const [message] = toOpenAIMessages([
            {
                role: 'user',
                content: [
                    { type: 'text', text: 'What is this?' },
                    { type: 'image_url', url: 'https://example.com/cat.png' },
                ],
            },
        ])

        expect(message).toEqual({
            role: 'user',
            content: [
                { type: 'text', text: 'What is this?' },
                { type: 'image_url', image_url: { url: 'https://example.com/cat.png' } },
            ],
        })
    })

    it('flattens parts to text for other roles', () => {
        const [message] = toOpenAIMessages([
            { role: 'tool', content: [{ type: 'text', text: 'a' }, { type: 'image_url', url: 'x' }, { type: 'text', text: 'b' }] },
        ])
        expect(message).toEqual({ role: 'tool', content: 'ab', tool_call_id: '' })
    })
})

describe('toOpenAITools', () => {
    it('wraps schemas as functions', () => {
        const parameters = { type: 'object', properties: {} }
        expect(toOpenAITools([{ name: 'echo', description: 'Echo text', parameters }])).toEqual([
            { type: 'function', function: { name: 'echo', description: 'Echo text', parameters } },
        ])
        expect(toOpenAITools(undefined)).toEqual([])
    })
})

describe('parseToolArguments', () => {
    it('returns JSON objects and nothing else', () => {
        expect(parseToolArguments('{"guests":2}')).toEqual({ guests: 2 })
        expect(parseToolArguments('{"guests":')).toEqual({})
        expect(parseToolArguments('[1,2]')).toEqual({})
        expect(parseToolArguments('null')).toEqual({})
    })
})

describe('extractToolCalls', () => {
    it('parses each call', () => {
        const message: OpenAI.Chat.ChatCompletionMessage = {
            role: 'assistant',
            content: null,
            refusal: null,
            tool_calls: [
                { id: 'c1', type: 'function', function: { name: 'echo', arguments: '{"text":"hi"}' } },
                { id: 'c2', type: 'function', function: { name: 'echo', arguments: 'oops' } },
            ],
        }

        expect(extractToolCalls(message)).toEqual([
            { id: 'c1', name: 'echo', arguments: { text: 'hi' } },
            { id: 'c2', name: 'echo', arguments: {} },
        ])
    })

    it('is undefined without calls', () => {
        expect(extractToolCalls({ role: 'assistant', content: 'Hello', refusal: null })).toBeUndefined()
    })
})

describe('extractUsage', () => {
    it('renames token counts', () => {
        expect(extractUsage({ prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 })).toEqual({
            promptTokens: 12,
            completionTokens: 3,
            totalTokens: 15,
        })
        expect(extractUsage(undefined)).toBeUndefined()
    })
})
