import type { ContentPart, ModelMessage } from '../types'
import type { ReactLoopConfig } from '../config'

export const TRUNCATION_MARKER = '\n[...truncated]'

/** Messages kept (besides the system prompt) by `forceTrim`. */
export const FORCE_TRIM_KEEP = 5

export type ContextBudget = Pick<
    ReactLoopConfig,
    | 'contextTokenLimit'
    | 'contextTrimThreshold'
    | 'maxHistoryMessages'
    | 'maxToolResultShare'
    | 'maxToolResultChars'
>

/**
 * Flatten message content to plain text. Non-text parts contribute nothing.
 */
export function contentText(content: string | ContentPart[]): string {
    if (typeof content === 'string') return content
    return content.map((part) => (part.type === 'text' ? part.text : '')).join('')
}

/**
 * ContextManager — stateless budget calculator for a message list.
 *
 * Three lines of defence keep a conversation under the model's window:
 *   1. every tool result is capped as it is appended (`truncateToolResult`)
 *   2. history is trimmed before each turn once it crosses the threshold (`trimIfNeeded`)
 *   3. after an overflow error, tool results and history are cut harder
 *      (`truncateAllToolResults`, `forceTrim`)
 *
 * No method mutates its input; trimming returns a new array (or the same
 * array when nothing changed).
 *
 * @example
 * ```ts
 * const cm = new ContextManager(parseReactLoopConfig({ contextTokenLimit: 32_000 }))
 * messages = cm.trimIfNeeded(messages)
 * ```
 */
export class ContextManager {
    constructor(private readonly budget: ContextBudget) {}

    /** ~4 characters per token over all text content. */
    estimateTokens(messages: ModelMessage[]): number {
        let chars = 0
        for (const msg of messages) {
            chars += contentText(msg.content).length
        }
        return Math.floor(chars / 4)
    }

    /** Character cap for a single tool result. */
    get maxToolResultChars(): number {
        return Math.floor(
            Math.min(
                this.budget.contextTokenLimit * this.budget.maxToolResultShare * 4,
                this.budget.maxToolResultChars,
            ),
        )
    }

    /**
     * Cap a tool result, cutting at the last newline past the halfway point
     * when there is one. The marker is counted against the cap, so the output
     * never exceeds it and truncating twice changes nothing.
     */
    truncateToolResult(text: string): string {
        const maxChars = this.maxToolResultChars
        if (text.length <= maxChars) return text

        const budget = Math.max(0, maxChars - TRUNCATION_MARKER.length)
        let cut = text.slice(0, budget)
        const newline = cut.lastIndexOf('\n')
        if (newline > Math.floor(budget / 2)) {
            cut = cut.slice(0, newline)
        }
        return cut + TRUNCATION_MARKER
    }

    trimIfNeeded(messages: ModelMessage[]): ModelMessage[] {
        const threshold = Math.floor(this.budget.contextTokenLimit * this.budget.contextTrimThreshold)
        if (this.estimateTokens(messages) <= threshold) return messages
        return keepRecent(messages, this.budget.maxHistoryMessages)
    }

    /** Always trims, regardless of the current estimate. */
    trimHistory(messages: ModelMessage[]): ModelMessage[] {
        return keepRecent(messages, this.budget.maxHistoryMessages)
    }

    truncateAllToolResults(messages: ModelMessage[]): ModelMessage[] {
        return messages.map((msg) => {
            if (msg.role !== 'tool') return msg
            if (typeof msg.content === 'string') {
                return { ...msg, content: this.truncateToolResult(msg.content) }
            }
            return {
                ...msg,
                content: msg.content.map((part) =>
                    part.type === 'text' ? { ...part, text: this.truncateToolResult(part.text) } : part,
                ),
            }
        })
    }

    forceTrim(messages: ModelMessage[]): ModelMessage[] {
        return keepRecent(messages, FORCE_TRIM_KEEP)
    }
}

/**
 * The leading system message (if any) plus the last `keep` messages.
 */
export function keepRecent(messages: ModelMessage[], keep: number): ModelMessage[] {
    const first = messages[0]
    if (!first) return messages

    const system = first.role === 'system' ? [first] : []
    const rest = first.role === 'system' ? messages.slice(1) : messages
    if (rest.length <= keep) return messages
    return [...system, ...rest.slice(rest.length - keep)]
}
