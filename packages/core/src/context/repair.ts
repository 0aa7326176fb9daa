import type { ModelMessage } from '../types'

export const SYNTHETIC_TOOL_RESULT = '[synthetic] missing tool result - inserted for transcript repair'

export interface RepairReport {
    messages: ModelMessage[]
    addedSynthetic: number
    droppedDuplicates: number
    droppedOrphans: number
    moved: number
}

/**
 * Make every assistant tool call be followed by exactly one matching tool
 * result, in call order. Providers reject transcripts that break this rule,
 * and history trimming can easily produce one.
 *
 * - displaced results are moved directly after their assistant message
 * - missing results get a synthetic placeholder
 * - duplicate results keep only the first occurrence
 * - results with no matching call are dropped
 *
 * Returns the input array untouched when it is already well-formed.
 */
export function repairToolPairing(messages: ModelMessage[]): RepairReport {
    const expected = new Set<string>()
    for (const message of messages) {
        if (message.role !== 'assistant') continue
        for (const call of message.toolCalls ?? []) expected.add(call.id)
    }

    const results = new Map<string, { index: number; message: ModelMessage }>()
    let droppedDuplicates = 0
    messages.forEach((message, index) => {
        if (message.role !== 'tool' || !message.toolCallId || !expected.has(message.toolCallId)) return
        if (results.has(message.toolCallId)) {
            droppedDuplicates++
            return
        }
        results.set(message.toolCallId, { index, message })
    })

    const repaired: ModelMessage[] = []
    const placed = new Set<string>()
    let addedSynthetic = 0
    let droppedOrphans = 0
    let moved = 0

    messages.forEach((message, index) => {
        if (message.role === 'tool') {
            if (!message.toolCallId || !expected.has(message.toolCallId)) droppedOrphans++
            return
        }

        repaired.push(message)
        if (message.role !== 'assistant' || !message.toolCalls?.length) return

        message.toolCalls.forEach((call, offset) => {
            const found = placed.has(call.id) ? undefined : results.get(call.id)
            if (found) {
                if (found.index !== index + 1 + offset) moved++
                repaired.push(found.message)
            } else {
                addedSynthetic++
                repaired.push({
                    role: 'tool',
                    toolCallId: call.id,
                    name: call.name,
                    content: SYNTHETIC_TOOL_RESULT,
                })
            }
            placed.add(call.id)
        })
    })

    const changed = addedSynthetic + droppedDuplicates + droppedOrphans + moved > 0
    return {
        messages: changed ? repaired : messages,
        addedSynthetic,
        droppedDuplicates,
        droppedOrphans,
        moved,
    }
}
