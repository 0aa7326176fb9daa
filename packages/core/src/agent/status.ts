import type { AgentStatus } from '../types'

export const AGENT_STATUSES = [
    'initializing',
    'running',
    'waiting_for_input',
    'waiting_for_approval',
    'paused',
    'completed',
    'error',
    'cancelled',
] as const satisfies readonly AgentStatus[]

/** Allowed targets per status. `cancelled` is reachable from anywhere. */
const TRANSITIONS: Record<AgentStatus, readonly AgentStatus[]> = {
    initializing: ['running', 'waiting_for_input', 'waiting_for_approval', 'paused', 'completed', 'error'],
    running: ['completed', 'error', 'paused', 'waiting_for_input', 'waiting_for_approval'],
    waiting_for_input: ['running', 'waiting_for_approval', 'paused', 'completed', 'error', 'waiting_for_input'],
    waiting_for_approval: [
        'running',
        'waiting_for_input',
        'waiting_for_approval',
        'paused',
        'completed',
        'cancelled',
        'error',
    ],
    paused: ['initializing', 'running', 'waiting_for_input', 'waiting_for_approval', 'cancelled', 'error'],
    completed: [],
    error: ['cancelled'],
    cancelled: [],
}

export function canTransition(from: AgentStatus, to: AgentStatus): boolean {
    return to === 'cancelled' || TRANSITIONS[from].includes(to)
}

export function isTerminal(status: AgentStatus): boolean {
    return status === 'completed' || status === 'error' || status === 'cancelled'
}

export function isWaiting(status: AgentStatus): boolean {
    return status === 'waiting_for_input' || status === 'waiting_for_approval'
}

export function isAgentStatus(value: unknown): value is AgentStatus {
    return AGENT_STATUSES.some((s) => s === value)
}

export function assertNever(value: never): never {
    throw new Error(`Unexpected value: ${String(value)}`)
}
