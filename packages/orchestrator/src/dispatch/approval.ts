import type { AgentInstance, RiskLevel } from '@switchyard/core'

/** What the user is asked to confirm before an agent acts. */
export interface ApprovalRequest {
    agentId: string
    agentType: string
    actionSummary: string
    riskLevel: RiskLevel
    /** Collected fields the action will use */
    details: Record<string, unknown>
    options: string[]
    timeoutMinutes: number
    allowModification: boolean
}

export interface BuildApprovalOptions {
    /** @default 'write' */
    riskLevel?: RiskLevel | undefined
    /** @default 30 */
    timeoutMinutes?: number | undefined
}

export const APPROVAL_OPTIONS = ['approve', 'edit', 'cancel'] as const

export function buildApprovalRequest(agent: AgentInstance, opts: BuildApprovalOptions = {}): ApprovalRequest {
    return {
        agentId: agent.id,
        agentType: agent.type,
        actionSummary: agent.approvalPrompt(),
        riskLevel: opts.riskLevel ?? 'write',
        details: { ...agent.collectedFields },
        options: [...APPROVAL_OPTIONS],
        timeoutMinutes: opts.timeoutMinutes ?? 30,
        allowModification: true,
    }
}
