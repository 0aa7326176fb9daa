import type { ToolSchema } from '@switchyard/core'

export interface AgentToolRules {
    /** When set, only these tools */
    allow?: Iterable<string> | undefined
    deny?: Iterable<string> | undefined
}

export interface ToolPolicyConfig {
    /** Blocked for every caller */
    deny?: Iterable<string> | undefined
    /** When set, nothing outside it is offered to anyone */
    allow?: Iterable<string> | undefined
    /** Extra rules keyed by agent type */
    agents?: Record<string, AgentToolRules> | undefined
}

interface Rules {
    allow: Set<string> | undefined
    deny: Set<string>
}

function toRules(rules: AgentToolRules): Rules {
    return { allow: rules.allow ? new Set(rules.allow) : undefined, deny: new Set(rules.deny ?? []) }
}

/**
 * ToolPolicy — decides which tools a caller may see and call. Rules are
 * checked in order: global deny, global allow, agent deny, agent allow.
 *
 * @example
 * ```ts
 * const policy = new ToolPolicy({ deny: ['drop_table'] })
 * policy.setAgentRules('refund', { allow: ['order_status'] })
 * policy.reason('issue_refund', 'refund') // "tool 'issue_refund' is not in the allow list for agent 'refund'"
 * ```
 */
export class ToolPolicy {
    private global: Rules
    private readonly agents = new Map<string, Rules>()

    constructor(config: ToolPolicyConfig = {}) {
        this.global = toRules(config)
        for (const [type, rules] of Object.entries(config.agents ?? {})) this.setAgentRules(type, rules)
    }

    setGlobalDeny(names: Iterable<string>): this {
        this.global = { ...this.global, deny: new Set(names) }
        return this
    }

    setGlobalAllow(names: Iterable<string> | undefined): this {
        this.global = { ...this.global, allow: names ? new Set(names) : undefined }
        return this
    }

    /** Replaces any rules set earlier for the same type. */
    setAgentRules(agentType: string, rules: AgentToolRules): this {
        this.agents.set(agentType, toRules(rules))
        return this
    }

    isAllowed(toolName: string, agentType?: string): boolean {
        return this.reason(toolName, agentType) === undefined
    }

    /** Why a tool is blocked, or `undefined` when it is allowed. */
    reason(toolName: string, agentType?: string): string | undefined {
        if (this.global.deny.has(toolName)) return `tool '${toolName}' is in the global deny list`
        if (this.global.allow && !this.global.allow.has(toolName)) {
            return `tool '${toolName}' is not in the global allow list`
        }

        const rules = agentType === undefined ? undefined : this.agents.get(agentType)
        if (!rules) return undefined
        if (rules.deny.has(toolName)) return `tool '${toolName}' is denied for agent '${agentType}'`
        if (rules.allow && !rules.allow.has(toolName)) {
            return `tool '${toolName}' is not in the allow list for agent '${agentType}'`
        }
        return undefined
    }

    /** Keeps the order of `schemas`. */
    filter(schemas: ToolSchema[], agentType?: string): ToolSchema[] {
        return schemas.filter((s) => this.isAllowed(s.name, agentType))
    }
}
