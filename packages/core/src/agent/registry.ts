import { createHash } from 'node:crypto'
import type { AgentCatalog, AgentInit, AgentInstance, FieldSpec, ToolSchema } from '../types'
import { AgentTypeNotFoundError } from '../errors'

export type RiskLevel = 'read' | 'write' | 'destructive'

export interface AgentRegistration {
    type: string
    description: string
    fields?: readonly FieldSpec[] | undefined
    create(init: AgentInit): AgentInstance
    /**
     * Expose the agent to the ReAct loop as an agent-tool.
     * @default true
     */
    exposeAsTool?: boolean | undefined
    /**
     * Risk level reported on approval requests.
     * @default 'write'
     */
    riskLevel?: RiskLevel | undefined
}

/**
 * Stable integer identifying a field layout. Changes whenever a field is
 * added, removed, retyped or made (non-)required. `0` for no fields.
 */
export function computeSchemaVersion(fields: readonly FieldSpec[]): number {
    if (fields.length === 0) return 0
    const parts = [...fields]
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
        .map((f) => `${f.name}:${f.type}:${f.required}`)
    const digest = createHash('sha256').update(parts.join('|')).digest('hex')
    return Number.parseInt(digest.slice(0, 8), 16)
}

/**
 * Registry of agent types, built once at start-up with explicit
 * `register()` calls and passed to whatever needs to create or restore agents.
 *
 * @example
 * ```ts
 * const agents = new AgentRegistry()
 *     .register({
 *         type: 'book_table',
 *         description: 'Book a restaurant table',
 *         fields: [{ name: 'restaurant', type: 'string', required: true }],
 *         create: (init) => new BookTableAgent(init),
 *     })
 * ```
 */
export class AgentRegistry implements AgentCatalog {
    private readonly registrations = new Map<string, AgentRegistration>()
    private readonly versions = new Map<string, number>()

    register(registration: AgentRegistration): this {
        if (this.registrations.has(registration.type)) {
            throw new Error(`[AgentRegistry] Agent type "${registration.type}" is already registered.`)
        }
        this.registrations.set(registration.type, registration)
        this.versions.set(registration.type, computeSchemaVersion(registration.fields ?? []))
        return this
    }

    has(type: string): boolean {
        return this.registrations.has(type)
    }

    get(type: string): AgentRegistration | undefined {
        return this.registrations.get(type)
    }

    types(): string[] {
        return [...this.registrations.keys()]
    }

    /** Current schema version of a type; 0 for unknown types. */
    schemaVersion(type: string): number {
        return this.versions.get(type) ?? 0
    }

    create(type: string, init: AgentInit): AgentInstance {
        const registration = this.registrations.get(type)
        if (!registration) throw new AgentTypeNotFoundError(type)
        return registration.create(init)
    }

    /** Like `create`, but yields `undefined` for types that no longer exist. */
    restore(type: string, init: AgentInit): AgentInstance | undefined {
        return this.registrations.get(type)?.create(init)
    }

    riskLevel(type: string): RiskLevel {
        return this.registrations.get(type)?.riskLevel ?? 'write'
    }

    isAgentTool(name: string): boolean {
        const registration = this.registrations.get(name)
        return registration !== undefined && registration.exposeAsTool !== false
    }

    /** Tool schemas for every agent exposed as an agent-tool. */
    toolSchemas(): ToolSchema[] {
        return [...this.registrations.values()]
            .filter((r) => r.exposeAsTool !== false)
            .map((r) => ({
                name: r.type,
                description: r.description,
                parameters: {
                    type: 'object',
                    properties: {
                        task_instruction: {
                            type: 'string',
                            description: 'What the agent should do, in the user\'s words, including any details already known.',
                        },
                    },
                    required: ['task_instruction'],
                },
            }))
    }
}
