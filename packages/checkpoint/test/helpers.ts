import { AgentRegistry, BaseAgent } from '@switchyard/core'
import type { AgentInit, AgentReply, FieldSpec } from '@switchyard/core'
import type { Checkpoint } from '../src'

export const T0 = 1_700_000_000_000

export function makeCheckpoint(overrides: Partial<Checkpoint> & { id: string }): Checkpoint {
    return {
        agentId: 'agent_1',
        agentType: 'profile',
        tenantId: 't1',
        status: 'running',
        collectedFields: {},
        executionState: {},
        context: {},
        message: null,
        result: null,
        messageHistory: [],
        parentCheckpointId: null,
        branchLabel: null,
        timestamp: new Date(T0),
        version: 1,
        ...overrides,
    }
}

export const PROFILE_FIELDS: FieldSpec[] = [
    { name: 'name', type: 'string', required: true },
    { name: 'age', type: 'number', required: true },
]

/** Collects `name=` and `age=` from messages, then saves the profile. */
export class ProfileAgent extends BaseAgent {
    constructor(init: AgentInit) {
        super(init, { type: 'profile', fields: PROFILE_FIELDS })
    }

    protected override async extractFields(message: string): Promise<Record<string, unknown>> {
        const fields: Record<string, unknown> = {}
        for (const [, key, value] of message.matchAll(/(name|age)=(\S+)/g)) {
            if (key === undefined || value === undefined) continue
            fields[key] = key === 'age' ? Number(value) : value
        }
        return fields
    }

    protected async onRunning(): Promise<AgentReply> {
        return this.complete(`Saved ${String(this.collectedFields['name'])} (${String(this.collectedFields['age'])})`)
    }
}

export function profiles(): AgentRegistry {
    return new AgentRegistry().register({
        type: 'profile',
        description: 'Save a user profile',
        fields: PROFILE_FIELDS,
        create: (init) => new ProfileAgent(init),
    })
}
