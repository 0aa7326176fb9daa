import { BaseAgent } from '../src'
import type { AgentInit, AgentReply, FieldSpec } from '../src'

export const BOOKING_FIELDS: FieldSpec[] = [
    { name: 'restaurant', type: 'string', required: true },
    { name: 'guests', type: 'number', required: true, description: 'number of guests' },
]

export interface BookingOptions {
    approval?: boolean
    failWith?: string
}

/** Collects `key=value` pairs from messages, then books. */
export class BookingAgent extends BaseAgent {
    constructor(
        init: AgentInit,
        private readonly options: BookingOptions = {},
    ) {
        super(init, { type: 'booking', fields: BOOKING_FIELDS })
    }

    protected override async extractFields(message: string): Promise<Record<string, unknown>> {
        const fields: Record<string, unknown> = {}
        for (const [, key, value] of message.matchAll(/(\w+)=(\S+)/g)) {
            if (key === undefined || value === undefined) continue
            fields[key] = key === 'guests' ? Number(value) : value
        }
        return fields
    }

    protected override needsApproval(): boolean {
        return this.options.approval ?? false
    }

    protected async onRunning(): Promise<AgentReply> {
        if (this.options.failWith) throw new Error(this.options.failWith)
        return this.complete(`Booked ${String(this.collectedFields['restaurant'])} for ${String(this.collectedFields['guests'])}`)
    }
}
