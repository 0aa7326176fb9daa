import { randomUUID } from 'node:crypto'
import type { AgentInit, AgentInstance, AgentReply, AgentState, AgentStatus, FieldSpec } from '../types'
import { InvalidTransitionError, errorMessage } from '../errors'
import { assertNever, canTransition, isAgentStatus } from './status'

const PAUSABLE: readonly AgentStatus[] = ['initializing', 'running', 'waiting_for_input', 'waiting_for_approval']

export type ApprovalDecision = 'approved' | 'rejected' | 'modify'

const APPROVE_PHRASES = ['yes', 'y', 'yep', 'yeah', 'ok', 'okay', 'sure', 'approve', 'approved', 'confirm', 'confirmed', 'go ahead', 'proceed', 'do it', 'lgtm']
const REJECT_PHRASES = ['no', 'n', 'nope', 'cancel', 'reject', 'rejected', 'stop', 'abort', 'deny', 'never mind', 'nevermind']

/**
 * Classify a reply to an approval prompt. Anything that is neither a clear
 * yes nor a clear no is treated as a modification request.
 *
 * @example
 * ```ts
 * parseApprovalResponse('Yes!')              // 'approved'
 * parseApprovalResponse('cancel')            // 'rejected'
 * parseApprovalResponse('make it 7pm')       // 'modify'
 * ```
 */
export function parseApprovalResponse(text: string): ApprovalDecision {
    const normalized = text.trim().toLowerCase().replace(/[.!?,]+$/, '')
    if (APPROVE_PHRASES.includes(normalized)) return 'approved'
    if (REJECT_PHRASES.includes(normalized)) return 'rejected'
    return 'modify'
}

export interface BaseAgentOptions {
    type: string
    /** Fields the agent collects before running */
    fields?: readonly FieldSpec[] | undefined
}

/**
 * BaseAgent — finite state machine driving a single task.
 *
 * `reply()` dispatches on the current status:
 *   - initializing / waiting_for_input → extract fields, ask for what's missing
 *   - waiting_for_approval → approve, reject or modify
 *   - running → `onRunning()`, the subclass's business logic
 *
 * A handler that throws moves the agent to `error` and produces an error reply
 * instead of propagating.
 *
 * @example
 * ```ts
 * class GreetingAgent extends BaseAgent {
 *     constructor(init: AgentInit) {
 *         super(init, { type: 'greeting', fields: [{ name: 'name', type: 'string', required: true }] })
 *     }
 *     protected async extractFields(message: string) {
 *         return { name: message.trim() }
 *     }
 *     protected async onRunning() {
 *         return this.complete(`Hello, ${String(this.collectedFields['name'])}!`)
 *     }
 * }
 * ```
 */
export abstract class BaseAgent implements AgentInstance {
    readonly id: string
    readonly type: string
    readonly tenantId: string
    readonly collectedFields: Record<string, unknown>
    readonly executionState: Record<string, unknown>
    readonly context: Record<string, unknown>
    protected readonly fields: readonly FieldSpec[]
    private _status: AgentStatus

    constructor(init: AgentInit, options: BaseAgentOptions) {
        this.id = init.id ?? `${options.type}_${randomUUID().slice(0, 8)}`
        this.type = options.type
        this.tenantId = init.tenantId
        this._status = init.status ?? 'initializing'
        this.collectedFields = { ...init.collectedFields }
        this.executionState = { ...init.executionState }
        this.context = { ...init.context }
        this.fields = options.fields ?? []
    }

    get status(): AgentStatus {
        return this._status
    }

    // ─── Extension points ────────────────────────────────────────────────────

    /** The task itself. Called once all fields are collected (and approved). */
    protected abstract onRunning(message: string): Promise<AgentReply>

    /** Pull field values out of a user message. */
    protected async extractFields(_message: string): Promise<Record<string, unknown>> {
        return {}
    }

    protected needsApproval(): boolean {
        return false
    }

    approvalPrompt(): string {
        const summary = Object.entries(this.collectedFields)
            .map(([k, v]) => `${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`)
            .join(', ')
        return summary ? `Proceed with ${this.type} (${summary})?` : `Proceed with ${this.type}?`
    }

    protected promptFor(field: FieldSpec): string {
        return `Please provide ${field.description ?? field.name}.`
    }

    protected parseApproval(text: string): ApprovalDecision {
        return parseApprovalResponse(text)
    }

    // ─── Capability ──────────────────────────────────────────────────────────

    async reply(message: string): Promise<AgentReply> {
        const status = this._status
        try {
            switch (status) {
                case 'initializing':
                case 'waiting_for_input':
                    return await this.collect(message)
                case 'waiting_for_approval':
                    return await this.onApprovalResponse(message)
                case 'running':
                    return await this.onRunning(message)
                case 'paused':
                    return this.makeReply('This task is paused. Resume it to continue.')
                case 'error':
                    return this.makeReply(`Error: ${this.lastError() ?? 'the task failed'}`)
                case 'completed':
                case 'cancelled':
                    return this.makeReply(`This task is already ${status}.`)
                default:
                    return assertNever(status)
            }
        } catch (err) {
            const reason = errorMessage(err)
            if (canTransition(this._status, 'error')) return this.fail(reason)
            this.executionState['errorMessage'] = reason
            return this.makeReply(`Error: ${reason}`, { error: reason })
        }
    }

    async pause(): Promise<AgentReply> {
        const status = this._status
        if (!PAUSABLE.includes(status)) {
            return this.makeReply(`Cannot pause a task that is ${status}.`)
        }
        this.executionState['pausedFrom'] = status
        this.transitionTo('paused')
        return this.makeReply('Task paused.')
    }

    async resume(message?: string): Promise<AgentReply> {
        if (this._status !== 'paused') {
            return this.makeReply(`Cannot resume a task that is ${this._status}.`)
        }
        const previous = this.executionState['pausedFrom']
        delete this.executionState['pausedFrom']
        const target: AgentStatus = isAgentStatus(previous) ? previous : 'waiting_for_input'
        this.transitionTo(target)

        if (message !== undefined) return this.reply(message)
        if (target === 'waiting_for_approval') return this.makeReply(this.approvalPrompt())
        return this.makeReply(this.lastPrompt() ?? 'Task resumed.')
    }

    async cancel(): Promise<AgentReply> {
        this.transitionTo('cancelled')
        return this.makeReply('Task cancelled.')
    }

    fail(reason: string): AgentReply {
        this.executionState['errorMessage'] = reason
        this.transitionTo('error')
        return this.makeReply(`Error: ${reason}`, { error: reason })
    }

    toState(): AgentState {
        return {
            id: this.id,
            type: this.type,
            tenantId: this.tenantId,
            status: this._status,
            collectedFields: { ...this.collectedFields },
            executionState: { ...this.executionState },
            context: { ...this.context },
        }
    }

    // ─── Helpers for subclasses ──────────────────────────────────────────────

    protected transitionTo(next: AgentStatus): void {
        if (!canTransition(this._status, next)) {
            throw new InvalidTransitionError(this._status, next)
        }
        this._status = next
    }

    missingFields(): FieldSpec[] {
        return this.fields.filter((f) => {
            if (!f.required) return false
            const value = this.collectedFields[f.name]
            return value === undefined || value === null || value === ''
        })
    }

    protected complete(text: string, metadata: Record<string, unknown> = {}): AgentReply {
        this.transitionTo('completed')
        return this.makeReply(text, metadata)
    }

    protected waitForInput(text: string, metadata: Record<string, unknown> = {}): AgentReply {
        this.transitionTo('waiting_for_input')
        this.executionState['lastPrompt'] = text
        return this.makeReply(text, metadata)
    }

    protected waitForApproval(): AgentReply {
        this.transitionTo('waiting_for_approval')
        const prompt = this.approvalPrompt()
        this.executionState['lastPrompt'] = prompt
        return this.makeReply(prompt, { requiresApproval: true })
    }

    protected makeReply(text: string, metadata: Record<string, unknown> = {}): AgentReply {
        return {
            status: this._status,
            text,
            metadata: { agentId: this.id, agentType: this.type, ...metadata },
        }
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private async collect(message: string): Promise<AgentReply> {
        if (message) {
            const extracted = await this.extractFields(message)
            for (const [key, value] of Object.entries(extracted)) {
                if (value !== undefined) this.collectedFields[key] = value
            }
        }

        const missing = this.missingFields()
        const next = missing[0]
        if (next) {
            return this.waitForInput(this.promptFor(next), { missingFields: missing.map((f) => f.name) })
        }
        if (this.needsApproval()) return this.waitForApproval()

        this.transitionTo('running')
        return this.onRunning(message)
    }

    private async onApprovalResponse(message: string): Promise<AgentReply> {
        switch (this.parseApproval(message)) {
            case 'approved':
                this.transitionTo('running')
                return this.onRunning(message)
            case 'rejected':
                this.transitionTo('cancelled')
                return this.makeReply('Okay, cancelled.')
            case 'modify':
                this.transitionTo('waiting_for_input')
                return this.collect(message)
        }
    }

    private lastPrompt(): string | undefined {
        const prompt = this.executionState['lastPrompt']
        return typeof prompt === 'string' ? prompt : undefined
    }

    private lastError(): string | undefined {
        const err = this.executionState['errorMessage']
        return typeof err === 'string' ? err : undefined
    }
}
