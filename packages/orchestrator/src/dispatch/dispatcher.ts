import {
    ContextManager,
    EventEmitter,
    MiddlewarePipeline,
    ToolTimeoutError,
    createRunContext,
    errorMessage,
    isTerminal,
    parseReactLoopConfig,
    silentLogger,
} from '@switchyard/core'
import type {
    AgentInstance,
    AgentRegistry,
    AgentReply,
    AgentStatus,
    Logger,
    ReactLoopConfig,
    RunContext,
    ToolCall,
    ToolRegistry,
    ToolSchema,
} from '@switchyard/core'
import type { CheckpointManager } from '@switchyard/checkpoint'
import type { AgentPool } from '@switchyard/pool'
import { notify, stringifyResult, withTimeout } from '../utils'
import { buildApprovalRequest } from './approval'
import type { ApprovalRequest } from './approval'
import { ToolPolicy } from './policy'

export interface ToolDispatcherConfig {
    tools: ToolRegistry
    agents: AgentRegistry
    /** Where waiting sub-agents are parked between messages */
    pool?: AgentPool | undefined
    /** Snapshots sub-agents after each reply when its `autoSave` is on */
    checkpoints?: CheckpointManager | undefined
    /** Timeouts, tool-result caps and approval timeout */
    config?: Partial<ReactLoopConfig> | undefined
    /** Hides tools from the model and refuses calls to them */
    policy?: ToolPolicy | undefined
    middleware?: MiddlewarePipeline | undefined
    events?: EventEmitter | undefined
    logger?: Logger | undefined
}

export interface DispatchOptions {
    tenantId: string
    /** Run the call belongs to; a fresh one is created when omitted */
    run?: RunContext | undefined
    /** Caller whose agent-level tool rules apply */
    agentType?: string | undefined
}

/** Outcome of one tool call, already rendered as tool-message text. */
export interface ToolResult {
    callId: string
    name: string
    content: string
    success: boolean
    durationMs: number
    /** Length of the result before truncation */
    resultChars: number
    /** `false` when a sub-agent stopped to wait for the user */
    agentCompleted: boolean
    resultStatus?: AgentStatus | undefined
    agent?: AgentInstance | undefined
    approval?: ApprovalRequest | undefined
}

type Outcome = Omit<ToolResult, 'callId' | 'name' | 'durationMs' | 'resultChars'>

/**
 * ToolDispatcher — executes one tool call, plain tool or agent-tool, under
 * a per-kind timeout and turns every outcome (including exceptions and
 * timeouts) into a result message. It never throws.
 *
 * @example
 * ```ts
 * const dispatcher = new ToolDispatcher({ tools, agents, pool })
 * const result = await dispatcher.execute(call, { tenantId: 'u1' })
 * messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content: result.content })
 * ```
 */
export class ToolDispatcher {
    private readonly tools: ToolRegistry
    private readonly agents: AgentRegistry
    private readonly pool: AgentPool | undefined
    private readonly checkpoints: CheckpointManager | undefined
    private readonly config: ReactLoopConfig
    private readonly policy: ToolPolicy
    private readonly context: ContextManager
    private readonly middleware: MiddlewarePipeline
    private readonly events: EventEmitter
    private readonly logger: Logger

    constructor(config: ToolDispatcherConfig) {
        this.tools = config.tools
        this.agents = config.agents
        this.pool = config.pool
        this.checkpoints = config.checkpoints
        this.config = parseReactLoopConfig(config.config ?? {})
        this.policy = config.policy ?? new ToolPolicy()
        this.context = new ContextManager(this.config)
        this.middleware = config.middleware ?? new MiddlewarePipeline()
        this.events = config.events ?? new EventEmitter()
        this.logger = (config.logger ?? silentLogger).child({ component: 'dispatcher' })
    }

    isAgentTool(name: string): boolean {
        return this.agents.isAgentTool(name)
    }

    /** Plain tools first, then agent-tools, minus what the policy blocks for `agentType`. */
    schemas(agentType?: string): ToolSchema[] {
        return this.policy.filter([...this.tools.getSchemas(), ...this.agents.toolSchemas()], agentType)
    }

    async execute(call: ToolCall, opts: DispatchOptions): Promise<ToolResult> {
        const started = Date.now()
        const run = opts.run ?? createRunContext({ tenantId: opts.tenantId, messages: [] })
        const isAgent = this.isAgentTool(call.name)
        const timeoutMs = (isAgent ? this.config.agentToolExecutionTimeout : this.config.toolExecutionTimeout) * 1000

        await notify(this.events, this.logger, 'tool:before', { name: call.name, callId: call.id, args: call.arguments })

        const blocked = this.policy.reason(call.name, opts.agentType)
        let outcome: Outcome
        if (blocked !== undefined) {
            this.logger.warn('tool blocked by policy', { tool: call.name, callId: call.id, reason: blocked })
            outcome = failure(`[ERROR] Tool '${call.name}' is not allowed`)
        } else if (!isAgent && !this.tools.has(call.name)) {
            this.logger.warn('unknown tool', { tool: call.name, callId: call.id })
            outcome = failure(`[ERROR] Unknown tool '${call.name}'`)
        } else {
            try {
                outcome = await withTimeout(
                    timeoutMs,
                    (signal) => this.invoke(call, run, isAgent, signal),
                    () => new ToolTimeoutError(call.name, timeoutMs),
                )
            } catch (err) {
                if (err instanceof ToolTimeoutError) {
                    this.logger.warn('tool timed out', { tool: call.name, callId: call.id, timeoutMs })
                    outcome = failure(`[ERROR] ${err.message}`)
                } else {
                    this.logger.warn('tool failed', { tool: call.name, callId: call.id, error: errorMessage(err) })
                    outcome = failure(`[ERROR] Tool '${call.name}' failed: ${errorMessage(err)}`)
                }
            }
        }

        const durationMs = Date.now() - started
        await notify(this.events, this.logger, 'tool:after', {
            name: call.name,
            callId: call.id,
            success: outcome.success,
            durationMs,
        })

        return {
            ...outcome,
            callId: call.id,
            name: call.name,
            durationMs,
            resultChars: outcome.content.length,
            content: this.context.truncateToolResult(outcome.content),
        }
    }

    /**
     * Checkpoint an agent after a reply and park it in the pool, or drop it
     * from the pool and the checkpoint bookkeeping once it is terminal. Resolves the checkpoint id, if any.
     */
    async track(agent: AgentInstance, reply: AgentReply, message?: string): Promise<string | undefined> {
        let checkpointId: string | undefined
        if (this.checkpoints?.autoSave) {
            try {
                checkpointId = await this.checkpoints.saveCheckpoint(agent.toState(), {
                    message: message === undefined ? undefined : { role: 'user', content: message },
                    result: reply,
                })
                await notify(this.events, this.logger, 'checkpoint:saved', { checkpointId, agentId: agent.id })
            } catch (err) {
                this.logger.error('agent checkpoint failed', { agentId: agent.id, error: errorMessage(err) })
            }
        }

        if (isTerminal(agent.status)) this.checkpoints?.forget(agent.id)

        if (!this.pool) return checkpointId
        if (isTerminal(agent.status)) {
            await this.pool.removeAgent(agent.tenantId, agent.id)
        } else {
            await this.pool.updateAgent(agent, { checkpointId })
        }
        return checkpointId
    }

    // ─── Execution ───────────────────────────────────────────────────────────

    private async invoke(call: ToolCall, run: RunContext, isAgent: boolean, signal: AbortSignal): Promise<Outcome> {
        await this.middleware.run({ scope: 'tool:before', ctx: run, tool: { name: call.name, args: call.arguments } })
        const outcome = isAgent ? await this.runAgentTool(call, run) : await this.runTool(call, run, signal)
        await this.middleware.run({
            scope: 'tool:after',
            ctx: run,
            tool: { name: call.name, args: call.arguments, result: outcome.content },
        })
        return outcome
    }

    private async runTool(call: ToolCall, run: RunContext, signal: AbortSignal): Promise<Outcome> {
        const tool = this.tools.get(call.name)
        if (!tool) return failure(`[ERROR] Unknown tool '${call.name}'`)

        const result = await tool.execute(call.arguments, {
            tenantId: run.tenantId,
            callId: call.id,
            signal,
            metadata: { sessionId: run.sessionId },
        })
        return { content: stringifyResult(result), success: true, agentCompleted: true }
    }

    private async runAgentTool(call: ToolCall, run: RunContext): Promise<Outcome> {
        const instruction = typeof call.arguments['task_instruction'] === 'string' ? call.arguments['task_instruction'] : ''
        const agent =
            (await this.findResumable(call.name, run)) ??
            this.agents.create(call.name, {
                tenantId: run.tenantId,
                context: { sessionId: run.sessionId, taskInstruction: instruction },
            })

        const reply = await agent.reply(instruction)
        this.logger.info('agent-tool replied', { agentType: agent.type, agentId: agent.id, status: reply.status })
        await this.track(agent, reply, instruction)

        switch (reply.status) {
            case 'completed':
                return {
                    content: reply.text || 'Agent completed successfully.',
                    success: true,
                    agentCompleted: true,
                    resultStatus: reply.status,
                }
            case 'waiting_for_input':
                return { content: reply.text, success: true, agentCompleted: false, resultStatus: reply.status, agent }
            case 'waiting_for_approval': {
                const approval = buildApprovalRequest(agent, {
                    riskLevel: this.agents.riskLevel(agent.type),
                    timeoutMinutes: this.config.approvalTimeoutMinutes,
                })
                await notify(this.events, this.logger, 'approval:requested', {
                    agentId: agent.id,
                    agentType: agent.type,
                    actionSummary: approval.actionSummary,
                })
                return {
                    content: reply.text,
                    success: true,
                    agentCompleted: false,
                    resultStatus: reply.status,
                    agent,
                    approval,
                }
            }
            case 'error':
                return {
                    content: reply.text || 'Error: Unknown error',
                    success: false,
                    agentCompleted: true,
                    resultStatus: reply.status,
                }
            default:
                return {
                    content: reply.text || `Agent finished with status: ${reply.status}`,
                    success: true,
                    agentCompleted: true,
                    resultStatus: reply.status,
                }
        }
    }

    /** A sub-agent of the same type already waiting for input in this session. */
    private async findResumable(type: string, run: RunContext): Promise<AgentInstance | undefined> {
        if (!this.pool) return undefined
        const agents = await this.pool.listAgents(run.tenantId)
        return agents.find(
            (a) => a.type === type && a.status === 'waiting_for_input' && a.context['sessionId'] === run.sessionId,
        )
    }
}

function failure(content: string): Outcome {
    return { content, success: false, agentCompleted: true }
}
