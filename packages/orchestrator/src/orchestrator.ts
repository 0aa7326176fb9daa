import { randomUUID } from 'node:crypto'
import {
    EventEmitter,
    MiddlewarePipeline,
    ToolRegistry,
    errorMessage,
    isTerminal,
    parseReactLoopConfig,
    silentLogger,
} from '@switchyard/core'
import type {
    AgentInstance,
    AgentRegistry,
    AgentReply,
    AgentState,
    Logger,
    MemoryStore,
    ModelMessage,
    ModelProvider,
    ReactLoopConfig,
    SessionConfig,
} from '@switchyard/core'
import type { CheckpointManager, ReplayResult, RestoreResult } from '@switchyard/checkpoint'
import type { ModelRouter } from '@switchyard/llm'
import { AgentPool } from '@switchyard/pool'
import { buildApprovalRequest } from './dispatch/approval'
import type { ApprovalRequest } from './dispatch/approval'
import { ToolDispatcher } from './dispatch/dispatcher'
import type { ToolPolicy } from './dispatch/policy'
import { REACT_LOOP_AGENT_TYPE, ReactEngine } from './engines/react'
import type { ReactLoopResult } from './engines/react'

export const DEFAULT_SYSTEM_PROMPT =
    'You are a helpful assistant. Use the available tools when they help, and hand multi-step tasks to the matching agent.'

export interface OrchestratorConfig {
    model: ModelProvider
    router?: ModelRouter | undefined
    agents: AgentRegistry
    /** @default empty ToolRegistry */
    tools?: ToolRegistry | undefined
    /** @default AgentPool over an in-memory backend */
    pool?: AgentPool | undefined
    checkpoints?: CheckpointManager | undefined
    /** Long-term memory searched before, and fed after, every ReAct run */
    memory?: MemoryStore | undefined
    systemPrompt?: string | undefined
    reactConfig?: Partial<ReactLoopConfig> | undefined
    /** Tool rules; agent-level rules for the top-level loop use the `react-loop` type */
    toolPolicy?: ToolPolicy | undefined
    /** Used only when the pool is created here */
    session?: Partial<SessionConfig> | undefined
    middleware?: MiddlewarePipeline | undefined
    events?: EventEmitter | undefined
    logger?: Logger | undefined
    /**
     * Memories recalled per message.
     * @default 5
     */
    memoryLimit?: number | undefined
}

export interface HandleMessageOptions {
    /** Conversation id; waiting agents are matched against it when given */
    sessionId?: string | undefined
    /** Earlier turns, placed between the system prompt and the new message */
    history?: ModelMessage[] | undefined
}

export type HandleMessageResult =
    | {
          handledBy: 'agent'
          response: string
          sessionId: string
          agent: AgentState
          checkpointId: string | undefined
          pendingApprovals: ApprovalRequest[]
      }
    | {
          handledBy: 'react'
          response: string
          sessionId: string
          pendingApprovals: ApprovalRequest[]
          loop: ReactLoopResult
      }

/**
 * Orchestrator — one entry point per user message.
 *
 * A tenant's agent that is waiting for input or approval gets the message
 * first; otherwise the message starts a ReAct run over the registered tools
 * and agent-tools.
 *
 * @example
 * ```ts
 * const orchestrator = new Orchestrator({ model: llm, agents, tools })
 * await orchestrator.initialize()
 * const { response } = await orchestrator.handleMessage('u1', 'Book a table for two tonight')
 * ```
 */
export class Orchestrator {
    readonly agents: AgentRegistry
    readonly tools: ToolRegistry
    readonly pool: AgentPool
    readonly checkpoints: CheckpointManager | undefined
    readonly dispatcher: ToolDispatcher
    readonly engine: ReactEngine
    readonly events: EventEmitter

    private readonly memory: MemoryStore | undefined
    private readonly memoryLimit: number
    private readonly systemPrompt: string
    private readonly approvalTimeoutMinutes: number
    private readonly logger: Logger
    private initialized = false

    constructor(config: OrchestratorConfig) {
        const logger = config.logger ?? silentLogger
        const middleware = config.middleware ?? new MiddlewarePipeline()

        this.agents = config.agents
        this.tools = config.tools ?? new ToolRegistry()
        this.pool = config.pool ?? new AgentPool({ catalog: config.agents, session: config.session, logger })
        this.checkpoints = config.checkpoints
        this.events = config.events ?? new EventEmitter()
        this.memory = config.memory
        this.memoryLimit = config.memoryLimit ?? 5
        this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT
        this.approvalTimeoutMinutes = parseReactLoopConfig(config.reactConfig ?? {}).approvalTimeoutMinutes
        this.logger = logger.child({ component: 'orchestrator' })

        this.dispatcher = new ToolDispatcher({
            tools: this.tools,
            agents: this.agents,
            pool: this.pool,
            checkpoints: this.checkpoints,
            config: config.reactConfig,
            policy: config.toolPolicy,
            middleware,
            events: this.events,
            logger,
        })
        this.engine = new ReactEngine({
            model: config.model,
            router: config.router,
            dispatcher: this.dispatcher,
            config: config.reactConfig,
            checkpoints: this.checkpoints,
            middleware,
            events: this.events,
            logger,
        })
    }

    // ─── Lifecycle ───────────────────────────────────────────────────────────

    /** Restore persisted sessions (when configured) and start the pool's background loops. */
    async initialize(): Promise<void> {
        if (this.initialized) return
        const { enabled, autoRestoreOnStart } = this.pool.session
        if (enabled && autoRestoreOnStart) {
            const restored = await this.pool.restoreAllSessions(this.agents)
            this.logger.info('sessions restored on start', { agents: restored })
        }
        this.pool.startBackgroundTasks()
        this.initialized = true
    }

    /** Flush and close the pool, then the checkpoint storage. */
    async shutdown(): Promise<void> {
        await this.pool.close()
        await this.checkpoints?.close()
        this.initialized = false
    }

    // ─── Messages ────────────────────────────────────────────────────────────

    async handleMessage(tenantId: string, message: string, opts: HandleMessageOptions = {}): Promise<HandleMessageResult> {
        await this.ensureTenantRestored(tenantId)

        const waiting = await this.pool.getWaitingAgent(tenantId, opts.sessionId)
        if (waiting) return this.continueAgent(waiting, message, opts.sessionId)

        const sessionId = opts.sessionId ?? randomUUID()
        const messages: ModelMessage[] = [
            { role: 'system', content: await this.buildSystemPrompt(tenantId, message) },
            ...(opts.history ?? []),
            { role: 'user', content: message },
        ]
        const schemas = this.dispatcher.schemas(REACT_LOOP_AGENT_TYPE)
        const loop = await this.engine.run(messages, schemas, tenantId, { sessionId })
        await this.remember(tenantId, message, loop.response)

        return {
            handledBy: 'react',
            response: loop.response,
            sessionId,
            pendingApprovals: loop.pendingApprovals,
            loop,
        }
    }

    // ─── Agents ──────────────────────────────────────────────────────────────

    async listAgents(tenantId: string): Promise<AgentState[]> {
        await this.ensureTenantRestored(tenantId)
        const agents = await this.pool.listAgents(tenantId)
        return agents.map((agent) => agent.toState())
    }

    /** `undefined` when the tenant has no such agent. */
    async cancelAgent(tenantId: string, agentId: string): Promise<AgentReply | undefined> {
        return this.withAgent(tenantId, agentId, (agent) => agent.cancel())
    }

    async pauseAgent(tenantId: string, agentId: string): Promise<AgentReply | undefined> {
        return this.withAgent(tenantId, agentId, (agent) => agent.pause())
    }

    async resumeAgent(tenantId: string, agentId: string, message?: string): Promise<AgentReply | undefined> {
        return this.withAgent(tenantId, agentId, (agent) => agent.resume(message), message)
    }

    // ─── Checkpoints ─────────────────────────────────────────────────────────

    /** Rebuild an agent from a checkpoint and put it back in the pool. */
    async restoreFromCheckpoint(checkpointId: string): Promise<RestoreResult> {
        const checkpoints = this.requireCheckpoints()
        const result = await checkpoints.restoreAgent(checkpointId, this.agents)
        if (result.found && !isTerminal(result.agent.status)) {
            await this.pool.addAgent(result.agent, { checkpointId })
        }
        return result
    }

    /** Send a different message from a past checkpoint, creating a branch. */
    async replayFromCheckpoint(checkpointId: string, message: string, branchLabel?: string): Promise<ReplayResult> {
        const checkpoints = this.requireCheckpoints()
        const result = await checkpoints.replayFrom(checkpointId, message, this.agents, branchLabel)
        if (!result.found) return result

        if (isTerminal(result.agent.status)) {
            checkpoints.forget(result.agent.id)
            await this.pool.removeAgent(result.agent.tenantId, result.agent.id)
        } else {
            await this.pool.updateAgent(result.agent, { checkpointId: result.checkpointId })
        }
        return result
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private async ensureTenantRestored(tenantId: string): Promise<void> {
        const { enabled, lazyRestore } = this.pool.session
        if (!enabled || !lazyRestore || this.pool.isTenantRestored(tenantId)) return
        await this.pool.restoreTenantSession(tenantId, this.agents)
    }

    private async continueAgent(
        agent: AgentInstance,
        message: string,
        sessionId: string | undefined,
    ): Promise<HandleMessageResult> {
        this.logger.info('routing message to waiting agent', { agentId: agent.id, agentType: agent.type, status: agent.status })
        const reply = await agent.reply(message)
        const checkpointId = await this.dispatcher.track(agent, reply, message)

        const pendingApprovals =
            reply.status === 'waiting_for_approval'
                ? [
                      buildApprovalRequest(agent, {
                          riskLevel: this.agents.riskLevel(agent.type),
                          timeoutMinutes: this.approvalTimeoutMinutes,
                      }),
                  ]
                : []
        const agentSession = agent.context['sessionId']

        return {
            handledBy: 'agent',
            response: reply.text,
            sessionId: sessionId ?? (typeof agentSession === 'string' ? agentSession : randomUUID()),
            agent: agent.toState(),
            checkpointId,
            pendingApprovals,
        }
    }

    private async withAgent(
        tenantId: string,
        agentId: string,
        action: (agent: AgentInstance) => Promise<AgentReply>,
        message?: string,
    ): Promise<AgentReply | undefined> {
        await this.ensureTenantRestored(tenantId)
        const agent = await this.pool.getAgent(tenantId, agentId)
        if (!agent) return undefined
        const reply = await action(agent)
        await this.dispatcher.track(agent, reply, message)
        return reply
    }

    private async buildSystemPrompt(tenantId: string, message: string): Promise<string> {
        if (!this.memory) return this.systemPrompt
        try {
            const memories = await this.memory.search(tenantId, message, this.memoryLimit)
            if (memories.length === 0) return this.systemPrompt
            const lines = memories.map((m) => `- ${m.text}`)
            return `${this.systemPrompt}\n\nRelevant memories:\n${lines.join('\n')}`
        } catch (err) {
            this.logger.warn('memory search failed', { tenantId, error: errorMessage(err) })
            return this.systemPrompt
        }
    }

    private async remember(tenantId: string, message: string, response: string): Promise<void> {
        if (!this.memory) return
        try {
            await this.memory.save(tenantId, [
                { role: 'user', content: message },
                { role: 'assistant', content: response },
            ])
        } catch (err) {
            this.logger.error('memory save failed', { tenantId, error: errorMessage(err) })
        }
    }

    private requireCheckpoints(): CheckpointManager {
        if (!this.checkpoints) throw new Error('[Orchestrator] Checkpointing is not configured.')
        return this.checkpoints
    }
}
