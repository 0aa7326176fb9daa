import {
    AllCandidatesExhaustedError,
    ContextManager,
    ContextOverflowError,
    EventEmitter,
    MiddlewarePipeline,
    addUsage,
    classifyFailure,
    contentText,
    createRunContext,
    errorMessage,
    isContextOverflow,
    parseReactLoopConfig,
    repairToolPairing,
    silentLogger,
} from '@switchyard/core'
import type {
    AgentStatus,
    FailureReason,
    Logger,
    ModelMessage,
    ModelProvider,
    ModelResponse,
    ReactLoopConfig,
    RunContext,
    TokenUsage,
    ToolSchema,
} from '@switchyard/core'
import type { CheckpointManager } from '@switchyard/checkpoint'
import type { ModelRouter, RoutingDecision } from '@switchyard/llm'
import type { ApprovalRequest } from '../dispatch/approval'
import type { ToolDispatcher, ToolResult } from '../dispatch/dispatcher'
import { notify, sleep, summarizeArgs } from '../utils'

export const REACT_LOOP_AGENT_TYPE = 'react-loop'

export const APOLOGY_RESPONSE = "I'm sorry, I wasn't able to complete your request. Please try again."

export const SUMMARY_PROMPT =
    'You have run out of steps. Using only the information gathered so far, give the user your best answer ' +
    'and say briefly what could not be finished.'

export interface ReactEngineConfig {
    /** Usually a FallbackClient; ignored for runs routed by `router` */
    model: ModelProvider
    /** Picks a provider per run from the request's complexity */
    router?: ModelRouter | undefined
    dispatcher: ToolDispatcher
    config?: Partial<ReactLoopConfig> | undefined
    /** Records one checkpoint per turn when its `autoSave` is on */
    checkpoints?: CheckpointManager | undefined
    middleware?: MiddlewarePipeline | undefined
    events?: EventEmitter | undefined
    logger?: Logger | undefined
    /** Backoff between LLM retries. @default setTimeout-based sleep */
    sleep?: ((ms: number) => Promise<void>) | undefined
}

export interface RunOptions {
    /** Identifies the conversation; also the id of the run's checkpoints */
    sessionId?: string | undefined
}

/** Per-call telemetry. */
export interface ToolCallRecord {
    callId: string
    name: string
    argsSummary: Record<string, unknown>
    durationMs: number
    success: boolean
    /** Status of the sub-agent, for agent-tools */
    resultStatus?: AgentStatus | undefined
    resultChars: number
    /** Usage of the LLM turn that requested the call */
    tokenAttribution?: TokenUsage | undefined
}

export interface ReactLoopResult {
    response: string
    turns: number
    toolCalls: ToolCallRecord[]
    tokenUsage: TokenUsage
    durationMs: number
    pendingApprovals: ApprovalRequest[]
    /** Conversation as it stood when the loop ended */
    messages: ModelMessage[]
    sessionId: string
    routing?: RoutingDecision | undefined
}

/**
 * ReactEngine — the Reason + Act loop.
 *
 *   1. Trim and repair the conversation
 *   2. Ask the model, recovering from overflow and transient failures
 *   3. No tool calls → final answer
 *   4. Otherwise run every call concurrently, append results in call order
 *   5. Stop early when a sub-agent needs the user; else repeat
 *
 * A run that exhausts `maxTurns` ends with one tool-free summary call, or a
 * fixed apology when that fails too.
 *
 * @example
 * ```ts
 * const engine = new ReactEngine({ model: llm, dispatcher, config: { maxTurns: 8 } })
 * const result = await engine.run(messages, dispatcher.schemas(), 'u1')
 * ```
 */
export class ReactEngine {
    readonly name = 'react'

    private readonly model: ModelProvider
    private readonly router: ModelRouter | undefined
    private readonly dispatcher: ToolDispatcher
    private readonly config: ReactLoopConfig
    private readonly context: ContextManager
    private readonly checkpoints: CheckpointManager | undefined
    private readonly middleware: MiddlewarePipeline
    private readonly events: EventEmitter
    private readonly logger: Logger
    private readonly sleep: (ms: number) => Promise<void>

    constructor(config: ReactEngineConfig) {
        this.model = config.model
        this.router = config.router
        this.dispatcher = config.dispatcher
        this.config = parseReactLoopConfig(config.config ?? {})
        this.context = new ContextManager(this.config)
        this.checkpoints = config.checkpoints
        this.middleware = config.middleware ?? new MiddlewarePipeline()
        this.events = config.events ?? new EventEmitter()
        this.logger = (config.logger ?? silentLogger).child({ component: 'react' })
        this.sleep = config.sleep ?? sleep
    }

    async run(
        messages: ModelMessage[],
        tools: ToolSchema[],
        tenantId: string,
        opts: RunOptions = {},
    ): Promise<ReactLoopResult> {
        const started = Date.now()
        const run = createRunContext({ tenantId, messages: [...messages], sessionId: opts.sessionId })
        const log = this.logger.child({ tenantId, sessionId: run.sessionId })
        const records: ToolCallRecord[] = []
        const pendingApprovals: ApprovalRequest[] = []

        let model = this.model
        let routing: RoutingDecision | undefined
        if (this.router) {
            const selected = await this.router.select(run.messages)
            model = selected.model
            routing = selected.decision
        }

        await notify(this.events, log, 'run:start', { tenantId, sessionId: run.sessionId, input: run.input })
        await this.middleware.run({ scope: 'run:before', ctx: run })

        let response: string | undefined
        try {
            while (run.turn < this.config.maxTurns) {
                run.turn++
                await notify(this.events, log, 'turn:start', { sessionId: run.sessionId, turn: run.turn })
                await this.middleware.run({ scope: 'turn:before', ctx: run })

                run.messages = this.prepare(run.messages, log)
                await notify(this.events, log, 'model:request', {
                    turn: run.turn,
                    messageCount: run.messages.length,
                    toolCount: tools.length,
                })
                const reply = await this.callModel(model, run, tools, log)
                addUsage(run.usage, reply.usage)
                const calls = reply.toolCalls ?? []
                await notify(this.events, log, 'model:response', {
                    turn: run.turn,
                    toolCallCount: calls.length,
                    usage: reply.usage,
                })

                if (calls.length === 0) {
                    response = contentText(reply.message.content)
                    run.messages.push({ role: 'assistant', content: reply.message.content })
                    await this.checkpoint(run, 'completed', response, log)
                    await this.middleware.run({ scope: 'turn:after', ctx: run })
                    break
                }

                run.messages.push({ role: 'assistant', content: reply.message.content, toolCalls: calls })
                const settled = await Promise.allSettled(
                    calls.map((call) => this.dispatcher.execute(call, { tenantId, run, agentType: REACT_LOOP_AGENT_TYPE })),
                )

                let waiting: ToolResult | undefined
                calls.forEach((call, i) => {
                    const outcome = settled[i]
                    const result: ToolResult =
                        outcome?.status === 'fulfilled'
                            ? outcome.value
                            : {
                                  callId: call.id,
                                  name: call.name,
                                  content: `[ERROR] Tool '${call.name}' failed: ${errorMessage(outcome?.reason)}`,
                                  success: false,
                                  durationMs: 0,
                                  resultChars: 0,
                                  agentCompleted: true,
                              }
                    run.messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content: result.content })
                    records.push({
                        callId: call.id,
                        name: call.name,
                        argsSummary: summarizeArgs(call.arguments),
                        durationMs: result.durationMs,
                        success: result.success,
                        resultStatus: result.resultStatus,
                        resultChars: result.resultChars,
                        tokenAttribution: reply.usage,
                    })
                    if (result.approval) pendingApprovals.push(result.approval)
                    if (!result.agentCompleted && !waiting) waiting = result
                })

                await this.middleware.run({ scope: 'turn:after', ctx: run })

                if (waiting) {
                    response = waiting.content
                    await this.checkpoint(run, waiting.resultStatus ?? 'waiting_for_input', response, log)
                    log.info('sub-agent waiting for the user', { agentId: waiting.agent?.id, status: waiting.resultStatus })
                    break
                }
                await this.checkpoint(run, 'running', undefined, log)
            }

            if (response === undefined) {
                log.warn('max turns reached without a final answer', { maxTurns: this.config.maxTurns })
                response = await this.summarize(model, run, log)
            }
        } catch (err) {
            await notify(this.events, log, 'error', { stage: 'react', error: err })
            log.error('react loop failed', { turn: run.turn, error: errorMessage(err) })
            throw err
        } finally {
            // each run is its own checkpoint chain
            this.checkpoints?.forget(run.sessionId)
        }

        const durationMs = Date.now() - started
        await this.middleware.run({ scope: 'run:after', ctx: run })
        await notify(this.events, log, 'run:end', {
            tenantId,
            sessionId: run.sessionId,
            turns: run.turn,
            durationMs,
        })

        return {
            response,
            turns: run.turn,
            toolCalls: records,
            tokenUsage: { ...run.usage },
            durationMs,
            pendingApprovals,
            messages: run.messages,
            sessionId: run.sessionId,
            routing,
        }
    }

    // ─── Model calls ─────────────────────────────────────────────────────────

    /** Trim when over budget, then repair tool-call pairing. */
    private prepare(messages: ModelMessage[], log: Logger): ModelMessage[] {
        const trimmed = this.context.trimIfNeeded(messages)
        if (trimmed !== messages) {
            log.info('trimmed history', { before: messages.length, after: trimmed.length })
        }
        const report = repairToolPairing(trimmed)
        if (report.messages !== trimmed) {
            log.warn('repaired transcript', {
                addedSynthetic: report.addedSynthetic,
                droppedDuplicates: report.droppedDuplicates,
                droppedOrphans: report.droppedOrphans,
                moved: report.moved,
            })
        }
        return [...report.messages]
    }

    /**
     * One LLM call with the recovery policy applied. Context overflows shrink
     * `run.messages` in three escalating steps; rate limits back off
     * exponentially up to `llmMaxRetries`, unless a fallback chain stays in
     * cooldown past the backoff; a timeout is retried once; auth and
     * everything else propagate.
     */
    private async callModel(
        model: ModelProvider,
        run: RunContext,
        tools: ToolSchema[],
        log: Logger,
    ): Promise<ModelResponse> {
        let overflowStep = 0
        let rateLimitRetries = 0
        let timeoutRetried = false

        for (;;) {
            try {
                return await model.complete({ messages: run.messages, tools })
            } catch (err) {
                if (isContextOverflow(err)) {
                    const recovered = this.shrink(run.messages, overflowStep)
                    if (!recovered) {
                        throw new ContextOverflowError(undefined, { cause: err })
                    }
                    log.warn('context overflow, shrinking conversation', {
                        step: recovered.step,
                        before: run.messages.length,
                        after: recovered.messages.length,
                    })
                    run.messages = recovered.messages
                    overflowStep++
                    continue
                }

                const reason: FailureReason = err instanceof AllCandidatesExhaustedError ? err.reason : classifyFailure(err)
                if (reason === 'rate_limit' && rateLimitRetries < this.config.llmMaxRetries) {
                    const delayMs = this.config.llmRetryBaseDelay * 1000 * 2 ** rateLimitRetries
                    const readyInMs = err instanceof AllCandidatesExhaustedError ? err.retryAfterMs : 0
                    if (readyInMs > delayMs) {
                        // a retry would only meet cooling-down candidates
                        log.warn('all model candidates cooling down', { retryAfterMs: readyInMs })
                        throw err
                    }
                    rateLimitRetries++
                    log.warn('rate limited, retrying', { attempt: rateLimitRetries, delayMs })
                    await this.sleep(delayMs)
                    continue
                }
                if (reason === 'timeout' && !timeoutRetried) {
                    timeoutRetried = true
                    log.warn('model call timed out, retrying once')
                    continue
                }
                throw err
            }
        }
    }

    private shrink(messages: ModelMessage[], step: number): { step: string; messages: ModelMessage[] } | undefined {
        switch (step) {
            case 0:
                return { step: 'trim_history', messages: this.repaired(this.context.trimHistory(messages)) }
            case 1:
                return { step: 'truncate_tool_results', messages: this.context.truncateAllToolResults(messages) }
            case 2:
                return { step: 'force_trim', messages: this.repaired(this.context.forceTrim(messages)) }
            default:
                return undefined
        }
    }

    private repaired(messages: ModelMessage[]): ModelMessage[] {
        return [...repairToolPairing(messages).messages]
    }

    /** Tool-free best-effort answer once the turn budget is spent. */
    private async summarize(model: ModelProvider, run: RunContext, log: Logger): Promise<string> {
        try {
            const messages = [...this.prepare(run.messages, log), { role: 'user' as const, content: SUMMARY_PROMPT }]
            const reply = await model.complete({ messages })
            addUsage(run.usage, reply.usage)
            const text = contentText(reply.message.content).trim()
            if (!text) return APOLOGY_RESPONSE
            run.messages.push({ role: 'assistant', content: text })
            return text
        } catch (err) {
            log.error('summary call failed', { error: errorMessage(err) })
            return APOLOGY_RESPONSE
        }
    }

    // ─── Checkpoints ─────────────────────────────────────────────────────────

    /** Snapshot the run itself as a pseudo-agent keyed by session id. */
    private async checkpoint(run: RunContext, status: AgentStatus, response: string | undefined, log: Logger): Promise<void> {
        if (!this.checkpoints?.autoSave) return
        try {
            const checkpointId = await this.checkpoints.saveCheckpoint(
                {
                    id: run.sessionId,
                    type: REACT_LOOP_AGENT_TYPE,
                    tenantId: run.tenantId,
                    status,
                    collectedFields: {},
                    executionState: { turn: run.turn, usage: { ...run.usage } },
                    context: { sessionId: run.sessionId },
                },
                {
                    message: { role: 'user', content: run.input },
                    result: response === undefined ? undefined : { status, text: response, metadata: { turn: run.turn } },
                    messageHistory: run.messages,
                },
            )
            await notify(this.events, log, 'checkpoint:saved', { checkpointId, agentId: run.sessionId })
        } catch (err) {
            log.error('turn checkpoint failed', { turn: run.turn, error: errorMessage(err) })
        }
    }
}
