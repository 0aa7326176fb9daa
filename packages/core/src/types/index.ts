// ─── Model Provider Types ───────────────────────────────────────────────────

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool'

export interface TextPart {
    type: 'text'
    text: string
}

export interface ImagePart {
    type: 'image_url'
    url: string
}

export type ContentPart = TextPart | ImagePart

export interface ModelMessage {
    role: MessageRole
    /** Flat text, or structured parts for multi-modal providers */
    content: string | ContentPart[]
    name?: string | undefined
    toolCallId?: string | undefined
    toolCalls?: ToolCall[] | undefined
}

export interface ToolCall {
    id: string
    name: string
    arguments: Record<string, unknown>
}

export interface ModelCallOptions {
    temperature?: number | undefined
    maxTokens?: number | undefined
}

export interface ModelRequest {
    messages: ModelMessage[]
    tools?: ToolSchema[] | undefined
    options?: ModelCallOptions | undefined
}

export interface ModelResponse {
    message: ModelMessage
    toolCalls?: ToolCall[] | undefined
    usage?: TokenUsage | undefined
    raw?: unknown
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

/**
 * The single capability the runtime needs from a language model.
 * Vendor wire formats stay behind this interface.
 */
export interface ModelProvider {
    name: string
    complete(request: ModelRequest): Promise<ModelResponse>
}

// ─── Tool Types ──────────────────────────────────────────────────────────────

export interface ToolSchema {
    name: string
    description: string
    parameters: Record<string, unknown> // JSON Schema
}

export interface ToolContext {
    tenantId: string
    callId: string
    /** Aborted when the call times out */
    signal: AbortSignal
    metadata?: Record<string, unknown> | undefined
}

export interface ToolDefinition {
    schema: ToolSchema
    execute(args: Record<string, unknown>, ctx: ToolContext): Promise<unknown>
}

// ─── Agent Types ─────────────────────────────────────────────────────────────

export type AgentStatus =
    | 'initializing'
    | 'running'
    | 'waiting_for_input'
    | 'waiting_for_approval'
    | 'paused'
    | 'completed'
    | 'error'
    | 'cancelled'

export interface AgentReply {
    status: AgentStatus
    text: string
    metadata: Record<string, unknown>
}

/** Plain, serializable view of an agent. */
export interface AgentState {
    id: string
    type: string
    tenantId: string
    status: AgentStatus
    collectedFields: Record<string, unknown>
    executionState: Record<string, unknown>
    context: Record<string, unknown>
}

export interface AgentInit {
    id?: string | undefined
    tenantId: string
    status?: AgentStatus | undefined
    collectedFields?: Record<string, unknown> | undefined
    executionState?: Record<string, unknown> | undefined
    context?: Record<string, unknown> | undefined
}

/**
 * A live, stateful agent owned by one tenant.
 */
export interface AgentInstance {
    readonly id: string
    readonly type: string
    readonly tenantId: string
    readonly status: AgentStatus
    readonly collectedFields: Record<string, unknown>
    readonly executionState: Record<string, unknown>
    readonly context: Record<string, unknown>
    reply(message: string): Promise<AgentReply>
    pause(): Promise<AgentReply>
    resume(message?: string): Promise<AgentReply>
    cancel(): Promise<AgentReply>
    /** Move to `error` from any non-terminal status */
    fail(reason: string): AgentReply
    /** Text presented to the user while waiting for approval */
    approvalPrompt(): string
    toState(): AgentState
}

export type FieldType = 'string' | 'number' | 'boolean' | 'date' | 'object' | 'array'

export interface FieldSpec {
    name: string
    type: FieldType
    required: boolean
    description?: string | undefined
}

/**
 * What persistence layers need to know about agent types:
 * the current schema version and how to rebuild an instance.
 */
export interface AgentCatalog {
    schemaVersion(type: string): number
    restore(type: string, init: AgentInit): AgentInstance | undefined
}

// ─── Middleware Types ─────────────────────────────────────────────────────────

export type MiddlewareScope =
    | 'run:before'
    | 'run:after'
    | 'turn:before'
    | 'turn:after'
    | 'tool:before'
    | 'tool:after'

export interface RunContext {
    tenantId: string
    sessionId: string
    input: string
    messages: ModelMessage[]
    turn: number
    usage: TokenUsage
    startedAt: Date
}

export interface MiddlewareContext {
    scope: MiddlewareScope
    ctx: RunContext
    /** Tool-specific context, present when scope is tool:* */
    tool?: {
        name: string
        args: Record<string, unknown>
        result?: unknown
    } | undefined
}

export type NextFn = () => Promise<void>

export interface Middleware {
    name?: string | undefined
    scope?: MiddlewareScope | MiddlewareScope[] | undefined
    run(mCtx: MiddlewareContext, next: NextFn): Promise<void>
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface CoreEventMap {
    'run:start': { tenantId: string; sessionId: string; input: string }
    'run:end': { tenantId: string; sessionId: string; turns: number; durationMs: number }
    'turn:start': { sessionId: string; turn: number }
    'model:request': { turn: number; messageCount: number; toolCount: number }
    'model:response': { turn: number; toolCallCount: number; usage?: TokenUsage | undefined }
    'tool:before': { name: string; callId: string; args: Record<string, unknown> }
    'tool:after': { name: string; callId: string; success: boolean; durationMs: number }
    'checkpoint:saved': { checkpointId: string; agentId: string }
    'approval:requested': { agentId: string; agentType: string; actionSummary: string }
    'error': { stage: string; error: unknown }
}

export type CoreEvent = keyof CoreEventMap

export type EventHandler<TPayload = unknown> = (payload: TPayload) => void | Promise<void>

// ─── Long-term Memory ─────────────────────────────────────────────────────────

export interface RecalledMemory {
    text: string
    score?: number | undefined
}

/**
 * Opaque long-term memory capability. Retrieval quality is the
 * implementation's concern; the orchestrator only searches and saves.
 */
export interface MemoryStore {
    search(tenantId: string, query: string, limit: number): Promise<RecalledMemory[]>
    save(tenantId: string, messages: ModelMessage[]): Promise<void>
}
