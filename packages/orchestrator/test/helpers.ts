import { AgentRegistry, BaseAgent, ToolRegistry, defineTool } from '@switchyard/core'
import type {
    AgentInit,
    AgentReply,
    FieldSpec,
    LogMeta,
    Logger,
    ModelProvider,
    ModelRequest,
    ModelResponse,
    TokenUsage,
    ToolCall,
} from '@switchyard/core'

// ─── Model ───────────────────────────────────────────────────────────────────

export interface ScriptedTurn {
    text?: string
    toolCalls?: ToolCall[]
    usage?: TokenUsage
}

/** Answers with `turns` in order, then repeats the last one. */
export class ScriptedModel implements ModelProvider {
    readonly requests: ModelRequest[] = []

    constructor(
        private readonly turns: (ScriptedTurn | Error)[],
        readonly name = 'scripted',
    ) {}

    async complete(request: ModelRequest): Promise<ModelResponse> {
        this.requests.push({ ...request, messages: [...request.messages] })
        const turn = this.turns[Math.min(this.requests.length, this.turns.length) - 1]
        if (turn === undefined) throw new Error(`${this.name}: no scripted turn`)
        if (turn instanceof Error) throw turn
        return {
            message: { role: 'assistant', content: turn.text ?? '' },
            toolCalls: turn.toolCalls,
            usage: turn.usage,
        }
    }
}

export function call(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
    return { id, name, arguments: args }
}

export function usage(promptTokens: number, completionTokens: number): TokenUsage {
    return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
}

// ─── Tools ───────────────────────────────────────────────────────────────────

export function tools(): ToolRegistry {
    return new ToolRegistry()
        .register(
            defineTool({
                schema: { name: 'echo', description: 'Echo text', parameters: { type: 'object' } },
                async execute(args) {
                    return `echo: ${String(args['text'])}`
                },
            }),
        )
        .register(
            defineTool({
                schema: { name: 'boom', description: 'Always fails', parameters: { type: 'object' } },
                async execute() {
                    throw new Error('kaboom')
                },
            }),
        )
        .register(
            defineTool({
                schema: { name: 'slow', description: 'Answers only once aborted', parameters: { type: 'object' } },
                execute: (_args, ctx) =>
                    new Promise((resolve) => {
                        ctx.signal.addEventListener('abort', () => resolve('too late'))
                    }),
            }),
        )
}

// ─── Agents ──────────────────────────────────────────────────────────────────

export const TABLE_FIELDS: FieldSpec[] = [
    { name: 'restaurant', type: 'string', required: true },
    { name: 'guests', type: 'number', required: true, description: 'number of guests' },
]

export interface TableOptions {
    approval?: boolean
    failWith?: string
}

/** Collects `restaurant=` and `guests=`, then books. */
export class BookTableAgent extends BaseAgent {
    constructor(
        init: AgentInit,
        private readonly options: TableOptions = {},
    ) {
        super(init, { type: 'book_table', fields: TABLE_FIELDS })
    }

    protected override async extractFields(message: string): Promise<Record<string, unknown>> {
        const fields: Record<string, unknown> = {}
        for (const [, key, value] of message.matchAll(/(restaurant|guests)=(\S+)/g)) {
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
        return this.complete(
            `Booked ${String(this.collectedFields['restaurant'])} for ${String(this.collectedFields['guests'])}`,
        )
    }
}

export function agents(options: TableOptions = {}): AgentRegistry {
    return new AgentRegistry().register({
        type: 'book_table',
        description: 'Book a restaurant table',
        fields: TABLE_FIELDS,
        create: (init) => new BookTableAgent(init, options),
    })
}

// ─── Logging ─────────────────────────────────────────────────────────────────

export interface LogRecord {
    level: 'debug' | 'info' | 'warn' | 'error'
    message: string
    meta: LogMeta
}

export function recordingLogger(records: LogRecord[] = [], bindings: LogMeta = {}): Logger & { records: LogRecord[] } {
    const push = (level: LogRecord['level']) => (message: string, meta?: LogMeta) => {
        records.push({ level, message, meta: { ...bindings, ...meta } })
    }
    return {
        records,
        debug: push('debug'),
        info: push('info'),
        warn: push('warn'),
        error: push('error'),
        child: (extra) => recordingLogger(records, { ...bindings, ...extra }),
    }
}
