/**
 * switchyard — support desk example
 *
 * A ReAct assistant with one plain tool and one agent-tool. Agents are kept
 * in Redis when REDIS_URL is set (in memory otherwise) and every agent turn
 * is checkpointed to a local SQLite file.
 *
 *   OPENAI_API_KEY=... npm run example
 */

import 'dotenv/config'
import { createInterface } from 'node:readline/promises'
import { Redis } from 'ioredis'

import { AgentRegistry, BaseAgent, MiddlewarePipeline, ToolRegistry, defineTool, errorMessage } from '@switchyard/core'
import type { AgentInit, AgentReply, FieldSpec } from '@switchyard/core'
import { FallbackClient, ModelRouter, ProviderRegistry } from '@switchyard/llm'
import { AgentPool, MemoryPoolBackend, RedisPoolBackend } from '@switchyard/pool'
import type { PoolBackend } from '@switchyard/pool'
import { CheckpointManager, SQLiteCheckpointStorage } from '@switchyard/checkpoint'
import { Orchestrator } from '@switchyard/orchestrator'
import { openai } from '@switchyard/openai'
import { createConsoleLogger, createLogger } from '@switchyard/logger'
import { redisClient } from '@switchyard/storage'

const logger = createConsoleLogger({ level: process.env['LOG_LEVEL'] === 'debug' ? 'debug' : 'info' })
const apiKey = process.env['OPENAI_API_KEY'] ?? ''
const baseURL = process.env['OPENAI_BASE_URL']

// ─── 1. Models ───────────────────────────────────────────────────────────────

const strong = new FallbackClient({
    candidates: [
        { provider: 'openai', model: 'gpt-4o', client: openai({ apiKey, baseURL, model: 'gpt-4o' }) },
        { provider: 'openai', model: 'gpt-4o-mini', client: openai({ apiKey, baseURL, model: 'gpt-4o-mini' }) },
    ],
    logger,
})
const fast = openai({ apiKey, baseURL, model: 'gpt-4o-mini', name: 'openai-mini' })

const router = new ModelRouter({
    providers: new ProviderRegistry().register('fast', fast).register('strong', strong),
    logger,
})

// ─── 2. Tools ────────────────────────────────────────────────────────────────

const tools = new ToolRegistry().register(
    defineTool({
        schema: {
            name: 'order_status',
            description: 'Look up the shipping status of an order.',
            parameters: {
                type: 'object',
                properties: { order_id: { type: 'string', description: 'Order number, e.g. A-1001' } },
                required: ['order_id'],
            },
        },
        async execute({ order_id }) {
            // In production: query the order service
            return { orderId: String(order_id), status: 'shipped', eta: '2 days' }
        },
    }),
)

// ─── 3. Agents ───────────────────────────────────────────────────────────────

const REFUND_FIELDS: FieldSpec[] = [
    { name: 'order_id', type: 'string', required: true, description: 'order number' },
    { name: 'amount', type: 'number', required: true, description: 'refund amount' },
]

class RefundAgent extends BaseAgent {
    constructor(init: AgentInit) {
        super(init, { type: 'refund', fields: REFUND_FIELDS })
    }

    protected override async extractFields(message: string): Promise<Record<string, unknown>> {
        const fields: Record<string, unknown> = {}
        const order = /\b[A-Z]-\d+\b/.exec(message)
        if (order) fields['order_id'] = order[0]
        const amount = /\$(\d+(?:\.\d{1,2})?)/.exec(message)
        if (amount?.[1]) fields['amount'] = Number(amount[1])
        return fields
    }

    protected override needsApproval(): boolean {
        return true
    }

    protected async onRunning(): Promise<AgentReply> {
        const amount = Number(this.collectedFields['amount']).toFixed(2)
        return this.complete(`Refund of $${amount} issued for order ${String(this.collectedFields['order_id'])}.`)
    }
}

const agents = new AgentRegistry().register({
    type: 'refund',
    description: 'Refund all or part of an order',
    fields: REFUND_FIELDS,
    riskLevel: 'destructive',
    create: (init) => new RefundAgent(init),
})

// ─── 4. Runtime ──────────────────────────────────────────────────────────────

const redisUrl = process.env['REDIS_URL']
const backend: PoolBackend = redisUrl
    ? new RedisPoolBackend({ redis: redisClient(new Redis(redisUrl)), logger })
    : new MemoryPoolBackend()

const orchestrator = new Orchestrator({
    model: strong,
    router,
    agents,
    tools,
    pool: new AgentPool({ catalog: agents, backend, logger }),
    checkpoints: new CheckpointManager({
        storage: new SQLiteCheckpointStorage({ path: process.env['CHECKPOINT_DB'] ?? 'checkpoints.db', logger }),
        logger,
    }),
    systemPrompt: 'You are the support desk of an online shop. Be concise.',
    middleware: new MiddlewarePipeline().use(createLogger({ logger: logger.child({ component: 'lifecycle' }) })),
    logger,
})

orchestrator.events.on('tool:after', ({ name, success, durationMs }) => {
    logger.debug('tool finished', { name, success, durationMs })
})

async function main(): Promise<void> {
    await orchestrator.initialize()
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    const tenantId = process.env['TENANT_ID'] ?? 'demo'
    let sessionId: string | undefined

    try {
        for (;;) {
            const line = (await rl.question('> ')).trim()
            if (line === '' || line === 'exit') break
            const result = await orchestrator.handleMessage(tenantId, line, { sessionId })
            sessionId = result.sessionId
            console.log(result.response)
            for (const approval of result.pendingApprovals) {
                console.log(`  [${approval.riskLevel}] ${approval.actionSummary} (${approval.options.join(' / ')})`)
            }
        }
    } finally {
        rl.close()
        await orchestrator.shutdown()
    }
}

main().catch((err: unknown) => {
    logger.error('support desk crashed', { error: errorMessage(err) })
    process.exitCode = 1
})
