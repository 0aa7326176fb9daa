import type { ToolDefinition, ToolSchema } from '../types'

/**
 * Registry of plain tools. One instance is built at start-up and injected
 * into the dispatcher; tool sources (local functions, remote bridges) all
 * register through it.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, ToolDefinition>()

    register(tool: ToolDefinition): this {
        if (this.tools.has(tool.schema.name)) {
            throw new Error(`[ToolRegistry] Tool "${tool.schema.name}" is already registered.`)
        }
        this.tools.set(tool.schema.name, tool)
        return this
    }

    unregister(name: string): boolean {
        return this.tools.delete(name)
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name)
    }

    getAll(): ToolDefinition[] {
        return [...this.tools.values()]
    }

    getSchemas(): ToolSchema[] {
        return this.getAll().map((t) => t.schema)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }
}

/**
 * Helper to define a tool with full type inference.
 *
 * @example
 * ```ts
 * const weather = defineTool({
 *     schema: {
 *         name: 'get_weather',
 *         description: 'Current weather for a city',
 *         parameters: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] },
 *     },
 *     async execute({ city }) {
 *         return `Sunny in ${String(city)}`
 *     },
 * })
 * ```
 */
export function defineTool(definition: ToolDefinition): ToolDefinition {
    return definition
}
