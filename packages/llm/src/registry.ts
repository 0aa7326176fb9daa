import type { ModelProvider } from '@switchyard/core'

/**
 * Named model providers ("cheap", "fast", "strong", ...). Built once at
 * start-up and handed to the router and orchestrator.
 */
export class ProviderRegistry {
    private readonly providers = new Map<string, ModelProvider>()

    register(name: string, provider: ModelProvider): this {
        this.providers.set(name, provider)
        return this
    }

    get(name: string): ModelProvider | undefined {
        return this.providers.get(name)
    }

    has(name: string): boolean {
        return this.providers.has(name)
    }

    names(): string[] {
        return [...this.providers.keys()]
    }
}
