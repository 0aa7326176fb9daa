import type { CoreEvent, CoreEventMap, EventHandler } from '../types'

type HandlerTable = { [K in CoreEvent]: EventHandler<CoreEventMap[K]>[] }

function emptyTable(): HandlerTable {
    return {
        'run:start': [],
        'run:end': [],
        'turn:start': [],
        'model:request': [],
        'model:response': [],
        'tool:before': [],
        'tool:after': [],
        'checkpoint:saved': [],
        'approval:requested': [],
        error: [],
    }
}

/**
 * Lightweight typed event emitter shared by the engine and orchestrator.
 * `emit` awaits every handler, so a slow listener slows the loop.
 */
export class EventEmitter {
    // Lists are mutated in place; indexing by a generic event keeps the handler type.
    private readonly handlers = emptyTable()

    on<K extends CoreEvent>(event: K, handler: EventHandler<CoreEventMap[K]>): this {
        this.handlers[event].push(handler)
        return this
    }

    off<K extends CoreEvent>(event: K, handler: EventHandler<CoreEventMap[K]>): this {
        const list = this.handlers[event]
        const index = list.indexOf(handler)
        if (index !== -1) list.splice(index, 1)
        return this
    }

    listenerCount(event: CoreEvent): number {
        return this.handlers[event].length
    }

    async emit<K extends CoreEvent>(event: K, payload: CoreEventMap[K]): Promise<void> {
        const list = [...this.handlers[event]]
        await Promise.all(list.map((h) => h(payload)))
    }
}
