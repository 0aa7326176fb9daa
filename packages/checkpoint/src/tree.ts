import { byTimestamp, toMetadata } from './types'
import type { Checkpoint, CheckpointMetadata } from './types'

export interface CheckpointTreeJSON {
    rootId: string
    nodes: Record<string, CheckpointMetadata>
    children: Record<string, string[]>
}

/**
 * CheckpointTree — derived view of an agent's checkpoints linked by
 * `parentCheckpointId`. Never persisted; rebuild it from storage whenever
 * it is needed.
 *
 * @example
 * ```ts
 * const tree = await manager.getCheckpointTree(agentId)
 * tree?.pathToRoot(leafId) // [leafId, ..., tree.rootId]
 * ```
 */
export class CheckpointTree {
    readonly nodes = new Map<string, CheckpointMetadata>()
    readonly children = new Map<string, string[]>()

    constructor(readonly rootId: string) {}

    /**
     * Build a tree from one agent's checkpoints. The oldest checkpoint is the
     * root; returns `undefined` for an empty list.
     */
    static fromCheckpoints(checkpoints: readonly Checkpoint[]): CheckpointTree | undefined {
        const ordered = [...checkpoints].sort(byTimestamp)
        const root = ordered[0]
        if (!root) return undefined

        const tree = new CheckpointTree(root.id)
        for (const checkpoint of ordered) tree.add(checkpoint)
        return tree
    }

    add(checkpoint: Checkpoint): void {
        this.nodes.set(checkpoint.id, toMetadata(checkpoint))
        const parent = checkpoint.parentCheckpointId
        if (!parent) return
        const siblings = this.children.get(parent) ?? []
        siblings.push(checkpoint.id)
        this.children.set(parent, siblings)
    }

    /**
     * Ids from `checkpointId` up to its root, leaf first. Stops at the first
     * ancestor missing from the tree; empty for an unknown id.
     */
    pathToRoot(checkpointId: string): string[] {
        const path: string[] = []
        const seen = new Set<string>()
        let current: string | undefined = checkpointId
        while (current !== undefined && !seen.has(current)) {
            const node = this.nodes.get(current)
            if (!node) break
            path.push(current)
            seen.add(current)
            current = node.parentCheckpointId
        }
        return path
    }

    /** Direct children of a checkpoint. */
    branches(checkpointId: string): string[] {
        return [...(this.children.get(checkpointId) ?? [])]
    }

    leafNodes(): string[] {
        return [...this.nodes.keys()].filter((id) => !this.children.has(id))
    }

    /** `0` for the root, `-1` for an unknown id. */
    depth(checkpointId: string): number {
        return this.pathToRoot(checkpointId).length - 1
    }

    get size(): number {
        return this.nodes.size
    }

    toJSON(): CheckpointTreeJSON {
        return {
            rootId: this.rootId,
            nodes: Object.fromEntries(this.nodes),
            children: Object.fromEntries([...this.children].map(([id, kids]) => [id, [...kids]])),
        }
    }
}
