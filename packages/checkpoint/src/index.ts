export { CheckpointManager } from './manager'
export type {
    CheckpointAgentState,
    CheckpointManagerConfig,
    ReplayResult,
    RestoreFailure,
    RestoreResult,
    SaveCheckpointOptions,
} from './manager'

export { CheckpointTree } from './tree'
export type { CheckpointTreeJSON } from './tree'
export { diffCheckpoints, hasChanges } from './diff'
export type { CheckpointDiff, FieldChange } from './diff'

export {
    CheckpointResultSchema,
    CheckpointSchema,
    MESSAGE_PREVIEW_CHARS,
    MessageSchema,
    byTimestamp,
    generateCheckpointId,
    parseCheckpoint,
    serializeCheckpoint,
    toMetadata,
} from './types'
export type { Checkpoint, CheckpointMetadata, CheckpointResult } from './types'

// Storage
export { DEFAULT_LIST_LIMIT } from './storage/storage'
export type { CheckpointStorage } from './storage/storage'
export { MemoryCheckpointStorage } from './storage/memory'
export type { MemoryCheckpointStorageConfig } from './storage/memory'
export { SQLiteCheckpointStorage } from './storage/sqlite'
export type { SQLiteCheckpointStorageConfig } from './storage/sqlite'
export { SqlCheckpointStorage } from './storage/sql'
export type { SqlCheckpointStorageConfig } from './storage/sql'
