export { AgentPool } from './pool'
export type { AgentPoolConfig, UpdateOptions } from './pool'

export { PoolEntrySchema, entryToInit, parseEntry, serializeEntry, toPoolEntry } from './entry'
export type { PoolEntry, ToEntryOptions } from './entry'

// Backends
export type { PoolBackend } from './backend'
export { MemoryPoolBackend } from './backends/memory'
export { RedisPoolBackend } from './backends/redis'
export type { RedisPoolBackendConfig } from './backends/redis'
export { SqlPoolBackend } from './backends/sql'
export type { SqlPoolBackendConfig } from './backends/sql'
