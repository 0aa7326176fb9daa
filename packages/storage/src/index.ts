export { postgresClient, sqliteClient, toPositional } from './sql'
export type { SqlClient, SqlParam, SqlRow } from './sql'
export { redisClient } from './redis'
export type { RedisLike } from './redis'
