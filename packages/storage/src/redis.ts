import type { Redis } from 'ioredis'

/**
 * Redis commands used by the TTL pool backend. Narrow enough that tests can
 * provide an in-process stand-in.
 */
export interface RedisLike {
    get(key: string): Promise<string | null>
    setex(key: string, seconds: number, value: string): Promise<unknown>
    del(keys: string[]): Promise<number>
    sadd(key: string, members: string[]): Promise<number>
    srem(key: string, members: string[]): Promise<number>
    smembers(key: string): Promise<string[]>
    scard(key: string): Promise<number>
    expire(key: string, seconds: number): Promise<number>
    quit(): Promise<unknown>
}

/**
 * Adapt an ioredis connection.
 *
 * @example
 * ```ts
 * import { Redis } from 'ioredis'
 * const redis = redisClient(new Redis(process.env.REDIS_URL ?? 'redis://localhost:6379'))
 * ```
 */
export function redisClient(redis: Redis): RedisLike {
    return {
        get: (key) => redis.get(key),
        setex: (key, seconds, value) => redis.setex(key, seconds, value),
        del: async (keys) => (keys.length ? redis.del(...keys) : 0),
        sadd: async (key, members) => (members.length ? redis.sadd(key, ...members) : 0),
        srem: async (key, members) => (members.length ? redis.srem(key, ...members) : 0),
        smembers: (key) => redis.smembers(key),
        scard: (key) => redis.scard(key),
        expire: (key, seconds) => redis.expire(key, seconds),
        quit: () => redis.quit(),
    }
}
