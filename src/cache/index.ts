import { MemoryCache } from './memory.js'
import { RedisCache, createRedisClient } from './redis.js'
import type { CacheStore } from './types.js'

export { MemoryCache } from './memory.js'
export { RedisCache } from './redis.js'
export type { CacheHealth, CacheStore } from './types.js'

/** Redis when a URL is configured, otherwise process memory. */
export function createCache(redisUrl?: string): CacheStore {
  if (redisUrl) {
    console.log('[Cache] Using Redis cache')
    return new RedisCache(createRedisClient(redisUrl))
  }
  console.log('[Cache] REDIS_URL not configured; using in-memory cache')
  return new MemoryCache()
}

/**
 * Returns the JSON body for `key`, building it with `load` on a miss.
 * Cache failures fall through to `load`; callers never invalidate, entries
 * simply expire after `ttlSeconds`.
 */
export async function cachedJson(
  cache: CacheStore,
  key: string,
  ttlSeconds: number,
  load: () => unknown
): Promise<string> {
  try {
    const hit = await cache.get(key)
    if (hit !== null) {
      return hit
    }
  } catch (err) {
    console.warn(`[Cache] Read failed for ${key}; serving fresh data`, err)
  }

  const body = JSON.stringify(await load())

  try {
    await cache.set(key, body, ttlSeconds)
  } catch (err) {
    console.warn(`[Cache] Write failed for ${key}`, err)
  }
  return body
}
