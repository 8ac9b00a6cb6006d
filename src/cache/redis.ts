import { Redis } from 'ioredis'
import type { CacheHealth, CacheStore } from './types.js'

/** Commands used from an ioredis client. */
export interface RedisCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>
  ping(): Promise<string>
}

export class RedisCache implements CacheStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly prefix = 'blocklist:'
  ) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.prefix + key)
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      return
    }
    await this.redis.set(this.prefix + key, value, 'EX', ttlSeconds)
  }

  async healthCheck(): Promise<CacheHealth> {
    try {
      const reply = await this.redis.ping()
      return { backend: 'redis', ok: reply === 'PONG' }
    } catch (err) {
      console.warn('[RedisCache] Health check failed', err)
      return { backend: 'redis', ok: false }
    }
  }
}

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, { maxRetriesPerRequest: 1 })
  client.on('error', (err: Error) => {
    console.error('[RedisCache] Connection error', err.message)
  })
  return client
}
