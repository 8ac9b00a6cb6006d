export interface CacheHealth {
  backend: 'memory' | 'redis'
  ok: boolean
}

/** String-valued cache with per-entry expiry. */
export interface CacheStore {
  get(key: string): Promise<string | null>
  /** A ttl of zero or less stores nothing. */
  set(key: string, value: string, ttlSeconds: number): Promise<void>
  healthCheck(): Promise<CacheHealth>
}
