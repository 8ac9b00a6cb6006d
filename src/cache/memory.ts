import type { CacheHealth, CacheStore } from './types.js'

interface Entry {
  value: string
  expiresAt: number
}

export class MemoryCache implements CacheStore {
  private readonly entries = new Map<string, Entry>()

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key)
    if (!entry) {
      return null
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return null
    }
    return entry.value
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      return
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 })
  }

  async healthCheck(): Promise<CacheHealth> {
    return { backend: 'memory', ok: true }
  }

  get size(): number {
    return this.entries.size
  }
}
