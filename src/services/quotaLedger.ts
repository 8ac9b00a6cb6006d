import { PersistenceUnavailableError } from '../errors.js'
import type { SubscriptionTier, UsageRecord } from '../types/subscription.js'
import { KeyedMutex } from '../utils/keyedMutex.js'
import { nextUtcMidnight, secondsUntil, utcDateKey } from '../utils/time.js'
import { limitForTier } from './subscriptions.js'

/**
 * Persistence contract for daily usage rows, one per (account, UTC date).
 */
export interface UsageStore {
  find(accountId: string, usageDate: string): Promise<UsageRecord | null>
  /** Inserts the day's row with a count of 1. Resolves false if the row already exists. */
  create(accountId: string, usageDate: string): Promise<boolean>
  /**
   * Adds one to the day's count while it is below `limit` (`null` = no limit).
   * Resolves null when the row is missing or already at the limit.
   */
  increment(accountId: string, usageDate: string, limit: number | null): Promise<UsageRecord | null>
}

export interface QuotaDecision {
  admitted: boolean
  resetAt: Date
  resetInSeconds: number
  limit: number
  /** Count after this call, or null when the store could not be reached. */
  used: number | null
  /** True when the store failed and the request was admitted without being counted. */
  degraded: boolean
}

export interface UsageSnapshot {
  used: number
  remaining: number
  limit: number
  resetAt: Date
  resetInSeconds: number
}

/**
 * Per-account daily request quota.
 *
 * The read-modify-write on a (account, date) row runs under a keyed mutex,
 * so concurrent requests in this process never both create the row or lose
 * an increment. Stores shared between processes must make `create` and
 * `increment` atomic on their side (the Postgres store does).
 */
export class QuotaLedger {
  private readonly mutex = new KeyedMutex()

  constructor(
    private readonly store: UsageStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async checkAndIncrement(accountId: string, tier: SubscriptionTier): Promise<QuotaDecision> {
    const now = this.clock()
    const usageDate = utcDateKey(now)
    const resetAt = nextUtcMidnight(now)
    const resetInSeconds = secondsUntil(now, resetAt)
    const limit = limitForTier(tier)

    const decide = (admitted: boolean, used: number | null, degraded = false): QuotaDecision => ({
      admitted,
      resetAt,
      resetInSeconds,
      limit,
      used,
      degraded,
    })

    try {
      return await this.mutex.runExclusive(`${accountId}:${usageDate}`, async () => {
        const existing = await this.store.find(accountId, usageDate)

        if (!existing && (await this.store.create(accountId, usageDate))) {
          return decide(true, 1)
        }

        if (existing && existing.requestCount + 1 > limit) {
          return decide(false, existing.requestCount)
        }

        const updated = await this.store.increment(
          accountId,
          usageDate,
          Number.isFinite(limit) ? limit : null
        )
        return updated ? decide(true, updated.requestCount) : decide(false, limit)
      })
    } catch (err) {
      console.warn(
        `[QuotaLedger] Usage store unavailable; admitting request for ${accountId} uncounted (degraded mode)`,
        err
      )
      return decide(true, null, true)
    }
  }

  /** Read-only view of today's usage. Never mutates the store. */
  async usageSnapshot(accountId: string, tier: SubscriptionTier): Promise<UsageSnapshot> {
    const now = this.clock()
    const resetAt = nextUtcMidnight(now)
    const limit = limitForTier(tier)

    let record: UsageRecord | null
    try {
      record = await this.store.find(accountId, utcDateKey(now))
    } catch (err) {
      throw new PersistenceUnavailableError('Usage data is temporarily unavailable', { cause: err })
    }

    const used = record?.requestCount ?? 0
    return {
      used,
      remaining: Math.max(0, limit - used),
      limit,
      resetAt,
      resetInSeconds: secondsUntil(now, resetAt),
    }
  }
}

/**
 * Map-backed usage store for single-process deployments and tests.
 */
export class InMemoryUsageStore implements UsageStore {
  private readonly records = new Map<string, UsageRecord>()

  private static key(accountId: string, usageDate: string): string {
    return `${accountId}:${usageDate}`
  }

  async find(accountId: string, usageDate: string): Promise<UsageRecord | null> {
    const record = this.records.get(InMemoryUsageStore.key(accountId, usageDate))
    return record ? { ...record } : null
  }

  async create(accountId: string, usageDate: string): Promise<boolean> {
    const key = InMemoryUsageStore.key(accountId, usageDate)
    if (this.records.has(key)) {
      return false
    }
    this.records.set(key, { accountId, usageDate, requestCount: 1 })
    return true
  }

  async increment(accountId: string, usageDate: string, limit: number | null): Promise<UsageRecord | null> {
    const record = this.records.get(InMemoryUsageStore.key(accountId, usageDate))
    if (!record || (limit !== null && record.requestCount >= limit)) {
      return null
    }
    record.requestCount += 1
    return { ...record }
  }

  get size(): number {
    return this.records.size
  }
}
