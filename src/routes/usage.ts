import { Router, type RequestHandler } from 'express'
import { requireAccount } from '../middleware/auth.js'
import type { QuotaLedger } from '../services/quotaLedger.js'

/**
 * GET /usage reports today's counters. The request itself passes through the
 * quota guard first, so it is included in `used_requests`.
 */
export function createUsageRouter(ledger: QuotaLedger, guards: RequestHandler[]): Router {
  const router = Router()

  router.get('/usage', ...guards, async (req, res, next) => {
    try {
      const account = requireAccount(req)
      const snapshot = await ledger.usageSnapshot(account.accountId, account.tier)

      res.json({
        tier: account.tier,
        used_requests: snapshot.used,
        remaining_requests: Number.isFinite(snapshot.remaining) ? snapshot.remaining : 'unlimited',
        reset_in_seconds: snapshot.resetInSeconds,
        reset_time: snapshot.resetAt.toISOString(),
      })
    } catch (err) {
      next(err)
    }
  })

  return router
}
