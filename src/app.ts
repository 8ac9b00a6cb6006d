import express, { type Express } from 'express'
import type { CacheStore } from './cache/index.js'
import { requireApiKey } from './middleware/auth.js'
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js'
import { enforceQuota } from './middleware/rateLimit.js'
import { createBlockIpsRouter } from './routes/blockIps.js'
import { createHealthRouter } from './routes/health.js'
import { createUpdateIpsRouter } from './routes/updateIps.js'
import { createUsageRouter } from './routes/usage.js'
import type { AddressRangeStore } from './services/blocklist/addressRangeStore.js'
import type { DatasetRefresher } from './services/blocklist/refresher.js'
import type { CredentialValidator } from './services/credentials.js'
import type { QuotaLedger } from './services/quotaLedger.js'

export interface AppDependencies {
  validator: CredentialValidator
  ledger: QuotaLedger
  addressRanges: AddressRangeStore
  refresher: DatasetRefresher
  cache: CacheStore
  cacheTtlSeconds: number
  updateSecret?: string
}

export function createApp(deps: AppDependencies): Express {
  const app = express()

  // Credential validation runs first and hands the account to the quota guard.
  const guards = [requireApiKey(deps.validator), enforceQuota(deps.ledger)]

  // ── Health ────────────────────────────────────────────────────────────────────
  app.use('/api/health', createHealthRouter(deps.cache))

  // ── Address ranges ────────────────────────────────────────────────────────────
  app.use(
    '/api',
    createBlockIpsRouter({
      store: deps.addressRanges,
      cache: deps.cache,
      cacheTtlSeconds: deps.cacheTtlSeconds,
      guards,
    })
  )
  app.use('/api', createUpdateIpsRouter(deps.refresher, deps.updateSecret))

  // ── Usage ─────────────────────────────────────────────────────────────────────
  app.use('/api', createUsageRouter(deps.ledger, guards))

  app.use(notFoundHandler)
  app.use(errorHandler)

  return app
}
