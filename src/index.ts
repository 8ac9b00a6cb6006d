import 'dotenv/config'
import path from 'path'
import { createApp, type AppDependencies } from './app.js'
import { createCache } from './cache/index.js'
import { loadConfig, type Config } from './config/index.js'
import { createPool, initDb } from './db/index.js'
import { ApiKeysRepository, UsageRepository } from './db/repositories/index.js'
import { scheduleRefresh } from './jobs/refreshSchedule.js'
import { AddressRangeStore } from './services/blocklist/addressRangeStore.js'
import { DatasetRefresher } from './services/blocklist/refresher.js'
import { loadSourceMap } from './services/blocklist/sources.js'
import { createUpstreamClient } from './services/blocklist/upstream.js'
import { CredentialValidator } from './services/credentials.js'
import { InMemoryUsageStore, QuotaLedger, type UsageStore } from './services/quotaLedger.js'
import { InMemoryApiKeyStore, type ApiKeyStore } from './services/subscriptions.js'

interface Stores {
  keys: ApiKeyStore
  usage: UsageStore
  close: () => Promise<void>
}

async function createStores(config: Config): Promise<Stores> {
  if (config.databaseUrl) {
    const pool = createPool(config.databaseUrl)
    await initDb(pool)
    const keys = new ApiKeysRepository(pool)
    for (const record of config.seedKeys) {
      await keys.create(record)
    }
    console.log('Using Postgres for API keys and usage.')
    return {
      keys,
      usage: new UsageRepository(pool),
      close: () => pool.end(),
    }
  }

  console.warn('DATABASE_URL not set; API keys and usage are kept in memory.')
  return {
    keys: new InMemoryApiKeyStore(config.seedKeys),
    usage: new InMemoryUsageStore(),
    close: async () => {},
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const stores = await createStores(config)

  const addressRanges = new AddressRangeStore(path.resolve(config.dataFile))
  await addressRanges.load()

  const sources = await loadSourceMap(path.resolve(config.sourcesFile))
  const refresher = new DatasetRefresher(addressRanges, sources, createUpstreamClient(), {
    requestDelayMs: config.refreshDelayMs,
    timeoutMs: config.fetchTimeoutMs,
  })

  const deps: AppDependencies = {
    validator: new CredentialValidator(stores.keys),
    ledger: new QuotaLedger(stores.usage),
    addressRanges,
    refresher,
    cache: createCache(config.redisUrl),
    cacheTtlSeconds: config.cacheTtlSeconds,
    updateSecret: config.updateSecret,
  }
  if (!config.updateSecret) {
    console.warn('UPDATE_SECRET not set; /api/update-ips will refuse every request.')
  }

  const app = createApp(deps)
  const server = app.listen(config.port, () => {
    console.log(`Crawler blocklist API listening on http://localhost:${config.port}`)
  })

  const job = config.refreshCron ? scheduleRefresh(refresher, config.refreshCron) : null

  const shutdown = () => {
    job?.stop()
    server.close(() => {
      stores
        .close()
        .catch((err: unknown) => console.error('Failed to close stores:', err))
        .finally(() => process.exit(0))
    })
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

if (process.env.NODE_ENV !== 'test') {
  main().catch((err: unknown) => {
    console.error('Failed to start server:', err)
    process.exit(1)
  })
}
