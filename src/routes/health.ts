import { Router } from 'express'
import type { CacheStore } from '../cache/index.js'

export const SERVICE_NAME = 'crawler-blocklist-api'

export function createHealthRouter(cache: CacheStore): Router {
  const router = Router()

  router.get('/', (_req, res) => {
    res.json({ status: 'healthy', service: SERVICE_NAME })
  })

  router.get('/cache', async (_req, res, next) => {
    try {
      const cacheHealth = await cache.healthCheck()
      res.json({ status: cacheHealth.ok ? 'healthy' : 'degraded', service: SERVICE_NAME, cache: cacheHealth })
    } catch (err) {
      next(err)
    }
  })

  return router
}
