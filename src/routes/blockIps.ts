import { Router, type RequestHandler } from 'express'
import { cachedJson, type CacheStore } from '../cache/index.js'
import { AgentNotFoundError } from '../errors.js'
import type { AddressRangeStore } from '../services/blocklist/addressRangeStore.js'
import { PROVIDER_KEY } from '../types/blocklist.js'

export interface BlockIpsRouterOptions {
  store: AddressRangeStore
  cache: CacheStore
  cacheTtlSeconds: number
  /** Credential and quota middleware, applied in order before every route. */
  guards: RequestHandler[]
}

/**
 * Read routes for crawler address ranges. Responses are cached for
 * `cacheTtlSeconds`; the guards still run on every request, so cached
 * responses are charged against quota like fresh ones.
 */
export function createBlockIpsRouter({ store, cache, cacheTtlSeconds, guards }: BlockIpsRouterOptions): Router {
  const router = Router()

  router.get('/block-ips', ...guards, async (_req, res, next) => {
    try {
      const body = await cachedJson(cache, 'block-ips:all', cacheTtlSeconds, () => ({
        [PROVIDER_KEY]: store.getAll(),
      }))
      res.type('application/json').send(body)
    } catch (err) {
      next(err)
    }
  })

  router.get('/block-ips/:agent', ...guards, async (req, res, next) => {
    const { agent } = req.params
    try {
      const body = await cachedJson(cache, `block-ips:agent:${agent}`, cacheTtlSeconds, () => {
        const ranges = store.getAgent(agent)
        if (ranges === null) {
          throw new AgentNotFoundError(agent)
        }
        return { [agent]: ranges }
      })
      res.type('application/json').send(body)
    } catch (err) {
      next(err)
    }
  })

  return router
}
