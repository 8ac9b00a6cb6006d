import { Router } from 'express'
import { DatasetUpdateFailedError } from '../errors.js'
import { requireUpdateSecret } from '../middleware/updateSecret.js'
import type { DatasetRefresher } from '../services/blocklist/refresher.js'

export function createUpdateIpsRouter(refresher: DatasetRefresher, updateSecret: string | undefined): Router {
  const router = Router()

  router.get('/update-ips', requireUpdateSecret(updateSecret), async (_req, res, next) => {
    try {
      const outcome = await refresher.refresh()
      if (!outcome.ok) {
        throw new DatasetUpdateFailedError(outcome.warnings)
      }

      const partial = outcome.warnings.length > 0
      res.json({
        message: partial
          ? 'IP data update completed with partial success'
          : 'IP data update completed',
        data: outcome.merged,
        updated: outcome.changed,
        updated_agents: outcome.updatedAgents,
        ...(partial ? { warnings: outcome.warnings } : {}),
      })
    } catch (err) {
      next(err)
    }
  })

  return router
}
