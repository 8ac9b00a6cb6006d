import { CronJob } from 'cron'
import type { DatasetRefresher } from '../services/blocklist/refresher.js'

/** One scheduled run. Outcomes are logged; nothing is thrown to the scheduler. */
export async function runScheduledRefresh(refresher: DatasetRefresher): Promise<void> {
  console.log(`[RefreshSchedule] Scheduled refresh triggered at ${new Date().toISOString()}`)
  try {
    const outcome = await refresher.refresh()
    if (outcome.ok) {
      console.log(
        `[RefreshSchedule] Refresh succeeded for ${outcome.updatedAgents.join(', ')} with ${outcome.warnings.length} warnings`
      )
    } else {
      console.error(`[RefreshSchedule] Refresh failed: ${outcome.warnings.join('; ')}`)
    }
  } catch (err) {
    console.error('[RefreshSchedule] Refresh error:', err)
  }
}

export function scheduleRefresh(refresher: DatasetRefresher, cronTime: string): CronJob {
  const job = new CronJob(
    cronTime,
    () => runScheduledRefresh(refresher),
    null,
    true, // Start immediately
    'UTC'
  )
  console.log(`[RefreshSchedule] Refresh scheduled with "${cronTime}" (UTC)`)
  return job
}
