import { z } from 'zod'
import type { AgentName, Dataset, RefreshSource } from '../../types/blocklist.js'
import { delay } from '../../utils/time.js'
import type { AddressRangeStore } from './addressRangeStore.js'
import type { UpstreamClient } from './upstream.js'

export const MIN_REQUEST_DELAY_MS = 1000
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000

// Every entry must carry at least one non-empty range.
const prefixEntrySchema = z.union([
  z.object({ ipv4Prefix: z.string().min(1), ipv6Prefix: z.string().min(1).optional() }),
  z.object({ ipv4Prefix: z.string().min(1).optional(), ipv6Prefix: z.string().min(1) }),
])

const prefixListSchema = z.object({
  prefixes: z.array(prefixEntrySchema),
})

export type AgentFetchResult =
  | { agent: AgentName; status: 'updated'; ranges: string[] }
  | { agent: AgentName; status: 'warning'; message: string }

export type RefreshOutcome =
  | {
      ok: true
      merged: Dataset
      warnings: string[]
      updatedAgents: AgentName[]
      /** False when every fetched list matched what was already stored. */
      changed: boolean
    }
  | { ok: false; warnings: string[] }

export interface RefresherOptions {
  requestDelayMs?: number
  timeoutMs?: number
  sleep?: (ms: number) => Promise<void>
}

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err))

const sameRanges = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((range, index) => range === b[index])

/**
 * Pulls each agent's published prefix list and merges the successful ones
 * into the address-range store.
 *
 * Agents are fetched one after another with a pause between requests. A
 * failure for one agent becomes a warning and never stops the others; an
 * empty list never replaces stored ranges. Only one run is in flight at a
 * time: a call made during a run receives that run's result.
 */
export class DatasetRefresher {
  private inFlight: Promise<RefreshOutcome> | null = null
  private readonly requestDelayMs: number
  private readonly timeoutMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly store: AddressRangeStore,
    private readonly sources: readonly RefreshSource[],
    private readonly client: UpstreamClient,
    options: RefresherOptions = {}
  ) {
    this.requestDelayMs = Math.max(MIN_REQUEST_DELAY_MS, options.requestDelayMs ?? MIN_REQUEST_DELAY_MS)
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.sleep = options.sleep ?? delay
  }

  get running(): boolean {
    return this.inFlight !== null
  }

  refresh(): Promise<RefreshOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async run(): Promise<RefreshOutcome> {
    console.log(`[DatasetRefresher] Starting refresh of ${this.sources.length} agents`)

    const current = this.store.getAll()
    const merged = this.store.getAll()
    const warnings: string[] = []
    const updatedAgents: AgentName[] = []
    let changed = false

    for (const [index, source] of this.sources.entries()) {
      if (index > 0) {
        await this.sleep(this.requestDelayMs)
      }

      const result = await this.fetchAgent(source)
      if (result.status === 'warning') {
        console.warn(`[DatasetRefresher] ${result.message}`)
        warnings.push(result.message)
        continue
      }

      merged[result.agent] = result.ranges
      updatedAgents.push(result.agent)
      if (!sameRanges(current[result.agent], result.ranges)) {
        changed = true
      }
      console.log(`[DatasetRefresher] Fetched ${result.ranges.length} ranges for ${result.agent}`)
    }

    if (updatedAgents.length === 0) {
      console.error(`[DatasetRefresher] No agent returned usable data (${warnings.length} warnings)`)
      return { ok: false, warnings }
    }

    if (changed) {
      await this.store.replace(merged)
      console.log(`[DatasetRefresher] Persisted ranges for ${updatedAgents.join(', ')}`)
    } else {
      console.log('[DatasetRefresher] Upstream ranges unchanged; nothing to persist')
    }

    return { ok: true, merged, warnings, updatedAgents, changed }
  }

  private async fetchAgent({ agent, url }: RefreshSource): Promise<AgentFetchResult> {
    let status: number
    let body: unknown
    try {
      const response = await this.client.get(url, { timeoutMs: this.timeoutMs })
      status = response.status
      body = response.data
    } catch (err) {
      return { agent, status: 'warning', message: `Request failed for ${agent}: ${describeError(err)}` }
    }

    if (status < 200 || status >= 300) {
      return { agent, status: 'warning', message: `HTTP error occurred for ${agent}: status ${status}` }
    }

    const parsed = prefixListSchema.safeParse(body)
    if (!parsed.success) {
      return { agent, status: 'warning', message: `Malformed response for ${agent}: expected a prefixes list` }
    }

    const ranges = parsed.data.prefixes.flatMap((prefix) =>
      [prefix.ipv4Prefix, prefix.ipv6Prefix].filter((range): range is string => range !== undefined)
    )
    if (ranges.length === 0) {
      return { agent, status: 'warning', message: `No IP data found for ${agent}` }
    }

    return { agent, status: 'updated', ranges }
  }
}
