import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import { PersistenceUnavailableError } from '../../errors.js'
import { isFileNotFound } from '../../utils/fs.js'
import {
  KNOWN_AGENTS,
  PROVIDER_KEY,
  cloneDataset,
  emptyDataset,
  isAgentName,
  type Dataset,
} from '../../types/blocklist.js'

const datasetFileSchema = z.object({
  [PROVIDER_KEY]: z.record(z.array(z.string())),
})

/**
 * Parses the persisted dataset file. Known agents missing from the file get
 * an empty list; keys outside the known set are dropped.
 */
export function parseDatasetFile(raw: string): Dataset | null {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return null
  }

  const parsed = datasetFileSchema.safeParse(json)
  if (!parsed.success) {
    return null
  }

  const dataset = emptyDataset()
  for (const [agent, ranges] of Object.entries(parsed.data[PROVIDER_KEY])) {
    if (isAgentName(agent)) {
      dataset[agent] = [...ranges]
    }
  }
  return dataset
}

export const serializeDataset = (dataset: Dataset): string =>
  `${JSON.stringify({ [PROVIDER_KEY]: dataset }, null, 2)}\n`

/**
 * Crawler address ranges held in memory and backed by a JSON file.
 *
 * Reads are served from the current snapshot and never touch disk. `replace`
 * writes a temp file and renames it over the original before swapping the
 * snapshot, so readers and the file only ever see whole datasets.
 */
export class AddressRangeStore {
  private snapshot: Dataset = emptyDataset()

  constructor(private readonly filePath: string) {}

  async load(): Promise<Dataset> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (isFileNotFound(err)) {
        console.warn(`[AddressRangeStore] ${this.filePath} not found; starting with empty ranges`)
      } else {
        console.error(`[AddressRangeStore] Failed to read ${this.filePath}; starting with empty ranges`, err)
      }
      this.snapshot = emptyDataset()
      return this.getAll()
    }

    const dataset = parseDatasetFile(raw)
    if (!dataset) {
      console.error(`[AddressRangeStore] ${this.filePath} is not a valid dataset; starting with empty ranges`)
      this.snapshot = emptyDataset()
      return this.getAll()
    }

    this.snapshot = dataset
    const total = KNOWN_AGENTS.reduce((sum, agent) => sum + dataset[agent].length, 0)
    console.log(`[AddressRangeStore] Loaded ${total} ranges for ${KNOWN_AGENTS.length} agents`)
    return this.getAll()
  }

  getAll(): Dataset {
    return cloneDataset(this.snapshot)
  }

  /** Ranges for one agent, or null when the agent is not tracked at all. */
  getAgent(name: string): string[] | null {
    if (!isAgentName(name)) {
      return null
    }
    return [...this.snapshot[name]]
  }

  async replace(dataset: Dataset): Promise<void> {
    const next = cloneDataset(dataset)
    const tempPath = `${this.filePath}.${process.pid}.tmp`

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(tempPath, serializeDataset(next), 'utf-8')
      await fs.rename(tempPath, this.filePath)
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.error(`[AddressRangeStore] Failed to remove ${tempPath}`, cleanupErr)
      })
      throw new PersistenceUnavailableError('Failed to persist address ranges', { cause: err })
    }

    this.snapshot = next
  }
}
