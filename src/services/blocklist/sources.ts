import { promises as fs } from 'fs'
import { z } from 'zod'
import { PROVIDER_KEY, isAgentName, type RefreshSource } from '../../types/blocklist.js'
import { isFileNotFound } from '../../utils/fs.js'

const sourceFileSchema = z.object({
  [PROVIDER_KEY]: z.record(z.string().url()),
})

/**
 * Reads the agent → upstream URL map. A missing file yields no sources;
 * a malformed one is a startup error.
 */
export async function loadSourceMap(filePath: string): Promise<RefreshSource[]> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isFileNotFound(err)) {
      console.warn(`[Sources] ${filePath} not found; refresh has no upstream sources`)
      return []
    }
    throw err
  }

  const parsed = sourceFileSchema.safeParse(JSON.parse(raw))
  if (!parsed.success) {
    throw new Error(`Invalid source map in ${filePath}: ${parsed.error.message}`)
  }

  const sources: RefreshSource[] = []
  for (const [agent, url] of Object.entries(parsed.data[PROVIDER_KEY])) {
    if (isAgentName(agent)) {
      sources.push({ agent, url })
    } else {
      console.warn(`[Sources] Ignoring unknown agent "${agent}" in ${filePath}`)
    }
  }
  return sources
}
