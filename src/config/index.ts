import { z } from 'zod'
import { SubscriptionTier, type ApiKeyRecord } from '../types/subscription.js'

const seedKeySchema = z.object({
  token: z.string().min(1),
  accountId: z.string().min(1),
  tier: z.nativeEnum(SubscriptionTier),
  active: z.boolean().default(true),
})

const seedKeysSchema = z
  .string()
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw)
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'API_KEYS_SEED must be valid JSON' })
      return z.NEVER
    }
  })
  .pipe(z.array(seedKeySchema))

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined))

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: optionalString,
  REDIS_URL: optionalString,
  UPDATE_SECRET: optionalString,
  DATA_FILE: z.string().min(1).default('data/block_ips.json'),
  SOURCES_FILE: z.string().min(1).default('config/crawler-sources.json'),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(0).max(3600).default(3600),
  REFRESH_CRON: optionalString,
  REFRESH_DELAY_MS: z.coerce.number().int().min(1000).default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  API_KEYS_SEED: seedKeysSchema.optional(),
})

export interface Config {
  port: number
  databaseUrl?: string
  redisUrl?: string
  updateSecret?: string
  dataFile: string
  sourcesFile: string
  cacheTtlSeconds: number
  refreshCron?: string
  refreshDelayMs: number
  fetchTimeoutMs: number
  seedKeys: ApiKeyRecord[]
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }

  const values = parsed.data
  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    redisUrl: values.REDIS_URL,
    updateSecret: values.UPDATE_SECRET,
    dataFile: values.DATA_FILE,
    sourcesFile: values.SOURCES_FILE,
    cacheTtlSeconds: values.CACHE_TTL_SECONDS,
    refreshCron: values.REFRESH_CRON,
    refreshDelayMs: values.REFRESH_DELAY_MS,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    seedKeys: values.API_KEYS_SEED ?? [],
  }
}
