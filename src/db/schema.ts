import type { Queryable } from './repositories/queryable.js'

const CREATE_TABLE_STATEMENTS = [
  `
  CREATE TABLE IF NOT EXISTS api_keys (
    token TEXT PRIMARY KEY,
    account_id TEXT NOT NULL,
    tier TEXT NOT NULL CHECK (tier IN ('free', 'basic', 'unlimited')),
    active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT api_keys_token_nonempty CHECK (length(trim(token)) > 0)
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS api_usage (
    account_id TEXT NOT NULL,
    usage_date DATE NOT NULL,
    request_count INTEGER NOT NULL DEFAULT 0 CHECK (request_count >= 0),
    PRIMARY KEY (account_id, usage_date)
  )
  `,
  `CREATE INDEX IF NOT EXISTS api_keys_account_id_idx ON api_keys (account_id)`,
] as const

export async function createSchema(db: Queryable): Promise<void> {
  for (const statement of CREATE_TABLE_STATEMENTS) {
    await db.query(statement)
  }
}
