import type { ApiKeyStore } from '../../services/subscriptions.js'
import type { ApiKeyRecord, SubscriptionTier } from '../../types/subscription.js'
import type { Queryable } from './queryable.js'

export interface CreateApiKeyInput {
  token: string
  accountId: string
  tier: SubscriptionTier
  active?: boolean
}

type ApiKeyRow = {
  token: string
  account_id: string
  tier: SubscriptionTier
  active: boolean
}

const mapApiKey = (row: ApiKeyRow): ApiKeyRecord => ({
  token: row.token,
  accountId: row.account_id,
  tier: row.tier,
  active: row.active,
})

export class ApiKeysRepository implements ApiKeyStore {
  constructor(private readonly db: Queryable) {}

  /** Inserts a key unless the token already exists. Returns null when it did. */
  async create(input: CreateApiKeyInput): Promise<ApiKeyRecord | null> {
    const result = await this.db.query<ApiKeyRow>(
      `
      INSERT INTO api_keys (token, account_id, tier, active)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (token) DO NOTHING
      RETURNING token, account_id, tier, active
      `,
      [input.token, input.accountId, input.tier, input.active ?? true]
    )

    return result.rows[0] ? mapApiKey(result.rows[0]) : null
  }

  async findByToken(token: string): Promise<ApiKeyRecord | null> {
    const result = await this.db.query<ApiKeyRow>(
      `
      SELECT token, account_id, tier, active
      FROM api_keys
      WHERE token = $1
      ORDER BY created_at ASC
      LIMIT 1
      `,
      [token]
    )

    return result.rows[0] ? mapApiKey(result.rows[0]) : null
  }
}
