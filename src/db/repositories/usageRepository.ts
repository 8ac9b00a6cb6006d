import type { UsageStore } from '../../services/quotaLedger.js'
import type { UsageRecord } from '../../types/subscription.js'
import type { Queryable } from './queryable.js'

type UsageRow = {
  account_id: string
  usage_date: string
  request_count: number
}

const mapUsage = (row: UsageRow): UsageRecord => ({
  accountId: row.account_id,
  usageDate: row.usage_date,
  requestCount: Number(row.request_count),
})

// usage_date is read back as text so the driver does not shift it into local time.
const USAGE_COLUMNS = 'account_id, usage_date::text AS usage_date, request_count'

/**
 * Daily usage rows. `create` and `increment` are single statements, so they
 * stay atomic when several API processes share the database.
 */
export class UsageRepository implements UsageStore {
  constructor(private readonly db: Queryable) {}

  async find(accountId: string, usageDate: string): Promise<UsageRecord | null> {
    const result = await this.db.query<UsageRow>(
      `
      SELECT ${USAGE_COLUMNS}
      FROM api_usage
      WHERE account_id = $1 AND usage_date = $2
      `,
      [accountId, usageDate]
    )

    return result.rows[0] ? mapUsage(result.rows[0]) : null
  }

  async create(accountId: string, usageDate: string): Promise<boolean> {
    const result = await this.db.query(
      `
      INSERT INTO api_usage (account_id, usage_date, request_count)
      VALUES ($1, $2, 1)
      ON CONFLICT (account_id, usage_date) DO NOTHING
      `,
      [accountId, usageDate]
    )

    return (result.rowCount ?? 0) > 0
  }

  async increment(
    accountId: string,
    usageDate: string,
    limit: number | null
  ): Promise<UsageRecord | null> {
    const result = await this.db.query<UsageRow>(
      `
      UPDATE api_usage
      SET request_count = request_count + 1
      WHERE account_id = $1
        AND usage_date = $2
        AND ($3::integer IS NULL OR request_count < $3::integer)
      RETURNING ${USAGE_COLUMNS}
      `,
      [accountId, usageDate, limit]
    )

    return result.rows[0] ? mapUsage(result.rows[0]) : null
  }
}
