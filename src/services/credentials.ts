import type { CredentialFailureReason } from '../errors.js'
import type { SubscriptionTier } from '../types/subscription.js'
import type { ApiKeyStore } from './subscriptions.js'

export type CredentialValidation =
  | { ok: true; accountId: string; tier: SubscriptionTier }
  | { ok: false; reason: CredentialFailureReason }

/**
 * Resolves an API key to its account and tier.
 *
 * Every call goes to the key store: revocations made out of band must be
 * observed on the next request, so nothing is cached here.
 */
export class CredentialValidator {
  constructor(private readonly store: ApiKeyStore) {}

  async validate(token: string | undefined | null): Promise<CredentialValidation> {
    if (!token || token.trim() === '') {
      return { ok: false, reason: 'missing' }
    }

    const record = await this.store.findByToken(token)
    if (!record || !record.active) {
      return { ok: false, reason: 'invalid_or_inactive' }
    }

    return { ok: true, accountId: record.accountId, tier: record.tier }
  }
}
