import { describe, it, expect, vi, beforeEach } from 'vitest'
import { SubscriptionTier } from '../types/subscription.js'
import { CredentialValidator } from './credentials.js'
import { InMemoryApiKeyStore, type ApiKeyStore } from './subscriptions.js'

describe('CredentialValidator', () => {
  let store: InMemoryApiKeyStore
  let validator: CredentialValidator

  beforeEach(() => {
    store = new InMemoryApiKeyStore()
    store.registerKey('test-basic-key', 'acct-basic', SubscriptionTier.BASIC)
    store.registerKey('test-revoked-key', 'acct-revoked', SubscriptionTier.FREE, false)
    validator = new CredentialValidator(store)
  })

  it('resolves an active key to its account and tier', async () => {
    expect(await validator.validate('test-basic-key')).toEqual({
      ok: true,
      accountId: 'acct-basic',
      tier: SubscriptionTier.BASIC,
    })
  })

  it('reports missing for absent or blank tokens', async () => {
    expect(await validator.validate(undefined)).toEqual({ ok: false, reason: 'missing' })
    expect(await validator.validate(null)).toEqual({ ok: false, reason: 'missing' })
    expect(await validator.validate('')).toEqual({ ok: false, reason: 'missing' })
    expect(await validator.validate('   ')).toEqual({ ok: false, reason: 'missing' })
  })

  it('rejects unknown and inactive keys alike', async () => {
    expect(await validator.validate('nope')).toEqual({ ok: false, reason: 'invalid_or_inactive' })
    expect(await validator.validate('test-revoked-key')).toEqual({ ok: false, reason: 'invalid_or_inactive' })
  })

  it('observes revocation on the next call', async () => {
    expect((await validator.validate('test-basic-key')).ok).toBe(true)
    store.deactivate('test-basic-key')
    expect(await validator.validate('test-basic-key')).toEqual({ ok: false, reason: 'invalid_or_inactive' })
  })

  it('does not query the store for a missing token', async () => {
    const lookup: ApiKeyStore = { findByToken: vi.fn() }
    await new CredentialValidator(lookup).validate('')
    expect(lookup.findByToken).not.toHaveBeenCalled()
  })

  it('propagates store errors', async () => {
    const lookup: ApiKeyStore = { findByToken: vi.fn().mockRejectedValue(new Error('db down')) }
    await expect(new CredentialValidator(lookup).validate('any')).rejects.toThrow('db down')
  })
})
