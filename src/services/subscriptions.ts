import { SubscriptionTier, type ApiKeyRecord } from '../types/subscription.js';

/** Admitted requests per account per UTC day. */
export const TIER_LIMITS: Record<SubscriptionTier, number> = {
    [SubscriptionTier.FREE]: 10,
    [SubscriptionTier.BASIC]: 100,
    [SubscriptionTier.UNLIMITED]: Number.POSITIVE_INFINITY,
};

export const limitForTier = (tier: SubscriptionTier): number => TIER_LIMITS[tier];

/**
 * Lookup contract the credential validator needs from key storage.
 * Implemented by the Postgres `ApiKeysRepository` and by the in-memory store below.
 */
export interface ApiKeyStore {
    findByToken(token: string): Promise<ApiKeyRecord | null>;
}

/**
 * Map-backed key store, used when no database is configured and in tests.
 */
export class InMemoryApiKeyStore implements ApiKeyStore {
    private apiKeys: Map<string, ApiKeyRecord> = new Map();

    constructor(seed: ApiKeyRecord[] = []) {
        for (const record of seed) {
            if (!this.apiKeys.has(record.token)) {
                this.apiKeys.set(record.token, record);
            }
        }
    }

    /**
     * Registers an API key for an account.
     * @returns The created ApiKeyRecord
     */
    public registerKey(token: string, accountId: string, tier: SubscriptionTier, active = true): ApiKeyRecord {
        const record: ApiKeyRecord = { token, accountId, tier, active };
        this.apiKeys.set(token, record);
        return record;
    }

    /**
     * Marks a key inactive. Returns false when the key is unknown.
     */
    public deactivate(token: string): boolean {
        const record = this.apiKeys.get(token);
        if (!record) {
            return false;
        }
        this.apiKeys.set(token, { ...record, active: false });
        return true;
    }

    public async findByToken(token: string): Promise<ApiKeyRecord | null> {
        return this.apiKeys.get(token) ?? null;
    }

    /**
     * Clears all data (useful for tests)
     */
    public reset() {
        this.apiKeys.clear();
    }
}
