export enum SubscriptionTier {
    FREE = 'free',
    BASIC = 'basic',
    UNLIMITED = 'unlimited',
}

export interface ApiKeyRecord {
    token: string;
    accountId: string;
    tier: SubscriptionTier;
    active: boolean;
}

/** Account resolved from a validated API key, attached to the request. */
export interface AccountContext {
    accountId: string;
    tier: SubscriptionTier;
}

export interface UsageRecord {
    accountId: string;
    usageDate: string; // UTC calendar date, YYYY-MM-DD
    requestCount: number;
}
