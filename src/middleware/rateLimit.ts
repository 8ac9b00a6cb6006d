import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { QuotaExceededError } from '../errors.js';
import type { QuotaLedger } from '../services/quotaLedger.js';
import { requireAccount } from './auth.js';

/**
 * Middleware that charges the request against the account's daily quota.
 * Must be used after `requireApiKey`; it never looks at credentials itself.
 */
export const enforceQuota = (ledger: QuotaLedger): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction) => {
        try {
            const account = requireAccount(req);
            const decision = await ledger.checkAndIncrement(account.accountId, account.tier);

            if (!decision.admitted) {
                next(new QuotaExceededError(decision.resetAt, decision.resetInSeconds));
                return;
            }

            res.setHeader('X-RateLimit-Reset', Math.floor(decision.resetAt.getTime() / 1000));
            if (Number.isFinite(decision.limit)) {
                res.setHeader('X-RateLimit-Limit', decision.limit);
                if (decision.used !== null) {
                    res.setHeader('X-RateLimit-Remaining', Math.max(0, decision.limit - decision.used));
                }
            }
            if (decision.degraded) {
                res.setHeader('X-Quota-Degraded', 'true');
            }

            next();
        } catch (err) {
            next(err);
        }
    };
