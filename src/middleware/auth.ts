import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, CredentialInvalidError } from '../errors.js';
import type { CredentialValidator } from '../services/credentials.js';
import type { AccountContext } from '../types/subscription.js';

// Extend Express Request type to carry the validated account
declare global {
  namespace Express {
    interface Request {
      account?: AccountContext;
    }
  }
}

/**
 * Reads the API key from the 'x-api-key' header, falling back to
 * 'Authorization: Bearer <key>'.
 */
export function extractApiKey(req: Request): string | undefined {
  const header = req.headers['x-api-key'];
  if (typeof header === 'string' && header !== '') {
    return header;
  }

  const authorization = req.headers.authorization;
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length);
  }

  return undefined;
}

/**
 * Middleware that requires a valid, active API key.
 * Attaches the resolved account and tier to `req.account`.
 */
export function requireApiKey(validator: CredentialValidator): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const result = await validator.validate(extractApiKey(req));
      if (!result.ok) {
        next(new CredentialInvalidError(result.reason));
        return;
      }

      req.account = { accountId: result.accountId, tier: result.tier };
      next();
    } catch (err) {
      next(err);
    }
  };
}

/**
 * Account attached by `requireApiKey`. Throws when the middleware did not run.
 */
export function requireAccount(req: Request): AccountContext {
  if (!req.account) {
    throw new AppError(500, 'internal_error', 'Missing account context. Check middleware order.');
  }
  return req.account;
}
