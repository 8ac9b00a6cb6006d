import { createHash, timingSafeEqual } from 'crypto'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { AppError } from '../errors.js'

export const UPDATE_SECRET_HEADER = 'x-update-secret'

const digest = (value: string): Buffer => createHash('sha256').update(value).digest()

/**
 * Guards the dataset update route with a shared secret, separate from the
 * tiered API keys.
 */
export function requireUpdateSecret(secret: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    // Without a configured secret every value is a mismatch.
    const provided = req.headers[UPDATE_SECRET_HEADER]
    if (!secret || typeof provided !== 'string' || !timingSafeEqual(digest(provided), digest(secret))) {
      next(new AppError(403, 'invalid_update_secret', 'Invalid update secret'))
      return
    }

    next()
  }
}
