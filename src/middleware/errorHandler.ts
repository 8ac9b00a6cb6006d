import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express'
import { AppError } from '../errors.js'

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` })
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    for (const [name, value] of Object.entries(err.headers())) {
      res.setHeader(name, value)
    }
    res.status(err.status).json(err.toJSON())
    return
  }

  console.error(`[API] Unhandled error on ${req.method} ${req.path}:`, err)
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' })
}
