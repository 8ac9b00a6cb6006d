import { formatResetCountdown } from './utils/countdown.js'

/**
 * Base class for errors that map onto an HTTP response.
 * Rendered by the error-handling middleware as `{ error: code, message }`.
 */
export class AppError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'AppError'
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message }
  }

  headers(): Record<string, string> {
    return {}
  }
}

export type CredentialFailureReason = 'missing' | 'invalid_or_inactive'

const CREDENTIAL_MESSAGES: Record<CredentialFailureReason, string> = {
  missing: 'API key is required',
  invalid_or_inactive: 'Invalid or inactive API key',
}

export class CredentialInvalidError extends AppError {
  constructor(readonly reason: CredentialFailureReason) {
    super(403, reason, CREDENTIAL_MESSAGES[reason])
    this.name = 'CredentialInvalidError'
  }
}

export class QuotaExceededError extends AppError {
  constructor(
    readonly resetAt: Date,
    readonly resetInSeconds: number
  ) {
    super(
      429,
      'quota_exceeded',
      `Daily request limit exceeded. Try again in ${formatResetCountdown(resetInSeconds)}.`
    )
    this.name = 'QuotaExceededError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reset_in_seconds: this.resetInSeconds,
      reset_time: this.resetAt.toISOString(),
    }
  }

  override headers(): Record<string, string> {
    return { 'Retry-After': String(this.resetInSeconds) }
  }
}

export class AgentNotFoundError extends AppError {
  constructor(readonly agent: string) {
    super(404, 'agent_not_found', `Bot type not found: ${agent}`)
    this.name = 'AgentNotFoundError'
  }
}

export class DatasetUpdateFailedError extends AppError {
  constructor(readonly warnings: string[]) {
    let message = 'Failed to retrieve any valid IP data.'
    if (warnings.length > 0) {
      message += ` Errors encountered: ${warnings.join('; ')}`
    }
    super(503, 'dataset_update_failed', message)
    this.name = 'DatasetUpdateFailedError'
  }
}

export class PersistenceUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(503, 'persistence_unavailable', message, options)
    this.name = 'PersistenceUnavailableError'
  }
}
