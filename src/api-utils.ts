// Shared API utilities for the Google Calendar client and feed fetching.
// Retry logic for rate limit / transient server errors, and the tagged
// error classes used across the engine.
//
// Error handling follows the errore pattern (errors as values):
// - Clients and the store return error instances instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy

import * as errore from 'errore'

/** Retry for rate limit (429, 403 quota) and transient 5xx errors.
 *  Exponential backoff starting at delayMs. */
export async function withRetry<T>(fn: () => Promise<T>, maxAttempts = 5, delayMs = 1000): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isRetryableError(err) || attempt === maxAttempts) throw err
      const wait = delayMs * Math.pow(2, attempt - 1)
      await new Promise((r) => setTimeout(r, wait))
    }
  }
  throw new Error('unreachable')
}

// ---------------------------------------------------------------------------
// Tagged errors (errore pattern: errors as values, not exceptions)
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, etc.). */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $account: $reason',
}) {}

/** Returned when a requested resource doesn't exist (calendar, token file). */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** The feed (file or URL) or the directory listing could not be read. Run-fatal. */
export class SourceUnavailableError extends errore.createTaggedError({
  name: 'SourceUnavailableError',
  message: 'Source $source is unavailable: $reason',
}) {}

/** Returned when data cannot be parsed (iCal document, JSON payloads). */
export class ParseError extends errore.createTaggedError({
  name: 'ParseError',
  message: 'Failed to parse $what: $reason',
}) {}

/** Returned when user input or configuration fails validation. */
export class ValidationError extends errore.createTaggedError({
  name: 'ValidationError',
  message: 'Invalid $field: $reason',
}) {}

/** A calendar store call failed (transport, API or timeout). */
export class StoreError extends errore.createTaggedError({
  name: 'StoreError',
  message: 'Calendar store $operation failed: $reason',
}) {}

/** Zero or several remote candidates where exactly one was required. */
export class AmbiguousMatchError extends errore.createTaggedError({
  name: 'AmbiguousMatchError',
  message: 'Expected exactly one $what for $identity, found $count',
}) {}

/** A write went through but the store still disagrees with the desired state. */
export class VerificationMismatchError extends errore.createTaggedError({
  name: 'VerificationMismatchError',
  message: 'Event $identity does not match after $operation: $diff',
}) {}

/** A feed item that cannot be mapped to an event (e.g. no time window). */
export class UnsupportedItemError extends errore.createTaggedError({
  name: 'UnsupportedItemError',
  message: 'Unsupported item $identity: $reason',
}) {}

// ---------------------------------------------------------------------------
// Status detection on untyped library errors
// ---------------------------------------------------------------------------

/** Read a property off an untyped library error without trusting its shape. */
function prop(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  const result: unknown = Reflect.get(value, key)
  return result
}

/** HTTP status carried by a gaxios / googleapis error, if any. */
export function errorStatus(err: unknown): number | undefined {
  const status = prop(prop(err, 'response'), 'status') ?? prop(err, 'status') ?? prop(err, 'code')
  if (typeof status === 'number') return status
  if (typeof status === 'string' && /^\d{3}$/.test(status)) return Number(status)
  return undefined
}

function errorReasons(err: unknown): string[] {
  const errors = prop(err, 'errors') ?? prop(prop(prop(prop(err, 'response'), 'data'), 'error'), 'errors') ?? []
  if (!Array.isArray(errors)) return []
  return errors.flatMap((item: unknown) => {
    const reason = prop(item, 'reason')
    return typeof reason === 'string' ? [reason] : []
  })
}

const RATE_LIMIT_REASONS = [
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
]

export function isRateLimitError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 429) return true
  if (status === 403) {
    return errorReasons(err).some((reason) => RATE_LIMIT_REASONS.includes(reason))
  }
  return false
}

export function isRetryableError(err: unknown): boolean {
  if (isRateLimitError(err)) return true
  const status = errorStatus(err)
  return status !== undefined && status >= 500 && status < 600
}

/** 404 Not Found / 410 Gone: the resource was already deleted. */
export function isGoneError(err: unknown): boolean {
  const status = errorStatus(err)
  return status === 404 || status === 410
}

/** Detect auth-like errors from googleapis / google-auth-library errors.
 *  Used at the client boundary to decide whether to return an AuthError. */
export function isAuthLikeError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid Credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}
