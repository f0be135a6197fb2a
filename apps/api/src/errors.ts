/**
 * Error taxonomy shared by the sync core, the service layer and the routes.
 *
 * ELI5:
 * Every error a caller can see is an `AppError` with a stable `code` and the
 * HTTP status the routes answer with. Anything else reaching the route layer
 * is a bug and becomes a 500.
 *
 * Cache and search failures are never thrown to callers. They travel as a
 * `SyncDegradation` value inside `SyncResult`.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_FIELD'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UNKNOWN_TYPE'
  | 'STORE_ERROR'
  | 'DEPENDENCY_UNAVAILABLE'

export type HttpErrorStatus = 400 | 404 | 409 | 500 | 503

export class AppError extends Error {
  readonly code: ErrorCode
  readonly status: HttpErrorStatus
  readonly details?: unknown

  constructor(
    code: ErrorCode,
    status: HttpErrorStatus,
    message: string,
    options?: { details?: unknown; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.status = status
    this.details = options?.details
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code: 'VALIDATION_ERROR' | 'INVALID_FIELD' = 'VALIDATION_ERROR') {
    super(code, 400, message, { details })
  }
}

/** The update names a field the content kind does not expose. */
export class InvalidFieldError extends ValidationError {
  readonly field: string

  constructor(field: string) {
    super(`Field "${field}" cannot be updated.`, { field }, 'INVALID_FIELD')
    this.field = field
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', 404, `${entity} ${id} not found.`, { details: { id } })
  }
}

/** Unique violation, e.g. a second record in a single-record slot. */
export class ConflictError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFLICT', 409, message, { cause })
  }
}

/** A stored item carries a `type` its kind has no assembly rule for. */
export class UnknownTypeError extends AppError {
  readonly itemId: string
  readonly itemType: string

  constructor(kind: string, itemId: string, itemType: string) {
    super('UNKNOWN_TYPE', 500, `Unknown ${kind} question type "${itemType}" on ${itemId}.`, {
      details: { itemId, type: itemType },
    })
    this.itemId = itemId
    this.itemType = itemType
  }
}

/** Relational store failure (connection, timeout, driver error). */
export class StoreError extends AppError {
  constructor(message: string, cause: unknown) {
    super('STORE_ERROR', 503, message, { cause })
  }
}

/** A read that can only be served by the cache or search cluster while it is down. */
export class DependencyUnavailableError extends AppError {
  constructor(dependency: 'cache' | 'search', cause?: unknown) {
    super('DEPENDENCY_UNAVAILABLE', 503, `The ${dependency} service is unavailable.`, { cause })
  }
}

export type SyncTarget = 'cache' | 'search'

/**
 * A best-effort write to the cache or search index that did not land.
 * Logged and reported, never thrown.
 */
export interface SyncDegradation {
  target: SyncTarget
  operation: string
  itemId?: string
  message: string
  cause?: unknown
}

export type SyncResult = { ok: true } | { ok: false; error: SyncDegradation }

export const SYNC_OK: SyncResult = { ok: true }

export function degraded(degradation: SyncDegradation): SyncResult {
  return { ok: false, error: degradation }
}

/** One-line summary, e.g. `search upsert: socket hang up`. */
export function describeDegradation(degradation: SyncDegradation): string {
  return `${degradation.target} ${degradation.operation}: ${degradation.message}`
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
