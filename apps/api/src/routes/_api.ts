import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import { AppError, ValidationError, type HttpErrorStatus } from '../errors.js'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T, status: 200 | 201 = 200) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
    },
    status,
  )
}

export function fail(c: Context, code: string, message: string, status: HttpErrorStatus = 400, details?: unknown) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/** Maps a domain error onto the envelope, keeping its code and status. */
export function failWith(c: Context, error: AppError) {
  return fail(c, error.code, error.message, error.status, error.details)
}

/** Parsed JSON body, or a `ValidationError` when the body is not JSON. */
export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    throw new ValidationError('Request body must be valid JSON.')
  }
}
