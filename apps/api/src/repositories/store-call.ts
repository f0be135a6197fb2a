import { AppError, ConflictError, StoreError, errorMessage } from '../errors.js'

const UNIQUE_VIOLATION = '23505'

function pgCode(error: unknown): string | null {
  let current: unknown = error
  for (let depth = 0; depth < 3; depth += 1) {
    if (typeof current !== 'object' || current === null) return null
    if ('code' in current && typeof current.code === 'string') return current.code
    current = 'cause' in current ? current.cause : null
  }
  return null
}

/**
 * Runs a relational call and maps what escapes it.
 *
 * Domain errors pass through unchanged, unique violations become
 * `ConflictError`, and everything else becomes `StoreError`.
 */
export async function storeCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (error) {
    if (error instanceof AppError) throw error
    if (pgCode(error) === UNIQUE_VIOLATION) {
      throw new ConflictError(`${operation}: record already exists.`, error)
    }
    throw new StoreError(`${operation} failed: ${errorMessage(error)}`, error)
  }
}
