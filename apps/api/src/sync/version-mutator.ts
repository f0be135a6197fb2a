import type { ZodError } from 'zod'
import { InvalidFieldError, ValidationError } from '../errors.js'
import type { ContentKindModule, KindShape } from '../content/types.js'

export interface VersionMutator<K extends KindShape> {
  /**
   * Applies one `{ field, value }` update to a copy of `item`.
   * The copy's version is `item.version + 1` and its `updatedAt` is `now()`.
   * Throws `InvalidFieldError` or `ValidationError`; `item` is never touched.
   */
  apply(item: K['item'], request: unknown): K['item']
}

function requestedField(request: unknown): string {
  if (typeof request === 'object' && request !== null && 'field' in request) {
    return String(request.field)
  }
  return ''
}

function toValidationError(error: ZodError, request: unknown) {
  const unknownField = error.issues.some((issue) => issue.code === 'invalid_union_discriminator')
  if (unknownField) {
    return new InvalidFieldError(requestedField(request))
  }
  return new ValidationError('Invalid field update.', error.flatten())
}

export function createVersionMutator<K extends KindShape>(
  module: ContentKindModule<K>,
  now: () => Date = () => new Date(),
): VersionMutator<K> {
  return {
    apply(item, request) {
      const parsed = module.fieldUpdateSchema.safeParse(request)
      if (!parsed.success) {
        throw toValidationError(parsed.error, request)
      }

      const updated = module.applyUpdate(item, parsed.data)
      return { ...updated, version: item.version + 1, updatedAt: now() }
    },
  }
}
