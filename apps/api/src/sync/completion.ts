import type { CompletionStatus, ContentKindModule, KindShape } from '../content/types.js'

export interface CompletionEvaluator<K extends KindShape> {
  isComplete(detail: K['detail']): boolean
  statusOf(detail: K['detail']): CompletionStatus
}

/**
 * Pure completeness check over an assembled detail view.
 * A type without a rule is never complete.
 */
export function createCompletionEvaluator<K extends KindShape>(module: ContentKindModule<K>): CompletionEvaluator<K> {
  const isComplete = (detail: K['detail']) => {
    if (!Object.prototype.hasOwnProperty.call(module.completion, detail.type)) return false
    const rule = module.completion[detail.type]
    return rule ? rule(detail) : false
  }

  return {
    isComplete,
    statusOf: (detail) => (isComplete(detail) ? 'complete' : 'uncomplete'),
  }
}

export function oppositeStatus(status: CompletionStatus): CompletionStatus {
  return status === 'complete' ? 'uncomplete' : 'complete'
}
