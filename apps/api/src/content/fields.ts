import { z } from 'zod'
import type { ContentItemBase, ItemView, SearchFieldMapping } from './types.js'

/**
 * Field rules shared by every content kind, plus the helpers kind modules
 * compose their schemas, updates and views from.
 */

export const LIMITS = {
  topicLength: 100,
  instructionLength: 1000,
  imageUrls: 10,
  minMaxTime: 30,
  maxMaxTime: 3600,
  audioUrls: 10,
  transcriptLength: 5000,
  titleLength: 200,
  passages: 10,
  passageLength: 5000,
  shortText: 500,
  explainText: 1000,
  longText: 5000,
  /** The `version` column is a Postgres `integer`. */
  maxVersion: 2_147_483_647,
} as const

/** Absolute URL with scheme and host. */
export const absoluteUrlSchema = z
  .string()
  .trim()
  .refine((value) => {
    try {
      const url = new URL(value)
      return url.protocol.length > 1 && url.host.length > 0
    } catch {
      return false
    }
  }, 'Must be an absolute URL with scheme and host.')

export const boundedText = (max: number) => z.string().trim().min(1).max(max)

export const topicSchema = z.array(boundedText(LIMITS.topicLength)).min(1)
export const instructionSchema = boundedText(LIMITS.instructionLength)
export const imageUrlsSchema = z.array(absoluteUrlSchema).max(LIMITS.imageUrls)
export const maxTimeSchema = z.number().int().min(LIMITS.minMaxTime).max(LIMITS.maxMaxTime)

export const shortTextSchema = boundedText(LIMITS.shortText)
export const explainSchema = boundedText(LIMITS.explainText)
export const longTextSchema = boundedText(LIMITS.longText)

/** Parent fields every create request carries. `type` is checked per kind. */
export function createBaseShape<T extends readonly [string, ...string[]]>(questionTypes: T) {
  return {
    type: z.enum(questionTypes),
    topic: topicSchema,
    instruction: instructionSchema,
    imageUrls: imageUrlsSchema.default([]),
    maxTime: maxTimeSchema,
  }
}

export const topicUpdate = z.object({ field: z.literal('topic'), value: topicSchema })
export const instructionUpdate = z.object({ field: z.literal('instruction'), value: instructionSchema })
export const imageUrlsUpdate = z.object({ field: z.literal('image_urls'), value: imageUrlsSchema })
export const maxTimeUpdate = z.object({ field: z.literal('max_time'), value: maxTimeSchema })

export const baseFieldUpdates = [topicUpdate, instructionUpdate, imageUrlsUpdate, maxTimeUpdate] as const

export type BaseFieldUpdate =
  | z.infer<typeof topicUpdate>
  | z.infer<typeof instructionUpdate>
  | z.infer<typeof imageUrlsUpdate>
  | z.infer<typeof maxTimeUpdate>

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}

export function applyBaseFieldUpdate<T extends ContentItemBase>(item: T, update: BaseFieldUpdate): T {
  switch (update.field) {
    case 'topic':
      return { ...item, topic: update.value }
    case 'instruction':
      return { ...item, instruction: update.value }
    case 'image_urls':
      return { ...item, imageUrls: update.value }
    case 'max_time':
      return { ...item, maxTime: update.value }
    default:
      return assertNever(update)
  }
}

export function toItemView<T extends ContentItemBase>(item: T): ItemView<T> {
  const { createdAt, updatedAt, ...rest } = item
  return {
    ...rest,
    createdAt: createdAt.toISOString(),
    updatedAt: updatedAt.toISOString(),
  }
}

/** Zod shape of the shared part of a detail view. */
export const itemViewShape = {
  id: z.string(),
  type: z.string(),
  topic: z.array(z.string()),
  instruction: z.string(),
  imageUrls: z.array(z.string()),
  maxTime: z.number(),
  version: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
}

/** Drops the parent link and timestamps a stored sub-record row carries. */
export function stripOwnership<T extends { questionId: string; createdAt: Date; updatedAt: Date }>(
  row: T,
): Omit<T, 'questionId' | 'createdAt' | 'updatedAt'> {
  const { questionId, createdAt, updatedAt, ...record } = row
  return record
}

/** Single-record slots expose the one record or null. */
export function firstOrNull<T>(records: T[]): T | null {
  return records[0] ?? null
}

export function countCorrect(options: ReadonlyArray<{ isCorrect: boolean }>) {
  const correct = options.filter((option) => option.isCorrect).length
  return { correct, incorrect: options.length - correct }
}

type ChoiceOptions = ReadonlyArray<{ isCorrect: boolean }> | undefined

/** Single choice: a header plus two options or more, at least one right and one wrong. */
export function choiceOneReady(question: unknown, options: ChoiceOptions) {
  if (!question || !options || options.length < 2) return false
  const { correct, incorrect } = countCorrect(options)
  return correct >= 1 && incorrect >= 1
}

/** Multiple choice: a header plus three options or more, two right and one wrong at least. */
export function choiceMultiReady(question: unknown, options: ChoiceOptions) {
  if (!question || !options || options.length < 3) return false
  const { correct, incorrect } = countCorrect(options)
  return correct >= 2 && incorrect >= 1
}

export function hasAtLeast(records: readonly unknown[] | undefined, count: number) {
  return (records?.length ?? 0) >= count
}

export const baseSearchMappings: Record<string, SearchFieldMapping> = {
  id: { type: 'keyword' },
  type: { type: 'keyword' },
  topic: { type: 'text', fields: { keyword: { type: 'keyword' } } },
  instruction: { type: 'text' },
  imageUrls: { type: 'keyword' },
  maxTime: { type: 'integer' },
  version: { type: 'integer' },
  status: { type: 'keyword' },
  createdAt: { type: 'date' },
  updatedAt: { type: 'date' },
}
