import { z } from 'zod'
import type { WritingEssayRow, WritingQuestionRow, WritingSentenceCompletionRow } from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import {
  applyBaseFieldUpdate,
  baseFieldUpdates,
  baseSearchMappings,
  createBaseShape,
  explainSchema,
  hasAtLeast,
  itemViewShape,
  longTextSchema,
  shortTextSchema,
  toItemView,
  type BaseFieldUpdate,
} from '../fields.js'
import { slot, type InputOf, type SlotOf } from '../records.js'
import type { ContentKindModule, ItemView, KindShape, Schema } from '../types.js'

export const WRITING_QUESTION_TYPES = ['SENTENCE_COMPLETION', 'ESSAY'] as const

type Owned = 'questionId' | 'createdAt' | 'updatedAt'

export type WritingSentenceCompletion = Omit<WritingSentenceCompletionRow, Owned>
export type WritingEssay = Omit<WritingEssayRow, Owned>

export type WritingSlots = {
  sentenceCompletion: SlotOf<WritingSentenceCompletion>
  essay: SlotOf<WritingEssay>
}

export type WritingDetail = ItemView<WritingQuestionRow> & {
  sentenceCompletion?: WritingSentenceCompletion[]
  essay?: WritingEssay[]
}

const wordCounts = {
  minWords: z.number().int().min(1),
  maxWords: z.number().int().min(1),
}

const maxWordsNotBelowMin = {
  message: 'maxWords must be greater than or equal to minWords.',
  path: ['maxWords'],
}

const sentenceCompletionFields = z.object({
  exampleSentence: shortTextSchema,
  givenPartSentence: shortTextSchema,
  position: z.enum(['start', 'end']),
  requiredWords: z.array(shortTextSchema),
  explain: explainSchema,
  ...wordCounts,
})

const essayFields = z.object({
  essayType: shortTextSchema,
  requiredPoints: z.array(shortTextSchema),
  ...wordCounts,
  sampleEssay: longTextSchema,
  explain: explainSchema,
})

export const writingCreateSchema = z.object(createBaseShape(WRITING_QUESTION_TYPES))

export type WritingCreateInput = z.infer<typeof writingCreateSchema>

export const writingFieldUpdateSchema = z.discriminatedUnion('field', [...baseFieldUpdates])

export type WritingFieldUpdate = BaseFieldUpdate

export interface WritingShape extends KindShape {
  item: WritingQuestionRow
  create: WritingCreateInput
  slots: WritingSlots
  detail: WritingDetail
  update: WritingFieldUpdate
}

const sentenceCompletionRecordSchema = sentenceCompletionFields.extend({
  id: z.string(),
}) satisfies Schema<WritingSentenceCompletion>
const essayRecordSchema = essayFields.extend({ id: z.string() }) satisfies Schema<WritingEssay>

export const writingDetailSchema = z.object({
  ...itemViewShape,
  sentenceCompletion: z.array(sentenceCompletionRecordSchema).optional(),
  essay: z.array(essayRecordSchema).optional(),
}) satisfies Schema<WritingDetail>

/**
 * Writing questions: sentence completion and essays.
 *
 * Both slots hold any number of records; a question is complete once its
 * type's slot has at least one.
 */
export const writingModule: ContentKindModule<WritingShape> = {
  kind: 'writing',
  cachePrefix: 'writing_question',
  indexName: 'writing_questions',
  questionTypes: WRITING_QUESTION_TYPES,
  createSchema: writingCreateSchema,
  fieldUpdateSchema: writingFieldUpdateSchema,
  detailSchema: writingDetailSchema,
  slots: {
    sentenceCompletion: slot(
      'many',
      sentenceCompletionFields.refine(
        (value) => value.maxWords >= value.minWords,
        maxWordsNotBelowMin,
      ) satisfies Schema<InputOf<WritingSentenceCompletion>>,
      sentenceCompletionRecordSchema,
    ),
    essay: slot(
      'many',
      essayFields.refine(
        (value) => value.maxWords >= value.minWords,
        maxWordsNotBelowMin,
      ) satisfies Schema<InputOf<WritingEssay>>,
      essayRecordSchema,
    ),
  },
  applyUpdate: (item, update) => applyBaseFieldUpdate(item, update),
  async assemble(item, slots) {
    const view = toItemView(item)
    switch (item.type) {
      case 'SENTENCE_COMPLETION':
        return { ...view, sentenceCompletion: await slots.sentenceCompletion.list(item.id) }
      case 'ESSAY':
        return { ...view, essay: await slots.essay.list(item.id) }
      default:
        throw new UnknownTypeError('writing', item.id, item.type)
    }
  },
  completion: {
    SENTENCE_COMPLETION: (detail) => hasAtLeast(detail.sentenceCompletion, 1),
    ESSAY: (detail) => hasAtLeast(detail.essay, 1),
  },
  searchMappings: baseSearchMappings,
}
