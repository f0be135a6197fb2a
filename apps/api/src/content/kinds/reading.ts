import { z } from 'zod'
import type { ReadingQuestionRow } from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import {
  LIMITS,
  applyBaseFieldUpdate,
  assertNever,
  baseFieldUpdates,
  baseSearchMappings,
  boundedText,
  choiceMultiReady,
  choiceOneReady,
  createBaseShape,
  explainSchema,
  firstOrNull,
  hasAtLeast,
  itemViewShape,
  shortTextSchema,
  toItemView,
  type BaseFieldUpdate,
} from '../fields.js'
import {
  answerInputSchema,
  answerRecordSchema,
  explainedPromptInputSchema,
  explainedPromptRecordSchema,
  optionInputSchema,
  optionRecordSchema,
  pairInputSchema,
  pairRecordSchema,
  promptInputSchema,
  promptRecordSchema,
  slot,
  type AnswerRecord,
  type ExplainedPromptRecord,
  type InputOf,
  type OptionRecord,
  type PairRecord,
  type PromptRecord,
  type SlotOf,
} from '../records.js'
import type { ContentKindModule, ItemView, KindShape, Schema } from '../types.js'

export const READING_QUESTION_TYPES = [
  'FILL_IN_THE_BLANK',
  'CHOICE_ONE',
  'CHOICE_MULTI',
  'MATCHING',
  'TRUE_FALSE',
] as const

export const TRUE_FALSE_ANSWERS = ['TRUE', 'FALSE', 'NOT GIVEN'] as const

export type ReadingSlots = {
  trueFalse: SlotOf<PairRecord>
  fillInTheBlankQuestion: SlotOf<PromptRecord>
  fillInTheBlankAnswers: SlotOf<AnswerRecord>
  choiceOneQuestion: SlotOf<ExplainedPromptRecord>
  choiceOneOptions: SlotOf<OptionRecord>
  choiceMultiQuestion: SlotOf<ExplainedPromptRecord>
  choiceMultiOptions: SlotOf<OptionRecord>
  matching: SlotOf<PairRecord>
}

export type ReadingDetail = ItemView<ReadingQuestionRow> & {
  trueFalse?: PairRecord[]
  fillInTheBlankQuestion?: PromptRecord | null
  fillInTheBlankAnswers?: AnswerRecord[]
  choiceOneQuestion?: ExplainedPromptRecord | null
  choiceOneOptions?: OptionRecord[]
  choiceMultiQuestion?: ExplainedPromptRecord | null
  choiceMultiOptions?: OptionRecord[]
  matching?: PairRecord[]
}

const titleSchema = boundedText(LIMITS.titleLength)
const passagesSchema = z.array(boundedText(LIMITS.passageLength)).min(1).max(LIMITS.passages)

const trueFalseInputSchema = z.object({
  question: shortTextSchema,
  answer: z.enum(TRUE_FALSE_ANSWERS),
  explain: explainSchema,
}) satisfies Schema<InputOf<PairRecord>>

export const readingCreateSchema = z.object({
  ...createBaseShape(READING_QUESTION_TYPES),
  title: titleSchema,
  passages: passagesSchema,
})

export type ReadingCreateInput = z.infer<typeof readingCreateSchema>

const titleUpdate = z.object({ field: z.literal('title'), value: titleSchema })
const passagesUpdate = z.object({ field: z.literal('passages'), value: passagesSchema })

export const readingFieldUpdateSchema = z.discriminatedUnion('field', [
  ...baseFieldUpdates,
  titleUpdate,
  passagesUpdate,
])

export type ReadingFieldUpdate = BaseFieldUpdate | z.infer<typeof titleUpdate> | z.infer<typeof passagesUpdate>

export interface ReadingShape extends KindShape {
  item: ReadingQuestionRow
  create: ReadingCreateInput
  slots: ReadingSlots
  detail: ReadingDetail
  update: ReadingFieldUpdate
}

export const readingDetailSchema = z.object({
  ...itemViewShape,
  title: z.string(),
  passages: z.array(z.string()),
  trueFalse: z.array(pairRecordSchema).optional(),
  fillInTheBlankQuestion: promptRecordSchema.nullable().optional(),
  fillInTheBlankAnswers: z.array(answerRecordSchema).optional(),
  choiceOneQuestion: explainedPromptRecordSchema.nullable().optional(),
  choiceOneOptions: z.array(optionRecordSchema).optional(),
  choiceMultiQuestion: explainedPromptRecordSchema.nullable().optional(),
  choiceMultiOptions: z.array(optionRecordSchema).optional(),
  matching: z.array(pairRecordSchema).optional(),
}) satisfies Schema<ReadingDetail>

function applyReadingUpdate(item: ReadingQuestionRow, update: ReadingFieldUpdate): ReadingQuestionRow {
  switch (update.field) {
    case 'title':
      return { ...item, title: update.value }
    case 'passages':
      return { ...item, passages: update.value }
    case 'topic':
    case 'instruction':
    case 'image_urls':
    case 'max_time':
      return applyBaseFieldUpdate(item, update)
    default:
      return assertNever(update)
  }
}

export const readingModule: ContentKindModule<ReadingShape> = {
  kind: 'reading',
  cachePrefix: 'reading_question',
  indexName: 'reading_questions',
  questionTypes: READING_QUESTION_TYPES,
  createSchema: readingCreateSchema,
  fieldUpdateSchema: readingFieldUpdateSchema,
  detailSchema: readingDetailSchema,
  slots: {
    trueFalse: slot('many', trueFalseInputSchema, pairRecordSchema),
    fillInTheBlankQuestion: slot('single', promptInputSchema, promptRecordSchema),
    fillInTheBlankAnswers: slot('many', answerInputSchema, answerRecordSchema),
    choiceOneQuestion: slot('single', explainedPromptInputSchema, explainedPromptRecordSchema),
    choiceOneOptions: slot('many', optionInputSchema, optionRecordSchema),
    choiceMultiQuestion: slot('single', explainedPromptInputSchema, explainedPromptRecordSchema),
    choiceMultiOptions: slot('many', optionInputSchema, optionRecordSchema),
    matching: slot('many', pairInputSchema, pairRecordSchema),
  },
  applyUpdate: applyReadingUpdate,
  async assemble(item, slots) {
    const view = toItemView(item)
    switch (item.type) {
      case 'TRUE_FALSE':
        return { ...view, trueFalse: await slots.trueFalse.list(item.id) }
      case 'FILL_IN_THE_BLANK': {
        const [question, answers] = await Promise.all([
          slots.fillInTheBlankQuestion.list(item.id),
          slots.fillInTheBlankAnswers.list(item.id),
        ])
        return { ...view, fillInTheBlankQuestion: firstOrNull(question), fillInTheBlankAnswers: answers }
      }
      case 'CHOICE_ONE': {
        const [question, options] = await Promise.all([
          slots.choiceOneQuestion.list(item.id),
          slots.choiceOneOptions.list(item.id),
        ])
        return { ...view, choiceOneQuestion: firstOrNull(question), choiceOneOptions: options }
      }
      case 'CHOICE_MULTI': {
        const [question, options] = await Promise.all([
          slots.choiceMultiQuestion.list(item.id),
          slots.choiceMultiOptions.list(item.id),
        ])
        return { ...view, choiceMultiQuestion: firstOrNull(question), choiceMultiOptions: options }
      }
      case 'MATCHING':
        return { ...view, matching: await slots.matching.list(item.id) }
      default:
        throw new UnknownTypeError('reading', item.id, item.type)
    }
  },
  completion: {
    FILL_IN_THE_BLANK: (detail) =>
      Boolean(detail.fillInTheBlankQuestion) && hasAtLeast(detail.fillInTheBlankAnswers, 2),
    CHOICE_ONE: (detail) => choiceOneReady(detail.choiceOneQuestion, detail.choiceOneOptions),
    CHOICE_MULTI: (detail) => choiceMultiReady(detail.choiceMultiQuestion, detail.choiceMultiOptions),
    MATCHING: (detail) => hasAtLeast(detail.matching, 1),
    TRUE_FALSE: (detail) => hasAtLeast(detail.trueFalse, 2),
  },
  searchMappings: {
    ...baseSearchMappings,
    title: { type: 'text', fields: { keyword: { type: 'keyword' } } },
    passages: { type: 'text' },
  },
}
