import { z } from 'zod'
import type {
  GrammarQuestionRow,
  grammarErrorIdentifications,
  grammarSentenceTransformations,
} from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import {
  applyBaseFieldUpdate,
  baseFieldUpdates,
  baseSearchMappings,
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
  promptInputSchema,
  promptRecordSchema,
  slot,
  type AnswerRecord,
  type ExplainedPromptRecord,
  type OptionRecord,
  type PromptRecord,
  type SlotOf,
} from '../records.js'
import type { ContentKindModule, ItemView, KindShape, Schema } from '../types.js'

export const GRAMMAR_QUESTION_TYPES = [
  'FILL_IN_THE_BLANK',
  'CHOICE_ONE',
  'ERROR_IDENTIFICATION',
  'SENTENCE_TRANSFORMATION',
] as const

type Owned = 'questionId' | 'createdAt' | 'updatedAt'

export type GrammarErrorIdentification = Omit<typeof grammarErrorIdentifications.$inferSelect, Owned>
export type GrammarSentenceTransformation = Omit<typeof grammarSentenceTransformations.$inferSelect, Owned>

export type GrammarSlots = {
  fillInTheBlankQuestion: SlotOf<PromptRecord>
  fillInTheBlankAnswers: SlotOf<AnswerRecord>
  choiceOneQuestion: SlotOf<ExplainedPromptRecord>
  choiceOneOptions: SlotOf<OptionRecord>
  errorIdentification: SlotOf<GrammarErrorIdentification>
  sentenceTransformation: SlotOf<GrammarSentenceTransformation>
}

export type GrammarDetail = ItemView<GrammarQuestionRow> & {
  fillInTheBlankQuestion?: PromptRecord | null
  fillInTheBlankAnswers?: AnswerRecord[]
  choiceOneQuestion?: ExplainedPromptRecord | null
  choiceOneOptions?: OptionRecord[]
  errorIdentification?: GrammarErrorIdentification | null
  sentenceTransformation?: GrammarSentenceTransformation | null
}

const errorIdentificationFields = z.object({
  errorSentence: shortTextSchema,
  errorWord: shortTextSchema,
  correctWord: shortTextSchema,
  explain: explainSchema,
})

const sentenceTransformationFields = z.object({
  originalSentence: shortTextSchema,
  beginningWord: shortTextSchema,
  exampleCorrectSentence: shortTextSchema,
  explain: explainSchema,
})

const errorIdentificationRecordSchema = errorIdentificationFields.extend({
  id: z.string(),
}) satisfies Schema<GrammarErrorIdentification>
const sentenceTransformationRecordSchema = sentenceTransformationFields.extend({
  id: z.string(),
}) satisfies Schema<GrammarSentenceTransformation>

export const grammarCreateSchema = z.object(createBaseShape(GRAMMAR_QUESTION_TYPES))

export type GrammarCreateInput = z.infer<typeof grammarCreateSchema>

export const grammarFieldUpdateSchema = z.discriminatedUnion('field', [...baseFieldUpdates])

export type GrammarFieldUpdate = BaseFieldUpdate

export interface GrammarShape extends KindShape {
  item: GrammarQuestionRow
  create: GrammarCreateInput
  slots: GrammarSlots
  detail: GrammarDetail
  update: GrammarFieldUpdate
}

export const grammarDetailSchema = z.object({
  ...itemViewShape,
  fillInTheBlankQuestion: promptRecordSchema.nullable().optional(),
  fillInTheBlankAnswers: z.array(answerRecordSchema).optional(),
  choiceOneQuestion: explainedPromptRecordSchema.nullable().optional(),
  choiceOneOptions: z.array(optionRecordSchema).optional(),
  errorIdentification: errorIdentificationRecordSchema.nullable().optional(),
  sentenceTransformation: sentenceTransformationRecordSchema.nullable().optional(),
}) satisfies Schema<GrammarDetail>

export const grammarModule: ContentKindModule<GrammarShape> = {
  kind: 'grammar',
  cachePrefix: 'grammar_question',
  indexName: 'grammar_questions',
  questionTypes: GRAMMAR_QUESTION_TYPES,
  createSchema: grammarCreateSchema,
  fieldUpdateSchema: grammarFieldUpdateSchema,
  detailSchema: grammarDetailSchema,
  slots: {
    fillInTheBlankQuestion: slot('single', promptInputSchema, promptRecordSchema),
    fillInTheBlankAnswers: slot('many', answerInputSchema, answerRecordSchema),
    choiceOneQuestion: slot('single', explainedPromptInputSchema, explainedPromptRecordSchema),
    choiceOneOptions: slot('many', optionInputSchema, optionRecordSchema),
    errorIdentification: slot('single', errorIdentificationFields, errorIdentificationRecordSchema),
    sentenceTransformation: slot('single', sentenceTransformationFields, sentenceTransformationRecordSchema),
  },
  applyUpdate: (item, update) => applyBaseFieldUpdate(item, update),
  async assemble(item, slots) {
    const view = toItemView(item)
    switch (item.type) {
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
      case 'ERROR_IDENTIFICATION':
        return { ...view, errorIdentification: firstOrNull(await slots.errorIdentification.list(item.id)) }
      case 'SENTENCE_TRANSFORMATION':
        return {
          ...view,
          sentenceTransformation: firstOrNull(await slots.sentenceTransformation.list(item.id)),
        }
      default:
        throw new UnknownTypeError('grammar', item.id, item.type)
    }
  },
  completion: {
    FILL_IN_THE_BLANK: (detail) =>
      Boolean(detail.fillInTheBlankQuestion) && hasAtLeast(detail.fillInTheBlankAnswers, 1),
    CHOICE_ONE: (detail) => choiceOneReady(detail.choiceOneQuestion, detail.choiceOneOptions),
    ERROR_IDENTIFICATION: (detail) => Boolean(detail.errorIdentification),
    SENTENCE_TRANSFORMATION: (detail) => Boolean(detail.sentenceTransformation),
  },
  searchMappings: baseSearchMappings,
}
