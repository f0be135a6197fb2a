import { z } from 'zod'
import type { ListeningQuestionRow } from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import {
  LIMITS,
  absoluteUrlSchema,
  applyBaseFieldUpdate,
  assertNever,
  baseFieldUpdates,
  baseSearchMappings,
  boundedText,
  choiceMultiReady,
  choiceOneReady,
  createBaseShape,
  firstOrNull,
  hasAtLeast,
  itemViewShape,
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
  type OptionRecord,
  type PairRecord,
  type PromptRecord,
  type SlotOf,
} from '../records.js'
import type { ContentKindModule, ItemView, KindShape, Schema } from '../types.js'

export const LISTENING_QUESTION_TYPES = [
  'FILL_IN_THE_BLANK',
  'CHOICE_ONE',
  'CHOICE_MULTI',
  'MAP_LABELLING',
  'MATCHING',
] as const

export type ListeningSlots = {
  fillInTheBlankQuestion: SlotOf<PromptRecord>
  fillInTheBlankAnswers: SlotOf<AnswerRecord>
  choiceOneQuestion: SlotOf<ExplainedPromptRecord>
  choiceOneOptions: SlotOf<OptionRecord>
  choiceMultiQuestion: SlotOf<ExplainedPromptRecord>
  choiceMultiOptions: SlotOf<OptionRecord>
  mapLabelling: SlotOf<PairRecord>
  matching: SlotOf<PairRecord>
}

export type ListeningDetail = ItemView<ListeningQuestionRow> & {
  fillInTheBlankQuestion?: PromptRecord | null
  fillInTheBlankAnswers?: AnswerRecord[]
  choiceOneQuestion?: ExplainedPromptRecord | null
  choiceOneOptions?: OptionRecord[]
  choiceMultiQuestion?: ExplainedPromptRecord | null
  choiceMultiOptions?: OptionRecord[]
  mapLabelling?: PairRecord[]
  matching?: PairRecord[]
}

const audioUrlsSchema = z.array(absoluteUrlSchema).min(1).max(LIMITS.audioUrls)
const transcriptSchema = boundedText(LIMITS.transcriptLength)

export const listeningCreateSchema = z.object({
  ...createBaseShape(LISTENING_QUESTION_TYPES),
  audioUrls: audioUrlsSchema,
  transcript: transcriptSchema,
})

export type ListeningCreateInput = z.infer<typeof listeningCreateSchema>

const audioUrlsUpdate = z.object({ field: z.literal('audio_urls'), value: audioUrlsSchema })
const transcriptUpdate = z.object({ field: z.literal('transcript'), value: transcriptSchema })

export const listeningFieldUpdateSchema = z.discriminatedUnion('field', [
  ...baseFieldUpdates,
  audioUrlsUpdate,
  transcriptUpdate,
])

export type ListeningFieldUpdate =
  | BaseFieldUpdate
  | z.infer<typeof audioUrlsUpdate>
  | z.infer<typeof transcriptUpdate>

export interface ListeningShape extends KindShape {
  item: ListeningQuestionRow
  create: ListeningCreateInput
  slots: ListeningSlots
  detail: ListeningDetail
  update: ListeningFieldUpdate
}

export const listeningDetailSchema = z.object({
  ...itemViewShape,
  audioUrls: z.array(z.string()),
  transcript: z.string(),
  fillInTheBlankQuestion: promptRecordSchema.nullable().optional(),
  fillInTheBlankAnswers: z.array(answerRecordSchema).optional(),
  choiceOneQuestion: explainedPromptRecordSchema.nullable().optional(),
  choiceOneOptions: z.array(optionRecordSchema).optional(),
  choiceMultiQuestion: explainedPromptRecordSchema.nullable().optional(),
  choiceMultiOptions: z.array(optionRecordSchema).optional(),
  mapLabelling: z.array(pairRecordSchema).optional(),
  matching: z.array(pairRecordSchema).optional(),
}) satisfies Schema<ListeningDetail>

function applyListeningUpdate(item: ListeningQuestionRow, update: ListeningFieldUpdate): ListeningQuestionRow {
  switch (update.field) {
    case 'audio_urls':
      return { ...item, audioUrls: update.value }
    case 'transcript':
      return { ...item, transcript: update.value }
    case 'topic':
    case 'instruction':
    case 'image_urls':
    case 'max_time':
      return applyBaseFieldUpdate(item, update)
    default:
      return assertNever(update)
  }
}

/**
 * Listening questions carry audio and a transcript on the parent row.
 * Fill-in-the-blank needs two answers here (grammar is happy with one).
 */
export const listeningModule: ContentKindModule<ListeningShape> = {
  kind: 'listening',
  cachePrefix: 'listening_question',
  indexName: 'listening_questions',
  questionTypes: LISTENING_QUESTION_TYPES,
  createSchema: listeningCreateSchema,
  fieldUpdateSchema: listeningFieldUpdateSchema,
  detailSchema: listeningDetailSchema,
  slots: {
    fillInTheBlankQuestion: slot('single', promptInputSchema, promptRecordSchema),
    fillInTheBlankAnswers: slot('many', answerInputSchema, answerRecordSchema),
    choiceOneQuestion: slot('single', explainedPromptInputSchema, explainedPromptRecordSchema),
    choiceOneOptions: slot('many', optionInputSchema, optionRecordSchema),
    choiceMultiQuestion: slot('single', explainedPromptInputSchema, explainedPromptRecordSchema),
    choiceMultiOptions: slot('many', optionInputSchema, optionRecordSchema),
    mapLabelling: slot('many', pairInputSchema, pairRecordSchema),
    matching: slot('many', pairInputSchema, pairRecordSchema),
  },
  applyUpdate: applyListeningUpdate,
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
      case 'CHOICE_MULTI': {
        const [question, options] = await Promise.all([
          slots.choiceMultiQuestion.list(item.id),
          slots.choiceMultiOptions.list(item.id),
        ])
        return { ...view, choiceMultiQuestion: firstOrNull(question), choiceMultiOptions: options }
      }
      case 'MAP_LABELLING':
        return { ...view, mapLabelling: await slots.mapLabelling.list(item.id) }
      case 'MATCHING':
        return { ...view, matching: await slots.matching.list(item.id) }
      default:
        throw new UnknownTypeError('listening', item.id, item.type)
    }
  },
  completion: {
    FILL_IN_THE_BLANK: (detail) =>
      Boolean(detail.fillInTheBlankQuestion) && hasAtLeast(detail.fillInTheBlankAnswers, 2),
    CHOICE_ONE: (detail) => choiceOneReady(detail.choiceOneQuestion, detail.choiceOneOptions),
    CHOICE_MULTI: (detail) => choiceMultiReady(detail.choiceMultiQuestion, detail.choiceMultiOptions),
    MAP_LABELLING: (detail) => hasAtLeast(detail.mapLabelling, 2),
    MATCHING: (detail) => hasAtLeast(detail.matching, 2),
  },
  searchMappings: {
    ...baseSearchMappings,
    audioUrls: { type: 'keyword' },
    transcript: { type: 'text' },
  },
}
