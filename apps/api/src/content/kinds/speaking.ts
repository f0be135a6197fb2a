import { z } from 'zod'
import type {
  SpeakingQuestionRow,
  speakingConversationalOpens,
  speakingConversationalRepetitionQas,
  speakingConversationalRepetitions,
  speakingOpenParagraphs,
  speakingParagraphRepetitions,
  speakingPhraseRepetitions,
  speakingWordRepetitions,
} from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import {
  applyBaseFieldUpdate,
  baseFieldUpdates,
  baseSearchMappings,
  createBaseShape,
  explainSchema,
  firstOrNull,
  hasAtLeast,
  itemViewShape,
  longTextSchema,
  shortTextSchema,
  toItemView,
  type BaseFieldUpdate,
} from '../fields.js'
import { slot, type SlotOf } from '../records.js'
import type { ContentKindModule, ItemView, KindShape, Schema } from '../types.js'

export const SPEAKING_QUESTION_TYPES = [
  'WORD_REPETITION',
  'PHRASE_REPETITION',
  'PARAGRAPH_REPETITION',
  'OPEN_PARAGRAPH',
  'CONVERSATIONAL_REPETITION',
  'CONVERSATIONAL_OPEN',
] as const

type Owned = 'questionId' | 'createdAt' | 'updatedAt'

export type SpeakingWordRepetition = Omit<typeof speakingWordRepetitions.$inferSelect, Owned>
export type SpeakingPhraseRepetition = Omit<typeof speakingPhraseRepetitions.$inferSelect, Owned>
export type SpeakingParagraphRepetition = Omit<typeof speakingParagraphRepetitions.$inferSelect, Owned>
export type SpeakingOpenParagraph = Omit<typeof speakingOpenParagraphs.$inferSelect, Owned>
export type SpeakingConversationalRepetition = Omit<typeof speakingConversationalRepetitions.$inferSelect, Owned>
export type SpeakingConversationalRepetitionQa = Omit<
  typeof speakingConversationalRepetitionQas.$inferSelect,
  Owned
>
export type SpeakingConversationalOpen = Omit<typeof speakingConversationalOpens.$inferSelect, Owned>

export type SpeakingSlots = {
  wordRepetition: SlotOf<SpeakingWordRepetition>
  phraseRepetition: SlotOf<SpeakingPhraseRepetition>
  paragraphRepetition: SlotOf<SpeakingParagraphRepetition>
  openParagraph: SlotOf<SpeakingOpenParagraph>
  conversationalRepetition: SlotOf<SpeakingConversationalRepetition>
  conversationalRepetitionQas: SlotOf<SpeakingConversationalRepetitionQa>
  conversationalOpen: SlotOf<SpeakingConversationalOpen>
}

export type SpeakingDetail = ItemView<SpeakingQuestionRow> & {
  wordRepetition?: SpeakingWordRepetition[]
  phraseRepetition?: SpeakingPhraseRepetition[]
  paragraphRepetition?: SpeakingParagraphRepetition[]
  openParagraph?: SpeakingOpenParagraph[]
  conversationalRepetition?: SpeakingConversationalRepetition | null
  conversationalRepetitionQas?: SpeakingConversationalRepetitionQa[]
  conversationalOpen?: SpeakingConversationalOpen | null
}

const wordFields = z.object({ word: shortTextSchema, mean: shortTextSchema })
const phraseFields = z.object({ phrase: shortTextSchema, mean: shortTextSchema })
const paragraphFields = z.object({ paragraph: longTextSchema, mean: longTextSchema })
const openParagraphFields = z.object({
  question: shortTextSchema,
  examplePassage: longTextSchema,
  meanOfExamplePassage: longTextSchema,
})
const conversationFields = z.object({ title: shortTextSchema, overview: explainSchema })
const conversationQaFields = z.object({
  question: shortTextSchema,
  answer: shortTextSchema,
  meanOfQuestion: shortTextSchema,
  meanOfAnswer: shortTextSchema,
  explain: explainSchema,
})
const conversationOpenFields = conversationFields.extend({ exampleConversation: longTextSchema })

const withId = { id: z.string() }

const wordRecordSchema = wordFields.extend(withId) satisfies Schema<SpeakingWordRepetition>
const phraseRecordSchema = phraseFields.extend(withId) satisfies Schema<SpeakingPhraseRepetition>
const paragraphRecordSchema = paragraphFields.extend(withId) satisfies Schema<SpeakingParagraphRepetition>
const openParagraphRecordSchema = openParagraphFields.extend(withId) satisfies Schema<SpeakingOpenParagraph>
const conversationRecordSchema = conversationFields.extend(withId) satisfies Schema<SpeakingConversationalRepetition>
const conversationQaRecordSchema = conversationQaFields.extend(
  withId,
) satisfies Schema<SpeakingConversationalRepetitionQa>
const conversationOpenRecordSchema = conversationOpenFields.extend(
  withId,
) satisfies Schema<SpeakingConversationalOpen>

export const speakingCreateSchema = z.object(createBaseShape(SPEAKING_QUESTION_TYPES))

export type SpeakingCreateInput = z.infer<typeof speakingCreateSchema>

export const speakingFieldUpdateSchema = z.discriminatedUnion('field', [...baseFieldUpdates])

export type SpeakingFieldUpdate = BaseFieldUpdate

export interface SpeakingShape extends KindShape {
  item: SpeakingQuestionRow
  create: SpeakingCreateInput
  slots: SpeakingSlots
  detail: SpeakingDetail
  update: SpeakingFieldUpdate
}

export const speakingDetailSchema = z.object({
  ...itemViewShape,
  wordRepetition: z.array(wordRecordSchema).optional(),
  phraseRepetition: z.array(phraseRecordSchema).optional(),
  paragraphRepetition: z.array(paragraphRecordSchema).optional(),
  openParagraph: z.array(openParagraphRecordSchema).optional(),
  conversationalRepetition: conversationRecordSchema.nullable().optional(),
  conversationalRepetitionQas: z.array(conversationQaRecordSchema).optional(),
  conversationalOpen: conversationOpenRecordSchema.nullable().optional(),
}) satisfies Schema<SpeakingDetail>

export const speakingModule: ContentKindModule<SpeakingShape> = {
  kind: 'speaking',
  cachePrefix: 'speaking_question',
  indexName: 'speaking_questions',
  questionTypes: SPEAKING_QUESTION_TYPES,
  createSchema: speakingCreateSchema,
  fieldUpdateSchema: speakingFieldUpdateSchema,
  detailSchema: speakingDetailSchema,
  slots: {
    wordRepetition: slot('many', wordFields, wordRecordSchema),
    phraseRepetition: slot('many', phraseFields, phraseRecordSchema),
    paragraphRepetition: slot('many', paragraphFields, paragraphRecordSchema),
    openParagraph: slot('many', openParagraphFields, openParagraphRecordSchema),
    conversationalRepetition: slot('single', conversationFields, conversationRecordSchema),
    conversationalRepetitionQas: slot('many', conversationQaFields, conversationQaRecordSchema),
    conversationalOpen: slot('single', conversationOpenFields, conversationOpenRecordSchema),
  },
  applyUpdate: (item, update) => applyBaseFieldUpdate(item, update),
  async assemble(item, slots) {
    const view = toItemView(item)
    switch (item.type) {
      case 'WORD_REPETITION':
        return { ...view, wordRepetition: await slots.wordRepetition.list(item.id) }
      case 'PHRASE_REPETITION':
        return { ...view, phraseRepetition: await slots.phraseRepetition.list(item.id) }
      case 'PARAGRAPH_REPETITION':
        return { ...view, paragraphRepetition: await slots.paragraphRepetition.list(item.id) }
      case 'OPEN_PARAGRAPH':
        return { ...view, openParagraph: await slots.openParagraph.list(item.id) }
      case 'CONVERSATIONAL_REPETITION': {
        const [conversation, qas] = await Promise.all([
          slots.conversationalRepetition.list(item.id),
          slots.conversationalRepetitionQas.list(item.id),
        ])
        return {
          ...view,
          conversationalRepetition: firstOrNull(conversation),
          conversationalRepetitionQas: qas,
        }
      }
      case 'CONVERSATIONAL_OPEN':
        return { ...view, conversationalOpen: firstOrNull(await slots.conversationalOpen.list(item.id)) }
      default:
        throw new UnknownTypeError('speaking', item.id, item.type)
    }
  },
  completion: {
    WORD_REPETITION: (detail) => hasAtLeast(detail.wordRepetition, 1),
    PHRASE_REPETITION: (detail) => hasAtLeast(detail.phraseRepetition, 1),
    PARAGRAPH_REPETITION: (detail) => hasAtLeast(detail.paragraphRepetition, 1),
    OPEN_PARAGRAPH: (detail) => hasAtLeast(detail.openParagraph, 1),
    CONVERSATIONAL_REPETITION: (detail) =>
      Boolean(detail.conversationalRepetition) && hasAtLeast(detail.conversationalRepetitionQas, 2),
    CONVERSATIONAL_OPEN: (detail) => Boolean(detail.conversationalOpen),
  },
  searchMappings: baseSearchMappings,
}
