import { z } from 'zod'
import { explainSchema, shortTextSchema } from './fields.js'
import type { Schema, SlotCardinality, SlotSpec, SubRecord } from './types.js'

/**
 * Sub-record shapes reused across grammar, listening and reading.
 * Each has a create schema (no id) and a record schema (with id).
 */

export interface PromptRecord {
  id: string
  question: string
}

export interface ExplainedPromptRecord {
  id: string
  question: string
  explain: string
}

export interface AnswerRecord {
  id: string
  answer: string
  explain: string
}

export interface OptionRecord {
  id: string
  options: string
  isCorrect: boolean
}

export interface PairRecord {
  id: string
  question: string
  answer: string
  explain: string
}

export type InputOf<T extends SubRecord> = Omit<T, 'id'>

const withId = { id: z.string() }

const promptFields = { question: shortTextSchema }
const explainedPromptFields = { question: shortTextSchema, explain: explainSchema }
const answerFields = { answer: shortTextSchema, explain: explainSchema }
const optionFields = { options: shortTextSchema, isCorrect: z.boolean().default(false) }
const pairFields = { question: shortTextSchema, answer: shortTextSchema, explain: explainSchema }

export const promptInputSchema = z.object(promptFields) satisfies Schema<InputOf<PromptRecord>>
export const promptRecordSchema = z.object({ ...withId, ...promptFields }) satisfies Schema<PromptRecord>

export const explainedPromptInputSchema = z.object(explainedPromptFields) satisfies Schema<
  InputOf<ExplainedPromptRecord>
>
export const explainedPromptRecordSchema = z.object({
  ...withId,
  ...explainedPromptFields,
}) satisfies Schema<ExplainedPromptRecord>

export const answerInputSchema = z.object(answerFields) satisfies Schema<InputOf<AnswerRecord>>
export const answerRecordSchema = z.object({ ...withId, ...answerFields }) satisfies Schema<AnswerRecord>

export const optionInputSchema = z.object(optionFields) satisfies Schema<InputOf<OptionRecord>>
export const optionRecordSchema = z.object({ ...withId, ...optionFields }) satisfies Schema<OptionRecord>

export const pairInputSchema = z.object(pairFields) satisfies Schema<InputOf<PairRecord>>
export const pairRecordSchema = z.object({ ...withId, ...pairFields }) satisfies Schema<PairRecord>

export function slot<TRecord, TInput>(
  cardinality: SlotCardinality,
  input: Schema<TInput>,
  record: Schema<TRecord>,
): SlotSpec<TRecord, TInput> {
  return { cardinality, input, record }
}

export type SlotOf<TRecord extends SubRecord> = { record: TRecord; input: InputOf<TRecord> }
