/**
 * @fileoverview Content kind modules
 *
 * @description
 * Create and update schemas per kind, and detail assembly loading only the
 * slots an item's type uses.
 */

import { describe, expect, it } from 'vitest'
import type { GrammarQuestionRow, WritingQuestionRow } from '@lingo/db'
import { UnknownTypeError } from '../../errors.js'
import { MemoryDatabase } from '../../testing/memory-store.js'
import { createMemoryGrammarRepository, createMemoryWritingRepository, essayInput } from '../../testing/fixtures.js'
import { grammarModule } from '../kinds/grammar.js'
import { listeningModule } from '../kinds/listening.js'
import { readingModule } from '../kinds/reading.js'
import { speakingModule } from '../kinds/speaking.js'
import { writingModule } from '../kinds/writing.js'
import { contentModules, routeSegment } from '../registry.js'

const at = new Date('2026-01-01T00:00:00.000Z')

function writingRow(type: string): WritingQuestionRow {
  return {
    id: 'writing_1',
    type,
    topic: ['city life'],
    instruction: 'Write about your city.',
    imageUrls: [],
    maxTime: 1_800,
    version: 1,
    createdAt: at,
    updatedAt: at,
  }
}

describe('content kinds', () => {
  it('should register every kind under its own route segment', () => {
    expect(Object.keys(contentModules).sort()).toEqual(['grammar', 'listening', 'reading', 'speaking', 'writing'])
    expect(routeSegment('speaking')).toBe('speaking-questions')
  })

  it('should give each kind its own cache prefix and index', () => {
    const modules = Object.values(contentModules)

    expect(new Set(modules.map((module) => module.cachePrefix)).size).toBe(modules.length)
    expect(new Set(modules.map((module) => module.indexName)).size).toBe(modules.length)
  })

  describe('create schemas', () => {
    const base = { topic: ['travel'], instruction: 'Listen and answer.', maxTime: 120 }

    it('should require audio and a transcript for listening', () => {
      expect(listeningModule.createSchema.safeParse({ ...base, type: 'MATCHING' }).success).toBe(false)
      expect(
        listeningModule.createSchema.safeParse({
          ...base,
          type: 'MATCHING',
          audioUrls: ['https://cdn.example.com/a.mp3'],
          transcript: 'Two friends plan a trip.',
        }).success,
      ).toBe(true)
    })

    it('should require a title and at least one passage for reading', () => {
      const reading = { ...base, type: 'TRUE_FALSE', title: 'Night trains' }

      expect(readingModule.createSchema.safeParse({ ...reading, passages: [] }).success).toBe(false)
      const parsed = readingModule.createSchema.safeParse({ ...reading, passages: ['Trains run at night.'] })
      expect(parsed.success).toBe(true)
    })

    it('should accept only the kind question types', () => {
      expect(speakingModule.createSchema.safeParse({ ...base, type: 'WORD_REPETITION' }).success).toBe(true)
      expect(speakingModule.createSchema.safeParse({ ...base, type: 'ESSAY' }).success).toBe(false)
    })
  })

  describe('sub-record schemas', () => {
    it('should limit true/false answers to the three verdicts', () => {
      const input = readingModule.slots.trueFalse.input
      const record = { question: 'Trains run at night.', explain: 'Paragraph two.' }

      expect(input.safeParse({ ...record, answer: 'NOT GIVEN' }).success).toBe(true)
      expect(input.safeParse({ ...record, answer: 'MAYBE' }).success).toBe(false)
    })

    it('should reject an essay whose word range is inverted', () => {
      const parsed = writingModule.slots.essay.input.safeParse({ ...essayInput, minWords: 300, maxWords: 250 })

      expect(parsed.success).toBe(false)
    })

    it('should default an option to incorrect', () => {
      expect(grammarModule.slots.choiceOneOptions.input.parse({ options: 'went' })).toEqual({
        options: 'went',
        isCorrect: false,
      })
    })
  })

  describe('assemble', () => {
    it('should load only the slot used by the item type', async () => {
      const repository = createMemoryWritingRepository(new MemoryDatabase(() => at))
      const essay = await repository.slots.essay.insert('writing_1', essayInput)

      const detail = await writingModule.assemble(writingRow('ESSAY'), repository.slots)

      expect(detail.essay).toEqual([essay])
      expect('sentenceCompletion' in detail).toBe(false)
      expect(detail.createdAt).toBe('2026-01-01T00:00:00.000Z')
    })

    it('should expose a single-record slot as the record or null', async () => {
      const repository = createMemoryGrammarRepository(new MemoryDatabase(() => at))
      const row: GrammarQuestionRow = { ...writingRow('ERROR_IDENTIFICATION'), id: 'grammar_1' }

      expect((await grammarModule.assemble(row, repository.slots)).errorIdentification).toBeNull()

      const record = await repository.slots.errorIdentification.insert('grammar_1', {
        errorSentence: 'She go to school.',
        errorWord: 'go',
        correctWord: 'goes',
        explain: 'Third person singular.',
      })
      expect((await grammarModule.assemble(row, repository.slots)).errorIdentification).toEqual(record)
    })

    it('should raise UnknownTypeError for a type the kind does not know', async () => {
      const repository = createMemoryWritingRepository(new MemoryDatabase(() => at))

      await expect(writingModule.assemble(writingRow('POEM'), repository.slots)).rejects.toMatchObject({
        code: 'UNKNOWN_TYPE',
        itemType: 'POEM',
      })
      await expect(writingModule.assemble(writingRow('POEM'), repository.slots)).rejects.toBeInstanceOf(
        UnknownTypeError,
      )
    })
  })
})
