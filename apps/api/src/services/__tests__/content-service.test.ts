/**
 * @fileoverview Content service scenarios
 *
 * @description
 * Drives the writing and grammar services end to end over in-process stores:
 * writes commit with an outbox row, the worker brings the cache and search
 * index in line, and delta sync answers from the stored versions.
 */

import { beforeEach, describe, expect, it } from 'vitest'
import { ConflictError, InvalidFieldError, NotFoundError, StoreError, ValidationError } from '../../errors.js'
import { MemoryCache } from '../../testing/memory-cache.js'
import {
  createHarness,
  essayInput,
  grammarBlankQuestion,
  writingEssayQuestion,
  type Harness,
} from '../../testing/fixtures.js'

const sentenceQuestion = {
  type: 'SENTENCE_COMPLETION',
  topic: ['daily routine'],
  instruction: 'Complete the sentence using at least two of the words given.',
  maxTime: 300,
}

const sentenceInput = {
  exampleSentence: 'Every morning I drink a cup of tea before work.',
  givenPartSentence: 'Every morning I',
  position: 'start',
  requiredWords: ['tea', 'work'],
  explain: 'Use the present simple for habits.',
  minWords: 5,
  maxWords: 20,
}

/** Cache whose read-path writes wait until the test opens the gate. */
class GatedCache extends MemoryCache {
  private opened: Promise<void> = Promise.resolve()
  private open: () => void = () => {}
  private arrive: () => void = () => {}
  arrived: Promise<void> = Promise.resolve()

  close() {
    this.opened = new Promise((resolve) => {
      this.open = resolve
    })
    this.arrived = new Promise((resolve) => {
      this.arrive = resolve
    })
  }

  release() {
    this.open()
  }

  async setUnlessExists(key: string, value: string, ttlSeconds: number, guards: string[]) {
    this.arrive()
    await this.opened
    return super.setUnlessExists(key, value, ttlSeconds, guards)
  }
}

describe('content service', () => {
  let h: Harness

  beforeEach(() => {
    h = createHarness()
  })

  describe('sync scenarios', () => {
    it('should cache a new item as uncomplete at version 1 once the outbox drains', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)

      expect(detail.version).toBe(1)
      expect(detail.sentenceCompletion).toEqual([])
      expect(h.db.outbox.pending().map((row) => row.reason)).toEqual(['created'])

      const report = await h.worker.drain()

      expect(report).toEqual({ claimed: 1, resynced: 1, retried: 0, dead: 0 })
      expect(h.cache.keys()).toEqual([`writing_question:${detail.id}:uncomplete:1`])
      expect((await h.writing.search.get(detail.id))?.status).toBe('uncomplete')
      expect(h.db.outbox.rows()).toEqual([])
    })

    it('should flip the item to complete without bumping its version when a sub-record is added', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      await h.worker.drain()

      const record = await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()

      expect(record).toEqual({ id: expect.any(String), ...sentenceInput })
      expect(h.cache.keys()).toEqual([`writing_question:${detail.id}:complete:1`])

      const current = await h.writing.service.getDetail(detail.id)
      expect(current.version).toBe(1)
      expect(current.sentenceCompletion).toEqual([record])
      expect((await h.writing.search.get(detail.id))?.status).toBe('complete')
    })

    it('should report nothing newer after a sub-record change alone', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()

      expect(await h.writing.service.resolveDelta([{ id: detail.id, version: 1 }])).toEqual([])
    })

    it('should return the current view from delta sync after a field update', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()
      h.clock.advance(1_000)

      const updated = await h.writing.service.updateField(detail.id, {
        field: 'instruction',
        value: 'Finish the sentence in your own words.',
      })
      expect(updated.version).toBe(2)
      expect(updated.updatedAt).toBe('2026-01-01T00:00:01.000Z')

      const delta = await h.writing.service.resolveDelta([{ id: detail.id, version: 1 }])

      expect(delta).toHaveLength(1)
      expect(delta[0]?.version).toBe(2)
      expect(delta[0]?.instruction).toBe('Finish the sentence in your own words.')
      expect(delta[0]?.sentenceCompletion).toHaveLength(1)
      expect(h.cache.keys()).toContain(`writing_question:${detail.id}:complete:2`)
    })

    it('should leave no cache key or search document behind after a delete', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()
      await h.writing.service.updateField(detail.id, { field: 'max_time', value: 600 })
      await h.worker.drain()
      expect(h.cache.keys()).toHaveLength(2)

      await h.writing.service.delete(detail.id)
      await h.worker.drain()

      expect(h.cache.keys()).toEqual([])
      expect(await h.writing.cache.fetch(detail.id, 1)).toBeNull()
      expect(await h.writing.cache.fetch(detail.id, 2)).toBeNull()
      expect(await h.writing.search.get(detail.id)).toBeNull()
      await expect(h.writing.service.getDetail(detail.id)).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('reads racing a resync', () => {
    let gated: GatedCache

    beforeEach(() => {
      gated = new GatedCache()
      h = createHarness({ cache: gated })
    })

    it('should keep the resynced complete view when an older read writes back late', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      gated.close()
      const reading = h.writing.service.getDetail(detail.id)
      await gated.arrived

      const record = await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()
      gated.release()
      await reading

      expect(h.cache.keys()).toEqual([`writing_question:${detail.id}:complete:1`])
      const [served] = await h.writing.service.getByIds([detail.id])
      expect(served?.sentenceCompletion).toEqual([record])
    })

    it('should keep the resynced uncomplete view when an older read writes back late', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      const record = await h.writing.service.addSubRecord(detail.id, 'sentenceCompletion', sentenceInput)
      await h.worker.drain()
      h.cache.entries.clear()
      gated.close()
      const reading = h.writing.service.getDetail(detail.id)
      await gated.arrived

      await h.writing.service.removeSubRecord('sentenceCompletion', record.id)
      await h.worker.drain()
      gated.release()
      await reading

      expect(h.cache.keys()).toEqual([`writing_question:${detail.id}:uncomplete:1`])
      const [served] = await h.writing.service.getByIds([detail.id])
      expect(served?.sentenceCompletion).toEqual([])
    })
  })

  describe('writes', () => {
    it('should return the written view even when the store fails right after the commit', async () => {
      let failAfterCommit = false
      const failing: Harness = createHarness({
        onWrite: () => {
          if (failAfterCommit) failing.db.failure = new Error('connection reset')
        },
      })
      const existing = await failing.writing.service.create(sentenceQuestion)
      failAfterCommit = true

      const created = await failing.writing.service.create(writingEssayQuestion)
      failing.db.failure = null
      const updated = await failing.writing.service.updateField(existing.id, { field: 'max_time', value: 600 })

      expect(created).toMatchObject({ type: 'ESSAY', version: 1, essay: [] })
      expect(updated).toMatchObject({ id: existing.id, maxTime: 600, version: 2, sentenceCompletion: [] })
      expect(failing.db.outbox.rows().map((row) => row.reason)).toEqual(['created', 'created', 'updated'])
    })

    it('should reject an invalid create without touching the outbox', async () => {
      await expect(h.writing.service.create({ ...sentenceQuestion, type: 'POEM' })).rejects.toBeInstanceOf(
        ValidationError,
      )
      expect(h.db.outbox.rows()).toEqual([])
    })

    it('should reject an update to a field the kind does not expose', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)

      const attempt = h.writing.service.updateField(detail.id, { field: 'transcript', value: 'hello' })

      await expect(attempt).rejects.toBeInstanceOf(InvalidFieldError)
      expect((await h.writing.service.getDetail(detail.id)).version).toBe(1)
    })

    it('should reject an out-of-range value and keep the version', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)

      await expect(h.writing.service.updateField(detail.id, { field: 'max_time', value: 5 })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      })
      expect((await h.writing.service.getDetail(detail.id)).version).toBe(1)
    })

    it('should raise NotFoundError when updating a missing item', async () => {
      await expect(
        h.writing.service.updateField('writing_missing', { field: 'instruction', value: 'Anything at all.' }),
      ).rejects.toBeInstanceOf(NotFoundError)
    })

    it('should bump the version once per field update', async () => {
      const detail = await h.writing.service.create(writingEssayQuestion)

      await h.writing.service.updateField(detail.id, { field: 'topic', value: ['travel'] })
      const latest = await h.writing.service.updateField(detail.id, {
        field: 'image_urls',
        value: ['https://cdn.example.com/bus.png'],
      })

      expect(latest.version).toBe(3)
      expect(latest.topic).toEqual(['travel'])
      expect(latest.imageUrls).toEqual(['https://cdn.example.com/bus.png'])
    })

    it('should refuse a second record in a single-record slot and roll the write back', async () => {
      const detail = await h.grammar.service.create(grammarBlankQuestion)
      await h.grammar.service.addSubRecord(detail.id, 'fillInTheBlankQuestion', { question: 'She ___ to school.' })

      const second = h.grammar.service.addSubRecord(detail.id, 'fillInTheBlankQuestion', {
        question: 'They ___ home.',
      })

      await expect(second).rejects.toBeInstanceOf(ConflictError)
      expect(h.db.outbox.rows().map((row) => row.reason)).toEqual(['created', 'sub_record_created'])
    })

    it('should reject an unknown slot name', async () => {
      const detail = await h.grammar.service.create(grammarBlankQuestion)

      await expect(h.grammar.service.addSubRecord(detail.id, 'essay', essayInput)).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Unknown grammar slot "essay".',
      })
    })

    it('should merge a sub-record patch over the stored record', async () => {
      const detail = await h.grammar.service.create(grammarBlankQuestion)
      const answer = await h.grammar.service.addSubRecord(detail.id, 'fillInTheBlankAnswers', {
        answer: 'goes',
        explain: 'Third person singular takes -s.',
      })

      const patched = await h.grammar.service.updateSubRecord('fillInTheBlankAnswers', answer.id, {
        explain: 'He, she and it take -s in the present simple.',
      })

      expect(patched).toEqual({
        id: answer.id,
        answer: 'goes',
        explain: 'He, she and it take -s in the present simple.',
      })
      expect((await h.grammar.service.getDetail(detail.id)).version).toBe(1)
      expect(h.db.outbox.pending().at(-1)?.reason).toBe('sub_record_updated')
    })

    it('should raise NotFoundError when removing a missing sub-record', async () => {
      await expect(h.grammar.service.removeSubRecord('fillInTheBlankAnswers', 'grammar_nope')).rejects.toBeInstanceOf(
        NotFoundError,
      )
    })

    it('should mark a grammar blank complete once it has a question and an answer', async () => {
      const detail = await h.grammar.service.create(grammarBlankQuestion)
      await h.grammar.service.addSubRecord(detail.id, 'fillInTheBlankQuestion', { question: 'She ___ to school.' })
      await h.worker.drain()
      expect(h.cache.keys()).toEqual([`grammar_question:${detail.id}:uncomplete:1`])

      await h.grammar.service.addSubRecord(detail.id, 'fillInTheBlankAnswers', {
        answer: 'goes',
        explain: 'Third person singular takes -s.',
      })
      await h.worker.drain()

      expect(h.cache.keys()).toEqual([`grammar_question:${detail.id}:complete:1`])
    })
  })

  describe('reads', () => {
    it('should read a batch newest first, skipping unknown ids and repeats', async () => {
      const first = await h.writing.service.create(writingEssayQuestion)
      h.clock.advance(1_000)
      const second = await h.writing.service.create(sentenceQuestion)

      const details = await h.writing.service.getByIds([first.id, 'writing_unknown', second.id, first.id])

      expect(details.map((detail) => detail.id)).toEqual([second.id, first.id])
    })

    it('should serve a batch read from the cache when the version matches', async () => {
      const detail = await h.writing.service.create(writingEssayQuestion)
      await h.worker.drain()
      const key = `writing_question:${detail.id}:uncomplete:1`
      const cached = { ...detail, instruction: 'Served from the cache.' }
      await h.cache.set(key, JSON.stringify(cached), 60)

      const [read] = await h.writing.service.getByIds([detail.id])

      expect(read?.instruction).toBe('Served from the cache.')
    })

    it('should refuse batches above the configured limit', async () => {
      const small = createHarness({ maxBatch: 2 })

      await expect(small.writing.service.getByIds(['a', 'b', 'c'])).rejects.toBeInstanceOf(ValidationError)
      await expect(
        small.writing.service.resolveDelta([
          { id: 'a', version: 1 },
          { id: 'b', version: 1 },
          { id: 'c', version: 1 },
        ]),
      ).rejects.toBeInstanceOf(ValidationError)
    })

    it('should wrap relational failures in StoreError', async () => {
      const detail = await h.writing.service.create(sentenceQuestion)
      h.db.failure = new Error('connection terminated unexpectedly')

      await expect(h.writing.service.getDetail(detail.id)).rejects.toBeInstanceOf(StoreError)
      await expect(h.writing.service.create(sentenceQuestion)).rejects.toMatchObject({ code: 'STORE_ERROR' })
    })

    it('should list indexed items by completion status', async () => {
      const done = await h.writing.service.create(sentenceQuestion)
      await h.writing.service.addSubRecord(done.id, 'sentenceCompletion', sentenceInput)
      h.clock.advance(1_000)
      const open = await h.writing.service.create(writingEssayQuestion)
      await h.worker.drain()

      const complete = await h.writing.service.search({ status: 'complete', page: 1, pageSize: 10 })
      const all = await h.writing.service.search({ page: 1, pageSize: 10 })

      expect(complete.total).toBe(1)
      expect(complete.items.map((item) => item.detail.id)).toEqual([done.id])
      expect(all.items.map((item) => item.detail.id)).toEqual([open.id, done.id])
    })
  })

  describe('purge', () => {
    it('should delete every item of the kind and clear its cache and index', async () => {
      await h.writing.service.create(sentenceQuestion)
      await h.writing.service.create(writingEssayQuestion)
      const grammar = await h.grammar.service.create(grammarBlankQuestion)
      await h.worker.drain()

      const report = await h.writing.service.purge()

      expect(report).toEqual({ removed: 2, degraded: [] })
      expect(h.cache.keys()).toEqual([`grammar_question:${grammar.id}:uncomplete:1`])
      expect(h.searchIndex.indices.has('writing_questions')).toBe(false)
      expect(h.searchIndex.indices.has('grammar_questions')).toBe(true)
    })

    it('should report the stores it could not reach', async () => {
      h.connection.mark('search', false)

      const report = await h.writing.service.purge()

      expect(report).toEqual({ removed: 0, degraded: ['search dropIndex: search unavailable'] })
    })
  })
})
