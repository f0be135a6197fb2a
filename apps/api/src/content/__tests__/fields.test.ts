import { describe, expect, it } from 'vitest'
import {
  absoluteUrlSchema,
  choiceMultiReady,
  choiceOneReady,
  createBaseShape,
  stripOwnership,
  toItemView,
} from '../fields.js'
import { z } from 'zod'

describe('fields', () => {
  describe('absoluteUrlSchema', () => {
    it('should accept an absolute URL', () => {
      expect(absoluteUrlSchema.safeParse('https://cdn.example.com/a.png').success).toBe(true)
    })

    it('should reject a URL without scheme or host', () => {
      expect(absoluteUrlSchema.safeParse('cdn.example.com/a.png').success).toBe(false)
      expect(absoluteUrlSchema.safeParse('mailto:someone@example.com').success).toBe(false)
    })
  })

  describe('createBaseShape', () => {
    const schema = z.object(createBaseShape(['ESSAY'] as const))
    const valid = { type: 'ESSAY', topic: ['city life'], instruction: 'Write.', maxTime: 60 }

    it('should default image URLs to an empty list', () => {
      expect(schema.parse(valid).imageUrls).toEqual([])
    })

    it('should trim text and reject blanks', () => {
      expect(schema.parse({ ...valid, instruction: '  Write.  ' }).instruction).toBe('Write.')
      expect(schema.safeParse({ ...valid, instruction: '   ' }).success).toBe(false)
    })

    it('should require at least one topic', () => {
      expect(schema.safeParse({ ...valid, topic: [] }).success).toBe(false)
    })

    it('should keep the time limit between 30 seconds and an hour', () => {
      expect(schema.safeParse({ ...valid, maxTime: 29 }).success).toBe(false)
      expect(schema.safeParse({ ...valid, maxTime: 30 }).success).toBe(true)
      expect(schema.safeParse({ ...valid, maxTime: 3_600 }).success).toBe(true)
      expect(schema.safeParse({ ...valid, maxTime: 3_601 }).success).toBe(false)
    })

    it('should reject a type outside the kind', () => {
      expect(schema.safeParse({ ...valid, type: 'MATCHING' }).success).toBe(false)
    })
  })

  it('should render timestamps as ISO strings in the item view', () => {
    const view = toItemView({
      id: 'writing_1',
      type: 'ESSAY',
      topic: ['city life'],
      instruction: 'Write.',
      imageUrls: [],
      maxTime: 60,
      version: 2,
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
      updatedAt: new Date('2026-01-03T08:30:00.000Z'),
    })

    expect(view.createdAt).toBe('2026-01-01T00:00:00.000Z')
    expect(view.updatedAt).toBe('2026-01-03T08:30:00.000Z')
  })

  it('should drop ownership columns from a sub-record row', () => {
    const at = new Date('2026-01-01T00:00:00.000Z')

    expect(stripOwnership({ id: 'r1', questionId: 'q1', createdAt: at, updatedAt: at, answer: 'went' })).toEqual({
      id: 'r1',
      answer: 'went',
    })
  })

  describe('choice readiness', () => {
    const option = (isCorrect: boolean) => ({ isCorrect })

    it('should need a header for either choice form', () => {
      expect(choiceOneReady(null, [option(true), option(false)])).toBe(false)
      expect(choiceMultiReady(undefined, [option(true), option(true), option(false)])).toBe(false)
    })

    it('should count right and wrong options', () => {
      expect(choiceOneReady({}, [option(true), option(false), option(false)])).toBe(true)
      expect(choiceOneReady({}, [option(false), option(false)])).toBe(false)
      expect(choiceMultiReady({}, [option(true), option(true), option(false)])).toBe(true)
      expect(choiceMultiReady({}, [option(true), option(true), option(true)])).toBe(false)
      expect(choiceMultiReady({}, [option(true), option(false)])).toBe(false)
    })
  })
})
