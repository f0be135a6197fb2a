import { grammarModule, type GrammarShape } from '../content/kinds/grammar.js'
import { writingModule, type WritingShape } from '../content/kinds/writing.js'
import type { AnswerRecord, InputOf, PromptRecord, ExplainedPromptRecord, OptionRecord } from '../content/records.js'
import type { GrammarErrorIdentification, GrammarSentenceTransformation } from '../content/kinds/grammar.js'
import type { WritingEssay, WritingSentenceCompletion } from '../content/kinds/writing.js'
import { silentLogger } from '../logger.js'
import { createKindRuntime, type KindRuntime } from '../services/kind-runtime.js'
import { createConnectionStatus, type ConnectionStatus } from '../sync/connection-status.js'
import { createOutboxWorker, type OutboxWorker } from '../sync/outbox-worker.js'
import { MemoryCache } from './memory-cache.js'
import { MemorySearchIndex } from './memory-search-index.js'
import { MemoryDatabase, createMemoryRepository, memorySlot } from './memory-store.js'

/** Manual clock. Starts at a fixed instant and only moves when told to. */
export function createClock(start = '2026-01-01T00:00:00.000Z') {
  let current = new Date(start).getTime()
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms
    },
  }
}

export type Clock = ReturnType<typeof createClock>

export function createMemoryWritingRepository(db: MemoryDatabase) {
  return createMemoryRepository<WritingShape>({
    kind: 'writing',
    db,
    slots: {
      sentenceCompletion: memorySlot<InputOf<WritingSentenceCompletion>>(db, 'writing_sentence', 'many'),
      essay: memorySlot<InputOf<WritingEssay>>(db, 'writing_essay', 'many'),
    },
    buildItem: (input, meta) => ({ ...input, ...meta }),
  })
}

export function createMemoryGrammarRepository(db: MemoryDatabase) {
  return createMemoryRepository<GrammarShape>({
    kind: 'grammar',
    db,
    slots: {
      fillInTheBlankQuestion: memorySlot<InputOf<PromptRecord>>(db, 'grammar_blank', 'single'),
      fillInTheBlankAnswers: memorySlot<InputOf<AnswerRecord>>(db, 'grammar_blank_answer', 'many'),
      choiceOneQuestion: memorySlot<InputOf<ExplainedPromptRecord>>(db, 'grammar_choice', 'single'),
      choiceOneOptions: memorySlot<InputOf<OptionRecord>>(db, 'grammar_choice_option', 'many'),
      errorIdentification: memorySlot<InputOf<GrammarErrorIdentification>>(db, 'grammar_error', 'single'),
      sentenceTransformation: memorySlot<InputOf<GrammarSentenceTransformation>>(db, 'grammar_transform', 'single'),
    },
    buildItem: (input, meta) => ({ ...input, ...meta }),
  })
}

export interface Harness {
  clock: Clock
  db: MemoryDatabase
  cache: MemoryCache
  searchIndex: MemorySearchIndex
  connection: ConnectionStatus
  writing: KindRuntime<WritingShape>
  grammar: KindRuntime<GrammarShape>
  worker: OutboxWorker
}

/**
 * Writing and grammar runtimes over in-process stores, sharing one cache,
 * one search index and one outbox worker. Nothing is scheduled
 * automatically; tests call `worker.drain()` themselves.
 */
export interface HarnessOptions {
  maxBatch?: number
  maxAttempts?: number
  cache?: MemoryCache
  /** Runs after every committed service write. */
  onWrite?: () => void
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = createClock()
  const db = new MemoryDatabase(clock.now)
  const cache = options.cache ?? new MemoryCache()
  const searchIndex = new MemorySearchIndex()
  const connection = createConnectionStatus(silentLogger)

  const shared = {
    cache,
    searchIndex,
    connection,
    cacheTtlSeconds: 3_600,
    maxBatch: options.maxBatch ?? 50,
    logger: silentLogger,
    now: clock.now,
    onWrite: options.onWrite,
  }
  const writing = createKindRuntime(writingModule, createMemoryWritingRepository(db), shared)
  const grammar = createKindRuntime(grammarModule, createMemoryGrammarRepository(db), shared)

  const worker = createOutboxWorker({
    outbox: db.outbox,
    handlers: [writing.resync, grammar.resync],
    options: {
      batchSize: 100,
      maxAttempts: options.maxAttempts ?? 3,
      retryDelayMs: 1_000,
      pollIntervalMs: 60_000,
      leaseMs: 30_000,
      now: clock.now,
    },
    logger: silentLogger,
  })

  return { clock, db, cache, searchIndex, connection, writing, grammar, worker }
}

export const essayInput = {
  essayType: 'opinion',
  requiredPoints: ['state a position', 'give two reasons'],
  minWords: 150,
  maxWords: 250,
  sampleEssay: 'Cities should invest in cycling lanes because they are cheap and healthy.',
  explain: 'A clear position supported by reasons.',
}

export const writingEssayQuestion = {
  type: 'ESSAY',
  topic: ['city life'],
  instruction: 'Write an essay about transport in your city.',
  maxTime: 1_800,
}

export const grammarBlankQuestion = {
  type: 'FILL_IN_THE_BLANK',
  topic: ['tenses'],
  instruction: 'Fill in the blank with the correct verb form.',
  maxTime: 60,
}
