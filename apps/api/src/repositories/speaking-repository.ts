import { asc, desc, eq, inArray } from 'drizzle-orm'
import {
  speakingConversationalOpens,
  speakingConversationalRepetitionQas,
  speakingConversationalRepetitions,
  speakingOpenParagraphs,
  speakingParagraphRepetitions,
  speakingPhraseRepetitions,
  speakingQuestions,
  speakingWordRepetitions,
  type Database,
  type Executor,
} from '@lingo/db'
import type {
  SpeakingConversationalOpen,
  SpeakingConversationalRepetition,
  SpeakingConversationalRepetitionQa,
  SpeakingOpenParagraph,
  SpeakingParagraphRepetition,
  SpeakingPhraseRepetition,
  SpeakingShape,
  SpeakingWordRepetition,
} from '../content/kinds/speaking.js'
import type { InputOf } from '../content/records.js'
import type { SlotStores } from '../content/types.js'
import {
  createDrizzleRepository,
  firstRow,
  mutableColumns,
  newerThan,
  requireRow,
  slotStore,
  type ParentQueries,
} from './drizzle.js'

function speakingParents(executor: Executor): ParentQueries<SpeakingShape> {
  const t = speakingQuestions
  return {
    findById: async (id) => firstRow(await executor.select().from(t).where(eq(t.id, id))),
    findByIds: (ids) => executor.select().from(t).where(inArray(t.id, ids)).orderBy(desc(t.createdAt), desc(t.id)),
    findNewer: (pairs) => executor.select().from(t).where(newerThan(t, pairs)).orderBy(desc(t.createdAt), desc(t.id)),
    insert: async (input) => requireRow(await executor.insert(t).values(input).returning(), 'speaking question'),
    save: async (item) =>
      firstRow(
        await executor
          .update(t)
          .set(mutableColumns(item))
          .where(eq(t.id, item.id))
          .returning(),
      ),
    remove: async (id) => (await executor.delete(t).where(eq(t.id, id)).returning({ id: t.id })).length > 0,
    removeAll: async () => (await executor.delete(t).returning({ id: t.id })).length,
  }
}

function speakingSlots(executor: Executor): SlotStores<SpeakingShape> {
  return {
    wordRepetition: slotStore<typeof speakingWordRepetitions.$inferSelect, InputOf<SpeakingWordRepetition>>({
      list: (parentId) =>
        executor
          .select()
          .from(speakingWordRepetitions)
          .where(eq(speakingWordRepetitions.questionId, parentId))
          .orderBy(asc(speakingWordRepetitions.createdAt), asc(speakingWordRepetitions.id)),
      find: (id) => executor.select().from(speakingWordRepetitions).where(eq(speakingWordRepetitions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingWordRepetitions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingWordRepetitions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingWordRepetitions.id, id))
          .returning(),
      remove: (id) => executor.delete(speakingWordRepetitions).where(eq(speakingWordRepetitions.id, id)).returning(),
    }),
    phraseRepetition: slotStore<typeof speakingPhraseRepetitions.$inferSelect, InputOf<SpeakingPhraseRepetition>>({
      list: (parentId) =>
        executor
          .select()
          .from(speakingPhraseRepetitions)
          .where(eq(speakingPhraseRepetitions.questionId, parentId))
          .orderBy(asc(speakingPhraseRepetitions.createdAt), asc(speakingPhraseRepetitions.id)),
      find: (id) => executor.select().from(speakingPhraseRepetitions).where(eq(speakingPhraseRepetitions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingPhraseRepetitions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingPhraseRepetitions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingPhraseRepetitions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(speakingPhraseRepetitions)
          .where(eq(speakingPhraseRepetitions.id, id))
          .returning(),
    }),
    paragraphRepetition: slotStore<
      typeof speakingParagraphRepetitions.$inferSelect,
      InputOf<SpeakingParagraphRepetition>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(speakingParagraphRepetitions)
          .where(eq(speakingParagraphRepetitions.questionId, parentId))
          .orderBy(asc(speakingParagraphRepetitions.createdAt), asc(speakingParagraphRepetitions.id)),
      find: (id) => executor.select().from(speakingParagraphRepetitions).where(eq(speakingParagraphRepetitions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingParagraphRepetitions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingParagraphRepetitions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingParagraphRepetitions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(speakingParagraphRepetitions)
          .where(eq(speakingParagraphRepetitions.id, id))
          .returning(),
    }),
    openParagraph: slotStore<typeof speakingOpenParagraphs.$inferSelect, InputOf<SpeakingOpenParagraph>>({
      list: (parentId) =>
        executor
          .select()
          .from(speakingOpenParagraphs)
          .where(eq(speakingOpenParagraphs.questionId, parentId))
          .orderBy(asc(speakingOpenParagraphs.createdAt), asc(speakingOpenParagraphs.id)),
      find: (id) => executor.select().from(speakingOpenParagraphs).where(eq(speakingOpenParagraphs.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingOpenParagraphs)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingOpenParagraphs)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingOpenParagraphs.id, id))
          .returning(),
      remove: (id) => executor.delete(speakingOpenParagraphs).where(eq(speakingOpenParagraphs.id, id)).returning(),
    }),
    conversationalRepetition: slotStore<
      typeof speakingConversationalRepetitions.$inferSelect,
      InputOf<SpeakingConversationalRepetition>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(speakingConversationalRepetitions)
          .where(eq(speakingConversationalRepetitions.questionId, parentId))
          .orderBy(asc(speakingConversationalRepetitions.createdAt), asc(speakingConversationalRepetitions.id)),
      find: (id) =>
        executor
          .select()
          .from(speakingConversationalRepetitions)
          .where(eq(speakingConversationalRepetitions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingConversationalRepetitions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingConversationalRepetitions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingConversationalRepetitions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(speakingConversationalRepetitions)
          .where(eq(speakingConversationalRepetitions.id, id))
          .returning(),
    }),
    conversationalRepetitionQas: slotStore<
      typeof speakingConversationalRepetitionQas.$inferSelect,
      InputOf<SpeakingConversationalRepetitionQa>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(speakingConversationalRepetitionQas)
          .where(eq(speakingConversationalRepetitionQas.questionId, parentId))
          .orderBy(asc(speakingConversationalRepetitionQas.createdAt), asc(speakingConversationalRepetitionQas.id)),
      find: (id) =>
        executor
          .select()
          .from(speakingConversationalRepetitionQas)
          .where(eq(speakingConversationalRepetitionQas.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingConversationalRepetitionQas)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingConversationalRepetitionQas)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingConversationalRepetitionQas.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(speakingConversationalRepetitionQas)
          .where(eq(speakingConversationalRepetitionQas.id, id))
          .returning(),
    }),
    conversationalOpen: slotStore<
      typeof speakingConversationalOpens.$inferSelect,
      InputOf<SpeakingConversationalOpen>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(speakingConversationalOpens)
          .where(eq(speakingConversationalOpens.questionId, parentId))
          .orderBy(asc(speakingConversationalOpens.createdAt), asc(speakingConversationalOpens.id)),
      find: (id) => executor.select().from(speakingConversationalOpens).where(eq(speakingConversationalOpens.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(speakingConversationalOpens)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(speakingConversationalOpens)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(speakingConversationalOpens.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(speakingConversationalOpens)
          .where(eq(speakingConversationalOpens.id, id))
          .returning(),
    }),
  }
}

export function createSpeakingRepository(db: Database) {
  return createDrizzleRepository<SpeakingShape>({
    kind: 'speaking',
    db,
    parents: speakingParents,
    slots: speakingSlots,
  })
}
