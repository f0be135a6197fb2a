import { asc, desc, eq, inArray } from 'drizzle-orm'
import {
  writingEssays,
  writingQuestions,
  writingSentenceCompletions,
  type Database,
  type Executor,
} from '@lingo/db'
import type { WritingEssay, WritingSentenceCompletion, WritingShape } from '../content/kinds/writing.js'
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

function writingParents(executor: Executor): ParentQueries<WritingShape> {
  const t = writingQuestions
  return {
    findById: async (id) => firstRow(await executor.select().from(t).where(eq(t.id, id))),
    findByIds: (ids) => executor.select().from(t).where(inArray(t.id, ids)).orderBy(desc(t.createdAt), desc(t.id)),
    findNewer: (pairs) => executor.select().from(t).where(newerThan(t, pairs)).orderBy(desc(t.createdAt), desc(t.id)),
    insert: async (input) => requireRow(await executor.insert(t).values(input).returning(), 'writing question'),
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

function writingSlots(executor: Executor): SlotStores<WritingShape> {
  return {
    sentenceCompletion: slotStore<typeof writingSentenceCompletions.$inferSelect, InputOf<WritingSentenceCompletion>>({
      list: (parentId) =>
        executor
          .select()
          .from(writingSentenceCompletions)
          .where(eq(writingSentenceCompletions.questionId, parentId))
          .orderBy(asc(writingSentenceCompletions.createdAt), asc(writingSentenceCompletions.id)),
      find: (id) => executor.select().from(writingSentenceCompletions).where(eq(writingSentenceCompletions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(writingSentenceCompletions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(writingSentenceCompletions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(writingSentenceCompletions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(writingSentenceCompletions)
          .where(eq(writingSentenceCompletions.id, id))
          .returning(),
    }),
    essay: slotStore<typeof writingEssays.$inferSelect, InputOf<WritingEssay>>({
      list: (parentId) =>
        executor
          .select()
          .from(writingEssays)
          .where(eq(writingEssays.questionId, parentId))
          .orderBy(asc(writingEssays.createdAt), asc(writingEssays.id)),
      find: (id) => executor.select().from(writingEssays).where(eq(writingEssays.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(writingEssays)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(writingEssays)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(writingEssays.id, id))
          .returning(),
      remove: (id) => executor.delete(writingEssays).where(eq(writingEssays.id, id)).returning(),
    }),
  }
}

export function createWritingRepository(db: Database) {
  return createDrizzleRepository<WritingShape>({
    kind: 'writing',
    db,
    parents: writingParents,
    slots: writingSlots,
  })
}
