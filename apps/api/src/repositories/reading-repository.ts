import { asc, desc, eq, inArray } from 'drizzle-orm'
import {
  readingChoiceMultiOptions,
  readingChoiceMultiQuestions,
  readingChoiceOneOptions,
  readingChoiceOneQuestions,
  readingFillInTheBlankAnswers,
  readingFillInTheBlankQuestions,
  readingMatchings,
  readingQuestions,
  readingTrueFalses,
  type Database,
  type Executor,
} from '@lingo/db'
import type { ReadingShape } from '../content/kinds/reading.js'
import type {
  AnswerRecord,
  ExplainedPromptRecord,
  InputOf,
  OptionRecord,
  PairRecord,
  PromptRecord,
} from '../content/records.js'
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

function readingParents(executor: Executor): ParentQueries<ReadingShape> {
  const t = readingQuestions
  return {
    findById: async (id) => firstRow(await executor.select().from(t).where(eq(t.id, id))),
    findByIds: (ids) => executor.select().from(t).where(inArray(t.id, ids)).orderBy(desc(t.createdAt), desc(t.id)),
    findNewer: (pairs) => executor.select().from(t).where(newerThan(t, pairs)).orderBy(desc(t.createdAt), desc(t.id)),
    insert: async (input) => requireRow(await executor.insert(t).values(input).returning(), 'reading question'),
    save: async (item) =>
      firstRow(
        await executor
          .update(t)
          .set({ ...mutableColumns(item), title: item.title, passages: item.passages })
          .where(eq(t.id, item.id))
          .returning(),
      ),
    remove: async (id) => (await executor.delete(t).where(eq(t.id, id)).returning({ id: t.id })).length > 0,
    removeAll: async () => (await executor.delete(t).returning({ id: t.id })).length,
  }
}

function readingSlots(executor: Executor): SlotStores<ReadingShape> {
  return {
    trueFalse: slotStore<typeof readingTrueFalses.$inferSelect, InputOf<PairRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingTrueFalses)
          .where(eq(readingTrueFalses.questionId, parentId))
          .orderBy(asc(readingTrueFalses.createdAt), asc(readingTrueFalses.id)),
      find: (id) => executor.select().from(readingTrueFalses).where(eq(readingTrueFalses.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingTrueFalses)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingTrueFalses)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingTrueFalses.id, id))
          .returning(),
      remove: (id) => executor.delete(readingTrueFalses).where(eq(readingTrueFalses.id, id)).returning(),
    }),
    fillInTheBlankQuestion: slotStore<typeof readingFillInTheBlankQuestions.$inferSelect, InputOf<PromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingFillInTheBlankQuestions)
          .where(eq(readingFillInTheBlankQuestions.questionId, parentId))
          .orderBy(asc(readingFillInTheBlankQuestions.createdAt), asc(readingFillInTheBlankQuestions.id)),
      find: (id) =>
        executor
          .select()
          .from(readingFillInTheBlankQuestions)
          .where(eq(readingFillInTheBlankQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingFillInTheBlankQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingFillInTheBlankQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingFillInTheBlankQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(readingFillInTheBlankQuestions)
          .where(eq(readingFillInTheBlankQuestions.id, id))
          .returning(),
    }),
    fillInTheBlankAnswers: slotStore<typeof readingFillInTheBlankAnswers.$inferSelect, InputOf<AnswerRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingFillInTheBlankAnswers)
          .where(eq(readingFillInTheBlankAnswers.questionId, parentId))
          .orderBy(asc(readingFillInTheBlankAnswers.createdAt), asc(readingFillInTheBlankAnswers.id)),
      find: (id) => executor.select().from(readingFillInTheBlankAnswers).where(eq(readingFillInTheBlankAnswers.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingFillInTheBlankAnswers)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingFillInTheBlankAnswers)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingFillInTheBlankAnswers.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(readingFillInTheBlankAnswers)
          .where(eq(readingFillInTheBlankAnswers.id, id))
          .returning(),
    }),
    choiceOneQuestion: slotStore<typeof readingChoiceOneQuestions.$inferSelect, InputOf<ExplainedPromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingChoiceOneQuestions)
          .where(eq(readingChoiceOneQuestions.questionId, parentId))
          .orderBy(asc(readingChoiceOneQuestions.createdAt), asc(readingChoiceOneQuestions.id)),
      find: (id) => executor.select().from(readingChoiceOneQuestions).where(eq(readingChoiceOneQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingChoiceOneQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingChoiceOneQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingChoiceOneQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(readingChoiceOneQuestions)
          .where(eq(readingChoiceOneQuestions.id, id))
          .returning(),
    }),
    choiceOneOptions: slotStore<typeof readingChoiceOneOptions.$inferSelect, InputOf<OptionRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingChoiceOneOptions)
          .where(eq(readingChoiceOneOptions.questionId, parentId))
          .orderBy(asc(readingChoiceOneOptions.createdAt), asc(readingChoiceOneOptions.id)),
      find: (id) => executor.select().from(readingChoiceOneOptions).where(eq(readingChoiceOneOptions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingChoiceOneOptions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingChoiceOneOptions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingChoiceOneOptions.id, id))
          .returning(),
      remove: (id) => executor.delete(readingChoiceOneOptions).where(eq(readingChoiceOneOptions.id, id)).returning(),
    }),
    choiceMultiQuestion: slotStore<typeof readingChoiceMultiQuestions.$inferSelect, InputOf<ExplainedPromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingChoiceMultiQuestions)
          .where(eq(readingChoiceMultiQuestions.questionId, parentId))
          .orderBy(asc(readingChoiceMultiQuestions.createdAt), asc(readingChoiceMultiQuestions.id)),
      find: (id) => executor.select().from(readingChoiceMultiQuestions).where(eq(readingChoiceMultiQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingChoiceMultiQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingChoiceMultiQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingChoiceMultiQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(readingChoiceMultiQuestions)
          .where(eq(readingChoiceMultiQuestions.id, id))
          .returning(),
    }),
    choiceMultiOptions: slotStore<typeof readingChoiceMultiOptions.$inferSelect, InputOf<OptionRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingChoiceMultiOptions)
          .where(eq(readingChoiceMultiOptions.questionId, parentId))
          .orderBy(asc(readingChoiceMultiOptions.createdAt), asc(readingChoiceMultiOptions.id)),
      find: (id) => executor.select().from(readingChoiceMultiOptions).where(eq(readingChoiceMultiOptions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingChoiceMultiOptions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingChoiceMultiOptions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingChoiceMultiOptions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(readingChoiceMultiOptions)
          .where(eq(readingChoiceMultiOptions.id, id))
          .returning(),
    }),
    matching: slotStore<typeof readingMatchings.$inferSelect, InputOf<PairRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(readingMatchings)
          .where(eq(readingMatchings.questionId, parentId))
          .orderBy(asc(readingMatchings.createdAt), asc(readingMatchings.id)),
      find: (id) => executor.select().from(readingMatchings).where(eq(readingMatchings.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(readingMatchings)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(readingMatchings)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(readingMatchings.id, id))
          .returning(),
      remove: (id) => executor.delete(readingMatchings).where(eq(readingMatchings.id, id)).returning(),
    }),
  }
}

export function createReadingRepository(db: Database) {
  return createDrizzleRepository<ReadingShape>({
    kind: 'reading',
    db,
    parents: readingParents,
    slots: readingSlots,
  })
}
