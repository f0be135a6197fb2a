import { asc, desc, eq, inArray } from 'drizzle-orm'
import {
  grammarChoiceOneOptions,
  grammarChoiceOneQuestions,
  grammarErrorIdentifications,
  grammarFillInTheBlankAnswers,
  grammarFillInTheBlankQuestions,
  grammarQuestions,
  grammarSentenceTransformations,
  type Database,
  type Executor,
} from '@lingo/db'
import type {
  GrammarErrorIdentification,
  GrammarSentenceTransformation,
  GrammarShape,
} from '../content/kinds/grammar.js'
import type { AnswerRecord, ExplainedPromptRecord, InputOf, OptionRecord, PromptRecord } from '../content/records.js'
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

function grammarParents(executor: Executor): ParentQueries<GrammarShape> {
  const t = grammarQuestions
  return {
    findById: async (id) => firstRow(await executor.select().from(t).where(eq(t.id, id))),
    findByIds: (ids) => executor.select().from(t).where(inArray(t.id, ids)).orderBy(desc(t.createdAt), desc(t.id)),
    findNewer: (pairs) => executor.select().from(t).where(newerThan(t, pairs)).orderBy(desc(t.createdAt), desc(t.id)),
    insert: async (input) => requireRow(await executor.insert(t).values(input).returning(), 'grammar question'),
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

function grammarSlots(executor: Executor): SlotStores<GrammarShape> {
  return {
    fillInTheBlankQuestion: slotStore<typeof grammarFillInTheBlankQuestions.$inferSelect, InputOf<PromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(grammarFillInTheBlankQuestions)
          .where(eq(grammarFillInTheBlankQuestions.questionId, parentId))
          .orderBy(asc(grammarFillInTheBlankQuestions.createdAt), asc(grammarFillInTheBlankQuestions.id)),
      find: (id) =>
        executor
          .select()
          .from(grammarFillInTheBlankQuestions)
          .where(eq(grammarFillInTheBlankQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarFillInTheBlankQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarFillInTheBlankQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarFillInTheBlankQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(grammarFillInTheBlankQuestions)
          .where(eq(grammarFillInTheBlankQuestions.id, id))
          .returning(),
    }),
    fillInTheBlankAnswers: slotStore<typeof grammarFillInTheBlankAnswers.$inferSelect, InputOf<AnswerRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(grammarFillInTheBlankAnswers)
          .where(eq(grammarFillInTheBlankAnswers.questionId, parentId))
          .orderBy(asc(grammarFillInTheBlankAnswers.createdAt), asc(grammarFillInTheBlankAnswers.id)),
      find: (id) => executor.select().from(grammarFillInTheBlankAnswers).where(eq(grammarFillInTheBlankAnswers.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarFillInTheBlankAnswers)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarFillInTheBlankAnswers)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarFillInTheBlankAnswers.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(grammarFillInTheBlankAnswers)
          .where(eq(grammarFillInTheBlankAnswers.id, id))
          .returning(),
    }),
    choiceOneQuestion: slotStore<typeof grammarChoiceOneQuestions.$inferSelect, InputOf<ExplainedPromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(grammarChoiceOneQuestions)
          .where(eq(grammarChoiceOneQuestions.questionId, parentId))
          .orderBy(asc(grammarChoiceOneQuestions.createdAt), asc(grammarChoiceOneQuestions.id)),
      find: (id) => executor.select().from(grammarChoiceOneQuestions).where(eq(grammarChoiceOneQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarChoiceOneQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarChoiceOneQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarChoiceOneQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(grammarChoiceOneQuestions)
          .where(eq(grammarChoiceOneQuestions.id, id))
          .returning(),
    }),
    choiceOneOptions: slotStore<typeof grammarChoiceOneOptions.$inferSelect, InputOf<OptionRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(grammarChoiceOneOptions)
          .where(eq(grammarChoiceOneOptions.questionId, parentId))
          .orderBy(asc(grammarChoiceOneOptions.createdAt), asc(grammarChoiceOneOptions.id)),
      find: (id) => executor.select().from(grammarChoiceOneOptions).where(eq(grammarChoiceOneOptions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarChoiceOneOptions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarChoiceOneOptions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarChoiceOneOptions.id, id))
          .returning(),
      remove: (id) => executor.delete(grammarChoiceOneOptions).where(eq(grammarChoiceOneOptions.id, id)).returning(),
    }),
    errorIdentification: slotStore<
      typeof grammarErrorIdentifications.$inferSelect,
      InputOf<GrammarErrorIdentification>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(grammarErrorIdentifications)
          .where(eq(grammarErrorIdentifications.questionId, parentId))
          .orderBy(asc(grammarErrorIdentifications.createdAt), asc(grammarErrorIdentifications.id)),
      find: (id) => executor.select().from(grammarErrorIdentifications).where(eq(grammarErrorIdentifications.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarErrorIdentifications)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarErrorIdentifications)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarErrorIdentifications.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(grammarErrorIdentifications)
          .where(eq(grammarErrorIdentifications.id, id))
          .returning(),
    }),
    sentenceTransformation: slotStore<
      typeof grammarSentenceTransformations.$inferSelect,
      InputOf<GrammarSentenceTransformation>
    >({
      list: (parentId) =>
        executor
          .select()
          .from(grammarSentenceTransformations)
          .where(eq(grammarSentenceTransformations.questionId, parentId))
          .orderBy(asc(grammarSentenceTransformations.createdAt), asc(grammarSentenceTransformations.id)),
      find: (id) =>
        executor
          .select()
          .from(grammarSentenceTransformations)
          .where(eq(grammarSentenceTransformations.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(grammarSentenceTransformations)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(grammarSentenceTransformations)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(grammarSentenceTransformations.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(grammarSentenceTransformations)
          .where(eq(grammarSentenceTransformations.id, id))
          .returning(),
    }),
  }
}

export function createGrammarRepository(db: Database) {
  return createDrizzleRepository<GrammarShape>({
    kind: 'grammar',
    db,
    parents: grammarParents,
    slots: grammarSlots,
  })
}
