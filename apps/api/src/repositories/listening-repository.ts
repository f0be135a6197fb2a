import { asc, desc, eq, inArray } from 'drizzle-orm'
import {
  listeningChoiceMultiOptions,
  listeningChoiceMultiQuestions,
  listeningChoiceOneOptions,
  listeningChoiceOneQuestions,
  listeningFillInTheBlankAnswers,
  listeningFillInTheBlankQuestions,
  listeningMapLabellings,
  listeningMatchings,
  listeningQuestions,
  type Database,
  type Executor,
} from '@lingo/db'
import type { ListeningShape } from '../content/kinds/listening.js'
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

function listeningParents(executor: Executor): ParentQueries<ListeningShape> {
  const t = listeningQuestions
  return {
    findById: async (id) => firstRow(await executor.select().from(t).where(eq(t.id, id))),
    findByIds: (ids) => executor.select().from(t).where(inArray(t.id, ids)).orderBy(desc(t.createdAt), desc(t.id)),
    findNewer: (pairs) => executor.select().from(t).where(newerThan(t, pairs)).orderBy(desc(t.createdAt), desc(t.id)),
    insert: async (input) => requireRow(await executor.insert(t).values(input).returning(), 'listening question'),
    save: async (item) =>
      firstRow(
        await executor
          .update(t)
          .set({ ...mutableColumns(item), audioUrls: item.audioUrls, transcript: item.transcript })
          .where(eq(t.id, item.id))
          .returning(),
      ),
    remove: async (id) => (await executor.delete(t).where(eq(t.id, id)).returning({ id: t.id })).length > 0,
    removeAll: async () => (await executor.delete(t).returning({ id: t.id })).length,
  }
}

function listeningSlots(executor: Executor): SlotStores<ListeningShape> {
  return {
    fillInTheBlankQuestion: slotStore<typeof listeningFillInTheBlankQuestions.$inferSelect, InputOf<PromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningFillInTheBlankQuestions)
          .where(eq(listeningFillInTheBlankQuestions.questionId, parentId))
          .orderBy(asc(listeningFillInTheBlankQuestions.createdAt), asc(listeningFillInTheBlankQuestions.id)),
      find: (id) =>
        executor
          .select()
          .from(listeningFillInTheBlankQuestions)
          .where(eq(listeningFillInTheBlankQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningFillInTheBlankQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningFillInTheBlankQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningFillInTheBlankQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningFillInTheBlankQuestions)
          .where(eq(listeningFillInTheBlankQuestions.id, id))
          .returning(),
    }),
    fillInTheBlankAnswers: slotStore<typeof listeningFillInTheBlankAnswers.$inferSelect, InputOf<AnswerRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningFillInTheBlankAnswers)
          .where(eq(listeningFillInTheBlankAnswers.questionId, parentId))
          .orderBy(asc(listeningFillInTheBlankAnswers.createdAt), asc(listeningFillInTheBlankAnswers.id)),
      find: (id) =>
        executor
          .select()
          .from(listeningFillInTheBlankAnswers)
          .where(eq(listeningFillInTheBlankAnswers.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningFillInTheBlankAnswers)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningFillInTheBlankAnswers)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningFillInTheBlankAnswers.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningFillInTheBlankAnswers)
          .where(eq(listeningFillInTheBlankAnswers.id, id))
          .returning(),
    }),
    choiceOneQuestion: slotStore<typeof listeningChoiceOneQuestions.$inferSelect, InputOf<ExplainedPromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningChoiceOneQuestions)
          .where(eq(listeningChoiceOneQuestions.questionId, parentId))
          .orderBy(asc(listeningChoiceOneQuestions.createdAt), asc(listeningChoiceOneQuestions.id)),
      find: (id) => executor.select().from(listeningChoiceOneQuestions).where(eq(listeningChoiceOneQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningChoiceOneQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningChoiceOneQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningChoiceOneQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningChoiceOneQuestions)
          .where(eq(listeningChoiceOneQuestions.id, id))
          .returning(),
    }),
    choiceOneOptions: slotStore<typeof listeningChoiceOneOptions.$inferSelect, InputOf<OptionRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningChoiceOneOptions)
          .where(eq(listeningChoiceOneOptions.questionId, parentId))
          .orderBy(asc(listeningChoiceOneOptions.createdAt), asc(listeningChoiceOneOptions.id)),
      find: (id) => executor.select().from(listeningChoiceOneOptions).where(eq(listeningChoiceOneOptions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningChoiceOneOptions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningChoiceOneOptions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningChoiceOneOptions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningChoiceOneOptions)
          .where(eq(listeningChoiceOneOptions.id, id))
          .returning(),
    }),
    choiceMultiQuestion: slotStore<typeof listeningChoiceMultiQuestions.$inferSelect, InputOf<ExplainedPromptRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningChoiceMultiQuestions)
          .where(eq(listeningChoiceMultiQuestions.questionId, parentId))
          .orderBy(asc(listeningChoiceMultiQuestions.createdAt), asc(listeningChoiceMultiQuestions.id)),
      find: (id) =>
        executor
          .select()
          .from(listeningChoiceMultiQuestions)
          .where(eq(listeningChoiceMultiQuestions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningChoiceMultiQuestions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningChoiceMultiQuestions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningChoiceMultiQuestions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningChoiceMultiQuestions)
          .where(eq(listeningChoiceMultiQuestions.id, id))
          .returning(),
    }),
    choiceMultiOptions: slotStore<typeof listeningChoiceMultiOptions.$inferSelect, InputOf<OptionRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningChoiceMultiOptions)
          .where(eq(listeningChoiceMultiOptions.questionId, parentId))
          .orderBy(asc(listeningChoiceMultiOptions.createdAt), asc(listeningChoiceMultiOptions.id)),
      find: (id) => executor.select().from(listeningChoiceMultiOptions).where(eq(listeningChoiceMultiOptions.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningChoiceMultiOptions)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningChoiceMultiOptions)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningChoiceMultiOptions.id, id))
          .returning(),
      remove: (id) =>
        executor
          .delete(listeningChoiceMultiOptions)
          .where(eq(listeningChoiceMultiOptions.id, id))
          .returning(),
    }),
    mapLabelling: slotStore<typeof listeningMapLabellings.$inferSelect, InputOf<PairRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningMapLabellings)
          .where(eq(listeningMapLabellings.questionId, parentId))
          .orderBy(asc(listeningMapLabellings.createdAt), asc(listeningMapLabellings.id)),
      find: (id) => executor.select().from(listeningMapLabellings).where(eq(listeningMapLabellings.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningMapLabellings)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningMapLabellings)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningMapLabellings.id, id))
          .returning(),
      remove: (id) => executor.delete(listeningMapLabellings).where(eq(listeningMapLabellings.id, id)).returning(),
    }),
    matching: slotStore<typeof listeningMatchings.$inferSelect, InputOf<PairRecord>>({
      list: (parentId) =>
        executor
          .select()
          .from(listeningMatchings)
          .where(eq(listeningMatchings.questionId, parentId))
          .orderBy(asc(listeningMatchings.createdAt), asc(listeningMatchings.id)),
      find: (id) => executor.select().from(listeningMatchings).where(eq(listeningMatchings.id, id)),
      insert: (parentId, input) =>
        executor
          .insert(listeningMatchings)
          .values({ ...input, questionId: parentId })
          .returning(),
      update: (id, input) =>
        executor
          .update(listeningMatchings)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(listeningMatchings.id, id))
          .returning(),
      remove: (id) => executor.delete(listeningMatchings).where(eq(listeningMatchings.id, id)).returning(),
    }),
  }
}

export function createListeningRepository(db: Database) {
  return createDrizzleRepository<ListeningShape>({
    kind: 'listening',
    db,
    parents: listeningParents,
    slots: listeningSlots,
  })
}
