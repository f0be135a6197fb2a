import { index, integer, pgTable, text, varchar } from "drizzle-orm/pg-core";
import { contentItemColumns, subRecordColumns } from "./_common";

/**
 * writing_questions
 *
 * ELI5:
 * Parent row for one writing exercise. The body lives in exactly one of the
 * sub-record tables below, chosen by `type` (SENTENCE_COMPLETION or ESSAY).
 */
export const writingQuestions = pgTable(
  "writing_questions",
  {
    ...contentItemColumns("writing"),
  },
  (table) => ({
    writingQuestionsTypeIdx: index("writing_questions_type_idx").on(table.type),
    writingQuestionsCreatedAtIdx: index("writing_questions_created_at_idx").on(
      table.createdAt,
    ),
  }),
);

/** Sentence the learner has to finish around a given fragment. */
export const writingSentenceCompletions = pgTable(
  "writing_sentence_completions",
  {
    ...subRecordColumns("writing_sentence", () => writingQuestions.id),
    exampleSentence: text("example_sentence").notNull(),
    givenPartSentence: text("given_part_sentence").notNull(),

    /** Where the given fragment sits: `start` or `end`. */
    position: varchar("position", { length: 10 }).notNull(),
    requiredWords: text("required_words").array().notNull(),
    explain: text("explain").notNull(),
    minWords: integer("min_words").notNull(),
    maxWords: integer("max_words").notNull(),
  },
  (table) => ({
    writingSentenceCompletionsQuestionIdx: index(
      "writing_sentence_completions_question_idx",
    ).on(table.questionId),
  }),
);

/** Essay prompt with rubric points and a sample answer. */
export const writingEssays = pgTable(
  "writing_essays",
  {
    ...subRecordColumns("writing_essay", () => writingQuestions.id),
    essayType: varchar("essay_type", { length: 50 }).notNull(),
    requiredPoints: text("required_points").array().notNull(),
    minWords: integer("min_words").notNull(),
    maxWords: integer("max_words").notNull(),
    sampleEssay: text("sample_essay").notNull(),
    explain: text("explain").notNull(),
  },
  (table) => ({
    writingEssaysQuestionIdx: index("writing_essays_question_idx").on(
      table.questionId,
    ),
  }),
);

export type WritingQuestionRow = typeof writingQuestions.$inferSelect;
export type WritingSentenceCompletionRow =
  typeof writingSentenceCompletions.$inferSelect;
export type WritingEssayRow = typeof writingEssays.$inferSelect;
