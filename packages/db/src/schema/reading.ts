import {
  index,
  pgTable,
  text,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import {
  answerColumns,
  contentItemColumns,
  explainedPromptColumns,
  optionColumns,
  pairColumns,
  promptColumns,
  subRecordColumns,
} from "./_common";

/**
 * reading_questions
 *
 * Parent row for reading comprehension. Carries the passage text itself so a
 * client can render the exercise without another lookup.
 */
export const readingQuestions = pgTable(
  "reading_questions",
  {
    ...contentItemColumns("reading"),
    title: varchar("title", { length: 200 }).notNull(),
    passages: text("passages").array().notNull(),
  },
  (table) => ({
    readingQuestionsTypeIdx: index("reading_questions_type_idx").on(table.type),
    readingQuestionsCreatedAtIdx: index("reading_questions_created_at_idx").on(
      table.createdAt,
    ),
  }),
);

/** Statement judged TRUE / FALSE / NOT GIVEN against the passage. */
export const readingTrueFalses = pgTable(
  "reading_true_falses",
  {
    ...subRecordColumns("reading_true_false", () => readingQuestions.id),
    ...pairColumns(),
  },
  (table) => ({
    readingTrueFalsesQuestionIdx: index("reading_true_falses_question_idx").on(
      table.questionId,
    ),
  }),
);

export const readingFillInTheBlankQuestions = pgTable(
  "reading_fill_in_the_blank_questions",
  {
    ...subRecordColumns("reading_blank", () => readingQuestions.id),
    ...promptColumns(),
  },
  (table) => ({
    readingFillInTheBlankQuestionsQuestionUnique: uniqueIndex(
      "reading_fill_in_the_blank_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const readingFillInTheBlankAnswers = pgTable(
  "reading_fill_in_the_blank_answers",
  {
    ...subRecordColumns("reading_blank_answer", () => readingQuestions.id),
    ...answerColumns(),
  },
  (table) => ({
    readingFillInTheBlankAnswersQuestionIdx: index(
      "reading_fill_in_the_blank_answers_question_idx",
    ).on(table.questionId),
  }),
);

export const readingChoiceOneQuestions = pgTable(
  "reading_choice_one_questions",
  {
    ...subRecordColumns("reading_choice", () => readingQuestions.id),
    ...explainedPromptColumns(),
  },
  (table) => ({
    readingChoiceOneQuestionsQuestionUnique: uniqueIndex(
      "reading_choice_one_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const readingChoiceOneOptions = pgTable(
  "reading_choice_one_options",
  {
    ...subRecordColumns("reading_choice_option", () => readingQuestions.id),
    ...optionColumns(),
  },
  (table) => ({
    readingChoiceOneOptionsQuestionIdx: index(
      "reading_choice_one_options_question_idx",
    ).on(table.questionId),
  }),
);

export const readingChoiceMultiQuestions = pgTable(
  "reading_choice_multi_questions",
  {
    ...subRecordColumns("reading_multi", () => readingQuestions.id),
    ...explainedPromptColumns(),
  },
  (table) => ({
    readingChoiceMultiQuestionsQuestionUnique: uniqueIndex(
      "reading_choice_multi_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const readingChoiceMultiOptions = pgTable(
  "reading_choice_multi_options",
  {
    ...subRecordColumns("reading_multi_option", () => readingQuestions.id),
    ...optionColumns(),
  },
  (table) => ({
    readingChoiceMultiOptionsQuestionIdx: index(
      "reading_choice_multi_options_question_idx",
    ).on(table.questionId),
  }),
);

export const readingMatchings = pgTable(
  "reading_matchings",
  {
    ...subRecordColumns("reading_matching", () => readingQuestions.id),
    ...pairColumns(),
  },
  (table) => ({
    readingMatchingsQuestionIdx: index("reading_matchings_question_idx").on(
      table.questionId,
    ),
  }),
);

export type ReadingQuestionRow = typeof readingQuestions.$inferSelect;
