import { index, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";
import {
  answerColumns,
  contentItemColumns,
  explainedPromptColumns,
  optionColumns,
  promptColumns,
  subRecordColumns,
} from "./_common";

/**
 * grammar_questions
 *
 * Parent row for grammar drills: fill-in-the-blank, single choice, error
 * identification and sentence transformation.
 */
export const grammarQuestions = pgTable(
  "grammar_questions",
  {
    ...contentItemColumns("grammar"),
  },
  (table) => ({
    grammarQuestionsTypeIdx: index("grammar_questions_type_idx").on(table.type),
    grammarQuestionsCreatedAtIdx: index("grammar_questions_created_at_idx").on(
      table.createdAt,
    ),
  }),
);

/** Blank-bearing sentence. One per question. */
export const grammarFillInTheBlankQuestions = pgTable(
  "grammar_fill_in_the_blank_questions",
  {
    ...subRecordColumns("grammar_blank", () => grammarQuestions.id),
    ...promptColumns(),
  },
  (table) => ({
    grammarFillInTheBlankQuestionsQuestionUnique: uniqueIndex(
      "grammar_fill_in_the_blank_questions_question_unique",
    ).on(table.questionId),
  }),
);

/** Accepted answers for the blanks. */
export const grammarFillInTheBlankAnswers = pgTable(
  "grammar_fill_in_the_blank_answers",
  {
    ...subRecordColumns("grammar_blank_answer", () => grammarQuestions.id),
    ...answerColumns(),
  },
  (table) => ({
    grammarFillInTheBlankAnswersQuestionIdx: index(
      "grammar_fill_in_the_blank_answers_question_idx",
    ).on(table.questionId),
  }),
);

/** Single-choice prompt. One per question. */
export const grammarChoiceOneQuestions = pgTable(
  "grammar_choice_one_questions",
  {
    ...subRecordColumns("grammar_choice", () => grammarQuestions.id),
    ...explainedPromptColumns(),
  },
  (table) => ({
    grammarChoiceOneQuestionsQuestionUnique: uniqueIndex(
      "grammar_choice_one_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const grammarChoiceOneOptions = pgTable(
  "grammar_choice_one_options",
  {
    ...subRecordColumns("grammar_choice_option", () => grammarQuestions.id),
    ...optionColumns(),
  },
  (table) => ({
    grammarChoiceOneOptionsQuestionIdx: index(
      "grammar_choice_one_options_question_idx",
    ).on(table.questionId),
  }),
);

/** Sentence with one wrong word to spot. One per question. */
export const grammarErrorIdentifications = pgTable(
  "grammar_error_identifications",
  {
    ...subRecordColumns("grammar_error", () => grammarQuestions.id),
    errorSentence: text("error_sentence").notNull(),
    errorWord: text("error_word").notNull(),
    correctWord: text("correct_word").notNull(),
    explain: text("explain").notNull(),
  },
  (table) => ({
    grammarErrorIdentificationsQuestionUnique: uniqueIndex(
      "grammar_error_identifications_question_unique",
    ).on(table.questionId),
  }),
);

/** Rewrite-the-sentence drill. One per question. */
export const grammarSentenceTransformations = pgTable(
  "grammar_sentence_transformations",
  {
    ...subRecordColumns("grammar_transform", () => grammarQuestions.id),
    originalSentence: text("original_sentence").notNull(),
    beginningWord: text("beginning_word").notNull(),
    exampleCorrectSentence: text("example_correct_sentence").notNull(),
    explain: text("explain").notNull(),
  },
  (table) => ({
    grammarSentenceTransformationsQuestionUnique: uniqueIndex(
      "grammar_sentence_transformations_question_unique",
    ).on(table.questionId),
  }),
);

export type GrammarQuestionRow = typeof grammarQuestions.$inferSelect;
