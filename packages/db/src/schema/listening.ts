import { index, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";
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
 * listening_questions
 *
 * ELI5:
 * Same parent shape as every other kind, plus the audio to play and its
 * transcript.
 */
export const listeningQuestions = pgTable(
  "listening_questions",
  {
    ...contentItemColumns("listening"),
    audioUrls: text("audio_urls").array().notNull(),
    transcript: text("transcript").notNull(),
  },
  (table) => ({
    listeningQuestionsTypeIdx: index("listening_questions_type_idx").on(
      table.type,
    ),
    listeningQuestionsCreatedAtIdx: index(
      "listening_questions_created_at_idx",
    ).on(table.createdAt),
  }),
);

export const listeningFillInTheBlankQuestions = pgTable(
  "listening_fill_in_the_blank_questions",
  {
    ...subRecordColumns("listening_blank", () => listeningQuestions.id),
    ...promptColumns(),
  },
  (table) => ({
    listeningFillInTheBlankQuestionsQuestionUnique: uniqueIndex(
      "listening_fill_in_the_blank_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const listeningFillInTheBlankAnswers = pgTable(
  "listening_fill_in_the_blank_answers",
  {
    ...subRecordColumns("listening_blank_answer", () => listeningQuestions.id),
    ...answerColumns(),
  },
  (table) => ({
    listeningFillInTheBlankAnswersQuestionIdx: index(
      "listening_fill_in_the_blank_answers_question_idx",
    ).on(table.questionId),
  }),
);

export const listeningChoiceOneQuestions = pgTable(
  "listening_choice_one_questions",
  {
    ...subRecordColumns("listening_choice", () => listeningQuestions.id),
    ...explainedPromptColumns(),
  },
  (table) => ({
    listeningChoiceOneQuestionsQuestionUnique: uniqueIndex(
      "listening_choice_one_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const listeningChoiceOneOptions = pgTable(
  "listening_choice_one_options",
  {
    ...subRecordColumns("listening_choice_option", () => listeningQuestions.id),
    ...optionColumns(),
  },
  (table) => ({
    listeningChoiceOneOptionsQuestionIdx: index(
      "listening_choice_one_options_question_idx",
    ).on(table.questionId),
  }),
);

export const listeningChoiceMultiQuestions = pgTable(
  "listening_choice_multi_questions",
  {
    ...subRecordColumns("listening_multi", () => listeningQuestions.id),
    ...explainedPromptColumns(),
  },
  (table) => ({
    listeningChoiceMultiQuestionsQuestionUnique: uniqueIndex(
      "listening_choice_multi_questions_question_unique",
    ).on(table.questionId),
  }),
);

export const listeningChoiceMultiOptions = pgTable(
  "listening_choice_multi_options",
  {
    ...subRecordColumns("listening_multi_option", () => listeningQuestions.id),
    ...optionColumns(),
  },
  (table) => ({
    listeningChoiceMultiOptionsQuestionIdx: index(
      "listening_choice_multi_options_question_idx",
    ).on(table.questionId),
  }),
);

/** Label to place on the map image. */
export const listeningMapLabellings = pgTable(
  "listening_map_labellings",
  {
    ...subRecordColumns("listening_map_label", () => listeningQuestions.id),
    ...pairColumns(),
  },
  (table) => ({
    listeningMapLabellingsQuestionIdx: index(
      "listening_map_labellings_question_idx",
    ).on(table.questionId),
  }),
);

export const listeningMatchings = pgTable(
  "listening_matchings",
  {
    ...subRecordColumns("listening_matching", () => listeningQuestions.id),
    ...pairColumns(),
  },
  (table) => ({
    listeningMatchingsQuestionIdx: index("listening_matchings_question_idx").on(
      table.questionId,
    ),
  }),
);

export type ListeningQuestionRow = typeof listeningQuestions.$inferSelect;
