import { index, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";
import { contentItemColumns, subRecordColumns } from "./_common";

/**
 * speaking_questions
 *
 * Parent row for pronunciation and conversation practice.
 */
export const speakingQuestions = pgTable(
  "speaking_questions",
  {
    ...contentItemColumns("speaking"),
  },
  (table) => ({
    speakingQuestionsTypeIdx: index("speaking_questions_type_idx").on(
      table.type,
    ),
    speakingQuestionsCreatedAtIdx: index(
      "speaking_questions_created_at_idx",
    ).on(table.createdAt),
  }),
);

export const speakingWordRepetitions = pgTable(
  "speaking_word_repetitions",
  {
    ...subRecordColumns("speaking_word", () => speakingQuestions.id),
    word: text("word").notNull(),
    mean: text("mean").notNull(),
  },
  (table) => ({
    speakingWordRepetitionsQuestionIdx: index(
      "speaking_word_repetitions_question_idx",
    ).on(table.questionId),
  }),
);

export const speakingPhraseRepetitions = pgTable(
  "speaking_phrase_repetitions",
  {
    ...subRecordColumns("speaking_phrase", () => speakingQuestions.id),
    phrase: text("phrase").notNull(),
    mean: text("mean").notNull(),
  },
  (table) => ({
    speakingPhraseRepetitionsQuestionIdx: index(
      "speaking_phrase_repetitions_question_idx",
    ).on(table.questionId),
  }),
);

export const speakingParagraphRepetitions = pgTable(
  "speaking_paragraph_repetitions",
  {
    ...subRecordColumns("speaking_paragraph", () => speakingQuestions.id),
    paragraph: text("paragraph").notNull(),
    mean: text("mean").notNull(),
  },
  (table) => ({
    speakingParagraphRepetitionsQuestionIdx: index(
      "speaking_paragraph_repetitions_question_idx",
    ).on(table.questionId),
  }),
);

/** Free answer to a prompt, with a model passage. */
export const speakingOpenParagraphs = pgTable(
  "speaking_open_paragraphs",
  {
    ...subRecordColumns("speaking_open_paragraph", () => speakingQuestions.id),
    question: text("question").notNull(),
    examplePassage: text("example_passage").notNull(),
    meanOfExamplePassage: text("mean_of_example_passage").notNull(),
  },
  (table) => ({
    speakingOpenParagraphsQuestionIdx: index(
      "speaking_open_paragraphs_question_idx",
    ).on(table.questionId),
  }),
);

/** Scripted conversation header. One per question. */
export const speakingConversationalRepetitions = pgTable(
  "speaking_conversational_repetitions",
  {
    ...subRecordColumns("speaking_conversation", () => speakingQuestions.id),
    title: text("title").notNull(),
    overview: text("overview").notNull(),
  },
  (table) => ({
    speakingConversationalRepetitionsQuestionUnique: uniqueIndex(
      "speaking_conversational_repetitions_question_unique",
    ).on(table.questionId),
  }),
);

/** Turns of the scripted conversation. */
export const speakingConversationalRepetitionQas = pgTable(
  "speaking_conversational_repetition_qas",
  {
    ...subRecordColumns("speaking_conversation_qa", () => speakingQuestions.id),
    question: text("question").notNull(),
    answer: text("answer").notNull(),
    meanOfQuestion: text("mean_of_question").notNull(),
    meanOfAnswer: text("mean_of_answer").notNull(),
    explain: text("explain").notNull(),
  },
  (table) => ({
    speakingConversationalRepetitionQasQuestionIdx: index(
      "speaking_conversational_repetition_qas_question_idx",
    ).on(table.questionId),
  }),
);

/** Open conversation with an example dialogue. One per question. */
export const speakingConversationalOpens = pgTable(
  "speaking_conversational_opens",
  {
    ...subRecordColumns("speaking_conversation_open", () => speakingQuestions.id),
    title: text("title").notNull(),
    overview: text("overview").notNull(),
    exampleConversation: text("example_conversation").notNull(),
  },
  (table) => ({
    speakingConversationalOpensQuestionUnique: uniqueIndex(
      "speaking_conversational_opens_question_unique",
    ).on(table.questionId),
  }),
);

export type SpeakingQuestionRow = typeof speakingQuestions.$inferSelect;
