import { sql } from "drizzle-orm";
import {
  AnyPgColumn,
  boolean,
  integer,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { generateId } from "../id";

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () =>
  timestamp("created_at", { withTimezone: true }).defaultNow().notNull();

/** Last update timestamp (application refreshes it on mutation). */
export const updatedAt = () =>
  timestamp("updated_at", { withTimezone: true }).defaultNow().notNull();

/** Text FK helper for tagged KSUID ids. */
export const idRef = (name: string) => text(name);

/** Primary key helper using tagged KSUID generation. */
export const idWithTag = (tag = "") =>
  idRef("id")
    .primaryKey()
    .$defaultFn(() => generateId(tag));

/**
 * Columns every content item parent table shares.
 *
 * ELI5:
 * A content item is one exercise. `type` says which sub-record tables hold
 * its body, and `version` is bumped by the application on every direct field
 * update (never by sub-record writes).
 */
export const contentItemColumns = (tag: string) => ({
  /** Stable primary key. */
  id: idWithTag(tag),

  /** Exercise subtype discriminator, e.g. `FILL_IN_THE_BLANK`. */
  type: varchar("type", { length: 50 }).notNull(),

  /** Topic labels (at least one). */
  topic: varchar("topic", { length: 100 }).array().notNull(),

  /** Learner-facing instruction text. */
  instruction: text("instruction").notNull(),

  /** Optional illustration URLs. */
  imageUrls: text("image_urls")
    .array()
    .default(sql`'{}'::text[]`)
    .notNull(),

  /** Time limit in seconds. */
  maxTime: integer("max_time").notNull(),

  /** Monotonic field-update counter, starts at 1. */
  version: integer("version").default(1).notNull(),

  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

/**
 * Ownership columns for a sub-record: its own id plus the cascading FK to the
 * parent content item.
 */
export const subRecordColumns = (tag: string, parentId: () => AnyPgColumn) => ({
  id: idWithTag(tag),
  questionId: idRef("question_id")
    .references(parentId, { onDelete: "cascade" })
    .notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

/** Prompt-only record (fill-in-the-blank question text). */
export const promptColumns = () => ({
  question: text("question").notNull(),
});

/** Prompt plus explanation (choice question headers). */
export const explainedPromptColumns = () => ({
  question: text("question").notNull(),
  explain: text("explain").notNull(),
});

/** Answer plus explanation (fill-in-the-blank answers). */
export const answerColumns = () => ({
  answer: text("answer").notNull(),
  explain: text("explain").notNull(),
});

/** One selectable option in a choice question. */
export const optionColumns = () => ({
  options: text("options").notNull(),
  isCorrect: boolean("is_correct").default(false).notNull(),
});

/** Question/answer pair with explanation (matching, map labelling, true/false). */
export const pairColumns = () => ({
  question: text("question").notNull(),
  answer: text("answer").notNull(),
  explain: text("explain").notNull(),
});
