/**
 * Test Session Schema
 *
 * One row per test attempt. Ability fields (theta, se) are written only by
 * the adaptive engine. Rows are frozen once completed or abandoned.
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  jsonb,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

export const testSessions = pgTable(
  "test_sessions",
  {
    /** Session identifier */
    id: text("id").primaryKey(),

    /** Test taker */
    userId: text("user_id").notNull(),

    /** adaptive | fixed */
    mode: text("mode").notNull(),

    /** in_progress | completed | abandoned */
    status: text("status").default("in_progress").notNull(),

    /** Engine state machine phase */
    phase: text("phase").default("initialized").notNull(),

    /** Item ids in administration order */
    administeredItemIds: jsonb("administered_item_ids").$type<string[]>().notNull(),

    /** Item awaiting an answer, if any */
    currentItemId: text("current_item_id"),

    /** Current ability estimate */
    theta: doublePrecision("theta").notNull(),

    /** Standard error of the ability estimate */
    se: doublePrecision("se").notNull(),

    /** Answered item count */
    itemsAdministered: integer("items_administered").default(0).notNull(),

    /** se_threshold | max_items | pool_exhausted */
    stoppingReason: text("stopping_reason"),

    /** Correct answers at completion */
    correctAnswers: integer("correct_answers"),

    /** Items scored at completion */
    totalQuestions: integer("total_questions"),

    /** Scaled score at completion */
    scaledScore: integer("scaled_score"),

    startedAt: timestamp("started_at", { withTimezone: true }).defaultNow().notNull(),

    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => [
    index("idx_sessions_user_completed").on(table.userId, table.completedAt),
    index("idx_sessions_status").on(table.status),
  ],
);
