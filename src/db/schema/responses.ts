/**
 * Response Schema
 *
 * One immutable row per answered item. The unique key makes a retried
 * submission of the same answer a no-op.
 */

import {
  pgTable,
  text,
  integer,
  boolean,
  doublePrecision,
  timestamp,
  unique,
  index,
} from "drizzle-orm/pg-core";
import { items } from "./items.ts";
import { testSessions } from "./test-sessions.ts";

export const responses = pgTable(
  "responses",
  {
    sessionId: text("session_id")
      .references(() => testSessions.id)
      .notNull(),

    itemId: text("item_id")
      .references(() => items.id)
      .notNull(),

    userId: text("user_id").notNull(),

    isCorrect: boolean("is_correct").notNull(),

    /** Ability estimate before this answer was scored */
    abilityEstimateAtTime: doublePrecision("ability_estimate_at_time"),

    /** 0-based administration order within the session */
    position: integer("position").notNull(),

    answeredAt: timestamp("answered_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    unique("responses_session_item_unique").on(table.sessionId, table.itemId),
    index("idx_responses_item").on(table.itemId),
  ],
);
