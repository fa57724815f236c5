/**
 * Item Bank Schema
 *
 * Authored test items together with the statistics the measurement engine
 * maintains for them. Items are never deleted; poor items are flagged.
 */

import {
  pgTable,
  text,
  integer,
  boolean,
  doublePrecision,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

export const items = pgTable(
  "items",
  {
    /** Item identifier */
    id: text("id").primaryKey(),

    /** Cognitive domain: pattern | logic | spatial | math | verbal | memory */
    questionType: text("question_type").notNull(),

    /** Authored difficulty tier: easy | medium | hard */
    difficultyLevel: text("difficulty_level").notNull(),

    /** Point-biserial correlation with total score; null until measured */
    discrimination: doublePrecision("discrimination"),

    /** Proportion of responses answered correctly */
    empiricalDifficulty: doublePrecision("empirical_difficulty"),

    /** All responses to the item; never decreases */
    responseCount: integer("response_count").default(0).notNull(),

    /** Responses from completed sessions that discrimination was computed from */
    scoredResponseCount: integer("scored_response_count").default(0).notNull(),

    /** normal | under_review | deactivated */
    qualityFlag: text("quality_flag").default("normal").notNull(),

    /** Why the flag was last changed */
    qualityFlagReason: text("quality_flag_reason"),

    /** When the flag was last changed */
    qualityFlagUpdatedAt: timestamp("quality_flag_updated_at", { withTimezone: true }),

    /** Whether the item is part of the live bank */
    isActive: boolean("is_active").default(true).notNull(),

    /** Calibrated IRT slope (a) */
    irtDiscrimination: doublePrecision("irt_discrimination"),

    /** Calibrated IRT location (b) */
    irtDifficulty: doublePrecision("irt_difficulty"),

    /** Calibrated IRT lower asymptote (c) */
    irtGuessing: doublePrecision("irt_guessing"),

    /** When the item was authored */
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_items_quality_flag").on(table.qualityFlag),
    index("idx_items_difficulty_type").on(table.difficultyLevel, table.questionType),
  ],
);
