/**
 * Reliability Metrics Schema
 *
 * Append-only history of computed reliability coefficients, for trend
 * queries. Rows are never updated.
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

export const reliabilityMetrics = pgTable(
  "reliability_metrics",
  {
    id: text("id").primaryKey(),

    /** cronbachs_alpha | test_retest | split_half */
    metricType: text("metric_type").notNull(),

    /** Coefficient value */
    value: doublePrecision("value").notNull(),

    /** Sessions or pairs the value was computed from */
    sampleSize: integer("sample_size").notNull(),

    calculatedAt: timestamp("calculated_at", { withTimezone: true }).defaultNow().notNull(),

    /** Interpretation and auxiliary figures */
    details: jsonb("details").$type<Record<string, unknown>>(),
  },
  (table) => [
    index("idx_reliability_metrics_type_time").on(table.metricType, table.calculatedAt),
  ],
);
