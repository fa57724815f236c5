/**
 * Measurement Zod Schemas
 *
 * Enumerations shared by the domain model and the request schemas of the
 * admin and session routes. Types are inferred from the schemas so the
 * two never drift apart.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

/** Cognitive domain an item measures */
export const questionTypeEnum = z.enum([
  "pattern",
  "logic",
  "spatial",
  "math",
  "verbal",
  "memory",
]);
export type QuestionType = z.infer<typeof questionTypeEnum>;

/** Authored difficulty tier, ordered easy < medium < hard */
export const difficultyLevelEnum = z.enum(["easy", "medium", "hard"]);
export type DifficultyLevel = z.infer<typeof difficultyLevelEnum>;

export const qualityFlagEnum = z.enum(["normal", "under_review", "deactivated"]);
export type QualityFlag = z.infer<typeof qualityFlagEnum>;

export const metricTypeEnum = z.enum([
  "cronbachs_alpha",
  "test_retest",
  "split_half",
]);
export type MetricType = z.infer<typeof metricTypeEnum>;

export const testStatusEnum = z.enum(["in_progress", "completed", "abandoned"]);
export type TestStatus = z.infer<typeof testStatusEnum>;

export const testModeEnum = z.enum(["adaptive", "fixed"]);
export type TestMode = z.infer<typeof testModeEnum>;

export const informationModelEnum = z.enum(["1pl", "2pl", "3pl"]);
export type InformationModelName = z.infer<typeof informationModelEnum>;

// ---------------------------------------------------------------------------
// Admin request schemas
// ---------------------------------------------------------------------------

/** Query-string booleans arrive as text */
const queryBoolean = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const discriminationReportQuerySchema = z.object({
  min_responses: z.coerce.number().int().min(1).default(50),
});

/**
 * The "reason required when deactivating" rule is enforced by the flag
 * controller so it can answer 422 rather than a generic 400.
 */
export const qualityFlagUpdateSchema = z.object({
  quality_flag: qualityFlagEnum,
  reason: z.string().max(500).optional(),
});

export const reliabilityReportQuerySchema = z.object({
  min_sessions: z.coerce.number().int().min(1).default(100),
  min_retest_pairs: z.coerce.number().int().min(1).default(30),
  store_metrics: queryBoolean,
});

export const reliabilityHistoryQuerySchema = z.object({
  metric_type: metricTypeEnum.optional(),
  days: z.coerce.number().int().min(1).max(365).default(90),
});

// ---------------------------------------------------------------------------
// Session request schemas
// ---------------------------------------------------------------------------

export const startSessionSchema = z.object({
  userId: z.string().min(1).max(128),
});

export const startFixedSessionSchema = startSessionSchema.extend({
  totalItems: z.number().int().min(1).max(100).optional(),
});

export const submitResponseSchema = z.object({
  itemId: z.string().min(1),
  isCorrect: z.boolean(),
});

export const submitFixedSessionSchema = z.object({
  responses: z.array(submitResponseSchema).min(1),
});

export type DiscriminationReportQuery = z.infer<typeof discriminationReportQuerySchema>;
export type QualityFlagUpdate = z.infer<typeof qualityFlagUpdateSchema>;
export type ReliabilityReportQuery = z.infer<typeof reliabilityReportQuerySchema>;
export type ReliabilityHistoryQuery = z.infer<typeof reliabilityHistoryQuerySchema>;
export type SubmitResponse = z.infer<typeof submitResponseSchema>;
