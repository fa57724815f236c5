/**
 * Admin Routes
 *
 * Operator surface for item quality and instrument reliability:
 *
 * - GET   /discrimination-report               tier summary, breakdowns, action lists, trends
 * - GET   /items/:itemId/discrimination-detail per-item deep dive
 * - PATCH /items/:itemId/quality-flag          manual flag override
 * - GET   /reliability                         alpha, test-retest, split-half + recommendations
 * - GET   /reliability/history                 stored coefficients, most recent first
 *
 * Authentication: X-Admin-Password header must match the configured admin
 * password.
 */

import { Hono } from "hono";
import type { Engine } from "../engine.ts";
import { apiError } from "../lib/errors.ts";
import { parseJsonBody, parseQuery } from "../middleware/validation.ts";
import {
  discriminationReportQuerySchema,
  qualityFlagUpdateSchema,
  reliabilityHistoryQuerySchema,
  reliabilityReportQuerySchema,
} from "../schemas/measurement.ts";

export interface AdminRouteDeps {
  engine: Pick<Engine, "flags" | "reports">;
  adminPassword: string;
}

export function createAdminRoutes({ engine, adminPassword }: AdminRouteDeps): Hono {
  const adminRoutes = new Hono();

  // ---------------------------------------------------------------------------
  // Admin Auth Middleware
  // ---------------------------------------------------------------------------

  adminRoutes.use("*", async (c, next) => {
    const password = c.req.header("X-Admin-Password");
    if (!adminPassword || !password || password !== adminPassword) {
      return apiError(c, "UNAUTHORIZED", "Invalid admin password");
    }
    return next();
  });

  // ---------------------------------------------------------------------------
  // Discrimination
  // ---------------------------------------------------------------------------

  adminRoutes.get("/discrimination-report", async (c) => {
    const query = parseQuery(c, discriminationReportQuerySchema);
    if (!query.success) return query.response;

    const report = await engine.reports.discriminationReport(query.data.min_responses);
    return c.json(report);
  });

  adminRoutes.get("/items/:itemId/discrimination-detail", async (c) => {
    const detail = await engine.reports.discriminationDetail(c.req.param("itemId"));
    return c.json(detail);
  });

  adminRoutes.patch("/items/:itemId/quality-flag", async (c) => {
    const body = await parseJsonBody(c, qualityFlagUpdateSchema);
    if (!body.success) return body.response;

    const result = await engine.flags.setQualityFlag(
      c.req.param("itemId"),
      body.data.quality_flag,
      body.data.reason,
    );
    return c.json({
      itemId: result.itemId,
      previousFlag: result.previousFlag,
      newFlag: result.newFlag,
      reason: result.reason,
      updatedAt: result.updatedAt.toISOString(),
    });
  });

  // ---------------------------------------------------------------------------
  // Reliability
  // ---------------------------------------------------------------------------

  adminRoutes.get("/reliability", async (c) => {
    const query = parseQuery(c, reliabilityReportQuerySchema);
    if (!query.success) return query.response;

    const report = await engine.reports.reliabilityReport({
      minSessions: query.data.min_sessions,
      minRetestPairs: query.data.min_retest_pairs,
      storeMetrics: query.data.store_metrics,
    });
    return c.json(report);
  });

  adminRoutes.get("/reliability/history", async (c) => {
    const query = parseQuery(c, reliabilityHistoryQuerySchema);
    if (!query.success) return query.response;

    const metrics = await engine.reports.reliabilityHistory({
      metricType: query.data.metric_type,
      days: query.data.days,
    });
    return c.json({ metrics, total: metrics.length, days: query.data.days });
  });

  return adminRoutes;
}
