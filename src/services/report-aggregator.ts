/**
 * Report Aggregator
 *
 * Read-only composition of the item quality and reliability services into
 * the admin reports. No statistics are computed here beyond grouping.
 *
 * The discrimination report is cached for five minutes and dropped whenever
 * a quality flag changes. Reliability sections are computed independently:
 * one failing section is logged once and replaced by an `unavailable`
 * placeholder while the others still render.
 */

import {
  DEFAULT_HISTORY_DAYS,
  DEFAULT_MIN_RESPONSES,
  DEFAULT_MIN_RETEST_PAIRS,
  DEFAULT_MIN_SESSIONS,
  REPORT_CACHE_TTL_MS,
} from "../config/constants.ts";
import { NotFoundError, errorMessage } from "../lib/errors.ts";
import { MS_PER_DAY } from "../lib/math-utils.ts";
import { TtlCache } from "../lib/ttl-cache.ts";
import type {
  ItemRepository,
  ReliabilityMetric,
  ReliabilityMetricRepository,
} from "../repositories/types.ts";
import type { MetricType } from "../schemas/measurement.ts";
import { logReliabilityEvent, queryAuditLog } from "./audit-log.ts";
import {
  buildDiscriminationDetail,
  buildDiscriminationReport,
  type DiscriminationDetail,
  type DiscriminationReport,
} from "./discrimination-report.ts";
import type { QualityFlagController } from "./quality-flag-controller.ts";
import type { ReliabilityEstimator } from "./reliability-estimator.ts";
import {
  determineOverallStatus,
  generateRecommendations,
  valueOf,
  type OverallStatus,
  type Recommendation,
  type ReliabilitySections,
  type Section,
} from "./reliability-report.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReliabilityReport extends ReliabilitySections {
  overallStatus: OverallStatus;
  recommendations: Recommendation[];
  storedMetrics: MetricType[];
  generatedAt: string;
}

export interface ReliabilityReportParams {
  minSessions?: number;
  minRetestPairs?: number;
  storeMetrics?: boolean;
}

export interface ReliabilityHistoryEntry {
  id: string;
  metricType: MetricType;
  value: number;
  sampleSize: number;
  calculatedAt: string;
  details: Record<string, unknown> | null;
}

export interface ReportAggregatorDeps {
  items: ItemRepository;
  metrics: ReliabilityMetricRepository;
  reliability: ReliabilityEstimator;
  flags: QualityFlagController;
  now?: () => Date;
}

/** Audit entries scanned for an item's flag history */
const HISTORY_EVENT_LIMIT = 100;

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export class ReportAggregator {
  private readonly now: () => Date;
  private readonly reportCache: TtlCache<DiscriminationReport>;

  constructor(private readonly deps: ReportAggregatorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.reportCache = new TtlCache(REPORT_CACHE_TTL_MS, () => this.now().getTime());
    deps.flags.onFlagChange(() => this.reportCache.invalidate());
  }

  // -------------------------------------------------------------------------
  // Discrimination
  // -------------------------------------------------------------------------

  discriminationReport(minResponses: number = DEFAULT_MIN_RESPONSES): Promise<DiscriminationReport> {
    return this.reportCache.getOrCompute(`discrimination:${minResponses}`, async () => {
      const items = await this.deps.items.list();
      return buildDiscriminationReport(items, minResponses, this.now());
    });
  }

  async discriminationDetail(itemId: string): Promise<DiscriminationDetail> {
    const item = await this.deps.items.get(itemId);
    if (!item) throw new NotFoundError("item", itemId);

    const items = await this.deps.items.list();
    const { events } = queryAuditLog({ itemId, limit: HISTORY_EVENT_LIMIT });
    return buildDiscriminationDetail(item, items, events);
  }

  // -------------------------------------------------------------------------
  // Reliability
  // -------------------------------------------------------------------------

  private async section<T>(name: string, compute: () => Promise<T>): Promise<Section<T>> {
    try {
      return await compute();
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[ReliabilityReport] ${name} calculation failed: ${message}`);
      logReliabilityEvent("calculation_failed", `${name} calculation failed`, "error", {
        section: name,
        error: message,
      });
      return { unavailable: true, error: message };
    }
  }

  async reliabilityReport(params: ReliabilityReportParams = {}): Promise<ReliabilityReport> {
    const minSessions = params.minSessions ?? DEFAULT_MIN_SESSIONS;
    const minPairs = params.minRetestPairs ?? DEFAULT_MIN_RETEST_PAIRS;
    const storeMetrics = params.storeMetrics ?? false;
    const options = { bypassCache: storeMetrics };
    const { reliability } = this.deps;

    const [internalConsistency, testRetest, splitHalf] = await Promise.all([
      this.section("Cronbach's alpha", () => reliability.computeAlpha(minSessions, options)),
      this.section("Test-retest", () => reliability.computeTestRetest({ minPairs }, options)),
      this.section("Split-half", () => reliability.computeSplitHalf(minSessions, options)),
    ]);
    const sections: ReliabilitySections = { internalConsistency, testRetest, splitHalf };

    const storedMetrics = storeMetrics ? await this.storeMetrics(sections) : [];
    const overallStatus = determineOverallStatus(sections);
    const recommendations = generateRecommendations(sections);

    console.log(
      `[ReliabilityReport] Generated: status=${overallStatus}, recommendations=${recommendations.length}, stored=${storedMetrics.length}`,
    );

    return {
      ...sections,
      overallStatus,
      recommendations,
      storedMetrics,
      generatedAt: this.now().toISOString(),
    };
  }

  /**
   * Append one metric row per computed coefficient. A failed append is
   * logged and skipped.
   */
  private async storeMetrics(sections: ReliabilitySections): Promise<MetricType[]> {
    const calculatedAt = this.now();
    const rows: Array<Omit<ReliabilityMetric, "id">> = [];

    const alpha = valueOf(sections.internalConsistency);
    if (alpha) {
      rows.push({
        metricType: "cronbachs_alpha",
        value: alpha.alpha,
        sampleSize: alpha.numSessions,
        calculatedAt,
        details: { numItems: alpha.numItems, interpretation: alpha.interpretation },
      });
    }
    const retest = valueOf(sections.testRetest);
    if (retest) {
      rows.push({
        metricType: "test_retest",
        value: retest.r,
        sampleSize: retest.numPairs,
        calculatedAt,
        details: {
          meanIntervalDays: retest.meanIntervalDays,
          practiceEffect: retest.scoreChange.practiceEffect,
          interpretation: retest.interpretation,
        },
      });
    }
    const split = valueOf(sections.splitHalf);
    if (split) {
      rows.push({
        metricType: "split_half",
        value: split.spearmanBrown,
        sampleSize: split.numSessions,
        calculatedAt,
        details: { rHalf: split.rHalf, numItems: split.numItems, interpretation: split.interpretation },
      });
    }

    const stored: MetricType[] = [];
    for (const row of rows) {
      try {
        await this.deps.metrics.append(row);
        stored.push(row.metricType);
        logReliabilityEvent("metric_stored", `Stored ${row.metricType} = ${row.value}`, "info", {
          metricType: row.metricType,
          value: row.value,
          sampleSize: row.sampleSize,
        });
      } catch (err) {
        console.error(`[ReliabilityReport] Failed to store ${row.metricType}: ${errorMessage(err)}`);
      }
    }
    return stored;
  }

  async reliabilityHistory(
    params: { metricType?: MetricType; days?: number } = {},
  ): Promise<ReliabilityHistoryEntry[]> {
    const days = params.days ?? DEFAULT_HISTORY_DAYS;
    const since = new Date(this.now().getTime() - days * MS_PER_DAY);
    const rows = await this.deps.metrics.history({ metricType: params.metricType, since });
    return rows.map((m) => ({
      id: m.id,
      metricType: m.metricType,
      value: m.value,
      sampleSize: m.sampleSize,
      calculatedAt: m.calculatedAt.toISOString(),
      details: m.details,
    }));
  }
}
