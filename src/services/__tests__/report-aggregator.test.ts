import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createEngine, type Engine } from "../../engine.ts";
import { NotFoundError } from "../../lib/errors.ts";
import { MS_PER_DAY } from "../../lib/math-utils.ts";
import { createMemoryRepositories, createMemoryStore, type MemoryStore } from "../../repositories/memory.ts";
import { clearAuditLog, queryAuditLog } from "../audit-log.ts";
import { T0, makeItem, seedSession } from "./fixtures.ts";

const NOW = new Date(T0.getTime() + MS_PER_DAY);

// Four items, alpha 0.8889 and split-half 1.0 once repeated ten times
const PATTERN = [
  [1, 1, 1, 1],
  [0, 0, 0, 0],
  [1, 1, 0, 0],
];

// Six items; cycled over 523 sessions this gives alpha 0.7780 and split-half 0.7856
const GUTTMAN = [
  [1, 1, 1, 1, 1, 1],
  [1, 1, 1, 1, 1, 0],
  [1, 1, 1, 1, 0, 0],
  [1, 1, 1, 0, 0, 0],
  [1, 1, 0, 0, 0, 0],
  [1, 0, 0, 0, 0, 0],
  [0, 0, 0, 0, 0, 0],
];
const TYPICAL_PATTERN = [
  ...GUTTMAN,
  ...GUTTMAN,
  [1, 0, 1, 0, 1, 0],
  [1, 1, 0, 1, 0, 0],
  [1, 0, 0, 1, 1, 0],
];

describe("ReportAggregator", () => {
  let store: MemoryStore;
  let engine: Engine;

  beforeEach(() => {
    clearAuditLog();
    store = createMemoryStore();
    engine = createEngine(createMemoryRepositories(store), { now: () => NOW });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function addItem(overrides: Parameters<typeof makeItem>[0]) {
    const item = makeItem(overrides);
    store.items.set(item.id, { ...item });
    return item;
  }

  describe("discrimination report", () => {
    it("serves the cached report until a quality flag changes", async () => {
      addItem({ id: "a", discrimination: 0.3, responseCount: 60 });
      const first = await engine.reports.discriminationReport();
      expect(first.summary.totalItemsWithData).toBe(1);

      addItem({ id: "b", discrimination: 0.1, responseCount: 60 });
      const cached = await engine.reports.discriminationReport();
      expect(cached.summary.totalItemsWithData).toBe(1);

      await engine.flags.setQualityFlag("a", "under_review", "Check wording");
      const fresh = await engine.reports.discriminationReport();
      expect(fresh.summary.totalItemsWithData).toBe(2);
    });

    it("caches each response minimum separately", async () => {
      addItem({ id: "a", discrimination: 0.3, responseCount: 60 });
      expect((await engine.reports.discriminationReport(50)).summary.totalItemsWithData).toBe(1);
      expect((await engine.reports.discriminationReport(100)).summary.totalItemsWithData).toBe(0);
    });

    it("leaves an item answered only in unfinished sessions out of every tier", async () => {
      addItem({ id: "q" });
      for (let i = 0; i < 60; i++) {
        seedSession(store, {
          id: `gone-${i}`,
          answers: [{ itemId: "q", isCorrect: i % 3 === 0 }],
          status: "abandoned",
        });
      }

      await engine.analyzer.refreshItemStatistics(["q"]);
      const report = await engine.reports.discriminationReport();

      expect(store.items.get("q")).toMatchObject({ discrimination: null, responseCount: 60 });
      expect(report.summary.very_poor).toBe(0);
      expect(report.summary.totalItemsWithData).toBe(0);
      expect(report.actionNeeded.monitor).toEqual([]);
    });
  });

  describe("discrimination detail", () => {
    it("throws NotFoundError for an unknown item", async () => {
      await expect(engine.reports.discriminationDetail("missing")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("includes the item's flag history", async () => {
      addItem({ id: "a", discrimination: 0.3, responseCount: 60 });
      await engine.flags.setQualityFlag("a", "deactivated", "Ambiguous wording");

      const detail = await engine.reports.discriminationDetail("a");

      expect(detail.qualityFlag).toBe("deactivated");
      expect(detail.qualityFlagReason).toBe("Ambiguous wording");
      expect(detail.history).toHaveLength(1);
      expect(detail.history[0]).toMatchObject({
        action: "admin_quality_flag_override",
        previousFlag: "normal",
        newFlag: "deactivated",
        description: "Quality flag changed from normal to deactivated",
      });
    });
  });

  describe("reliability report", () => {
    it("reports insufficient data for an empty store", async () => {
      const report = await engine.reports.reliabilityReport();

      expect(report.overallStatus).toBe("insufficient_data");
      expect(report.storedMetrics).toEqual([]);
      expect(report.generatedAt).toBe(NOW.toISOString());
      expect(report.recommendations.map((r) => r.priority)).toEqual(["high", "high", "medium"]);
    });

    it("replaces a failing section with an unavailable placeholder", async () => {
      vi.spyOn(engine.reliability, "computeAlpha").mockRejectedValueOnce(new Error("query timed out"));
      vi.spyOn(console, "error").mockImplementation(() => {});

      const report = await engine.reports.reliabilityReport();

      expect(report.internalConsistency).toEqual({ unavailable: true, error: "query timed out" });
      expect(report.splitHalf).toMatchObject({ insufficientData: true });
      expect(report.overallStatus).toBe("insufficient_data");
      // No data-collection advice for the failed section
      expect(report.recommendations.map((r) => r.message)).toEqual([
        "Split-half reliability requires more test sessions. Current: 0. Target: 100+ sessions.",
        "Test-retest reliability requires more retest pairs. Current: 0. Target: 30+ pairs.",
      ]);

      const { events } = queryAuditLog({ action: "calculation_failed" });
      expect(events).toHaveLength(1);
      expect(events[0].metadata).toEqual({ section: "Cronbach's alpha", error: "query timed out" });
    });

    it("stores computed coefficients on request", async () => {
      const itemIds = ["q1", "q2", "q3", "q4"];
      for (let s = 0; s < 30; s++) {
        const row = PATTERN[s % PATTERN.length];
        seedSession(store, {
          id: `s${s}`,
          answers: row.map((score, i) => ({ itemId: itemIds[i], isCorrect: score === 1 })),
        });
      }

      const report = await engine.reports.reliabilityReport({ minSessions: 30, storeMetrics: true });

      expect(report.internalConsistency).toMatchObject({ alpha: 0.8889, numSessions: 30, numItems: 4 });
      expect(report.splitHalf).toMatchObject({ spearmanBrown: 1 });
      expect(report.testRetest).toMatchObject({ insufficientData: true });
      expect(report.overallStatus).toBe("acceptable");
      expect(report.storedMetrics).toEqual(["cronbachs_alpha", "split_half"]);

      expect(store.metrics.map((m) => [m.metricType, m.value, m.sampleSize])).toEqual([
        ["cronbachs_alpha", 0.8889, 30],
        ["split_half", 1, 30],
      ]);
      // 30 sessions is below the minimum score precision relies on
      expect(await engine.reliability.currentReliability()).toBeNull();
    });

    it("leaves score precision alone when run with a lowered session minimum", async () => {
      const itemIds = ["q1", "q2", "q3", "q4"];
      for (let s = 0; s < 30; s++) {
        const row = PATTERN[s % PATTERN.length];
        seedSession(store, {
          id: `s${s}`,
          answers: row.map((score, i) => ({ itemId: itemIds[i], isCorrect: score === 1 })),
        });
      }
      expect(await engine.reliability.currentReliability()).toBeNull();

      const report = await engine.reports.reliabilityReport({ minSessions: 30 });

      expect(report.internalConsistency).toMatchObject({ alpha: 0.8889 });
      expect(await engine.reliability.currentReliability()).toBeNull();
    });
  });

  describe("reliability report for a typical instrument", () => {
    beforeEach(() => {
      const itemIds = ["i1", "i2", "i3", "i4", "i5", "i6"];
      for (let s = 0; s < 523; s++) {
        const row = TYPICAL_PATTERN[s % TYPICAL_PATTERN.length];
        seedSession(store, {
          id: `s${s}`,
          answers: row.map((score, i) => ({ itemId: itemIds[i], isCorrect: score === 1 })),
        });
      }

      // 89 users tested twice, 30 days apart; retest r = 0.6723
      for (let i = 0; i < 89; i++) {
        const first = 85 + ((i * 4) % 31);
        const second = first + ((i * 20) % 23) - 11;
        seedSession(store, {
          id: `r${i}-a`,
          userId: `retest-${i}`,
          answers: [],
          scaledScore: first,
          completedAt: new Date(T0.getTime() - 40 * MS_PER_DAY),
        });
        seedSession(store, {
          id: `r${i}-b`,
          userId: `retest-${i}`,
          answers: [],
          scaledScore: second,
          completedAt: new Date(T0.getTime() - 10 * MS_PER_DAY),
        });
      }
    });

    it("grades every coefficient and asks only for more retest pairs", async () => {
      const report = await engine.reports.reliabilityReport();

      expect(report.internalConsistency).toMatchObject({
        alpha: 0.778,
        interpretation: "acceptable",
        meetsThreshold: true,
        numSessions: 523,
        numItems: 6,
      });
      expect(report.testRetest).toMatchObject({
        r: 0.6723,
        interpretation: "acceptable",
        meetsThreshold: true,
        numPairs: 89,
        meanIntervalDays: 30,
        scoreChange: { meanChange: 0.17, practiceEffect: 0.17 },
        largePracticeEffect: false,
      });
      expect(report.splitHalf).toMatchObject({
        rHalf: 0.6468,
        spearmanBrown: 0.7856,
        interpretation: "acceptable",
        meetsThreshold: true,
        numSessions: 523,
      });
      expect(report.overallStatus).toBe("acceptable");
      expect(report.recommendations).toEqual([
        {
          category: "data_collection",
          message: "Test-retest sample size is low (89 pairs). Target: 100+ pairs for stable estimates.",
          priority: "low",
        },
      ]);
    });

    it("feeds the computed alpha into score precision", async () => {
      await engine.reports.reliabilityReport();
      expect(await engine.reliability.currentReliability()).toBe(0.778);
    });
  });

  describe("reliability history", () => {
    beforeEach(() => {
      const at = (daysAgo: number) => new Date(NOW.getTime() - daysAgo * MS_PER_DAY);
      store.metrics.push(
        { id: "m1", metricType: "cronbachs_alpha", value: 0.81, sampleSize: 120, calculatedAt: at(100), details: null },
        { id: "m2", metricType: "cronbachs_alpha", value: 0.84, sampleSize: 150, calculatedAt: at(10), details: null },
        { id: "m3", metricType: "test_retest", value: 0.72, sampleSize: 40, calculatedAt: at(5), details: null },
      );
    });

    it("returns metrics from the last 90 days, newest first", async () => {
      const history = await engine.reports.reliabilityHistory();
      expect(history.map((h) => h.id)).toEqual(["m3", "m2"]);
      expect(history[1].calculatedAt).toBe(new Date(NOW.getTime() - 10 * MS_PER_DAY).toISOString());
    });

    it("filters by metric type and window", async () => {
      const alphas = await engine.reports.reliabilityHistory({ metricType: "cronbachs_alpha", days: 365 });
      expect(alphas.map((h) => h.value)).toEqual([0.84, 0.81]);

      const lastWeek = await engine.reports.reliabilityHistory({ days: 7 });
      expect(lastWeek.map((h) => h.id)).toEqual(["m3"]);
    });
  });
});
