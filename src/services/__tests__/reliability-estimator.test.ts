import { describe, it, expect, beforeEach } from "vitest";
import { MS_PER_DAY, round4, spearmanBrown } from "../../lib/math-utils.ts";
import { createMemoryRepositories, createMemoryStore, type MemoryStore } from "../../repositories/memory.ts";
import type { ResponseRecord, RetestPair } from "../../repositories/types.ts";
import {
  ReliabilityEstimator,
  alphaFromMatrix,
  calculateCronbachsAlpha,
  calculateSplitHalf,
  calculateTestRetest,
  interpretAlpha,
  interpretTestRetest,
} from "../reliability-estimator.ts";
import { T0, seedSession } from "./fixtures.ts";

/** Score rows in administration order, one per session */
function toRecords(rows: number[][], itemIds: string[], prefix = "s"): ResponseRecord[] {
  return rows.flatMap((row, s) =>
    row.map((score, position) => ({
      sessionId: `${prefix}${s}`,
      itemId: itemIds[position],
      userId: `u${s}`,
      isCorrect: score === 1,
      abilityEstimateAtTime: null,
      position,
      answeredAt: T0,
    })),
  );
}

function repeat<T>(rows: T[], times: number): T[] {
  return Array.from({ length: times }, () => rows).flat();
}

// Three items over four response patterns; alpha = 0.631579
const ALPHA_PATTERN = [
  [1, 1, 1],
  [0, 1, 1],
  [1, 0, 1],
  [0, 0, 0],
];

describe("typical instrument", () => {
  it("reads alpha 0.78, retest 0.65 and split-half 0.71", () => {
    // 0.78 falls in the [0.70, 0.80) band
    expect(interpretAlpha(0.78)).toBe("acceptable");
    expect(interpretTestRetest(0.65)).toBe("acceptable");
    expect(round4(spearmanBrown(0.71))).toBe(0.8304);
    expect(interpretAlpha(round4(spearmanBrown(0.71)))).toBe("good");
  });
});

describe("interpretation bands", () => {
  it("uses inclusive bounds for alpha", () => {
    expect(interpretAlpha(0.9)).toBe("excellent");
    expect(interpretAlpha(0.8)).toBe("good");
    expect(interpretAlpha(0.7)).toBe("acceptable");
    expect(interpretAlpha(0.6999)).toBe("questionable");
    expect(interpretAlpha(0.5)).toBe("poor");
    expect(interpretAlpha(0.4999)).toBe("unacceptable");
  });

  it("uses strict bounds for test-retest", () => {
    expect(interpretTestRetest(0.9)).toBe("good");
    expect(interpretTestRetest(0.91)).toBe("excellent");
    expect(interpretTestRetest(0.51)).toBe("acceptable");
    expect(interpretTestRetest(0.5)).toBe("poor");
  });
});

describe("alphaFromMatrix", () => {
  it("returns 1 for perfectly consistent items", () => {
    expect(alphaFromMatrix([
      [1, 1, 0, 0],
      [1, 1, 0, 0],
    ])).toBeCloseTo(1, 10);
  });

  it("follows k/(k-1) * (1 - sum of item variances / total variance)", () => {
    const matrix = [
      [1, 0, 1, 0],
      [1, 1, 0, 0],
      [1, 1, 1, 0],
    ];
    expect(alphaFromMatrix(matrix)).toBeCloseTo(0.631579, 5);
  });

  it("returns 0 when every session has the same total", () => {
    expect(alphaFromMatrix([
      [1, 1, 1],
      [0, 0, 0],
    ])).toBe(0);
  });
});

describe("calculateCronbachsAlpha", () => {
  it("computes alpha over items seen in enough sessions", () => {
    const records = toRecords(repeat(ALPHA_PATTERN, 10), ["i1", "i2", "i3"]);

    const result = calculateCronbachsAlpha(records, 40);

    expect(result.insufficientData).toBe(false);
    if (result.insufficientData) return;
    expect(result.alpha).toBe(0.6316);
    expect(result.interpretation).toBe("questionable");
    expect(result.meetsThreshold).toBe(false);
    expect(result.numSessions).toBe(40);
    expect(result.numItems).toBe(3);
    expect(Object.keys(result.itemTotalCorrelations)).toEqual(["i1", "i2", "i3"]);
  });

  it("is 0 when every session answers identically", () => {
    const records = toRecords(repeat([[1, 1, 1]], 30), ["i1", "i2", "i3"]);

    const result = calculateCronbachsAlpha(records, 30);

    expect(result).toMatchObject({ insufficientData: false, alpha: 0, interpretation: "unacceptable" });
  });

  it("reports insufficient sessions", () => {
    const records = toRecords(repeat(ALPHA_PATTERN, 10).slice(0, 39), ["i1", "i2", "i3"]);

    expect(calculateCronbachsAlpha(records, 40)).toEqual({
      insufficientData: true,
      reason: "Insufficient data: 39 sessions (minimum required: 40)",
      sampleSize: 39,
      required: 40,
    });
  });

  it("needs at least two items seen in enough sessions", () => {
    const records = toRecords(repeat([[1], [0]], 15), ["i1"]);

    const result = calculateCronbachsAlpha(records, 30);

    expect(result.insufficientData).toBe(true);
    if (!result.insufficientData) return;
    expect(result.reason).toBe(
      "Insufficient items: only 1 items appear in enough sessions (need at least 2)",
    );
  });
});

describe("calculateSplitHalf", () => {
  it("correlates odd and even positions and applies Spearman-Brown", () => {
    const rows = repeat(
      [
        [1, 1, 1, 1],
        [0, 0, 0, 0],
        [1, 1, 0, 0],
      ],
      10,
    );
    const result = calculateSplitHalf(toRecords(rows, ["i1", "i2", "i3", "i4"]), 30);

    expect(result).toEqual({
      insufficientData: false,
      rHalf: 1,
      spearmanBrown: 1,
      interpretation: "excellent",
      meetsThreshold: true,
      numSessions: 30,
      numItems: 4,
      oddItems: 2,
      evenItems: 2,
    });
  });

  it("needs four eligible items", () => {
    const rows = repeat([[1, 0, 1], [0, 1, 0]], 15);
    const result = calculateSplitHalf(toRecords(rows, ["i1", "i2", "i3"]), 30);
    expect(result).toMatchObject({ insufficientData: true, sampleSize: 30, required: 30 });
  });

  it("fails closed when a half has no variance", () => {
    const rows = repeat([[1, 1, 1, 1]], 30);
    const result = calculateSplitHalf(toRecords(rows, ["i1", "i2", "i3", "i4"]), 30);
    expect(result).toEqual({
      insufficientData: true,
      reason: "Could not correlate halves (zero variance in one or both halves)",
      sampleSize: 30,
      required: 30,
    });
  });
});

describe("calculateTestRetest", () => {
  const pairs: RetestPair[] = [
    { userId: "a", firstScore: 100, secondScore: 102, intervalDays: 10 },
    { userId: "b", firstScore: 110, secondScore: 114, intervalDays: 20 },
    { userId: "c", firstScore: 90, secondScore: 91, intervalDays: 30 },
    { userId: "d", firstScore: 105, secondScore: 110, intervalDays: 40 },
  ];

  it("correlates first and second attempts and reports the practice effect", () => {
    expect(calculateTestRetest(pairs, 4)).toEqual({
      insufficientData: false,
      r: 0.9956,
      interpretation: "excellent",
      meetsThreshold: true,
      numPairs: 4,
      meanIntervalDays: 25,
      scoreChange: { meanChange: 3, stdChange: 1.83, practiceEffect: 3 },
      largePracticeEffect: false,
    });
  });

  it("reports insufficient pairs", () => {
    expect(calculateTestRetest(pairs.slice(0, 3), 4)).toEqual({
      insufficientData: true,
      reason: "Insufficient data: 3 retest pairs (minimum required: 4)",
      sampleSize: 3,
      required: 4,
    });
  });

  it("calls a practice effect large only above five points", () => {
    const steady = pairs.map((p) => ({ ...p, secondScore: p.firstScore + 5 }));
    expect(calculateTestRetest(steady, 4)).toMatchObject({
      scoreChange: { practiceEffect: 5 },
      largePracticeEffect: false,
    });

    const rising = steady.map((p, i) => (i === 0 ? { ...p, secondScore: p.secondScore + 1 } : p));
    expect(calculateTestRetest(rising, 4)).toMatchObject({
      scoreChange: { practiceEffect: 5.25 },
      largePracticeEffect: true,
    });
  });

  it("fails closed on zero variance", () => {
    const flat = pairs.map((p) => ({ ...p, firstScore: 100 }));
    expect(calculateTestRetest(flat, 4)).toMatchObject({ insufficientData: true, sampleSize: 4 });
  });
});

describe("ReliabilityEstimator", () => {
  let store: MemoryStore;
  let clock: number;
  let estimator: ReliabilityEstimator;

  function seedAlphaSessions(times: number, prefix: string): void {
    repeat(ALPHA_PATTERN, times).forEach((row, s) => {
      seedSession(store, {
        id: `${prefix}${s}`,
        answers: row.map((score, i) => ({ itemId: `i${i + 1}`, isCorrect: score === 1 })),
      });
    });
  }

  beforeEach(() => {
    store = createMemoryStore();
    clock = T0.getTime();
    estimator = new ReliabilityEstimator(
      { ...createMemoryRepositories(store), now: () => clock },
      { cacheTtlMs: 1_000 },
    );
  });

  it("serves alpha from its cache until the TTL elapses", async () => {
    seedAlphaSessions(10, "a");
    const first = await estimator.computeAlpha(40);
    expect(first).toMatchObject({ alpha: 0.6316 });

    // New sessions only show up once the cached result expires
    seedAlphaSessions(10, "b");
    expect(await estimator.computeAlpha(40)).toBe(first);

    clock += 1_000;
    const refreshed = await estimator.computeAlpha(40);
    expect(refreshed).toMatchObject({ alpha: 0.6316, numSessions: 80 });
    expect(refreshed).not.toBe(first);
  });

  it("recomputes when the cache is bypassed", async () => {
    seedAlphaSessions(10, "a");
    const first = await estimator.computeAlpha(40);
    const again = await estimator.computeAlpha(40, { bypassCache: true });
    expect(again).not.toBe(first);
    expect(again).toEqual(first);
  });

  it("ignores responses of unfinished sessions", async () => {
    seedAlphaSessions(10, "a");
    seedSession(store, {
      id: "open",
      answers: [{ itemId: "i1", isCorrect: true }],
      status: "in_progress",
    });
    expect(await estimator.computeAlpha(40)).toMatchObject({ numSessions: 40 });
  });

  describe("currentReliability", () => {
    it("is null with no computed or stored alpha", async () => {
      expect(await estimator.currentReliability()).toBeNull();
    });

    it("falls back to the latest stored alpha", async () => {
      await createMemoryRepositories(store).metrics.append({
        metricType: "cronbachs_alpha",
        value: 0.84,
        sampleSize: 300,
        calculatedAt: T0,
        details: null,
      });
      expect(await estimator.currentReliability()).toBe(0.84);
    });

    it("prefers the cached alpha", async () => {
      seedAlphaSessions(25, "a");
      await estimator.computeAlpha();
      expect(await estimator.currentReliability()).toBe(0.6316);
    });

    it("ignores an alpha computed with a lowered session minimum", async () => {
      seedAlphaSessions(10, "a");
      expect(await estimator.computeAlpha(40)).toMatchObject({ alpha: 0.6316 });
      expect(await estimator.currentReliability()).toBeNull();
    });

    it("ignores a stored alpha from fewer than 100 sessions", async () => {
      await createMemoryRepositories(store).metrics.append({
        metricType: "cronbachs_alpha",
        value: 0.8,
        sampleSize: 99,
        calculatedAt: T0,
        details: null,
      });
      expect(await estimator.currentReliability()).toBeNull();
    });
  });

  it("computes test-retest from consecutive completions", async () => {
    const scores: Array<[number, number]> = [
      [100, 102],
      [110, 114],
      [90, 91],
      [105, 110],
    ];
    scores.forEach(([a, b], i) => {
      const userId = `retest-${i}`;
      seedSession(store, { id: `${userId}-1`, userId, answers: [], scaledScore: a, completedAt: T0 });
      seedSession(store, {
        id: `${userId}-2`,
        userId,
        answers: [],
        scaledScore: b,
        completedAt: new Date(T0.getTime() + 14 * MS_PER_DAY),
      });
    });

    const result = await estimator.computeTestRetest({ minPairs: 4 });

    expect(result).toMatchObject({
      insufficientData: false,
      r: 0.9956,
      numPairs: 4,
      meanIntervalDays: 14,
    });
  });
});
