/**
 * Reliability Estimator
 *
 * Three independent reliability coefficients computed from completed
 * sessions:
 *
 * - Internal consistency (Cronbach's alpha)
 *     α = k/(k-1) × (1 - Σσ²ᵢ / σ²ₜ)
 * - Split-half: odd/even positions by administration order, Pearson r of the
 *   half scores, Spearman-Brown corrected
 * - Test-retest: Pearson r between consecutive scores of the same user
 *   within a day window, with the mean change as practice effect
 *
 * Every calculation is gated by a minimum sample and fails closed with an
 * `insufficientData` result. Results are kept in a TtlCache owned by the
 * estimator instance.
 */

import {
  ALPHA_THRESHOLD,
  DEFAULT_MIN_RETEST_PAIRS,
  DEFAULT_MIN_SESSIONS,
  DEFAULT_RETEST_MAX_DAYS,
  DEFAULT_RETEST_MIN_DAYS,
  ITEM_MIN_SESSION_RATIO,
  ITEM_MIN_SESSIONS,
  LARGE_PRACTICE_EFFECT_THRESHOLD,
  PARTIAL_COMPLETION_RATIO,
  RELIABILITY_CACHE_TTL_MS,
  SPLIT_HALF_MIN_ITEMS,
  TEST_RETEST_THRESHOLD,
} from "../config/constants.ts";
import {
  clamp,
  mean,
  pearsonCorrelation,
  pointBiserialCorrelation,
  round4,
  sampleVariance,
  spearmanBrown,
  stddev,
  sum,
} from "../lib/math-utils.ts";
import { TtlCache } from "../lib/ttl-cache.ts";
import type {
  ReliabilityMetricRepository,
  ResponseRecord,
  ResponseRepository,
  RetestPair,
} from "../repositories/types.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AlphaInterpretation =
  | "excellent"
  | "good"
  | "acceptable"
  | "questionable"
  | "poor"
  | "unacceptable";

export type RetestInterpretation = "excellent" | "good" | "acceptable" | "poor";

export interface InsufficientData {
  insufficientData: true;
  reason: string;
  /** Sessions or pairs actually available */
  sampleSize: number;
  /** Sessions or pairs required */
  required: number;
}

export interface AlphaResult {
  insufficientData: false;
  alpha: number;
  interpretation: AlphaInterpretation;
  meetsThreshold: boolean;
  numSessions: number;
  numItems: number;
  /** Corrected item-total correlation (item excluded from total) */
  itemTotalCorrelations: Record<string, number>;
}

export interface TestRetestResult {
  insufficientData: false;
  r: number;
  interpretation: RetestInterpretation;
  meetsThreshold: boolean;
  numPairs: number;
  meanIntervalDays: number;
  scoreChange: {
    meanChange: number;
    stdChange: number;
    /** Positive when second attempts score higher */
    practiceEffect: number;
  };
  largePracticeEffect: boolean;
}

export interface SplitHalfResult {
  insufficientData: false;
  rHalf: number;
  spearmanBrown: number;
  interpretation: AlphaInterpretation;
  meetsThreshold: boolean;
  numSessions: number;
  numItems: number;
  oddItems: number;
  evenItems: number;
}

export type AlphaOutcome = AlphaResult | InsufficientData;
export type TestRetestOutcome = TestRetestResult | InsufficientData;
export type SplitHalfOutcome = SplitHalfResult | InsufficientData;

export interface ReliabilityEstimatorDeps {
  responses: ResponseRepository;
  metrics: ReliabilityMetricRepository;
  now?: () => number;
}

export interface ReliabilityEstimatorOptions {
  cacheTtlMs?: number;
}

// ---------------------------------------------------------------------------
// Interpretation
// ---------------------------------------------------------------------------

export function interpretAlpha(value: number): AlphaInterpretation {
  if (value >= 0.9) return "excellent";
  if (value >= 0.8) return "good";
  if (value >= 0.7) return "acceptable";
  if (value >= 0.6) return "questionable";
  if (value >= 0.5) return "poor";
  return "unacceptable";
}

/** Retest bands use strict lower bounds */
export function interpretTestRetest(r: number): RetestInterpretation {
  if (r > 0.9) return "excellent";
  if (r > 0.7) return "good";
  if (r > 0.5) return "acceptable";
  return "poor";
}

function insufficient(reason: string, sampleSize: number, required: number): InsufficientData {
  return { insufficientData: true, reason, sampleSize, required };
}

// ---------------------------------------------------------------------------
// Pure calculations
// ---------------------------------------------------------------------------

interface SessionAnswers {
  /** 0/1 scores in administration order */
  ordered: Array<{ itemId: string; score: number }>;
  byItem: Map<string, number>;
}

function groupBySession(records: ResponseRecord[]): Map<string, SessionAnswers> {
  const sorted = [...records].sort((a, b) => a.position - b.position);
  const sessions = new Map<string, SessionAnswers>();
  for (const r of sorted) {
    let s = sessions.get(r.sessionId);
    if (!s) {
      s = { ordered: [], byItem: new Map() };
      sessions.set(r.sessionId, s);
    }
    const score = r.isCorrect ? 1 : 0;
    s.ordered.push({ itemId: r.itemId, score });
    s.byItem.set(r.itemId, score);
  }
  return sessions;
}

/**
 * Items seen in at least max(30, floor(0.30 × sessions)) sessions.
 */
function eligibleItems(sessions: Map<string, SessionAnswers>): string[] {
  const appearances = new Map<string, number>();
  for (const s of sessions.values()) {
    for (const itemId of s.byItem.keys()) {
      appearances.set(itemId, (appearances.get(itemId) ?? 0) + 1);
    }
  }
  const minAppearances = Math.max(
    ITEM_MIN_SESSIONS,
    Math.floor(sessions.size * ITEM_MIN_SESSION_RATIO),
  );
  return [...appearances.entries()]
    .filter(([, count]) => count >= minAppearances)
    .map(([itemId]) => itemId)
    .sort();
}

/**
 * Alpha from an items × sessions score matrix. Returns 0 when the total
 * scores have no variance.
 */
export function alphaFromMatrix(itemScores: number[][]): number {
  const k = itemScores.length;
  if (k < 2) return 0;
  const n = itemScores[0].length;

  const totals: number[] = [];
  for (let j = 0; j < n; j++) {
    let t = 0;
    for (let i = 0; i < k; i++) t += itemScores[i][j];
    totals.push(t);
  }

  const totalVariance = sampleVariance(totals);
  if (totalVariance === 0) return 0;

  const itemVarianceSum = sum(itemScores.map((scores) => sampleVariance(scores)));
  const alpha = (k / (k - 1)) * (1 - itemVarianceSum / totalVariance);
  return clamp(alpha, -1, 1);
}

export function calculateCronbachsAlpha(
  records: ResponseRecord[],
  minSessions: number = DEFAULT_MIN_SESSIONS,
): AlphaOutcome {
  const sessions = groupBySession(records);
  if (sessions.size < minSessions) {
    return insufficient(
      `Insufficient data: ${sessions.size} sessions (minimum required: ${minSessions})`,
      sessions.size,
      minSessions,
    );
  }

  const items = eligibleItems(sessions);
  if (items.length < 2) {
    return insufficient(
      `Insufficient items: only ${items.length} items appear in enough sessions (need at least 2)`,
      sessions.size,
      minSessions,
    );
  }

  let used = [...sessions.values()].filter((s) => items.every((id) => s.byItem.has(id)));
  if (used.length < minSessions) {
    const minAnswered = Math.floor(items.length * PARTIAL_COMPLETION_RATIO);
    used = [...sessions.values()].filter(
      (s) => items.filter((id) => s.byItem.has(id)).length >= minAnswered,
    );
  }
  if (used.length < minSessions) {
    return insufficient(
      `Insufficient complete sessions: ${used.length} sessions with enough common items (minimum required: ${minSessions})`,
      used.length,
      minSessions,
    );
  }

  // Unanswered eligible items count as incorrect
  const matrix = items.map((id) => used.map((s) => s.byItem.get(id) ?? 0));
  const alpha = round4(alphaFromMatrix(matrix));

  const totals = used.map((_, j) => sum(matrix.map((row) => row[j])));
  const itemTotalCorrelations: Record<string, number> = {};
  items.forEach((id, i) => {
    const rest = totals.map((t, j) => t - matrix[i][j]);
    itemTotalCorrelations[id] = round4(pointBiserialCorrelation(matrix[i], rest));
  });

  return {
    insufficientData: false,
    alpha,
    interpretation: interpretAlpha(alpha),
    meetsThreshold: alpha >= ALPHA_THRESHOLD,
    numSessions: used.length,
    numItems: items.length,
    itemTotalCorrelations,
  };
}

export function calculateSplitHalf(
  records: ResponseRecord[],
  minSessions: number = DEFAULT_MIN_SESSIONS,
): SplitHalfOutcome {
  const sessions = groupBySession(records);
  if (sessions.size < minSessions) {
    return insufficient(
      `Insufficient data: ${sessions.size} sessions (minimum required: ${minSessions})`,
      sessions.size,
      minSessions,
    );
  }

  const items = new Set(eligibleItems(sessions));
  if (items.size < SPLIT_HALF_MIN_ITEMS) {
    return insufficient(
      `Insufficient items: only ${items.size} items appear in enough sessions (need at least ${SPLIT_HALF_MIN_ITEMS} for split-half)`,
      sessions.size,
      minSessions,
    );
  }

  const odd: number[] = [];
  const even: number[] = [];
  let oddItems = 0;
  let evenItems = 0;
  for (const s of sessions.values()) {
    const scored = s.ordered.filter((a) => items.has(a.itemId));
    if (scored.length < SPLIT_HALF_MIN_ITEMS) continue;

    // Positions 0, 2, 4... form the odd half (1st, 3rd, 5th item)
    const oddHalf = scored.filter((_, i) => i % 2 === 0).map((a) => a.score);
    const evenHalf = scored.filter((_, i) => i % 2 === 1).map((a) => a.score);
    if (odd.length === 0) {
      oddItems = oddHalf.length;
      evenItems = evenHalf.length;
    }
    odd.push(mean(oddHalf));
    even.push(mean(evenHalf));
  }

  if (odd.length < minSessions) {
    return insufficient(
      `Insufficient complete sessions: ${odd.length} sessions with enough items for split-half (minimum required: ${minSessions})`,
      odd.length,
      minSessions,
    );
  }

  const rHalf = pearsonCorrelation(odd, even);
  if (rHalf === null) {
    return insufficient(
      "Could not correlate halves (zero variance in one or both halves)",
      odd.length,
      minSessions,
    );
  }

  const corrected = round4(spearmanBrown(rHalf));
  return {
    insufficientData: false,
    rHalf: round4(rHalf),
    spearmanBrown: corrected,
    interpretation: interpretAlpha(corrected),
    meetsThreshold: corrected >= ALPHA_THRESHOLD,
    numSessions: odd.length,
    numItems: items.size,
    oddItems,
    evenItems,
  };
}

export function calculateTestRetest(
  pairs: RetestPair[],
  minPairs: number = DEFAULT_MIN_RETEST_PAIRS,
): TestRetestOutcome {
  if (pairs.length < minPairs) {
    return insufficient(
      `Insufficient data: ${pairs.length} retest pairs (minimum required: ${minPairs})`,
      pairs.length,
      minPairs,
    );
  }

  const first = pairs.map((p) => p.firstScore);
  const second = pairs.map((p) => p.secondScore);
  const r = pearsonCorrelation(first, second);
  if (r === null) {
    return insufficient(
      "Could not correlate retest scores (zero variance)",
      pairs.length,
      minPairs,
    );
  }

  const changes = pairs.map((p) => p.secondScore - p.firstScore);
  const meanChange = Math.round(mean(changes) * 100) / 100;
  const rounded = round4(r);

  return {
    insufficientData: false,
    r: rounded,
    interpretation: interpretTestRetest(rounded),
    meetsThreshold: rounded > TEST_RETEST_THRESHOLD,
    numPairs: pairs.length,
    meanIntervalDays: Math.round(mean(pairs.map((p) => p.intervalDays)) * 10) / 10,
    scoreChange: {
      meanChange,
      stdChange: Math.round(stddev(changes) * 100) / 100,
      practiceEffect: meanChange,
    },
    largePracticeEffect: Math.abs(meanChange) > LARGE_PRACTICE_EFFECT_THRESHOLD,
  };
}

// ---------------------------------------------------------------------------
// Estimator
// ---------------------------------------------------------------------------

export interface ComputeOptions {
  bypassCache?: boolean;
}

export class ReliabilityEstimator {
  private readonly alphaCache: TtlCache<AlphaOutcome>;
  private readonly splitHalfCache: TtlCache<SplitHalfOutcome>;
  private readonly retestCache: TtlCache<TestRetestOutcome>;

  constructor(
    private readonly deps: ReliabilityEstimatorDeps,
    options: ReliabilityEstimatorOptions = {},
  ) {
    const ttl = options.cacheTtlMs ?? RELIABILITY_CACHE_TTL_MS;
    this.alphaCache = new TtlCache(ttl, deps.now);
    this.splitHalfCache = new TtlCache(ttl, deps.now);
    this.retestCache = new TtlCache(ttl, deps.now);
  }

  async computeAlpha(
    minSessions: number = DEFAULT_MIN_SESSIONS,
    options: ComputeOptions = {},
  ): Promise<AlphaOutcome> {
    const key = `alpha:${minSessions}`;
    if (!options.bypassCache) {
      const hit = this.alphaCache.get(key);
      if (hit !== undefined) return hit;
    }

    const records = await this.deps.responses.allCompletedResponses();
    const result = calculateCronbachsAlpha(records, minSessions);
    this.alphaCache.set(key, result);
    // A lowered minimum never reaches score precision
    if (minSessions >= DEFAULT_MIN_SESSIONS) this.alphaCache.set("alpha:latest", result);

    if (result.insufficientData) {
      console.log(`[Reliability] Alpha skipped: ${result.reason}`);
    } else {
      console.log(
        `[Reliability] Alpha = ${result.alpha} (${result.interpretation}) from ${result.numSessions} sessions, ${result.numItems} items`,
      );
    }
    return result;
  }

  async computeSplitHalf(
    minSessions: number = DEFAULT_MIN_SESSIONS,
    options: ComputeOptions = {},
  ): Promise<SplitHalfOutcome> {
    const key = `split_half:${minSessions}`;
    if (!options.bypassCache) {
      const hit = this.splitHalfCache.get(key);
      if (hit !== undefined) return hit;
    }

    const records = await this.deps.responses.allCompletedResponses();
    const result = calculateSplitHalf(records, minSessions);
    this.splitHalfCache.set(key, result);

    if (result.insufficientData) {
      console.log(`[Reliability] Split-half skipped: ${result.reason}`);
    } else {
      console.log(
        `[Reliability] Split-half r = ${result.rHalf}, Spearman-Brown = ${result.spearmanBrown} from ${result.numSessions} sessions`,
      );
    }
    return result;
  }

  async computeTestRetest(
    params: { minPairs?: number; minDays?: number; maxDays?: number } = {},
    options: ComputeOptions = {},
  ): Promise<TestRetestOutcome> {
    const minPairs = params.minPairs ?? DEFAULT_MIN_RETEST_PAIRS;
    const minDays = params.minDays ?? DEFAULT_RETEST_MIN_DAYS;
    const maxDays = params.maxDays ?? DEFAULT_RETEST_MAX_DAYS;
    const key = `test_retest:${minPairs}:${minDays}:${maxDays}`;
    if (!options.bypassCache) {
      const hit = this.retestCache.get(key);
      if (hit !== undefined) return hit;
    }

    const pairs = await this.deps.responses.sessionsWithMultipleCompletions(minDays, maxDays);
    const result = calculateTestRetest(pairs, minPairs);
    this.retestCache.set(key, result);

    if (result.insufficientData) {
      console.log(`[Reliability] Test-retest skipped: ${result.reason}`);
    } else {
      console.log(
        `[Reliability] Test-retest r = ${result.r} (${result.interpretation}) from ${result.numPairs} pairs`,
      );
    }
    return result;
  }

  /**
   * Reliability used for score precision: the most recently computed alpha
   * while it is still cached, otherwise the latest stored alpha metric,
   * otherwise null. Only alphas from at least DEFAULT_MIN_SESSIONS sessions
   * count. Never triggers a computation.
   */
  async currentReliability(): Promise<number | null> {
    const latest = this.alphaCache.get("alpha:latest");
    if (latest && !latest.insufficientData) return latest.alpha;

    const stored = await this.deps.metrics.latest("cronbachs_alpha");
    return stored && stored.sampleSize >= DEFAULT_MIN_SESSIONS ? stored.value : null;
  }
}
