/**
 * Item Quality Analyzer
 *
 * Computes per-item discrimination (point-biserial correlation between item
 * correctness and the session's total score) and classifies items into
 * quality tiers.
 *
 * Tiers (non-overlapping, lower bound inclusive):
 *   excellent  >= 0.40
 *   good       [0.30, 0.40)
 *   acceptable [0.20, 0.30)
 *   poor       [0.10, 0.20)
 *   very_poor  [0.00, 0.10)
 *   negative   < 0.00
 *
 * A null discrimination has no tier: unmeasured items are not "problematic".
 * Discrimination is only stored once `minResponses` responses from completed
 * sessions back it; below that the item stays unmeasured.
 */

import {
  COMPARISON_TOLERANCE,
  DEFAULT_MIN_RESPONSES,
  DISCRIMINATION_TIER_BOUNDS,
} from "../config/constants.ts";
import { NotFoundError } from "../lib/errors.ts";
import { pointBiserialCorrelation } from "../lib/math-utils.ts";
import type { ItemRepository, ResponseRepository } from "../repositories/types.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type QualityTier =
  | "excellent"
  | "good"
  | "acceptable"
  | "poor"
  | "very_poor"
  | "negative";

export type DiscriminationResult =
  | {
      insufficientData: true;
      responseCount: number;
      minResponses: number;
    }
  | {
      insufficientData: false;
      value: number;
      responseCount: number;
    };

export type AverageComparison = "above" | "at" | "below";

export interface ItemStatisticsRefresh {
  itemId: string;
  discrimination: number | null;
  empiricalDifficulty: number;
  responseCount: number;
  scoredResponseCount: number;
}

export interface ItemQualityAnalyzerDeps {
  items: ItemRepository;
  responses: ResponseRepository;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Map a discrimination value to its quality tier.
 */
export function classifyQualityTier(discrimination: number | null): QualityTier | null {
  if (discrimination === null) return null;
  if (discrimination >= DISCRIMINATION_TIER_BOUNDS.excellent) return "excellent";
  if (discrimination >= DISCRIMINATION_TIER_BOUNDS.good) return "good";
  if (discrimination >= DISCRIMINATION_TIER_BOUNDS.acceptable) return "acceptable";
  if (discrimination >= DISCRIMINATION_TIER_BOUNDS.poor) return "poor";
  if (discrimination >= DISCRIMINATION_TIER_BOUNDS.very_poor) return "very_poor";
  return "negative";
}

/**
 * Compare a value to an average with a ±0.05 dead band.
 */
export function compareToAverage(
  value: number | null,
  average: number | null,
): AverageComparison | null {
  if (value === null || average === null) return null;
  const diff = value - average;
  if (Math.abs(diff) <= COMPARISON_TOLERANCE) return "at";
  return diff > 0 ? "above" : "below";
}

/**
 * Percentage (0-100, floored) of values strictly below `value`.
 * Returns 50 when there is nothing to compare against.
 */
export function percentileRank(value: number, all: number[]): number {
  if (all.length === 0) return 50;
  const lower = all.filter((v) => v < value).length;
  return Math.max(0, Math.min(100, Math.floor((lower / all.length) * 100)));
}

// ---------------------------------------------------------------------------
// Analyzer
// ---------------------------------------------------------------------------

export class ItemQualityAnalyzer {
  private readonly minResponses: number;

  constructor(
    private readonly deps: ItemQualityAnalyzerDeps,
    options: { minResponses?: number } = {},
  ) {
    this.minResponses = options.minResponses ?? DEFAULT_MIN_RESPONSES;
  }

  /**
   * Pair each response to the item with its session's total score.
   * Responses from sessions without a total (unfinished) are dropped.
   */
  private async pairedScores(
    itemId: string,
  ): Promise<{ itemScores: number[]; totals: number[]; correct: number; count: number }> {
    const records = await this.deps.responses.allResponsesForItem(itemId);
    const totals = await this.deps.responses.totalScoresForSessions(
      records.map((r) => r.sessionId),
    );

    const itemScores: number[] = [];
    const totalScores: number[] = [];
    let correct = 0;
    for (const r of records) {
      if (r.isCorrect) correct++;
      const total = totals.get(r.sessionId);
      if (total === undefined) continue;
      itemScores.push(r.isCorrect ? 1 : 0);
      totalScores.push(total);
    }

    return { itemScores, totals: totalScores, correct, count: records.length };
  }

  /**
   * Discrimination of one item, or an insufficientData result when fewer
   * than `minResponses` scored responses exist.
   */
  async computeDiscrimination(
    itemId: string,
    minResponses: number = this.minResponses,
  ): Promise<DiscriminationResult> {
    const item = await this.deps.items.get(itemId);
    if (!item) throw new NotFoundError("item", itemId);

    const { itemScores, totals } = await this.pairedScores(itemId);
    const responseCount = itemScores.length;

    if (responseCount < minResponses) {
      return { insufficientData: true, responseCount, minResponses };
    }

    return {
      insufficientData: false,
      value: pointBiserialCorrelation(itemScores, totals),
      responseCount,
    };
  }

  /**
   * Recompute and persist discrimination, empirical difficulty and response
   * counts for the given items. Items without responses are skipped, and so
   * is a write that a fresher refresh has already overtaken.
   */
  async refreshItemStatistics(itemIds: string[]): Promise<ItemStatisticsRefresh[]> {
    const refreshed: ItemStatisticsRefresh[] = [];

    for (const itemId of new Set(itemIds)) {
      const { itemScores, totals, correct, count } = await this.pairedScores(itemId);
      if (count === 0) continue;

      const scored = itemScores.length;
      const stats: ItemStatisticsRefresh = {
        itemId,
        discrimination:
          scored >= this.minResponses ? pointBiserialCorrelation(itemScores, totals) : null,
        empiricalDifficulty: correct / count,
        responseCount: count,
        scoredResponseCount: scored,
      };
      const applied = await this.deps.items.updateStatistics(itemId, stats);
      if (applied) refreshed.push(stats);
    }

    if (refreshed.length > 0) {
      console.log(`[ItemQuality] Refreshed statistics for ${refreshed.length} items`);
    }
    return refreshed;
  }
}
