/**
 * Reliability report: overall status and recommendations derived from the
 * three coefficient sections. Each section is either a result, an
 * insufficient-data marker, or an "unavailable" placeholder when its
 * calculation failed.
 */

import {
  ALPHA_THRESHOLD,
  EXCELLENT_RELIABILITY,
  LOW_ITEM_CORRELATION_THRESHOLD,
  PROBLEMATIC_ITEM_COUNT_THRESHOLD,
  RECOMMENDED_RETEST_PAIRS,
  TEST_RETEST_THRESHOLD,
} from "../config/constants.ts";
import type {
  AlphaResult,
  InsufficientData,
  SplitHalfResult,
  TestRetestResult,
} from "./reliability-estimator.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Unavailable {
  unavailable: true;
  error: string;
}

export type Section<T> = T | InsufficientData | Unavailable;

export type OverallStatus = "insufficient_data" | "excellent" | "acceptable" | "needs_attention";

export type RecommendationCategory = "data_collection" | "item_review" | "threshold_warning";
export type RecommendationPriority = "high" | "medium" | "low";

export interface Recommendation {
  category: RecommendationCategory;
  message: string;
  priority: RecommendationPriority;
}

export interface ReliabilitySections {
  internalConsistency: Section<AlphaResult>;
  testRetest: Section<TestRetestResult>;
  splitHalf: Section<SplitHalfResult>;
}

export function isUnavailable(section: object): section is Unavailable {
  return "unavailable" in section && section.unavailable === true;
}

export function isInsufficient(section: object): section is InsufficientData {
  return "insufficientData" in section && section.insufficientData === true;
}

/** The computed result of a section, or null when it has none */
export function valueOf<T extends { insufficientData: false }>(section: Section<T>): T | null {
  if (isUnavailable(section) || isInsufficient(section)) return null;
  return section;
}

// ---------------------------------------------------------------------------
// Overall status
// ---------------------------------------------------------------------------

export function determineOverallStatus(sections: ReliabilitySections): OverallStatus {
  const alpha = valueOf(sections.internalConsistency);
  const retest = valueOf(sections.testRetest);
  const split = valueOf(sections.splitHalf);

  const available: Array<{ value: number; meets: boolean }> = [];
  if (alpha) available.push({ value: alpha.alpha, meets: alpha.meetsThreshold });
  if (retest) available.push({ value: retest.r, meets: retest.meetsThreshold });
  if (split) available.push({ value: split.spearmanBrown, meets: split.meetsThreshold });

  if (available.length === 0) return "insufficient_data";
  if (available.every((m) => m.value >= EXCELLENT_RELIABILITY)) return "excellent";
  if (available.every((m) => m.meets)) return "acceptable";
  return "needs_attention";
}

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

const PRIORITY_ORDER: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 };

function insufficient<T extends { insufficientData: false }>(
  section: Section<T>,
): InsufficientData | null {
  return isInsufficient(section) ? section : null;
}

/**
 * Actionable recommendations, high priority first.
 */
export function generateRecommendations(sections: ReliabilitySections): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const alpha = valueOf(sections.internalConsistency);
  const retest = valueOf(sections.testRetest);
  const split = valueOf(sections.splitHalf);

  // Data collection
  const alphaShort = insufficient(sections.internalConsistency);
  if (alphaShort) {
    recommendations.push({
      category: "data_collection",
      message: `Cronbach's alpha requires more test sessions. Current: ${alphaShort.sampleSize}. Target: ${alphaShort.required}+ sessions.`,
      priority: "high",
    });
  }

  const retestShort = insufficient(sections.testRetest);
  if (retestShort) {
    recommendations.push({
      category: "data_collection",
      message: `Test-retest reliability requires more retest pairs. Current: ${retestShort.sampleSize}. Target: ${retestShort.required}+ pairs.`,
      priority: "medium",
    });
  } else if (retest && retest.numPairs < RECOMMENDED_RETEST_PAIRS) {
    recommendations.push({
      category: "data_collection",
      message: `Test-retest sample size is low (${retest.numPairs} pairs). Target: ${RECOMMENDED_RETEST_PAIRS}+ pairs for stable estimates.`,
      priority: "low",
    });
  }

  const splitShort = insufficient(sections.splitHalf);
  if (splitShort) {
    recommendations.push({
      category: "data_collection",
      message: `Split-half reliability requires more test sessions. Current: ${splitShort.sampleSize}. Target: ${splitShort.required}+ sessions.`,
      priority: "high",
    });
  }

  // Item review
  if (alpha) {
    const correlations = Object.values(alpha.itemTotalCorrelations);
    const negative = correlations.filter((r) => r < 0).length;
    if (negative > 0) {
      recommendations.push({
        category: "item_review",
        message: `Found ${negative} item(s) with negative item-total correlations. These items may harm internal consistency and should be reviewed.`,
        priority: negative >= PROBLEMATIC_ITEM_COUNT_THRESHOLD ? "high" : "medium",
      });
    }

    const low = correlations.filter((r) => r >= 0 && r < LOW_ITEM_CORRELATION_THRESHOLD).length;
    if (low >= PROBLEMATIC_ITEM_COUNT_THRESHOLD) {
      recommendations.push({
        category: "item_review",
        message: `Found ${low} items with very low item-total correlations (< ${LOW_ITEM_CORRELATION_THRESHOLD}). Consider reviewing these items for quality.`,
        priority: "low",
      });
    }
  }

  // Threshold warnings
  if (alpha && alpha.alpha < ALPHA_THRESHOLD) {
    recommendations.push({
      category: "threshold_warning",
      message: `Cronbach's alpha (${alpha.alpha.toFixed(2)}) is below the acceptable threshold (>= ${ALPHA_THRESHOLD}). Internal consistency is ${alpha.interpretation}. Review item quality and test composition.`,
      priority: "high",
    });
  }

  if (retest && !retest.meetsThreshold) {
    recommendations.push({
      category: "threshold_warning",
      message: `Test-retest reliability (${retest.r.toFixed(2)}) does not meet the acceptable threshold (> ${TEST_RETEST_THRESHOLD}). Score stability is ${retest.interpretation}.`,
      priority: "high",
    });
  }

  if (split && split.spearmanBrown < ALPHA_THRESHOLD) {
    recommendations.push({
      category: "threshold_warning",
      message: `Split-half reliability (${split.spearmanBrown.toFixed(2)}) is below the acceptable threshold (>= ${ALPHA_THRESHOLD}). Internal consistency is ${split.interpretation}.`,
      priority: "medium",
    });
  }

  if (retest && retest.largePracticeEffect) {
    const effect = retest.scoreChange.practiceEffect;
    recommendations.push({
      category: "threshold_warning",
      message: `Large practice effect detected (${effect.toFixed(1)} points ${effect > 0 ? "increase" : "decrease"}). This may indicate insufficient item variety or test-taking strategy effects.`,
      priority: "medium",
    });
  }

  // Array.prototype.sort is stable, so insertion order holds within a priority
  return recommendations.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
