/**
 * Precision Calculator
 *
 * Converts a reliability coefficient into a Standard Error of Measurement
 * and a confidence interval around an observed score:
 *
 *   SEM = SD × √(1 - r)
 *   CI  = score ± z × SEM
 *
 * Bounds are rounded to whole score points and clamped to the reportable
 * range. Below the usability floor no interval is produced at all.
 */

import {
  DEFAULT_CONFIDENCE_LEVEL,
  MIN_USABLE_RELIABILITY,
  POPULATION_SD,
  SCORE_MAX,
  SCORE_MIN,
} from "../config/constants.ts";
import { InvalidInputError } from "../lib/errors.ts";
import { clamp, twoSidedZ } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConfidenceInterval {
  lower: number;
  upper: number;
  confidenceLevel: number;
  /** SEM rounded to 2 decimals */
  sem: number;
}

export interface ScoreEstimate {
  score: number;
  /** Ability estimate for adaptive sessions */
  theta: number | null;
  sem: number | null;
  confidenceInterval: ConfidenceInterval | null;
}

// ---------------------------------------------------------------------------
// SEM
// ---------------------------------------------------------------------------

/**
 * Standard Error of Measurement for a reliability in [0, 1].
 *
 * @example
 * computeSEM(0.8)  // 6.708...
 * computeSEM(0)    // 15
 */
export function computeSEM(reliability: number, populationSD: number = POPULATION_SD): number {
  if (!Number.isFinite(reliability) || reliability < 0 || reliability > 1) {
    throw new InvalidInputError(`reliability must be between 0 and 1, got ${reliability}`);
  }
  if (!Number.isFinite(populationSD) || populationSD <= 0) {
    throw new InvalidInputError(`population SD must be positive, got ${populationSD}`);
  }
  return populationSD * Math.sqrt(1 - reliability);
}

// ---------------------------------------------------------------------------
// Confidence interval
// ---------------------------------------------------------------------------

/**
 * Two-sided confidence interval around `score`.
 *
 * @example
 * computeConfidenceInterval(100, 6.71, 0.95) // { lower: 87, upper: 113 }
 */
export function computeConfidenceInterval(
  score: number,
  sem: number,
  confidenceLevel: number = DEFAULT_CONFIDENCE_LEVEL,
): { lower: number; upper: number } {
  if (!Number.isFinite(sem) || sem < 0) {
    throw new InvalidInputError(`sem must be non-negative, got ${sem}`);
  }
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new InvalidInputError(
      `confidence level must be strictly between 0 and 1, got ${confidenceLevel}`,
    );
  }

  const margin = twoSidedZ(confidenceLevel) * sem;
  const lower = clamp(Math.round(score - margin), SCORE_MIN, SCORE_MAX);
  const upper = clamp(Math.round(score + margin), SCORE_MIN, SCORE_MAX);
  return { lower: Math.min(lower, upper), upper: Math.max(lower, upper) };
}

// ---------------------------------------------------------------------------
// Score estimate
// ---------------------------------------------------------------------------

/**
 * Attach precision to a final score. The interval is null when reliability
 * is unknown or below the usability floor.
 */
export function buildScoreEstimate(
  score: number,
  reliability: number | null,
  options: { theta?: number; confidenceLevel?: number } = {},
): ScoreEstimate {
  const theta = options.theta ?? null;
  if (reliability === null || reliability < MIN_USABLE_RELIABILITY) {
    return { score, theta, sem: null, confidenceInterval: null };
  }

  const confidenceLevel = options.confidenceLevel ?? DEFAULT_CONFIDENCE_LEVEL;
  const sem = computeSEM(Math.min(reliability, 1));
  const { lower, upper } = computeConfidenceInterval(score, sem, confidenceLevel);
  const roundedSem = Math.round(sem * 100) / 100;

  return {
    score,
    theta,
    sem: roundedSem,
    confidenceInterval: { lower, upper, confidenceLevel, sem: roundedSem },
  };
}
