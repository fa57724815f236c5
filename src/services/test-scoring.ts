/**
 * Test Scoring
 *
 * Converts session outcomes to the reporting scale (mean 100, SD 15).
 *
 * Fixed form:  score = 100 + (accuracy - 0.5) × 30
 * Adaptive:    score = 100 + 15θ
 *
 * Both are rounded to whole points and clamped to [40, 160]. The fixed-form
 * mapping assumes items of moderate difficulty; adaptive scores adjust for
 * item difficulty through θ.
 */

import {
  POPULATION_MEAN,
  POPULATION_SD,
  SCORE_MAX,
  SCORE_MIN,
} from "../config/constants.ts";
import { InvalidInputError } from "../lib/errors.ts";
import { clamp, normalCdf, round, round3 } from "../lib/math-utils.ts";
import type { QuestionType } from "../schemas/measurement.ts";

export interface DomainScore {
  domain: QuestionType;
  itemsAdministered: number;
  correctCount: number;
  /** Proportion correct, 3 decimals */
  accuracy: number;
}

/**
 * Accuracy-based score for a fixed-form session.
 *
 * @example
 * scoreFixedForm(15, 20) // 108
 */
export function scoreFixedForm(correctAnswers: number, totalQuestions: number): number {
  if (!Number.isInteger(totalQuestions) || totalQuestions <= 0) {
    throw new InvalidInputError(`totalQuestions must be a positive integer, got ${totalQuestions}`);
  }
  if (correctAnswers < 0 || correctAnswers > totalQuestions) {
    throw new InvalidInputError(
      `correctAnswers must be between 0 and ${totalQuestions}, got ${correctAnswers}`,
    );
  }
  const accuracy = correctAnswers / totalQuestions;
  return clamp(Math.round(POPULATION_MEAN + (accuracy - 0.5) * 30), SCORE_MIN, SCORE_MAX);
}

export function thetaToScaledScore(theta: number): number {
  return clamp(Math.round(POPULATION_MEAN + POPULATION_SD * theta), SCORE_MIN, SCORE_MAX);
}

/**
 * Share of the population scoring below `score`, 1 decimal.
 *
 * @example
 * scoreToPercentile(115) // 84.1
 */
export function scoreToPercentile(score: number): number {
  return round(normalCdf((score - POPULATION_MEAN) / POPULATION_SD) * 100, 1);
}

/** Accuracy per question type; types with no responses are omitted */
export function domainScores(
  responses: Array<{ questionType: QuestionType; isCorrect: boolean }>,
): DomainScore[] {
  const byDomain = new Map<QuestionType, { correct: number; total: number }>();
  for (const r of responses) {
    const entry = byDomain.get(r.questionType) ?? { correct: 0, total: 0 };
    entry.total++;
    if (r.isCorrect) entry.correct++;
    byDomain.set(r.questionType, entry);
  }

  return [...byDomain.entries()].map(([domain, { correct, total }]) => ({
    domain,
    itemsAdministered: total,
    correctCount: correct,
    accuracy: round3(correct / total),
  }));
}
