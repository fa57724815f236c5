/**
 * Completion helpers shared by adaptive and fixed-form sessions.
 */

import { errorMessage } from "../lib/errors.ts";
import type { Item, TestSession } from "../repositories/types.ts";
import type { DifficultyLevel, QuestionType } from "../schemas/measurement.ts";
import { buildScoreEstimate, type ScoreEstimate } from "./precision-calculator.ts";
import type { QualityFlagController } from "./quality-flag-controller.ts";
import type { ReliabilityEstimator } from "./reliability-estimator.ts";
import { scoreToPercentile } from "./test-scoring.ts";

/** What a test-taker is shown; item statistics stay server-side */
export interface PresentedItem {
  id: string;
  questionType: QuestionType;
  difficultyLevel: DifficultyLevel;
}

export interface CompletedResult extends ScoreEstimate {
  percentile: number;
  correctAnswers: number;
  totalQuestions: number;
}

export function presentItem(item: Item): PresentedItem {
  return {
    id: item.id,
    questionType: item.questionType,
    difficultyLevel: item.difficultyLevel,
  };
}

/**
 * Score and precision for a completed session, or null when it has no
 * score. A failed reliability lookup only costs the interval.
 */
export async function buildCompletedResult(
  session: TestSession,
  reliability: ReliabilityEstimator,
  tag: string,
): Promise<CompletedResult | null> {
  if (!session.score) return null;

  let r: number | null = null;
  try {
    r = await reliability.currentReliability();
  } catch (err) {
    console.error(`[${tag}] Reliability lookup failed for session ${session.id}: ${errorMessage(err)}`);
  }

  return {
    ...buildScoreEstimate(session.score.scaledScore, r, {
      theta: session.mode === "adaptive" ? session.theta : undefined,
    }),
    percentile: scoreToPercentile(session.score.scaledScore),
    correctAnswers: session.score.correctAnswers,
    totalQuestions: session.score.totalQuestions,
  };
}

/**
 * Refresh statistics and flags of the items a finished session used.
 * Failures are logged here and never reach the test-taker.
 */
export async function refreshItemQuality(
  flags: QualityFlagController | undefined,
  sessionId: string,
  itemIds: string[],
  tag: string,
): Promise<void> {
  if (!flags || itemIds.length === 0) return;
  try {
    const decisions = await flags.refreshAndEvaluate(itemIds);
    const flagged = decisions.filter((d) => d.action === "flagged").length;
    if (flagged > 0) {
      console.log(`[${tag}] Session ${sessionId}: ${flagged} items flagged after statistics refresh`);
    }
  } catch (err) {
    console.error(`[${tag}] Item statistics refresh failed after session ${sessionId}: ${errorMessage(err)}`);
  }
}
