/**
 * Fixed-Form Sessions
 *
 * Composes a stratified form up front, then scores all answers in one
 * submission. The returned score carries a confidence interval from the
 * current reliability estimate, or null when reliability is unknown or too
 * low to report.
 */

import {
  DEFAULT_FIXED_FORM_LENGTH,
  PRIOR_SE,
  PRIOR_THETA,
} from "../config/constants.ts";
import { generateId } from "../config/id-generation-constants.ts";
import {
  ConflictingStateError,
  InvalidInputError,
  NotFoundError,
} from "../lib/errors.ts";
import type {
  ItemRepository,
  ResponseRecord,
  SessionRepository,
  TestSession,
} from "../repositories/types.ts";
import type { DifficultyLevel, SubmitResponse } from "../schemas/measurement.ts";
import { estimateAbilityEAP } from "./ability-estimator.ts";
import { logSessionEvent } from "./audit-log.ts";
import { irtParameters } from "./information-models.ts";
import type { FallbackUse, ItemSelector } from "./item-selector.ts";
import type { QualityFlagController } from "./quality-flag-controller.ts";
import type { ReliabilityEstimator } from "./reliability-estimator.ts";
import { SessionLock } from "./session-lock.ts";
import {
  buildCompletedResult,
  presentItem,
  refreshItemQuality,
  type CompletedResult,
  type PresentedItem,
} from "./session-results.ts";
import { domainScores, scoreFixedForm, type DomainScore } from "./test-scoring.ts";

const TAG = "FixedForm";

export interface FixedFormStart {
  session: TestSession;
  items: PresentedItem[];
  targets: Record<DifficultyLevel, number>;
  fallbacks: FallbackUse[];
}

export interface FixedFormSubmission {
  sessionId: string;
  score: number;
  confidenceInterval: CompletedResult["confidenceInterval"];
  result: CompletedResult;
  domains: DomainScore[];
}

export interface FixedFormServiceDeps {
  items: ItemRepository;
  sessions: SessionRepository;
  selector: ItemSelector;
  reliability: ReliabilityEstimator;
  flags?: QualityFlagController;
  lock?: SessionLock;
  now?: () => Date;
}

export class FixedFormService {
  private readonly lock: SessionLock;
  private readonly now: () => Date;

  constructor(private readonly deps: FixedFormServiceDeps) {
    this.lock = deps.lock ?? new SessionLock();
    this.now = deps.now ?? (() => new Date());
  }

  async start(userId: string, totalItems: number = DEFAULT_FIXED_FORM_LENGTH): Promise<FixedFormStart> {
    const pool = await this.deps.items.list({ activeOnly: true });
    const seen = await this.deps.sessions.presentedItemIdsForUser(userId);
    const form = this.deps.selector.composeFixedForm(pool, totalItems, seen);
    if (form.items.length === 0) {
      throw new ConflictingStateError("No eligible items available to compose a test");
    }

    const session: TestSession = {
      id: generateId("ses"),
      userId,
      mode: "fixed",
      status: "in_progress",
      phase: "awaiting_response",
      administeredItemIds: form.items.map((item) => item.id),
      currentItemId: null,
      theta: PRIOR_THETA,
      se: PRIOR_SE,
      itemsAdministered: 0,
      stoppingReason: null,
      score: null,
      startedAt: this.now(),
      completedAt: null,
    };
    const created = await this.deps.sessions.create(session);

    logSessionEvent("session_started", "Fixed-form session started", created.id, {
      userId,
      formLength: form.items.length,
      fallbacks: form.fallbacks.length,
    });

    return {
      session: created,
      items: form.items.map(presentItem),
      targets: form.targets,
      fallbacks: form.fallbacks,
    };
  }

  /**
   * Score a completed form. Items of the form left unanswered count as
   * incorrect.
   */
  submit(sessionId: string, answers: SubmitResponse[]): Promise<FixedFormSubmission> {
    return this.lock.run(sessionId, "submit", async () => {
      const session = await this.deps.sessions.get(sessionId);
      if (!session) throw new NotFoundError("session", sessionId);
      if (session.mode !== "fixed") {
        throw new ConflictingStateError(`Session ${sessionId} is not a fixed-form session`);
      }
      if (session.status !== "in_progress") {
        throw new ConflictingStateError(`Session ${sessionId} is ${session.status}`, {
          status: session.status,
        });
      }

      const positions = new Map(session.administeredItemIds.map((id, index) => [id, index]));
      const seen = new Set<string>();
      for (const answer of answers) {
        if (!positions.has(answer.itemId)) {
          throw new InvalidInputError(`Item ${answer.itemId} is not part of session ${sessionId}`, {
            itemId: answer.itemId,
          });
        }
        if (seen.has(answer.itemId)) {
          throw new InvalidInputError(`Item ${answer.itemId} was answered more than once`, {
            itemId: answer.itemId,
          });
        }
        seen.add(answer.itemId);
      }

      const answeredAt = this.now();
      const records: ResponseRecord[] = answers.map((answer) => ({
        sessionId,
        itemId: answer.itemId,
        userId: session.userId,
        isCorrect: answer.isCorrect,
        abilityEstimateAtTime: null,
        position: positions.get(answer.itemId) ?? 0,
        answeredAt,
      }));
      records.sort((a, b) => a.position - b.position);

      const pool = await this.deps.items.list();
      const byId = new Map(pool.map((item) => [item.id, item]));
      const estimate = estimateAbilityEAP(
        records.flatMap((r) => {
          const item = byId.get(r.itemId);
          return item ? [{ params: irtParameters(item), isCorrect: r.isCorrect }] : [];
        }),
        this.deps.selector.informationModel,
      );

      const totalQuestions = session.administeredItemIds.length;
      const correctAnswers = records.filter((r) => r.isCorrect).length;
      const completed: TestSession = {
        ...session,
        status: "completed",
        phase: "completed",
        theta: estimate.theta,
        se: estimate.se,
        itemsAdministered: records.length,
        completedAt: answeredAt,
        score: {
          correctAnswers,
          totalQuestions,
          scaledScore: scoreFixedForm(correctAnswers, totalQuestions),
        },
      };

      await this.deps.sessions.recordResponses(completed, records);

      const result = await buildCompletedResult(completed, this.deps.reliability, TAG);
      if (!result) {
        throw new ConflictingStateError(`Session ${sessionId} completed without a score`);
      }

      console.log(
        `[${TAG}] Session ${sessionId} submitted: ${correctAnswers}/${totalQuestions} correct, score=${result.score}`,
      );
      logSessionEvent("session_completed", "Fixed-form session submitted", sessionId, {
        correctAnswers,
        totalQuestions,
        score: result.score,
        intervalReported: result.confidenceInterval !== null,
      });
      await refreshItemQuality(
        this.deps.flags,
        sessionId,
        records.map((r) => r.itemId),
        TAG,
      );

      return {
        sessionId,
        score: result.score,
        confidenceInterval: result.confidenceInterval,
        result,
        domains: domainScores(
          records.flatMap((r) => {
            const item = byId.get(r.itemId);
            return item ? [{ questionType: item.questionType, isCorrect: r.isCorrect }] : [];
          }),
        ),
      };
    });
  }
}
