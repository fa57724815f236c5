/**
 * Adaptive Engine
 *
 * Runs one computerized adaptive test session as a state machine:
 *
 *   initialized → selecting → awaiting_response → updating → selecting | completed
 *
 * `abandoned` is reachable from any non-terminal state. Ability is
 * re-estimated (EAP) from every response so far after each answer, then the
 * stopping rules are checked in order:
 *
 *   1. SE below the precision target   → se_threshold
 *   2. item cap reached                → max_items
 *   3. no eligible item left to select → pool_exhausted
 *
 * Updates for one session are serialized by a SessionLock. The response row
 * and the new session state are written in one repository call, so a failed
 * write leaves theta, SE and the item count untouched and the same answer
 * can simply be resent.
 */

import {
  DEFAULT_MAX_ITEMS,
  DEFAULT_SE_THRESHOLD,
  PRIOR_SE,
  PRIOR_THETA,
} from "../config/constants.ts";
import { generateId } from "../config/id-generation-constants.ts";
import { ConflictingStateError, NotFoundError } from "../lib/errors.ts";
import type {
  Item,
  ItemRepository,
  ResponseRecord,
  ResponseRepository,
  SessionRepository,
  StoppingReason,
  TestSession,
} from "../repositories/types.ts";
import { estimateAbilityEAP } from "./ability-estimator.ts";
import { logSessionEvent } from "./audit-log.ts";
import { irtParameters } from "./information-models.ts";
import type { ItemSelector } from "./item-selector.ts";
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
import { thetaToScaledScore } from "./test-scoring.ts";

export type { CompletedResult, PresentedItem } from "./session-results.ts";

const TAG = "AdaptiveEngine";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdaptiveStart {
  session: TestSession;
  firstItem: PresentedItem | null;
  theta: number;
  se: number;
  /** Set when the pool was empty at start */
  result: CompletedResult | null;
}

export interface AdvanceResult {
  sessionId: string;
  nextItem: PresentedItem | null;
  testComplete: boolean;
  theta: number;
  se: number;
  itemsAdministered: number;
  stoppingReason: StoppingReason | null;
  result: CompletedResult | null;
  /** True when this answer had already been recorded */
  replayed: boolean;
}

export interface AdaptiveEngineDeps {
  items: ItemRepository;
  responses: ResponseRepository;
  sessions: SessionRepository;
  selector: ItemSelector;
  reliability: ReliabilityEstimator;
  /** Re-evaluates item statistics and flags after a session completes */
  flags?: QualityFlagController;
  lock?: SessionLock;
  now?: () => Date;
}

export interface AdaptiveEngineOptions {
  seThreshold?: number;
  maxItems?: number;
}

/**
 * Stopping rule. SE is checked before the item cap so a session that meets
 * both on the same answer reports `se_threshold`.
 */
export function checkStopping(
  se: number,
  itemsAdministered: number,
  options: { seThreshold: number; maxItems: number },
): StoppingReason | null {
  if (se < options.seThreshold) return "se_threshold";
  if (itemsAdministered >= options.maxItems) return "max_items";
  return null;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class AdaptiveEngine {
  private readonly seThreshold: number;
  private readonly maxItems: number;
  private readonly lock: SessionLock;
  private readonly now: () => Date;

  constructor(
    private readonly deps: AdaptiveEngineDeps,
    options: AdaptiveEngineOptions = {},
  ) {
    this.seThreshold = options.seThreshold ?? DEFAULT_SE_THRESHOLD;
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.lock = deps.lock ?? new SessionLock();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Create a session at the prior and select its first item.
   */
  async startAdaptive(userId: string): Promise<AdaptiveStart> {
    const startedAt = this.now();
    const session: TestSession = {
      id: generateId("ses"),
      userId,
      mode: "adaptive",
      status: "in_progress",
      phase: "initialized",
      administeredItemIds: [],
      currentItemId: null,
      theta: PRIOR_THETA,
      se: PRIOR_SE,
      itemsAdministered: 0,
      stoppingReason: null,
      score: null,
      startedAt,
      completedAt: null,
    };

    session.phase = "selecting";
    const pool = await this.deps.items.list({ activeOnly: true });
    const seen = await this.deps.sessions.presentedItemIdsForUser(userId);
    const first = this.deps.selector.selectAdaptive(pool, session.theta, new Set(), {
      seen,
      maxItems: this.maxItems,
    });

    if (!first) {
      console.warn(`[AdaptiveEngine] Session ${session.id}: no eligible items at start`);
      const completed = this.complete(session, "pool_exhausted", 0);
      await this.deps.sessions.create(completed);
      const result = await buildCompletedResult(completed, this.deps.reliability, TAG);
      logSessionEvent("session_completed", "Adaptive session ended: pool_exhausted", completed.id, {
        stoppingReason: "pool_exhausted",
        itemsAdministered: 0,
      });
      return { session: completed, firstItem: null, theta: completed.theta, se: completed.se, result };
    }

    session.phase = "awaiting_response";
    session.currentItemId = first.id;
    const created = await this.deps.sessions.create(session);

    console.log(`[AdaptiveEngine] Session ${created.id} started for user ${userId}, first item ${first.id}`);
    logSessionEvent("session_started", "Adaptive session started", created.id, {
      userId,
      firstItemId: first.id,
    });

    return {
      session: created,
      firstItem: presentItem(first),
      theta: created.theta,
      se: created.se,
      result: null,
    };
  }

  /**
   * Record the answer to the current item, re-estimate ability and either
   * select the next item or complete the session.
   */
  submitAndAdvance(sessionId: string, itemId: string, isCorrect: boolean): Promise<AdvanceResult> {
    return this.lock.run(sessionId, `submit:${itemId}`, () =>
      this.advance(sessionId, itemId, isCorrect),
    );
  }

  private async advance(sessionId: string, itemId: string, isCorrect: boolean): Promise<AdvanceResult> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) throw new NotFoundError("session", sessionId);
    if (session.mode !== "adaptive") {
      throw new ConflictingStateError(`Session ${sessionId} is not an adaptive session`);
    }

    const previous = await this.deps.responses.allResponsesForSession(sessionId);
    if (previous.some((r) => r.itemId === itemId)) {
      return this.describe(session, true);
    }

    if (session.status !== "in_progress") {
      throw new ConflictingStateError(`Session ${sessionId} is ${session.status}`, {
        status: session.status,
      });
    }
    if (session.currentItemId !== itemId) {
      throw new ConflictingStateError(
        `Item ${itemId} is not the current item of session ${sessionId}`,
        { currentItemId: session.currentItemId },
      );
    }

    const pool = await this.deps.items.list();
    const byId = new Map(pool.map((item) => [item.id, item]));
    const answered = byId.get(itemId);
    if (!answered) throw new NotFoundError("item", itemId);

    // Work on a copy; nothing is visible until the single write below
    const next: TestSession = { ...session, phase: "updating" };
    const record: ResponseRecord = {
      sessionId,
      itemId,
      userId: session.userId,
      isCorrect,
      abilityEstimateAtTime: session.theta,
      position: previous.length,
      answeredAt: this.now(),
    };

    const scored = [...previous, record].flatMap((r) => {
      const item = byId.get(r.itemId);
      return item ? [{ params: irtParameters(item), isCorrect: r.isCorrect }] : [];
    });
    const estimate = estimateAbilityEAP(scored, this.deps.selector.informationModel);

    next.theta = estimate.theta;
    next.se = estimate.se;
    next.itemsAdministered = session.itemsAdministered + 1;
    next.administeredItemIds = [...session.administeredItemIds, itemId];

    let reason = checkStopping(next.se, next.itemsAdministered, {
      seThreshold: this.seThreshold,
      maxItems: this.maxItems,
    });
    let nextItem: Item | null = null;
    if (!reason) {
      next.phase = "selecting";
      const seen = await this.deps.sessions.presentedItemIdsForUser(session.userId);
      nextItem = this.deps.selector.selectAdaptive(pool, next.theta, new Set(next.administeredItemIds), {
        seen,
        maxItems: this.maxItems,
      });
      if (!nextItem) reason = "pool_exhausted";
    }

    const correctAnswers = [...previous, record].filter((r) => r.isCorrect).length;
    const stored: TestSession = reason
      ? this.complete(next, reason, correctAnswers)
      : { ...next, phase: "awaiting_response", currentItemId: nextItem ? nextItem.id : null };

    await this.deps.sessions.recordResponses(stored, [record]);

    if (stored.status === "completed") {
      console.log(
        `[AdaptiveEngine] Session ${sessionId} completed: ${stored.stoppingReason} after ${stored.itemsAdministered} items, theta=${stored.theta.toFixed(3)}, se=${stored.se.toFixed(3)}`,
      );
      logSessionEvent("session_completed", `Adaptive session ended: ${stored.stoppingReason}`, sessionId, {
        stoppingReason: stored.stoppingReason,
        itemsAdministered: stored.itemsAdministered,
        theta: stored.theta,
        se: stored.se,
      });
      await refreshItemQuality(this.deps.flags, sessionId, stored.administeredItemIds, TAG);
    }

    return this.describe(stored, false);
  }

  /**
   * Abandon a session. Waits for an in-flight update on the same session.
   * Abandoning an abandoned session is a no-op.
   */
  abandon(sessionId: string): Promise<TestSession> {
    return this.lock.run(sessionId, "abandon", async () => {
      const session = await this.deps.sessions.get(sessionId);
      if (!session) throw new NotFoundError("session", sessionId);
      if (session.status === "abandoned") return session;
      if (session.status === "completed") {
        throw new ConflictingStateError(`Session ${sessionId} is already completed`, {
          status: session.status,
        });
      }

      const abandoned: TestSession = {
        ...session,
        status: "abandoned",
        phase: "abandoned",
        currentItemId: null,
      };
      await this.deps.sessions.update(abandoned);

      console.log(`[AdaptiveEngine] Session ${sessionId} abandoned after ${session.itemsAdministered} items`);
      logSessionEvent("session_abandoned", "Session abandoned", sessionId, {
        itemsAdministered: session.itemsAdministered,
      });
      return abandoned;
    });
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private complete(session: TestSession, reason: StoppingReason, correctAnswers: number): TestSession {
    return {
      ...session,
      status: "completed",
      phase: "completed",
      currentItemId: null,
      stoppingReason: reason,
      completedAt: this.now(),
      score: {
        correctAnswers,
        totalQuestions: session.itemsAdministered,
        scaledScore: thetaToScaledScore(session.theta),
      },
    };
  }

  private async describe(session: TestSession, replayed: boolean): Promise<AdvanceResult> {
    let nextItem: PresentedItem | null = null;
    if (session.status === "in_progress" && session.currentItemId) {
      const item = await this.deps.items.get(session.currentItemId);
      nextItem = item ? presentItem(item) : null;
    }

    const result =
      session.status === "completed"
        ? await buildCompletedResult(session, this.deps.reliability, TAG)
        : null;

    return {
      sessionId: session.id,
      nextItem,
      testComplete: session.status === "completed",
      theta: session.theta,
      se: session.se,
      itemsAdministered: session.itemsAdministered,
      stoppingReason: session.stoppingReason,
      result,
      replayed,
    };
  }
}
