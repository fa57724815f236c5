/**
 * Quality Flag Controller
 *
 * Decides when an item is soft-flagged for review and applies operator
 * overrides. The automatic rule is deterministic:
 *
 *   scoredResponseCount >= minResponses AND discrimination < 0  →  under_review
 *
 * The write is a conditional per-row update, so two evaluators racing on the
 * same item produce a single transition and a single warning. Items that are
 * already out of `normal` are never touched by the engine.
 */

import { DEFAULT_MIN_RESPONSES } from "../config/constants.ts";
import {
  ConflictingStateError,
  InvalidInputError,
  NotFoundError,
} from "../lib/errors.ts";
import { canTransition } from "../lib/quality-flag.ts";
import type { Item, ItemRepository } from "../repositories/types.ts";
import type { QualityFlag } from "../schemas/measurement.ts";
import { logAdminEvent, logQualityEvent } from "./audit-log.ts";
import type { ItemQualityAnalyzer } from "./item-quality-analyzer.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type NoChangeReason =
  | "insufficient_responses"
  | "no_discrimination"
  | "not_negative"
  | "already_flagged";

export type FlagDecision =
  | {
      action: "flagged";
      itemId: string;
      previousFlag: QualityFlag;
      newFlag: QualityFlag;
      discrimination: number;
      reason: string;
      flaggedAt: Date;
    }
  | {
      action: "no_change";
      itemId: string;
      currentFlag: QualityFlag;
      reason: NoChangeReason;
    };

export interface FlagOverrideResult {
  itemId: string;
  previousFlag: QualityFlag;
  newFlag: QualityFlag;
  reason: string | null;
  updatedAt: Date;
}

export interface QualityFlagControllerDeps {
  items: ItemRepository;
  analyzer?: ItemQualityAnalyzer;
  now?: () => Date;
}

type FlagChangeListener = (itemId: string) => void;

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class QualityFlagController {
  private readonly minResponses: number;
  private readonly now: () => Date;
  private readonly listeners: FlagChangeListener[] = [];

  constructor(
    private readonly deps: QualityFlagControllerDeps,
    options: { minResponses?: number } = {},
  ) {
    this.minResponses = options.minResponses ?? DEFAULT_MIN_RESPONSES;
    this.now = deps.now ?? (() => new Date());
  }

  /** Register a callback fired after every successful flag change */
  onFlagChange(listener: FlagChangeListener): void {
    this.listeners.push(listener);
  }

  private notify(itemId: string): void {
    for (const listener of this.listeners) listener(itemId);
  }

  /**
   * Apply the automatic flagging rule to an item snapshot.
   */
  async evaluate(item: Item): Promise<FlagDecision> {
    const noChange = (
      reason: NoChangeReason,
      currentFlag: QualityFlag = item.qualityFlag,
    ): FlagDecision => ({
      action: "no_change",
      itemId: item.id,
      currentFlag,
      reason,
    });

    if (!canTransition("engine", item.qualityFlag, "under_review")) {
      return noChange("already_flagged");
    }
    if (item.scoredResponseCount < this.minResponses) {
      return noChange("insufficient_responses");
    }
    if (item.discrimination === null) {
      return noChange("no_discrimination");
    }
    if (!(item.discrimination < 0)) {
      return noChange("not_negative");
    }

    const discrimination = item.discrimination;
    const flaggedAt = this.now();
    const reason = `Negative discrimination (${discrimination.toFixed(4)}) detected at ${flaggedAt.toISOString()}`;

    const applied = await this.deps.items.transitionQualityFlag(
      item.id,
      "normal",
      "under_review",
      reason,
      flaggedAt,
    );
    if (!applied) {
      // Another evaluator or an operator got there first
      return noChange("already_flagged", "under_review");
    }

    console.warn(
      `[QualityFlag] Item ${item.id} flagged for review: discrimination=${discrimination.toFixed(4)}, responses=${item.scoredResponseCount}`,
    );
    logQualityEvent("item_flagged", reason, item.id, "warn", {
      discrimination,
      responseCount: item.scoredResponseCount,
      previousFlag: "normal",
      newFlag: "under_review",
    });
    this.notify(item.id);

    return {
      action: "flagged",
      itemId: item.id,
      previousFlag: "normal",
      newFlag: "under_review",
      discrimination,
      reason,
      flaggedAt,
    };
  }

  /**
   * Evaluate several items concurrently. Each item's write is independent.
   */
  evaluateMany(items: Item[]): Promise<FlagDecision[]> {
    return Promise.all(items.map((item) => this.evaluate(item)));
  }

  /**
   * Refresh statistics for the items of a finished session, then re-evaluate
   * their flags against the fresh values.
   */
  async refreshAndEvaluate(itemIds: string[]): Promise<FlagDecision[]> {
    const { analyzer } = this.deps;
    if (!analyzer) return [];

    const refreshed = await analyzer.refreshItemStatistics(itemIds);
    const items: Item[] = [];
    for (const stats of refreshed) {
      const item = await this.deps.items.get(stats.itemId);
      if (item) items.push(item);
    }
    return this.evaluateMany(items);
  }

  /**
   * Operator override. Any transition is allowed; deactivation requires a
   * non-empty reason.
   */
  async setQualityFlag(
    itemId: string,
    newFlag: QualityFlag,
    reason?: string,
  ): Promise<FlagOverrideResult> {
    const trimmed = reason?.trim() ?? "";
    if (newFlag === "deactivated" && trimmed.length === 0) {
      throw new InvalidInputError("Reason is required when deactivating an item", {
        field: "reason",
      });
    }

    const item = await this.deps.items.get(itemId);
    if (!item) throw new NotFoundError("item", itemId);

    if (!canTransition("operator", item.qualityFlag, newFlag)) {
      throw new ConflictingStateError(
        `Cannot change quality flag from ${item.qualityFlag} to ${newFlag}`,
      );
    }

    const updatedAt = this.now();
    const storedReason = trimmed.length > 0 ? trimmed : null;
    const applied = await this.deps.items.transitionQualityFlag(
      itemId,
      item.qualityFlag,
      newFlag,
      storedReason,
      updatedAt,
    );
    if (!applied) {
      throw new ConflictingStateError(
        `Quality flag of item ${itemId} changed concurrently; reload and retry`,
      );
    }

    console.log(
      `[QualityFlag] Item ${itemId} flag changed by operator: ${item.qualityFlag} -> ${newFlag}`,
    );
    logAdminEvent(
      "quality_flag_override",
      `Quality flag changed from ${item.qualityFlag} to ${newFlag}`,
      itemId,
      { previousFlag: item.qualityFlag, newFlag, reason: storedReason },
    );
    this.notify(itemId);

    return {
      itemId,
      previousFlag: item.qualityFlag,
      newFlag,
      reason: storedReason,
      updatedAt,
    };
  }
}
