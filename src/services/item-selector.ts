/**
 * Item Selector
 *
 * Chooses items for a test session. Eligibility is always applied first:
 * only active items whose quality flag is `normal` can be selected.
 *
 * Fixed-form mode fills a difficulty stratification target (30% easy,
 * 40% medium, 30% hard). Within a tier items are ordered by discrimination,
 * highest first, with unmeasured items last, and drawn from progressively
 * wider discrimination bands:
 *
 *   >= 0.30  →  >= 0.20  →  > 0  →  not negative (unmeasured included)
 *
 * Adaptive mode ranks not-yet-administered items by information at the
 * current ability estimate, after content balancing has narrowed the
 * candidates by question type. Ties go to higher discrimination, then to
 * lower response count so exposure spreads across the bank.
 *
 * Both modes skip items the user was shown in earlier sessions.
 */

import {
  CONTENT_BALANCE_TOLERANCE,
  DEFAULT_MAX_ITEMS,
  DIFFICULTY_DISTRIBUTION,
  MIN_ITEMS_PER_TYPE,
  QUESTION_TYPE_WEIGHTS,
} from "../config/constants.ts";
import { isSelectable } from "../lib/quality-flag.ts";
import type { Item } from "../repositories/types.ts";
import { questionTypeEnum, type DifficultyLevel, type QuestionType } from "../schemas/measurement.ts";
import { irtParameters, twoPl, type InformationModel } from "./information-models.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiscriminationBand {
  label: string;
  accepts: (discrimination: number | null) => boolean;
}

export const DISCRIMINATION_BANDS: readonly DiscriminationBand[] = [
  { label: ">=0.30", accepts: (d) => d !== null && d >= 0.3 },
  { label: ">=0.20", accepts: (d) => d !== null && d >= 0.2 },
  { label: ">0", accepts: (d) => d !== null && d > 0 },
  { label: "non-negative", accepts: (d) => d === null || d >= 0 },
];

export interface FallbackUse {
  difficulty: DifficultyLevel | "any";
  band: string;
  needed: number;
  selected: number;
}

export interface FixedFormSelection {
  items: Item[];
  targets: Record<DifficultyLevel, number>;
  fallbacks: FallbackUse[];
}

export interface RankedCandidate {
  item: Item;
  information: number;
}

export interface AdaptiveSelectionOptions {
  /** Items shown to the user in earlier sessions */
  seen?: ReadonlySet<string>;
  /** Test length, used to tell whether type minimums can still be met */
  maxItems?: number;
}

const DIFFICULTIES: readonly DifficultyLevel[] = ["easy", "medium", "hard"];

/** Information values closer than this are treated as tied */
const INFORMATION_EPSILON = 1e-12;

// ---------------------------------------------------------------------------
// Ordering helpers
// ---------------------------------------------------------------------------

/** Discrimination descending, unmeasured last, then id for stability */
export function byDiscriminationDesc(a: Item, b: Item): number {
  if (a.discrimination === null && b.discrimination === null) return a.id.localeCompare(b.id);
  if (a.discrimination === null) return 1;
  if (b.discrimination === null) return -1;
  return b.discrimination - a.discrimination || a.id.localeCompare(b.id);
}

/**
 * Per-tier counts for a form of `total` items. Easy and hard take their
 * rounded share; medium takes the remainder.
 */
export function stratificationTargets(total: number): Record<DifficultyLevel, number> {
  const easy = Math.round(total * DIFFICULTY_DISTRIBUTION.easy);
  const hard = Math.round(total * DIFFICULTY_DISTRIBUTION.hard);
  return { easy, medium: Math.max(0, total - easy - hard), hard };
}

/** Administered items per question type; items missing from `pool` are not counted */
export function typeCoverage(pool: Item[], administered: ReadonlySet<string>): Record<QuestionType, number> {
  const coverage: Record<QuestionType, number> = {
    pattern: 0,
    logic: 0,
    spatial: 0,
    math: 0,
    verbal: 0,
    memory: 0,
  };
  for (const item of pool) {
    if (administered.has(item.id)) coverage[item.questionType]++;
  }
  return coverage;
}

/**
 * Narrow candidates toward under-represented question types.
 *
 * While some type is below MIN_ITEMS_PER_TYPE and the slots left can still
 * cover every shortfall, only the short types are offered. Once every
 * minimum is met, types more than CONTENT_BALANCE_TOLERANCE below their
 * target share are preferred. Returns `candidates` unchanged when neither
 * rule leaves anything to choose from.
 */
export function balanceContent(
  candidates: Item[],
  coverage: Record<QuestionType, number>,
  maxItems: number,
): Item[] {
  const types = questionTypeEnum.options;
  const administered = types.reduce((sum, type) => sum + coverage[type], 0);

  const short = types.filter((type) => coverage[type] < MIN_ITEMS_PER_TYPE);
  if (short.length > 0) {
    const deficit = short.reduce((sum, type) => sum + MIN_ITEMS_PER_TYPE - coverage[type], 0);
    if (deficit <= maxItems - administered) {
      const constrained = candidates.filter((item) => short.includes(item.questionType));
      if (constrained.length > 0) return constrained;
    }
    return candidates;
  }

  if (administered === 0) return candidates;
  const underweight = types.filter(
    (type) => coverage[type] / administered < QUESTION_TYPE_WEIGHTS[type] - CONTENT_BALANCE_TOLERANCE,
  );
  const preferred = candidates.filter((item) => underweight.includes(item.questionType));
  return preferred.length > 0 ? preferred : candidates;
}

// ---------------------------------------------------------------------------
// Selector
// ---------------------------------------------------------------------------

export class ItemSelector {
  private readonly model: InformationModel;

  constructor(options: { model?: InformationModel } = {}) {
    this.model = options.model ?? twoPl;
  }

  get informationModel(): InformationModel {
    return this.model;
  }

  /** Active, `normal`-flagged items not in `exclude` */
  eligible(pool: Item[], exclude: ReadonlySet<string> = new Set()): Item[] {
    return pool.filter(
      (item) => item.isActive && isSelectable(item.qualityFlag) && !exclude.has(item.id),
    );
  }

  // -------------------------------------------------------------------------
  // Fixed form
  // -------------------------------------------------------------------------

  composeFixedForm(
    pool: Item[],
    total: number,
    seen: ReadonlySet<string> = new Set(),
  ): FixedFormSelection {
    const candidates = this.eligible(pool, seen);
    const targets = stratificationTargets(total);
    const chosen = new Set<string>();
    const selected: Item[] = [];
    const fallbacks: FallbackUse[] = [];

    const take = (
      from: Item[],
      needed: number,
      difficulty: DifficultyLevel | "any",
    ): void => {
      let remaining = needed;
      for (const [index, band] of DISCRIMINATION_BANDS.entries()) {
        if (remaining === 0) break;
        const inBand = from
          .filter((item) => !chosen.has(item.id) && band.accepts(item.discrimination))
          .sort(byDiscriminationDesc)
          .slice(0, remaining);
        for (const item of inBand) {
          chosen.add(item.id);
          selected.push(item);
        }
        remaining -= inBand.length;

        if (index > 0 && inBand.length > 0) {
          fallbacks.push({ difficulty, band: band.label, needed, selected: inBand.length });
          console.warn(
            `[ItemSelector] Fixed form: ${difficulty} tier used fallback band ${band.label} for ${inBand.length} of ${needed} items`,
          );
        }
      }
    };

    for (const difficulty of DIFFICULTIES) {
      take(
        candidates.filter((item) => item.difficultyLevel === difficulty),
        targets[difficulty],
        difficulty,
      );
    }

    // Short tiers are filled from any difficulty
    const shortBy = total - selected.length;
    if (shortBy > 0) {
      console.warn(
        `[ItemSelector] Fixed form: ${shortBy} items short of the difficulty targets; filling from any difficulty`,
      );
      take(candidates, shortBy, "any");
    }

    if (selected.length < total) {
      console.warn(
        `[ItemSelector] Fixed form: only ${selected.length} of ${total} requested items available`,
      );
    }

    return { items: selected, targets, fallbacks };
  }

  // -------------------------------------------------------------------------
  // Adaptive
  // -------------------------------------------------------------------------

  /**
   * Eligible items neither administered nor seen before, content-balanced
   * and ranked by information at `theta`. Items with negative
   * discrimination are only ranked when nothing else remains.
   */
  rankAdaptive(
    pool: Item[],
    theta: number,
    administered: ReadonlySet<string>,
    options: AdaptiveSelectionOptions = {},
  ): RankedCandidate[] {
    const excluded = new Set([...administered, ...(options.seen ?? [])]);
    const candidates = this.eligible(pool, excluded);
    let usable = candidates.filter(
      (item) => item.discrimination === null || item.discrimination >= 0,
    );
    if (usable.length === 0 && candidates.length > 0) {
      console.warn(
        `[ItemSelector] Adaptive: only negative-discrimination items remain (${candidates.length}); using them`,
      );
      usable = candidates;
    }
    const balanced = balanceContent(
      usable,
      typeCoverage(pool, administered),
      options.maxItems ?? DEFAULT_MAX_ITEMS,
    );

    return balanced
      .map((item) => ({
        item,
        information: this.model.information(theta, irtParameters(item)),
      }))
      .sort((x, y) => {
        const diff = y.information - x.information;
        if (Math.abs(diff) > INFORMATION_EPSILON) return diff;
        const dx = x.item.discrimination ?? Number.NEGATIVE_INFINITY;
        const dy = y.item.discrimination ?? Number.NEGATIVE_INFINITY;
        if (dx !== dy) return dy - dx;
        return x.item.responseCount - y.item.responseCount || x.item.id.localeCompare(y.item.id);
      });
  }

  /** The most informative eligible item, or null when the pool is exhausted */
  selectAdaptive(
    pool: Item[],
    theta: number,
    administered: ReadonlySet<string>,
    options: AdaptiveSelectionOptions = {},
  ): Item | null {
    const [best] = this.rankAdaptive(pool, theta, administered, options);
    return best ? best.item : null;
  }
}
