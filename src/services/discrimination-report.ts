/**
 * Discrimination report builders.
 *
 * Pure functions over an item snapshot; ReportAggregator supplies the items,
 * the clock and the audit history.
 */

import {
  ACTION_LIST_LIMIT,
  NEW_FLAG_WINDOW_DAYS,
  TREND_WINDOW_DAYS,
} from "../config/constants.ts";
import { MS_PER_DAY, mean, round, round3 } from "../lib/math-utils.ts";
import type { Item } from "../repositories/types.ts";
import {
  qualityFlagEnum,
  type DifficultyLevel,
  type QualityFlag,
  type QuestionType,
} from "../schemas/measurement.ts";
import type { AuditEvent } from "./audit-log.ts";
import {
  classifyQualityTier,
  compareToAverage,
  percentileRank,
  type AverageComparison,
  type QualityTier,
} from "./item-quality-analyzer.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TierCounts = Record<QualityTier, number>;

export interface GroupStatistics {
  meanDiscrimination: number;
  negativeCount: number;
}

export interface ActionItem {
  itemId: string;
  discrimination: number;
  responseCount: number;
  reason: string;
  qualityFlag: QualityFlag;
}

export interface DiscriminationReport {
  minResponses: number;
  generatedAt: string;
  summary: TierCounts & { totalItemsWithData: number };
  qualityDistribution: {
    excellentPct: number;
    goodPct: number;
    acceptablePct: number;
    /** poor + very_poor + negative */
    problematicPct: number;
  };
  byDifficulty: Record<DifficultyLevel, GroupStatistics>;
  byType: Record<QuestionType, GroupStatistics>;
  actionNeeded: {
    immediateReview: ActionItem[];
    monitor: ActionItem[];
  };
  trends: {
    /** Mean discrimination of reported items created in the trend window */
    meanDiscrimination30d: number | null;
    /** Items auto-flagged for negative discrimination in the last 7 days */
    newNegativeThisWeek: number;
  };
}

export interface FlagHistoryEntry {
  at: string;
  action: string;
  previousFlag: QualityFlag | null;
  newFlag: QualityFlag | null;
  description: string;
}

export interface DiscriminationDetail {
  itemId: string;
  discrimination: number | null;
  qualityTier: QualityTier | null;
  responseCount: number;
  comparedToTypeAvg: AverageComparison | null;
  comparedToDifficultyAvg: AverageComparison | null;
  percentileRank: number | null;
  qualityFlag: QualityFlag;
  qualityFlagReason: string | null;
  history: FlagHistoryEntry[];
}

const IMMEDIATE_REVIEW_REASON =
  "Negative discrimination: high scorers missing this item more than low scorers";
const MONITOR_REASON = "Very poor discrimination: not differentiating between ability levels";

/** Prefix of the reason the flag controller writes on auto-flagging */
const AUTO_FLAG_REASON_PREFIX = "Negative discrimination";

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

type MeasuredItem = Item & { discrimination: number };

function isMeasured(item: Item): item is MeasuredItem {
  return item.discrimination !== null;
}

function groupStatistics(items: MeasuredItem[]): GroupStatistics {
  if (items.length === 0) return { meanDiscrimination: 0, negativeCount: 0 };
  return {
    meanDiscrimination: round3(mean(items.map((i) => i.discrimination))),
    negativeCount: items.filter((i) => i.discrimination < 0).length,
  };
}

function toActionItem(item: MeasuredItem, reason: string): ActionItem {
  return {
    itemId: item.id,
    discrimination: item.discrimination,
    responseCount: item.responseCount,
    reason,
    qualityFlag: item.qualityFlag,
  };
}

/** Worst first, id for stability */
function byDiscriminationAsc(a: MeasuredItem, b: MeasuredItem): number {
  return a.discrimination - b.discrimination || a.id.localeCompare(b.id);
}

export function buildDiscriminationReport(
  allItems: Item[],
  minResponses: number,
  now: Date,
): DiscriminationReport {
  const items = allItems
    .filter((item) => item.isActive && item.scoredResponseCount >= minResponses)
    .filter(isMeasured);

  const tiers: TierCounts = {
    excellent: 0,
    good: 0,
    acceptable: 0,
    poor: 0,
    very_poor: 0,
    negative: 0,
  };
  for (const item of items) {
    const tier = classifyQualityTier(item.discrimination);
    if (tier) tiers[tier]++;
  }

  const total = items.length;
  const pct = (count: number): number => (total > 0 ? round((count / total) * 100, 1) : 0);

  const ofLevel = (level: DifficultyLevel) =>
    groupStatistics(items.filter((i) => i.difficultyLevel === level));
  const ofType = (type: QuestionType) =>
    groupStatistics(items.filter((i) => i.questionType === type));

  const byDifficulty: Record<DifficultyLevel, GroupStatistics> = {
    easy: ofLevel("easy"),
    medium: ofLevel("medium"),
    hard: ofLevel("hard"),
  };
  const byType: Record<QuestionType, GroupStatistics> = {
    pattern: ofType("pattern"),
    logic: ofType("logic"),
    spatial: ofType("spatial"),
    math: ofType("math"),
    verbal: ofType("verbal"),
    memory: ofType("memory"),
  };

  const immediateReview = items
    .filter((i) => i.discrimination < 0)
    .sort(byDiscriminationAsc)
    .slice(0, ACTION_LIST_LIMIT)
    .map((i) => toActionItem(i, IMMEDIATE_REVIEW_REASON));
  const monitor = items
    .filter((i) => classifyQualityTier(i.discrimination) === "very_poor")
    .sort(byDiscriminationAsc)
    .slice(0, ACTION_LIST_LIMIT)
    .map((i) => toActionItem(i, MONITOR_REASON));

  if (immediateReview.length > 0) {
    console.warn(
      `[DiscriminationReport] ${immediateReview.length} items need immediate review (negative discrimination)`,
    );
  }

  const trendStart = now.getTime() - TREND_WINDOW_DAYS * MS_PER_DAY;
  const recent = items.filter((i) => i.createdAt.getTime() >= trendStart);
  const flagStart = now.getTime() - NEW_FLAG_WINDOW_DAYS * MS_PER_DAY;
  const newNegativeThisWeek = allItems.filter(
    (i) =>
      i.qualityFlag === "under_review" &&
      i.qualityFlagUpdatedAt !== null &&
      i.qualityFlagUpdatedAt.getTime() >= flagStart &&
      (i.qualityFlagReason ?? "").startsWith(AUTO_FLAG_REASON_PREFIX),
  ).length;

  return {
    minResponses,
    generatedAt: now.toISOString(),
    summary: { totalItemsWithData: total, ...tiers },
    qualityDistribution: {
      excellentPct: pct(tiers.excellent),
      goodPct: pct(tiers.good),
      acceptablePct: pct(tiers.acceptable),
      problematicPct: pct(tiers.poor + tiers.very_poor + tiers.negative),
    },
    byDifficulty,
    byType,
    actionNeeded: { immediateReview, monitor },
    trends: {
      meanDiscrimination30d:
        recent.length > 0 ? round3(mean(recent.map((i) => i.discrimination))) : null,
      newNegativeThisWeek,
    },
  };
}

// ---------------------------------------------------------------------------
// Detail
// ---------------------------------------------------------------------------

function flagFrom(value: unknown): QualityFlag | null {
  const parsed = qualityFlagEnum.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Flag transitions among an item's audit events, newest first */
export function flagHistory(events: AuditEvent[]): FlagHistoryEntry[] {
  return events
    .filter((e) => e.metadata !== undefined && "newFlag" in e.metadata)
    .map((e) => ({
      at: e.timestamp,
      action: e.action,
      previousFlag: flagFrom(e.metadata?.previousFlag),
      newFlag: flagFrom(e.metadata?.newFlag),
      description: e.description,
    }));
}

export function buildDiscriminationDetail(
  item: Item,
  allItems: Item[],
  events: AuditEvent[],
): DiscriminationDetail {
  const value = item.discrimination;
  const measured = allItems.filter(isMeasured);
  const activeMeasured = measured.filter((i) => i.isActive);

  const averageOf = (group: MeasuredItem[]): number | null =>
    group.length > 0 ? mean(group.map((i) => i.discrimination)) : null;

  return {
    itemId: item.id,
    discrimination: value,
    qualityTier: classifyQualityTier(value),
    responseCount: item.responseCount,
    comparedToTypeAvg: compareToAverage(
      value,
      averageOf(activeMeasured.filter((i) => i.questionType === item.questionType)),
    ),
    comparedToDifficultyAvg: compareToAverage(
      value,
      averageOf(activeMeasured.filter((i) => i.difficultyLevel === item.difficultyLevel)),
    ),
    percentileRank:
      value === null ? null : percentileRank(value, measured.map((i) => i.discrimination)),
    qualityFlag: item.qualityFlag,
    qualityFlagReason: item.qualityFlagReason,
    history: flagHistory(events),
  };
}
