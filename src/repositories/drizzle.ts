/**
 * PostgreSQL repositories (drizzle-orm, node-postgres).
 *
 * Text enum columns are parsed with the zod enums on the way out so a bad
 * row surfaces as a repository failure instead of an invalid entity.
 */

import { and, asc, desc, eq, gte, inArray, isNotNull, lte } from "drizzle-orm";
import type { Database } from "../db/index.ts";
import {
  items,
  reliabilityMetrics,
  responses,
  testSessions,
} from "../db/schema/index.ts";
import { generateId } from "../config/id-generation-constants.ts";
import { RepositoryFailureError } from "../lib/errors.ts";
import { buildRetestPairs } from "../lib/retest-pairs.ts";
import {
  difficultyLevelEnum,
  metricTypeEnum,
  qualityFlagEnum,
  questionTypeEnum,
  testModeEnum,
  testStatusEnum,
  type MetricType,
  type QualityFlag,
} from "../schemas/measurement.ts";
import { z } from "zod";
import type {
  Item,
  ItemRepository,
  ItemStatisticsUpdate,
  ReliabilityMetric,
  ReliabilityMetricRepository,
  Repositories,
  ResponseRecord,
  ResponseRepository,
  RetestPair,
  SessionRepository,
  TestSession,
} from "./types.ts";

const sessionPhaseEnum = z.enum([
  "initialized",
  "selecting",
  "awaiting_response",
  "updating",
  "completed",
  "abandoned",
]);
const stoppingReasonEnum = z.enum(["se_threshold", "max_items", "pool_exhausted"]);

/**
 * Run a storage call, converting any failure into RepositoryFailureError.
 */
async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof RepositoryFailureError) throw err;
    throw new RepositoryFailureError(operation, err);
  }
}

// ---------------------------------------------------------------------------
// Row mappers
// ---------------------------------------------------------------------------

type ItemRow = typeof items.$inferSelect;
type SessionRow = typeof testSessions.$inferSelect;
type ResponseRow = typeof responses.$inferSelect;
type MetricRow = typeof reliabilityMetrics.$inferSelect;

function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    questionType: questionTypeEnum.parse(row.questionType),
    difficultyLevel: difficultyLevelEnum.parse(row.difficultyLevel),
    discrimination: row.discrimination,
    empiricalDifficulty: row.empiricalDifficulty,
    responseCount: row.responseCount,
    scoredResponseCount: row.scoredResponseCount,
    qualityFlag: qualityFlagEnum.parse(row.qualityFlag),
    qualityFlagReason: row.qualityFlagReason,
    qualityFlagUpdatedAt: row.qualityFlagUpdatedAt,
    isActive: row.isActive,
    irtDiscrimination: row.irtDiscrimination,
    irtDifficulty: row.irtDifficulty,
    irtGuessing: row.irtGuessing,
    createdAt: row.createdAt,
  };
}

function toResponse(row: ResponseRow): ResponseRecord {
  return {
    sessionId: row.sessionId,
    itemId: row.itemId,
    userId: row.userId,
    isCorrect: row.isCorrect,
    abilityEstimateAtTime: row.abilityEstimateAtTime,
    position: row.position,
    answeredAt: row.answeredAt,
  };
}

function toSession(row: SessionRow): TestSession {
  return {
    id: row.id,
    userId: row.userId,
    mode: testModeEnum.parse(row.mode),
    status: testStatusEnum.parse(row.status),
    phase: sessionPhaseEnum.parse(row.phase),
    administeredItemIds: row.administeredItemIds,
    currentItemId: row.currentItemId,
    theta: row.theta,
    se: row.se,
    itemsAdministered: row.itemsAdministered,
    stoppingReason:
      row.stoppingReason === null ? null : stoppingReasonEnum.parse(row.stoppingReason),
    score:
      row.correctAnswers !== null && row.totalQuestions !== null && row.scaledScore !== null
        ? {
            correctAnswers: row.correctAnswers,
            totalQuestions: row.totalQuestions,
            scaledScore: row.scaledScore,
          }
        : null,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
  };
}

function toSessionRow(session: TestSession): typeof testSessions.$inferInsert {
  return {
    id: session.id,
    userId: session.userId,
    mode: session.mode,
    status: session.status,
    phase: session.phase,
    administeredItemIds: session.administeredItemIds,
    currentItemId: session.currentItemId,
    theta: session.theta,
    se: session.se,
    itemsAdministered: session.itemsAdministered,
    stoppingReason: session.stoppingReason,
    correctAnswers: session.score?.correctAnswers ?? null,
    totalQuestions: session.score?.totalQuestions ?? null,
    scaledScore: session.score?.scaledScore ?? null,
    startedAt: session.startedAt,
    completedAt: session.completedAt,
  };
}

function toMetric(row: MetricRow): ReliabilityMetric {
  return {
    id: row.id,
    metricType: metricTypeEnum.parse(row.metricType),
    value: row.value,
    sampleSize: row.sampleSize,
    calculatedAt: row.calculatedAt,
    details: row.details,
  };
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

class DrizzleItemRepository implements ItemRepository {
  constructor(private readonly db: Database) {}

  get(itemId: string): Promise<Item | null> {
    return guarded("items.get", async () => {
      const [row] = await this.db.select().from(items).where(eq(items.id, itemId)).limit(1);
      return row ? toItem(row) : null;
    });
  }

  list(options: { activeOnly?: boolean } = {}): Promise<Item[]> {
    return guarded("items.list", async () => {
      const rows = options.activeOnly
        ? await this.db.select().from(items).where(eq(items.isActive, true))
        : await this.db.select().from(items);
      return rows.map(toItem);
    });
  }

  insert(item: Item): Promise<Item> {
    return guarded("items.insert", async () => {
      const [row] = await this.db.insert(items).values(item).returning();
      return toItem(row);
    });
  }

  updateStatistics(itemId: string, stats: ItemStatisticsUpdate): Promise<boolean> {
    return guarded("items.updateStatistics", async () => {
      const updated = await this.db
        .update(items)
        .set({
          discrimination: stats.discrimination,
          empiricalDifficulty: stats.empiricalDifficulty,
          responseCount: stats.responseCount,
          scoredResponseCount: stats.scoredResponseCount,
        })
        .where(
          and(
            eq(items.id, itemId),
            lte(items.responseCount, stats.responseCount),
            lte(items.scoredResponseCount, stats.scoredResponseCount),
          ),
        )
        .returning({ id: items.id });
      return updated.length > 0;
    });
  }

  transitionQualityFlag(
    itemId: string,
    from: QualityFlag,
    to: QualityFlag,
    reason: string | null,
    at: Date,
  ): Promise<boolean> {
    return guarded("items.transitionQualityFlag", async () => {
      const updated = await this.db
        .update(items)
        .set({ qualityFlag: to, qualityFlagReason: reason, qualityFlagUpdatedAt: at })
        .where(and(eq(items.id, itemId), eq(items.qualityFlag, from)))
        .returning({ id: items.id });
      return updated.length > 0;
    });
  }
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

class DrizzleResponseRepository implements ResponseRepository {
  constructor(private readonly db: Database) {}

  allResponsesForItem(itemId: string): Promise<ResponseRecord[]> {
    return guarded("responses.forItem", async () => {
      const rows = await this.db.select().from(responses).where(eq(responses.itemId, itemId));
      return rows.map(toResponse);
    });
  }

  allResponsesForSession(sessionId: string): Promise<ResponseRecord[]> {
    return guarded("responses.forSession", async () => {
      const rows = await this.db
        .select()
        .from(responses)
        .where(eq(responses.sessionId, sessionId))
        .orderBy(asc(responses.position));
      return rows.map(toResponse);
    });
  }

  allCompletedResponses(): Promise<ResponseRecord[]> {
    return guarded("responses.completed", async () => {
      const rows = await this.db
        .select({ response: responses })
        .from(responses)
        .innerJoin(testSessions, eq(responses.sessionId, testSessions.id))
        .where(eq(testSessions.status, "completed"));
      return rows.map((r) => toResponse(r.response));
    });
  }

  totalScoresForSessions(sessionIds: string[]): Promise<Map<string, number>> {
    return guarded("responses.totalScores", async () => {
      const totals = new Map<string, number>();
      if (sessionIds.length === 0) return totals;
      const rows = await this.db
        .select({ id: testSessions.id, correctAnswers: testSessions.correctAnswers })
        .from(testSessions)
        .where(inArray(testSessions.id, sessionIds));
      for (const row of rows) {
        if (row.correctAnswers !== null) totals.set(row.id, row.correctAnswers);
      }
      return totals;
    });
  }

  sessionsWithMultipleCompletions(minDays: number, maxDays: number): Promise<RetestPair[]> {
    return guarded("responses.retestPairs", async () => {
      const rows = await this.db
        .select({
          sessionId: testSessions.id,
          userId: testSessions.userId,
          completedAt: testSessions.completedAt,
          score: testSessions.scaledScore,
        })
        .from(testSessions)
        .where(
          and(
            eq(testSessions.status, "completed"),
            isNotNull(testSessions.completedAt),
            isNotNull(testSessions.scaledScore),
          ),
        )
        .orderBy(asc(testSessions.userId), asc(testSessions.completedAt));

      const completions = rows.flatMap((r) =>
        r.completedAt !== null && r.score !== null
          ? [{ sessionId: r.sessionId, userId: r.userId, completedAt: r.completedAt, score: r.score }]
          : [],
      );
      return buildRetestPairs(completions, minDays, maxDays);
    });
  }
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

class DrizzleSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  create(session: TestSession): Promise<TestSession> {
    return guarded("sessions.create", async () => {
      const [row] = await this.db.insert(testSessions).values(toSessionRow(session)).returning();
      return toSession(row);
    });
  }

  get(sessionId: string): Promise<TestSession | null> {
    return guarded("sessions.get", async () => {
      const [row] = await this.db
        .select()
        .from(testSessions)
        .where(eq(testSessions.id, sessionId))
        .limit(1);
      return row ? toSession(row) : null;
    });
  }

  update(session: TestSession): Promise<void> {
    return guarded("sessions.update", async () => {
      await this.db
        .update(testSessions)
        .set(toSessionRow(session))
        .where(eq(testSessions.id, session.id));
    });
  }

  recordResponses(session: TestSession, records: ResponseRecord[]): Promise<void> {
    return guarded("sessions.recordResponses", async () => {
      await this.db.transaction(async (tx) => {
        if (records.length > 0) {
          await tx
            .insert(responses)
            .values(records)
            .onConflictDoNothing({ target: [responses.sessionId, responses.itemId] });
        }
        await tx
          .update(testSessions)
          .set(toSessionRow(session))
          .where(eq(testSessions.id, session.id));
      });
    });
  }

  presentedItemIdsForUser(userId: string): Promise<Set<string>> {
    return guarded("sessions.presentedItemIdsForUser", async () => {
      const rows = await this.db
        .select({
          administeredItemIds: testSessions.administeredItemIds,
          currentItemId: testSessions.currentItemId,
        })
        .from(testSessions)
        .where(eq(testSessions.userId, userId));

      const presented = new Set<string>();
      for (const row of rows) {
        for (const id of row.administeredItemIds) presented.add(id);
        if (row.currentItemId) presented.add(row.currentItemId);
      }
      return presented;
    });
  }
}

// ---------------------------------------------------------------------------
// Reliability metrics
// ---------------------------------------------------------------------------

class DrizzleReliabilityMetricRepository implements ReliabilityMetricRepository {
  constructor(private readonly db: Database) {}

  append(metric: Omit<ReliabilityMetric, "id">): Promise<ReliabilityMetric> {
    return guarded("metrics.append", async () => {
      const [row] = await this.db
        .insert(reliabilityMetrics)
        .values({ id: generateId("rm"), ...metric })
        .returning();
      return toMetric(row);
    });
  }

  history(options: { metricType?: MetricType; since: Date }): Promise<ReliabilityMetric[]> {
    return guarded("metrics.history", async () => {
      const conditions = [gte(reliabilityMetrics.calculatedAt, options.since)];
      if (options.metricType) {
        conditions.push(eq(reliabilityMetrics.metricType, options.metricType));
      }
      const rows = await this.db
        .select()
        .from(reliabilityMetrics)
        .where(and(...conditions))
        .orderBy(desc(reliabilityMetrics.calculatedAt));
      return rows.map(toMetric);
    });
  }

  latest(metricType: MetricType): Promise<ReliabilityMetric | null> {
    return guarded("metrics.latest", async () => {
      const [row] = await this.db
        .select()
        .from(reliabilityMetrics)
        .where(eq(reliabilityMetrics.metricType, metricType))
        .orderBy(desc(reliabilityMetrics.calculatedAt))
        .limit(1);
      return row ? toMetric(row) : null;
    });
  }
}

export function createDrizzleRepositories(db: Database): Repositories {
  return {
    items: new DrizzleItemRepository(db),
    responses: new DrizzleResponseRepository(db),
    sessions: new DrizzleSessionRepository(db),
    metrics: new DrizzleReliabilityMetricRepository(db),
  };
}
