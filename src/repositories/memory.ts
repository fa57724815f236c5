/**
 * In-process repositories.
 *
 * Backs STORAGE_BACKEND=memory and the test suites. Every read and write
 * copies the entity so callers never share mutable state with the store,
 * matching the isolation a database gives.
 */

import { generateId } from "../config/id-generation-constants.ts";
import { buildRetestPairs } from "../lib/retest-pairs.ts";
import type { MetricType, QualityFlag } from "../schemas/measurement.ts";
import type {
  Completion,
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

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface MemoryStore {
  items: Map<string, Item>;
  responses: ResponseRecord[];
  sessions: Map<string, TestSession>;
  metrics: ReliabilityMetric[];
}

export function createMemoryStore(): MemoryStore {
  return {
    items: new Map(),
    responses: [],
    sessions: new Map(),
    metrics: [],
  };
}

function responseKey(sessionId: string, itemId: string): string {
  return `${sessionId}:${itemId}`;
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

class MemoryItemRepository implements ItemRepository {
  constructor(private readonly store: MemoryStore) {}

  async get(itemId: string): Promise<Item | null> {
    const item = this.store.items.get(itemId);
    return item ? structuredClone(item) : null;
  }

  async list(options: { activeOnly?: boolean } = {}): Promise<Item[]> {
    const all = [...this.store.items.values()];
    const filtered = options.activeOnly ? all.filter((i) => i.isActive) : all;
    return filtered.map((i) => structuredClone(i));
  }

  async insert(item: Item): Promise<Item> {
    this.store.items.set(item.id, structuredClone(item));
    return structuredClone(item);
  }

  async updateStatistics(itemId: string, stats: ItemStatisticsUpdate): Promise<boolean> {
    const item = this.store.items.get(itemId);
    if (!item) return false;
    if (
      item.responseCount > stats.responseCount ||
      item.scoredResponseCount > stats.scoredResponseCount
    ) {
      return false;
    }
    item.discrimination = stats.discrimination;
    item.empiricalDifficulty = stats.empiricalDifficulty;
    item.responseCount = stats.responseCount;
    item.scoredResponseCount = stats.scoredResponseCount;
    return true;
  }

  async transitionQualityFlag(
    itemId: string,
    from: QualityFlag,
    to: QualityFlag,
    reason: string | null,
    at: Date,
  ): Promise<boolean> {
    const item = this.store.items.get(itemId);
    if (!item || item.qualityFlag !== from) return false;
    item.qualityFlag = to;
    item.qualityFlagReason = reason;
    item.qualityFlagUpdatedAt = at;
    return true;
  }
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

class MemoryResponseRepository implements ResponseRepository {
  constructor(private readonly store: MemoryStore) {}

  async allResponsesForItem(itemId: string): Promise<ResponseRecord[]> {
    return this.store.responses
      .filter((r) => r.itemId === itemId)
      .map((r) => structuredClone(r));
  }

  async allResponsesForSession(sessionId: string): Promise<ResponseRecord[]> {
    return this.store.responses
      .filter((r) => r.sessionId === sessionId)
      .sort((a, b) => a.position - b.position)
      .map((r) => structuredClone(r));
  }

  async allCompletedResponses(): Promise<ResponseRecord[]> {
    return this.store.responses
      .filter((r) => this.store.sessions.get(r.sessionId)?.status === "completed")
      .map((r) => structuredClone(r));
  }

  async totalScoresForSessions(sessionIds: string[]): Promise<Map<string, number>> {
    const totals = new Map<string, number>();
    for (const id of sessionIds) {
      const score = this.store.sessions.get(id)?.score;
      if (score) totals.set(id, score.correctAnswers);
    }
    return totals;
  }

  async sessionsWithMultipleCompletions(
    minDays: number,
    maxDays: number,
  ): Promise<RetestPair[]> {
    const completions: Completion[] = [];
    for (const s of this.store.sessions.values()) {
      if (s.status === "completed" && s.completedAt && s.score) {
        completions.push({
          sessionId: s.id,
          userId: s.userId,
          completedAt: s.completedAt,
          score: s.score.scaledScore,
        });
      }
    }
    return buildRetestPairs(completions, minDays, maxDays);
  }
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

class MemorySessionRepository implements SessionRepository {
  constructor(private readonly store: MemoryStore) {}

  async create(session: TestSession): Promise<TestSession> {
    this.store.sessions.set(session.id, structuredClone(session));
    return structuredClone(session);
  }

  async get(sessionId: string): Promise<TestSession | null> {
    const session = this.store.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async update(session: TestSession): Promise<void> {
    this.store.sessions.set(session.id, structuredClone(session));
  }

  async recordResponses(
    session: TestSession,
    responses: ResponseRecord[],
  ): Promise<void> {
    const existing = new Set(
      this.store.responses.map((r) => responseKey(r.sessionId, r.itemId)),
    );
    const fresh = responses.filter(
      (r) => !existing.has(responseKey(r.sessionId, r.itemId)),
    );

    // Both writes happen synchronously after all checks
    this.store.responses.push(...fresh.map((r) => structuredClone(r)));
    this.store.sessions.set(session.id, structuredClone(session));
  }

  async presentedItemIdsForUser(userId: string): Promise<Set<string>> {
    const presented = new Set<string>();
    for (const s of this.store.sessions.values()) {
      if (s.userId !== userId) continue;
      for (const id of s.administeredItemIds) presented.add(id);
      if (s.currentItemId) presented.add(s.currentItemId);
    }
    return presented;
  }
}

// ---------------------------------------------------------------------------
// Reliability metrics
// ---------------------------------------------------------------------------

class MemoryReliabilityMetricRepository implements ReliabilityMetricRepository {
  constructor(private readonly store: MemoryStore) {}

  async append(metric: Omit<ReliabilityMetric, "id">): Promise<ReliabilityMetric> {
    const row: ReliabilityMetric = { id: generateId("rm"), ...metric };
    this.store.metrics.push(structuredClone(row));
    return row;
  }

  async history(options: {
    metricType?: MetricType;
    since: Date;
  }): Promise<ReliabilityMetric[]> {
    return this.store.metrics
      .filter(
        (m) =>
          m.calculatedAt.getTime() >= options.since.getTime() &&
          (options.metricType === undefined || m.metricType === options.metricType),
      )
      .sort((a, b) => b.calculatedAt.getTime() - a.calculatedAt.getTime())
      .map((m) => structuredClone(m));
  }

  async latest(metricType: MetricType): Promise<ReliabilityMetric | null> {
    const [first] = await this.history({ metricType, since: new Date(0) });
    return first ?? null;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMemoryRepositories(
  store: MemoryStore = createMemoryStore(),
): Repositories {
  return {
    items: new MemoryItemRepository(store),
    responses: new MemoryResponseRepository(store),
    sessions: new MemorySessionRepository(store),
    metrics: new MemoryReliabilityMetricRepository(store),
  };
}
