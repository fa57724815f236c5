/**
 * Shared builders for service tests. Everything is written straight into a
 * MemoryStore so each test controls exactly what the repositories see.
 */

import type { MemoryStore } from "../../repositories/memory.ts";
import type { Item, ResponseRecord, TestSession } from "../../repositories/types.ts";

export const T0 = new Date("2026-03-01T00:00:00.000Z");

/**
 * Build an item. Unless given, `scoredResponseCount` follows `responseCount`
 * so a stored discrimination reads as fully measured.
 */
export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: "item-1",
    questionType: "logic",
    difficultyLevel: "medium",
    discrimination: null,
    empiricalDifficulty: null,
    responseCount: 0,
    scoredResponseCount: overrides.responseCount ?? 0,
    qualityFlag: "normal",
    qualityFlagReason: null,
    qualityFlagUpdatedAt: null,
    isActive: true,
    irtDiscrimination: null,
    irtDifficulty: null,
    irtGuessing: null,
    createdAt: T0,
    ...overrides,
  };
}

export function makeSession(overrides: Partial<TestSession> = {}): TestSession {
  return {
    id: "ses-1",
    userId: "user-1",
    mode: "adaptive",
    status: "in_progress",
    phase: "awaiting_response",
    administeredItemIds: [],
    currentItemId: null,
    theta: 0,
    se: 1,
    itemsAdministered: 0,
    stoppingReason: null,
    score: null,
    startedAt: T0,
    completedAt: null,
    ...overrides,
  };
}

export interface SeededAnswer {
  itemId: string;
  isCorrect: boolean;
}

/**
 * Insert a session with its responses. A completed session's score is the
 * number of correct answers unless `correctAnswers` says otherwise.
 */
export function seedSession(
  store: MemoryStore,
  options: {
    id: string;
    userId?: string;
    answers: SeededAnswer[];
    status?: TestSession["status"];
    correctAnswers?: number;
    scaledScore?: number;
    completedAt?: Date;
  },
): TestSession {
  const status = options.status ?? "completed";
  const correct = options.correctAnswers ?? options.answers.filter((a) => a.isCorrect).length;
  const session = makeSession({
    id: options.id,
    userId: options.userId ?? `user-${options.id}`,
    mode: "fixed",
    status,
    phase: status === "completed" ? "completed" : "awaiting_response",
    administeredItemIds: options.answers.map((a) => a.itemId),
    itemsAdministered: options.answers.length,
    score:
      status === "completed"
        ? {
            correctAnswers: correct,
            totalQuestions: options.answers.length,
            scaledScore: options.scaledScore ?? 100,
          }
        : null,
    completedAt: status === "completed" ? (options.completedAt ?? T0) : null,
  });
  store.sessions.set(session.id, session);

  const records: ResponseRecord[] = options.answers.map((a, position) => ({
    sessionId: session.id,
    itemId: a.itemId,
    userId: session.userId,
    isCorrect: a.isCorrect,
    abilityEstimateAtTime: null,
    position,
    answeredAt: T0,
  }));
  store.responses.push(...records);
  return session;
}

/**
 * Seed one completed session per total, each answering `itemId` with the
 * matching correctness. Used to give an item a known discrimination.
 */
export function seedItemResponses(
  store: MemoryStore,
  itemId: string,
  rows: Array<{ correct: boolean; total: number }>,
  prefix = itemId,
): void {
  rows.forEach((row, i) => {
    seedSession(store, {
      id: `${prefix}-s${i}`,
      answers: [{ itemId, isCorrect: row.correct }],
      correctAnswers: row.total,
    });
  });
}
