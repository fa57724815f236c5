/**
 * Repository contracts for the measurement engine.
 *
 * Services depend only on these interfaces; `drizzle.ts` implements them on
 * PostgreSQL and `memory.ts` in-process. Implementations wrap storage errors
 * in RepositoryFailureError.
 */

import type {
  DifficultyLevel,
  MetricType,
  QualityFlag,
  QuestionType,
  TestMode,
  TestStatus,
} from "../schemas/measurement.ts";

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export interface Item {
  id: string;
  questionType: QuestionType;
  difficultyLevel: DifficultyLevel;
  /** Point-biserial discrimination; null until measured */
  discrimination: number | null;
  /** Proportion of responses answered correctly (p-value) */
  empiricalDifficulty: number | null;
  /** All responses to the item, finished sessions or not */
  responseCount: number;
  /** Responses from completed sessions; the sample behind `discrimination` */
  scoredResponseCount: number;
  qualityFlag: QualityFlag;
  qualityFlagReason: string | null;
  qualityFlagUpdatedAt: Date | null;
  isActive: boolean;
  /** Calibrated IRT parameters; null until calibration has run */
  irtDiscrimination: number | null;
  irtDifficulty: number | null;
  irtGuessing: number | null;
  createdAt: Date;
}

export interface ResponseRecord {
  sessionId: string;
  itemId: string;
  userId: string;
  isCorrect: boolean;
  abilityEstimateAtTime: number | null;
  /** 0-based administration order within the session */
  position: number;
  answeredAt: Date;
}

/** Engine state of a session (see AdaptiveEngine) */
export type SessionPhase =
  | "initialized"
  | "selecting"
  | "awaiting_response"
  | "updating"
  | "completed"
  | "abandoned";

export type StoppingReason = "se_threshold" | "max_items" | "pool_exhausted";

export interface SessionScore {
  correctAnswers: number;
  totalQuestions: number;
  /** Scaled score on the 40-160 reporting range */
  scaledScore: number;
}

export interface TestSession {
  id: string;
  userId: string;
  mode: TestMode;
  status: TestStatus;
  phase: SessionPhase;
  administeredItemIds: string[];
  currentItemId: string | null;
  theta: number;
  se: number;
  itemsAdministered: number;
  stoppingReason: StoppingReason | null;
  score: SessionScore | null;
  startedAt: Date;
  completedAt: Date | null;
}

export interface ReliabilityMetric {
  id: string;
  metricType: MetricType;
  value: number;
  sampleSize: number;
  calculatedAt: Date;
  details: Record<string, unknown> | null;
}

/** Two consecutive completions by one user */
export interface RetestPair {
  userId: string;
  firstScore: number;
  secondScore: number;
  intervalDays: number;
}

/** One completed session with its scaled score, oldest first per user */
export interface Completion {
  sessionId: string;
  userId: string;
  completedAt: Date;
  score: number;
}

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface ItemStatisticsUpdate {
  discrimination: number | null;
  empiricalDifficulty: number;
  responseCount: number;
  scoredResponseCount: number;
}

export interface ItemRepository {
  get(itemId: string): Promise<Item | null>;
  list(options?: { activeOnly?: boolean }): Promise<Item[]>;
  insert(item: Item): Promise<Item>;
  /**
   * Conditional single-row update: applies only when neither stored count is
   * ahead of the new one, so a stale refresh never overwrites a fresher one.
   * Returns whether the row was written.
   */
  updateStatistics(itemId: string, stats: ItemStatisticsUpdate): Promise<boolean>;
  /**
   * Conditional single-row update: applies only when the stored flag still
   * equals `from`. Returns whether this call performed the transition.
   */
  transitionQualityFlag(
    itemId: string,
    from: QualityFlag,
    to: QualityFlag,
    reason: string | null,
    at: Date,
  ): Promise<boolean>;
}

export interface ResponseRepository {
  allResponsesForItem(itemId: string): Promise<ResponseRecord[]>;
  allResponsesForSession(sessionId: string): Promise<ResponseRecord[]>;
  /** Responses belonging to completed sessions only */
  allCompletedResponses(): Promise<ResponseRecord[]>;
  /** Correct-answer totals of completed sessions, keyed by session id */
  totalScoresForSessions(sessionIds: string[]): Promise<Map<string, number>>;
  sessionsWithMultipleCompletions(
    minDays: number,
    maxDays: number,
  ): Promise<RetestPair[]>;
}

export interface SessionRepository {
  create(session: TestSession): Promise<TestSession>;
  get(sessionId: string): Promise<TestSession | null>;
  update(session: TestSession): Promise<void>;
  /**
   * Atomically append responses and persist the session. Either every write
   * lands or none does. Responses already stored for the same
   * (sessionId, itemId) are left untouched.
   */
  recordResponses(session: TestSession, responses: ResponseRecord[]): Promise<void>;
  /** Ids of every item shown to the user in any of their sessions, whatever its status */
  presentedItemIdsForUser(userId: string): Promise<Set<string>>;
}

export interface ReliabilityMetricRepository {
  append(metric: Omit<ReliabilityMetric, "id">): Promise<ReliabilityMetric>;
  /** Most recent first */
  history(options: { metricType?: MetricType; since: Date }): Promise<ReliabilityMetric[]>;
  latest(metricType: MetricType): Promise<ReliabilityMetric | null>;
}

export interface Repositories {
  items: ItemRepository;
  responses: ResponseRepository;
  sessions: SessionRepository;
  metrics: ReliabilityMetricRepository;
}
