/**
 * Psychometric constants shared across the measurement engine.
 *
 * Thresholds follow common practice in classical test theory; the adaptive
 * defaults can be overridden through env (see env.ts).
 */

// ---------------------------------------------------------------------------
// Item quality
// ---------------------------------------------------------------------------

/** Minimum responses before a discrimination value is trusted */
export const DEFAULT_MIN_RESPONSES = 50;

/** Lower bounds of each discrimination tier, best first */
export const DISCRIMINATION_TIER_BOUNDS = {
  excellent: 0.4,
  good: 0.3,
  acceptable: 0.2,
  poor: 0.1,
  very_poor: 0.0,
} as const;

/** Difference from an average that still counts as "at" the average */
export const COMPARISON_TOLERANCE = 0.05;

/** Maximum entries per action-needed bucket in the discrimination report */
export const ACTION_LIST_LIMIT = 100;

/** Window for discrimination trend figures */
export const TREND_WINDOW_DAYS = 30;

/** Window for "newly flagged this week" */
export const NEW_FLAG_WINDOW_DAYS = 7;

// ---------------------------------------------------------------------------
// Reliability
// ---------------------------------------------------------------------------

/** Default minimum completed sessions for alpha and split-half */
export const DEFAULT_MIN_SESSIONS = 100;

/** Default minimum retest pairs */
export const DEFAULT_MIN_RETEST_PAIRS = 30;

/** Default retest interval window in days */
export const DEFAULT_RETEST_MIN_DAYS = 7;
export const DEFAULT_RETEST_MAX_DAYS = 180;

/** An item must appear in max(ITEM_MIN_SESSIONS, ratio * sessions) sessions */
export const ITEM_MIN_SESSIONS = 30;
export const ITEM_MIN_SESSION_RATIO = 0.3;

/** Fallback completeness for alpha when no session answered every item */
export const PARTIAL_COMPLETION_RATIO = 0.8;

/** Split-half needs this many eligible items and responses per session */
export const SPLIT_HALF_MIN_ITEMS = 4;

/** Minimum acceptable internal consistency / split-half reliability */
export const ALPHA_THRESHOLD = 0.7;

/** Test-retest must be strictly above this to be acceptable */
export const TEST_RETEST_THRESHOLD = 0.5;

/** Every available coefficient at or above this makes the instrument "excellent" */
export const EXCELLENT_RELIABILITY = 0.9;

/** Retest pairs needed for a stable estimate; fewer yields a low-priority recommendation */
export const RECOMMENDED_RETEST_PAIRS = 100;

/** Items below this corrected item-total correlation are review candidates */
export const LOW_ITEM_CORRELATION_THRESHOLD = 0.15;

/** Raise item-review priority once this many items correlate poorly */
export const PROBLEMATIC_ITEM_COUNT_THRESHOLD = 3;

/** Mean retest score change (points) considered a large practice effect */
export const LARGE_PRACTICE_EFFECT_THRESHOLD = 5.0;

/** Default reliability cache lifetime */
export const RELIABILITY_CACHE_TTL_MS = 5 * 60 * 1000;

/** Discrimination report cache lifetime */
export const REPORT_CACHE_TTL_MS = 5 * 60 * 1000;

/** Default look-back for reliability history queries */
export const DEFAULT_HISTORY_DAYS = 90;

// ---------------------------------------------------------------------------
// Precision
// ---------------------------------------------------------------------------

/** Population standard deviation of the IQ scale */
export const POPULATION_SD = 15;

/** Mean of the IQ scale */
export const POPULATION_MEAN = 100;

/** Reportable score range */
export const SCORE_MIN = 40;
export const SCORE_MAX = 160;

/** Below this reliability no confidence interval is reported */
export const MIN_USABLE_RELIABILITY = 0.6;

/** Default two-sided confidence level */
export const DEFAULT_CONFIDENCE_LEVEL = 0.95;

// ---------------------------------------------------------------------------
// Adaptive testing
// ---------------------------------------------------------------------------

/** Prior ability mean and SD */
export const PRIOR_THETA = 0.0;
export const PRIOR_SE = 1.0;

/** Default stopping rule */
export const DEFAULT_SE_THRESHOLD = 0.3;
export const DEFAULT_MAX_ITEMS = 15;

/** EAP quadrature grid */
export const THETA_MIN = -4;
export const THETA_MAX = 4;
export const QUADRATURE_POINTS = 61;

/** Location on the theta scale assumed for uncalibrated items per tier */
export const TIER_DIFFICULTY = {
  easy: -1.0,
  medium: 0.0,
  hard: 1.0,
} as const;

/** Discrimination assumed for uncalibrated items */
export const DEFAULT_IRT_DISCRIMINATION = 1.0;

/** Each question type should appear at least this often in an adaptive test */
export const MIN_ITEMS_PER_TYPE = 2;

/** Target share of each question type once every minimum is met */
export const QUESTION_TYPE_WEIGHTS = {
  pattern: 0.22,
  logic: 0.2,
  verbal: 0.19,
  spatial: 0.16,
  math: 0.13,
  memory: 0.1,
} as const;

/** A type this far below its target share is preferred */
export const CONTENT_BALANCE_TOLERANCE = 0.1;

// ---------------------------------------------------------------------------
// Fixed-form composition
// ---------------------------------------------------------------------------

/** Default fixed-form length */
export const DEFAULT_FIXED_FORM_LENGTH = 20;

/** Target share of each difficulty tier */
export const DIFFICULTY_DISTRIBUTION = {
  easy: 0.3,
  medium: 0.4,
  hard: 0.3,
} as const;
