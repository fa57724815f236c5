/**
 * @fileoverview Statistical primitives for the measurement engine.
 * Descriptive statistics, correlation coefficients, the Spearman-Brown
 * correction and normal-distribution quantiles. Everything here is pure and
 * operates on plain number arrays.
 */

// ============================================================================
// TIME CONSTANTS
// ============================================================================

/**
 * Milliseconds per day constant (24 * 60 * 60 * 1000)
 * Used for retest intervals and trend windows.
 */
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// BASIC HELPERS
// ============================================================================

/**
 * Sum of all values. Returns 0 for an empty array.
 */
export function sum(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Arithmetic mean. Returns 0 for an empty array.
 *
 * @example
 * mean([1, 2, 3, 4]) // 2.5
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Clamp a value into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Round to a fixed number of decimal places.
 *
 * @example
 * round(0.123456, 4) // 0.1235
 * round(2.5)         // 3
 */
export function round(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Round to 3 decimal places (discrimination averages) */
export function round3(value: number): number {
  return round(value, 3);
}

/** Round to 4 decimal places (reliability coefficients) */
export function round4(value: number): number {
  return round(value, 4);
}

// ============================================================================
// DISPERSION
// ============================================================================

/**
 * Sample variance (n - 1 denominator).
 * Returns 0 when fewer than two values are given.
 *
 * @example
 * sampleVariance([2, 4, 4, 4, 5, 5, 7, 9]) // 4.571428...
 */
export function sampleVariance(values: number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return ss / (n - 1);
}

/**
 * Population variance (n denominator). Returns 0 for an empty array.
 */
export function populationVariance(values: number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return ss / n;
}

/**
 * Sample standard deviation.
 */
export function stddev(values: number[]): number {
  return Math.sqrt(sampleVariance(values));
}

// ============================================================================
// CORRELATION
// ============================================================================

/**
 * Pearson product-moment correlation.
 *
 * Returns `null` when the inputs differ in length, hold fewer than two
 * pairs, or either side has zero variance (the coefficient is undefined).
 *
 * @example
 * pearsonCorrelation([1, 2, 3], [2, 4, 6]) // 1
 */
export function pearsonCorrelation(x: number[], y: number[]): number | null {
  const n = x.length;
  if (n !== y.length || n < 2) return null;

  const mx = mean(x);
  const my = mean(y);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;
  return clamp(sxy / Math.sqrt(sxx * syy), -1, 1);
}

/**
 * Point-biserial correlation between a dichotomous item score (0/1) and a
 * continuous total score.
 *
 *   r_pb = (M1 - M0) / SD_total * sqrt(p * q)
 *
 * M1/M0 are the mean totals of the correct/incorrect groups, SD_total is the
 * sample standard deviation of all totals, p the proportion correct.
 * Returns 0 when fewer than two observations exist, when either group is
 * empty, or when the totals have no spread.
 */
export function pointBiserialCorrelation(
  itemScores: number[],
  totalScores: number[],
): number {
  const n = itemScores.length;
  if (n !== totalScores.length || n < 2) return 0;

  const correct: number[] = [];
  const incorrect: number[] = [];
  for (let i = 0; i < n; i++) {
    if (itemScores[i] === 1) correct.push(totalScores[i]);
    else incorrect.push(totalScores[i]);
  }
  if (correct.length === 0 || incorrect.length === 0) return 0;

  const sdTotal = stddev(totalScores);
  if (sdTotal === 0) return 0;

  const p = correct.length / n;
  const q = 1 - p;
  const r = ((mean(correct) - mean(incorrect)) / sdTotal) * Math.sqrt(p * q);
  return clamp(r, -1, 1);
}

/**
 * Spearman-Brown prophecy for doubling test length:
 *
 *   r_full = 2 * r_half / (1 + r_half)
 *
 * @example
 * spearmanBrown(0.6) // 0.75
 */
export function spearmanBrown(rHalf: number): number {
  if (rHalf <= -1) return -1;
  return clamp((2 * rHalf) / (1 + rHalf), -1, 1);
}

// ============================================================================
// NORMAL DISTRIBUTION
// ============================================================================

/** Conventional two-sided z values reported in score interpretations */
const TWO_SIDED_Z_TABLE: ReadonlyMap<number, number> = new Map([
  [0.9, 1.645],
  [0.95, 1.96],
  [0.99, 2.576],
]);

// Acklam's rational approximation coefficients
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2,
  1.38357751867269e2, -3.066479806614716e1, 2.506628277459239,
];
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2,
  6.680131188771972e1, -1.328068155288572e1,
];
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838,
  -2.549732539343734, 4.374664141464968, 2.938163982698783,
];
const D = [
  7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996,
  3.754408661907416,
];

/**
 * Inverse of the standard normal CDF.
 * Relative error below 1.2e-9 over (0, 1). Throws a RangeError outside it.
 *
 * @example
 * normalQuantile(0.975) // 1.95996...
 */
export function normalQuantile(p: number): number {
  if (!(p > 0 && p < 1)) {
    throw new RangeError(`normalQuantile: p must be in (0, 1), got ${p}`);
  }

  const pLow = 0.02425;
  const pHigh = 1 - pLow;

  if (p < pLow) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
    );
  }

  if (p > pHigh) {
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return -(
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
    );
  }

  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) *
      q) /
    (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
  );
}

/**
 * Two-sided critical value for a confidence level in (0, 1).
 * 90/95/99% use the conventional table values.
 *
 * @example
 * twoSidedZ(0.95) // 1.96
 */
export function twoSidedZ(confidenceLevel: number): number {
  const tabled = TWO_SIDED_Z_TABLE.get(confidenceLevel);
  if (tabled !== undefined) return tabled;
  return normalQuantile((1 + confidenceLevel) / 2);
}

/**
 * Standard normal density.
 */
export function normalPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/**
 * Standard normal CDF via the Abramowitz-Stegun 7.1.26 erf approximation
 * (absolute error below 1.5e-7).
 */
export function normalCdf(x: number): number {
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1 / (1 + 0.3275911 * z);
  const poly =
    t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
  const erf = 1 - poly * Math.exp(-z * z);
  return x >= 0 ? 0.5 * (1 + erf) : 0.5 * (1 - erf);
}

/**
 * Numerically stable logistic function 1 / (1 + e^-x).
 */
export function logistic(x: number): number {
  if (x >= 0) {
    return 1 / (1 + Math.exp(-x));
  }
  const e = Math.exp(x);
  return e / (1 + e);
}
