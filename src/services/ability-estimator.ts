/**
 * Expected-a-posteriori (EAP) ability estimation.
 *
 * The posterior over θ is evaluated on an evenly spaced grid over [-4, 4]
 * with a N(0, 1) prior. θ is the posterior mean and SE the posterior
 * standard deviation, so with no responses the estimate equals the prior
 * (θ = 0, SE ≈ 1) and SE shrinks as informative responses accumulate.
 */

import {
  PRIOR_SE,
  PRIOR_THETA,
  QUADRATURE_POINTS,
  THETA_MAX,
  THETA_MIN,
} from "../config/constants.ts";
import { normalPdf } from "../lib/math-utils.ts";
import type { InformationModel, IrtParameters } from "./information-models.ts";

export interface ScoredResponse {
  params: IrtParameters;
  isCorrect: boolean;
}

export interface AbilityEstimate {
  theta: number;
  se: number;
}

const P_FLOOR = 1e-10;

export function estimateAbilityEAP(
  responses: ScoredResponse[],
  model: InformationModel,
  options: { priorMean?: number; priorSd?: number; points?: number } = {},
): AbilityEstimate {
  const priorMean = options.priorMean ?? PRIOR_THETA;
  const priorSd = options.priorSd ?? PRIOR_SE;
  const points = options.points ?? QUADRATURE_POINTS;
  const step = (THETA_MAX - THETA_MIN) / (points - 1);

  // Log-space accumulation avoids underflow on long response strings
  const grid: number[] = [];
  const logWeights: number[] = [];
  for (let i = 0; i < points; i++) {
    const t = THETA_MIN + i * step;
    let logL = Math.log(normalPdf((t - priorMean) / priorSd));
    for (const r of responses) {
      const p = Math.min(1 - P_FLOOR, Math.max(P_FLOOR, model.probability(t, r.params)));
      logL += r.isCorrect ? Math.log(p) : Math.log(1 - p);
    }
    grid.push(t);
    logWeights.push(logL);
  }

  const maxLog = Math.max(...logWeights);
  let denominator = 0;
  let numerator = 0;
  for (let i = 0; i < points; i++) {
    const w = Math.exp(logWeights[i] - maxLog);
    denominator += w;
    numerator += grid[i] * w;
  }
  const theta = numerator / denominator;

  let variance = 0;
  for (let i = 0; i < points; i++) {
    const w = Math.exp(logWeights[i] - maxLog);
    variance += (grid[i] - theta) ** 2 * w;
  }
  variance /= denominator;

  return { theta, se: Math.sqrt(variance) };
}
