/**
 * Item response models used for adaptive selection and ability estimation.
 *
 *   P(θ) = c + (1 - c) / (1 + e^(-a(θ - b)))
 *
 * 1PL fixes a = 1 and c = 0, 2PL fixes c = 0, 3PL uses all three
 * parameters. Information for the 3PL form:
 *
 *   I(θ) = a² × (P*² / P) × (1 - P),  P* = (P - c) / (1 - c)
 *
 * which reduces to a² P (1 - P) when c = 0.
 */

import {
  DEFAULT_IRT_DISCRIMINATION,
  TIER_DIFFICULTY,
} from "../config/constants.ts";
import { logistic } from "../lib/math-utils.ts";
import type { Item } from "../repositories/types.ts";
import type { InformationModelName } from "../schemas/measurement.ts";

export interface IrtParameters {
  /** Slope */
  a: number;
  /** Location */
  b: number;
  /** Lower asymptote */
  c: number;
}

export interface InformationModel {
  readonly name: InformationModelName;
  probability(theta: number, params: IrtParameters): number;
  information(theta: number, params: IrtParameters): number;
}

function threePlProbability(theta: number, { a, b, c }: IrtParameters): number {
  return c + (1 - c) * logistic(a * (theta - b));
}

function threePlInformation(theta: number, params: IrtParameters): number {
  const { a, c } = params;
  const p = threePlProbability(theta, params);
  if (p <= c || p >= 1) return 0;
  const pStar = (p - c) / (1 - c);
  return a * a * ((pStar * pStar) / p) * (1 - p);
}

export const onePl: InformationModel = {
  name: "1pl",
  probability: (theta, { b }) => threePlProbability(theta, { a: 1, b, c: 0 }),
  information: (theta, { b }) => threePlInformation(theta, { a: 1, b, c: 0 }),
};

export const twoPl: InformationModel = {
  name: "2pl",
  probability: (theta, { a, b }) => threePlProbability(theta, { a, b, c: 0 }),
  information: (theta, { a, b }) => {
    const p = logistic(a * (theta - b));
    return a * a * p * (1 - p);
  },
};

export const threePl: InformationModel = {
  name: "3pl",
  probability: threePlProbability,
  information: threePlInformation,
};

const MODELS: Record<InformationModelName, InformationModel> = {
  "1pl": onePl,
  "2pl": twoPl,
  "3pl": threePl,
};

export function getInformationModel(name: InformationModelName): InformationModel {
  return MODELS[name];
}

/**
 * IRT parameters of an item: calibrated values when present, otherwise a
 * unit slope at the location of its authored difficulty tier.
 */
export function irtParameters(item: Item): IrtParameters {
  return {
    a: item.irtDiscrimination ?? DEFAULT_IRT_DISCRIMINATION,
    b: item.irtDifficulty ?? TIER_DIFFICULTY[item.difficultyLevel],
    c: item.irtGuessing ?? 0,
  };
}
