import { describe, it, expect } from "vitest";
import { InvalidInputError } from "../../lib/errors.ts";
import {
  buildScoreEstimate,
  computeConfidenceInterval,
  computeSEM,
} from "../precision-calculator.ts";

describe("Precision Calculator", () => {
  describe("computeSEM", () => {
    it("is the population SD at zero reliability and 0 at perfect reliability", () => {
      expect(computeSEM(0)).toBe(15);
      expect(computeSEM(1)).toBe(0);
    });

    it("scales SD by sqrt(1 - r)", () => {
      expect(computeSEM(0.8)).toBeCloseTo(6.7082, 4);
      expect(computeSEM(0.75, 10)).toBe(5);
    });

    it("falls strictly as reliability rises", () => {
      const sweep = Array.from({ length: 21 }, (_, i) => i / 20);
      const sems = sweep.map((r) => computeSEM(r));
      for (let i = 1; i < sems.length; i++) {
        expect(sems[i]).toBeLessThan(sems[i - 1]);
      }
    });

    it("rejects reliabilities outside [0, 1]", () => {
      expect(() => computeSEM(-0.1)).toThrow(InvalidInputError);
      expect(() => computeSEM(1.1)).toThrow(InvalidInputError);
      expect(() => computeSEM(Number.NaN)).toThrow(InvalidInputError);
    });

    it("rejects a non-positive population SD", () => {
      expect(() => computeSEM(0.5, 0)).toThrow(InvalidInputError);
    });
  });

  describe("computeConfidenceInterval", () => {
    it("rounds bounds to whole points", () => {
      expect(computeConfidenceInterval(100, 6.71, 0.95)).toEqual({ lower: 87, upper: 113 });
      expect(computeConfidenceInterval(100, 5, 0.99)).toEqual({ lower: 87, upper: 113 });
    });

    it("clamps to the reportable range", () => {
      expect(computeConfidenceInterval(155, 10)).toEqual({ lower: 135, upper: 160 });
      expect(computeConfidenceInterval(45, 10)).toEqual({ lower: 40, upper: 65 });
    });

    it("collapses to the score when SEM is 0", () => {
      expect(computeConfidenceInterval(112, 0)).toEqual({ lower: 112, upper: 112 });
    });

    it("rejects confidence levels outside (0, 1) and negative SEM", () => {
      expect(() => computeConfidenceInterval(100, 5, 0)).toThrow(InvalidInputError);
      expect(() => computeConfidenceInterval(100, 5, 1)).toThrow(InvalidInputError);
      expect(() => computeConfidenceInterval(100, -1)).toThrow(InvalidInputError);
    });
  });

  describe("buildScoreEstimate", () => {
    it("omits the interval without reliability data", () => {
      expect(buildScoreEstimate(104, null, { theta: 0.27 })).toEqual({
        score: 104,
        theta: 0.27,
        sem: null,
        confidenceInterval: null,
      });
    });

    it("omits the interval below the usability floor", () => {
      expect(buildScoreEstimate(100, 0.59).confidenceInterval).toBeNull();
    });

    it("reports SEM and interval at usable reliability", () => {
      expect(buildScoreEstimate(100, 0.8)).toEqual({
        score: 100,
        theta: null,
        sem: 6.71,
        confidenceInterval: { lower: 87, upper: 113, confidenceLevel: 0.95, sem: 6.71 },
      });
    });

    it("accepts reliability exactly at the floor", () => {
      expect(buildScoreEstimate(100, 0.6).confidenceInterval).toEqual({
        lower: 81,
        upper: 119,
        confidenceLevel: 0.95,
        sem: 9.49,
      });
    });
  });
});
