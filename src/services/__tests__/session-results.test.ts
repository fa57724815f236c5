import { describe, it, expect, vi } from "vitest";
import { createMemoryRepositories, createMemoryStore } from "../../repositories/memory.ts";
import { QualityFlagController } from "../quality-flag-controller.ts";
import { ReliabilityEstimator } from "../reliability-estimator.ts";
import { buildCompletedResult, presentItem, refreshItemQuality } from "../session-results.ts";
import { makeItem, makeSession } from "./fixtures.ts";

describe("session results", () => {
  const repositories = createMemoryRepositories(createMemoryStore());

  it("hides item statistics from the test-taker", () => {
    const item = makeItem({ id: "i9", questionType: "spatial", difficultyLevel: "hard", discrimination: 0.4 });
    expect(presentItem(item)).toEqual({ id: "i9", questionType: "spatial", difficultyLevel: "hard" });
  });

  describe("buildCompletedResult", () => {
    it("returns null for a session without a score", async () => {
      const reliability = new ReliabilityEstimator(repositories);
      expect(await buildCompletedResult(makeSession(), reliability, "Test")).toBeNull();
    });

    it("drops only the interval when the reliability lookup fails", async () => {
      const reliability = new ReliabilityEstimator(repositories);
      vi.spyOn(reliability, "currentReliability").mockRejectedValueOnce(new Error("metrics offline"));
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      const session = makeSession({
        id: "ses-7",
        status: "completed",
        theta: 1,
        score: { correctAnswers: 9, totalQuestions: 12, scaledScore: 115 },
      });
      const result = await buildCompletedResult(session, reliability, "Test");

      expect(result).toEqual({
        score: 115,
        theta: 1,
        sem: null,
        confidenceInterval: null,
        percentile: 84.1,
        correctAnswers: 9,
        totalQuestions: 12,
      });
      expect(errors).toHaveBeenCalledWith("[Test] Reliability lookup failed for session ses-7: metrics offline");
      errors.mockRestore();
    });
  });

  describe("refreshItemQuality", () => {
    it("logs and swallows refresh failures", async () => {
      const flags = new QualityFlagController({ items: repositories.items });
      vi.spyOn(flags, "refreshAndEvaluate").mockRejectedValueOnce(new Error("timeout"));
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      await expect(refreshItemQuality(flags, "ses-1", ["i1"], "Test")).resolves.toBeUndefined();
      expect(errors).toHaveBeenCalledWith("[Test] Item statistics refresh failed after session ses-1: timeout");
      errors.mockRestore();
    });

    it("does nothing without a controller", async () => {
      await expect(refreshItemQuality(undefined, "ses-1", ["i1"], "Test")).resolves.toBeUndefined();
    });
  });
});
