import { describe, it, expect } from "vitest";
import type { Completion } from "../../repositories/types.ts";
import { MS_PER_DAY } from "../math-utils.ts";
import { buildRetestPairs } from "../retest-pairs.ts";

const BASE = Date.UTC(2026, 0, 1);

function completion(userId: string, day: number, score: number): Completion {
  return {
    sessionId: `${userId}-${day}`,
    userId,
    completedAt: new Date(BASE + day * MS_PER_DAY),
    score,
  };
}

describe("buildRetestPairs", () => {
  it("pairs consecutive completions of the same user in time order", () => {
    const pairs = buildRetestPairs(
      [completion("u1", 40, 112), completion("u1", 0, 100), completion("u1", 10, 104)],
      7,
      30,
    );

    expect(pairs).toEqual([
      { userId: "u1", firstScore: 100, secondScore: 104, intervalDays: 10 },
      { userId: "u1", firstScore: 104, secondScore: 112, intervalDays: 30 },
    ]);
  });

  it("drops pairs outside the interval window", () => {
    const pairs = buildRetestPairs(
      [completion("u1", 0, 100), completion("u1", 3, 101), completion("u2", 0, 90), completion("u2", 45, 95)],
      7,
      30,
    );
    expect(pairs).toEqual([]);
  });

  it("ignores users with a single completion", () => {
    expect(buildRetestPairs([completion("solo", 0, 100)], 0, 365)).toEqual([]);
  });
});
