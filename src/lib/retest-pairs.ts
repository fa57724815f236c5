/**
 * Pair consecutive completed sessions of the same user for test-retest
 * analysis. Only pairs whose interval lies within [minDays, maxDays] are
 * kept. A user with three completions contributes up to two pairs.
 */

import type { Completion, RetestPair } from "../repositories/types.ts";
import { MS_PER_DAY } from "./math-utils.ts";

export function buildRetestPairs(
  completions: Completion[],
  minDays: number,
  maxDays: number,
): RetestPair[] {
  const byUser = new Map<string, Completion[]>();
  for (const c of completions) {
    const list = byUser.get(c.userId);
    if (list) list.push(c);
    else byUser.set(c.userId, [c]);
  }

  const pairs: RetestPair[] = [];
  for (const [userId, list] of byUser) {
    if (list.length < 2) continue;
    list.sort((a, b) => a.completedAt.getTime() - b.completedAt.getTime());

    for (let i = 0; i < list.length - 1; i++) {
      const first = list[i];
      const second = list[i + 1];
      const intervalDays =
        (second.completedAt.getTime() - first.completedAt.getTime()) / MS_PER_DAY;
      if (intervalDays >= minDays && intervalDays <= maxDays) {
        pairs.push({
          userId,
          firstScore: first.score,
          secondScore: second.score,
          intervalDays,
        });
      }
    }
  }

  return pairs;
}
