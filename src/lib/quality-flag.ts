/**
 * Quality flag transition rules.
 *
 * The engine may only raise an item from `normal` to `under_review`. It never
 * restores a flag or deactivates on its own. Operators may set any flag.
 */

import type { QualityFlag } from "../schemas/measurement.ts";

export type FlagActor = "engine" | "operator";

const ENGINE_TRANSITIONS: ReadonlyArray<readonly [QualityFlag, QualityFlag]> = [
  ["normal", "under_review"],
];

export function canTransition(
  actor: FlagActor,
  from: QualityFlag,
  to: QualityFlag,
): boolean {
  if (actor === "operator") return true;
  return ENGINE_TRANSITIONS.some(([f, t]) => f === from && t === to);
}

/** Items with any flag other than `normal` are excluded from selection */
export function isSelectable(flag: QualityFlag): boolean {
  return flag === "normal";
}
