/**
 * Centralized ID Generation
 *
 * IDs follow the format: `{prefix}_{timestamp}_{randomSuffix}`
 *
 * The random suffix is extracted from Math.random().toString(36), which
 * produces "0.xxxxx" (base-36), so slicing starts at index 2.
 */

/** Start position for the random suffix (skips the "0." prefix) */
export const ID_RANDOM_START = 2;

/** Short suffix (4 chars, ~1.7M combinations) for high-frequency IDs */
export const ID_RANDOM_LENGTH_SHORT = 4;

/** Standard suffix (8 chars, ~2.8T combinations) for persisted entities */
export const ID_RANDOM_LENGTH_STANDARD = 8;

export function generateId(prefix: string, length = ID_RANDOM_LENGTH_STANDARD): string {
  const suffix = Math.random()
    .toString(36)
    .slice(ID_RANDOM_START, ID_RANDOM_START + length)
    .padEnd(length, "0");
  return `${prefix}_${Date.now()}_${suffix}`;
}
