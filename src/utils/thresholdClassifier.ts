// src/utils/thresholdClassifier.ts
import type { LevelThreshold } from "../types/attainment";

export const DEFAULT_LEVEL_THRESHOLDS: LevelThreshold[] = [
  { level: 3, minPercent: 85 },
  { level: 2, minPercent: 70 },
  { level: 1, minPercent: 60 },
];

/**
 * Percentages outside [0, 100] are clamped rather than rejected, and NaN is
 * read as 0, so classification never fails. Upstream stages already keep
 * their percentages in range; clamping only matters for hand-fed values.
 */
export function clampPercent(p: number): number {
  if (Number.isNaN(p)) return 0;
  return Math.min(100, Math.max(0, p));
}

/**
 * Highest level whose minimum percentage is <= p, or 0 when none match.
 * Cut points are expected in descending order but the result does not
 * depend on it.
 */
export function classifyLevel(p: number, thresholds: ReadonlyArray<LevelThreshold>): number {
  const pct = clampPercent(p);
  let level = 0;
  for (const t of thresholds) {
    if (pct >= t.minPercent && t.level > level) level = t.level;
  }
  return level;
}
