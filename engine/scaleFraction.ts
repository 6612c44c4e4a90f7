// engine/scaleFraction.ts
// Column-level percentage scaling.
//
// A percentage column holds either fractions (0.92) or percentage points (92).
// The unit is decided once per column from its maximum, never per row, so a
// single series never mixes units. The threshold is a heuristic: a points
// column whose values all sit at or below 1.5 stays unscaled.

import { FRACTION_SCALE_THRESHOLD, PERCENT_DIVISOR } from './constants';

/**
 * Divisor for a whole column: PERCENT_DIVISOR when the max non-null value
 * exceeds the threshold, otherwise 1. An all-null column gets 1.
 */
export function decideFractionScale(
  values: ReadonlyArray<number | null>,
  threshold: number = FRACTION_SCALE_THRESHOLD
): number {
  let max: number | null = null;
  for (const v of values) {
    if (v === null || !Number.isFinite(v)) continue;
    if (max === null || v > max) max = v;
  }
  return max !== null && max > threshold ? PERCENT_DIVISOR : 1;
}

export function applyFractionScale(
  values: ReadonlyArray<number | null>,
  divisor: number
): Array<number | null> {
  if (divisor === 1) return values.slice();
  return values.map((v) => (v === null ? null : v / divisor));
}

/** Decide and apply in one step; idempotent on an already-scaled column. */
export function scaleFractionColumn(
  values: ReadonlyArray<number | null>
): { values: Array<number | null>; divisor: number } {
  const divisor = decideFractionScale(values);
  return { values: applyFractionScale(values, divisor), divisor };
}
