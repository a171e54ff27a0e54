/**
 * Midpoint depth intervals.
 *
 * Each sample stands for the half-span toward each neighbour, so the
 * intervals of a grid telescope to `depths[n-1] - depths[0]`.
 */

import type { Result, DegenerateGridError } from '../types.ts';
import { ok } from '../result.ts';
import { validateDepths } from './depth-series.ts';

/** Intervals for a grid already known to be strictly increasing. */
export const midpointIntervals = (depths: readonly number[]): number[] => {
  const n = depths.length;
  if (n < 2) return depths.map(() => 0);

  const at = (i: number): number => depths[i] ?? Number.NaN;
  const intervals = new Array<number>(n);

  intervals[0] = (at(1) - at(0)) / 2;
  for (let i = 1; i < n - 1; i++) {
    intervals[i] = (at(i + 1) - at(i - 1)) / 2;
  }
  intervals[n - 1] = (at(n - 1) - at(n - 2)) / 2;

  return intervals;
};

export const computeIntervals = (
  depths: readonly number[]
): Result<readonly number[], DegenerateGridError> => {
  const validated = validateDepths(depths);
  if (!validated.ok) return validated;
  return ok(midpointIntervals(depths));
};
