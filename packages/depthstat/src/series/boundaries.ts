/**
 * Boundary insertion.
 * Adds a synthetic sample at every group boundary that falls strictly
 * between two samples, so no interval straddles the boundary.
 */

import type { DepthSeries, BoundaryInsertion, BoundaryInsertOptions } from '../types.ts';
import { withGrid } from './depth-series.ts';

/**
 * Index k with depths[k] < target < depths[k + 1], or -1 when the target is
 * outside the grid or coincides with a sample.
 */
export const findBracket = (depths: readonly number[], target: number): number => {
  let lo = 0;
  let hi = depths.length - 1;
  const first = depths[lo];
  const last = depths[hi];
  if (first === undefined || last === undefined) return -1;
  if (!(target > first && target < last)) return -1;

  // Invariant: depths[lo] < target < depths[hi]
  while (hi - lo > 1) {
    const mid = (lo + hi) >>> 1;
    const depth = depths[mid] ?? Number.NaN;
    if (depth === target) return -1;
    if (depth < target) lo = mid;
    else hi = mid;
  }
  return lo;
};

const uniqueSorted = (values: Iterable<number>): number[] =>
  [...new Set(values)].filter((v) => Number.isFinite(v)).sort((a, b) => a - b);

export const insertBoundariesDetailed = (
  series: DepthSeries,
  boundaries: Iterable<number>,
  options: BoundaryInsertOptions = {}
): BoundaryInsertion => {
  const identity = (): BoundaryInsertion => ({
    series,
    insertedDepths: [],
    indexMap: series.depths.map((_, i) => i),
  });

  if (series.kind === 'sampled' && options.force !== true) return identity();

  const inserts: { readonly after: number; readonly depth: number }[] = [];
  for (const boundary of uniqueSorted(boundaries)) {
    const k = findBracket(series.depths, boundary);
    if (k >= 0) inserts.push({ after: k, depth: boundary });
  }
  if (inserts.length === 0) return identity();

  const depths: number[] = [];
  const values: number[] = [];
  const indexMap: number[] = [];
  let next = 0;

  for (let i = 0; i < series.depths.length; i++) {
    const value = series.values[i] ?? Number.NaN;
    indexMap.push(depths.length);
    depths.push(series.depths[i] ?? Number.NaN);
    values.push(value);

    // Boundaries are sorted, so every insert after sample i is consecutive.
    let insert = inserts[next];
    while (insert !== undefined && insert.after === i) {
      depths.push(insert.depth);
      values.push(value);
      next++;
      insert = inserts[next];
    }
  }

  return {
    series: withGrid(series, depths, values),
    insertedDepths: inserts.map((insert) => insert.depth),
    indexMap,
  };
};

export const insertBoundaries = (
  series: DepthSeries,
  boundaries: Iterable<number>,
  options: BoundaryInsertOptions = {}
): DepthSeries => insertBoundariesDetailed(series, boundaries, options).series;
