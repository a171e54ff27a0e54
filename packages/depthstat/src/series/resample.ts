/**
 * Resampling onto an arbitrary target grid.
 * Linear interpolation for continuous and sampled series, forward fill or
 * nearest sample for discrete codes.
 */

import type {
  Result,
  DepthSeries,
  DegenerateGridError,
  ResampleOptions,
  DiscreteResampleMethod,
} from '../types.ts';
import { ok } from '../result.ts';
import { validateDepths, withGrid, sameGrid } from './depth-series.ts';

interface Points {
  readonly depths: readonly number[];
  readonly values: readonly number[];
}

const validPoints = (series: DepthSeries): Points => {
  const depths: number[] = [];
  const values: number[] = [];
  series.values.forEach((value, i) => {
    if (Number.isNaN(value)) return;
    depths.push(series.depths[i] ?? Number.NaN);
    values.push(value);
  });
  return { depths, values };
};

/** Last index with depths[i] <= target, or -1. */
const floorIndex = (depths: readonly number[], target: number): number => {
  let lo = 0;
  let hi = depths.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    if ((depths[mid] ?? Number.NaN) <= target) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
};

export const interpolateLinear = (points: Points, target: number): number => {
  const i = floorIndex(points.depths, target);
  if (i < 0) return Number.NaN;

  const d0 = points.depths[i] ?? Number.NaN;
  const v0 = points.values[i] ?? Number.NaN;
  if (d0 === target) return v0;

  const d1 = points.depths[i + 1];
  const v1 = points.values[i + 1];
  if (d1 === undefined || v1 === undefined) return Number.NaN;

  return v0 + ((target - d0) / (d1 - d0)) * (v1 - v0);
};

export const forwardFill = (series: DepthSeries, target: number): number => {
  const i = floorIndex(series.depths, target);
  return i < 0 ? Number.NaN : (series.values[i] ?? Number.NaN);
};

export const nearestSample = (series: DepthSeries, target: number): number => {
  const first = series.depths[0];
  const last = series.depths[series.depths.length - 1];
  if (first === undefined || last === undefined || target < first || target > last) {
    return Number.NaN;
  }

  const i = floorIndex(series.depths, target);
  const below = series.depths[i] ?? Number.NaN;
  const above = series.depths[i + 1];
  if (above === undefined || target - below <= above - target) {
    return series.values[i] ?? Number.NaN;
  }
  return series.values[i + 1] ?? Number.NaN;
};

const discreteSampler = (
  method: DiscreteResampleMethod
): ((series: DepthSeries, target: number) => number) =>
  method === 'nearest' ? nearestSample : forwardFill;

export const resampleValues = (
  series: DepthSeries,
  targetDepths: readonly number[],
  options: ResampleOptions = {}
): number[] => {
  if (sameGrid(series.depths, targetDepths)) return [...series.values];

  if (series.kind === 'discrete') {
    const sample = discreteSampler(options.discreteMethod ?? 'previous');
    return targetDepths.map((depth) => sample(series, depth));
  }

  const points = validPoints(series);
  return targetDepths.map((depth) => interpolateLinear(points, depth));
};

export const resample = (
  series: DepthSeries,
  targetDepths: readonly number[],
  options: ResampleOptions = {}
): Result<DepthSeries, DegenerateGridError> => {
  const validated = validateDepths(targetDepths);
  if (!validated.ok) return validated;
  return ok(withGrid(series, [...targetDepths], resampleValues(series, targetDepths, options)));
};
