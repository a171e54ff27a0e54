/**
 * DepthSeries construction and validation.
 * Series are frozen on creation; every transformation builds a new one.
 */

import type {
  Result,
  DepthSeries,
  DepthSeriesInput,
  DegenerateGridError,
  SeriesError,
  ValueRange,
} from '../types.ts';
import { ok, err } from '../result.ts';

export const DEFAULT_NULL_VALUE = -999.25;

const NULL_TOLERANCE = 1e-6;

export const validateDepths = (
  depths: readonly number[]
): Result<readonly number[], DegenerateGridError> => {
  if (depths.length === 0) {
    return err({
      code: 'DEGENERATE_GRID',
      message: 'Depth grid is empty',
      index: null,
      depths: [],
    });
  }

  for (let i = 0; i < depths.length; i++) {
    const depth = depths[i] ?? Number.NaN;
    if (!Number.isFinite(depth)) {
      return err({
        code: 'DEGENERATE_GRID',
        message: `Depth at index ${i} is not a finite number (${depth})`,
        index: i,
        depths: [depth],
      });
    }
    const previous = depths[i - 1];
    if (previous !== undefined && depth <= previous) {
      return err({
        code: 'DEGENERATE_GRID',
        message: `Depths must be strictly increasing: index ${i} has ${depth} after ${previous}`,
        index: i,
        depths: [previous, depth],
      });
    }
  }

  return ok(depths);
};

type LabelInput = NonNullable<DepthSeriesInput['labels']>;

const isLabelMap = (labels: LabelInput): labels is ReadonlyMap<number, string> =>
  labels instanceof Map;

const toLabelMap = (
  labels: DepthSeriesInput['labels']
): Result<ReadonlyMap<number, string> | null, string> => {
  if (labels === undefined || labels === null) return ok(null);
  if (isLabelMap(labels)) return ok(new Map(labels));

  const map = new Map<number, string>();
  for (const [key, name] of Object.entries(labels)) {
    const code = Number(key);
    if (!Number.isInteger(code)) {
      return err(`label key "${key}" is not an integer code`);
    }
    map.set(code, name);
  }
  return ok(map);
};

const cleanValue = (value: number | null, nullValue: number | null): number => {
  if (value === null) return Number.NaN;
  if (nullValue !== null && Math.abs(value - nullValue) < NULL_TOLERANCE) return Number.NaN;
  return value;
};

export const createDepthSeries = (input: DepthSeriesInput): Result<DepthSeries, SeriesError> => {
  const kind = input.kind ?? 'continuous';

  const depthsResult = validateDepths(input.depths);
  if (!depthsResult.ok) return depthsResult;

  if (input.values.length !== input.depths.length) {
    return err({
      code: 'INVALID_SERIES',
      message: `Series "${input.name}" has ${input.values.length} values for ${input.depths.length} depths`,
      series: input.name,
    });
  }

  const labelsResult = toLabelMap(input.labels);
  if (!labelsResult.ok) {
    return err({
      code: 'INVALID_SERIES',
      message: `Series "${input.name}": ${labelsResult.error}`,
      series: input.name,
    });
  }
  if (labelsResult.value !== null && kind !== 'discrete') {
    return err({
      code: 'INVALID_SERIES',
      message: `Series "${input.name}" is ${kind}; only discrete series carry labels`,
      series: input.name,
    });
  }

  const nullValue = input.nullValue === undefined ? DEFAULT_NULL_VALUE : input.nullValue;

  return ok(freezeSeries({
    name: input.name,
    kind,
    depths: [...input.depths],
    values: input.values.map((v) => cleanValue(v, nullValue)),
    labels: labelsResult.value,
    unit: input.unit ?? '',
    description: input.description ?? '',
  }));
};

/** Re-check a series that may not have come through `createDepthSeries`. */
export const validateSeries = (series: DepthSeries): Result<DepthSeries, SeriesError> => {
  const depthsResult = validateDepths(series.depths);
  if (!depthsResult.ok) {
    return err({ ...depthsResult.error, message: `Series "${series.name}": ${depthsResult.error.message}` });
  }
  if (series.values.length !== series.depths.length) {
    return err({
      code: 'INVALID_SERIES',
      message: `Series "${series.name}" has ${series.values.length} values for ${series.depths.length} depths`,
      series: series.name,
    });
  }
  return ok(series);
};

export const freezeSeries = (series: DepthSeries): DepthSeries =>
  Object.freeze({
    ...series,
    depths: Object.freeze([...series.depths]),
    values: Object.freeze([...series.values]),
  });

/**
 * Copy of `series` on a new grid. Callers guarantee `depths` is valid and
 * `values` has the same length.
 */
export const withGrid = (
  series: DepthSeries,
  depths: readonly number[],
  values: readonly number[]
): DepthSeries => freezeSeries({ ...series, depths, values });

export const depthRange = (series: DepthSeries): ValueRange => ({
  min: series.depths[0] ?? Number.NaN,
  max: series.depths[series.depths.length - 1] ?? Number.NaN,
});

export const sameGrid = (a: readonly number[], b: readonly number[]): boolean =>
  a.length === b.length && a.every((depth, i) => depth === b[i]);
