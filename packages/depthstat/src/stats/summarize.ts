/**
 * Statistics record for one group of (value, interval, depth) samples.
 */

import type {
  Result,
  CalculationMode,
  SeriesKind,
  Statistic,
  StatisticsRecord,
  EmptyGroupError,
  GroupKey,
} from '../types.ts';
import { ok, err } from '../result.ts';
import type { WeightedSample } from './weighted.ts';
import {
  unitWeights,
  totalWeight,
  weightedSum,
  weightedMean,
  weightedStdDev,
  weightedPercentile,
  valueRange,
} from './weighted.ts';

export const defaultMode = (kind: SeriesKind): CalculationMode =>
  kind === 'sampled' ? 'arithmetic' : 'weighted';

const statistic = (
  mode: CalculationMode,
  weighted: readonly WeightedSample[],
  arithmetic: readonly WeightedSample[],
  reduce: (samples: readonly WeightedSample[]) => number
): Statistic => {
  switch (mode) {
    case 'weighted':
      return { kind: 'single', value: reduce(weighted) };
    case 'arithmetic':
      return { kind: 'single', value: reduce(arithmetic) };
    case 'both':
      return { kind: 'dual', weighted: reduce(weighted), arithmetic: reduce(arithmetic) };
  }
};

export const thicknessFraction = (thickness: number, grossThickness: number): number =>
  grossThickness === 0 ? 0 : thickness / grossThickness;

/**
 * Summarize one group. `values`, `intervals` and `depths` are parallel
 * arrays holding only the group's samples.
 *
 * The record is returned as its own sole sibling; `withGrossThickness`
 * rescales it once the sibling set is known.
 */
export const summarize = (
  values: readonly number[],
  intervals: readonly number[],
  depths: readonly number[],
  mode: CalculationMode,
  path: readonly GroupKey[] = []
): Result<StatisticsRecord, EmptyGroupError> => {
  const weighted: WeightedSample[] = [];
  values.forEach((value, i) => {
    if (!Number.isNaN(value)) weighted.push({ value, weight: intervals[i] ?? Number.NaN });
  });

  if (weighted.length === 0) {
    const where = path.length === 0 ? 'group' : path.map((k) => k.label).join(' / ');
    return err({
      code: 'EMPTY_GROUP',
      message: `No valid samples in ${where} (${values.length} samples, all absent)`,
      path,
      indices: [],
    });
  }

  const arithmetic = unitWeights(weighted.map((s) => s.value));
  const stat = (reduce: (samples: readonly WeightedSample[]) => number): Statistic =>
    statistic(mode, weighted, arithmetic, reduce);
  const thickness = totalWeight(weighted);

  return ok({
    calculation: mode,
    mean: stat(weightedMean),
    sum: stat(weightedSum),
    stdDev: stat(weightedStdDev),
    percentiles: {
      p10: stat((s) => weightedPercentile(s, 10)),
      p50: stat((s) => weightedPercentile(s, 50)),
      p90: stat((s) => weightedPercentile(s, 90)),
    },
    range: valueRange(weighted.map((s) => s.value)),
    depthRange: valueRange(depths),
    samples: weighted.length,
    depthSamples: values.length,
    thickness,
    grossThickness: thickness,
    thicknessFraction: thicknessFraction(thickness, thickness),
  });
};

export const withGrossThickness = (
  record: StatisticsRecord,
  grossThickness: number
): StatisticsRecord => ({
  ...record,
  grossThickness,
  thicknessFraction: thicknessFraction(record.thickness, grossThickness),
});

/** Plain number for a statistic, preferring the weighted half of a pair. */
export const primaryValue = (stat: Statistic): number =>
  stat.kind === 'single' ? stat.value : stat.weighted;
