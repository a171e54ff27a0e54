import { describe, test, expect } from 'vitest';
import { resample, resampleValues, forwardFill, nearestSample } from './resample.ts';
import { createDepthSeries } from './depth-series.ts';
import { unwrap } from '../result.ts';
import type { SeriesKind } from '../types.ts';

const series = (depths: number[], values: number[], kind: SeriesKind = 'continuous') =>
  unwrap(createDepthSeries({ name: 'S', kind, depths, values }));

describe('resample (continuous)', () => {
  test('interpolates linearly between samples', () => {
    const result = resampleValues(series([0, 10], [1, 3]), [0, 2.5, 5, 10]);
    expect(result).toEqual([1, 1.5, 2, 3]);
  });

  test('targets outside the source range become NaN', () => {
    const result = resampleValues(series([10, 20], [1, 2]), [5, 25]);
    expect(result.every(Number.isNaN)).toBe(true);
  });

  test('interpolates across absent samples using valid neighbours', () => {
    const result = resampleValues(series([0, 1, 2], [0, Number.NaN, 4]), [0.5, 1.5]);
    expect(result).toEqual([1, 3]);
  });

  test('absent trailing samples shrink the valid range', () => {
    const result = resampleValues(series([0, 1, 2], [5, 6, Number.NaN]), [1.5]);
    expect(Number.isNaN(result[0])).toBe(true);
  });

  test('single valid sample only answers at its own depth', () => {
    const result = resampleValues(series([0, 1, 2], [Number.NaN, 7, Number.NaN]), [1, 1.5]);
    expect(result[0]).toBe(7);
    expect(Number.isNaN(result[1])).toBe(true);
  });

  test('sampled series interpolate like continuous ones', () => {
    const result = resampleValues(series([0, 4], [0, 8], 'sampled'), [1]);
    expect(result).toEqual([2]);
  });
});

describe('resample (discrete)', () => {
  const zones = series([1500, 1503, 1510], [1, 2, 3], 'discrete');

  test('forward fills by default', () => {
    const result = resampleValues(zones, [1499, 1500, 1502.9, 1503, 1509, 1520]);
    expect(result.slice(1)).toEqual([1, 1, 2, 2, 3]);
    expect(Number.isNaN(result[0])).toBe(true);
  });

  test('nearest picks the closest sample, shallower on ties', () => {
    const result = resampleValues(zones, [1501, 1501.5, 1502, 1508], { discreteMethod: 'nearest' });
    expect(result).toEqual([1, 1, 2, 3]);
  });

  test('nearest is undefined outside the source range', () => {
    expect(Number.isNaN(nearestSample(zones, 1520))).toBe(true);
    expect(Number.isNaN(nearestSample(zones, 1400))).toBe(true);
  });

  test('forward fill keeps absent codes absent', () => {
    const gappy = series([0, 1, 2], [4, Number.NaN, 5], 'discrete');
    expect(Number.isNaN(forwardFill(gappy, 1.5))).toBe(true);
    expect(forwardFill(gappy, 0.5)).toBe(4);
  });

  test('labels travel with the series', () => {
    const labelled = unwrap(createDepthSeries({
      name: 'Zone',
      kind: 'discrete',
      depths: [0, 10],
      values: [0, 1],
      labels: { '0': 'Upper', '1': 'Lower' },
    }));
    const result = unwrap(resample(labelled, [0, 5, 10, 15]));
    expect(result.values).toEqual([0, 0, 1, 1]);
    expect(result.labels?.get(1)).toBe('Lower');
  });
});

describe('resample', () => {
  test('round trip onto the own grid reproduces values and NaNs', () => {
    const original = series([1, 2, 4, 8], [0.1, Number.NaN, 0.3, 0.4]);
    const result = unwrap(resample(original, [1, 2, 4, 8]));
    expect(result.values[0]).toBe(0.1);
    expect(Number.isNaN(result.values[1])).toBe(true);
    expect(result.values.slice(2)).toEqual([0.3, 0.4]);
  });

  test('rejects a degenerate target grid', () => {
    const result = resample(series([0, 1], [0, 1]), [2, 1]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('DEGENERATE_GRID');
  });

  test('returns a new series on the target grid', () => {
    const original = series([0, 10], [0, 10]);
    const result = unwrap(resample(original, [0, 5]));
    expect(result.depths).toEqual([0, 5]);
    expect(result.values).toEqual([0, 5]);
    expect(original.depths).toEqual([0, 10]);
  });
});
