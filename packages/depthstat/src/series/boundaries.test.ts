import { describe, test, expect } from 'vitest';
import { insertBoundaries, insertBoundariesDetailed, findBracket } from './boundaries.ts';
import { createDepthSeries, validateDepths } from './depth-series.ts';
import { midpointIntervals } from './intervals.ts';
import { unwrap } from '../result.ts';
import { seeded, randomGrid, randomInt } from '../testing/random.ts';
import type { SeriesKind } from '../types.ts';

const series = (depths: number[], values: number[], kind: SeriesKind = 'continuous') =>
  unwrap(createDepthSeries({ name: 'NTG', kind, depths, values }));

const sum = (values: readonly number[]): number => values.reduce((total, v) => total + v, 0);

describe('findBracket', () => {
  const depths = [1500, 1501, 1505, 1510];

  test('finds the enclosing interval', () => {
    expect(findBracket(depths, 1503)).toBe(1);
    expect(findBracket(depths, 1500.1)).toBe(0);
    expect(findBracket(depths, 1509.9)).toBe(2);
  });

  test('skips existing depths and out-of-range targets', () => {
    expect(findBracket(depths, 1505)).toBe(-1);
    expect(findBracket(depths, 1500)).toBe(-1);
    expect(findBracket(depths, 1510)).toBe(-1);
    expect(findBracket(depths, 1499)).toBe(-1);
    expect(findBracket(depths, 1600)).toBe(-1);
  });
});

describe('insertBoundaries', () => {
  test('splits an interval at a zone boundary with the preceding value', () => {
    const result = insertBoundaries(series([1500, 1501, 1505], [0, 1, 0]), [1503]);
    expect(result.depths).toEqual([1500, 1501, 1503, 1505]);
    expect(result.values).toEqual([0, 1, 1, 0]);
    expect(midpointIntervals(result.depths)).toEqual([0.5, 1.5, 2, 1]);
  });

  test('ignores boundaries outside the grid or on a sample', () => {
    const original = series([1500, 1501, 1505], [0, 1, 0]);
    const result = insertBoundaries(original, [1400, 1500, 1501, 1600]);
    expect(result.depths).toEqual([1500, 1501, 1505]);
  });

  test('collapses duplicates and handles several boundaries in one interval', () => {
    const result = insertBoundaries(series([0, 10], [7, 9]), [6, 3, 6, 3]);
    expect(result.depths).toEqual([0, 3, 6, 10]);
    expect(result.values).toEqual([7, 7, 7, 9]);
  });

  test('replicates absent samples as absent', () => {
    const result = insertBoundaries(series([0, 2, 4], [1, Number.NaN, 3]), [3]);
    expect(result.depths).toEqual([0, 2, 3, 4]);
    expect(Number.isNaN(result.values[2])).toBe(true);
  });

  test('returns a new series and leaves the input untouched', () => {
    const original = series([1500, 1501, 1505], [0, 1, 0]);
    const result = insertBoundaries(original, [1503]);
    expect(result).not.toBe(original);
    expect(original.depths).toEqual([1500, 1501, 1505]);
    expect(result.name).toBe('NTG');
  });

  test('sampled series are never split unless forced', () => {
    const core = series([1500, 1501, 1505], [0.1, 0.2, 0.3], 'sampled');
    expect(insertBoundaries(core, [1503])).toBe(core);
    expect(insertBoundaries(core, [1503], { force: true }).depths).toEqual([1500, 1501, 1503, 1505]);
  });

  test('splitting preserves the split interval and the total thickness', () => {
    const depths = [100, 100.5, 101.25, 103, 103.1, 107];
    const original = series(depths, depths.map((_, i) => i));
    const before = midpointIntervals(depths);
    const result = insertBoundaries(original, [100.2, 102, 105.5]);
    const after = midpointIntervals(result.depths);

    expect(sum(after)).toBeCloseTo(sum(before), 10);
    expect(sum(after)).toBeCloseTo(7, 10);
  });

  test('random grids keep their span for any boundary set', () => {
    const random = seeded(7);
    for (let run = 0; run < 100; run++) {
      const depths = randomGrid(random, randomInt(random, 2, 300));
      const first = depths[0] ?? 0;
      const last = depths[depths.length - 1] ?? 0;
      const boundaries = Array.from({ length: randomInt(random, 0, 20) }, () =>
        first - 10 + random() * (last - first + 20)
      );
      boundaries.push(depths[randomInt(random, 0, depths.length - 1)] ?? first);

      const result = insertBoundaries(series(depths, depths.map(() => random())), boundaries);

      expect(validateDepths(result.depths).ok).toBe(true);
      expect(sum(midpointIntervals(result.depths))).toBeCloseTo(last - first, 6);
      for (const boundary of boundaries.filter((b) => b > first && b < last)) {
        expect(result.depths).toContain(boundary);
      }
    }
  });
});

describe('insertBoundariesDetailed', () => {
  test('reports inserted depths and where original samples moved', () => {
    const result = insertBoundariesDetailed(series([0, 2, 4, 6], [1, 2, 3, 4]), [5, 1]);
    expect(result.insertedDepths).toEqual([1, 5]);
    expect(result.indexMap).toEqual([0, 2, 3, 5]);
    expect(result.series.depths).toEqual([0, 1, 2, 4, 5, 6]);
  });

  test('identity when nothing is inserted', () => {
    const original = series([0, 2], [1, 2]);
    const result = insertBoundariesDetailed(original, []);
    expect(result.series).toBe(original);
    expect(result.insertedDepths).toEqual([]);
    expect(result.indexMap).toEqual([0, 1]);
  });
});
