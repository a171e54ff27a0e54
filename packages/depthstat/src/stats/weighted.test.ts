import { describe, test, expect } from 'vitest';
import {
  unitWeights,
  totalWeight,
  weightedSum,
  weightedMean,
  weightedStdDev,
  weightedPercentile,
  valueRange,
} from './weighted.ts';

const samples = [
  { value: 10, weight: 1 },
  { value: 20, weight: 3 },
];

describe('weighted reductions', () => {
  test('sum and mean weight each value by its interval', () => {
    expect(totalWeight(samples)).toBe(4);
    expect(weightedSum(samples)).toBe(70);
    expect(weightedMean(samples)).toBe(17.5);
  });

  test('population standard deviation', () => {
    expect(weightedStdDev(samples)).toBeCloseTo(Math.sqrt(18.75), 10);
  });

  test('unit weights reduce to arithmetic statistics', () => {
    const arithmetic = unitWeights([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(weightedMean(arithmetic)).toBe(5);
    expect(weightedStdDev(arithmetic)).toBe(2);
  });

  test('undefined answers are NaN, never zero', () => {
    expect(weightedSum([])).toBeNaN();
    expect(weightedMean([])).toBeNaN();
    expect(weightedMean([{ value: 3, weight: 0 }])).toBeNaN();
    expect(weightedStdDev([{ value: 3, weight: 1 }])).toBeNaN();
  });
});

describe('weightedPercentile', () => {
  const ordered = unitWeights([4, 1, 3, 2]);

  test('interpolates between the samples bracketing the target weight', () => {
    expect(weightedPercentile(ordered, 50)).toBe(2);
    expect(weightedPercentile(ordered, 90)).toBeCloseTo(3.6, 10);
  });

  test('clamps to the extremes', () => {
    expect(weightedPercentile(ordered, 0)).toBe(1);
    expect(weightedPercentile(ordered, 10)).toBe(1);
    expect(weightedPercentile(ordered, 100)).toBe(4);
  });

  test('heavier samples pull the percentile toward themselves', () => {
    expect(weightedPercentile(samples, 50)).toBeCloseTo(10 + 10 / 3, 10);
  });

  test('single sample answers every percentile', () => {
    const single = [{ value: 0.25, weight: 2 }];
    expect(weightedPercentile(single, 10)).toBe(0.25);
    expect(weightedPercentile(single, 90)).toBe(0.25);
  });

  test('empty input is NaN', () => {
    expect(weightedPercentile([], 50)).toBeNaN();
  });
});

describe('valueRange', () => {
  test('finds min and max', () => {
    expect(valueRange([3, -1, 8, 2])).toEqual({ min: -1, max: 8 });
  });

  test('empty input has no range', () => {
    const range = valueRange([]);
    expect(range.min).toBeNaN();
    expect(range.max).toBeNaN();
  });
});
