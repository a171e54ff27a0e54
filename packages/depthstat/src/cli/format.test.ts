import { describe, test, expect } from 'vitest';
import { formatTable, formatNumber, formatStatistic, formatPercent, formatPath } from './format.ts';

describe('formatTable', () => {
  test('pads every column to its widest cell', () => {
    const table = formatTable(['A', 'Long'], [['x', '1'], ['yyy', '22']]);
    expect(table.split('\n')).toEqual([
      '| A   | Long |',
      '|-----|------|',
      '| x   | 1    |',
      '| yyy | 22   |',
    ]);
  });
});

describe('formatNumber', () => {
  test('fixed precision', () => {
    expect(formatNumber(1.23456, 2)).toBe('1.23');
    expect(formatNumber(1500, 1)).toBe('1500.0');
  });

  test('undefined values print as a dash', () => {
    expect(formatNumber(Number.NaN, 2)).toBe('-');
    expect(formatNumber(Number.POSITIVE_INFINITY, 2)).toBe('-');
  });
});

describe('formatStatistic', () => {
  test('single values', () => {
    expect(formatStatistic({ kind: 'single', value: 0.75 }, 3)).toBe('0.750');
  });

  test('pairs show weighted then arithmetic', () => {
    expect(formatStatistic({ kind: 'dual', weighted: 0.75, arithmetic: 0.5 }, 2)).toBe('0.75 / 0.50');
  });
});

describe('formatPercent', () => {
  test('one decimal place', () => {
    expect(formatPercent(0.4)).toBe('40.0%');
    expect(formatPercent(1)).toBe('100.0%');
  });
});

describe('formatPath', () => {
  test('joins labels and names the root group', () => {
    expect(formatPath([])).toBe('(all)');
    expect(formatPath([
      { classifier: 'Zone', label: 'Upper' },
      { classifier: 'Flag', label: 'Net' },
    ])).toBe('Upper / Net');
  });
});
