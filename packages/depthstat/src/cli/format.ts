/**
 * Shared formatting utilities for CLI output.
 */

import type { Statistic, GroupKey } from '../types.ts';

/**
 * Format a markdown table with aligned columns.
 */
export const formatTable = (
  headers: readonly string[],
  rows: readonly (readonly string[])[]
): string => {
  const widths = headers.map((h, i) => {
    const cellWidths = rows.map(row => (row[i] ?? '').length);
    return Math.max(h.length, ...cellWidths);
  });

  const pad = (text: string, colIndex: number): string => {
    const width = widths[colIndex] ?? text.length;
    return text.padEnd(width);
  };

  const headerRow = '| ' + headers.map((h, i) => pad(h, i)).join(' | ') + ' |';
  const separator = '|' + widths.map(w => '-'.repeat(w + 2)).join('|') + '|';
  const dataRows = rows.map(row =>
    '| ' + row.map((cell, i) => pad(cell ?? '', i)).join(' | ') + ' |'
  );

  return [headerRow, separator, ...dataRows].join('\n');
};

/**
 * Fixed precision, "-" for undefined values.
 */
export const formatNumber = (value: number, precision: number): string =>
  Number.isFinite(value) ? value.toFixed(precision) : '-';

/**
 * Weighted and arithmetic halves of a pair are shown as "w / a".
 */
export const formatStatistic = (stat: Statistic, precision: number): string =>
  stat.kind === 'single'
    ? formatNumber(stat.value, precision)
    : `${formatNumber(stat.weighted, precision)} / ${formatNumber(stat.arithmetic, precision)}`;

export const formatPercent = (fraction: number): string =>
  Number.isFinite(fraction) ? `${(fraction * 100).toFixed(1)}%` : '-';

export const formatPath = (path: readonly GroupKey[]): string =>
  path.length === 0 ? '(all)' : path.map((key) => key.label).join(' / ');
