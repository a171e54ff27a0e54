/**
 * Intervals command implementation.
 */

import type { IntervalsCommand, DepthSeries, OutputFormat } from '../../types.ts';
import { getSeries } from '../../project/well.ts';
import { insertBoundariesDetailed } from '../../series/boundaries.ts';
import { computeIntervals } from '../../series/intervals.ts';
import { formatTable, formatNumber } from '../format.ts';
import { loadContext, writeOutput } from './shared.ts';

export const formatIntervals = (
  series: DepthSeries,
  intervals: readonly number[],
  inserted: readonly number[],
  format: OutputFormat,
  precision: number
): string => {
  const total = intervals.reduce((sum, v) => sum + v, 0);

  if (format === 'json') {
    return JSON.stringify({
      property: series.name,
      samples: series.depths.map((depth, i) => ({
        depth,
        value: series.values[i],
        interval: intervals[i],
        inserted: inserted.includes(depth),
      })),
      totalThickness: total,
    }, null, 2);
  }

  const rows = series.depths.map((depth, i) => [
    formatNumber(depth, precision) + (inserted.includes(depth) ? ' *' : ''),
    formatNumber(series.values[i] ?? Number.NaN, precision),
    formatNumber(intervals[i] ?? Number.NaN, precision),
  ]);

  return `# Intervals for ${series.name}

${formatTable(['Depth', 'Value', 'Interval'], rows)}

**Total thickness:** ${formatNumber(total, precision)}${inserted.length > 0 ? '  \n(* inserted boundary sample)' : ''}`;
};

export const executeIntervals = async (command: IntervalsCommand): Promise<number> => {
  const contextResult = await loadContext(command);
  if (!contextResult.ok) {
    console.error(`Error: ${contextResult.error}`);
    return 1;
  }
  const { config, well } = contextResult.value;

  const seriesResult = getSeries(well, command.property);
  if (!seriesResult.ok) {
    console.error(`Error: ${seriesResult.error.message}`);
    return 1;
  }

  const corrected = insertBoundariesDetailed(seriesResult.value, command.boundaries, { force: true });
  const intervals = computeIntervals(corrected.series.depths);
  if (!intervals.ok) {
    console.error(`Error: ${intervals.error.message}`);
    return 1;
  }

  const format = command.format ?? config.output.format;
  return writeOutput(
    formatIntervals(corrected.series, intervals.value, corrected.insertedDepths, format, config.output.precision),
    command.output
  );
};
