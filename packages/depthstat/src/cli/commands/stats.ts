/**
 * Stats command implementation.
 */

import type {
  StatsCommand,
  GroupedStatistics,
  GroupOptions,
  OutputFormat,
  DepthstatConfig,
} from '../../types.ts';
import { resolveMode } from '../../config/index.ts';
import { getSeries, wellStatistics } from '../../project/well.ts';
import { toNestedRecord } from '../../engine/group.ts';
import {
  formatTable,
  formatNumber,
  formatStatistic,
  formatPercent,
  formatPath,
} from '../format.ts';
import { loadContext, writeOutput } from './shared.ts';

export const formatStats = (
  well: string,
  result: GroupedStatistics,
  format: OutputFormat,
  precision: number
): string => {
  if (format === 'json') {
    return JSON.stringify({
      well,
      property: result.series,
      mode: result.mode,
      classifiers: result.classifiers,
      insertedDepths: result.insertedDepths,
      statistics: toNestedRecord(result),
    }, null, 2);
  }

  const num = (value: number): string => formatNumber(value, precision);
  const rows = result.groups.map(({ path, record }) => [
    formatPath(path),
    String(record.samples),
    num(record.thickness),
    formatPercent(record.thicknessFraction),
    formatStatistic(record.mean, precision),
    formatStatistic(record.sum, precision),
    formatStatistic(record.stdDev, precision),
    formatStatistic(record.percentiles.p10, precision),
    formatStatistic(record.percentiles.p50, precision),
    formatStatistic(record.percentiles.p90, precision),
    `${num(record.range.min)} - ${num(record.range.max)}`,
    `${num(record.depthRange.min)} - ${num(record.depthRange.max)}`,
  ]);

  const by = result.classifiers.length > 0 ? ` by ${result.classifiers.join(', ')}` : '';
  const table = formatTable(
    ['Group', 'Samples', 'Thickness', 'Fraction', 'Mean', 'Sum', 'Std Dev', 'P10', 'P50', 'P90', 'Range', 'Depth'],
    rows
  );

  return `# ${result.series} in ${well}${by}

**Calculation:** ${result.mode}
**Inserted boundaries:** ${result.insertedDepths.length}

${table}`;
};

const groupOptions = (config: DepthstatConfig): GroupOptions => ({
  alignment: config.grouping.alignment,
  onEmptyGroup: config.grouping.onEmptyGroup,
  discreteMethod: config.grouping.discreteResample,
});

export const executeStats = async (command: StatsCommand): Promise<number> => {
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

  const result = wellStatistics(well, {
    property: command.property,
    classifiers: command.by,
    options: {
      ...groupOptions(config),
      mode: resolveMode(config, seriesResult.value.kind, command.mode),
    },
  });

  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }

  for (const warning of result.value.warnings) {
    console.warn(`Warning: ${warning.message}`);
  }

  const format = command.format ?? config.output.format;
  return writeOutput(formatStats(well.name, result.value, format, config.output.precision), command.output);
};
