/**
 * depthstat - depth-interval-weighted statistics for well log series
 */

// Core types
export type {
  Result,
  SeriesKind,
  DepthSeries,
  DepthSeriesInput,
  DiscreteResampleMethod,
  ResampleOptions,
  BoundaryInsertOptions,
  BoundaryInsertion,
  GroupKey,
  GroupNode,
  CalculationMode,
  Statistic,
  ValueRange,
  Percentiles,
  StatisticsRecord,
  GroupOptions,
  GroupStatistics,
  GroupedStatistics,
  NestedStatistics,
  Registry,
  Well,
  Project,
  TopPick,
  DepthstatConfig,
  DegenerateGridError,
  InvalidSeriesError,
  DepthAlignmentError,
  InvalidClassifierError,
  EmptyGroupError,
  NotFoundError,
  AmbiguousSeriesError,
  SeriesError,
  GroupError,
  ProjectError,
  UnmappedLabelWarning,
  EmptyGroupWarning,
  StatsWarning,
} from './types.ts';

// Result utilities
export { ok, err, isOk, isErr, unwrap, unwrapOr, map, mapErr, flatMap, all, match } from './result.ts';

// Series
export { createDepthSeries, DEFAULT_NULL_VALUE } from './series/depth-series.ts';
export { computeIntervals } from './series/intervals.ts';
export { insertBoundaries, insertBoundariesDetailed } from './series/boundaries.ts';
export { resample } from './series/resample.ts';

// Grouping and statistics
export { classifierLabels, classifierBoundaries, classifierZones } from './grouping/classifiers.ts';
export { partition, leafGroups } from './grouping/partition.ts';
export { summarize, defaultMode } from './stats/summarize.ts';
export { groupStatistics, toNestedRecord } from './engine/group.ts';

// Project
export { createRegistry } from './project/registry.ts';
export {
  createProject,
  addWell,
  getWell,
  firstWell,
  createWell,
  addSeries,
  deriveSeries,
  getSeries,
  seriesNames,
  wellStatistics,
} from './project/well.ts';
export type { WellStatisticsRequest } from './project/well.ts';
export { classifierFromTops, surfaceCodes } from './project/tops.ts';

// Config and datasets
export { loadConfig, parseConfig, mergeConfig, DEFAULT_CONFIG, resolveMode } from './config/index.ts';
export { loadDataset, parseDataset, buildProject } from './dataset/loader.ts';
