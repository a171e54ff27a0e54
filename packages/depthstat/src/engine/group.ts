/**
 * Grouped statistics.
 *
 * Pipeline: validate inputs, collect classifier boundaries, split the value
 * series at those boundaries, project classifiers onto the corrected grid,
 * partition, then summarize each leaf against its siblings.
 */

import type {
  Result,
  DepthSeries,
  GroupOptions,
  GroupNode,
  GroupStatistics,
  GroupedStatistics,
  GroupError,
  DepthAlignmentError,
  InvalidClassifierError,
  EmptyGroupError,
  StatsWarning,
  CalculationMode,
  DiscreteResampleMethod,
  NestedStatistics,
} from '../types.ts';
import { ok, err, all } from '../result.ts';
import { validateSeries, sameGrid, depthRange, withGrid } from '../series/depth-series.ts';
import { midpointIntervals } from '../series/intervals.ts';
import { insertBoundariesDetailed } from '../series/boundaries.ts';
import { resampleValues } from '../series/resample.ts';
import { classifierBoundaries, classifierZones } from '../grouping/classifiers.ts';
import { partition } from '../grouping/partition.ts';
import { summarize, defaultMode, withGrossThickness } from '../stats/summarize.ts';

const checkClassifier = (
  classifier: DepthSeries
): Result<DepthSeries, InvalidClassifierError> =>
  classifier.kind === 'discrete'
    ? ok(classifier)
    : err({
      code: 'INVALID_CLASSIFIER',
      message: `Classifier "${classifier.name}" must be discrete, got ${classifier.kind}`,
      classifier: classifier.name,
      kind: classifier.kind,
    });

const alignmentError = (
  series: DepthSeries,
  classifier: DepthSeries,
  reason: string
): DepthAlignmentError => ({
  code: 'DEPTH_ALIGNMENT',
  message: `Classifier "${classifier.name}" ${reason} "${series.name}"`,
  series: classifier.name,
  expected: depthRange(series),
  actual: depthRange(classifier),
});

const checkAlignment = (
  series: DepthSeries,
  classifier: DepthSeries,
  options: GroupOptions
): Result<DepthSeries, DepthAlignmentError> => {
  if (sameGrid(series.depths, classifier.depths)) return ok(classifier);

  if ((options.alignment ?? 'project') === 'strict') {
    return err(alignmentError(series, classifier, 'is not on the depth grid of'));
  }

  // The deepest zone stays open downward, so only a classifier starting
  // below the series misses it.
  if (depthRange(classifier).min > depthRange(series).max) {
    return err(alignmentError(series, classifier, 'does not overlap the depth range of'));
  }
  return ok(classifier);
};

/**
 * Zone method for a classifier: codes on the series' own grid are exact per
 * sample, anything else is placed with the requested method.
 */
const zoneMethod = (
  series: DepthSeries,
  classifier: DepthSeries,
  discreteMethod: DiscreteResampleMethod
): DiscreteResampleMethod =>
  sameGrid(series.depths, classifier.depths) ? 'previous' : discreteMethod;

/**
 * Classifier codes on the corrected grid. Every zone start inside the grid
 * is a grid depth by now, so forward fill over the zones labels each sample
 * with the zone it opens or lies in.
 */
const project = (
  classifier: DepthSeries,
  depths: readonly number[],
  method: DiscreteResampleMethod
): DepthSeries => {
  if (sameGrid(classifier.depths, depths)) return classifier;
  const zones = classifierZones(classifier, method);
  const steps = withGrid(classifier, zones.depths, zones.codes);
  return withGrid(classifier, depths, resampleValues(steps, depths, { discreteMethod: 'previous' }));
};

interface LeafContext {
  readonly values: readonly number[];
  readonly intervals: readonly number[];
  readonly depths: readonly number[];
  readonly mode: CalculationMode;
  readonly options: GroupOptions;
  readonly warnings: StatsWarning[];
}

const pick = (source: readonly number[], indices: readonly number[]): number[] =>
  indices.map((i) => source[i] ?? Number.NaN);

/** Leaves sharing one parent: thickness fractions are relative to that parent. */
const summarizeSiblings = (
  leaves: readonly GroupNode[],
  ctx: LeafContext
): Result<GroupStatistics[], EmptyGroupError> => {
  const kept: GroupStatistics[] = [];

  for (const leaf of leaves) {
    const summary = summarize(
      pick(ctx.values, leaf.indices),
      pick(ctx.intervals, leaf.indices),
      pick(ctx.depths, leaf.indices),
      ctx.mode,
      leaf.path
    );

    if (!summary.ok) {
      const error = { ...summary.error, indices: leaf.indices };
      if ((ctx.options.onEmptyGroup ?? 'omit') === 'error') return err(error);
      ctx.warnings.push({
        code: 'EMPTY_GROUP_OMITTED',
        message: error.message,
        path: error.path,
        indices: error.indices,
      });
      continue;
    }

    kept.push({ path: leaf.path, indices: leaf.indices, record: summary.value });
  }

  const gross = kept.reduce((total, group) => total + group.record.thickness, 0);
  return ok(kept.map((group) => ({ ...group, record: withGrossThickness(group.record, gross) })));
};

const summarizeTree = (
  node: GroupNode,
  ctx: LeafContext
): Result<GroupStatistics[], EmptyGroupError> => {
  if (node.children.length === 0) return summarizeSiblings([node], ctx);
  if (node.children.every((child) => child.children.length === 0)) {
    return summarizeSiblings(node.children, ctx);
  }

  const results: GroupStatistics[] = [];
  for (const child of node.children) {
    const childResult = summarizeTree(child, ctx);
    if (!childResult.ok) return childResult;
    results.push(...childResult.value);
  }
  return ok(results);
};

export const groupStatistics = (
  series: DepthSeries,
  classifiers: readonly DepthSeries[],
  options: GroupOptions = {}
): Result<GroupedStatistics, GroupError> => {
  const seriesResult = validateSeries(series);
  if (!seriesResult.ok) return seriesResult;

  const validated = all(classifiers.map(validateSeries));
  if (!validated.ok) return validated;

  const discrete = all(classifiers.map(checkClassifier));
  if (!discrete.ok) return discrete;

  const aligned = all(classifiers.map((c) => checkAlignment(series, c, options)));
  if (!aligned.ok) return aligned;

  const discreteMethod = options.discreteMethod ?? 'previous';
  const zoned = classifiers.map((c) => ({ classifier: c, method: zoneMethod(series, c, discreteMethod) }));
  const boundaries = zoned.flatMap((z) => classifierBoundaries(z.classifier, z.method));
  const insert = options.insertBoundaries ?? series.kind !== 'sampled';
  const corrected = insert
    ? insertBoundariesDetailed(series, boundaries, { force: true })
    : insertBoundariesDetailed(series, []);

  const depths = corrected.series.depths;
  const projected = zoned.map((z) => project(z.classifier, depths, z.method));

  const partitioned = partition(depths.map((_, i) => i), projected);
  if (!partitioned.ok) return partitioned;

  const mode = options.mode ?? defaultMode(series.kind);
  const warnings: StatsWarning[] = [...partitioned.value.warnings];

  const groups = summarizeTree(partitioned.value.root, {
    values: corrected.series.values,
    intervals: midpointIntervals(depths),
    depths,
    mode,
    options,
    warnings,
  });
  if (!groups.ok) return groups;

  return ok({
    series: series.name,
    mode,
    classifiers: classifiers.map((c) => c.name),
    depths,
    insertedDepths: corrected.insertedDepths,
    groups: groups.value,
    warnings,
  });
};

/** Own enumerable entry, whatever the label (`__proto__` included). */
const setEntry = (
  target: Record<string, NestedStatistics>,
  label: string,
  value: NestedStatistics
): void => {
  Object.defineProperty(target, label, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Nested mapping keyed by label path. Without classifiers the single record
 * is returned directly.
 */
export const toNestedRecord = (result: GroupedStatistics): NestedStatistics => {
  if (result.classifiers.length === 0) return result.groups[0]?.record ?? {};

  const root: Record<string, NestedStatistics> = {};
  const branches = new Map<string, Record<string, NestedStatistics>>();

  for (const group of result.groups) {
    let cursor = root;
    group.path.forEach((key, depth) => {
      if (depth === group.path.length - 1) {
        setEntry(cursor, key.label, group.record);
        return;
      }
      const prefix = JSON.stringify(group.path.slice(0, depth + 1).map((k) => k.label));
      let branch = branches.get(prefix);
      if (branch === undefined) {
        branch = {};
        branches.set(prefix, branch);
        setEntry(cursor, key.label, branch);
      }
      cursor = branch;
    });
  }

  return root;
};
