/**
 * Hierarchical partition of sample indices by chained classifiers.
 */

import type {
  Result,
  DepthSeries,
  GroupKey,
  GroupNode,
  DepthAlignmentError,
  UnmappedLabelWarning,
} from '../types.ts';
import { ok, err } from '../result.ts';
import { sameGrid, depthRange } from '../series/depth-series.ts';
import { classifierLabels, NAN_LABEL } from './classifiers.ts';

export interface Partition {
  readonly root: GroupNode;
  readonly warnings: readonly UnmappedLabelWarning[];
}

interface LabelledClassifier {
  readonly name: string;
  readonly labels: readonly string[];
}

/** Indices grouped by label, labels in order of first appearance. */
export const groupByLabel = (
  indices: readonly number[],
  labels: readonly string[]
): Map<string, number[]> => {
  const groups = new Map<string, number[]>();
  for (const index of indices) {
    const label = labels[index] ?? NAN_LABEL;
    const group = groups.get(label);
    if (group) group.push(index);
    else groups.set(label, [index]);
  }
  return groups;
};

const buildNode = (
  path: readonly GroupKey[],
  indices: readonly number[],
  classifiers: readonly LabelledClassifier[],
  level: number
): GroupNode => {
  const classifier = classifiers[level];
  if (classifier === undefined) return { path, indices, children: [] };

  const children: GroupNode[] = [];
  for (const [label, members] of groupByLabel(indices, classifier.labels)) {
    const childPath = [...path, { classifier: classifier.name, label }];
    children.push(buildNode(childPath, members, classifiers, level + 1));
  }
  return { path, indices, children };
};

const checkAlignment = (
  classifiers: readonly DepthSeries[]
): Result<void, DepthAlignmentError> => {
  const [reference, ...rest] = classifiers;
  if (reference === undefined) return ok(undefined);

  for (const classifier of rest) {
    if (!sameGrid(reference.depths, classifier.depths)) {
      return err({
        code: 'DEPTH_ALIGNMENT',
        message: `Classifier "${classifier.name}" is not on the depth grid of "${reference.name}"`,
        series: classifier.name,
        expected: depthRange(reference),
        actual: depthRange(classifier),
      });
    }
  }
  return ok(undefined);
};

export const partition = (
  indices: readonly number[],
  classifiers: readonly DepthSeries[]
): Result<Partition, DepthAlignmentError> => {
  const aligned = checkAlignment(classifiers);
  if (!aligned.ok) return aligned;

  const size = classifiers[0]?.depths.length ?? Number.POSITIVE_INFINITY;
  const outside = indices.find((i) => !Number.isInteger(i) || i < 0 || i >= size);
  if (outside !== undefined && classifiers[0] !== undefined) {
    return err({
      code: 'DEPTH_ALIGNMENT',
      message: `Index ${outside} is outside the ${size}-sample grid of "${classifiers[0].name}"`,
      series: classifiers[0].name,
      expected: { min: 0, max: size - 1 },
      actual: { min: outside, max: outside },
    });
  }

  const warnings: UnmappedLabelWarning[] = [];
  const labelled = classifiers.map((classifier) => {
    const resolved = classifierLabels(classifier);
    warnings.push(...resolved.warnings);
    return { name: classifier.name, labels: resolved.labels };
  });

  return ok({
    root: buildNode([], [...indices], labelled, 0),
    warnings,
  });
};

/** Leaf groups in depth-first order. */
export const leafGroups = (node: GroupNode): GroupNode[] =>
  node.children.length === 0 ? [node] : node.children.flatMap(leafGroups);
