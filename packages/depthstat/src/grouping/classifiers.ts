/**
 * Discrete classifier helpers: display labels and group boundaries.
 */

import type {
  DepthSeries,
  ClassifierLabels,
  ClassifierZones,
  DiscreteResampleMethod,
  UnmappedLabelWarning,
} from '../types.ts';

export const NAN_LABEL = 'NaN';

export const fallbackLabel = (classifier: string, code: number): string =>
  Number.isInteger(code)
    ? `${classifier}_${code}`
    : `${classifier}_${code.toFixed(2)}`;

/**
 * Label for every sample of a discrete series. Codes without a mapping get
 * a generated name and one warning per distinct code.
 */
export const classifierLabels = (classifier: DepthSeries): ClassifierLabels => {
  const warnings: UnmappedLabelWarning[] = [];
  const resolved = new Map<number, string>();

  const labelFor = (code: number): string => {
    if (Number.isNaN(code)) return NAN_LABEL;

    const cached = resolved.get(code);
    if (cached !== undefined) return cached;

    const mapped = Number.isInteger(code) ? classifier.labels?.get(code) : undefined;
    const label = mapped ?? fallbackLabel(classifier.name, code);
    if (mapped === undefined) {
      warnings.push({
        code: 'UNMAPPED_LABEL',
        message: `Classifier "${classifier.name}" has no label for code ${code}; using "${label}"`,
        classifier: classifier.name,
        value: code,
        fallback: label,
      });
    }
    resolved.set(code, label);
    return label;
  };

  return {
    labels: classifier.values.map(labelFor),
    warnings,
  };
};

const sameCode = (a: number, b: number): boolean =>
  a === b || (Number.isNaN(a) && Number.isNaN(b));

/**
 * Zones of a classifier as a step function: zone i holds `codes[i]` from
 * `depths[i]` down to the next zone start. Above the first start the code is
 * absent; the deepest zone stays open downward.
 *
 * With `previous` every sample starts a zone. With `nearest` each zone after
 * the first starts at the midpoint to the sample above it.
 */
export const classifierZones = (
  classifier: DepthSeries,
  method: DiscreteResampleMethod = 'previous'
): ClassifierZones => {
  if (method === 'previous') {
    return { depths: classifier.depths, codes: classifier.values };
  }
  const depths = classifier.depths.map((depth, i) => {
    const above = classifier.depths[i - 1];
    return above === undefined ? depth : (above + depth) / 2;
  });
  return { depths, codes: classifier.values };
};

/** Zone starts where the code changes, the first zone included. */
export const classifierBoundaries = (
  classifier: DepthSeries,
  method: DiscreteResampleMethod = 'previous'
): number[] => {
  const zones = classifierZones(classifier, method);
  const boundaries: number[] = [];
  let current = Number.NaN;

  zones.codes.forEach((code, i) => {
    if (!sameCode(code, current)) boundaries.push(zones.depths[i] ?? Number.NaN);
    current = code;
  });

  return boundaries;
};
