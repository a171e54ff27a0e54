/**
 * Weighted statistics over (value, weight) samples.
 * Arithmetic statistics are the same reductions with unit weights.
 * Every function expects NaN-free input and returns NaN when the answer is
 * undefined; nothing here substitutes a zero.
 */

export interface WeightedSample {
  readonly value: number;
  readonly weight: number;
}

export const unitWeights = (values: readonly number[]): WeightedSample[] =>
  values.map((value) => ({ value, weight: 1 }));

export const totalWeight = (samples: readonly WeightedSample[]): number =>
  samples.reduce((total, s) => total + s.weight, 0);

export const weightedSum = (samples: readonly WeightedSample[]): number =>
  samples.length === 0
    ? Number.NaN
    : samples.reduce((total, s) => total + s.weight * s.value, 0);

export const weightedMean = (samples: readonly WeightedSample[]): number => {
  const weight = totalWeight(samples);
  if (samples.length === 0 || weight === 0) return Number.NaN;
  return weightedSum(samples) / weight;
};

/** Population standard deviation; undefined below two samples. */
export const weightedStdDev = (samples: readonly WeightedSample[]): number => {
  const weight = totalWeight(samples);
  if (samples.length < 2 || weight === 0) return Number.NaN;
  const mean = weightedMean(samples);
  const squared = samples.reduce((total, s) => total + s.weight * (s.value - mean) ** 2, 0);
  return Math.sqrt(squared / weight);
};

const sortByValue = (samples: readonly WeightedSample[]): WeightedSample[] =>
  [...samples].sort((a, b) => a.value - b.value);

/**
 * Percentile `p` (0-100) by cumulative weight: the first sorted sample whose
 * cumulative weight reaches `p/100` of the total, interpolated linearly from
 * the sample before it.
 */
export const weightedPercentile = (samples: readonly WeightedSample[], p: number): number => {
  if (samples.length === 0) return Number.NaN;

  const sorted = sortByValue(samples);
  const cumulative: number[] = [];
  let running = 0;
  for (const sample of sorted) {
    running += sample.weight;
    cumulative.push(running);
  }

  const target = (p / 100) * running;
  const k = cumulative.findIndex((c) => c >= target);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (first === undefined || last === undefined) return Number.NaN;
  if (k === 0) return first.value;
  if (k < 0) return last.value;

  const below = sorted[k - 1];
  const above = sorted[k];
  const wBelow = cumulative[k - 1];
  const wAbove = cumulative[k];
  if (below === undefined || above === undefined || wBelow === undefined || wAbove === undefined) {
    return Number.NaN;
  }
  if (wAbove === wBelow) return above.value;

  const fraction = (target - wBelow) / (wAbove - wBelow);
  return below.value + fraction * (above.value - below.value);
};

export const valueRange = (values: readonly number[]): { min: number; max: number } => {
  if (values.length === 0) return { min: Number.NaN, max: Number.NaN };
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
};
