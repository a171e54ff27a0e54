/**
 * Formation tops as a discrete classifier.
 * Each pick starts a zone that runs down to the next pick.
 */

import type { Result, DepthSeries, SeriesError, TopPick } from '../types.ts';
import { createDepthSeries } from '../series/depth-series.ts';

/** Surface codes shared across wells: index in the sorted unique names. */
export const surfaceCodes = (picks: readonly TopPick[]): Map<string, number> => {
  const surfaces = [...new Set(picks.map((p) => p.surface))].sort();
  return new Map(surfaces.map((surface, code) => [surface, code]));
};

export const classifierFromTops = (
  name: string,
  picks: readonly TopPick[],
  codes: ReadonlyMap<string, number> = surfaceCodes(picks)
): Result<DepthSeries, SeriesError> => {
  const ordered = [...picks].sort((a, b) => a.depth - b.depth);
  const labels = new Map<number, string>();
  for (const [surface, code] of codes) labels.set(code, surface);

  return createDepthSeries({
    name,
    kind: 'discrete',
    depths: ordered.map((p) => p.depth),
    values: ordered.map((p) => codes.get(p.surface) ?? null),
    labels,
    nullValue: null,
    description: 'Formation tops',
  });
};
