/**
 * Default configuration.
 */

import type { DepthstatConfig, CalculationMode, SeriesKind } from '../types.ts';
import { DEFAULT_NULL_VALUE } from '../series/depth-series.ts';
import { defaultMode } from '../stats/summarize.ts';

export const DEFAULT_CONFIG: DepthstatConfig = {
  nullValue: DEFAULT_NULL_VALUE,
  statistics: {
    mode: 'auto',
  },
  grouping: {
    alignment: 'project',
    onEmptyGroup: 'omit',
    discreteResample: 'previous',
  },
  output: {
    format: 'json',
    precision: 4,
  },
};

/** Mode for a series of `kind`, honouring an explicit request first. */
export const resolveMode = (
  config: DepthstatConfig,
  kind: SeriesKind,
  requested: CalculationMode | null = null
): CalculationMode => {
  if (requested !== null) return requested;
  const configured = config.statistics.mode;
  return configured === 'auto' ? defaultMode(kind) : configured;
};
