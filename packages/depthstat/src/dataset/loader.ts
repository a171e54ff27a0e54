/**
 * JSON dataset loader.
 * A dataset lists wells, each with depth series and optional formation tops.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Result, Project, DatasetError, SeriesError, TopPick } from '../types.ts';
import { ok, err } from '../result.ts';
import { createDepthSeries } from '../series/depth-series.ts';
import { classifierFromTops, surfaceCodes } from '../project/tops.ts';
import { createProject, addWell, addSeries } from '../project/well.ts';

export const TOPS_SERIES = 'Tops';
export const TOPS_SOURCE = 'tops';
export const DEFAULT_SOURCE = 'log';

const SeriesSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['continuous', 'discrete', 'sampled']).default('continuous'),
  depths: z.array(z.number()),
  values: z.array(z.number().nullable()),
  labels: z.record(z.string()).optional(),
  source: z.string().min(1).default(DEFAULT_SOURCE),
  unit: z.string().optional(),
  description: z.string().optional(),
});

const TopSchema = z.object({
  surface: z.string().min(1),
  depth: z.number().finite(),
});

const WellSchema = z.object({
  name: z.string().min(1),
  series: z.array(SeriesSchema).default([]),
  tops: z.array(TopSchema).optional(),
});

export const DatasetSchema = z.object({
  wells: z.array(WellSchema).min(1),
});

export type Dataset = z.infer<typeof DatasetSchema>;

export interface DatasetOptions {
  readonly nullValue?: number;
}

/** Builds a project; tops share surface codes across every well. */
export const buildProject = (
  dataset: Dataset,
  options: DatasetOptions = {}
): Result<Project, SeriesError> => {
  const project = createProject();
  const allPicks: TopPick[] = dataset.wells.flatMap((w) => w.tops ?? []);
  const codes = surfaceCodes(allPicks);

  for (const wellData of dataset.wells) {
    const well = addWell(project, wellData.name);

    for (const seriesData of wellData.series) {
      const series = createDepthSeries({
        ...seriesData,
        labels: seriesData.labels ?? null,
        nullValue: options.nullValue,
      });
      if (!series.ok) return series;
      addSeries(well, seriesData.source, series.value);
    }

    if (wellData.tops !== undefined && wellData.tops.length > 0) {
      const tops = classifierFromTops(TOPS_SERIES, wellData.tops, codes);
      if (!tops.ok) return tops;
      addSeries(well, TOPS_SOURCE, tops.value);
    }
  }

  return ok(project);
};

export const parseDataset = (raw: unknown, path?: string): Result<Dataset, DatasetError> => {
  const parsed = DatasetSchema.safeParse(raw);
  if (parsed.success) return ok(parsed.data);
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return err({
    code: 'DATASET_INVALID',
    message: `Invalid dataset: ${issues}`,
    path,
  });
};

export const loadDataset = async (
  path: string,
  options: DatasetOptions = {}
): Promise<Result<Project, DatasetError | SeriesError>> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    return err({
      code: 'DATASET_LOAD_FAILED',
      message: e instanceof Error ? e.message : 'Failed to read dataset',
      path,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err({
      code: 'DATASET_INVALID',
      message: e instanceof Error ? `Malformed JSON: ${e.message}` : 'Malformed JSON',
      path,
    });
  }

  const dataset = parseDataset(raw, path);
  if (!dataset.ok) return dataset;
  return buildProject(dataset.value, options);
};
