/**
 * Wells and projects.
 * A well keeps its series grouped by source tag (a log run, a tops import,
 * a caller-chosen destination for derived series).
 */

import type {
  Result,
  DepthSeries,
  Well,
  Project,
  GroupOptions,
  GroupedStatistics,
  ProjectError,
  AmbiguousSeriesError,
  NotFoundError,
  Registry,
} from '../types.ts';
import { ok, err, all } from '../result.ts';
import { createRegistry } from './registry.ts';
import { groupStatistics } from '../engine/group.ts';

export const createWell = (name: string): Well => ({
  name,
  sources: createRegistry<Registry<DepthSeries>>('Source'),
});

const sourceRegistry = (well: Well, source: string): Registry<DepthSeries> => {
  const existing = well.sources.get(source);
  if (existing.ok) return existing.value;
  const created = createRegistry<DepthSeries>('Series');
  well.sources.register(source, created);
  return created;
};

/** Adds (or replaces) `series` under `source`. */
export const addSeries = (well: Well, source: string, series: DepthSeries): Well => {
  sourceRegistry(well, source).register(series.name, series);
  return well;
};

/**
 * Stores a derived series under an explicit destination tag; there is no
 * implicit bucket for computed series.
 */
export const deriveSeries = (well: Well, destination: string, series: DepthSeries): DepthSeries => {
  addSeries(well, destination, series);
  return series;
};

export const seriesNames = (well: Well): string[] => [
  ...new Set(well.sources.entries().flatMap(([, registry]) => registry.keys())),
];

export const getSeries = (
  well: Well,
  name: string,
  source?: string
): Result<DepthSeries, NotFoundError | AmbiguousSeriesError> => {
  if (source !== undefined) {
    const registry = well.sources.get(source);
    if (!registry.ok) return registry;
    return registry.value.get(name);
  }

  const matches = well.sources.entries().filter(([, registry]) => registry.has(name));
  const [match, ...others] = matches;
  if (match === undefined) {
    const available = seriesNames(well);
    return err({
      code: 'NOT_FOUND',
      message: `Series "${name}" not found in well "${well.name}". Available: ${available.join(', ') || 'none'}`,
      kind: 'Series',
      key: name,
      available,
    });
  }
  if (others.length > 0) {
    const sources = matches.map(([tag]) => tag);
    return err({
      code: 'AMBIGUOUS_SERIES',
      message: `Series "${name}" exists in several sources of well "${well.name}" (${sources.join(', ')}); pass a source`,
      name,
      sources,
    });
  }
  return match[1].get(name);
};

export interface WellStatisticsRequest {
  readonly property: string;
  readonly source?: string;
  readonly classifiers?: readonly string[];
  readonly options?: GroupOptions;
}

export const wellStatistics = (
  well: Well,
  request: WellStatisticsRequest
): Result<GroupedStatistics, ProjectError> => {
  const series = getSeries(well, request.property, request.source);
  if (!series.ok) return series;

  const classifiers = all((request.classifiers ?? []).map((name) => getSeries(well, name)));
  if (!classifiers.ok) return classifiers;

  return groupStatistics(series.value, classifiers.value, request.options);
};

export const createProject = (): Project => ({
  wells: createRegistry<Well>('Well'),
});

export const addWell = (project: Project, name: string): Well => {
  const existing = project.wells.get(name);
  if (existing.ok) return existing.value;
  const well = createWell(name);
  project.wells.register(name, well);
  return well;
};

export const getWell = (project: Project, name: string): Result<Well, NotFoundError> =>
  project.wells.get(name);

export const firstWell = (project: Project): Result<Well, NotFoundError> => {
  const [entry] = project.wells.entries();
  if (entry !== undefined) return ok(entry[1]);
  return err({
    code: 'NOT_FOUND',
    message: 'Project has no wells',
    kind: 'Well',
    key: '',
    available: [],
  });
};
