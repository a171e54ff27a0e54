import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDataset, buildProject, loadDataset, TOPS_SERIES, TOPS_SOURCE } from './loader.ts';
import { getWell, getSeries } from '../project/well.ts';
import { unwrap } from '../result.ts';

const raw = {
  wells: [
    {
      name: 'W1',
      series: [
        { name: 'NTG', depths: [1500, 1501, 1505], values: [0, 1, -999.25], unit: 'v/v' },
        { name: 'CorePor', kind: 'sampled', source: 'core', depths: [1500.2], values: [0.21] },
      ],
      tops: [
        { surface: 'zone2', depth: 1503 },
        { surface: 'zone1', depth: 1500 },
      ],
    },
    {
      name: 'W2',
      tops: [{ surface: 'zone3', depth: 10 }],
    },
  ],
};

describe('parseDataset', () => {
  test('fills defaults for kind, source and series', () => {
    const dataset = unwrap(parseDataset(raw));
    const [w1, w2] = dataset.wells;
    expect(w1?.series[0]?.kind).toBe('continuous');
    expect(w1?.series[0]?.source).toBe('log');
    expect(w2?.series).toEqual([]);
  });

  test('requires at least one well', () => {
    const result = parseDataset({ wells: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DATASET_INVALID');
      expect(result.error.message).toBe('Invalid dataset: wells: Array must contain at least 1 element(s)');
    }
  });
});

describe('buildProject', () => {
  test('registers series under their source and tops as a classifier', () => {
    const project = unwrap(buildProject(unwrap(parseDataset(raw))));
    const w1 = unwrap(getWell(project, 'W1'));

    const ntg = unwrap(getSeries(w1, 'NTG', 'log'));
    expect(ntg.values.slice(0, 2)).toEqual([0, 1]);
    expect(ntg.values[2]).toBeNaN();
    expect(ntg.unit).toBe('v/v');

    expect(unwrap(getSeries(w1, 'CorePor', 'core')).kind).toBe('sampled');

    const tops = unwrap(getSeries(w1, TOPS_SERIES, TOPS_SOURCE));
    expect(tops.depths).toEqual([1500, 1503]);
    expect(tops.values).toEqual([0, 1]);
  });

  test('surface codes are shared across wells', () => {
    const project = unwrap(buildProject(unwrap(parseDataset(raw))));
    const w2 = unwrap(getWell(project, 'W2'));
    const tops = unwrap(getSeries(w2, TOPS_SERIES));
    expect(tops.values).toEqual([2]);
    expect(tops.labels?.get(2)).toBe('zone3');
  });

  test('honours a custom null value', () => {
    const project = unwrap(buildProject(unwrap(parseDataset(raw)), { nullValue: 0 }));
    const ntg = unwrap(getSeries(unwrap(getWell(project, 'W1')), 'NTG'));
    expect(ntg.values[0]).toBeNaN();
    expect(ntg.values[2]).toBe(-999.25);
  });

  test('fails on an inconsistent series', () => {
    const dataset = unwrap(parseDataset({
      wells: [{ name: 'W1', series: [{ name: 'GR', depths: [1, 2], values: [80] }] }],
    }));
    const result = buildProject(dataset);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_SERIES');
  });
});

describe('loadDataset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'depthstat-dataset-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads and builds a project from a file', async () => {
    const path = join(dir, 'wells.json');
    await writeFile(path, JSON.stringify(raw));
    const project = unwrap(await loadDataset(path));
    expect(project.wells.keys()).toEqual(['W1', 'W2']);
  });

  test('missing file fails to load', async () => {
    const result = await loadDataset(join(dir, 'missing.json'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('DATASET_LOAD_FAILED');
  });

  test('malformed JSON is invalid', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{"wells": [');
    const result = await loadDataset(path);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('DATASET_INVALID');
  });
});
