/**
 * Configuration file loader.
 * Reads depthstat.config.json from the working directory and merges it over
 * the defaults.
 */

import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Result, DepthstatConfig, ConfigError } from '../types.ts';
import { ok, err } from '../result.ts';
import { DEFAULT_CONFIG } from './defaults.ts';

export const CONFIG_FILENAME = 'depthstat.config.json';

export const ConfigFileSchema = z.object({
  nullValue: z.number().finite().optional(),
  statistics: z.object({
    mode: z.enum(['auto', 'weighted', 'arithmetic', 'both']).optional(),
  }).strict().optional(),
  grouping: z.object({
    alignment: z.enum(['project', 'strict']).optional(),
    onEmptyGroup: z.enum(['omit', 'error']).optional(),
    discreteResample: z.enum(['previous', 'nearest']).optional(),
  }).strict().optional(),
  output: z.object({
    format: z.enum(['json', 'markdown']).optional(),
    precision: z.number().int().min(0).max(12).optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const findConfigFile = async (cwd: string): Promise<string | null> => {
  const path = join(cwd, CONFIG_FILENAME);
  try {
    await access(path);
    return path;
  } catch {
    return null;
  }
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

export const parseConfig = (raw: unknown, path?: string): Result<ConfigFile, ConfigError> => {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (parsed.success) return ok(parsed.data);
  return err({
    code: 'CONFIG_INVALID',
    message: `Invalid configuration: ${formatIssues(parsed.error)}`,
    path,
  });
};

const loadConfigFile = async (path: string): Promise<Result<ConfigFile, ConfigError>> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    return err({
      code: 'CONFIG_LOAD_FAILED',
      message: e instanceof Error ? e.message : 'Failed to read config file',
      path,
    });
  }

  try {
    return parseConfig(JSON.parse(text), path);
  } catch (e) {
    return err({
      code: 'CONFIG_INVALID',
      message: e instanceof Error ? `Malformed JSON: ${e.message}` : 'Malformed JSON',
      path,
    });
  }
};

export const mergeConfig = (base: DepthstatConfig, override: ConfigFile): DepthstatConfig => ({
  nullValue: override.nullValue ?? base.nullValue,
  statistics: { ...base.statistics, ...override.statistics },
  grouping: { ...base.grouping, ...override.grouping },
  output: { ...base.output, ...override.output },
});

export const loadConfig = async (
  cwd: string = process.cwd()
): Promise<Result<DepthstatConfig, ConfigError>> => {
  const configPath = await findConfigFile(cwd);

  if (configPath === null) {
    return ok(DEFAULT_CONFIG);
  }

  const configResult = await loadConfigFile(configPath);
  if (!configResult.ok) {
    return configResult;
  }

  return ok(mergeConfig(DEFAULT_CONFIG, configResult.value));
};
