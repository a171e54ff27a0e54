/**
 * Setup shared by the dataset commands: config, dataset, well selection,
 * output.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Result, DepthstatConfig, Well } from '../../types.ts';
import { ok, err } from '../../result.ts';
import { loadConfig } from '../../config/index.ts';
import { loadDataset } from '../../dataset/loader.ts';
import { getWell, firstWell } from '../../project/well.ts';

export interface CommandContext {
  readonly config: DepthstatConfig;
  readonly well: Well;
}

interface ContextRequest {
  readonly dataset: string;
  readonly well: string | null;
}

export const loadContext = async (
  request: ContextRequest,
  cwd: string = process.cwd()
): Promise<Result<CommandContext, string>> => {
  const configResult = await loadConfig(cwd);
  if (!configResult.ok) {
    return err(`Config error (${configResult.error.path ?? 'config'}): ${configResult.error.message}`);
  }
  const config = configResult.value;

  const projectResult = await loadDataset(resolve(cwd, request.dataset), { nullValue: config.nullValue });
  if (!projectResult.ok) {
    return err(`Dataset error: ${projectResult.error.message}`);
  }

  const project = projectResult.value;
  const wellResult = request.well === null ? firstWell(project) : getWell(project, request.well);
  if (!wellResult.ok) return err(wellResult.error.message);

  return ok({ config, well: wellResult.value });
};

export const writeOutput = async (text: string, output: string | null): Promise<number> => {
  if (output === null) {
    console.log(text);
    return 0;
  }

  try {
    await writeFile(output, text + '\n');
  } catch (e) {
    console.error(`Error: failed to write ${output}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
  console.error(`Wrote ${output}`);
  return 0;
};
