#!/usr/bin/env node
/**
 * depthstat CLI entry point.
 */

import { parse } from './parser.ts';
import { getHelp, getVersion } from './help.ts';
import { executeStats } from './commands/stats.ts';
import { executeIntervals } from './commands/intervals.ts';
import { match } from '../result.ts';
import type { Command } from '../types.ts';

const runCommand = async (command: Command): Promise<number> => {
  switch (command.command) {
    case 'help':
      console.log(getHelp(command.subcommand));
      return 0;

    case 'version':
      console.log(`depthstat v${getVersion()}`);
      return 0;

    case 'stats':
      return executeStats(command);

    case 'intervals':
      return executeIntervals(command);
  }
};

const main = async (): Promise<void> => {
  const result = parse(process.argv);

  const exitCode = await match(result, {
    ok: runCommand,
    err: (error) => {
      console.error(`Error: ${error.message}`);
      if (error.code === 'UNKNOWN_COMMAND') {
        console.error(`Run 'depthstat --help' for usage information.`);
      }
      return Promise.resolve(1);
    },
  });

  process.exit(exitCode);
};

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
