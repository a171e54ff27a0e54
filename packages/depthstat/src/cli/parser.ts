/**
 * CLI argument parser.
 * Hand-rolled over process.argv - simple enough, zero deps.
 */

import type { Command, ParseError, OutputFormat, CalculationMode } from '../types.ts';
import { ok, err } from '../result.ts';
import type { Result } from '../types.ts';

const VALID_FORMATS = ['json', 'markdown'] as const;

const VALID_MODES = ['weighted', 'arithmetic', 'both'] as const;

const isValidFormat = (value: string): value is OutputFormat =>
  VALID_FORMATS.some((format) => format === value);

const isValidMode = (value: string): value is CalculationMode =>
  VALID_MODES.some((mode) => mode === value);

interface ParsedFlags {
  readonly positional: readonly string[];
  readonly flags: Record<string, string | true>;
}

/** A value that starts with "-" but is a number, e.g. a negative boundary. */
const isNumeric = (arg: string): boolean => arg.trim() !== '' && !Number.isNaN(Number(arg));

const takesValue = (next: string | undefined): next is string =>
  next !== undefined && (!next.startsWith('-') || isNumeric(next));

const parseFlags = (args: readonly string[]): ParsedFlags => {
  const positional: string[] = [];
  const flags: Record<string, string | true> = {};

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === undefined) {
      i++;
      continue;
    }

    const isLong = arg.startsWith('--');
    const isShort = !isLong && arg.startsWith('-') && arg.length === 2;
    if (isLong || isShort) {
      const key = arg.slice(isLong ? 2 : 1);
      const next = args[i + 1];
      if (takesValue(next)) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i++;
      }
    } else {
      positional.push(arg);
      i++;
    }
  }

  return { positional, flags };
};

const getFlag = (
  flags: Record<string, string | true>,
  ...keys: readonly string[]
): string | null => {
  for (const key of keys) {
    const value = flags[key];
    if (typeof value === 'string') return value;
  }
  return null;
};

const hasFlag = (
  flags: Record<string, string | true>,
  ...keys: readonly string[]
): boolean => keys.some((key) => key in flags);

const splitList = (value: string | null): string[] =>
  value === null
    ? []
    : value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);

const getFormat = (
  flags: Record<string, string | true>
): Result<OutputFormat | null, ParseError> => {
  const format = getFlag(flags, 'format', 'f');
  if (format === null) return ok(null);
  if (isValidFormat(format)) return ok(format);
  return err({
    code: 'INVALID_ARG_VALUE',
    message: `Invalid format: "${format}". Must be one of: ${VALID_FORMATS.join(', ')}`,
    arg: 'format',
  });
};

const getMode = (
  flags: Record<string, string | true>
): Result<CalculationMode | null, ParseError> => {
  const mode = getFlag(flags, 'mode', 'm');
  if (mode === null) return ok(null);
  if (isValidMode(mode)) return ok(mode);
  return err({
    code: 'INVALID_ARG_VALUE',
    message: `Invalid mode: "${mode}". Must be one of: ${VALID_MODES.join(', ')}`,
    arg: 'mode',
  });
};

const getBoundaries = (
  flags: Record<string, string | true>
): Result<number[], ParseError> => {
  const items = splitList(getFlag(flags, 'boundaries', 'b'));
  const depths = items.map(Number);
  const bad = items.find((_, i) => !Number.isFinite(depths[i]));
  if (bad !== undefined) {
    return err({
      code: 'INVALID_ARG_VALUE',
      message: `Invalid boundary depth: "${bad}". Must be a number.`,
      arg: 'boundaries',
    });
  }
  return ok(depths);
};

interface DatasetArgs {
  readonly dataset: string;
  readonly property: string;
}

const getDatasetArgs = (
  positional: readonly string[],
  flags: Record<string, string | true>
): Result<DatasetArgs, ParseError> => {
  const dataset = positional[1];
  if (dataset === undefined) {
    return err({
      code: 'MISSING_REQUIRED_ARG',
      message: 'Missing required argument: <dataset>',
      arg: 'dataset',
    });
  }

  const property = getFlag(flags, 'property', 'p');
  if (property === null) {
    return err({
      code: 'MISSING_REQUIRED_ARG',
      message: 'Missing required option: --property',
      arg: 'property',
    });
  }

  return ok({ dataset, property });
};

const parseStats = (
  positional: readonly string[],
  flags: Record<string, string | true>
): Result<Command, ParseError> => {
  const argsResult = getDatasetArgs(positional, flags);
  if (!argsResult.ok) return argsResult;

  const formatResult = getFormat(flags);
  if (!formatResult.ok) return formatResult;

  const modeResult = getMode(flags);
  if (!modeResult.ok) return modeResult;

  return ok({
    command: 'stats',
    ...argsResult.value,
    well: getFlag(flags, 'well', 'w'),
    by: splitList(getFlag(flags, 'by')),
    mode: modeResult.value,
    format: formatResult.value,
    output: getFlag(flags, 'output', 'o'),
  });
};

const parseIntervals = (
  positional: readonly string[],
  flags: Record<string, string | true>
): Result<Command, ParseError> => {
  const argsResult = getDatasetArgs(positional, flags);
  if (!argsResult.ok) return argsResult;

  const formatResult = getFormat(flags);
  if (!formatResult.ok) return formatResult;

  const boundariesResult = getBoundaries(flags);
  if (!boundariesResult.ok) return boundariesResult;

  return ok({
    command: 'intervals',
    ...argsResult.value,
    well: getFlag(flags, 'well', 'w'),
    boundaries: boundariesResult.value,
    format: formatResult.value,
    output: getFlag(flags, 'output', 'o'),
  });
};

export const parse = (argv: readonly string[]): Result<Command, ParseError> => {
  // Skip node executable and script path
  const args = argv.slice(2);
  const { positional, flags } = parseFlags(args);

  if (hasFlag(flags, 'version', 'v')) {
    return ok({ command: 'version' });
  }

  if (hasFlag(flags, 'help', 'h')) {
    return ok({ command: 'help', subcommand: positional[0] ?? null });
  }

  const command = positional[0];

  if (command === undefined) {
    return ok({ command: 'help', subcommand: null });
  }

  switch (command) {
    case 'stats':
      return parseStats(positional, flags);
    case 'intervals':
      return parseIntervals(positional, flags);
    case 'help':
      return ok({ command: 'help', subcommand: positional[1] ?? null });
    default:
      return err({
        code: 'UNKNOWN_COMMAND',
        message: `Unknown command: "${command}"`,
        arg: command,
      });
  }
};
