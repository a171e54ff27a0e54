/**
 * Help text generation for CLI commands.
 */

const VERSION = '0.1.0';

const MAIN_HELP = `
depthstat v${VERSION}
Depth-weighted statistics for well log series, grouped by zones and flags.

USAGE:
  depthstat <command> [options]

COMMANDS:
  stats <dataset>       Grouped statistics for one property
  intervals <dataset>   Per-sample depth intervals for one property

OPTIONS:
  -h, --help            Show help
  -v, --version         Show version

Run 'depthstat <command> --help' for command-specific help.
`.trim();

const STATS_HELP = `
depthstat stats - Grouped statistics for one property

USAGE:
  depthstat stats <dataset> --property <name> [options]

ARGUMENTS:
  <dataset>             Path to a JSON dataset

OPTIONS:
  -p, --property <name> Property to aggregate (required)
  -w, --well <name>     Well to read (default: first well)
  --by <a,b,...>        Discrete classifiers, outermost first
  -m, --mode <mode>     weighted, arithmetic or both (default: by series kind)
  -o, --output <file>   Output file path
  --format <fmt>        Output format: json, markdown (default: json)
  -h, --help            Show this help

EXAMPLES:
  depthstat stats wells.json --property PHIE
  depthstat stats wells.json -p PHIE --by Tops,NTG_Flag --mode both
  depthstat stats wells.json -p PHIE -w W-2 --by Zone --format markdown
`.trim();

const INTERVALS_HELP = `
depthstat intervals - Per-sample depth intervals for one property

USAGE:
  depthstat intervals <dataset> --property <name> [options]

ARGUMENTS:
  <dataset>             Path to a JSON dataset

OPTIONS:
  -p, --property <name> Property to inspect (required)
  -w, --well <name>     Well to read (default: first well)
  -b, --boundaries <d>  Comma-separated depths to split at first
  -o, --output <file>   Output file path
  --format <fmt>        Output format: json, markdown (default: json)
  -h, --help            Show this help

EXAMPLES:
  depthstat intervals wells.json --property PHIE
  depthstat intervals wells.json -p NTG -b 1503,1520.5 --format markdown
`.trim();

export const getHelp = (subcommand: string | null): string => {
  switch (subcommand) {
    case 'stats':
      return STATS_HELP;
    case 'intervals':
      return INTERVALS_HELP;
    default:
      return MAIN_HELP;
  }
};

export const getVersion = (): string => VERSION;
