// ============================================================
// Object Forge - Command Line Arguments
// ============================================================

import {
  DEFAULT_NAME_LIST_PATH,
  DEFAULT_PREVIEW_COUNT,
  DEFAULT_RESULTS_PATH,
  DEFAULT_SCRIPT_COUNT,
} from '../shared/constants';

export class UsageError extends Error {
  readonly code = 'USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface NamesCommand {
  help: boolean;
  outPath: string;
  /** Empty means every category */
  categories: string[];
  preview: number;
}

export interface ScriptsCommand {
  help: boolean;
  count: number;
  inPath: string;
  outPath: string;
  fresh: boolean;
}

export const NAMES_USAGE = `Usage: generate-names [options]

Builds the sorted list of 3D object names.

Options:
  --out <path>        Output file (default: ${DEFAULT_NAME_LIST_PATH})
  --category <name>   Only include this category (repeatable)
  --preview <n>       Names to print after writing (default: ${DEFAULT_PREVIEW_COUNT})
  -h, --help          Show this help`;

export const SCRIPTS_USAGE = `Usage: generate-scripts [count] [options]

Generates a Blender script for each of the first <count> object names.

Options:
  --count <n>         Number of objects to process (default: ${DEFAULT_SCRIPT_COUNT})
  --in <path>         Name list to read (default: ${DEFAULT_NAME_LIST_PATH})
  --out <path>        Results file (default: ${DEFAULT_RESULTS_PATH})
  --fresh             Regenerate names already present in the results file
  -h, --help          Show this help

A positional count takes precedence over --count.`;

export function parseNamesArgs(argv: readonly string[]): NamesCommand {
  const command: NamesCommand = {
    help: false,
    outPath: DEFAULT_NAME_LIST_PATH,
    categories: [],
    preview: DEFAULT_PREVIEW_COUNT,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      command.help = true;
    } else if (arg === '--out') {
      command.outPath = takeValue(argv, i++, arg);
    } else if (arg === '--category') {
      command.categories.push(takeValue(argv, i++, arg));
    } else if (arg === '--preview') {
      command.preview = parseCount(takeValue(argv, i++, arg), arg, true);
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return command;
}

export function parseScriptsArgs(argv: readonly string[]): ScriptsCommand {
  let positional: number | undefined;
  let flagged: number | undefined;
  const command: ScriptsCommand = {
    help: false,
    count: DEFAULT_SCRIPT_COUNT,
    inPath: DEFAULT_NAME_LIST_PATH,
    outPath: DEFAULT_RESULTS_PATH,
    fresh: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      command.help = true;
    } else if (arg === '--count') {
      flagged = parseCount(takeValue(argv, i++, arg), arg, false);
    } else if (arg === '--in') {
      command.inPath = takeValue(argv, i++, arg);
    } else if (arg === '--out') {
      command.outPath = takeValue(argv, i++, arg);
    } else if (arg === '--fresh') {
      command.fresh = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown argument: ${arg}`);
    } else if (positional === undefined) {
      positional = parseCount(arg, 'count', false);
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  command.count = positional ?? flagged ?? DEFAULT_SCRIPT_COUNT;
  return command;
}

function takeValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parseCount(raw: string, label: string, allowZero: boolean): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || (!allowZero && value === 0)) {
    throw new UsageError(`${label} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
  }
  return value;
}
