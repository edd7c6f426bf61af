/**
 * Command-line argument parsing for the sort and merge commands
 */

import { UsageError } from '../types/index.js';
import { isSamePath } from '../utils/paths.js';

export interface SortArgs {
  input: string;
  output: string;
  client: string;
  exclude?: string;
  verbose: boolean;
}

export interface MergeArgs {
  inputs: string[];
  output: string;
  verbose: boolean;
}

/**
 * Value following a flag, e.g. `-o out.xlsx`
 */
function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseSortArgs(args: string[], defaultOutput: string = 'output.xlsx'): SortArgs {
  const positional: string[] = [];
  let output = defaultOutput;
  let client: string | undefined;
  let exclude: string | undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '-o':
      case '--output':
        output = takeValue(args, i++, arg);
        break;
      case '--client':
        client = takeValue(args, i++, arg);
        break;
      case '--exclude':
        exclude = takeValue(args, i++, arg);
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [input, ...extra] = positional;
  if (!input) {
    throw new UsageError('No input capture file provided.');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }
  if (!client) {
    throw new UsageError('--client <file> is required.');
  }

  return exclude !== undefined
    ? { input, output, client, exclude, verbose }
    : { input, output, client, verbose };
}

/**
 * Parse merge arguments. Duplicate inputs are dropped, as is any input that
 * is the output file itself.
 */
export function parseMergeArgs(args: string[]): MergeArgs {
  const inputs: string[] = [];
  let output: string | undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '-o':
      case '--output':
        output = takeValue(args, i++, arg);
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (!inputs.some(existing => isSamePath(existing, arg))) {
          inputs.push(arg);
        }
    }
  }

  if (!output) {
    throw new UsageError('-o <file> is required.');
  }
  const target = output;
  const filtered = inputs.filter(input => !isSamePath(input, target));
  if (filtered.length < 1) {
    throw new UsageError('Need at least 1 input file');
  }

  return { inputs: filtered, output, verbose };
}
