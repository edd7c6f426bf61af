#!/usr/bin/env node
/**
 * wifi-sort CLI
 *
 * Usage:
 *   wifi-sort sort <capture.kismet> --client FILE [--exclude FILE] [-o out.xlsx] [-v]
 *   wifi-sort merge <a.kismet> <b.kismet> ... -o merged.kismet [-v]
 *   wifi-sort help
 */

import { WifiSort } from './core.js';
import { parseMergeArgs, parseSortArgs } from './cli/args.js';
import { printMergeSummary, printSortSummary } from './cli/output.js';
import { UsageError } from './types/index.js';
import { createConsoleLogger } from './utils/logger.js';

const args = process.argv.slice(2);
const command = args[0];

async function main() {
  try {
    switch (command) {
      case 'sort':
        await handleSort(args.slice(1));
        break;

      case 'merge':
        handleMerge(args.slice(1));
        break;

      case 'help':
      case '--help':
      case '-h':
      case undefined:
        printHelp();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof UsageError) {
      console.error("Run 'wifi-sort help' for usage.");
    }
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// sort
// ---------------------------------------------------------------------------

async function handleSort(sortArgs: string[]) {
  const options = parseSortArgs(sortArgs);
  const logger = createConsoleLogger(options.verbose);
  const wifiSort = new WifiSort({ outputPath: options.output, verbose: options.verbose }, logger);

  const result = await wifiSort.sort(
    options.input,
    options.exclude !== undefined
      ? { client: options.client, exclude: options.exclude }
      : { client: options.client }
  );

  printSortSummary(logger, options.output, result.partition, options.verbose);
}

// ---------------------------------------------------------------------------
// merge
// ---------------------------------------------------------------------------

function handleMerge(mergeArgs: string[]) {
  const options = parseMergeArgs(mergeArgs);
  const logger = createConsoleLogger(options.verbose);
  const wifiSort = new WifiSort({ verbose: options.verbose }, logger);

  logger.debug(`Merging ${options.inputs.length} files -> ${options.output}\n`);

  const result = wifiSort.merge(options.inputs, options.output);

  printMergeSummary(logger, options.output, result);
}

function printHelp() {
  console.log(`
wifi-sort - Sort Kismet captures into a categorized Excel workbook

USAGE:
  wifi-sort <command> [arguments]

COMMANDS:
  sort <capture.kismet>   Extract WiFi devices into a 3-tab workbook
                            --client FILE    Client SSID patterns (required)
                            --exclude FILE   SSIDs to leave out of tab 2
                            -o, --output     Output file (default: output.xlsx)
                            -v, --verbose    Show per-SSID counts
  merge <file.kismet...>  Merge captures, deduplicating devices by MAC
                            -o, --output     Output .kismet file (required)
                            -v, --verbose    Show detailed output
  help                    Show this help message

TABS:
  1. Client-Named       SSIDs matching --client patterns
  2. Non-Client-Named   Other identified SSIDs (minus --exclude matches)
  3. Unknown Devices    Devices with no SSID

PATTERN FILES (one pattern per line, case-sensitive):
  MyNetwork         Exactly "MyNetwork"
  testwifi123*      SSIDs starting with "testwifi123"
  *-guest           SSIDs ending with "-guest"
  *corp*            SSIDs containing "corp"
  <empty>           The empty SSID (hidden devices still go to tab 3)
  # comment         Ignored, as are blank lines

EXAMPLES:
  wifi-sort sort capture.kismet -o sorted.xlsx --client client.txt --exclude known.txt
  wifi-sort merge day1.kismet day2.kismet -o combined.kismet -v
`);
}

main().catch(console.error);
