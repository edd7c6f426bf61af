/**
 * wifi-sort - Core Library Exports
 *
 * `WifiSort` wires the capture reader, classifier and report builder
 * together. Pattern sets are loaded once per run and passed explicitly; nothing
 * is kept between runs.
 */

import { readCapture } from './capture/kismet-reader.js';
import { mergeCaptures, type MergeResult } from './capture/merge.js';
import { partitionDevices } from './classify/classifier.js';
import { loadPatternSet, PatternSet } from './patterns/pattern-set.js';
import { writeReport } from './report/workbook.js';
import type { DeviceRecord, Partition, WifiSortConfig } from './types/index.js';
import { CaptureReadError, DEFAULT_CONFIG, PatternFileError } from './types/index.js';
import type { Logger } from './utils/logger.js';
import { createConsoleLogger, silentLogger } from './utils/logger.js';

export interface PatternSources {
  /** Client pattern file (required, must hold at least one pattern) */
  client: string;
  /** Exclude pattern file */
  exclude?: string;
}

export interface LoadedPatterns {
  client: PatternSet;
  exclude: PatternSet | null;
}

export interface SortResult {
  outputPath: string;
  partition: Partition;
  patterns: LoadedPatterns;
  /** Devices read from the capture */
  total: number;
}

export class WifiSort {
  private config: WifiSortConfig;
  private logger: Logger;

  constructor(config: Partial<WifiSortConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger ?? (this.config.verbose ? createConsoleLogger(true) : silentLogger);
  }

  /**
   * Load client and exclude pattern sets
   * @throws PatternFileError for a missing file or an empty client set
   */
  async loadPatterns(sources: PatternSources): Promise<LoadedPatterns> {
    const options = { emptySsidToken: this.config.emptySsidToken };

    const client = await loadPatternSet(sources.client, options);
    if (client.isEmpty()) {
      throw new PatternFileError(sources.client, 'Client pattern file is empty');
    }

    const exclude = sources.exclude ? await loadPatternSet(sources.exclude, options) : null;

    this.logger.debug(`Using ${client.size} client patterns`);
    if (exclude && !exclude.isEmpty()) {
      this.logger.debug(`Using ${exclude.size} exclude patterns`);
    }

    return { client, exclude };
  }

  /**
   * Read 802.11 devices from a capture
   * @throws CaptureReadError when the capture holds none
   */
  readDevices(input: string): DeviceRecord[] {
    this.logger.debug(`Loading Kismet database: ${input}`);
    const { devices } = readCapture(input, this.logger);
    if (devices.length === 0) {
      throw new CaptureReadError(input, 'No WiFi devices found in database');
    }
    return devices;
  }

  /**
   * Classify a capture and write the three-tab workbook.
   * Patterns are loaded before the capture is opened, so a bad pattern file
   * fails the run before any classification.
   */
  async sort(input: string, sources: PatternSources): Promise<SortResult> {
    const patterns = await this.loadPatterns(sources);
    const devices = this.readDevices(input);
    const partition = partitionDevices(devices, patterns.client, patterns.exclude);

    const outputPath = await writeReport(
      this.config.outputPath,
      {
        'client-named': partition.clientNamed,
        'non-client-named': partition.nonClientNamed,
        'unknown-device': partition.unknownDevices,
      },
      this.config.report
    );

    return { outputPath, partition, patterns, total: devices.length };
  }

  /**
   * Merge captures into one database at `outputPath`
   * @throws MergeError when no input yields a device
   */
  merge(inputs: string[], outputPath: string): MergeResult {
    return mergeCaptures(inputs, outputPath, this.logger);
  }
}

// Re-export types and utilities
export * from './types/index.js';
export { compilePattern, compilePatterns } from './patterns/compiler.js';
export { PatternSet, loadPatternSet, matchesPattern } from './patterns/pattern-set.js';
export { classify, partitionDevices, summarizeBySsid } from './classify/classifier.js';
export { readCapture, toDeviceRecord } from './capture/kismet-reader.js';
export { mergeCaptures, mergeDeviceDocuments } from './capture/merge.js';
export { buildWorkbook, writeReport, REPORT_COLUMNS } from './report/workbook.js';
export { createConsoleLogger, silentLogger, type Logger } from './utils/logger.js';
