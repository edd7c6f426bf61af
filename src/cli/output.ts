/**
 * Console summaries for the sort and merge commands
 */

import { summarizeBySsid } from '../classify/classifier.js';
import type { MergeResult } from '../capture/merge.js';
import type { DeviceRecord, Partition } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export function printSortSummary(logger: Logger, output: string, partition: Partition, verbose: boolean): void {
  logger.info(`Created ${output}:`);
  logger.info(`  Client-Named:     ${partition.clientNamed.length} devices`);
  logger.info(`  Non-Client-Named: ${partition.nonClientNamed.length} devices`);
  logger.info(`  Unknown Devices:  ${partition.unknownDevices.length} devices`);

  if (!verbose) {
    return;
  }

  printSsidList(logger, 'Client-Named SSIDs', partition.clientNamed);
  printSsidList(logger, 'Non-Client-Named SSIDs', partition.nonClientNamed);
  if (partition.excluded.length > 0) {
    printSsidList(logger, 'Excluded SSIDs (not in output)', partition.excluded);
  }
}

function printSsidList(logger: Logger, title: string, records: DeviceRecord[]): void {
  logger.info(`\n${title}:`);
  for (const { ssid, count } of summarizeBySsid(records)) {
    logger.info(`    ${ssid} (${count})`);
  }
}

export function printMergeSummary(logger: Logger, output: string, result: MergeResult): void {
  logger.info(`\nSuccessfully created: ${output}`);
  logger.info(`  ${result.devices} unique devices from ${result.filesProcessed} files`);
  if (result.failedFiles.length > 0) {
    logger.warn(`  ${result.failedFiles.length} file(s) could not be read`);
  }
}
