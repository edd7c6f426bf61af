/**
 * Classifier
 *
 * Assigns each device record to one report category. Precedence, first
 * rule wins:
 *
 *   1. no SSID                    -> unknown-device
 *   2. SSID matches client set    -> client-named
 *   3. SSID matches exclude set   -> excluded (left out of every tab)
 *   4. anything else              -> non-client-named
 *
 * An `<empty>` client pattern can never produce client-named: rule 1 runs
 * first.
 */

import type { Classification, DeviceRecord, Partition, SsidCount } from '../types/index.js';
import type { PatternSet } from '../patterns/pattern-set.js';

/**
 * SSID of a record, with anything missing or non-string read as empty
 */
function ssidOf(record: DeviceRecord): string {
  const ssid: unknown = record.ssid;
  return typeof ssid === 'string' ? ssid : '';
}

export function classify(
  record: DeviceRecord,
  client: PatternSet,
  exclude?: PatternSet | null
): Classification {
  const ssid = ssidOf(record);

  if (ssid === '') {
    return 'unknown-device';
  }
  if (client.matches(ssid)) {
    return 'client-named';
  }
  if (exclude?.matches(ssid)) {
    return 'excluded';
  }
  return 'non-client-named';
}

/**
 * Classify every record. Each output list keeps input order, and every
 * input record lands in exactly one list.
 */
export function partitionDevices(
  records: Iterable<DeviceRecord>,
  client: PatternSet,
  exclude?: PatternSet | null
): Partition {
  const partition: Partition = {
    clientNamed: [],
    nonClientNamed: [],
    unknownDevices: [],
    excluded: [],
  };

  for (const record of records) {
    switch (classify(record, client, exclude)) {
      case 'client-named':
        partition.clientNamed.push(record);
        break;
      case 'non-client-named':
        partition.nonClientNamed.push(record);
        break;
      case 'unknown-device':
        partition.unknownDevices.push(record);
        break;
      case 'excluded':
        partition.excluded.push(record);
        break;
    }
  }

  return partition;
}

/**
 * Device count per SSID, sorted by SSID
 */
export function summarizeBySsid(records: Iterable<DeviceRecord>): SsidCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const ssid = ssidOf(record);
    counts.set(ssid, (counts.get(ssid) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([ssid, count]) => ({ ssid, count }));
}
