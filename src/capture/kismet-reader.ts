/**
 * Kismet capture reader
 *
 * Opens a `.kismet` database read-only and turns every 802.11 device in the
 * `devices` table into a DeviceRecord. Non-802.11 devices and unparseable
 * blobs are skipped.
 */

import { existsSync } from 'fs';
import type { DeviceRecord } from '../types/index.js';
import { CaptureReadError } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { resolveUserPath } from '../utils/paths.js';
import { createDatabase, listTables, type SqliteDatabase } from './sqlite-adapter.js';
import {
  PHY_80211,
  parseDeviceBlob,
  readDevice,
  type KismetDevice,
  type KismetDocument,
} from './kismet-schema.js';
import { describeCrypt, resolveChannel, toMhz } from './radio.js';

export interface ReadCaptureResult {
  devices: DeviceRecord[];
  /** Tables present in the capture */
  tables: string[];
  /** Rows whose device blob could not be parsed */
  skipped: number;
}

/**
 * First non-empty SSID the device advertised, else the first it probed for
 */
export function pickSsid(device: KismetDevice): string {
  const dot11 = device['dot11.device'];

  for (const entry of dot11?.['dot11.device.advertised_ssid_map'] ?? []) {
    const ssid = entry['dot11.advertisedssid.ssid'];
    if (ssid) return ssid;
  }
  for (const entry of dot11?.['dot11.device.probed_ssid_map'] ?? []) {
    const ssid = entry['dot11.probedssid.ssid'];
    if (ssid) return ssid;
  }
  return '';
}

/**
 * Encryption of the first advertised SSID; '' for devices that advertise none
 */
function pickEncryption(device: KismetDevice): string {
  const first = device['dot11.device']?.['dot11.device.advertised_ssid_map']?.[0];
  if (!first) {
    return '';
  }
  return describeCrypt(first['dot11.advertisedssid.crypt_set'] ?? 0);
}

/**
 * Map a Kismet device document to a DeviceRecord.
 * Returns null for devices that are not 802.11.
 */
export function toDeviceRecord(device: KismetDevice): DeviceRecord | null {
  if (device['kismet.device.base.phyname'] !== PHY_80211) {
    return null;
  }

  const freq = device['kismet.device.base.frequency'];
  const signal = device['kismet.device.base.signal'];
  const avgLoc = device['kismet.device.base.location']?.['kismet.common.location.avg_loc'];
  const geopoint = avgLoc?.['kismet.common.location.geopoint'] ?? [];

  return {
    mac: device['kismet.device.base.macaddr'] ?? '',
    ssid: pickSsid(device),
    type: device['kismet.device.base.type'] ?? 'Unknown',
    manufacturer: device['kismet.device.base.manuf'] ?? '',
    encryption: pickEncryption(device),
    channel: resolveChannel(device['kismet.device.base.channel'], freq),
    frequencyMhz: toMhz(freq) ?? 0,
    rssiLast: signal?.['kismet.common.signal.last_signal'] ?? null,
    rssiMin: signal?.['kismet.common.signal.min_signal'] ?? null,
    rssiMax: signal?.['kismet.common.signal.max_signal'] ?? null,
    packetsTotal: device['kismet.device.base.packets.total'] ?? 0,
    packetsData: device['kismet.device.base.packets.data'] ?? 0,
    dataSizeBytes: device['kismet.device.base.datasize'] ?? 0,
    firstSeen: device['kismet.device.base.first_time'] ?? 0,
    lastSeen: device['kismet.device.base.last_time'] ?? 0,
    latitude: geopoint[1] ?? null,
    longitude: geopoint[0] ?? null,
    altitude: avgLoc?.['kismet.common.location.alt'] ?? null,
  };
}

/**
 * Open a capture read-only
 * @throws CaptureReadError when the file is missing or not SQLite
 */
export function openCapture(path: string): SqliteDatabase {
  const resolved = resolveUserPath(path);
  if (!existsSync(resolved)) {
    throw new CaptureReadError(path, `Input file '${path}' not found`);
  }
  let db: SqliteDatabase | undefined;
  try {
    db = createDatabase(resolved, { readonly: true, fileMustExist: true });
    // The header is only checked on first query
    listTables(db);
    return db;
  } catch (error) {
    db?.close();
    throw new CaptureReadError(path, `'${path}' is not a readable capture database`, { cause: error });
  }
}

/**
 * Device blobs from the `devices` table, in row order.
 * Yields null for a blob that is not a JSON object.
 */
export function* readDeviceDocuments(db: SqliteDatabase): Generator<KismetDocument | null> {
  const rows = db.prepare('SELECT device FROM devices').all();
  for (const row of rows) {
    const blob = typeof row === 'object' && row !== null && 'device' in row ? row.device : null;
    yield parseDeviceBlob(blob);
  }
}

/**
 * Read every 802.11 device from a capture
 * @throws CaptureReadError when the file cannot be opened or its devices queried
 */
export function readCapture(path: string, logger: Logger = silentLogger): ReadCaptureResult {
  const db = openCapture(path);
  try {
    return collectRecords(db, logger);
  } catch (error) {
    throw new CaptureReadError(path, `Could not read devices from '${path}'`, { cause: error });
  } finally {
    db.close();
  }
}

function collectRecords(db: SqliteDatabase, logger: Logger): ReadCaptureResult {
  const tables = listTables(db);
  logger.debug(`Tables in database: ${tables.join(', ')}`);

  const result: ReadCaptureResult = { devices: [], tables, skipped: 0 };
  if (!tables.includes('devices')) {
    return result;
  }

  for (const document of readDeviceDocuments(db)) {
    if (!document) {
      result.skipped++;
      logger.debug('Warning: Could not parse device');
      continue;
    }
    const record = toDeviceRecord(readDevice(document));
    if (record) {
      result.devices.push(record);
    }
  }

  logger.debug(`Extracted ${result.devices.length} WiFi devices`);
  return result;
}
