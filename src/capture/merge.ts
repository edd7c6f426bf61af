/**
 * Capture merging
 *
 * Folds several `.kismet` captures into one, keyed by MAC address. When the
 * same device appears more than once:
 *   - packet and byte counts are summed
 *   - first seen is the earliest non-zero time, last seen the latest
 *   - max signal keeps the strongest, min signal the weakest
 *   - last signal comes from the more recent sighting
 *   - location is filled in only where the earlier record had none
 */

import { existsSync, unlinkSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { resolveOutputPath } from '../utils/paths.js';
import { MergeError } from '../types/index.js';
import { createDatabase, listTables } from './sqlite-adapter.js';
import { readDevice, type KismetDocument } from './kismet-schema.js';
import { openCapture, readDeviceDocuments } from './kismet-reader.js';

/** Kismet database schema version written to the KISMET table */
export const MERGED_DB_VERSION = 6;

export interface MergeResult {
  /** Unique devices written */
  devices: number;
  /** Device rows read across all inputs */
  totalEntries: number;
  filesProcessed: number;
  failedFiles: string[];
}

// =============================================================================
// Document merging
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `incoming` into `existing` and return the result. Neither input is
 * modified.
 */
export function mergeDeviceDocuments(existing: KismetDocument, incoming: KismetDocument): KismetDocument {
  const a = readDevice(existing);
  const b = readDevice(incoming);
  const merged: KismetDocument = { ...existing };

  const sum = (key: 'kismet.device.base.packets.total' | 'kismet.device.base.packets.data' | 'kismet.device.base.datasize') =>
    (a[key] ?? 0) + (b[key] ?? 0);

  merged['kismet.device.base.packets.total'] = sum('kismet.device.base.packets.total');
  merged['kismet.device.base.packets.data'] = sum('kismet.device.base.packets.data');
  merged['kismet.device.base.datasize'] = sum('kismet.device.base.datasize');

  const firstA = a['kismet.device.base.first_time'] ?? 0;
  const firstB = b['kismet.device.base.first_time'] ?? 0;
  if (firstB > 0) {
    merged['kismet.device.base.first_time'] = firstA === 0 ? firstB : Math.min(firstA, firstB);
  }

  const lastA = a['kismet.device.base.last_time'] ?? 0;
  const lastB = b['kismet.device.base.last_time'] ?? 0;
  merged['kismet.device.base.last_time'] = Math.max(lastA, lastB);

  const signalA = existing['kismet.device.base.signal'];
  const signalB = incoming['kismet.device.base.signal'];
  if (isRecord(signalB) && Object.keys(signalB).length > 0) {
    if (!isRecord(signalA) || Object.keys(signalA).length === 0) {
      merged['kismet.device.base.signal'] = signalB;
    } else {
      const signal: Record<string, unknown> = { ...signalA };
      const sa = a['kismet.device.base.signal'];
      const sb = b['kismet.device.base.signal'];

      const maxA = sa?.['kismet.common.signal.max_signal'] ?? null;
      const maxB = sb?.['kismet.common.signal.max_signal'] ?? null;
      if (maxB !== null && (maxA === null || maxB > maxA)) {
        signal['kismet.common.signal.max_signal'] = maxB;
      }

      const minA = sa?.['kismet.common.signal.min_signal'] ?? null;
      const minB = sb?.['kismet.common.signal.min_signal'] ?? null;
      if (minB !== null && (minA === null || minB < minA)) {
        signal['kismet.common.signal.min_signal'] = minB;
      }

      const lastSignalB = sb?.['kismet.common.signal.last_signal'] ?? null;
      if (lastB >= lastA && lastSignalB !== null) {
        signal['kismet.common.signal.last_signal'] = lastSignalB;
      }

      merged['kismet.device.base.signal'] = signal;
    }
  }

  const hasAvgLoc = (device: typeof a) =>
    Boolean(device['kismet.device.base.location']?.['kismet.common.location.avg_loc']);
  if (hasAvgLoc(b) && !hasAvgLoc(a)) {
    merged['kismet.device.base.location'] = incoming['kismet.device.base.location'];
  }

  return merged;
}

/**
 * Fold documents into a MAC-keyed map, in order. Documents without a MAC are
 * dropped. Returns the number of documents taken.
 */
export function collectDevices(
  merged: Map<string, KismetDocument>,
  documents: Iterable<KismetDocument>
): number {
  let taken = 0;
  for (const document of documents) {
    const mac = readDevice(document)['kismet.device.base.macaddr'];
    if (!mac) continue;

    const current = merged.get(mac);
    merged.set(mac, current ? mergeDeviceDocuments(current, document) : document);
    taken++;
  }
  return taken;
}

// =============================================================================
// Output database
// =============================================================================

const DEVICES_SCHEMA = `
  CREATE TABLE devices (
    first_time INT,
    last_time INT,
    devkey TEXT,
    phyname TEXT,
    devmac TEXT,
    strongest_signal INT,
    min_lat REAL,
    min_lon REAL,
    max_lat REAL,
    max_lon REAL,
    avg_lat REAL,
    avg_lon REAL,
    bytes_data INT,
    type TEXT,
    device BLOB
  );

  CREATE INDEX devices_devkey ON devices (devkey);
  CREATE INDEX devices_devmac ON devices (devmac);
  CREATE INDEX devices_first_time ON devices (first_time);
  CREATE INDEX devices_last_time ON devices (last_time);
  CREATE INDEX devices_phyname ON devices (phyname);
  CREATE INDEX devices_type ON devices (type);

  CREATE TABLE IF NOT EXISTS KISMET (
    kismet_version TEXT,
    build_uuid TEXT,
    build_compile TEXT,
    db_version INT
  );
`;

/**
 * Column values for one row of the `devices` table
 */
export function deviceColumns(document: KismetDocument): unknown[] {
  const device = readDevice(document);
  const location = device['kismet.device.base.location'];
  const point = (key: 'kismet.common.location.avg_loc' | 'kismet.common.location.min_loc' | 'kismet.common.location.max_loc') =>
    location?.[key]?.['kismet.common.location.geopoint'] ?? [];
  const avg = point('kismet.common.location.avg_loc');
  const min = point('kismet.common.location.min_loc');
  const max = point('kismet.common.location.max_loc');

  return [
    device['kismet.device.base.first_time'] ?? 0,
    device['kismet.device.base.last_time'] ?? 0,
    device['kismet.device.base.key'] ?? '',
    device['kismet.device.base.phyname'] ?? '',
    device['kismet.device.base.macaddr'] ?? '',
    device['kismet.device.base.signal']?.['kismet.common.signal.max_signal'] ?? 0,
    min[1] ?? 0,
    min[0] ?? 0,
    max[1] ?? 0,
    max[0] ?? 0,
    avg[1] ?? 0,
    avg[0] ?? 0,
    device['kismet.device.base.datasize'] ?? 0,
    device['kismet.device.base.type'] ?? '',
    JSON.stringify(document),
  ];
}

/**
 * Write merged devices to a fresh capture database, replacing any file at
 * `outputPath`
 */
export function writeMergedCapture(outputPath: string, devices: Iterable<KismetDocument>): void {
  const resolved = resolveOutputPath(outputPath);
  if (existsSync(resolved)) {
    unlinkSync(resolved);
  }

  const db = createDatabase(resolved);
  try {
    db.exec(DEVICES_SCHEMA);

    const insert = db.prepare(`
      INSERT INTO devices
      (first_time, last_time, devkey, phyname, devmac, strongest_signal,
       min_lat, min_lon, max_lat, max_lon, avg_lat, avg_lon, bytes_data, type, device)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const meta = db.prepare(
      'INSERT INTO KISMET (kismet_version, build_uuid, build_compile, db_version) VALUES (?, ?, ?, ?)'
    );

    db.transaction(() => {
      for (const document of devices) {
        insert.run(...deviceColumns(document));
      }
      meta.run('merged', uuidv4(), new Date().toISOString(), MERGED_DB_VERSION);
    });
  } finally {
    db.close();
  }
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Every parseable device document in one input. Nothing is merged until the
 * whole file has been read, so a file that fails midway contributes nothing.
 */
function readInputDocuments(input: string): KismetDocument[] {
  const db = openCapture(input);
  try {
    if (!listTables(db).includes('devices')) {
      return [];
    }
    return [...readDeviceDocuments(db)].filter((d): d is KismetDocument => d !== null);
  } finally {
    db.close();
  }
}

/**
 * Merge `inputs` into `outputPath`. Unreadable inputs are reported and
 * skipped.
 * @throws MergeError when no input yields a device
 */
export function mergeCaptures(inputs: string[], outputPath: string, logger: Logger = silentLogger): MergeResult {
  const merged = new Map<string, KismetDocument>();
  const result: MergeResult = { devices: 0, totalEntries: 0, filesProcessed: 0, failedFiles: [] };

  for (const input of inputs) {
    logger.debug(`Reading: ${input}`);

    let documents: KismetDocument[];
    try {
      documents = readInputDocuments(input);
    } catch (error) {
      logger.error(`Error reading ${input}: ${error instanceof Error ? error.message : String(error)}`);
      result.failedFiles.push(input);
      continue;
    }

    const taken = collectDevices(merged, documents);
    result.totalEntries += taken;
    result.filesProcessed++;
    logger.debug(`  -> ${taken} devices`);
  }

  if (merged.size === 0) {
    throw new MergeError(inputs);
  }

  logger.debug(`\nMerging ${result.totalEntries} total entries -> ${merged.size} unique devices`);

  writeMergedCapture(outputPath, merged.values());
  result.devices = merged.size;

  logger.debug(`\nCreated: ${outputPath}`);
  logger.debug(`  ${merged.size} devices from ${result.filesProcessed} files`);

  return result;
}
