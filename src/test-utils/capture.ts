/**
 * Test helpers: Kismet-shaped device documents and temp capture files
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { existsSync, unlinkSync } from 'fs';
import Database from 'better-sqlite3';
import type { KismetDocument } from '../capture/kismet-schema.js';

export interface FakeDevice {
  mac: string;
  ssid?: string;
  probedSsid?: string;
  phy?: string;
  cryptSet?: number;
  channel?: string;
  frequency?: number;
  firstTime?: number;
  lastTime?: number;
  packetsTotal?: number;
  packetsData?: number;
  dataSize?: number;
  signal?: { last?: number; min?: number; max?: number };
  /** [lon, lat] */
  geopoint?: [number, number];
  altitude?: number;
  type?: string;
  manuf?: string;
}

export function kismetDevice(fake: FakeDevice): KismetDocument {
  const doc: KismetDocument = {
    'kismet.device.base.key': `key-${fake.mac}`,
    'kismet.device.base.macaddr': fake.mac,
    'kismet.device.base.phyname': fake.phy ?? 'IEEE802.11',
    'kismet.device.base.type': fake.type ?? 'Wi-Fi AP',
    'kismet.device.base.manuf': fake.manuf ?? '',
    'kismet.device.base.channel': fake.channel ?? '',
    'kismet.device.base.frequency': fake.frequency ?? 0,
    'kismet.device.base.first_time': fake.firstTime ?? 0,
    'kismet.device.base.last_time': fake.lastTime ?? 0,
    'kismet.device.base.packets.total': fake.packetsTotal ?? 0,
    'kismet.device.base.packets.data': fake.packetsData ?? 0,
    'kismet.device.base.datasize': fake.dataSize ?? 0,
  };

  if (fake.signal) {
    doc['kismet.device.base.signal'] = {
      'kismet.common.signal.last_signal': fake.signal.last,
      'kismet.common.signal.min_signal': fake.signal.min,
      'kismet.common.signal.max_signal': fake.signal.max,
    };
  }

  if (fake.geopoint) {
    doc['kismet.device.base.location'] = {
      'kismet.common.location.avg_loc': {
        'kismet.common.location.geopoint': fake.geopoint,
        'kismet.common.location.alt': fake.altitude ?? 0,
      },
    };
  }

  const dot11: Record<string, unknown> = {};
  if (fake.ssid !== undefined) {
    dot11['dot11.device.advertised_ssid_map'] = [
      {
        'dot11.advertisedssid.ssid': fake.ssid,
        'dot11.advertisedssid.crypt_set': fake.cryptSet ?? 0,
      },
    ];
  }
  if (fake.probedSsid !== undefined) {
    dot11['dot11.device.probed_ssid_map'] = [{ 'dot11.probedssid.ssid': fake.probedSsid }];
  }
  doc['dot11.device'] = dot11;

  return doc;
}

// ---------------------------------------------------------------------------
// Temp capture files
// ---------------------------------------------------------------------------

let _fileIndex = 0;
const tempFiles: string[] = [];

export function tempPath(prefix: string, extension: string): string {
  const p = join(tmpdir(), `wifi-sort-${prefix}-${process.pid}-${++_fileIndex}${extension}`);
  tempFiles.push(p);
  return p;
}

/** Remove every file handed out by tempPath */
export function cleanupTempFiles(): void {
  for (const f of tempFiles.splice(0)) {
    if (existsSync(f)) unlinkSync(f);
  }
}

/**
 * Write a capture whose `devices` table holds the given blobs.
 * Strings are stored as-is so tests can plant malformed JSON.
 */
export function writeCapture(devices: Array<KismetDocument | string>, options: { withDevicesTable?: boolean } = {}): string {
  const path = tempPath('capture', '.kismet');
  const db = new Database(path);
  try {
    if (options.withDevicesTable ?? true) {
      db.exec('CREATE TABLE devices (devmac TEXT, phyname TEXT, device BLOB)');
      const insert = db.prepare('INSERT INTO devices (devmac, phyname, device) VALUES (?, ?, ?)');
      for (const device of devices) {
        if (typeof device === 'string') {
          insert.run('', '', device);
        } else {
          insert.run(
            String(device['kismet.device.base.macaddr'] ?? ''),
            String(device['kismet.device.base.phyname'] ?? ''),
            JSON.stringify(device)
          );
        }
      }
    } else {
      db.exec('CREATE TABLE packets (ts_sec INT)');
    }
  } finally {
    db.close();
  }
  return path;
}

/**
 * A capture that opens as SQLite but whose `devices` table has no `device`
 * column, so the blob query fails
 */
export function writeCaptureWithoutBlobs(): string {
  const path = tempPath('no-blobs', '.kismet');
  const db = new Database(path);
  try {
    db.exec("CREATE TABLE devices (devmac TEXT); INSERT INTO devices (devmac) VALUES ('AA:00:00:00:00:01')");
  } finally {
    db.close();
  }
  return path;
}
