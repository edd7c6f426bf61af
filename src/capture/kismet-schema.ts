/**
 * Kismet device document schema
 *
 * The `devices.device` column of a capture holds one JSON document per
 * device, keyed by dotted Kismet field names. Only the fields wifi-sort reads
 * are described; everything else passes through. Sub-objects that do not have
 * the expected shape read as missing instead of rejecting the device.
 */

import { z } from 'zod';

export const PHY_80211 = 'IEEE802.11';

const num = z.number().nullish().catch(null);
const str = z.string().nullish().catch(null);

const signalSchema = z.object({
  'kismet.common.signal.last_signal': num,
  'kismet.common.signal.min_signal': num,
  'kismet.common.signal.max_signal': num,
}).passthrough();

const geoSchema = z.object({
  /** [lon, lat] */
  'kismet.common.location.geopoint': z.array(z.number()).nullish().catch(null),
  'kismet.common.location.alt': num,
}).passthrough();

const locationSchema = z.object({
  'kismet.common.location.avg_loc': geoSchema.nullish().catch(null),
  'kismet.common.location.min_loc': geoSchema.nullish().catch(null),
  'kismet.common.location.max_loc': geoSchema.nullish().catch(null),
}).passthrough();

const advertisedSsidSchema = z.object({
  'dot11.advertisedssid.ssid': str,
  'dot11.advertisedssid.crypt_set': num,
}).passthrough();

const probedSsidSchema = z.object({
  'dot11.probedssid.ssid': str,
}).passthrough();

/**
 * Older captures store SSID maps as objects keyed by hash, newer ones as arrays
 */
function ssidMap<T extends z.ZodTypeAny>(entry: T) {
  return z
    .union([z.array(entry), z.record(entry)])
    .transform((value): Array<z.infer<T>> => (Array.isArray(value) ? value : Object.values(value)))
    .nullish()
    .catch(null);
}

const dot11Schema = z.object({
  'dot11.device.advertised_ssid_map': ssidMap(advertisedSsidSchema),
  'dot11.device.probed_ssid_map': ssidMap(probedSsidSchema),
}).passthrough();

export const kismetDeviceSchema = z.object({
  'kismet.device.base.key': str,
  'kismet.device.base.macaddr': str,
  'kismet.device.base.phyname': str,
  'kismet.device.base.name': str,
  'kismet.device.base.type': str,
  'kismet.device.base.manuf': str,
  'kismet.device.base.channel': str,
  'kismet.device.base.frequency': num,
  'kismet.device.base.first_time': num,
  'kismet.device.base.last_time': num,
  'kismet.device.base.packets.total': num,
  'kismet.device.base.packets.data': num,
  'kismet.device.base.datasize': num,
  'kismet.device.base.signal': signalSchema.nullish().catch(null),
  'kismet.device.base.location': locationSchema.nullish().catch(null),
  'dot11.device': dot11Schema.nullish().catch(null),
}).passthrough();

export type KismetDevice = z.infer<typeof kismetDeviceSchema>;
export type KismetSignal = z.infer<typeof signalSchema>;
export type KismetLocation = z.infer<typeof locationSchema>;

/**
 * Raw device document as stored in the database
 */
export const kismetDocumentSchema = z.record(z.unknown());
export type KismetDocument = z.infer<typeof kismetDocumentSchema>;

/**
 * Parse a `devices.device` blob. Returns null for text that is not a JSON
 * object.
 */
export function parseDeviceBlob(blob: unknown): KismetDocument | null {
  const text = typeof blob === 'string'
    ? blob
    : blob instanceof Uint8Array
      ? Buffer.from(blob).toString('utf8')
      : null;
  if (text === null) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const result = kismetDocumentSchema.safeParse(json);
  return result.success ? result.data : null;
}

/**
 * Typed view of a device document
 */
export function readDevice(document: KismetDocument): KismetDevice {
  return kismetDeviceSchema.parse(document);
}
