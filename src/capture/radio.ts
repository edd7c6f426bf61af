/**
 * Radio field decoding: frequency units, channel numbers, encryption flags
 */

// =============================================================================
// Frequency / Channel
// =============================================================================

/**
 * Capture frequencies above this are in kHz rather than MHz
 */
const KHZ_THRESHOLD = 10000;

/**
 * Normalize a capture frequency to MHz. 0 and missing values become null.
 */
export function toMhz(freq: number | null | undefined): number | null {
  if (freq === null || freq === undefined || freq === 0) {
    return null;
  }
  return freq > KHZ_THRESHOLD ? freq / 1000 : freq;
}

/**
 * Channel number for a frequency (kHz or MHz), covering the 2.4, 5 and 6 GHz bands
 */
export function freqToChannel(freq: number | null | undefined): number | null {
  const mhz = toMhz(freq);
  if (mhz === null) {
    return null;
  }

  // 2.4 GHz
  if (mhz >= 2412 && mhz <= 2484) {
    if (mhz === 2484) return 14;
    return Math.trunc((mhz - 2407) / 5);
  }

  // 5 GHz
  if (mhz >= 5170 && mhz <= 5825) {
    return Math.trunc((mhz - 5000) / 5);
  }

  // 6 GHz
  if (mhz >= 5955 && mhz <= 7115) {
    return Math.trunc((mhz - 5950) / 5);
  }

  return null;
}

/**
 * Channel number from a channel string such as "6", "36HT40+", "149-80"
 * or "11W20": the digits among the first three characters before any
 * "-" or "W". Null when there are none or they read as 0.
 */
export function parseChannel(channel: string | null | undefined): number | null {
  if (!channel) {
    return null;
  }
  const head = channel.split('-')[0]?.split('W')[0]?.slice(0, 3) ?? '';
  const digits = head.replace(/\D/g, '');
  if (digits === '') {
    return null;
  }
  const value = parseInt(digits, 10);
  return value === 0 ? null : value;
}

/**
 * Channel from the channel string, falling back to the frequency
 */
export function resolveChannel(channel: string | null | undefined, freq: number | null | undefined): number | null {
  return parseChannel(channel) ?? freqToChannel(freq);
}

// =============================================================================
// Encryption
// =============================================================================

const CRYPT_FLAGS: ReadonlyArray<readonly [number, string]> = [
  [0x02, 'WEP'],
  [0x04, 'WPA'],
  [0x08, 'WPA2'],
  [0x10, 'WPA3'],
  [0x200, 'PSK'],
  [0x400, 'Enterprise'],
];

/**
 * Describe an advertised-SSID crypt_set bitfield, e.g. "WPA2/PSK" or "Open"
 */
export function describeCrypt(cryptSet: number): string {
  const parts = CRYPT_FLAGS.filter(([flag]) => (cryptSet & flag) !== 0).map(([, name]) => name);
  return parts.length > 0 ? parts.join('/') : 'Open';
}
