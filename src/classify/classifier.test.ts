/**
 * classifier.test.ts
 *
 * Precedence (no SSID -> client -> exclude -> non-client), the partition
 * property, order preservation and the per-SSID summary.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { classify, partitionDevices, summarizeBySsid } from './classifier.js';
import { PatternSet } from '../patterns/pattern-set.js';
import type { DeviceRecord } from '../types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let _macIndex = 0;

function device(ssid: string, overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  const n = ++_macIndex;
  return {
    mac: `AA:BB:CC:00:00:${n.toString(16).padStart(2, '0').toUpperCase()}`,
    ssid,
    type: 'Wi-Fi AP',
    manufacturer: '',
    encryption: 'WPA2/PSK',
    channel: 6,
    frequencyMhz: 2437,
    rssiLast: -60,
    rssiMin: -70,
    rssiMax: -50,
    packetsTotal: 10,
    packetsData: 2,
    dataSizeBytes: 0,
    firstSeen: 0,
    lastSeen: 0,
    latitude: null,
    longitude: null,
    altitude: null,
    ...overrides,
  };
}

const set = (...lines: string[]) => PatternSet.fromLines(lines);

// ---------------------------------------------------------------------------
// classify
// ---------------------------------------------------------------------------

describe('classify: precedence', () => {
  it('an empty SSID is always an unknown device', () => {
    const hidden = device('');
    assert.equal(classify(hidden, set('*')), 'unknown-device');
    assert.equal(classify(hidden, set('<empty>')), 'unknown-device');
    assert.equal(classify(hidden, set('Home'), set('<empty>')), 'unknown-device');
  });

  it('a missing SSID field reads as empty', () => {
    const { ssid: _ssid, ...rest } = device('gone');
    const malformed: DeviceRecord = JSON.parse(JSON.stringify(rest));
    assert.equal(classify(malformed, set('*')), 'unknown-device');
  });

  it('client match wins over exclude match', () => {
    assert.equal(classify(device('CorpNet'), set('Corp*'), set('CorpNet')), 'client-named');
  });

  it('exclude match drops a non-client SSID', () => {
    assert.equal(classify(device('CorpNet'), set('ssid*'), set('CorpNet')), 'excluded');
  });

  it('anything else is non-client-named', () => {
    assert.equal(classify(device('Other'), set('ssid*'), set('CorpNet')), 'non-client-named');
    assert.equal(classify(device('Other'), set('ssid*')), 'non-client-named');
    assert.equal(classify(device('Other'), set('ssid*'), null), 'non-client-named');
  });

  it('is case-sensitive', () => {
    assert.equal(classify(device('SSID Guest'), set('ssid*')), 'non-client-named');
  });

  it('returns the same answer on repeated calls', () => {
    const record = device('ssid Guest');
    const client = set('ssid*');
    const exclude = set('CorpNet');
    assert.equal(classify(record, client, exclude), classify(record, client, exclude));
  });
});

// ---------------------------------------------------------------------------
// partitionDevices
// ---------------------------------------------------------------------------

describe('partitionDevices', () => {
  it('sorts the client/exclude scenario into the expected tabs', () => {
    const records = [device('ssid Guest'), device('CorpNet'), device(''), device('Other')];
    const partition = partitionDevices(records, set('ssid*'), set('CorpNet'));

    assert.deepEqual(partition.clientNamed.map(r => r.ssid), ['ssid Guest']);
    assert.deepEqual(partition.nonClientNamed.map(r => r.ssid), ['Other']);
    assert.deepEqual(partition.unknownDevices.map(r => r.ssid), ['']);
    assert.deepEqual(partition.excluded.map(r => r.ssid), ['CorpNet']);
  });

  it('without an exclude set nothing is dropped', () => {
    const records = [device('ssid Guest'), device('CorpNet'), device('')];
    const partition = partitionDevices(records, set('ssid*'));
    assert.deepEqual(partition.nonClientNamed.map(r => r.ssid), ['CorpNet']);
    assert.equal(partition.excluded.length, 0);
  });

  it('covers every record exactly once and keeps input order', () => {
    const ssids = ['b-corp', '', 'alpha1', 'noise', 'alpha2', '', 'b-corp', 'quiet', 'alpha3'];
    const records = ssids.map(s => device(s));
    const partition = partitionDevices(records, set('alpha*'), set('*corp'));

    const all = [
      ...partition.clientNamed,
      ...partition.nonClientNamed,
      ...partition.unknownDevices,
      ...partition.excluded,
    ];
    assert.equal(all.length, records.length);
    assert.equal(new Set(all).size, records.length);

    const inInputOrder = (list: DeviceRecord[]) =>
      list.every((r, i) => i === 0 || records.indexOf(list[i - 1]!) < records.indexOf(r));
    assert.ok(inInputOrder(partition.clientNamed));
    assert.ok(inInputOrder(partition.nonClientNamed));
    assert.ok(inInputOrder(partition.unknownDevices));
    assert.ok(inInputOrder(partition.excluded));

    assert.deepEqual(partition.clientNamed.map(r => r.ssid), ['alpha1', 'alpha2', 'alpha3']);
    assert.deepEqual(partition.nonClientNamed.map(r => r.ssid), ['noise', 'quiet']);
    assert.equal(partition.unknownDevices.length, 2);
    assert.equal(partition.excluded.length, 2);
  });

  it('passes records through untouched', () => {
    const record = device('alpha', { rssiLast: -42, manufacturer: 'Acme' });
    const partition = partitionDevices([record], set('alpha'));
    assert.equal(partition.clientNamed[0], record);
  });
});

// ---------------------------------------------------------------------------
// summarizeBySsid
// ---------------------------------------------------------------------------

describe('summarizeBySsid', () => {
  it('counts devices per SSID, sorted by SSID', () => {
    const counts = summarizeBySsid([device('beta'), device('Alpha'), device('beta'), device('alpha')]);
    assert.deepEqual(counts, [
      { ssid: 'Alpha', count: 1 },
      { ssid: 'alpha', count: 1 },
      { ssid: 'beta', count: 2 },
    ]);
  });

  it('returns nothing for no records', () => {
    assert.deepEqual(summarizeBySsid([]), []);
  });
});
