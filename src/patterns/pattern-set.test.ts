/**
 * pattern-set.test.ts
 *
 * Matching semantics per pattern kind, the degenerate `*` pattern, and
 * loading pattern files from disk.
 */

import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { tmpdir } from 'os';
import { join } from 'path';
import { writeFileSync, unlinkSync, existsSync } from 'fs';

import { PatternSet, loadPatternSet, matchesPattern } from './pattern-set.js';
import { PatternFileError } from '../types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let _fileIndex = 0;
const tempFiles: string[] = [];

function tempPatternFile(content: string): string {
  const p = join(tmpdir(), `wifi-sort-patterns-${process.pid}-${++_fileIndex}.txt`);
  writeFileSync(p, content, 'utf8');
  tempFiles.push(p);
  return p;
}

after(() => {
  for (const f of tempFiles) {
    if (existsSync(f)) unlinkSync(f);
  }
});

const set = (...lines: string[]) => PatternSet.fromLines(lines);

// ---------------------------------------------------------------------------
// Pattern kinds
// ---------------------------------------------------------------------------

describe('matchesPattern', () => {
  it('empty matches only the empty SSID', () => {
    const pattern = { kind: 'empty', source: '<empty>' } as const;
    assert.equal(matchesPattern(pattern, ''), true);
    assert.equal(matchesPattern(pattern, ' '), false);
    assert.equal(matchesPattern(pattern, 'Home'), false);
  });

  it('wildcards never match the empty SSID', () => {
    assert.equal(set('*').matches(''), false);
    assert.equal(set('**').matches(''), false);
    assert.equal(set('*x').matches(''), false);
  });
});

describe('PatternSet: exact', () => {
  it('MyNetwork matches only "MyNetwork"', () => {
    const patterns = set('MyNetwork');
    assert.equal(patterns.matches('MyNetwork'), true);
    assert.equal(patterns.matches('MyNetwork2'), false);
    assert.equal(patterns.matches('XMyNetwork'), false);
    assert.equal(patterns.matches('mynetwork'), false);
  });
});

describe('PatternSet: prefix', () => {
  it('ssid* matches exactly the SSIDs starting with "ssid"', () => {
    const patterns = set('ssid*');
    for (const ssid of ['ssid', 'ssid Guest', 'ssid123', 'ssid*']) {
      assert.equal(patterns.matches(ssid), true, ssid);
    }
    for (const ssid of ['SSID Guest', 'my ssid', 'ssi', 'Ssid']) {
      assert.equal(patterns.matches(ssid), false, ssid);
    }
  });
});

describe('PatternSet: suffix', () => {
  it('*-guest matches SSIDs ending with "-guest"', () => {
    const patterns = set('*-guest');
    assert.equal(patterns.matches('office-guest'), true);
    assert.equal(patterns.matches('-guest'), true);
    assert.equal(patterns.matches('office-guest2'), false);
    assert.equal(patterns.matches('office-GUEST'), false);
  });
});

describe('PatternSet: contains', () => {
  it('*xfinity* is a case-sensitive substring match', () => {
    const patterns = set('*xfinity*');
    assert.equal(patterns.matches('xfinitywifi'), true);
    assert.equal(patterns.matches('Xfinity Mobile'), false);
    assert.equal(patterns.matches('my-xfinity-net'), true);
    assert.equal(patterns.matches('xfinity'), true);
  });
});

describe('PatternSet: degenerate wildcards', () => {
  it('* and ** match every non-empty SSID', () => {
    for (const line of ['*', '**']) {
      const patterns = set(line);
      assert.equal(patterns.matches('a'), true, line);
      assert.equal(patterns.matches('Any Network'), true, line);
    }
  });
});

describe('PatternSet: collection behaviour', () => {
  it('matches when any pattern matches', () => {
    const patterns = set('Alpha', '*beta*', 'gamma*');
    assert.equal(patterns.matches('Alpha'), true);
    assert.equal(patterns.matches('xbetax'), true);
    assert.equal(patterns.matches('gamma-ray'), true);
    assert.equal(patterns.matches('delta'), false);
  });

  it('an empty set matches nothing', () => {
    const patterns = set('# only a comment', '');
    assert.equal(patterns.isEmpty(), true);
    assert.equal(patterns.size, 0);
    assert.equal(patterns.matches('anything'), false);
    assert.equal(patterns.matches(''), false);
  });

  it('iterates in file order', () => {
    const patterns = set('b*', 'a', '*c');
    assert.deepEqual([...patterns].map(p => p.kind), ['prefix', 'exact', 'suffix']);
    assert.deepEqual(patterns.describe(), ['b*', 'a', '*c']);
  });
});

// ---------------------------------------------------------------------------
// loadPatternSet
// ---------------------------------------------------------------------------

describe('loadPatternSet', () => {
  it('reads patterns from a file, ignoring comments and blank lines', async () => {
    const path = tempPatternFile('# client SSIDs\nssid*\n\n*corp*\r\nMyNetwork\r\n');
    const patterns = await loadPatternSet(path);
    assert.deepEqual(patterns.describe(), ['ssid*', '*corp*', 'MyNetwork']);
    assert.equal(patterns.matches('MyNetwork'), true);
  });

  it('throws PatternFileError for a missing file', async () => {
    const missing = join(tmpdir(), `wifi-sort-missing-${process.pid}.txt`);
    await assert.rejects(loadPatternSet(missing), (error: unknown) => {
      assert.ok(error instanceof PatternFileError);
      assert.equal(error.path, missing);
      assert.equal(error.name, 'PatternFileError');
      return true;
    });
  });
});
