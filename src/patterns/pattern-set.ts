/**
 * PatternSet - ordered, immutable collection of compiled SSID patterns.
 * `matches` is "any pattern matches"; order only affects iteration.
 */

import { readFile } from 'fs/promises';
import type { Pattern } from '../types/index.js';
import { PatternFileError } from '../types/index.js';
import { resolveUserPath } from '../utils/paths.js';
import { compilePatterns, type CompileOptions } from './compiler.js';

/**
 * Test a single pattern against an SSID.
 * Wildcards never match the empty SSID, so `*` alone means "any name".
 */
export function matchesPattern(pattern: Pattern, ssid: string): boolean {
  switch (pattern.kind) {
    case 'empty':
      return ssid === '';
    case 'exact':
      return ssid === pattern.text;
    case 'prefix':
      return ssid !== '' && ssid.startsWith(pattern.text);
    case 'suffix':
      return ssid !== '' && ssid.endsWith(pattern.text);
    case 'contains':
      return ssid !== '' && ssid.includes(pattern.text);
  }
}

export class PatternSet implements Iterable<Pattern> {
  private readonly patterns: readonly Pattern[];

  constructor(patterns: Iterable<Pattern> = []) {
    this.patterns = Object.freeze([...patterns]);
  }

  /**
   * Build a set from raw pattern-file lines
   */
  static fromLines(lines: Iterable<string>, options: CompileOptions = {}): PatternSet {
    return new PatternSet(compilePatterns(lines, options));
  }

  get size(): number {
    return this.patterns.length;
  }

  isEmpty(): boolean {
    return this.patterns.length === 0;
  }

  matches(ssid: string): boolean {
    for (const pattern of this.patterns) {
      if (matchesPattern(pattern, ssid)) {
        return true;
      }
    }
    return false;
  }

  [Symbol.iterator](): Iterator<Pattern> {
    return this.patterns[Symbol.iterator]();
  }

  /** Source lines, for verbose output */
  describe(): string[] {
    return this.patterns.map(p => p.source);
  }
}

/**
 * Read a pattern file (UTF-8, LF or CRLF) into a PatternSet.
 * @throws PatternFileError when the file is missing or unreadable
 */
export async function loadPatternSet(path: string, options: CompileOptions = {}): Promise<PatternSet> {
  const resolved = resolveUserPath(path);
  let content: string;
  try {
    content = await readFile(resolved, 'utf8');
  } catch (error) {
    throw new PatternFileError(path, undefined, { cause: error });
  }
  return PatternSet.fromLines(content.split(/\r?\n/), options);
}
