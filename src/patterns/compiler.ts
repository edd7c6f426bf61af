/**
 * Pattern Compiler
 *
 * Turns one raw pattern-file line into a tagged Pattern.
 *
 *   # comment         -> null
 *   (blank line)      -> null
 *   <empty>           -> empty    (hidden / no-SSID devices)
 *   *corp*            -> contains "corp"
 *   *-guest           -> suffix   "-guest"
 *   testwifi123*      -> prefix   "testwifi123"
 *   MyNetwork         -> exact    "MyNetwork"
 *
 * `*` is only a wildcard at either end of the line; anywhere else it is a
 * literal character. Matching is case-sensitive.
 */

import type { Pattern } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';

export interface CompileOptions {
  /** Line that stands for "SSID is empty" (default `<empty>`) */
  emptySsidToken?: string;
}

const WILDCARD = '*';
const COMMENT = '#';

export function compilePattern(line: string, options: CompileOptions = {}): Pattern | null {
  const emptySsidToken = options.emptySsidToken ?? DEFAULT_CONFIG.emptySsidToken;
  const source = line.trim();

  // Blank lines are layout only; hidden networks need the explicit token
  if (source === '' || source.startsWith(COMMENT)) {
    return null;
  }

  if (source === emptySsidToken) {
    return { kind: 'empty', source };
  }

  const leading = source.startsWith(WILDCARD);
  const trailing = source.endsWith(WILDCARD);

  if (leading && trailing && source.length > 1) {
    return { kind: 'contains', text: source.slice(1, -1), source };
  }
  if (trailing) {
    // A lone `*` lands here as an empty prefix: any non-empty SSID
    return { kind: 'prefix', text: source.slice(0, -1), source };
  }
  if (leading) {
    return { kind: 'suffix', text: source.slice(1), source };
  }

  return { kind: 'exact', text: source, source };
}

/**
 * Compile every line, dropping comments and blanks. File order is kept.
 */
export function compilePatterns(lines: Iterable<string>, options: CompileOptions = {}): Pattern[] {
  const patterns: Pattern[] = [];
  for (const line of lines) {
    const pattern = compilePattern(line, options);
    if (pattern) {
      patterns.push(pattern);
    }
  }
  return patterns;
}
