/**
 * Path utilities for wifi-sort
 */

import { homedir } from 'os';
import { join, dirname, resolve } from 'path';
import { mkdirSync, existsSync } from 'fs';

/**
 * Resolve a user-supplied path, expanding a leading ~
 * @param path - e.g. '~/captures/site.kismet'
 */
export function resolveUserPath(path: string): string {
  let resolved = path;

  if (resolved === '~' || resolved.startsWith('~/')) {
    resolved = join(homedir(), resolved.slice(1));
  }

  return resolve(resolved);
}

/**
 * Resolve an output path and make sure its directory exists
 */
export function resolveOutputPath(path: string): string {
  const resolved = resolveUserPath(path);

  const dir = dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  return resolved;
}

/**
 * True when two user paths point at the same file
 */
export function isSamePath(a: string, b: string): boolean {
  return resolveUserPath(a) === resolveUserPath(b);
}
