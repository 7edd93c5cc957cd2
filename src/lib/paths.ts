/**
 * Path Utilities
 *
 * Expands the directories and executables named in split plans.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expand `~`, `$VAR` and `${VAR}`, then resolve against `basePath`.
 *
 * The result is absolute and normalized, so `./live`, `live/` and
 * `/plans/live` name the same directory when the plan sits in /plans.
 * Unset variables expand to nothing.
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    ENV_REFERENCE,
    (_match: string, braced: string | undefined, bare: string | undefined) =>
      process.env[braced ?? bare ?? ''] ?? ''
  );

  return resolve(basePath, expanded);
}

/**
 * Check whether a value names an executable by path rather than by bare name.
 */
export function isPathLike(value: string): boolean {
  return value.includes('/') || value.includes('\\') || value.startsWith('~');
}
