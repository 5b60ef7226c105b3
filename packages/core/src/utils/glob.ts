/**
 * @fileoverview Minimal single-directory glob matching
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Match a file name against a simple glob (`*` and `?` wildcards only)
 */
export function matchesGlob(filename: string, pattern: string): boolean {
  const regex = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${regex}$`).test(filename);
}

/**
 * List regular files directly inside `dir` whose names match `pattern`.
 * Symlinks count when they point at a regular file. Non-recursive; results
 * are absolute paths sorted by file name so that callers see the same order
 * on every platform.
 */
export function listMatchingFiles(dir: string, pattern: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => matchesGlob(entry.name, pattern) && isRegularFile(dir, entry))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.resolve(dir, name));
}

function isRegularFile(dir: string, entry: fs.Dirent): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return fs.statSync(path.join(dir, entry.name)).isFile();
  } catch {
    // dangling link
    return false;
  }
}
