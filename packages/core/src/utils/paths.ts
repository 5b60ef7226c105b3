/**
 * @fileoverview Path formatting helpers
 */

import * as path from 'path';

/**
 * Express a path relative to the working directory.
 * Used for log output and for command lines whose arguments end up
 * embedded in generated file headers.
 */
export function relpath(target: string, from: string = process.cwd()): string {
  return path.relative(from, path.resolve(target)) || '.';
}
