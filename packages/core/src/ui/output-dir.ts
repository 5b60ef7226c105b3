/**
 * @fileoverview Output directory reset
 */

import * as fs from 'fs';
import { FileSystemError } from '../errors/index.js';
import type { IBuilderLogger } from '../logging/types.js';
import { relpath } from '../utils/paths.js';

/**
 * Delete `outputDir` with everything in it and recreate it empty,
 * including missing parents. Only call once a category is known to build,
 * so skipped categories keep their previous output.
 */
export function resetOutputDir(outputDir: string, logger?: IBuilderLogger): void {
  logger?.debug(`Cleaning up ${relpath(outputDir)}...`);

  try {
    fs.rmSync(outputDir, { recursive: true, force: true });
  } catch (error) {
    throw new FileSystemError(`Failed to remove ${outputDir}`, {
      path: outputDir,
      operation: 'delete',
      cause: error,
    });
  }

  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create ${outputDir}`, {
      path: outputDir,
      operation: 'mkdir',
      cause: error,
    });
  }
}
