/**
 * @fileoverview Build preconditions for one artifact category
 *
 * A category is built only when its input directory exists, its compiler
 * is installed and there is at least one input. Each missing piece is an
 * expected condition (the Qt toolchain is optional) and is reported as a
 * skip rather than an error.
 */

import * as fs from 'fs';
import type { IBuilderLogger } from '../logging/types.js';
import { listMatchingFiles } from '../utils/glob.js';
import { relpath } from '../utils/paths.js';
import { which as defaultWhich } from '../utils/shell.js';
import { resolveToolName } from './categories.js';
import type { ArtifactCategory, CategoryCheck } from './types.js';

export type ExecutableLocator = (name: string) => string | null;

export interface CheckCategoryOptions {
  logger: IBuilderLogger;
  which?: ExecutableLocator;
}

/**
 * Resolve the compiler and enumerate inputs for a category.
 *
 * @throws ConfigError when the target has no toolchain mapping
 */
export function checkCategory(
  category: ArtifactCategory,
  inputDir: string,
  target: string,
  options: CheckCategoryOptions
): CategoryCheck {
  const { logger } = options;
  const locate = options.which ?? ((name: string) => defaultWhich(name));
  const tool = resolveToolName(category, target);

  if (!isDirectory(inputDir)) {
    logger.warn({ category: category.id, inputDir }, `No Qt ${category.id} folder found. Skipping build.`);
    return { status: 'skipped', reason: 'missing-input-dir' };
  }

  if (locate(tool) === null) {
    logger.warn({ category: category.id, tool }, `${tool} not found. Skipping ${category.id} build.`);
    return { status: 'skipped', reason: 'missing-tool' };
  }

  const inputFiles = listMatchingFiles(inputDir, category.pattern);
  if (inputFiles.length === 0) {
    logger.warn(
      { category: category.id, inputDir, pattern: category.pattern },
      `No ${category.id} found in ${relpath(inputDir)}. Skipping ${tool} build.`
    );
    return { status: 'skipped', reason: 'no-inputs' };
  }

  return { status: 'ready', tool, inputFiles };
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
