/**
 * @fileoverview Package aggregator generation
 *
 * Every output directory gets an `__init__.py` that lists the compiled
 * modules in `__all__` and imports each of them, so the add-on can
 * `from .forms.anki21 import main` without knowing the file layout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileSystemError } from '../errors/index.js';
import type { IBuilderLogger } from '../logging/types.js';
import { relpath } from '../utils/paths.js';
import type { FormatContext } from './types.js';

export const INIT_FILE = '__init__.py';

export function renderHeader(context: FormatContext): string {
  return `# -*- coding: utf-8 -*-
#
# ${context.displayName} Add-on for Anki
# Copyright (C)  ${context.years} ${context.author} <${context.contact}>
#
# This file was automatically generated by ${context.title} v${context.version}
# It is subject to the same licensing terms as the rest of the program
# (see the LICENSE file which accompanies this program).
#
# WARNING! All changes made in this file will be lost!

"""
Initializes generated Qt forms/resources
"""`;
}

export function renderAllList(modules: readonly string[]): string {
  const entries = modules.map((name) => `    "${name}"`).join(',\n');
  return `__all__ = [\n${entries}\n]`;
}

export function renderImports(modules: readonly string[]): string {
  return modules.map((name) => `from . import ${name}`).join('\n');
}

/**
 * Full text of the aggregator: header, manifest and imports separated by
 * blank lines, with a trailing newline.
 */
export function renderInitFile(modules: readonly string[], context: FormatContext): string {
  return [renderHeader(context), renderAllList(modules), renderImports(modules)].join('\n\n') + '\n';
}

/**
 * Write (or overwrite) the aggregator for an output directory
 *
 * @returns Path of the written file
 */
export function writeInitFile(
  modules: readonly string[],
  outputDir: string,
  context: FormatContext,
  logger?: IBuilderLogger
): string {
  logger?.debug(`Generating init file for ${relpath(outputDir)}`);

  const initPath = path.join(outputDir, INIT_FILE);
  try {
    fs.writeFileSync(initPath, renderInitFile(modules, context), 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to write ${initPath}`, {
      path: initPath,
      operation: 'write',
      cause: error,
    });
  }
  return initPath;
}
