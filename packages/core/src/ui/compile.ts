/**
 * @fileoverview Per-file compilation
 */

import * as path from 'path';
import type { IBuilderLogger } from '../logging/types.js';
import { relpath } from '../utils/paths.js';
import { callShell, quoteShellArg, type ShellInvoker } from '../utils/shell.js';
import type { ArtifactCategory } from './types.js';

export const OUTPUT_EXTENSION = '.py';

export interface CompileOptions {
  logger: IBuilderLogger;
  shell?: ShellInvoker;
}

/**
 * Module name produced for an input file: its stem plus the category suffix
 */
export function moduleNameFor(category: ArtifactCategory, inputFile: string): string {
  return path.parse(inputFile).name + category.suffix;
}

/**
 * Command line for compiling one file. Paths are relative to the working
 * directory because pyuic/pyrcc copy the input path into the header of
 * the generated module, and are quoted when they contain spaces or shell
 * characters.
 */
export function buildCompileCommand(tool: string, inputFile: string, outputFile: string): string {
  return `${tool} ${quoteShellArg(relpath(inputFile))} -o ${quoteShellArg(relpath(outputFile))}`;
}

/**
 * Compile every input, in order, into `outputDir`.
 * The first failing command aborts the category.
 *
 * @returns Module names in input order
 */
export function compileAll(
  category: ArtifactCategory,
  inputFiles: readonly string[],
  outputDir: string,
  tool: string,
  options: CompileOptions
): string[] {
  const { logger } = options;
  const shell = options.shell ?? callShell;
  const modules: string[] = [];

  for (const inputFile of inputFiles) {
    const moduleName = moduleNameFor(category, inputFile);
    const outputFile = path.join(outputDir, moduleName + OUTPUT_EXTENSION);

    logger.debug(`Building element '${moduleName}'...`);
    shell(buildCompileCommand(tool, inputFile, outputFile), { logger });

    if (category.postBuild) {
      category.postBuild(outputFile, logger);
    }

    modules.push(moduleName);
  }

  return modules;
}
