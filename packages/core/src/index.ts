/**
 * @fileoverview Main entry point for @addon-builder/core
 *
 * Compiles Qt Designer forms and resource files of an add-on into Python
 * modules and generates the package aggregators that import them.
 */

export * from './constants.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './settings/index.js';
export * from './utils/index.js';
export * from './ui/index.js';
export { parseCliArgs, runCli, type CliDependencies, type ParsedArgs } from './cli.js';
