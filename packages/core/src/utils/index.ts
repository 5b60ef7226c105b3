/**
 * @fileoverview Utils Module
 *
 * Path formatting, file discovery and external process helpers.
 */

export * from './paths.js';
export * from './glob.js';
export * from './shell.js';
