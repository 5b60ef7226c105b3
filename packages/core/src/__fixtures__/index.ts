/**
 * @fileoverview Shared test fixtures
 */

export * from './mocks/index.js';
export * from './project.js';
