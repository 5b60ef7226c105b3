/**
 * @fileoverview Mock factories for testing
 */

export { createMockLogger, type MockLogger } from './logger.js';
export { createFsError, type FsErrorCode } from './fs.js';
