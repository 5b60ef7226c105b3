/**
 * @fileoverview Logging exports
 */

export {
  BuilderLogger,
  getLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LogThreshold,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

export {
  LogErrorCategory,
  LogErrorCodes,
  categorizeError,
  type StructuredError,
  type LogErrorCode,
} from './error-codes.js';

export type { IBuilderLogger, LogPayload } from './types.js';

export { LOG_LEVEL_NUM, parseLogThreshold } from './types.js';
