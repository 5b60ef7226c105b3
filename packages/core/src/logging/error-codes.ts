/**
 * @fileoverview Error categorization system for structured logging
 *
 * Provides standardized error codes and categories for consistent
 * error reporting across the builder.
 */

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for classification
 */
export enum LogErrorCategory {
  FILESYSTEM = 'FS',
  CONFIG = 'CFG',
  TOOL_EXECUTION = 'TOOL',
  UNKNOWN = 'UNK',
}

// =============================================================================
// Structured Error Interface
// =============================================================================

/**
 * Structured error with category, code, and metadata
 */
export interface StructuredError {
  /** Error category for high-level classification */
  category: LogErrorCategory;
  /** Specific error code (e.g., 'FS_NOT_FOUND', 'TOOL_EXIT') */
  code: LogErrorCode;
  /** Human-readable error message */
  message: string;
  /** Additional context for debugging */
  context: Record<string, unknown>;
  /** Original error if wrapped */
  cause?: Error;
}

// =============================================================================
// Error Code Definitions
// =============================================================================

export const LogErrorCodes = {
  // Filesystem errors
  FS_NOT_FOUND: 'FS_NOT_FOUND',
  FS_PERMISSION: 'FS_PERMISSION',
  FS_DISK_FULL: 'FS_DISK_FULL',
  FS_READ: 'FS_READ',
  FS_WRITE: 'FS_WRITE',
  FS_DELETE: 'FS_DELETE',

  // Configuration errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE: 'CONFIG_PARSE',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_UNKNOWN_TARGET: 'CONFIG_UNKNOWN_TARGET',

  // External tool execution
  TOOL_EXIT: 'TOOL_EXIT',
  TOOL_SPAWN: 'TOOL_SPAWN',

  // Unknown
  UNKNOWN: 'UNKNOWN',
} as const;

export type LogErrorCode = (typeof LogErrorCodes)[keyof typeof LogErrorCodes];

// =============================================================================
// Error Classification Helpers
// =============================================================================

/**
 * Node.js error code to category mapping
 */
const NODE_ERROR_CATEGORIES: Record<string, { category: LogErrorCategory; code: LogErrorCode }> = {
  ENOENT: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_NOT_FOUND },
  ENOTDIR: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_NOT_FOUND },
  EACCES: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION },
  EPERM: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_PERMISSION },
  EBUSY: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_DELETE },
  ENOTEMPTY: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_DELETE },
  ENOSPC: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_DISK_FULL },
  EROFS: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_WRITE },
  EEXIST: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_WRITE },
  EISDIR: { category: LogErrorCategory.FILESYSTEM, code: LogErrorCodes.FS_READ },
};

// =============================================================================
// Error Categorization Function
// =============================================================================

/**
 * Categorize an error with structured metadata
 *
 * @param error - The error to categorize
 * @param context - Additional context for the error
 */
export function categorizeError(
  error: unknown,
  context?: Record<string, unknown>
): StructuredError {
  const err = error instanceof Error ? error : new Error(String(error));
  const baseContext = context ?? {};

  const nodeCode = extractNodeErrorCode(err);
  const known = nodeCode !== undefined ? NODE_ERROR_CATEGORIES[nodeCode] : undefined;
  if (nodeCode !== undefined && known) {
    return {
      category: known.category,
      code: known.code,
      message: err.message,
      context: { ...baseContext, nodeCode },
      cause: err,
    };
  }

  return {
    category: LogErrorCategory.UNKNOWN,
    code: LogErrorCodes.UNKNOWN,
    message: err.message,
    context: baseContext,
    cause: err,
  };
}

// =============================================================================
// Helper Functions
// =============================================================================

function extractNodeErrorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
