/**
 * @fileoverview Error Class Hierarchy
 *
 * Errors raised by the builder carry a machine-readable code and category
 * so the CLI can log them in structured form. Anything thrown from here is
 * fatal to the current build; recoverable conditions are logged and skipped
 * instead of thrown.
 */

import {
  categorizeError,
  LogErrorCategory,
  LogErrorCodes,
  type LogErrorCode,
} from '../logging/error-codes.js';

/**
 * Error severity levels
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

export interface BuilderErrorOptions {
  code: LogErrorCode;
  category?: LogErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class with structured context for debugging and logging.
 */
export class BuilderError extends Error {
  /** Machine-readable error code (e.g., 'CONFIG_INVALID') */
  readonly code: LogErrorCode;
  readonly category: LogErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context: Record<string, unknown>;

  constructor(message: string, options: BuilderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'BuilderError';
    this.code = options.code;
    this.category = options.category ?? LogErrorCategory.UNKNOWN;
    this.severity = options.severity ?? 'fatal';
    this.context = options.context ?? {};
  }

  /**
   * Convert to structured log format
   */
  toStructuredLog(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        category: this.category,
        severity: this.severity,
        stack: this.stack,
        cause: this.cause instanceof Error ? {
          name: this.cause.name,
          message: this.cause.message,
        } : undefined,
      },
      context: this.context,
    };
  }

  /**
   * Create a BuilderError from an unknown error value
   */
  static from(error: unknown): BuilderError {
    if (error instanceof BuilderError) {
      return error;
    }

    const structured = categorizeError(error);
    return new BuilderError(structured.message, {
      code: structured.code,
      category: structured.category,
      context: structured.context,
      cause: structured.cause,
    });
  }
}

/**
 * Missing, unreadable or invalid add-on configuration, or an
 * unsupported build target.
 */
export class ConfigError extends BuilderError {
  /** Individual validation issues, formatted as `path: message` */
  readonly issues: string[];

  constructor(
    message: string,
    options: {
      code?: LogErrorCode;
      issues?: string[];
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, {
      code: options.code ?? LogErrorCodes.CONFIG_INVALID,
      category: LogErrorCategory.CONFIG,
      context: options.context,
      cause: options.cause,
    });
    this.name = 'ConfigError';
    this.issues = options.issues ?? [];
  }
}

/**
 * External command that could not be started or exited unsuccessfully
 */
export class ShellError extends BuilderError {
  readonly command: string;
  /** Exit status, or null when the process was killed or never started */
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    options: {
      command: string;
      exitCode: number | null;
      stderr?: string;
      cause?: Error;
    }
  ) {
    super(message, {
      code: options.exitCode === null ? LogErrorCodes.TOOL_SPAWN : LogErrorCodes.TOOL_EXIT,
      category: LogErrorCategory.TOOL_EXECUTION,
      context: {
        command: options.command,
        exitCode: options.exitCode,
        stderr: options.stderr,
      },
      cause: options.cause,
    });
    this.name = 'ShellError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr ?? '';
  }
}

/**
 * Filesystem operation failure with the path and operation involved
 */
export class FileSystemError extends BuilderError {
  readonly path: string;
  readonly operation: 'read' | 'write' | 'delete' | 'mkdir';

  constructor(
    message: string,
    options: {
      path: string;
      operation: FileSystemError['operation'];
      cause: unknown;
    }
  ) {
    const structured = categorizeError(options.cause, {
      path: options.path,
      operation: options.operation,
    });
    super(message, {
      code: structured.category === LogErrorCategory.FILESYSTEM
        ? structured.code
        : defaultCodeFor(options.operation),
      category: LogErrorCategory.FILESYSTEM,
      context: structured.context,
      cause: structured.cause,
    });
    this.name = 'FileSystemError';
    this.path = options.path;
    this.operation = options.operation;
  }
}

function defaultCodeFor(operation: FileSystemError['operation']): LogErrorCode {
  switch (operation) {
    case 'read':
      return LogErrorCodes.FS_READ;
    case 'delete':
      return LogErrorCodes.FS_DELETE;
    default:
      return LogErrorCodes.FS_WRITE;
  }
}
