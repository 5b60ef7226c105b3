/**
 * @fileoverview Centralized logging infrastructure
 *
 * Uses pino for structured logging with:
 * - Configurable log levels (LOG_LEVEL or CLI flags)
 * - JSON output when piped, pretty printing on a terminal
 * - Context-aware child loggers
 * - Performance tracking
 *
 * Output always goes to stderr so stdout stays free for command output.
 */

import pino from 'pino';
import {
  parseLogThreshold,
  type IBuilderLogger,
  type LogContext,
  type LogLevel,
  type LoggerOptions,
  type LogPayload,
} from './types.js';

export type { LogLevel, LogThreshold, LoggerOptions, LogContext, IBuilderLogger } from './types.js';

// =============================================================================
// Logger Factory
// =============================================================================

function shouldPrettyPrint(): boolean {
  const env = process.env.NODE_ENV;
  return Boolean(process.stderr.isTTY) && env !== 'production' && env !== 'test';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? parseLogThreshold(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? shouldPrettyPrint();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'addon-builder',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,name',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class BuilderLogger implements IBuilderLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Reuses the parent's pino instance so no extra transport is spawned.
   */
  child(context: LogContext): BuilderLogger {
    return new BuilderLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  /** Context bound to this logger (merged from all parents) */
  get bindings(): LogContext {
    return { ...this.context };
  }

  /** Current threshold of the underlying pino instance */
  get level(): string {
    return this.pino.level;
  }

  /**
   * Normalize log arguments and dispatch to pino.
   * Handles all signature variants: (msg), (msg, data), (data, msg), (msg, error)
   */
  private dispatch(
    level: LogLevel,
    msgOrData: LogPayload,
    second?: LogPayload | Error,
    supportsError = false
  ): void {
    const log = this.pino[level].bind(this.pino);

    if (typeof msgOrData === 'string') {
      if (supportsError && second instanceof Error) {
        log({ err: second }, msgOrData);
      } else if (typeof second === 'object' && second !== null) {
        log(second, msgOrData);
      } else {
        log(msgOrData);
      }
      return;
    }

    log(msgOrData, typeof second === 'string' ? second : '');
  }

  trace(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void {
    this.dispatch('trace', msgOrData, msgOrDataSecond);
  }

  debug(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void {
    this.dispatch('debug', msgOrData, msgOrDataSecond);
  }

  info(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void {
    this.dispatch('info', msgOrData, msgOrDataSecond);
  }

  warn(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void {
    this.dispatch('warn', msgOrData, msgOrDataSecond);
  }

  /**
   * Log at error level
   * Supports: (msg), (msg, data), (msg, error), and (data, msg) signatures
   */
  error(msgOrData: LogPayload, msgOrDataOrError?: LogPayload | Error): void {
    this.dispatch('error', msgOrData, msgOrDataOrError, true);
  }

  /**
   * Log at fatal level
   * Supports: (msg), (msg, data), (msg, error), and (data, msg) signatures
   */
  fatal(msgOrData: LogPayload, msgOrDataOrError?: LogPayload | Error): void {
    this.dispatch('fatal', msgOrData, msgOrDataOrError, true);
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug({ durationMs: duration.toFixed(2) }, `${label} completed`);
    };
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: BuilderLogger | null = null;

/**
 * Get the default logger instance.
 * Options only apply on first call (or after resetLogger()).
 */
export function getLogger(options?: LoggerOptions): BuilderLogger {
  if (!defaultLogger) {
    defaultLogger = new BuilderLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): BuilderLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing and CLI level overrides)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
