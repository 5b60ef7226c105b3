/**
 * @fileoverview Logging Type Definitions
 *
 * Shared types for the logging module. Components depend on
 * IBuilderLogger rather than the pino-backed class so tests can pass fakes.
 */

// =============================================================================
// Log Levels
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Levels accepted as a logger threshold (`silent` disables output) */
export type LogThreshold = LogLevel | 'silent';

/** Log level to numeric value mapping */
export const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const THRESHOLDS: ReadonlySet<string> = new Set([...Object.keys(LOG_LEVEL_NUM), 'silent']);

/**
 * Parse a threshold from an environment value.
 * Returns the fallback for absent or unrecognized values.
 */
export function parseLogThreshold(raw: string | undefined, fallback: LogThreshold = 'info'): LogThreshold {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  return isLogThreshold(normalized) ? normalized : fallback;
}

function isLogThreshold(value: string): value is LogThreshold {
  return THRESHOLDS.has(value);
}

// =============================================================================
// Logger Options
// =============================================================================

export interface LoggerOptions {
  level?: LogThreshold;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  category?: string;
  target?: string;
  [key: string]: unknown;
}

// =============================================================================
// Logger Interface
// =============================================================================

export type LogPayload = string | Record<string, unknown>;

export interface IBuilderLogger {
  trace(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void;
  debug(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void;
  info(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void;
  warn(msgOrData: LogPayload, msgOrDataSecond?: LogPayload): void;
  error(msgOrData: LogPayload, msgOrDataOrError?: LogPayload | Error): void;
  fatal(msgOrData: LogPayload, msgOrDataOrError?: LogPayload | Error): void;
  child(context: LogContext): IBuilderLogger;
  startTimer(label: string): () => void;
}
