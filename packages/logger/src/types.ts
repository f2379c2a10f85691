/**
 * Logger Types
 *
 * Types for structured, levelled logging.
 */

/**
 * Log levels, least to most severe
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields attached to a log entry
 */
export type LogFields = Record<string, unknown>;

/**
 * A single log entry
 */
export interface LogEntry {
  /** Time the entry was created */
  timestamp: Date;
  /** Entry level */
  level: LogLevel;
  /** Name of the emitting logger (usually a module) */
  logger: string;
  /** Human-readable message */
  message: string;
  /** Bound context merged with per-call fields */
  fields: LogFields;
}

/**
 * Log transport interface
 */
export interface LogTransport {
  /** Transport name */
  readonly name: string;
  /** Write an entry */
  write(entry: LogEntry): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Logger name (default: root) */
  name?: string;
  /** Minimum level to emit (default: info) */
  minLevel?: LogLevel;
  /** Initial transports */
  transports?: LogTransport[];
  /** Fields bound to every entry */
  bindings?: LogFields;
}

/**
 * Logger statistics
 */
export interface LoggerStats {
  /** Total entries emitted */
  totalEntries: number;
  /** Entries by level */
  byLevel: Record<LogLevel, number>;
}

/**
 * Level ordering for comparisons
 */
export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Type guard for level names
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_ORDER, value);
}
