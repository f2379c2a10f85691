/**
 * @forensic-cloud/logger
 *
 * Structured logging for forensic-cloud.
 */

// Types
export type {
  LogLevel,
  LogFields,
  LogEntry,
  LogTransport,
  LoggerConfig,
  LoggerStats,
} from './types.js';

export type { LineSink } from './logger.js';

export { LOG_LEVEL_ORDER, isLogLevel } from './types.js';

// Logger
export {
  Logger,
  MemoryTransport,
  ConsoleTransport,
  formatEntry,
  getLogger,
  configureLogging,
  createLogger,
  createTestLogger,
} from './logger.js';
