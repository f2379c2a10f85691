/**
 * Logger Implementation
 *
 * Levelled logging with bound context and pluggable transports. Child
 * loggers share their parent's transports, level and statistics.
 */

import chalk from 'chalk';
import type {
  LogEntry,
  LogFields,
  LogLevel,
  LogTransport,
  LoggerConfig,
  LoggerStats,
} from './types.js';
import { LOG_LEVEL_ORDER } from './types.js';

/**
 * In-memory transport for testing
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';
  private entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter(e => e.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Minimal writable sink for the console transport
 */
export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Console transport; writes to stderr so command output on stdout stays clean
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly stream: LineSink = process.stderr) {}

  write(entry: LogEntry): void {
    this.stream.write(`${formatEntry(entry, this.getLevelPrefix(entry.level))}\n`);
  }

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case 'error': return chalk.red('[ERROR]');
      case 'warn': return chalk.yellow('[WARN]');
      case 'info': return chalk.blue('[INFO]');
      case 'debug': return chalk.gray('[DEBUG]');
    }
  }
}

/**
 * Render an entry as a single line: `time LEVEL [logger] message key=value ...`
 */
export function formatEntry(entry: LogEntry, levelPrefix = `[${entry.level.toUpperCase()}]`): string {
  const fields = Object.entries(entry.fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
  const line = `${entry.timestamp.toISOString()} ${levelPrefix} [${entry.logger}] ${entry.message}`;
  return fields ? `${line} ${fields}` : line;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value) ?? String(value);
}

interface LoggerCore {
  transports: LogTransport[];
  minLevel: LogLevel;
  stats: LoggerStats;
}

/**
 * Logger class
 */
export class Logger {
  private readonly core: LoggerCore;
  readonly name: string;
  private readonly bindings: LogFields;

  constructor(config: LoggerConfig = {}, core?: LoggerCore) {
    this.name = config.name ?? 'root';
    this.bindings = { ...config.bindings };
    this.core = core ?? {
      transports: [...(config.transports ?? [])],
      minLevel: config.minLevel ?? 'info',
      stats: initializeStats(),
    };
  }

  /**
   * Create a logger that shares this one's transports and adds bound fields
   */
  child(bindings: LogFields = {}, name: string = this.name): Logger {
    return new Logger({ name, bindings: { ...this.bindings, ...bindings } }, this.core);
  }

  /**
   * Add a transport to the logger
   */
  addTransport(transport: LogTransport): void {
    this.core.transports.push(transport);
  }

  /**
   * Remove a transport by name
   */
  removeTransport(name: string): boolean {
    const index = this.core.transports.findIndex(t => t.name === name);
    if (index >= 0) {
      this.core.transports.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Replace all transports
   */
  setTransports(transports: LogTransport[]): void {
    this.core.transports.splice(0, this.core.transports.length, ...transports);
  }

  /**
   * Change the minimum level (affects every logger sharing this core)
   */
  setLevel(level: LogLevel): void {
    this.core.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.core.minLevel;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.core.minLevel];
  }

  /**
   * Emit an entry; returns it, or undefined when below the minimum level
   */
  log(level: LogLevel, message: string, fields: LogFields = {}): LogEntry | undefined {
    if (!this.isLevelEnabled(level)) {
      return undefined;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      fields: { ...this.bindings, ...fields },
    };

    this.core.stats.totalEntries++;
    this.core.stats.byLevel[level]++;

    for (const transport of this.core.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`Log transport ${transport.name} failed: ${String(err)}\n`);
      }
    }

    return entry;
  }

  debug(message: string, fields?: LogFields): LogEntry | undefined {
    return this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): LogEntry | undefined {
    return this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): LogEntry | undefined {
    return this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): LogEntry | undefined {
    return this.log('error', message, fields);
  }

  /**
   * Get logger statistics
   */
  getStats(): LoggerStats {
    return {
      totalEntries: this.core.stats.totalEntries,
      byLevel: { ...this.core.stats.byLevel },
    };
  }

  /**
   * Reset statistics
   */
  resetStats(): void {
    this.core.stats = initializeStats();
  }
}

function initializeStats(): LoggerStats {
  return {
    totalEntries: 0,
    byLevel: { debug: 0, info: 0, warn: 0, error: 0 },
  };
}

const rootLogger = new Logger({ transports: [new ConsoleTransport()] });

/**
 * Get a named logger bound to the process-wide root
 */
export function getLogger(name: string, bindings?: LogFields): Logger {
  return rootLogger.child(bindings, name);
}

/**
 * Reconfigure the process-wide root logger
 */
export function configureLogging(options: { level?: LogLevel; transports?: LogTransport[] }): void {
  if (options.level) {
    rootLogger.setLevel(options.level);
  }
  if (options.transports) {
    rootLogger.setTransports(options.transports);
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Create a logger with a memory transport that records every level (for testing)
 */
export function createTestLogger(name = 'test'): { logger: Logger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = new Logger({ name, minLevel: 'debug', transports: [transport] });
  return { logger, transport };
}
