/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  Logger,
  MemoryTransport,
  ConsoleTransport,
  formatEntry,
  createTestLogger,
  isLogLevel,
} from '../../index.js';
import type { LogEntry, LogTransport } from '../../index.js';

describe('Logger', () => {
  let logger: Logger;
  let transport: MemoryTransport;

  beforeEach(() => {
    ({ logger, transport } = createTestLogger('hasher'));
  });

  describe('levels', () => {
    it('should emit at every level when minLevel is debug', () => {
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(transport.getEntries().map(e => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
    });

    it('should drop entries below the minimum level', () => {
      logger.setLevel('warn');

      expect(logger.info('ignored')).toBeUndefined();
      logger.warn('kept');

      expect(transport.getEntries()).toHaveLength(1);
      expect(transport.getEntries()[0].message).toBe('kept');
    });

    it('should default to info', () => {
      const plain = new Logger({ transports: [transport] });
      plain.debug('hidden');
      plain.info('shown');

      expect(plain.getLevel()).toBe('info');
      expect(transport.getEntries()).toHaveLength(1);
    });

    it('should report enabled levels', () => {
      logger.setLevel('info');
      expect(logger.isLevelEnabled('debug')).toBe(false);
      expect(logger.isLevelEnabled('error')).toBe(true);
    });
  });

  describe('entries', () => {
    it('should record logger name, message and fields', () => {
      const entry = logger.info('hashed file', { path: '/tmp/a', size: 19 });

      expect(entry).toMatchObject({
        level: 'info',
        logger: 'hasher',
        message: 'hashed file',
        fields: { path: '/tmp/a', size: 19 },
      });
      expect(entry?.timestamp).toBeInstanceOf(Date);
    });

    it('should filter entries by level', () => {
      logger.info('a');
      logger.error('b');

      expect(transport.getEntries('error').map(e => e.message)).toEqual(['b']);
    });

    it('should clear recorded entries', () => {
      logger.info('a');
      transport.clear();
      expect(transport.getEntries()).toEqual([]);
    });
  });

  describe('child loggers', () => {
    it('should merge bound fields with call fields', () => {
      const child = logger.child({ collectionId: 'c-1' }, 'manifest');
      child.info('note added', { author: 'alice' });

      const [entry] = transport.getEntries();
      expect(entry.logger).toBe('manifest');
      expect(entry.fields).toEqual({ collectionId: 'c-1', author: 'alice' });
    });

    it('should let call fields override bound fields', () => {
      const child = logger.child({ step: 1 });
      child.info('x', { step: 2 });

      expect(transport.getEntries()[0].fields).toEqual({ step: 2 });
    });

    it('should keep the parent name when none is given', () => {
      logger.child({ a: 1 }).info('x');
      expect(transport.getEntries()[0].logger).toBe('hasher');
    });

    it('should share level and transports with the parent', () => {
      const child = logger.child();
      logger.setLevel('error');
      child.warn('dropped');

      const extra = new MemoryTransport();
      child.addTransport(extra);
      logger.error('both');

      expect(transport.getEntries().map(e => e.message)).toEqual(['both']);
      expect(extra.getEntries().map(e => e.message)).toEqual(['both']);
    });
  });

  describe('transports', () => {
    it('should remove a transport by name', () => {
      expect(logger.removeTransport('memory')).toBe(true);
      expect(logger.removeTransport('memory')).toBe(false);

      logger.info('nowhere');
      expect(transport.getEntries()).toEqual([]);
    });

    it('should keep logging when a transport throws', () => {
      const failing: LogTransport = {
        name: 'failing',
        write: () => {
          throw new Error('disk full');
        },
      };
      const quiet = new Logger({
        minLevel: 'debug',
        transports: [failing, transport],
      });
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      try {
        quiet.info('still delivered');
        expect(write).toHaveBeenCalledWith('Log transport failing failed: Error: disk full\n');
      } finally {
        write.mockRestore();
      }

      expect(transport.getEntries()).toHaveLength(1);
    });

    it('should write console entries to the given stream', () => {
      const chunks: string[] = [];
      const stream = {
        write: (chunk: string): boolean => {
          chunks.push(chunk);
          return true;
        },
      };
      const consoleTransport = new ConsoleTransport(stream);
      const entry: LogEntry = {
        timestamp: new Date('2025-01-15T10:00:00.000Z'),
        level: 'warn',
        logger: 'cli',
        message: 'skipped',
        fields: {},
      };
      consoleTransport.write(entry);

      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toContain('[WARN]');
      expect(chunks[0]).toContain('[cli] skipped');
      expect(chunks[0].endsWith('\n')).toBe(true);
    });
  });

  describe('formatEntry', () => {
    const base: LogEntry = {
      timestamp: new Date('2025-01-15T10:00:00.000Z'),
      level: 'info',
      logger: 'hasher',
      message: 'hashed',
      fields: {},
    };

    it('should render without fields', () => {
      expect(formatEntry(base)).toBe('2025-01-15T10:00:00.000Z [INFO] [hasher] hashed');
    });

    it('should render fields as key=value pairs', () => {
      const line = formatEntry({
        ...base,
        fields: { path: '/tmp/my file', size: 19, ok: true, err: new Error('boom') },
      });

      expect(line).toBe(
        '2025-01-15T10:00:00.000Z [INFO] [hasher] hashed path="/tmp/my file" size=19 ok=true err="boom"'
      );
    });
  });

  describe('statistics', () => {
    it('should count entries by level', () => {
      logger.info('a');
      logger.info('b');
      logger.error('c');

      const stats = logger.getStats();
      expect(stats.totalEntries).toBe(3);
      expect(stats.byLevel).toEqual({ debug: 0, info: 2, warn: 0, error: 1 });
    });

    it('should not count dropped entries', () => {
      logger.setLevel('error');
      logger.info('dropped');
      expect(logger.getStats().totalEntries).toBe(0);
    });

    it('should reset statistics', () => {
      logger.info('a');
      logger.resetStats();
      expect(logger.getStats().totalEntries).toBe(0);
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
