/**
 * Output helpers, option parsers, info command and program wiring
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { Errors } from '@forensic-cloud/core';
import { createTestLogger } from '@forensic-cloud/logger';
import { MemoryDockerClient } from '@forensic-cloud/collectors';
import { renderTable, reportError, type CliIO } from '../../output.js';
import { parseAlgorithm, parsePositiveInt } from '../../commands/options.js';
import { runInfo } from '../../commands/info.js';
import { createProgram } from '../../program.js';

function recordingIO(): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { io: { out: line => out.push(line), err: line => err.push(line), spinners: false }, out, err };
}

let previousLevel: typeof chalk.level;

beforeEach(() => {
  previousLevel = chalk.level;
  chalk.level = 0;
});

afterEach(() => {
  chalk.level = previousLevel;
});

describe('renderTable', () => {
  it('pads columns to the widest cell', () => {
    expect(renderTable(['A', 'Long'], [['xx', '1'], ['y', '22']])).toEqual([
      'A   Long',
      '──  ────',
      'xx  1',
      'y   22',
    ]);
  });

  it('ignores colour codes when measuring', () => {
    const coloured = '\u001b[32mOK\u001b[39m';

    const [, , row] = renderTable(['Status', 'X'], [[coloured, 'x']]);

    expect(row).toBe(`${coloured}      x`);
  });
});

describe('reportError', () => {
  it('uses the exit status of a ForensicError', () => {
    const { io, err } = recordingIO();

    expect(reportError(io, Errors.notFound('/evidence/a.log'))).toBe(3);
    expect(err).toEqual(['Error: [NOT_FOUND] File not found: /evidence/a.log']);
  });

  it('exits 1 for other errors', () => {
    const { io, err } = recordingIO();

    expect(reportError(io, new TypeError('boom'))).toBe(1);
    expect(err).toEqual(['Error: [TypeError] boom']);
  });

  it('adds a hint for retryable errors', () => {
    const { io, err } = recordingIO();

    expect(reportError(io, Errors.io('/evidence/a.log', new Error('EIO: i/o error')))).toBe(4);
    expect(err).toEqual([
      'Error: [IO_ERROR] Failed to read /evidence/a.log: EIO: i/o error',
      'The failure may be transient; running the command again may succeed.',
    ]);
  });
});

describe('option parsers', () => {
  it('accepts supported algorithms in any case', () => {
    expect(parseAlgorithm('SHA512')).toBe('sha512');
    expect(parseAlgorithm('blake2b')).toBe('blake2b');
  });

  it('rejects an unknown algorithm', () => {
    expect(() => parseAlgorithm('md5')).toThrow(InvalidArgumentError);
  });

  it('accepts positive integers only', () => {
    expect(parsePositiveInt('250')).toBe(250);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer');
    expect(() => parsePositiveInt('1.5')).toThrow('Expected a positive integer');
    expect(() => parsePositiveInt('ten')).toThrow('Expected a positive integer');
  });
});

describe('runInfo', () => {
  it('lists components and provider availability', async () => {
    const { io, out } = recordingIO();

    const status = await runInfo({
      io,
      logger: createTestLogger('cli').logger,
      dockerClient: new MemoryDockerClient({ version: '27.1.1' }),
      env: { outputDir: './output', maxSizeMb: 1024, chunkSize: 65_536, logLevel: 'info' },
    });

    expect(status).toBe(0);
    expect(out).toContain('Hash algorithms: sha256, sha384, sha512, sha3_256, sha3_512, blake2b');
    expect(out.some(line => /^Core \(hasher\)\s+OK$/.test(line))).toBe(true);
    expect(out.some(line => /^Collector \(docker\)\s+OK\s+27\.1\.1$/.test(line))).toBe(true);
    expect(
      out.some(line => /^Collector \(aws\)\s+UNAVAILABLE\s+adapter not included in this build$/.test(line))
    ).toBe(true);
  });
});

describe('createProgram', () => {
  it('registers every command', () => {
    const program = createProgram();

    expect(program.name()).toBe('forensic-cloud');
    expect(program.commands.map(command => command.name())).toEqual([
      'hash',
      'hash-dir',
      'verify',
      'collect',
      'info',
    ]);
    const collect = program.commands.find(command => command.name() === 'collect');
    expect(collect?.commands.map(command => command.name())).toEqual(['docker']);
  });
});
