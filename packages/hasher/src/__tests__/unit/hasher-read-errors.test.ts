/**
 * ForensicHasher read-failure Tests
 *
 * The file passes the regular-file check, then its read stream fails.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createReadStream } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { ForensicError } from '@forensic-cloud/core';
import { createTestLogger, type Logger, type MemoryTransport } from '@forensic-cloud/logger';
import { ForensicHasher } from '../../index.js';

vi.mock('node:fs', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, createReadStream: vi.fn(actual.createReadStream) };
});

const { createReadStream: openReadStream } = await vi.importActual<typeof import('node:fs')>('node:fs');

describe('ForensicHasher read failures', () => {
  let workDir: string;
  let lockedFile: string;
  let logger: Logger;
  let transport: MemoryTransport;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'hasher-read-test-'));
    lockedFile = path.join(workDir, 'locked.log');
    await writeFile(lockedFile, 'locked');
    await writeFile(path.join(workDir, 'open.log'), 'open');
    ({ logger, transport } = createTestLogger('hasher'));

    // Reading a directory fails with EISDIR once the stream starts
    vi.mocked(createReadStream).mockImplementation((file, options) =>
      openReadStream(file === lockedFile ? workDir : file, options)
    );
  });

  afterEach(async () => {
    vi.mocked(createReadStream).mockReset();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should raise IO_ERROR with the stream error as cause', async () => {
    const hasher = new ForensicHasher({ logger });

    const error = await hasher.hashFile(lockedFile).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ForensicError);
    expect(error).toMatchObject({ code: 'IO_ERROR', retryable: true, details: { path: lockedFile } });
    expect(error).toHaveProperty('cause.code', 'EISDIR');
    expect(error).toHaveProperty(
      'message',
      `Failed to read ${lockedFile}: EISDIR: illegal operation on a directory, read`
    );
  });

  it('should record the file as skipped when hashing a directory', async () => {
    const hasher = new ForensicHasher({ logger });

    const { results, skipped } = await hasher.hashDirectory(workDir);

    expect(results.map(r => path.basename(r.filePath))).toEqual(['open.log']);
    expect(skipped).toEqual([
      {
        path: lockedFile,
        reason: `Failed to read ${lockedFile}: EISDIR: illegal operation on a directory, read`,
      },
    ]);
    expect(transport.getEntries('warn').map(entry => entry.message)).toEqual(['Skipping unreadable file']);
  });
});
