/**
 * ForensicHasher Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { Errors, ForensicError, HASHING } from '@forensic-cloud/core';
import { createTestLogger, type MemoryTransport, type Logger } from '@forensic-cloud/logger';
import {
  ForensicHasher,
  resolveAlgorithm,
  toHashRecord,
  calculateSha256,
  verifySha256,
  SUPPORTED_ALGORITHMS,
} from '../../index.js';

const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

async function captureError(run: () => unknown): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('ForensicHasher', () => {
  let workDir: string;
  let logger: Logger;
  let transport: MemoryTransport;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'hasher-test-'));
    ({ logger, transport } = createTestLogger('hasher'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('construction', () => {
    it('should default to sha256 with 64 KiB chunks', () => {
      const hasher = new ForensicHasher({ logger });
      expect(hasher.algorithm).toBe('sha256');
      expect(hasher.chunkSize).toBe(65_536);
    });

    it('should accept names case-insensitively and with dashes', () => {
      expect(new ForensicHasher({ algorithm: 'SHA512', logger }).algorithm).toBe('sha512');
      expect(new ForensicHasher({ algorithm: 'sha3-256', logger }).algorithm).toBe('sha3_256');
      expect(resolveAlgorithm('Blake2b')).toBe('blake2b');
    });

    it('should reject unknown algorithms and list the supported set', () => {
      const error = (() => {
        try {
          new ForensicHasher({ algorithm: 'md5', logger });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ForensicError);
      expect(error).toMatchObject({
        code: 'UNSUPPORTED_ALGORITHM',
        message:
          "Algorithm 'md5' is not supported. Available: sha256, sha384, sha512, sha3_256, sha3_512, blake2b",
      });
    });

    it.each([0, -1, 1.5])('should reject chunk size %s', chunkSize => {
      expect(() => new ForensicHasher({ chunkSize, logger })).toThrow(ForensicError);
      expect(() => new ForensicHasher({ chunkSize, logger })).toThrow('Chunk size must be a positive integer');
    });
  });

  describe('hashBytes', () => {
    it('should match known sha256 vectors', () => {
      const hasher = new ForensicHasher({ logger });
      expect(hasher.hashBytes(Buffer.alloc(0))).toBe(SHA256_EMPTY);
      expect(hasher.hashBytes(Buffer.from('abc'))).toBe(SHA256_ABC);
    });

    it.each(SUPPORTED_ALGORITHMS.map(a => [a]))('should produce lowercase hex for %s', algorithm => {
      const digest = new ForensicHasher({ algorithm, logger }).hashBytes(Buffer.from('abc'));
      expect(digest).toMatch(/^[0-9a-f]+$/);
    });

    it('should produce digests of the expected length', () => {
      const lengths = Object.fromEntries(
        SUPPORTED_ALGORITHMS.map(a => [a, new ForensicHasher({ algorithm: a, logger }).hashBytes(Buffer.from('x')).length])
      );
      expect(lengths).toEqual({
        sha256: 64,
        sha384: 96,
        sha512: 128,
        sha3_256: 64,
        sha3_512: 128,
        blake2b: 128,
      });
    });
  });

  describe('hashFile', () => {
    it('should return the digest, absolute path and size', async () => {
      const file = path.join(workDir, 'abc.txt');
      await writeFile(file, 'abc');
      const hasher = new ForensicHasher({ logger });

      const before = new Date().toISOString();
      const result = await hasher.hashFile(file);

      expect(result).toMatchObject({
        algorithm: 'sha256',
        hashValue: SHA256_ABC,
        filePath: file,
        fileSize: 3,
        verified: false,
      });
      expect(result.calculatedAt >= before).toBe(true);
    });

    it('should resolve relative paths', async () => {
      const file = path.join(workDir, 'rel.txt');
      await writeFile(file, 'abc');
      const relative = path.relative(process.cwd(), file);

      const result = await new ForensicHasher({ logger }).hashFile(relative);
      expect(result.filePath).toBe(file);
    });

    it('should be deterministic and agree with hashBytes', async () => {
      const data = Buffer.from('evidence content\n');
      const file = path.join(workDir, 'e.log');
      await writeFile(file, data);
      const hasher = new ForensicHasher({ algorithm: 'sha512', logger });

      const first = await hasher.hashFile(file);
      const second = await hasher.hashFile(file);

      expect(first.hashValue).toBe(second.hashValue);
      expect(first.hashValue).toBe(hasher.hashBytes(data));
      expect(first.hashValue).toBe(createHash('sha512').update(data).digest('hex'));
    });

    it.each([0, HASHING.CHUNK_SIZE - 1, HASHING.CHUNK_SIZE, HASHING.CHUNK_SIZE + 1])(
      'should match a single-shot digest for %i bytes',
      async size => {
        const data = Buffer.alloc(size);
        for (let i = 0; i < size; i++) data[i] = i % 251;
        const file = path.join(workDir, `boundary-${size}.bin`);
        await writeFile(file, data);

        const result = await new ForensicHasher({ logger }).hashFile(file);

        expect(result.fileSize).toBe(size);
        expect(result.hashValue).toBe(createHash('sha256').update(data).digest('hex'));
      }
    );

    it('should stream with small chunk sizes', async () => {
      const data = Buffer.from('0123456789abcdefXYZ');
      const file = path.join(workDir, 'small-chunks.bin');
      await writeFile(file, data);

      const result = await new ForensicHasher({ algorithm: 'blake2b', chunkSize: 4, logger }).hashFile(file);

      expect(result.fileSize).toBe(19);
      expect(result.hashValue).toBe(createHash('blake2b512').update(data).digest('hex'));
    });

    it('should raise NOT_FOUND for a missing file', async () => {
      const missing = path.join(workDir, 'nope.txt');
      const error = await captureError(() => new ForensicHasher({ logger }).hashFile(missing));

      expect(error).toBeInstanceOf(ForensicError);
      expect(error).toMatchObject({ code: 'NOT_FOUND', message: `File not found: ${missing}` });
    });

    it('should raise NOT_A_FILE for a directory', async () => {
      const error = await captureError(() => new ForensicHasher({ logger }).hashFile(workDir));
      expect(error).toMatchObject({ code: 'NOT_A_FILE' });
    });
  });

  describe('hashStream', () => {
    it('should hash every chunk of a readable', async () => {
      const stream = Readable.from([Buffer.from('a'), Buffer.from('bc')]);
      expect(await new ForensicHasher({ logger }).hashStream(stream)).toBe(SHA256_ABC);
    });

    it('should accept string chunks from an async iterable', async () => {
      async function* chunks(): AsyncGenerator<string> {
        yield 'ab';
        yield 'c';
      }
      expect(await new ForensicHasher({ logger }).hashStream(chunks())).toBe(SHA256_ABC);
    });

    it('should hash an empty stream', async () => {
      expect(await new ForensicHasher({ logger }).hashStream(Readable.from([]))).toBe(SHA256_EMPTY);
    });
  });

  describe('verifyFile', () => {
    let file: string;

    beforeEach(async () => {
      file = path.join(workDir, 'verify.txt');
      await writeFile(file, 'abc');
    });

    it('should accept the file digest in any case', async () => {
      const hasher = new ForensicHasher({ logger });
      expect(await hasher.verifyFile(file, SHA256_ABC)).toBe(true);
      expect(await hasher.verifyFile(file, SHA256_ABC.toUpperCase())).toBe(true);
      expect(transport.getEntries('info').map(e => e.message)).toEqual([
        'Verification passed',
        'Verification passed',
      ]);
    });

    it('should return false and warn on a different digest', async () => {
      const hasher = new ForensicHasher({ logger });
      expect(await hasher.verifyFile(file, SHA256_EMPTY)).toBe(false);

      const [warning] = transport.getEntries('warn');
      expect(warning.message).toBe('Verification failed');
      expect(warning.fields).toMatchObject({ expected: SHA256_EMPTY, actual: SHA256_ABC });
    });

    it('should still raise NOT_FOUND', async () => {
      const error = await captureError(() =>
        new ForensicHasher({ logger }).verifyFile(path.join(workDir, 'gone'), SHA256_ABC)
      );
      expect(error).toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  describe('hashDirectory', () => {
    beforeEach(async () => {
      await writeFile(path.join(workDir, 'c.log'), 'c');
      await writeFile(path.join(workDir, 'a.txt'), 'a');
      await mkdir(path.join(workDir, 'nested'));
      await writeFile(path.join(workDir, 'nested', 'b.txt'), 'b');
    });

    it('should hash files recursively in path order', async () => {
      const { results, skipped } = await new ForensicHasher({ logger }).hashDirectory(workDir);

      expect(results.map(r => path.relative(workDir, r.filePath))).toEqual([
        'a.txt',
        'c.log',
        path.join('nested', 'b.txt'),
      ]);
      expect(skipped).toEqual([]);
    });

    it('should stay at the top level when not recursive', async () => {
      const { results } = await new ForensicHasher({ logger }).hashDirectory(workDir, {
        recursive: false,
      });
      expect(results.map(r => path.basename(r.filePath))).toEqual(['a.txt', 'c.log']);
    });

    it('should filter by file-name pattern', async () => {
      const { results } = await new ForensicHasher({ logger }).hashDirectory(workDir, {
        pattern: '*.txt',
      });
      expect(results.map(r => path.basename(r.filePath))).toEqual(['a.txt', 'b.txt']);
    });

    it('should order paths component by component', async () => {
      await mkdir(path.join(workDir, 'a'));
      await writeFile(path.join(workDir, 'a', 'b.txt'), 'ab');
      await writeFile(path.join(workDir, 'a-c.txt'), 'ac');

      const { results } = await new ForensicHasher({ logger }).hashDirectory(workDir, {
        pattern: '*.txt',
      });

      expect(results.map(r => path.relative(workDir, r.filePath))).toEqual([
        path.join('a', 'b.txt'),
        'a-c.txt',
        'a.txt',
        path.join('nested', 'b.txt'),
      ]);
    });

    it('should match multi-segment patterns against trailing path segments', async () => {
      await mkdir(path.join(workDir, 'deep', 'nested'), { recursive: true });
      await writeFile(path.join(workDir, 'deep', 'nested', 'd.txt'), 'd');
      const hasher = new ForensicHasher({ logger });

      const recursive = await hasher.hashDirectory(workDir, { pattern: 'nested/*.txt' });
      const flat = await hasher.hashDirectory(workDir, { pattern: 'nested/*.txt', recursive: false });

      expect(recursive.results.map(r => path.relative(workDir, r.filePath))).toEqual([
        path.join('deep', 'nested', 'd.txt'),
        path.join('nested', 'b.txt'),
      ]);
      expect(flat.results.map(r => path.relative(workDir, r.filePath))).toEqual([
        path.join('nested', 'b.txt'),
      ]);
    });

    it('should skip unreadable files without raising', async () => {
      await writeFile(path.join(workDir, 'b.bin'), 'locked');
      const hasher = new ForensicHasher({ logger });
      const original = hasher.hashFile.bind(hasher);
      const locked = path.join(workDir, 'b.bin');
      vi.spyOn(hasher, 'hashFile').mockImplementation(async (file: string) => {
        if (file === locked) {
          throw Errors.io(file, new Error('EACCES: permission denied'));
        }
        return original(file);
      });

      const { results, skipped } = await hasher.hashDirectory(workDir);

      expect(results).toHaveLength(3);
      expect(skipped).toEqual([
        { path: locked, reason: `Failed to read ${locked}: EACCES: permission denied` },
      ]);
      const warnings = transport.getEntries('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe('Skipping unreadable file');
    });

    it('should propagate faults other than read failures', async () => {
      const hasher = new ForensicHasher({ logger });
      vi.spyOn(hasher, 'hashFile').mockRejectedValue(Errors.internalError('boom'));

      const error = await captureError(() => hasher.hashDirectory(workDir));
      expect(error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'boom' });
    });

    it('should raise NOT_A_DIRECTORY for a file or a missing path', async () => {
      const hasher = new ForensicHasher({ logger });
      const fileError = await captureError(() => hasher.hashDirectory(path.join(workDir, 'a.txt')));
      const missingError = await captureError(() => hasher.hashDirectory(path.join(workDir, 'missing')));

      expect(fileError).toMatchObject({ code: 'NOT_A_DIRECTORY' });
      expect(missingError).toMatchObject({ code: 'NOT_A_DIRECTORY' });
    });
  });

  describe('helpers', () => {
    it('should render the persisted record form', () => {
      expect(
        toHashRecord({
          algorithm: 'sha256',
          hashValue: SHA256_ABC,
          filePath: '/evidence/abc.txt',
          fileSize: 3,
          calculatedAt: '2025-01-15T10:00:00.000Z',
          verified: false,
        })
      ).toEqual({
        algorithm: 'sha256',
        hash_value: SHA256_ABC,
        file_path: '/evidence/abc.txt',
        file_size_bytes: 3,
        calculated_at_utc: '2025-01-15T10:00:00.000Z',
        verified: false,
      });
    });

    it('should compute and verify sha256 of a file', async () => {
      const file = path.join(workDir, 'helper.txt');
      await writeFile(file, 'abc');

      expect(await calculateSha256(file)).toBe(SHA256_ABC);
      expect(await verifySha256(file, SHA256_ABC)).toBe(true);
      expect(await verifySha256(file, SHA256_EMPTY)).toBe(false);
    });
  });
});
