/**
 * Forensic Hasher
 *
 * Computes and verifies digests of files, buffers and streams. File input
 * is streamed in `chunkSize` reads, so memory use does not grow with file size.
 */

import { createHash, type Hash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import {
  Errors,
  ForensicError,
  HASHING,
  asError,
  getSystemErrorCode,
  utcNow,
} from '@forensic-cloud/core';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import { pathGlobMatcher } from './glob.js';
import {
  NODE_ALGORITHM_NAMES,
  SUPPORTED_ALGORITHMS,
  type DirectoryHashOptions,
  type DirectoryHashResult,
  type HashAlgorithm,
  type HashRecord,
  type HashResult,
  type HashableStream,
  type HasherOptions,
  type SkippedFile,
} from './types.js';

/**
 * Normalize an algorithm name: lowercase, `-` read as `_`
 * @throws ForensicError UNSUPPORTED_ALGORITHM
 */
export function resolveAlgorithm(name: string): HashAlgorithm {
  const normalized = name.trim().toLowerCase().replace(/-/g, '_');
  const match = SUPPORTED_ALGORITHMS.find(a => a === normalized);
  if (!match) {
    throw Errors.unsupportedAlgorithm(name, SUPPORTED_ALGORITHMS);
  }
  return match;
}

/**
 * Hasher bound to one algorithm and chunk size
 */
export class ForensicHasher {
  readonly algorithm: HashAlgorithm;
  readonly chunkSize: number;
  private readonly logger: Logger;

  constructor(options: HasherOptions = {}) {
    this.algorithm = resolveAlgorithm(options.algorithm ?? HASHING.DEFAULT_ALGORITHM);

    const chunkSize = options.chunkSize ?? HASHING.CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw Errors.invalidArgument(`Chunk size must be a positive integer, got ${chunkSize}`, {
        chunkSize,
      });
    }
    this.chunkSize = chunkSize;

    this.logger = (options.logger ?? getLogger('hasher')).child({ algorithm: this.algorithm });
    this.logger.debug('Hasher initialized', { chunkSize });
  }

  /**
   * Hash a regular file
   * @throws ForensicError NOT_FOUND, NOT_A_FILE or IO_ERROR
   */
  async hashFile(filePath: string): Promise<HashResult> {
    const absolutePath = path.resolve(filePath);
    await this.assertRegularFile(absolutePath);

    const calculatedAt = utcNow();
    const hash = this.newHash();
    let fileSize = 0;

    try {
      const stream = createReadStream(absolutePath, { highWaterMark: this.chunkSize });
      for await (const chunk of stream) {
        const bytes = toBytes(chunk);
        hash.update(bytes);
        fileSize += bytes.length;
      }
    } catch (error) {
      throw Errors.io(absolutePath, asError(error));
    }

    const hashValue = hash.digest('hex');
    this.logger.debug('File hashed', {
      file: absolutePath,
      size: fileSize,
      hash: `${hashValue.slice(0, 16)}...`,
    });

    return {
      algorithm: this.algorithm,
      hashValue,
      filePath: absolutePath,
      fileSize,
      calculatedAt,
      verified: false,
    };
  }

  /**
   * Hash an in-memory byte sequence
   */
  hashBytes(data: Uint8Array): string {
    return this.newHash().update(data).digest('hex');
  }

  /**
   * Hash a stream read to exhaustion; the stream is neither closed nor rewound
   */
  async hashStream(stream: HashableStream): Promise<string> {
    const hash = this.newHash();
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  }

  /**
   * Compare a file's digest with an expected hex value, ignoring case
   * @throws ForensicError NOT_FOUND, NOT_A_FILE or IO_ERROR
   */
  async verifyFile(filePath: string, expectedHex: string): Promise<boolean> {
    const result = await this.hashFile(filePath);
    const matches = result.hashValue === expectedHex.trim().toLowerCase();

    if (matches) {
      this.logger.info('Verification passed', { file: result.filePath });
    } else {
      this.logger.warn('Verification failed', {
        file: result.filePath,
        expected: expectedHex,
        actual: result.hashValue,
      });
    }

    return matches;
  }

  /**
   * Hash every matching regular file under a directory, in path order.
   * Files that cannot be read are skipped with a warning.
   * @throws ForensicError NOT_A_DIRECTORY
   */
  async hashDirectory(
    directoryPath: string,
    options: DirectoryHashOptions = {}
  ): Promise<DirectoryHashResult> {
    const root = path.resolve(directoryPath);
    const recursive = options.recursive ?? true;
    const pattern = options.pattern ?? '*';
    const matches = pathGlobMatcher(pattern, !recursive);
    // Without recursion a pattern still reaches as deep as it has segments
    const maxDepth = recursive ? Number.POSITIVE_INFINITY : pattern.split('/').filter(Boolean).length || 1;

    const isDirectory = await stat(root).then(
      s => s.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw Errors.notADirectory(root);
    }

    const files = (await listFiles(root, maxDepth))
      .map(file => path.relative(root, file).split(path.sep))
      .filter(matches)
      .sort(compareSegments)
      .map(segments => path.join(root, ...segments));

    const results: HashResult[] = [];
    const skipped: SkippedFile[] = [];

    for (const file of files) {
      try {
        results.push(await this.hashFile(file));
      } catch (error) {
        if (error instanceof ForensicError && (error.code === 'IO_ERROR' || error.code === 'NOT_FOUND')) {
          this.logger.warn('Skipping unreadable file', { file, error: error.message });
          skipped.push({ path: file, reason: error.message });
          continue;
        }
        throw error;
      }
    }

    this.logger.info('Directory hashed', {
      directory: root,
      hashed: results.length,
      skipped: skipped.length,
    });

    return { results, skipped };
  }

  private newHash(): Hash {
    return createHash(NODE_ALGORITHM_NAMES[this.algorithm]);
  }

  private async assertRegularFile(filePath: string): Promise<void> {
    let isFile: boolean;
    try {
      isFile = (await stat(filePath)).isFile();
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw Errors.notFound(filePath);
      }
      throw Errors.io(filePath, asError(error));
    }
    if (!isFile) {
      throw Errors.notAFile(filePath);
    }
  }
}

function toBytes(chunk: unknown): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
}

/**
 * Order paths component by component, so `a/b.txt` sorts before `a-c.txt`
 */
function compareSegments(a: readonly string[], b: readonly string[]): number {
  const shared = Math.min(a.length, b.length);
  for (let index = 0; index < shared; index++) {
    const left = a[index] ?? '';
    const right = b[index] ?? '';
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return a.length - b.length;
}

async function listFiles(directory: string, depth: number): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (depth > 1) {
        files.push(...(await listFiles(fullPath, depth - 1)));
      }
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      const target = await stat(fullPath).catch(() => undefined);
      if (target?.isFile()) {
        files.push(fullPath);
      }
    }
  }

  return files;
}

/**
 * Render a HashResult in its persisted snake_case form
 */
export function toHashRecord(result: HashResult): HashRecord {
  return {
    algorithm: result.algorithm,
    hash_value: result.hashValue,
    file_path: result.filePath,
    file_size_bytes: result.fileSize,
    calculated_at_utc: result.calculatedAt,
    verified: result.verified,
  };
}

/**
 * SHA-256 hex digest of a file
 */
export async function calculateSha256(filePath: string): Promise<string> {
  return (await new ForensicHasher({ algorithm: 'sha256' }).hashFile(filePath)).hashValue;
}

/**
 * Check a file against an expected SHA-256 hex digest
 */
export async function verifySha256(filePath: string, expectedHex: string): Promise<boolean> {
  return new ForensicHasher({ algorithm: 'sha256' }).verifyFile(filePath, expectedHex);
}
