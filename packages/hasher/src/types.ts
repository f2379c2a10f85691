/**
 * Hasher Types
 */

import type { Logger } from '@forensic-cloud/logger';

/**
 * Supported digest algorithms
 */
export const SUPPORTED_ALGORITHMS = [
  'sha256',
  'sha384',
  'sha512',
  'sha3_256',
  'sha3_512',
  'blake2b',
] as const;

export type HashAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

/**
 * Node.js crypto names for each supported algorithm
 */
export const NODE_ALGORITHM_NAMES: Record<HashAlgorithm, string> = {
  sha256: 'sha256',
  sha384: 'sha384',
  sha512: 'sha512',
  sha3_256: 'sha3-256',
  sha3_512: 'sha3-512',
  blake2b: 'blake2b512',
};

/**
 * Hasher construction options
 */
export interface HasherOptions {
  /** Algorithm name, case-insensitive, `-` accepted for `_` (default: sha256) */
  algorithm?: string;
  /** Read size for streamed input in bytes (default: 65536) */
  chunkSize?: number;
  /** Logger to report through (default: the `hasher` logger) */
  logger?: Logger;
}

/**
 * Result of hashing one file
 */
export interface HashResult {
  algorithm: HashAlgorithm;
  /** Lowercase hex digest */
  hashValue: string;
  /** Absolute path of the hashed file */
  filePath: string;
  /** Bytes read */
  fileSize: number;
  /** ISO-8601 UTC time captured before reading */
  calculatedAt: string;
  verified: boolean;
}

/**
 * Persisted form of a HashResult
 */
export interface HashRecord {
  algorithm: string;
  hash_value: string;
  file_path: string;
  file_size_bytes: number;
  calculated_at_utc: string;
  verified: boolean;
}

/**
 * Options for hashing a directory
 */
export interface DirectoryHashOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  /**
   * Glob with `*`, `?` and `[...]`, segments separated by `/` (default: `*`).
   * Recursive searches match the trailing segments of each path.
   */
  pattern?: string;
}

/**
 * A file left out of a directory hash
 */
export interface SkippedFile {
  path: string;
  reason: string;
}

/**
 * Result of hashing a directory
 */
export interface DirectoryHashResult {
  results: HashResult[];
  skipped: SkippedFile[];
}

/**
 * Input accepted by hashStream: Node readables and any async iterable of chunks
 */
export type HashableStream = AsyncIterable<Uint8Array | string>;
