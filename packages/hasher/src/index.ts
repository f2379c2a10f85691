/**
 * @forensic-cloud/hasher
 *
 * Streamed cryptographic digests of evidence files, buffers and streams.
 */

export {
  ForensicHasher,
  resolveAlgorithm,
  toHashRecord,
  calculateSha256,
  verifySha256,
} from './hasher.js';

export { globToRegExp, matchesGlob, pathGlobMatcher } from './glob.js';

export { SUPPORTED_ALGORITHMS, NODE_ALGORITHM_NAMES } from './types.js';
export type {
  HashAlgorithm,
  HasherOptions,
  HashResult,
  HashRecord,
  DirectoryHashOptions,
  DirectoryHashResult,
  SkippedFile,
  HashableStream,
} from './types.js';
