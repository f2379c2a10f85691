/**
 * @forensic-cloud/core
 *
 * Error taxonomy, constants and shared utilities for forensic evidence collection.
 */

// Errors
export {
  ForensicError,
  Errors,
  isForensicError,
  toForensicError,
  ERROR_EXIT_CODES,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Utilities
export * from './utils/index.js';

// Configuration
export { loadEnvironmentConfig, LOG_LEVELS } from './config/environment.js';
export type { EnvironmentConfig } from './config/environment.js';

// Constants
export {
  MANIFEST_SCHEMA_VERSION,
  IN_MEMORY_SENTINEL,
  HASHING,
  COLLECTION,
  DEFAULT_MIME_TYPE,
  MIME_TYPES,
  CLI_VERSION,
} from './constants.js';
