/**
 * Constants for the forensic-cloud system
 */

/**
 * Version of the persisted manifest document format
 */
export const MANIFEST_SCHEMA_VERSION = '1.0.0';

/**
 * Value written to `local_path` for evidence that never touched disk
 */
export const IN_MEMORY_SENTINEL = '[in-memory]';

/**
 * Hashing defaults
 */
export const HASHING = {
  /** Streamed read size in bytes */
  CHUNK_SIZE: 65_536, // 64 KiB

  /** Algorithm used when none is given */
  DEFAULT_ALGORITHM: 'sha256',
} as const;

/**
 * Collection defaults
 */
export const COLLECTION = {
  /** Where collected files and manifests are written */
  OUTPUT_DIR: './output',

  /** Size cap for one collection run */
  MAX_SIZE_MB: 1024,

  /** Placeholder used for source fields before setSource() */
  UNDEFINED_SOURCE: 'undefined',
} as const;

/**
 * Fallback MIME type for unknown extensions and in-memory evidence
 */
export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/**
 * File extension to MIME type table used when no type is supplied
 */
export const MIME_TYPES: Readonly<Record<string, string>> = {
  '.json': 'application/json',
  '.log': 'text/plain',
  '.txt': 'text/plain',
  '.xml': 'application/xml',
  '.csv': 'text/csv',
  '.gz': 'application/gzip',
  '.zip': 'application/zip',
};

/**
 * CLI version string
 */
export const CLI_VERSION = '1.0.0';
