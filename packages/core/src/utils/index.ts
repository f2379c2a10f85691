/**
 * Utility exports for @forensic-cloud/core
 */

// ID and time utilities
export { generateCollectionId, isUuid, utcNow, fileTimestamp } from './id.js';

// Canonical JSON
export { canonicalize } from './canonical.js';
export type { JsonValue } from './canonical.js';

// Host identity
export { getHostIdentity, getUsername, getIpAddress, getOsInfo } from './host.js';
export type { HostIdentity } from './host.js';

// Schema validation utilities
export { validateSchema, describeValidationErrors, z } from './schema.js';
export type { ValidationResult, ValidationError, SchemaOf } from './schema.js';

// Error utilities
export {
  isRetryableError,
  formatError,
  formatErrorDetails,
  getSystemErrorCode,
  asError,
} from './error-helpers.js';
