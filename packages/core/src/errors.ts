/**
 * Error codes and custom error classes for forensic-cloud
 */

/**
 * All error codes used in the forensic-cloud system
 */
export type ErrorCode =
  // Configuration errors
  | 'UNSUPPORTED_ALGORITHM'
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION_ERROR'
  | 'UNSUPPORTED_SOURCE'

  // Resource errors
  | 'NOT_FOUND'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'

  // I/O errors
  | 'IO_ERROR'

  // Manifest errors
  | 'INVALID_MANIFEST'
  | 'MANIFEST_FINALIZED'

  // Collection errors
  | 'AUTHENTICATION_FAILED'
  | 'COLLECTION_FAILED'
  | 'PROVIDER_UNAVAILABLE'

  // System errors
  | 'INTERNAL_ERROR';

/**
 * Error code to CLI exit status mapping
 */
export const ERROR_EXIT_CODES: Record<ErrorCode, number> = {
  // 2: usage / configuration
  UNSUPPORTED_ALGORITHM: 2,
  INVALID_ARGUMENT: 2,
  CONFIGURATION_ERROR: 2,
  UNSUPPORTED_SOURCE: 2,

  // 3: missing input
  NOT_FOUND: 3,
  NOT_A_FILE: 3,
  NOT_A_DIRECTORY: 3,

  // 4: I/O
  IO_ERROR: 4,

  // 5: manifest
  INVALID_MANIFEST: 5,
  MANIFEST_FINALIZED: 5,

  // 6: collection
  AUTHENTICATION_FAILED: 6,
  COLLECTION_FAILED: 6,
  PROVIDER_UNAVAILABLE: 6,

  // 1: everything else
  INTERNAL_ERROR: 1,
};

/**
 * Custom error class for forensic-cloud errors
 */
export class ForensicError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Process exit status the CLI uses for this error */
  readonly exitCode: number;

  /** Whether repeating the whole operation may succeed */
  readonly retryable: boolean;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'ForensicError';
    this.code = code;
    this.exitCode = ERROR_EXIT_CODES[code];
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
    this.cause = options?.cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ForensicError);
    }
  }

  /**
   * Create a JSON representation of the error
   */
  toJSON(): {
    code: ErrorCode;
    message: string;
    exitCode: number;
    retryable: boolean;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  // Configuration errors
  unsupportedAlgorithm: (algorithm: string, supported: readonly string[]) =>
    new ForensicError(
      'UNSUPPORTED_ALGORITHM',
      `Algorithm '${algorithm}' is not supported. Available: ${supported.join(', ')}`,
      { details: { algorithm, supported: [...supported] } }
    ),

  invalidArgument: (message: string, details?: Record<string, unknown>) =>
    new ForensicError('INVALID_ARGUMENT', message, { details }),

  configuration: (message: string, details?: Record<string, unknown>) =>
    new ForensicError('CONFIGURATION_ERROR', message, { details }),

  unsupportedSource: (sourceType: string, provider: string, supported: readonly string[]) =>
    new ForensicError(
      'UNSUPPORTED_SOURCE',
      `Source '${sourceType}' is not supported by ${provider}. Available: ${supported.join(', ')}`,
      { details: { sourceType, provider, supported: [...supported] } }
    ),

  // Resource errors
  notFound: (path: string) =>
    new ForensicError('NOT_FOUND', `File not found: ${path}`, {
      details: { path },
    }),

  notAFile: (path: string) =>
    new ForensicError('NOT_A_FILE', `Path is not a regular file: ${path}`, {
      details: { path },
    }),

  notADirectory: (path: string) =>
    new ForensicError('NOT_A_DIRECTORY', `Not a directory: ${path}`, {
      details: { path },
    }),

  // I/O errors
  io: (path: string, cause?: Error) =>
    new ForensicError('IO_ERROR', `Failed to read ${path}: ${cause?.message ?? 'unknown error'}`, {
      retryable: true,
      details: { path },
      cause,
    }),

  // Manifest errors
  invalidManifest: (message: string, details?: Record<string, unknown>) =>
    new ForensicError('INVALID_MANIFEST', message, { details }),

  manifestFinalized: (collectionId: string, operation: string) =>
    new ForensicError(
      'MANIFEST_FINALIZED',
      `Manifest ${collectionId} is finalized; ${operation} is not allowed`,
      { details: { collectionId, operation } }
    ),

  // Collection errors
  authenticationFailed: (provider: string, cause?: Error) =>
    new ForensicError(
      'AUTHENTICATION_FAILED',
      `Authentication with ${provider} failed${cause ? `: ${cause.message}` : ''}`,
      { details: { provider }, cause }
    ),

  collectionFailed: (message: string, details?: Record<string, unknown>, cause?: Error) =>
    new ForensicError('COLLECTION_FAILED', message, { details, cause }),

  providerUnavailable: (provider: string, reason: string) =>
    new ForensicError('PROVIDER_UNAVAILABLE', `Provider ${provider} is unavailable: ${reason}`, {
      details: { provider, reason },
    }),

  // System errors
  internalError: (message: string, cause?: Error) =>
    new ForensicError('INTERNAL_ERROR', message, { cause }),
};

/**
 * Type guard to check if an error is a ForensicError
 */
export function isForensicError(error: unknown): error is ForensicError {
  return error instanceof ForensicError;
}

/**
 * Convert any error to a ForensicError
 */
export function toForensicError(error: unknown): ForensicError {
  if (error instanceof ForensicError) {
    return error;
  }

  if (error instanceof Error) {
    return new ForensicError('INTERNAL_ERROR', error.message, {
      cause: error,
    });
  }

  return new ForensicError('INTERNAL_ERROR', String(error));
}
