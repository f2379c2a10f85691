/**
 * Error handling utilities
 */

import { ForensicError } from '../errors.js';

/**
 * Check if an error is retryable
 * @param error - The error to check
 * @returns Whether repeating the operation may succeed
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ForensicError) {
    return error.retryable;
  }
  return false;
}

/**
 * Format an error for logging or display
 * @param error - The error to format
 * @returns A formatted error string
 */
export function formatError(error: unknown): string {
  if (error instanceof ForensicError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}

/**
 * Format an error with full details for debugging
 * @param error - The error to format
 * @returns A detailed error object
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  code?: string;
  stack?: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof ForensicError) {
    return {
      message: error.message,
      code: error.code,
      stack: error.stack,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Normalize an unknown thrown value to an Error instance
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
