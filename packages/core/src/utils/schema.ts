/**
 * Schema validation utilities using Zod
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

/**
 * Any schema producing T, whatever its input type
 */
export type SchemaOf<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Result of schema validation
 */
export interface ValidationResult<T> {
  /** Whether validation passed */
  success: boolean;
  /** Validated data (if success) */
  data?: T;
  /** Validation errors (if failure) */
  errors?: ValidationError[];
}

/**
 * Individual validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Error message */
  message: string;
  /** Error code */
  code: string;
}

/**
 * Validate data against a schema, collecting every issue
 */
export function validateSchema<T>(
  schema: SchemaOf<T>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  };
}

/**
 * Render validation errors as `path: message` lines
 */
export function describeValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('; ');
}

// Re-export Zod for convenience
export { z };

