/**
 * Environment configuration
 *
 * Reads the FORENSIC_* and LOG_LEVEL variables, applies defaults and
 * rejects malformed values up front.
 */

import { z } from 'zod';
import { COLLECTION, HASHING } from '../constants.js';
import { Errors } from '../errors.js';
import { describeValidationErrors, validateSchema } from '../utils/schema.js';

/**
 * Log levels accepted in LOG_LEVEL
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const EnvironmentSchema = z.object({
  FORENSIC_OUTPUT_DIR: optionalText,
  FORENSIC_AGENT_NAME: optionalText,
  FORENSIC_AGENT_ID: optionalText,
  FORENSIC_MAX_SIZE_MB: z.coerce.number().int().positive().optional(),
  FORENSIC_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

/**
 * Resolved environment configuration
 */
export interface EnvironmentConfig {
  /** Directory for collected files and manifests */
  outputDir: string;
  /** Default agent name for CLI collections */
  agentName?: string;
  /** Default agent ID for CLI collections */
  agentId?: string;
  /** Size cap per collection run, in MiB */
  maxSizeMb: number;
  /** Streamed read size for hashing, in bytes */
  chunkSize: number;
  /** Minimum log level */
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Load configuration from environment variables
 * @param env - Variables to read (default: process.env)
 * @throws ForensicError CONFIGURATION_ERROR when a variable is malformed
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result = validateSchema(EnvironmentSchema, {
    FORENSIC_OUTPUT_DIR: env.FORENSIC_OUTPUT_DIR,
    FORENSIC_AGENT_NAME: env.FORENSIC_AGENT_NAME,
    FORENSIC_AGENT_ID: env.FORENSIC_AGENT_ID,
    FORENSIC_MAX_SIZE_MB: emptyToUndefined(env.FORENSIC_MAX_SIZE_MB),
    FORENSIC_CHUNK_SIZE: emptyToUndefined(env.FORENSIC_CHUNK_SIZE),
    LOG_LEVEL: emptyToUndefined(env.LOG_LEVEL),
  });

  if (!result.success || !result.data) {
    throw Errors.configuration(
      `Invalid environment configuration: ${describeValidationErrors(result.errors ?? [])}`,
      { errors: result.errors }
    );
  }

  const data = result.data;
  return {
    outputDir: data.FORENSIC_OUTPUT_DIR ?? COLLECTION.OUTPUT_DIR,
    agentName: data.FORENSIC_AGENT_NAME,
    agentId: data.FORENSIC_AGENT_ID,
    maxSizeMb: data.FORENSIC_MAX_SIZE_MB ?? COLLECTION.MAX_SIZE_MB,
    chunkSize: data.FORENSIC_CHUNK_SIZE ?? HASHING.CHUNK_SIZE,
    logLevel: data.LOG_LEVEL ?? 'info',
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
