/**
 * Collector Types
 *
 * The contract between provider adapters and the manifest core.
 */

import { z, COLLECTION, type JsonValue } from '@forensic-cloud/core';
import type { Logger } from '@forensic-cloud/logger';
import { JsonValueSchema, type SourceDetails } from '@forensic-cloud/manifest';

/**
 * Providers the registry knows about
 */
export const PROVIDERS = ['aws', 'azure', 'gcp', 'docker', 'kubernetes'] as const;
export type ProviderName = (typeof PROVIDERS)[number];

/**
 * Provider-specific collection parameters
 */
export type CollectionParams = Record<string, JsonValue>;

/**
 * Configuration for one collection run
 */
export interface CollectionConfig {
  caseId: string;
  agentName: string;
  agentId: string;
  /** Where collected files and the manifest are written; created on demand */
  outputDir: string;
  /** Start of the time window, for sources that support one */
  startTime?: Date;
  /** End of the time window */
  endTime: Date;
  /** Authenticate and build the manifest without collecting evidence */
  dryRun: boolean;
  /** Size cap for registered evidence, in MiB */
  maxSizeMb: number;
  extraOptions: Record<string, JsonValue>;
}

/**
 * Input schema for a collection configuration
 */
export const CollectionConfigSchema = z.object({
  caseId: z.string().trim().min(1, 'Case id is required'),
  agentName: z.string().trim().min(1, 'Agent name is required'),
  agentId: z.string().trim().min(1, 'Agent id is required'),
  outputDir: z.string().min(1).default(COLLECTION.OUTPUT_DIR),
  startTime: z.date().optional(),
  endTime: z.date().optional(),
  dryRun: z.boolean().default(false),
  maxSizeMb: z.number().positive().default(COLLECTION.MAX_SIZE_MB),
  extraOptions: z.record(JsonValueSchema).default({}),
});

export type CollectionConfigInput = z.input<typeof CollectionConfigSchema>;

/**
 * Outcome of one collection run
 */
export interface CollectionResult {
  success: boolean;
  collectionId: string;
  evidenceCount: number;
  totalSizeBytes: number;
  durationSeconds: number;
  /** Absolute path of the saved manifest, empty when none was written */
  manifestPath: string;
  /** Non-fatal problems; the run continued */
  warnings: string[];
  /** Fatal problems; the run stopped */
  errors: string[];
}

/**
 * What a collector receives for one collectSource call
 */
export interface CollectionContext {
  config: CollectionConfig;
  logger: Logger;
}

/**
 * Provider adapter contract
 */
export interface Collector {
  /** Provider tag, e.g. "docker" */
  readonly provider: string;
  readonly supportedSources: readonly string[];

  /**
   * Connect to the provider
   * @throws ForensicError AUTHENTICATION_FAILED
   */
  authenticate(): Promise<void>;

  /**
   * Provider metadata recorded in the manifest source
   */
  getSourceMetadata(sourceType: string): Promise<SourceDetails>;

  /**
   * Fetch evidence into `context.config.outputDir`
   * @returns Paths of the files written
   */
  collectSource(
    sourceType: string,
    params: CollectionParams,
    context: CollectionContext
  ): Promise<string[]>;
}

/**
 * Availability of one provider
 */
export interface ProviderCapability {
  available: boolean;
  /** Why the provider is unavailable */
  reason?: string;
  /** Detected tool or SDK version */
  version?: string;
}

/**
 * Provider availability, resolved once at start-up
 */
export type Capabilities = Record<ProviderName, ProviderCapability>;
