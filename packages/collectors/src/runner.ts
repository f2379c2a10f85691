/**
 * Collection Runner
 *
 * Drives one collector through a run: authenticate, build the manifest,
 * collect, register evidence, save. Per-file problems become warnings; a
 * fatal error still leaves a partial manifest on disk when one exists.
 */

import { mkdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { performance } from 'node:perf_hooks';
import {
  Errors,
  describeValidationErrors,
  fileTimestamp,
  formatError,
  formatErrorDetails,
  validateSchema,
} from '@forensic-cloud/core';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import { ManifestGenerator } from '@forensic-cloud/manifest';
import {
  CollectionConfigSchema,
  type CollectionConfig,
  type CollectionConfigInput,
  type CollectionParams,
  type CollectionResult,
  type Collector,
} from './types.js';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Validate a configuration and apply defaults
 * @throws ForensicError CONFIGURATION_ERROR
 */
export function createCollectionConfig(input: CollectionConfigInput): CollectionConfig {
  const result = validateSchema(CollectionConfigSchema, input);
  if (!result.success || !result.data) {
    throw Errors.configuration(
      `Invalid collection configuration: ${describeValidationErrors(result.errors ?? [])}`,
      { errors: result.errors }
    );
  }
  const { endTime, ...rest } = result.data;
  return { ...rest, endTime: endTime ?? new Date() };
}

/**
 * Manifest file name for a run
 */
export function manifestFileName(provider: string, sourceType: string, at: Date = new Date()): string {
  return `manifest_${provider}_${sourceType}_${fileTimestamp(at)}.json`;
}

export interface RunCollectionOptions {
  logger?: Logger;
}

/**
 * Run one collection
 */
export async function runCollection(
  collector: Collector,
  config: CollectionConfig,
  sourceType: string,
  params: CollectionParams = {},
  options: RunCollectionOptions = {}
): Promise<CollectionResult> {
  const started = performance.now();
  const logger = (options.logger ?? getLogger('collector')).child({
    provider: collector.provider,
    sourceType,
    caseId: config.caseId,
  });
  const result: CollectionResult = {
    success: false,
    collectionId: '',
    evidenceCount: 0,
    totalSizeBytes: 0,
    durationSeconds: 0,
    manifestPath: '',
    warnings: [],
    errors: [],
  };

  let generator: ManifestGenerator | undefined;

  try {
    if (!collector.supportedSources.includes(sourceType)) {
      throw Errors.unsupportedSource(sourceType, collector.provider, collector.supportedSources);
    }

    logger.info(`Authenticating with ${collector.provider}`);
    await collector.authenticate();

    generator = new ManifestGenerator({
      caseId: config.caseId,
      agentName: config.agentName,
      agentId: config.agentId,
      logger: options.logger,
    });
    result.collectionId = generator.collectionId;

    const metadata = await collector.getSourceMetadata(sourceType);
    generator.setSource(sourceType, collector.provider, { ...metadata, ...params });

    await mkdir(config.outputDir, { recursive: true });

    logger.info('Collecting', { dryRun: config.dryRun, collectionId: result.collectionId });
    const files = config.dryRun
      ? []
      : await collector.collectSource(sourceType, params, { config, logger });
    if (config.dryRun) {
      logger.info('Dry run: skipping evidence collection');
    }

    const maxBytes = config.maxSizeMb * BYTES_PER_MB;
    for (const file of files) {
      try {
        const info = await stat(file);
        if (result.totalSizeBytes + info.size > maxBytes) {
          const warning = `Skipped ${file}: registering it would exceed the ${config.maxSizeMb} MB size cap`;
          result.warnings.push(warning);
          logger.warn(warning);
          continue;
        }

        const item = await generator.addEvidenceFile(file, {
          metadata: {
            collected_by: collector.provider,
            mtime: info.mtime.toISOString(),
          },
        });
        result.totalSizeBytes += item.sizeBytes;
      } catch (error) {
        const warning = `Failed to process ${file}: ${formatError(error)}`;
        result.warnings.push(warning);
        logger.warn(warning);
      }
    }

    result.evidenceCount = generator.snapshot().evidenceItems.length;
    result.manifestPath = await generator.save(
      path.join(config.outputDir, manifestFileName(collector.provider, sourceType))
    );
    result.success = true;
  } catch (error) {
    result.errors.push(formatError(error));
    logger.error('Collection failed', formatErrorDetails(error));

    if (generator) {
      await savePartialManifest(generator, collector.provider, sourceType, config, result, error);
    }
  } finally {
    result.durationSeconds = (performance.now() - started) / 1000;
  }

  if (result.success) {
    logger.info('Collection completed', {
      evidenceCount: result.evidenceCount,
      totalSizeMb: Math.round((result.totalSizeBytes / BYTES_PER_MB) * 100) / 100,
      durationSeconds: Math.round(result.durationSeconds * 100) / 100,
      warnings: result.warnings.length,
    });
  } else {
    logger.error('Collection ended with errors', { errors: result.errors });
  }

  return result;
}

async function savePartialManifest(
  generator: ManifestGenerator,
  provider: string,
  sourceType: string,
  config: CollectionConfig,
  result: CollectionResult,
  failure: unknown
): Promise<void> {
  try {
    if (!generator.isFinalized) {
      generator.addNote(`Collection failed: ${formatError(failure)}`);
    }
    result.evidenceCount = generator.snapshot().evidenceItems.length;
    result.manifestPath = await generator.save(
      path.join(config.outputDir, manifestFileName(provider, sourceType))
    );
  } catch (saveError) {
    result.errors.push(`Failed to save partial manifest: ${formatError(saveError)}`);
  }
}
