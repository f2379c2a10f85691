/**
 * Docker Collector
 *
 * Collects container logs, inspect data, images and networks from the
 * local Docker daemon.
 */

import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  Errors,
  asError,
  describeValidationErrors,
  fileTimestamp,
  formatError,
  utcNow,
  validateSchema,
  z,
} from '@forensic-cloud/core';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import type { SourceDetails } from '@forensic-cloud/manifest';
import type { CollectionContext, CollectionParams, Collector } from '../types.js';
import { CliDockerClient, type DockerClient, type DockerInfo } from './client.js';

export const DOCKER_SOURCES = [
  'container_logs',
  'container_inspect',
  'image_info',
  'network_info',
  'all_containers',
] as const;

export type DockerSource = (typeof DOCKER_SOURCES)[number];

export const DEFAULT_LOG_TAIL = 10_000;

const DockerParamsSchema = z.object({
  containerId: z.string().trim().min(1).optional(),
  tail: z.coerce.number().int().positive().default(DEFAULT_LOG_TAIL),
  includeStopped: z.boolean().default(true),
});

type DockerParams = z.infer<typeof DockerParamsSchema>;

export interface DockerCollectorOptions {
  client?: DockerClient;
  logger?: Logger;
  /** Clock for file-name timestamps */
  now?: () => Date;
}

function isDockerSource(value: string): value is DockerSource {
  return DOCKER_SOURCES.some(source => source === value);
}

/**
 * File-system safe form of a container name
 */
export function safeContainerName(name: string): string {
  return name.replace(/^\//, '').replace(/\//g, '_');
}

export class DockerCollector implements Collector {
  readonly provider = 'docker';
  readonly supportedSources: readonly string[] = DOCKER_SOURCES;

  private readonly client: DockerClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private info?: DockerInfo;

  constructor(options: DockerCollectorOptions = {}) {
    this.client = options.client ?? new CliDockerClient();
    this.logger = (options.logger ?? getLogger('docker')).child({ provider: 'docker' });
    this.now = options.now ?? (() => new Date());
  }

  async authenticate(): Promise<void> {
    try {
      this.info = await this.client.info();
    } catch (error) {
      throw Errors.authenticationFailed('docker', asError(error));
    }
    this.logger.info('Connected to Docker', {
      version: this.info.serverVersion,
      containersRunning: this.info.containersRunning ?? 0,
    });
  }

  async getSourceMetadata(): Promise<SourceDetails> {
    const info = this.info ?? (await this.client.info());
    return {
      docker_version: info.serverVersion,
      os: info.operatingSystem,
      containers_running: info.containersRunning,
    };
  }

  async collectSource(
    sourceType: string,
    params: CollectionParams,
    context: CollectionContext
  ): Promise<string[]> {
    if (!isDockerSource(sourceType)) {
      throw Errors.unsupportedSource(sourceType, this.provider, DOCKER_SOURCES);
    }
    const options = parseParams(params);
    const outputDir = context.config.outputDir;

    switch (sourceType) {
      case 'container_logs':
        return [await this.collectLogs(requireContainer(options, sourceType), options.tail, outputDir)];
      case 'container_inspect':
        return [
          await this.collectInspect(requireContainer(options, sourceType), context.config.caseId, outputDir),
        ];
      case 'image_info':
        return this.collectImages(outputDir);
      case 'network_info':
        return this.collectNetworks(outputDir);
      case 'all_containers':
        return this.collectAll(options, context.config.caseId, outputDir);
    }
  }

  private async collectLogs(containerId: string, tail: number, outputDir: string): Promise<string> {
    const container = await this.client.getContainer(containerId);
    const logs = await this.client.logs(container.id, { tail, timestamps: true });

    const file = path.join(
      outputDir,
      `docker_logs_${safeContainerName(container.name)}_${fileTimestamp(this.now())}.log`
    );
    await writeFile(file, logs);

    this.logger.info('Container logs collected', { container: container.name, bytes: logs.length });
    return file;
  }

  private async collectInspect(containerId: string, caseId: string, outputDir: string): Promise<string> {
    const container = await this.client.getContainer(containerId);
    const inspect = await this.client.inspectContainer(container.id);
    inspect._forensic_metadata = {
      collected_at: utcNow(),
      case_id: caseId,
    };

    const file = path.join(
      outputDir,
      `docker_inspect_${safeContainerName(container.name)}_${fileTimestamp(this.now())}.json`
    );
    await writeFile(file, JSON.stringify(inspect, null, 2), 'utf8');

    this.logger.info('Container inspect collected', { container: container.name });
    return file;
  }

  private async collectImages(outputDir: string): Promise<string[]> {
    const images = await this.client.listImages();
    if (images.length === 0) {
      return [];
    }

    const file = path.join(outputDir, `docker_images_${fileTimestamp(this.now())}.json`);
    const records = images.map(image => ({
      id: image.id,
      short_id: image.shortId,
      tags: image.tags,
      created: image.created ?? null,
      size: image.size ?? null,
    }));
    await writeFile(file, JSON.stringify(records, null, 2), 'utf8');

    this.logger.info('Images collected', { count: images.length });
    return [file];
  }

  private async collectNetworks(outputDir: string): Promise<string[]> {
    const networks = await this.client.listNetworks();
    if (networks.length === 0) {
      return [];
    }

    const file = path.join(outputDir, `docker_networks_${fileTimestamp(this.now())}.json`);
    const records = networks.map(network => ({
      id: network.id,
      name: network.name,
      driver: network.driver ?? null,
      scope: network.scope ?? null,
      containers: network.containers,
    }));
    await writeFile(file, JSON.stringify(records, null, 2), 'utf8');

    this.logger.info('Networks collected', { count: networks.length });
    return [file];
  }

  private async collectAll(options: DockerParams, caseId: string, outputDir: string): Promise<string[]> {
    const containers = await this.client.listContainers({ all: options.includeStopped });
    this.logger.info('Collecting all containers', { count: containers.length });

    const files: string[] = [];
    for (const container of containers) {
      try {
        files.push(await this.collectLogs(container.id, options.tail, outputDir));
        files.push(await this.collectInspect(container.id, caseId, outputDir));
      } catch (error) {
        this.logger.warn('Container collection failed', {
          container: container.name,
          error: formatError(error),
        });
      }
    }

    files.push(...(await this.collectImages(outputDir)));
    files.push(...(await this.collectNetworks(outputDir)));
    return files;
  }
}

function parseParams(params: CollectionParams): DockerParams {
  const result = validateSchema(DockerParamsSchema, params);
  if (!result.success || !result.data) {
    throw Errors.invalidArgument(
      `Invalid docker collection parameters: ${describeValidationErrors(result.errors ?? [])}`,
      { errors: result.errors }
    );
  }
  return result.data;
}

function requireContainer(options: DockerParams, sourceType: DockerSource): string {
  if (!options.containerId) {
    throw Errors.invalidArgument(`Source '${sourceType}' requires containerId`, { sourceType });
  }
  return options.containerId;
}
