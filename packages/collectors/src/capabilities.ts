/**
 * Provider capability probing
 *
 * Availability is resolved once at start-up and handed to whatever needs it.
 */

import { asError, isForensicError } from '@forensic-cloud/core';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import { CliDockerClient, type DockerClient } from './docker/client.js';
import { PROVIDERS, type Capabilities, type ProviderCapability, type ProviderName } from './types.js';

/**
 * Providers whose adapters this build ships
 */
export const IMPLEMENTED_PROVIDERS: readonly ProviderName[] = ['docker'];

const NOT_INCLUDED = 'adapter not included in this build';

export interface ProbeOptions {
  dockerClient?: DockerClient;
  logger?: Logger;
}

function unavailableReason(error: unknown): string {
  const reason =
    isForensicError(error) && error.code === 'PROVIDER_UNAVAILABLE' ? error.details?.reason : undefined;
  return typeof reason === 'string' ? reason : asError(error).message;
}

async function probeDocker(client: DockerClient): Promise<ProviderCapability> {
  try {
    const version = await client.version();
    return { available: true, version };
  } catch (error) {
    return { available: false, reason: unavailableReason(error) };
  }
}

/**
 * Detect which providers can be used on this host
 */
export async function probeCapabilities(options: ProbeOptions = {}): Promise<Capabilities> {
  const logger = options.logger ?? getLogger('capabilities');

  const capabilities: Capabilities = {
    aws: { available: false, reason: NOT_INCLUDED },
    azure: { available: false, reason: NOT_INCLUDED },
    gcp: { available: false, reason: NOT_INCLUDED },
    docker: await probeDocker(options.dockerClient ?? new CliDockerClient()),
    kubernetes: { available: false, reason: NOT_INCLUDED },
  };

  for (const provider of PROVIDERS) {
    const capability = capabilities[provider];
    logger.debug('Provider probed', { provider, ...capability });
  }
  return capabilities;
}

/**
 * Provider name to availability flag
 */
export function availabilityReport(capabilities: Capabilities): Record<ProviderName, boolean> {
  return {
    aws: capabilities.aws.available,
    azure: capabilities.azure.available,
    gcp: capabilities.gcp.available,
    docker: capabilities.docker.available,
    kubernetes: capabilities.kubernetes.available,
  };
}
