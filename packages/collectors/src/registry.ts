/**
 * Collector registry
 *
 * Selects a provider adapter by tag, checking the probed capabilities.
 */

import { Errors } from '@forensic-cloud/core';
import type { Logger } from '@forensic-cloud/logger';
import { DockerCollector } from './docker/collector.js';
import type { DockerClient } from './docker/client.js';
import { PROVIDERS, type Capabilities, type Collector, type ProviderName } from './types.js';

export interface CreateCollectorOptions {
  capabilities: Capabilities;
  logger?: Logger;
  dockerClient?: DockerClient;
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some(provider => provider === value);
}

/**
 * Build the collector for a provider
 * @throws ForensicError INVALID_ARGUMENT or PROVIDER_UNAVAILABLE
 */
export function createCollector(provider: string, options: CreateCollectorOptions): Collector {
  if (!isProviderName(provider)) {
    throw Errors.invalidArgument(`Unknown provider '${provider}'. Available: ${PROVIDERS.join(', ')}`, {
      provider,
    });
  }

  const capability = options.capabilities[provider];
  if (!capability.available) {
    throw Errors.providerUnavailable(provider, capability.reason ?? 'not available');
  }

  switch (provider) {
    case 'docker':
      return new DockerCollector({ client: options.dockerClient, logger: options.logger });
    default:
      throw Errors.providerUnavailable(provider, 'adapter not included in this build');
  }
}
