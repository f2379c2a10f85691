/**
 * @forensic-cloud/collectors
 *
 * Collector contract, collection runner, capability probing and the
 * Docker adapter.
 */

// Types
export { PROVIDERS, CollectionConfigSchema } from './types.js';
export type {
  ProviderName,
  CollectionParams,
  CollectionConfig,
  CollectionConfigInput,
  CollectionResult,
  CollectionContext,
  Collector,
  ProviderCapability,
  Capabilities,
} from './types.js';

// Runner
export { runCollection, createCollectionConfig, manifestFileName } from './runner.js';
export type { RunCollectionOptions } from './runner.js';

// Capabilities and registry
export { probeCapabilities, availabilityReport, IMPLEMENTED_PROVIDERS } from './capabilities.js';
export type { ProbeOptions } from './capabilities.js';
export { createCollector, isProviderName } from './registry.js';
export type { CreateCollectorOptions } from './registry.js';

// Docker
export { DockerCollector, DOCKER_SOURCES, DEFAULT_LOG_TAIL, safeContainerName } from './docker/collector.js';
export type { DockerSource, DockerCollectorOptions } from './docker/collector.js';
export { CliDockerClient, shortId } from './docker/client.js';
export { MemoryDockerClient } from './docker/memory-client.js';
export type { MemoryContainer, MemoryDockerState } from './docker/memory-client.js';
export type {
  DockerClient,
  DockerInfo,
  DockerContainer,
  DockerImage,
  DockerNetwork,
  DockerInspect,
  ExecFn,
  ExecResult,
} from './docker/client.js';
