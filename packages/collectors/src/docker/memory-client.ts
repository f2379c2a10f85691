/**
 * In-memory Docker client (for testing/development)
 */

import { Errors } from '@forensic-cloud/core';
import type {
  DockerClient,
  DockerContainer,
  DockerImage,
  DockerInfo,
  DockerInspect,
  DockerNetwork,
} from './client.js';

export interface MemoryContainer extends DockerContainer {
  logs: string;
  inspect: DockerInspect;
  running: boolean;
}

export interface MemoryDockerState {
  version?: string;
  info?: DockerInfo;
  containers?: MemoryContainer[];
  images?: DockerImage[];
  networks?: DockerNetwork[];
  /** Simulates an unreachable daemon */
  unreachable?: boolean;
}

export class MemoryDockerClient implements DockerClient {
  readonly calls: string[] = [];
  private readonly state: Required<Omit<MemoryDockerState, 'unreachable'>> & { unreachable: boolean };

  constructor(state: MemoryDockerState = {}) {
    this.state = {
      version: state.version ?? '24.0.7',
      info: state.info ?? { serverVersion: '24.0.7', operatingSystem: 'Docker Desktop', containersRunning: 0 },
      containers: state.containers ?? [],
      images: state.images ?? [],
      networks: state.networks ?? [],
      unreachable: state.unreachable ?? false,
    };
  }

  async version(): Promise<string> {
    this.calls.push('version');
    return this.state.version;
  }

  async info(): Promise<DockerInfo> {
    this.calls.push('info');
    if (this.state.unreachable) {
      throw new Error('Cannot connect to the Docker daemon');
    }
    return { ...this.state.info };
  }

  async getContainer(containerId: string): Promise<DockerContainer> {
    this.calls.push(`getContainer:${containerId}`);
    const container = this.find(containerId);
    return { id: container.id, name: container.name };
  }

  async logs(containerId: string, options: { tail: number; timestamps: boolean }): Promise<Buffer> {
    this.calls.push(`logs:${containerId}:${options.tail}`);
    const lines = this.find(containerId).logs.split('\n').filter(Boolean);
    const tail = lines.slice(-options.tail);
    return Buffer.from(tail.map(line => `${line}\n`).join(''));
  }

  async inspectContainer(containerId: string): Promise<DockerInspect> {
    this.calls.push(`inspect:${containerId}`);
    return structuredClone(this.find(containerId).inspect);
  }

  async listContainers(options: { all: boolean }): Promise<DockerContainer[]> {
    this.calls.push(`listContainers:${options.all}`);
    return this.state.containers
      .filter(c => options.all || c.running)
      .map(c => ({ id: c.id, name: c.name }));
  }

  async listImages(): Promise<DockerImage[]> {
    this.calls.push('listImages');
    return structuredClone(this.state.images);
  }

  async listNetworks(): Promise<DockerNetwork[]> {
    this.calls.push('listNetworks');
    return structuredClone(this.state.networks);
  }

  private find(containerId: string): MemoryContainer {
    const container = this.state.containers.find(c => c.id === containerId || c.name === containerId);
    if (!container) {
      throw Errors.collectionFailed(`Container not found: ${containerId}`, { containerId });
    }
    return container;
  }
}
