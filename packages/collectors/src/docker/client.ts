/**
 * Docker client
 *
 * Talks to the local `docker` binary. The DockerClient interface keeps the
 * adapter testable without a daemon.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import {
  Errors,
  asError,
  describeValidationErrors,
  getSystemErrorCode,
  validateSchema,
  z,
  type JsonValue,
  type SchemaOf,
} from '@forensic-cloud/core';
import { JsonValueSchema } from '@forensic-cloud/manifest';

export interface DockerInfo {
  serverVersion?: string;
  operatingSystem?: string;
  containersRunning?: number;
}

export interface DockerContainer {
  id: string;
  /** Container name without the leading slash */
  name: string;
}

export interface DockerImage {
  id: string;
  shortId: string;
  tags: string[];
  created?: string;
  size?: number;
}

export interface DockerNetwork {
  id: string;
  name: string;
  driver?: string;
  scope?: string;
  containers: Record<string, JsonValue>;
}

export type DockerInspect = Record<string, JsonValue>;

/**
 * Operations the Docker adapter needs
 */
export interface DockerClient {
  /** Client version; fails when the binary is missing */
  version(): Promise<string>;
  /** Daemon information; fails when the daemon is unreachable */
  info(): Promise<DockerInfo>;
  getContainer(containerId: string): Promise<DockerContainer>;
  /** Combined stdout and stderr log output */
  logs(containerId: string, options: { tail: number; timestamps: boolean }): Promise<Buffer>;
  inspectContainer(containerId: string): Promise<DockerInspect>;
  listContainers(options: { all: boolean }): Promise<DockerContainer[]>;
  listImages(): Promise<DockerImage[]>;
  listNetworks(): Promise<DockerNetwork[]>;
}

/**
 * Result of running the docker binary
 */
export interface ExecResult {
  stdout: Buffer;
  stderr: Buffer;
}

export type ExecFn = (file: string, args: string[]) => Promise<ExecResult>;

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 512 * 1024 * 1024;

const defaultExec: ExecFn = (file, args) =>
  execFileAsync(file, args, { encoding: 'buffer', maxBuffer: MAX_BUFFER });

const InfoSchema = z.object({
  ServerVersion: z.string().optional(),
  OperatingSystem: z.string().optional(),
  ContainersRunning: z.number().optional(),
});

const ContainerInspectSchema = z.object({
  Id: z.string(),
  Name: z.string().default(''),
});

const ContainerLineSchema = z.object({
  ID: z.string(),
  Names: z.string().default(''),
});

const ImageInspectSchema = z.object({
  Id: z.string(),
  RepoTags: z.array(z.string()).nullable().default([]),
  Created: z.string().optional(),
  Size: z.number().optional(),
});

const NetworkInspectSchema = z.object({
  Id: z.string(),
  Name: z.string(),
  Driver: z.string().optional(),
  Scope: z.string().optional(),
  Containers: z.record(JsonValueSchema).nullable().default({}),
});

const InspectListSchema = z.array(z.record(JsonValueSchema));

/**
 * Docker's short id: the first 12 hex digits, without the algorithm prefix
 */
export function shortId(id: string): string {
  return id.replace(/^sha256:/, '').slice(0, 12);
}

function stripSlash(name: string): string {
  return name.replace(/^\//, '');
}

function stderrOf(error: unknown): string {
  if (error instanceof Error && 'stderr' in error) {
    const { stderr } = error;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf8').trim();
    if (typeof stderr === 'string') return stderr.trim();
  }
  return '';
}

/**
 * DockerClient backed by the docker CLI
 */
export class CliDockerClient implements DockerClient {
  private readonly binary: string;
  private readonly exec: ExecFn;

  constructor(options: { binary?: string; exec?: ExecFn } = {}) {
    this.binary = options.binary ?? 'docker';
    this.exec = options.exec ?? defaultExec;
  }

  async version(): Promise<string> {
    const { stdout } = await this.run(['version', '--format', '{{.Client.Version}}']);
    return stdout.toString('utf8').trim();
  }

  async info(): Promise<DockerInfo> {
    const info = decode(InfoSchema, await this.runJson(['info', '--format', '{{json .}}']), 'info');
    return {
      serverVersion: info.ServerVersion,
      operatingSystem: info.OperatingSystem,
      containersRunning: info.ContainersRunning,
    };
  }

  async getContainer(containerId: string): Promise<DockerContainer> {
    const inspect = decode(ContainerInspectSchema, await this.inspectContainer(containerId), 'inspect');
    return { id: inspect.Id, name: stripSlash(inspect.Name) };
  }

  async logs(containerId: string, options: { tail: number; timestamps: boolean }): Promise<Buffer> {
    const args = ['logs', '--tail', String(options.tail)];
    if (options.timestamps) args.push('--timestamps');
    args.push(containerId);

    const { stdout, stderr } = await this.run(args, containerId);
    return Buffer.concat([stdout, stderr]);
  }

  async inspectContainer(containerId: string): Promise<DockerInspect> {
    const [inspect] = decode(
      InspectListSchema,
      await this.runJson(['inspect', '--type', 'container', containerId], containerId),
      'inspect'
    );
    if (!inspect) {
      throw Errors.collectionFailed(`Container not found: ${containerId}`, { containerId });
    }
    return inspect;
  }

  async listContainers(options: { all: boolean }): Promise<DockerContainer[]> {
    const args = ['ps', '--no-trunc', '--format', '{{json .}}'];
    if (options.all) args.push('--all');
    const lines = await this.runJsonLines(args);
    return lines.map(line => {
      const container = decode(ContainerLineSchema, line, 'ps');
      return { id: container.ID, name: container.Names.split(',')[0] };
    });
  }

  async listImages(): Promise<DockerImage[]> {
    const ids = await this.listIds(['image', 'ls', '--quiet', '--no-trunc']);
    if (ids.length === 0) return [];

    const inspected = decode(z.array(ImageInspectSchema), await this.runJson(['image', 'inspect', ...ids]), 'image inspect');
    return inspected.map(image => ({
      id: image.Id,
      shortId: shortId(image.Id),
      tags: image.RepoTags ?? [],
      created: image.Created,
      size: image.Size,
    }));
  }

  async listNetworks(): Promise<DockerNetwork[]> {
    const ids = await this.listIds(['network', 'ls', '--quiet', '--no-trunc']);
    if (ids.length === 0) return [];

    const inspected = decode(
      z.array(NetworkInspectSchema),
      await this.runJson(['network', 'inspect', ...ids]),
      'network inspect'
    );
    return inspected.map(network => ({
      id: network.Id,
      name: network.Name,
      driver: network.Driver,
      scope: network.Scope,
      containers: network.Containers ?? {},
    }));
  }

  private async listIds(args: string[]): Promise<string[]> {
    const { stdout } = await this.run(args);
    // `image ls -q` repeats ids for images with several tags
    return [...new Set(stdout.toString('utf8').split('\n').map(l => l.trim()).filter(Boolean))];
  }

  private async runJson(args: string[], containerId?: string): Promise<unknown> {
    const { stdout } = await this.run(args, containerId);
    return parseJson(stdout.toString('utf8'), args);
  }

  private async runJsonLines(args: string[]): Promise<unknown[]> {
    const { stdout } = await this.run(args);
    return stdout
      .toString('utf8')
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean)
      .map(line => parseJson(line, args));
  }

  private async run(args: string[], containerId?: string): Promise<ExecResult> {
    try {
      return await this.exec(this.binary, args);
    } catch (error) {
      if (getSystemErrorCode(error) === 'ENOENT') {
        throw Errors.providerUnavailable('docker', `${this.binary} binary not found`);
      }
      const stderr = stderrOf(error);
      if (containerId && /no such (container|object)/i.test(stderr)) {
        throw Errors.collectionFailed(`Container not found: ${containerId}`, { containerId });
      }
      throw Errors.collectionFailed(
        `docker ${args[0]} failed: ${stderr || asError(error).message}`,
        { args },
        asError(error)
      );
    }
  }
}

function decode<T>(schema: SchemaOf<T>, value: unknown, command: string): T {
  const result = validateSchema(schema, value);
  if (!result.success || !result.data) {
    throw Errors.collectionFailed(
      `Unexpected output from docker ${command}: ${describeValidationErrors(result.errors ?? [])}`,
      { command }
    );
  }
  return result.data;
}

function parseJson(text: string, args: string[]): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw Errors.collectionFailed(`docker ${args[0]} returned invalid JSON`, { args }, asError(error));
  }
}
