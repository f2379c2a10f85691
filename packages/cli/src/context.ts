/**
 * Dependencies a command runs with; tests replace any of them
 */

import { loadEnvironmentConfig, type EnvironmentConfig } from '@forensic-cloud/core';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import type { DockerClient } from '@forensic-cloud/collectors';
import { consoleIO, type CliIO } from './output.js';

export interface CommandContext {
  io: CliIO;
  logger: Logger;
  env: EnvironmentConfig;
  dockerClient?: DockerClient;
}

export type CommandDeps = Partial<CommandContext>;

/**
 * Fill in defaults; reading the environment may throw CONFIGURATION_ERROR
 */
export function resolveContext(deps: CommandDeps = {}): CommandContext {
  return {
    io: deps.io ?? consoleIO,
    logger: deps.logger ?? getLogger('cli'),
    env: deps.env ?? loadEnvironmentConfig(),
    dockerClient: deps.dockerClient,
  };
}
