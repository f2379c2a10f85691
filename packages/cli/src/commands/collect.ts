/**
 * forensic-cloud collect - Evidence collection from a provider
 *
 * Usage:
 *   forensic-cloud collect docker --case-id CASE-2025-001 --source container_logs --container-id web
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { getUsername, type EnvironmentConfig } from '@forensic-cloud/core';
import {
  DEFAULT_LOG_TAIL,
  DOCKER_SOURCES,
  createCollectionConfig,
  createCollector,
  probeCapabilities,
  runCollection,
  type CollectionParams,
  type CollectionResult,
  type DockerSource,
} from '@forensic-cloud/collectors';
import { resolveContext, type CommandDeps } from '../context.js';
import { consoleIO, createSpinner, renderTable, reportError, rule, type CliIO } from '../output.js';
import { parsePositiveInt } from './options.js';

export interface CollectDockerOptions {
  source: DockerSource;
  containerId?: string;
  tail: number;
  output?: string;
  caseId: string;
  agentName?: string;
  agentId?: string;
  dryRun: boolean;
}

const CONTAINER_SOURCES: readonly DockerSource[] = ['container_logs', 'container_inspect'];

/**
 * Agent identity from flags, then environment, then the login name
 */
export function resolveAgent(
  options: Pick<CollectDockerOptions, 'agentName' | 'agentId'>,
  env: EnvironmentConfig
): { agentName: string; agentId: string } {
  return {
    agentName: options.agentName ?? env.agentName ?? getUsername(),
    agentId: options.agentId ?? env.agentId ?? 'CLI',
  };
}

/**
 * @returns 0 on success, 1 when the collection reported errors
 */
export async function runCollectDocker(options: CollectDockerOptions, deps: CommandDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const spinner = createSpinner(io);

  if (CONTAINER_SOURCES.includes(options.source) && !options.containerId) {
    io.err(chalk.red(`Error: --container-id is required for ${options.source}`));
    return 2;
  }

  try {
    const { env, logger, dockerClient } = resolveContext(deps);
    const outputDir = options.output ?? env.outputDir;
    const config = createCollectionConfig({
      caseId: options.caseId,
      ...resolveAgent(options, env),
      outputDir,
      dryRun: options.dryRun,
      maxSizeMb: env.maxSizeMb,
    });

    io.out(chalk.bold(`Collecting ${options.source}${options.dryRun ? ' (dry run)' : ''}`));
    io.out(`Case ID: ${config.caseId}`);
    io.out(`Output:  ${outputDir}`);
    io.out(rule());

    spinner.start('Checking Docker...');
    const capabilities = await probeCapabilities({ dockerClient, logger });
    const collector = createCollector('docker', { capabilities, dockerClient, logger });
    spinner.succeed(`Docker ${capabilities.docker.version ?? ''}`.trimEnd());

    const params: CollectionParams = { tail: options.tail };
    if (options.containerId) {
      params.containerId = options.containerId;
    }

    spinner.start(`Collecting ${options.source}...`);
    const result = await runCollection(collector, config, options.source, params, { logger });
    if (result.success) {
      spinner.succeed('Collection completed');
    } else {
      spinner.fail('Collection failed');
    }

    printResult(io, result);
    return result.success ? 0 : 1;
  } catch (error) {
    spinner.fail('Collection failed');
    return reportError(io, error);
  }
}

function printResult(io: CliIO, result: CollectionResult): void {
  const rows = [
    ['Status', result.success ? chalk.green('OK') : chalk.red('FAILED')],
    ['Collection ID', result.collectionId || 'N/A'],
    ['Evidence', String(result.evidenceCount)],
    ['Size', `${(result.totalSizeBytes / 1024).toFixed(2)} KB`],
    ['Duration', `${result.durationSeconds.toFixed(2)}s`],
    ['Manifest', result.manifestPath || 'N/A'],
  ];
  for (const line of renderTable(['Field', 'Value'], rows)) {
    io.out(line);
  }
  for (const warning of result.warnings) {
    io.err(chalk.yellow(`Warning: ${warning}`));
  }
  for (const error of result.errors) {
    io.err(chalk.red(`Error: ${error}`));
  }
}

const dockerCommand = new Command('docker')
  .description('Collect evidence from the local Docker daemon')
  .requiredOption('--case-id <id>', 'Case identifier')
  .addOption(
    new Option('-s, --source <source>', 'Evidence source').choices(DOCKER_SOURCES).default('all_containers')
  )
  .option('-c, --container-id <id>', 'Container id or name')
  .option('--tail <lines>', 'Log lines per container', parsePositiveInt, DEFAULT_LOG_TAIL)
  .option('-o, --output <dir>', 'Output directory (default: FORENSIC_OUTPUT_DIR or ./output)')
  .option('--agent-name <name>', 'Examiner name (default: FORENSIC_AGENT_NAME or login name)')
  .option('--agent-id <id>', 'Examiner id (default: FORENSIC_AGENT_ID or CLI)')
  .option('--dry-run', 'Authenticate and write the manifest without collecting', false)
  .action(async (options: CollectDockerOptions) => {
    process.exitCode = await runCollectDocker(options);
  });

export const collectCommand = new Command('collect')
  .description('Collect evidence from a provider')
  .addCommand(dockerCommand);
