/**
 * forensic-cloud info - Components and provider availability
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CLI_VERSION, MANIFEST_SCHEMA_VERSION } from '@forensic-cloud/core';
import { SUPPORTED_ALGORITHMS } from '@forensic-cloud/hasher';
import { PROVIDERS, probeCapabilities } from '@forensic-cloud/collectors';
import { resolveContext, type CommandDeps } from '../context.js';
import { consoleIO, renderTable, reportError, rule } from '../output.js';

/**
 * @returns Process exit status; unavailable providers are not an error
 */
export async function runInfo(deps: CommandDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;

  try {
    const { logger, dockerClient } = resolveContext(deps);
    const capabilities = await probeCapabilities({ dockerClient, logger });

    io.out(chalk.bold(`forensic-cloud ${CLI_VERSION}`));
    io.out(`Manifest schema: ${MANIFEST_SCHEMA_VERSION}`);
    io.out(`Hash algorithms: ${SUPPORTED_ALGORITHMS.join(', ')}`);
    io.out(rule());

    const rows = [
      ['Core (hasher)', chalk.green('OK'), ''],
      ['Core (manifest)', chalk.green('OK'), ''],
      ...PROVIDERS.map(provider => {
        const capability = capabilities[provider];
        return capability.available
          ? [`Collector (${provider})`, chalk.green('OK'), capability.version ?? '']
          : [`Collector (${provider})`, chalk.yellow('UNAVAILABLE'), capability.reason ?? ''];
      }),
    ];
    for (const line of renderTable(['Component', 'Status', 'Details'], rows)) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    return reportError(io, error);
  }
}

export const infoCommand = new Command('info')
  .description('Show components and provider availability')
  .action(async () => {
    process.exitCode = await runInfo();
  });
