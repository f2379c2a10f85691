/**
 * forensic-cloud hash - Hash a single file
 *
 * Usage:
 *   forensic-cloud hash ./evidence/app.log --algorithm sha512
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ForensicHasher, toHashRecord, type HashAlgorithm } from '@forensic-cloud/hasher';
import { resolveContext, type CommandDeps } from '../context.js';
import { consoleIO, createSpinner, reportError } from '../output.js';
import { parseAlgorithm } from './options.js';

export interface HashOptions {
  algorithm: HashAlgorithm;
  json: boolean;
}

/**
 * @returns Process exit status
 */
export async function runHash(file: string, options: HashOptions, deps: CommandDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const spinner = createSpinner(io);

  try {
    const { env, logger } = resolveContext(deps);
    const hasher = new ForensicHasher({ algorithm: options.algorithm, chunkSize: env.chunkSize, logger });

    spinner.start(`Hashing ${file}...`);
    const result = await hasher.hashFile(file);
    spinner.stop();

    if (options.json) {
      io.out(JSON.stringify(toHashRecord(result), null, 2));
      return 0;
    }

    io.out(`${chalk.bold('File:')}      ${result.filePath}`);
    io.out(`${chalk.bold('Algorithm:')} ${result.algorithm}`);
    io.out(`${chalk.bold('Hash:')}      ${chalk.cyan(result.hashValue)}`);
    io.out(`${chalk.bold('Size:')}      ${result.fileSize} bytes`);
    io.out(`${chalk.bold('Computed:')}  ${result.calculatedAt}`);
    return 0;
  } catch (error) {
    spinner.fail('Hashing failed');
    return reportError(io, error);
  }
}

export const hashCommand = new Command('hash')
  .description('Compute the digest of a file')
  .argument('<file>', 'File to hash')
  .option('-a, --algorithm <name>', 'Hash algorithm', parseAlgorithm, 'sha256')
  .option('--json', 'Print the hash record as JSON', false)
  .action(async (file: string, options: HashOptions) => {
    process.exitCode = await runHash(file, options);
  });
