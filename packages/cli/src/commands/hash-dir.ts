/**
 * forensic-cloud hash-dir - Hash every matching file under a directory
 *
 * Usage:
 *   forensic-cloud hash-dir ./evidence --pattern "*.log" --no-recursive
 */

import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ForensicHasher, toHashRecord, type HashAlgorithm } from '@forensic-cloud/hasher';
import { resolveContext, type CommandDeps } from '../context.js';
import { consoleIO, createSpinner, reportError } from '../output.js';
import { parseAlgorithm } from './options.js';

export interface HashDirOptions {
  algorithm: HashAlgorithm;
  pattern: string;
  recursive: boolean;
  json: boolean;
}

/**
 * Prints `<digest>  <relative path>` per file, then the skipped files
 * @returns Process exit status
 */
export async function runHashDir(
  directory: string,
  options: HashDirOptions,
  deps: CommandDeps = {}
): Promise<number> {
  const io = deps.io ?? consoleIO;
  const spinner = createSpinner(io);

  try {
    const { env, logger } = resolveContext(deps);
    const hasher = new ForensicHasher({ algorithm: options.algorithm, chunkSize: env.chunkSize, logger });
    const root = path.resolve(directory);

    spinner.start(`Hashing ${root}...`);
    const { results, skipped } = await hasher.hashDirectory(root, {
      pattern: options.pattern,
      recursive: options.recursive,
    });
    spinner.stop();

    if (options.json) {
      io.out(JSON.stringify({ results: results.map(toHashRecord), skipped }, null, 2));
      return 0;
    }

    for (const result of results) {
      io.out(`${result.hashValue}  ${path.relative(root, result.filePath)}`);
    }
    for (const file of skipped) {
      io.err(chalk.yellow(`Skipped ${path.relative(root, file.path)}: ${file.reason}`));
    }
    io.err(chalk.gray(`${results.length} file(s) hashed with ${options.algorithm}, ${skipped.length} skipped`));
    return 0;
  } catch (error) {
    spinner.fail('Directory hashing failed');
    return reportError(io, error);
  }
}

export const hashDirCommand = new Command('hash-dir')
  .description('Compute digests for every matching file in a directory')
  .argument('<directory>', 'Directory to hash')
  .option('-a, --algorithm <name>', 'Hash algorithm', parseAlgorithm, 'sha256')
  .option('-p, --pattern <glob>', 'Glob pattern (*, ? and [...]; / separates path segments)', '*')
  .option('--no-recursive', 'Only hash files directly inside the directory')
  .option('--json', 'Print hash records as JSON', false)
  .action(async (directory: string, options: HashDirOptions) => {
    process.exitCode = await runHashDir(directory, options);
  });
