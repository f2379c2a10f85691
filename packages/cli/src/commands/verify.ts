/**
 * forensic-cloud verify - Check evidence and the manifest self-hash
 *
 * Usage:
 *   forensic-cloud verify --manifest ./output/manifest_docker_all_containers_20250115_100000.json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ForensicHasher } from '@forensic-cloud/hasher';
import {
  fromDocument,
  readManifestDocument,
  verifyEvidence,
  verifyManifestHash,
  type EvidenceStatus,
} from '@forensic-cloud/manifest';
import { resolveContext, type CommandDeps } from '../context.js';
import { consoleIO, createSpinner, renderTable, reportError, rule } from '../output.js';

export interface VerifyOptions {
  manifest: string;
}

function statusLabel(status: EvidenceStatus): string {
  switch (status) {
    case 'ok':
      return chalk.green('OK');
    case 'mismatch':
      return chalk.red('FAIL');
    case 'missing':
      return chalk.red('NOT FOUND');
    case 'unreadable':
      return chalk.red('UNREADABLE');
    case 'skipped':
      return chalk.yellow('SKIP');
  }
}

/**
 * @returns 0 when every item and the self-hash check out, 1 otherwise
 */
export async function runVerify(options: VerifyOptions, deps: CommandDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const spinner = createSpinner(io);

  try {
    const { env, logger } = resolveContext(deps);

    spinner.start('Verifying integrity...');
    const document = await readManifestDocument(options.manifest);
    const hashValid = verifyManifestHash(document);
    const report = await verifyEvidence(fromDocument(document), {
      hasher: new ForensicHasher({ algorithm: 'sha256', chunkSize: env.chunkSize, logger }),
      logger,
    });
    spinner.stop();

    io.out(chalk.bold(`Manifest ${document.collection_id} (case ${document.case_id})`));
    io.out(rule());
    const rows = report.items.map(item => [
      item.filename,
      statusLabel(item.status),
      item.status === 'skipped' ? 'N/A' : item.expected.slice(0, 16),
    ]);
    for (const line of renderTable(['File', 'Status', 'Hash (16 chars)'], rows)) {
      io.out(line);
    }
    io.out(rule());

    if (!document.manifest_hash) {
      io.out(`Manifest hash: ${chalk.red('MISSING')} (manifest was never finalized)`);
    } else {
      io.out(`Manifest hash: ${hashValid ? chalk.green('OK') : chalk.red('MISMATCH')}`);
    }

    if (report.valid && hashValid) {
      io.out(chalk.bold.green(`✓ All evidence intact (${report.ok} verified, ${report.skipped} skipped)`));
      return 0;
    }
    io.out(chalk.bold.red('✗ Verification failed'));
    return 1;
  } catch (error) {
    spinner.fail('Verification failed');
    return reportError(io, error);
  }
}

export const verifyCommand = new Command('verify')
  .description('Verify evidence integrity against a manifest')
  .requiredOption('-m, --manifest <file>', 'Manifest JSON file')
  .action(async (options: VerifyOptions) => {
    process.exitCode = await runVerify(options);
  });
