/**
 * forensic-cloud command line program
 */

import { Command } from 'commander';
import { CLI_VERSION } from '@forensic-cloud/core';
import { hashCommand } from './commands/hash.js';
import { hashDirCommand } from './commands/hash-dir.js';
import { verifyCommand } from './commands/verify.js';
import { collectCommand } from './commands/collect.js';
import { infoCommand } from './commands/info.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('forensic-cloud')
    .description('Collect cloud and container evidence with hashes and chain of custody')
    .version(CLI_VERSION);

  program.addCommand(hashCommand);
  program.addCommand(hashDirCommand);
  program.addCommand(verifyCommand);
  program.addCommand(collectCommand);
  program.addCommand(infoCommand);

  return program;
}
