#!/usr/bin/env node
/**
 * forensic-cloud CLI
 *
 * Hash, collect and verify forensic evidence
 */

import { config } from 'dotenv';
import chalk from 'chalk';
import { formatError, loadEnvironmentConfig } from '@forensic-cloud/core';
import { configureLogging } from '@forensic-cloud/logger';
import { createProgram } from './program.js';

// Load environment variables
config();

try {
  configureLogging({ level: loadEnvironmentConfig().logLevel });
  await createProgram().parseAsync();
} catch (error) {
  console.error(chalk.red(`Error: ${formatError(error)}`));
  process.exitCode = 1;
}
