/**
 * Terminal output helpers shared by the commands
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { formatError, isRetryableError, toForensicError } from '@forensic-cloud/core';

/**
 * Where a command writes its output
 */
export interface CliIO {
  /** Result lines (stdout) */
  out(line: string): void;
  /** Diagnostics (stderr) */
  err(line: string): void;
  /** Show ora spinners on stderr */
  spinners: boolean;
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  spinners: true,
};

export function createSpinner(io: CliIO): Ora {
  return ora({ isSilent: !io.spinners, stream: process.stderr });
}

export function rule(width = 60): string {
  return chalk.gray('─'.repeat(width));
}

/**
 * Left-aligned columns; cell width ignores colour codes
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(visibleLength(header), ...rows.map(row => visibleLength(row[column] ?? '')))
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, column) => cell + ' '.repeat((widths[column] ?? 0) - visibleLength(cell)))
      .join('  ')
      .trimEnd();

  return [
    line(headers.map(header => chalk.bold(header))),
    chalk.gray(widths.map(width => '─'.repeat(width)).join('  ')),
    ...rows.map(line),
  ];
}

function visibleLength(text: string): number {
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

/**
 * Print an error and return the exit status for it
 */
export function reportError(io: CliIO, error: unknown): number {
  io.err(chalk.red(`Error: ${formatError(error)}`));
  if (isRetryableError(error)) {
    io.err(chalk.gray('The failure may be transient; running the command again may succeed.'));
  }
  return toForensicError(error).exitCode;
}
