/**
 * Option parsers shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { SUPPORTED_ALGORITHMS, type HashAlgorithm } from '@forensic-cloud/hasher';

export function parseAlgorithm(value: string): HashAlgorithm {
  const algorithm = SUPPORTED_ALGORITHMS.find(candidate => candidate === value.toLowerCase());
  if (!algorithm) {
    throw new InvalidArgumentError(`Choose one of: ${SUPPORTED_ALGORITHMS.join(', ')}`);
  }
  return algorithm;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}
