/**
 * Manifest self-hash and evidence verification
 */

import { canonicalize, Errors, ForensicError } from '@forensic-cloud/core';
import { ForensicHasher } from '@forensic-cloud/hasher';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import type { SealedManifest } from './model.js';
import type { ManifestDocument } from './schemas.js';
import { locationToPath } from './serializer.js';

/**
 * Canonical text of a document, excluding `manifest_hash`
 */
export function canonicalManifestForm(document: ManifestDocument): string {
  const content: Partial<ManifestDocument> = { ...document };
  delete content.manifest_hash;
  return canonicalize(content);
}

/**
 * SHA-256 of the canonical form, as lowercase hex
 */
export function computeManifestHash(
  document: ManifestDocument,
  hasher: ForensicHasher = new ForensicHasher({ algorithm: 'sha256' })
): string {
  if (hasher.algorithm !== 'sha256') {
    throw Errors.invalidArgument(`Manifest hashes use sha256, got ${hasher.algorithm}`);
  }
  return hasher.hashBytes(Buffer.from(canonicalManifestForm(document), 'utf8'));
}

/**
 * Whether the stored `manifest_hash` matches the document content
 */
export function verifyManifestHash(document: ManifestDocument): boolean {
  if (!document.manifest_hash) {
    return false;
  }
  return computeManifestHash(document) === document.manifest_hash.toLowerCase();
}

export type EvidenceStatus = 'ok' | 'mismatch' | 'missing' | 'skipped' | 'unreadable';

/**
 * Outcome for one evidence item
 */
export interface EvidenceCheck {
  filename: string;
  /** Persisted local path (or the in-memory sentinel) */
  localPath: string;
  status: EvidenceStatus;
  expected: string;
  actual?: string;
  reason?: string;
}

/**
 * Outcome for a whole manifest
 */
export interface EvidenceVerificationReport {
  items: EvidenceCheck[];
  ok: number;
  mismatched: number;
  missing: number;
  skipped: number;
  unreadable: number;
  /** No mismatched, missing or unreadable items */
  valid: boolean;
}

export interface VerifyEvidenceOptions {
  /** SHA-256 hasher to recompute digests with */
  hasher?: ForensicHasher;
  logger?: Logger;
}

/**
 * Recompute each on-disk item's SHA-256 and compare with the manifest.
 * In-memory items are skipped; missing files are reported apart from mismatches.
 */
export async function verifyEvidence(
  manifest: SealedManifest,
  options: VerifyEvidenceOptions = {}
): Promise<EvidenceVerificationReport> {
  const logger = (options.logger ?? getLogger('verification')).child({
    collectionId: manifest.collectionId,
  });
  const hasher = options.hasher ?? new ForensicHasher({ algorithm: 'sha256', logger });
  const items: EvidenceCheck[] = [];

  for (const item of manifest.evidenceItems) {
    const check: EvidenceCheck = {
      filename: item.filename,
      localPath: locationToPath(item.location),
      status: 'skipped',
      expected: item.sha256.toLowerCase(),
    };

    if (item.location.kind === 'on_disk') {
      try {
        const result = await hasher.hashFile(item.location.path);
        check.actual = result.hashValue;
        check.status = result.hashValue === check.expected ? 'ok' : 'mismatch';
      } catch (error) {
        if (!(error instanceof ForensicError)) {
          throw error;
        }
        check.status = error.code === 'IO_ERROR' ? 'unreadable' : 'missing';
        check.reason = error.message;
      }
    }

    if (check.status === 'mismatch' || check.status === 'unreadable') {
      logger.warn('Evidence verification failed', { ...check });
    } else if (check.status === 'missing') {
      logger.warn('Evidence file missing', { file: check.localPath });
    }
    items.push(check);
  }

  const count = (status: EvidenceStatus) => items.filter(i => i.status === status).length;
  const report: EvidenceVerificationReport = {
    items,
    ok: count('ok'),
    mismatched: count('mismatch'),
    missing: count('missing'),
    skipped: count('skipped'),
    unreadable: count('unreadable'),
    valid: false,
  };
  report.valid = report.mismatched === 0 && report.missing === 0 && report.unreadable === 0;

  logger.info('Evidence verified', {
    ok: report.ok,
    mismatched: report.mismatched,
    missing: report.missing,
    skipped: report.skipped,
    unreadable: report.unreadable,
  });

  return report;
}
