/**
 * Manifest Model
 *
 * In-memory value types for one collection run. Field names are camelCase
 * here; the persisted document (see schemas.ts) uses snake_case.
 */

import {
  COLLECTION,
  Errors,
  getHostIdentity,
  type HostIdentity,
  type JsonValue,
} from '@forensic-cloud/core';

/**
 * Open mapping of metadata values
 */
export type Metadata = Record<string, JsonValue>;

/**
 * Chain-of-custody actions written by this package. Loaded manifests may
 * carry other action names.
 */
export const CUSTODY_ACTIONS = {
  COLLECTION_STARTED: 'COLLECTION_STARTED',
  EVIDENCE_COLLECTED: 'EVIDENCE_COLLECTED',
  COLLECTION_COMPLETED: 'COLLECTION_COMPLETED',
  SOURCE_CONFIGURED: 'SOURCE_CONFIGURED',
} as const;

export type KnownCustodyAction = (typeof CUSTODY_ACTIONS)[keyof typeof CUSTODY_ACTIONS];
export type CustodyAction = KnownCustodyAction | (string & {});

/**
 * Who performed the collection
 */
export interface AgentInfo {
  name: string;
  agentId: string;
  hostname: string;
  username: string;
  ipAddress: string;
  osInfo: string;
}

/**
 * Where the evidence came from
 */
export interface SourceInfo {
  /** Semantic kind, e.g. "cloudtrail" */
  sourceType: string;
  /** Platform, e.g. "aws" */
  provider: string;
  region: string;
  accountId: string;
  resourceId: string;
  additionalInfo: Metadata;
}

/**
 * Where an evidence item's bytes live on the collecting machine
 */
export type EvidenceLocation =
  | { kind: 'on_disk'; path: string }
  | { kind: 'in_memory' };

/**
 * One collected artifact
 */
export interface EvidenceItem {
  filename: string;
  /** Location at the source */
  originalPath: string;
  location: EvidenceLocation;
  sizeBytes: number;
  sha256: string;
  sha512: string;
  mimeType: string;
  collectedAt: string;
  metadata: Metadata;
}

/**
 * One audit record; append-only
 */
export interface ChainOfCustodyEntry {
  action: CustodyAction;
  timestamp: string;
  agentId: string;
  description: string;
  hashBefore: string;
  hashAfter: string;
}

/**
 * The record of one collection run
 */
export interface ForensicManifest {
  collectionId: string;
  caseId: string;
  agent: AgentInfo;
  source: SourceInfo;
  schemaVersion: string;
  createdAt: string;
  evidenceItems: EvidenceItem[];
  chainOfCustody: ChainOfCustodyEntry[];
  notes: string;
  readyForBlockchain: boolean;
  manifestHash: string;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * A finalized manifest; frozen at runtime as well
 */
export type SealedManifest = DeepReadonly<ForensicManifest>;

/**
 * Build an AgentInfo, filling host fields from the environment
 * @throws ForensicError INVALID_ARGUMENT when name or agentId is empty
 */
export function createAgentInfo(
  name: string,
  agentId: string,
  host: Partial<HostIdentity> = {}
): AgentInfo {
  if (!name.trim()) {
    throw Errors.invalidArgument('Agent name must not be empty', { field: 'name' });
  }
  if (!agentId.trim()) {
    throw Errors.invalidArgument('Agent id must not be empty', { field: 'agentId' });
  }

  const detected = { ...getHostIdentity(), ...host };
  return {
    name,
    agentId,
    hostname: detected.hostname,
    username: detected.username,
    ipAddress: detected.ipAddress,
    osInfo: detected.osInfo,
  };
}

/**
 * Source details accepted by setSource; unknown keys land in additionalInfo
 */
export interface SourceDetails {
  region?: string;
  accountId?: string;
  resourceId?: string;
  [key: string]: JsonValue | undefined;
}

/**
 * Build a SourceInfo
 */
export function createSourceInfo(
  sourceType: string,
  provider: string,
  details: SourceDetails = {}
): SourceInfo {
  const { region, accountId, resourceId, ...extra } = details;
  const additionalInfo: Metadata = {};
  for (const [key, value] of Object.entries(extra)) {
    if (value !== undefined) {
      additionalInfo[key] = value;
    }
  }

  return {
    sourceType,
    provider,
    region: region ?? '',
    accountId: accountId ?? '',
    resourceId: resourceId ?? '',
    additionalInfo,
  };
}

/**
 * Source used before setSource is called
 */
export function placeholderSource(): SourceInfo {
  return createSourceInfo(COLLECTION.UNDEFINED_SOURCE, COLLECTION.UNDEFINED_SOURCE);
}
