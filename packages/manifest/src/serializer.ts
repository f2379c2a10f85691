/**
 * Conversion between the in-memory model and the persisted document.
 * Keys are emitted in document order.
 */

import { IN_MEMORY_SENTINEL } from '@forensic-cloud/core';
import type {
  AgentInfo,
  ChainOfCustodyEntry,
  EvidenceItem,
  EvidenceLocation,
  ForensicManifest,
  Metadata,
  SourceInfo,
} from './model.js';
import type {
  AgentDocument,
  CustodyEntryDocument,
  EvidenceDocument,
  ManifestDocument,
  SourceDocument,
} from './schemas.js';

function copyMetadata(metadata: Metadata): Metadata {
  return structuredClone(metadata);
}

export function agentToDocument(agent: AgentInfo): AgentDocument {
  return {
    name: agent.name,
    agent_id: agent.agentId,
    hostname: agent.hostname,
    username: agent.username,
    ip_address: agent.ipAddress,
    os_info: agent.osInfo,
  };
}

export function sourceToDocument(source: SourceInfo): SourceDocument {
  return {
    source_type: source.sourceType,
    provider: source.provider,
    region: source.region,
    account_id: source.accountId,
    resource_id: source.resourceId,
    additional_info: copyMetadata(source.additionalInfo),
  };
}

/**
 * Persisted `local_path` for a location
 */
export function locationToPath(location: EvidenceLocation): string {
  return location.kind === 'on_disk' ? location.path : IN_MEMORY_SENTINEL;
}

/**
 * Location for a persisted `local_path`
 */
export function pathToLocation(localPath: string): EvidenceLocation {
  return localPath === IN_MEMORY_SENTINEL ? { kind: 'in_memory' } : { kind: 'on_disk', path: localPath };
}

export function evidenceToDocument(item: EvidenceItem): EvidenceDocument {
  return {
    filename: item.filename,
    original_path: item.originalPath,
    local_path: locationToPath(item.location),
    size_bytes: item.sizeBytes,
    sha256: item.sha256,
    sha512: item.sha512,
    mime_type: item.mimeType,
    collected_at: item.collectedAt,
    metadata: copyMetadata(item.metadata),
  };
}

export function custodyToDocument(entry: ChainOfCustodyEntry): CustodyEntryDocument {
  return {
    action: entry.action,
    timestamp: entry.timestamp,
    agent_id: entry.agentId,
    description: entry.description,
    hash_before: entry.hashBefore,
    hash_after: entry.hashAfter,
  };
}

/**
 * Render a manifest as its persisted document
 */
export function toDocument(manifest: ForensicManifest): ManifestDocument {
  return {
    collection_id: manifest.collectionId,
    case_id: manifest.caseId,
    agent: agentToDocument(manifest.agent),
    source: sourceToDocument(manifest.source),
    schema_version: manifest.schemaVersion,
    created_at: manifest.createdAt,
    evidence_items: manifest.evidenceItems.map(item => evidenceToDocument(item)),
    chain_of_custody: manifest.chainOfCustody.map(entry => custodyToDocument(entry)),
    notes: manifest.notes,
    ready_for_blockchain: manifest.readyForBlockchain,
    manifest_hash: manifest.manifestHash,
  };
}

/**
 * Rebuild a manifest from a validated document
 */
export function fromDocument(document: ManifestDocument): ForensicManifest {
  return {
    collectionId: document.collection_id,
    caseId: document.case_id,
    agent: {
      name: document.agent.name,
      agentId: document.agent.agent_id,
      hostname: document.agent.hostname,
      username: document.agent.username,
      ipAddress: document.agent.ip_address,
      osInfo: document.agent.os_info,
    },
    source: {
      sourceType: document.source.source_type,
      provider: document.source.provider,
      region: document.source.region,
      accountId: document.source.account_id,
      resourceId: document.source.resource_id,
      additionalInfo: copyMetadata(document.source.additional_info),
    },
    schemaVersion: document.schema_version,
    createdAt: document.created_at,
    evidenceItems: document.evidence_items.map(item => ({
      filename: item.filename,
      originalPath: item.original_path,
      location: pathToLocation(item.local_path),
      sizeBytes: item.size_bytes,
      sha256: item.sha256,
      sha512: item.sha512,
      mimeType: item.mime_type,
      collectedAt: item.collected_at,
      metadata: copyMetadata(item.metadata),
    })),
    chainOfCustody: document.chain_of_custody.map(entry => ({
      action: entry.action,
      timestamp: entry.timestamp,
      agentId: entry.agent_id,
      description: entry.description,
      hashBefore: entry.hash_before,
      hashAfter: entry.hash_after,
    })),
    notes: document.notes,
    readyForBlockchain: document.ready_for_blockchain,
    manifestHash: document.manifest_hash,
  };
}
