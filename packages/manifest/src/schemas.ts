/**
 * Persisted manifest document schemas using Zod
 *
 * The document is the interchange format read by the verification CLI and
 * other tooling; field names and nesting must not change. Optional fields
 * fall back to defaults so older documents still load.
 */

import { z, IN_MEMORY_SENTINEL, MANIFEST_SCHEMA_VERSION, DEFAULT_MIME_TYPE, type JsonValue } from '@forensic-cloud/core';

/**
 * Any JSON value
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const MetadataSchema = z.record(JsonValueSchema).default({});

/**
 * Agent schema
 */
export const AgentDocumentSchema = z.object({
  name: z.string(),
  agent_id: z.string(),
  hostname: z.string().default(''),
  username: z.string().default('unknown'),
  ip_address: z.string().default(''),
  os_info: z.string().default(''),
});

/**
 * Source schema
 */
export const SourceDocumentSchema = z.object({
  source_type: z.string(),
  provider: z.string(),
  region: z.string().default(''),
  account_id: z.string().default(''),
  resource_id: z.string().default(''),
  additional_info: MetadataSchema,
});

/**
 * Evidence item schema; `local_path` is a path or the in-memory sentinel
 */
export const EvidenceDocumentSchema = z.object({
  filename: z.string().min(1, 'Evidence filename is required'),
  original_path: z.string(),
  local_path: z.string().min(1, `Use '${IN_MEMORY_SENTINEL}' for in-memory evidence`),
  size_bytes: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-fA-F]{64}$/, 'Expected a 64-character hex SHA-256 digest'),
  sha512: z.string().regex(/^([0-9a-fA-F]{128})?$/, 'Expected a 128-character hex SHA-512 digest').default(''),
  mime_type: z.string().default(DEFAULT_MIME_TYPE),
  collected_at: z.string().default(''),
  metadata: MetadataSchema,
});

/**
 * Chain-of-custody entry schema
 */
export const CustodyEntryDocumentSchema = z.object({
  action: z.string().min(1, 'Custody action is required'),
  timestamp: z.string(),
  agent_id: z.string(),
  description: z.string(),
  hash_before: z.string().default(''),
  hash_after: z.string().default(''),
});

/**
 * Complete manifest document schema
 */
export const ManifestDocumentSchema = z.object({
  collection_id: z.string().min(1, 'Collection id is required'),
  case_id: z.string(),
  agent: AgentDocumentSchema,
  source: SourceDocumentSchema,
  schema_version: z.string().default(MANIFEST_SCHEMA_VERSION),
  created_at: z.string().default(''),
  evidence_items: z.array(EvidenceDocumentSchema).default([]),
  chain_of_custody: z.array(CustodyEntryDocumentSchema).default([]),
  notes: z.string().default(''),
  ready_for_blockchain: z.boolean().default(false),
  manifest_hash: z.string().default(''),
});

export type AgentDocument = z.infer<typeof AgentDocumentSchema>;
export type SourceDocument = z.infer<typeof SourceDocumentSchema>;
export type EvidenceDocument = z.infer<typeof EvidenceDocumentSchema>;
export type CustodyEntryDocument = z.infer<typeof CustodyEntryDocumentSchema>;
export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;
