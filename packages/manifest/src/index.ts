/**
 * @forensic-cloud/manifest
 *
 * Forensic manifest model, generator with chain of custody, persisted
 * document schema and verification.
 */

// Model
export {
  CUSTODY_ACTIONS,
  createAgentInfo,
  createSourceInfo,
  placeholderSource,
} from './model.js';
export type {
  Metadata,
  CustodyAction,
  KnownCustodyAction,
  AgentInfo,
  SourceInfo,
  SourceDetails,
  EvidenceLocation,
  EvidenceItem,
  ChainOfCustodyEntry,
  ForensicManifest,
  SealedManifest,
  DeepReadonly,
} from './model.js';

// Persisted document
export {
  JsonValueSchema,
  AgentDocumentSchema,
  SourceDocumentSchema,
  EvidenceDocumentSchema,
  CustodyEntryDocumentSchema,
  ManifestDocumentSchema,
} from './schemas.js';
export type {
  AgentDocument,
  SourceDocument,
  EvidenceDocument,
  CustodyEntryDocument,
  ManifestDocument,
} from './schemas.js';
export { toDocument, fromDocument, locationToPath, pathToLocation } from './serializer.js';

// Generator
export {
  ManifestGenerator,
  createManifest,
  detectMimeType,
  readManifestDocument,
} from './generator.js';
export type { ManifestGeneratorOptions, EvidenceOptions, LoadOptions } from './generator.js';

// Verification
export {
  canonicalManifestForm,
  computeManifestHash,
  verifyManifestHash,
  verifyEvidence,
} from './verification.js';
export type {
  EvidenceStatus,
  EvidenceCheck,
  EvidenceVerificationReport,
  VerifyEvidenceOptions,
} from './verification.js';
