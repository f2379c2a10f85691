/**
 * Manifest Generator
 *
 * Sole mutator of a ForensicManifest. Every registered evidence item gets
 * both digests and a matching chain-of-custody entry; after finalize() the
 * manifest is sealed and further mutation is rejected.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  DEFAULT_MIME_TYPE,
  Errors,
  MANIFEST_SCHEMA_VERSION,
  MIME_TYPES,
  asError,
  describeValidationErrors,
  generateCollectionId,
  getSystemErrorCode,
  utcNow,
  validateSchema,
  type HostIdentity,
  type JsonValue,
} from '@forensic-cloud/core';
import { ForensicHasher } from '@forensic-cloud/hasher';
import { getLogger, type Logger } from '@forensic-cloud/logger';
import {
  CUSTODY_ACTIONS,
  createAgentInfo,
  createSourceInfo,
  placeholderSource,
  type ChainOfCustodyEntry,
  type CustodyAction,
  type EvidenceItem,
  type ForensicManifest,
  type Metadata,
  type SealedManifest,
  type SourceDetails,
} from './model.js';
import { ManifestDocumentSchema, type ManifestDocument } from './schemas.js';
import { fromDocument, toDocument } from './serializer.js';
import { computeManifestHash } from './verification.js';

/**
 * Generator construction options
 */
export interface ManifestGeneratorOptions {
  caseId: string;
  agentName: string;
  agentId: string;
  /** Pre-assigned collection id (default: random UUID) */
  collectionId?: string;
  /** Append a SOURCE_CONFIGURED custody entry on every setSource (default: false) */
  recordSourceChanges?: boolean;
  /** Overrides for the detected host identity */
  host?: Partial<HostIdentity>;
  logger?: Logger;
}

/**
 * Options for registering evidence
 */
export interface EvidenceOptions {
  /** Location at the source (default: the given path, or empty for bytes) */
  originalPath?: string;
  /** MIME type (default: from the file extension) */
  mimeType?: string;
  metadata?: Metadata;
}

/**
 * Options for loading a persisted manifest
 */
export interface LoadOptions {
  recordSourceChanges?: boolean;
  logger?: Logger;
}

/**
 * MIME type for a file name from the extension table
 */
export function detectMimeType(filename: string): string {
  return MIME_TYPES[path.extname(filename).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

function freezeDeep<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Path of the first NaN or infinite number inside a value, if any
 */
function findNonFinite(value: JsonValue | undefined, at: string): string | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? undefined : at;
  }
  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      const found = findNonFinite(item, `${at}[${index}]`);
      if (found) return found;
    }
    return undefined;
  }
  if (value !== null && typeof value === 'object') {
    for (const [key, member] of Object.entries(value)) {
      const found = findNonFinite(member, `${at}.${key}`);
      if (found) return found;
    }
  }
  return undefined;
}

function assertFinite(value: JsonValue | undefined, field: string): void {
  const at = findNonFinite(value, field);
  if (at) {
    throw Errors.invalidArgument(`${at} must be a finite number`, { field: at });
  }
}

export class ManifestGenerator {
  private readonly sha256: ForensicHasher;
  private readonly sha512: ForensicHasher;
  private readonly logger: Logger;
  private readonly recordSourceChanges: boolean;
  private manifest: ForensicManifest;
  private sealed?: SealedManifest;

  /**
   * @param restored - manifest rebuilt by {@link ManifestGenerator.load}; skips start-up
   */
  constructor(options: ManifestGeneratorOptions, restored?: ForensicManifest) {
    const baseLogger = options.logger ?? getLogger('manifest');
    this.sha256 = new ForensicHasher({ algorithm: 'sha256', logger: baseLogger });
    this.sha512 = new ForensicHasher({ algorithm: 'sha512', logger: baseLogger });
    this.recordSourceChanges = options.recordSourceChanges ?? false;

    if (restored) {
      this.manifest = restored;
      this.logger = baseLogger.child({ collectionId: restored.collectionId });
      if (restored.readyForBlockchain) {
        this.sealed = freezeDeep(structuredClone(restored));
      }
      return;
    }

    const collectionId = options.collectionId || generateCollectionId();
    this.logger = baseLogger.child({ collectionId });
    this.manifest = {
      collectionId,
      caseId: options.caseId,
      agent: createAgentInfo(options.agentName, options.agentId, options.host),
      source: placeholderSource(),
      schemaVersion: MANIFEST_SCHEMA_VERSION,
      createdAt: utcNow(),
      evidenceItems: [],
      chainOfCustody: [],
      notes: '',
      readyForBlockchain: false,
      manifestHash: '',
    };

    this.addCustodyEntry(
      CUSTODY_ACTIONS.COLLECTION_STARTED,
      `Collection started for case ${options.caseId}`
    );
    this.logger.info('Manifest generator initialized', { caseId: options.caseId });
  }

  get collectionId(): string {
    return this.manifest.collectionId;
  }

  get isFinalized(): boolean {
    return this.sealed !== undefined;
  }

  /**
   * Copy of the current manifest state
   */
  snapshot(): ForensicManifest {
    return structuredClone(this.manifest);
  }

  /**
   * Replace the source description
   */
  setSource(sourceType: string, provider: string, details: SourceDetails = {}): void {
    this.assertOpen('setSource');
    assertFinite(details, 'source');

    if (this.manifest.evidenceItems.length > 0) {
      this.logger.warn('Source changed after evidence was registered', {
        previous: `${this.manifest.source.provider}/${this.manifest.source.sourceType}`,
        evidenceCount: this.manifest.evidenceItems.length,
      });
    }

    this.manifest.source = createSourceInfo(sourceType, provider, details);

    if (this.recordSourceChanges) {
      this.addCustodyEntry(
        CUSTODY_ACTIONS.SOURCE_CONFIGURED,
        `Source configured: ${provider}/${sourceType}`
      );
    }
    this.logger.info('Source configured', { sourceType, provider });
  }

  /**
   * Register a file as evidence
   * @throws ForensicError NOT_FOUND, NOT_A_FILE, IO_ERROR or MANIFEST_FINALIZED
   */
  async addEvidenceFile(filePath: string, options: EvidenceOptions = {}): Promise<EvidenceItem> {
    this.assertOpen('addEvidenceFile');
    assertFinite(options.metadata, 'metadata');

    const digest256 = await this.sha256.hashFile(filePath);
    const digest512 = await this.sha512.hashFile(filePath);
    if (digest256.fileSize !== digest512.fileSize) {
      throw Errors.io(
        digest256.filePath,
        new Error(`file changed while hashing (${digest256.fileSize} then ${digest512.fileSize} bytes)`)
      );
    }
    // Guard again: the hashing awaits above may interleave with finalize()
    this.assertOpen('addEvidenceFile');

    const filename = path.basename(digest256.filePath);
    const item: EvidenceItem = {
      filename,
      originalPath: options.originalPath || filePath,
      location: { kind: 'on_disk', path: digest256.filePath },
      sizeBytes: digest256.fileSize,
      sha256: digest256.hashValue,
      sha512: digest512.hashValue,
      mimeType: options.mimeType || detectMimeType(filename),
      collectedAt: utcNow(),
      metadata: structuredClone(options.metadata ?? {}),
    };

    return this.register(item, `Evidence collected: ${filename}`);
  }

  /**
   * Register an in-memory buffer as evidence; no file I/O
   * @throws ForensicError INVALID_ARGUMENT or MANIFEST_FINALIZED
   */
  addEvidenceBytes(data: Uint8Array, filename: string, options: EvidenceOptions = {}): EvidenceItem {
    this.assertOpen('addEvidenceBytes');
    if (!filename) {
      throw Errors.invalidArgument('Evidence filename must not be empty');
    }
    assertFinite(options.metadata, 'metadata');

    const item: EvidenceItem = {
      filename,
      originalPath: options.originalPath ?? '',
      location: { kind: 'in_memory' },
      sizeBytes: data.byteLength,
      sha256: this.sha256.hashBytes(data),
      sha512: this.sha512.hashBytes(data),
      mimeType: options.mimeType || DEFAULT_MIME_TYPE,
      collectedAt: utcNow(),
      metadata: structuredClone(options.metadata ?? {}),
    };

    return this.register(item, `In-memory evidence collected: ${filename}`);
  }

  /**
   * Append a timestamped line to the notes
   */
  addNote(text: string): void {
    this.assertOpen('addNote');
    const line = `[${utcNow()}] ${text}`;
    this.manifest.notes = this.manifest.notes ? `${this.manifest.notes}\n${line}` : line;
  }

  /**
   * Seal the manifest: append COLLECTION_COMPLETED and compute the self-hash.
   * Later calls return the same sealed manifest.
   */
  finalize(): SealedManifest {
    if (this.sealed) {
      return this.sealed;
    }

    // Committed only once the hash is computed
    const candidate = structuredClone(this.manifest);
    candidate.chainOfCustody.push(
      this.custodyEntry(CUSTODY_ACTIONS.COLLECTION_COMPLETED, 'Collection completed')
    );
    candidate.readyForBlockchain = true;
    candidate.manifestHash = computeManifestHash(toDocument(candidate), this.sha256);

    this.manifest = candidate;
    this.sealed = freezeDeep(structuredClone(candidate));

    this.logger.info('Manifest finalized', {
      manifestHash: `${this.manifest.manifestHash.slice(0, 16)}...`,
      evidenceCount: this.manifest.evidenceItems.length,
    });
    return this.sealed;
  }

  /**
   * Persisted document for the current state
   */
  toDocument(): ManifestDocument {
    return toDocument(this.manifest);
  }

  /**
   * Pretty-printed JSON document
   */
  toJson(indent = 2): string {
    return JSON.stringify(this.toDocument(), null, indent);
  }

  /**
   * Finalize if needed and write the document as UTF-8 JSON
   * @returns Absolute path written
   */
  async save(outputPath: string): Promise<string> {
    const absolutePath = path.resolve(outputPath);
    this.finalize();

    try {
      await mkdir(path.dirname(absolutePath), { recursive: true });
      await writeFile(absolutePath, this.toJson(), 'utf8');
    } catch (error) {
      throw Errors.io(absolutePath, asError(error));
    }

    this.logger.info('Manifest saved', { path: absolutePath });
    return absolutePath;
  }

  /**
   * Read a persisted manifest. The stored hash is kept as-is, not re-verified.
   * @throws ForensicError NOT_FOUND, IO_ERROR or INVALID_MANIFEST
   */
  static async load(manifestPath: string, options: LoadOptions = {}): Promise<ManifestGenerator> {
    const document = await readManifestDocument(manifestPath);
    const manifest = fromDocument(document);

    const generator = new ManifestGenerator(
      {
        caseId: manifest.caseId,
        agentName: manifest.agent.name,
        agentId: manifest.agent.agentId,
        collectionId: manifest.collectionId,
        recordSourceChanges: options.recordSourceChanges,
        logger: options.logger,
      },
      manifest
    );
    generator.logger.info('Manifest loaded', {
      path: path.resolve(manifestPath),
      finalized: manifest.readyForBlockchain,
    });
    return generator;
  }

  private register(item: EvidenceItem, description: string): EvidenceItem {
    this.manifest.evidenceItems.push(item);
    this.addCustodyEntry(CUSTODY_ACTIONS.EVIDENCE_COLLECTED, description, '', item.sha256);

    this.logger.info('Evidence added', {
      filename: item.filename,
      sizeBytes: item.sizeBytes,
      sha256: `${item.sha256.slice(0, 16)}...`,
    });
    return structuredClone(item);
  }

  private custodyEntry(
    action: CustodyAction,
    description: string,
    hashBefore = '',
    hashAfter = ''
  ): ChainOfCustodyEntry {
    return {
      action,
      timestamp: utcNow(),
      agentId: this.manifest.agent.agentId,
      description,
      hashBefore,
      hashAfter,
    };
  }

  private addCustodyEntry(
    action: CustodyAction,
    description: string,
    hashBefore = '',
    hashAfter = ''
  ): void {
    this.manifest.chainOfCustody.push(this.custodyEntry(action, description, hashBefore, hashAfter));
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw Errors.manifestFinalized(this.manifest.collectionId, operation);
    }
  }
}

/**
 * Read and validate a persisted manifest document
 * @throws ForensicError NOT_FOUND, IO_ERROR or INVALID_MANIFEST
 */
export async function readManifestDocument(manifestPath: string): Promise<ManifestDocument> {
  const absolutePath = path.resolve(manifestPath);

  let text: string;
  try {
    text = await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') {
      throw Errors.notFound(absolutePath);
    }
    throw Errors.io(absolutePath, asError(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw Errors.invalidManifest(`Manifest ${absolutePath} is not valid JSON: ${asError(error).message}`, {
      path: absolutePath,
    });
  }

  const validation = validateSchema(ManifestDocumentSchema, data);
  if (!validation.success || !validation.data) {
    throw Errors.invalidManifest(
      `Manifest ${absolutePath} is invalid: ${describeValidationErrors(validation.errors ?? [])}`,
      { path: absolutePath, errors: validation.errors }
    );
  }
  return validation.data;
}

/**
 * Create a generator and set its source in one step
 */
export function createManifest(
  options: ManifestGeneratorOptions & {
    sourceType: string;
    provider: string;
    source?: SourceDetails;
  }
): ManifestGenerator {
  const generator = new ManifestGenerator(options);
  generator.setSource(options.sourceType, options.provider, options.source);
  return generator;
}
