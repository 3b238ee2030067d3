/**
 * Ingestion orchestrator.
 *
 * Drives parse -> chunk -> index for one document under a per-document lock.
 * Requests for the same id run one after another; each run starts fresh,
 * whatever the previous run ended in. Nothing reaches the index unless every
 * stage succeeded, and the index swap itself is atomic.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { INDEX_RETRY_ATTEMPTS, INDEX_RETRY_BASE_MS, MAX_DOCUMENT_BYTES } from '../../config/constants';
import { KeyedMutex } from '../../lib/keyed-mutex';
import { isCalendarDate } from '../../utils/dates';
import {
  BadRequestError,
  ChunkingError,
  IndexUnavailableError,
  NotFoundError,
} from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { throwIfAborted, withRetry } from '../../utils/retry';
import { chunkId, type ChunkOptions, type SemanticChunker } from '../chunker';
import type { EmbeddingProvider } from '../embeddings/provider.interface';
import type { LanguageFamily, ParseOptions } from '../parser/parser.types';
import type { DocumentParser } from '../parser/parser.service';
import { computeContentHash } from '../sentences';
import type { ChunkRecord, DocumentMetadata } from '../vectorIndex/vectorIndex.types';
import type { VectorIndex } from '../vectorIndex/vectorIndex';
import { IngestionError } from './errors';
import {
  canTransition,
  type DocumentStatus,
  type IngestionStage,
  type IngestionState,
} from './stages';

const BYTES_PER_MB = 1024 * 1024;

export interface DocumentAttributes {
  author: string;
  region?: string | null;
  /** YYYY-MM-DD */
  date?: string | null;
  /** Overrides language detection */
  language?: LanguageFamily;
}

export interface IngestRequest extends DocumentAttributes {
  documentId: string;
  bytes: Uint8Array;
  parse?: Partial<ParseOptions>;
  chunk?: Partial<ChunkOptions>;
}

export interface IngestResult {
  documentId: string;
  status: 'committed';
  chunkCount: number;
  contentHash: string;
  language: LanguageFamily;
  pageCount: number;
  failedPages: number[];
  strategy: ParseOptions['strategy'];
}

export interface IngestionOrchestratorOptions {
  /** Root that file paths given to ingestFile resolve against */
  documentsDir: string;
  now?: () => Date;
}

export class IngestionOrchestrator {
  private locks = new KeyedMutex();
  private statuses = new Map<string, DocumentStatus>();
  private readonly now: () => Date;

  constructor(
    private readonly parser: DocumentParser,
    private readonly chunker: SemanticChunker,
    private readonly embedder: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly options: IngestionOrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  getStatus(documentId: string): DocumentStatus | undefined {
    return this.statuses.get(documentId);
  }

  listStatuses(): DocumentStatus[] {
    return [...this.statuses.values()].sort((a, b) => a.documentId.localeCompare(b.documentId));
  }

  isBusy(documentId: string): boolean {
    return this.locks.isLocked(documentId);
  }

  /**
   * Read a file below the documents directory and ingest it. The document id
   * is the file name.
   */
  async ingestFile(
    filePath: string,
    attributes: DocumentAttributes,
    signal?: AbortSignal
  ): Promise<IngestResult> {
    const root = path.resolve(this.options.documentsDir);
    const resolved = path.resolve(root, filePath);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      throw new BadRequestError('File path must be inside the documents directory', 'INVALID_PATH');
    }

    let bytes: Uint8Array;
    try {
      bytes = await readFile(resolved, { signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        throw new NotFoundError(`File not found: ${filePath}`, 'FILE_NOT_FOUND');
      }
      throw error;
    }

    return this.ingest({ ...attributes, documentId: path.basename(resolved), bytes }, signal);
  }

  async ingest(request: IngestRequest, signal?: AbortSignal): Promise<IngestResult> {
    validateRequest(request);
    return this.locks.runExclusive(request.documentId, () => this.run(request, signal), signal);
  }

  /**
   * Remove a document's chunks. Waits for any ingest of the same id.
   * Returns whether the index held the document.
   */
  async remove(documentId: string, signal?: AbortSignal): Promise<boolean> {
    return this.locks.runExclusive(
      documentId,
      async () => {
        const deleted = await withRetry(
          'index.delete',
          () => this.index.delete(documentId, signal),
          indexRetryOptions(signal)
        );
        this.statuses.delete(documentId);
        return deleted;
      },
      signal
    );
  }

  private async run(request: IngestRequest, signal?: AbortSignal): Promise<IngestResult> {
    const { documentId, bytes } = request;
    const startedAt = Date.now();
    const contentHash = computeContentHash(bytes);
    if (this.previousHash(documentId) === contentHash) {
      logger.info({ documentId }, 'Content unchanged, re-ingesting');
    }
    this.transition(documentId, { state: 'received' });

    const parsed = await this.stage(documentId, 'parsing', () =>
      this.parser.parse(bytes, request.parse, signal)
    );

    const drafts = await this.stage(documentId, 'chunking', async () => {
      const result = await this.chunker.chunk(parsed.segments, request.chunk, signal);
      if (result.length === 0) {
        throw new ChunkingError('Document produced no chunks');
      }
      return result;
    });

    const chunkCount = await this.stage(documentId, 'indexing', async () => {
      const embeddings = await this.embedder.embedBatch(
        drafts.map((draft) => draft.text),
        signal
      );
      if (embeddings.length !== drafts.length) {
        throw new ChunkingError(
          `Embedding count mismatch: ${embeddings.length} vectors for ${drafts.length} chunks`
        );
      }

      const metadata: DocumentMetadata = {
        documentId,
        author: request.author.trim(),
        region: request.region || null,
        date: request.date || null,
        language: request.language ?? parsed.language,
        sizeMb: Math.round((bytes.byteLength / BYTES_PER_MB) * 100) / 100,
        uploadTime: this.now().toISOString(),
        contentHash,
      };
      const records: ChunkRecord[] = drafts.map((draft, i) => ({
        ...metadata,
        id: chunkId(documentId, draft.ordinal),
        ordinal: draft.ordinal,
        text: draft.text,
        tokenCount: draft.tokenCount,
        pageStart: draft.pageStart,
        pageEnd: draft.pageEnd,
        embedding: embeddings[i],
      }));

      throwIfAborted(signal);
      await withRetry(
        'index.replace',
        () => this.index.replace(documentId, records, signal),
        indexRetryOptions(signal)
      );
      return records.length;
    });

    this.transition(documentId, { state: 'committed', chunkCount, contentHash });
    logger.info(
      {
        documentId,
        chunkCount,
        pageCount: parsed.pageCount,
        failedPages: parsed.failedPages.length,
        strategy: parsed.strategy,
        durationMs: Date.now() - startedAt,
      },
      'Document committed'
    );

    return {
      documentId,
      status: 'committed',
      chunkCount,
      contentHash,
      language: request.language ?? parsed.language,
      pageCount: parsed.pageCount,
      failedPages: parsed.failedPages,
      strategy: parsed.strategy,
    };
  }

  /**
   * Run one stage. Any error ends the run in failed(stage, cause).
   */
  private async stage<T>(
    documentId: string,
    stage: IngestionStage,
    fn: () => Promise<T>
  ): Promise<T> {
    this.transition(documentId, { state: stage });
    try {
      return await fn();
    } catch (error) {
      this.transition(documentId, { state: 'failed', stage, cause: errorMessage(error) });
      logger.error({ documentId, stage, error: errorMessage(error) }, 'Ingestion failed');
      throw new IngestionError(documentId, stage, error);
    }
  }

  private transition(documentId: string, next: IngestionState): void {
    const current = this.statuses.get(documentId);
    if (!canTransition(current?.state, next.state)) {
      throw new Error(`Invalid ingestion transition for ${documentId}: ${current?.state} -> ${next.state}`);
    }
    this.statuses.set(documentId, { ...next, documentId, updatedAt: this.now().toISOString() });
    logger.debug({ documentId, state: next.state }, 'Ingestion state changed');
  }

  private previousHash(documentId: string): string | undefined {
    const status = this.statuses.get(documentId);
    return status?.state === 'committed' ? status.contentHash : undefined;
  }
}

function indexRetryOptions(signal?: AbortSignal) {
  return {
    maxAttempts: INDEX_RETRY_ATTEMPTS,
    baseDelayMs: INDEX_RETRY_BASE_MS,
    signal,
    shouldRetry: (error: unknown) => error instanceof IndexUnavailableError,
  };
}

function validateRequest(request: IngestRequest): void {
  if (!request.documentId.trim()) {
    throw new BadRequestError('Document id is required', 'INVALID_DOCUMENT_ID');
  }
  if (!request.author.trim()) {
    throw new BadRequestError('Author is required', 'INVALID_AUTHOR');
  }
  if (request.date && !isCalendarDate(request.date)) {
    throw new BadRequestError(`Date must be a real YYYY-MM-DD date, got ${request.date}`, 'INVALID_DATE');
  }
  if (request.bytes.byteLength > MAX_DOCUMENT_BYTES) {
    throw new BadRequestError(
      `Document exceeds ${MAX_DOCUMENT_BYTES / BYTES_PER_MB} MB`,
      'DOCUMENT_TOO_LARGE'
    );
  }
}
