import { MAX_SEARCH_LIMIT } from '../../config/constants';
import { KeyedMutex } from '../../lib/keyed-mutex';
import { BadRequestError, ChunkingError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/retry';
import { compareHits, normalizeFilters } from './filters';
import type {
  ChunkRecord,
  DocumentSummary,
  SearchFilters,
  SearchHit,
  UniqueAttribute,
  ValueCount,
  VectorStore,
} from './vectorIndex.types';

/**
 * Consistency layer over a VectorStore. Writes for one document run one at a
 * time under a per-document lock, records are checked before they reach the
 * store, and search results come back in a fixed order regardless of backend.
 */
export class VectorIndex {
  private writeLocks = new KeyedMutex();

  constructor(
    private readonly store: VectorStore,
    readonly dimensions: number
  ) {}

  get backend(): string {
    return this.store.name;
  }

  init(): Promise<void> {
    return this.store.init();
  }

  close(): Promise<void> {
    return this.store.close();
  }

  /**
   * Replace the chunk sets of every document present in `records`.
   */
  async insert(records: readonly ChunkRecord[], signal?: AbortSignal): Promise<void> {
    const byDocument = new Map<string, ChunkRecord[]>();
    for (const record of records) {
      byDocument.set(record.documentId, [...(byDocument.get(record.documentId) ?? []), record]);
    }
    for (const [documentId, documentRecords] of byDocument) {
      await this.replace(documentId, documentRecords, signal);
    }
  }

  /**
   * Atomically swap a document's chunks for `records`. An empty set removes
   * the document.
   */
  async replace(documentId: string, records: readonly ChunkRecord[], signal?: AbortSignal): Promise<void> {
    this.validate(documentId, records);

    await this.writeLocks.runExclusive(
      documentId,
      async () => {
        throwIfAborted(signal);
        await this.store.replaceDocument(documentId, records);
      },
      signal
    );

    logger.info({ documentId, chunks: records.length, store: this.store.name }, 'Document indexed');
  }

  /** Returns whether the document had any chunks. */
  async delete(documentId: string, signal?: AbortSignal): Promise<boolean> {
    const removed = await this.writeLocks.runExclusive(
      documentId,
      async () => {
        throwIfAborted(signal);
        return this.store.deleteDocument(documentId);
      },
      signal
    );

    logger.info({ documentId, removed, store: this.store.name }, 'Document removed from index');
    return removed > 0;
  }

  async search(
    vector: readonly number[],
    filters: SearchFilters,
    topK: number,
    signal?: AbortSignal
  ): Promise<SearchHit[]> {
    throwIfAborted(signal);
    if (vector.length !== this.dimensions) {
      throw new BadRequestError(
        `Query vector has ${vector.length} dimensions, index expects ${this.dimensions}`,
        'DIMENSION_MISMATCH'
      );
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new BadRequestError(`topK must be a positive integer, got ${topK}`, 'INVALID_TOP_K');
    }

    const limit = Math.min(topK, MAX_SEARCH_LIMIT);
    const hits = await this.store.search(vector, normalizeFilters(filters), limit);
    return [...hits].sort(compareHits).slice(0, limit);
  }

  listDocuments(): Promise<DocumentSummary[]> {
    return this.store.listDocuments();
  }

  count(): Promise<number> {
    return this.store.count();
  }

  uniqueValues(attribute: UniqueAttribute): Promise<ValueCount[]> {
    return this.store.uniqueValues(attribute);
  }

  async clear(): Promise<void> {
    await this.store.clear();
    logger.warn({ store: this.store.name }, 'Vector collection cleared');
  }

  private validate(documentId: string, records: readonly ChunkRecord[]): void {
    const ids = new Set<string>();
    const ordinals = new Set<number>();

    for (const record of records) {
      if (record.documentId !== documentId) {
        throw new ChunkingError(`Chunk ${record.id} belongs to ${record.documentId}, not ${documentId}`);
      }
      if (!record.text.trim()) {
        throw new ChunkingError(`Chunk ${record.id} has empty text`);
      }
      if (record.embedding.length !== this.dimensions) {
        throw new ChunkingError(
          `Chunk ${record.id} has ${record.embedding.length} dimensions, index expects ${this.dimensions}`
        );
      }
      if (ids.has(record.id) || ordinals.has(record.ordinal)) {
        throw new ChunkingError(`Duplicate chunk ${record.id} (ordinal ${record.ordinal}) in ${documentId}`);
      }
      ids.add(record.id);
      ordinals.add(record.ordinal);
    }
  }
}
