import { DuplicateInsertError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { cosineSimilarity } from '../embeddings/similarity';
import { compareHits, matchesFilters } from './filters';
import type {
  ChunkRecord,
  DocumentSummary,
  SearchFilters,
  SearchHit,
  UniqueAttribute,
  ValueCount,
  VectorStore,
} from './vectorIndex.types';

/** Records copied per event-loop turn while staging a replacement. */
const STAGE_BATCH_SIZE = 512;

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function withoutEmbedding({ embedding: _embedding, ...chunk }: ChunkRecord) {
  return chunk;
}

/**
 * In-process store. Each document's chunks live in one frozen array; a
 * replacement is staged off to the side and swapped in with a single map
 * write, so a search sees either the old set or the new one.
 */
export class MemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private documents = new Map<string, readonly ChunkRecord[]>();
  private writing = new Set<string>();

  async init(): Promise<void> {
    logger.info({ store: this.name }, 'Vector store ready');
  }

  async replaceDocument(documentId: string, records: readonly ChunkRecord[]): Promise<void> {
    this.beginWrite(documentId);
    try {
      const staged: ChunkRecord[] = [];
      for (let i = 0; i < records.length; i += STAGE_BATCH_SIZE) {
        for (const record of records.slice(i, i + STAGE_BATCH_SIZE)) {
          staged.push(Object.freeze({ ...record, embedding: [...record.embedding] }));
        }
        await nextTick();
      }

      if (staged.length === 0) {
        this.documents.delete(documentId);
      } else {
        this.documents.set(documentId, Object.freeze(staged));
      }
    } finally {
      this.writing.delete(documentId);
    }
  }

  async deleteDocument(documentId: string): Promise<number> {
    this.beginWrite(documentId);
    try {
      const removed = this.documents.get(documentId)?.length ?? 0;
      this.documents.delete(documentId);
      return removed;
    } finally {
      this.writing.delete(documentId);
    }
  }

  async search(
    vector: readonly number[],
    filters: SearchFilters,
    limit: number
  ): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    for (const records of this.documents.values()) {
      for (const record of records) {
        if (!matchesFilters(record, filters)) continue;
        hits.push({
          chunk: withoutEmbedding(record),
          similarity: cosineSimilarity(vector, record.embedding),
        });
      }
    }
    return hits.sort(compareHits).slice(0, limit);
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const summaries: DocumentSummary[] = [];
    for (const records of this.documents.values()) {
      const first = records[0];
      if (!first) continue;
      summaries.push({
        documentId: first.documentId,
        author: first.author,
        region: first.region,
        date: first.date,
        language: first.language,
        sizeMb: first.sizeMb,
        uploadTime: first.uploadTime,
        contentHash: first.contentHash,
        chunkCount: records.length,
      });
    }
    return summaries.sort((a, b) => a.documentId.localeCompare(b.documentId));
  }

  async count(): Promise<number> {
    let total = 0;
    for (const records of this.documents.values()) {
      total += records.length;
    }
    return total;
  }

  async uniqueValues(attribute: UniqueAttribute): Promise<ValueCount[]> {
    const counts = new Map<string | null, number>();
    for (const records of this.documents.values()) {
      for (const record of records) {
        const value = record[attribute];
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .map(([value, count]) => ({ value, count }))
      .sort((a, b) => b.count - a.count || String(a.value).localeCompare(String(b.value)));
  }

  async clear(): Promise<void> {
    this.documents.clear();
  }

  async close(): Promise<void> {
    this.documents.clear();
  }

  private beginWrite(documentId: string): void {
    if (this.writing.has(documentId)) {
      throw new DuplicateInsertError(documentId);
    }
    this.writing.add(documentId);
  }
}
