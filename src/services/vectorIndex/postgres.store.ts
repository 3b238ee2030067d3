import { and, asc, count, cosineDistance, desc, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../../config/database';
import { chunks, type NewChunkRow } from '../../models/schema';
import { IndexUnavailableError } from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { isLanguageFamily } from '../parser/language';
import type { LanguageFamily } from '../parser/parser.types';
import type {
  ChunkRecord,
  DocumentSummary,
  IndexedChunk,
  SearchFilters,
  SearchHit,
  UniqueAttribute,
  ValueCount,
  VectorStore,
} from './vectorIndex.types';

/** Rows per INSERT statement; keeps bind parameters under the protocol limit. */
const INSERT_BATCH_SIZE = 500;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && CONNECTION_ERROR_CODES.has(code)) return true;
  // drizzle wraps driver errors
  return error instanceof Error && error.cause !== undefined && isConnectionError(error.cause);
}

function toLanguage(value: string): LanguageFamily {
  return isLanguageFamily(value) ? value : 'latin-based';
}

const chunkColumns = {
  id: chunks.id,
  documentId: chunks.documentId,
  ordinal: chunks.ordinal,
  text: chunks.text,
  tokenCount: chunks.tokenCount,
  pageStart: chunks.pageStart,
  pageEnd: chunks.pageEnd,
  author: chunks.author,
  region: chunks.region,
  date: chunks.date,
  language: chunks.language,
  sizeMb: chunks.sizeMb,
  uploadTime: chunks.uploadTime,
  contentHash: chunks.contentHash,
};

/**
 * pgvector-backed store. One collection per configured name; a replacement
 * is a delete and insert inside one transaction.
 */
export class PostgresVectorStore implements VectorStore {
  readonly name = 'postgres';

  constructor(
    private readonly db: Database,
    private readonly collection: string
  ) {}

  async init(): Promise<void> {
    await this.run('init', () => this.db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`));
    logger.info({ store: this.name, collection: this.collection }, 'Vector store ready');
  }

  async replaceDocument(documentId: string, records: readonly ChunkRecord[]): Promise<void> {
    const rows: NewChunkRow[] = records.map((record) => ({ ...record, collection: this.collection }));

    await this.run('replaceDocument', () =>
      this.db.transaction(async (tx) => {
        await tx.delete(chunks).where(this.documentScope(documentId));
        for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
          await tx.insert(chunks).values(rows.slice(i, i + INSERT_BATCH_SIZE));
        }
      })
    );
  }

  async deleteDocument(documentId: string): Promise<number> {
    const deleted = await this.run('deleteDocument', () =>
      this.db
        .delete(chunks)
        .where(this.documentScope(documentId))
        .returning({ id: chunks.id })
    );
    return deleted.length;
  }

  async search(
    vector: readonly number[],
    filters: SearchFilters,
    limit: number
  ): Promise<SearchHit[]> {
    const queryVector = [...vector];
    const distance = cosineDistance(chunks.embedding, queryVector);

    const rows = await this.run('search', () =>
      this.db
        .select({
          ...chunkColumns,
          similarity: sql<number>`1 - (${distance})`.mapWith(Number),
        })
        .from(chunks)
        .where(and(...this.filterConditions(filters)))
        .orderBy(asc(distance), asc(chunks.ordinal), asc(chunks.documentId))
        .limit(limit)
    );

    return rows.map(({ similarity, ...chunk }) => ({
      chunk: this.toIndexedChunk(chunk),
      similarity,
    }));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const rows = await this.run('listDocuments', () =>
      this.db
        .select({
          documentId: chunks.documentId,
          author: chunks.author,
          region: chunks.region,
          date: chunks.date,
          language: chunks.language,
          sizeMb: chunks.sizeMb,
          uploadTime: chunks.uploadTime,
          contentHash: chunks.contentHash,
          chunkCount: count(),
        })
        .from(chunks)
        .where(eq(chunks.collection, this.collection))
        .groupBy(
          chunks.documentId,
          chunks.author,
          chunks.region,
          chunks.date,
          chunks.language,
          chunks.sizeMb,
          chunks.uploadTime,
          chunks.contentHash
        )
        .orderBy(asc(chunks.documentId))
    );

    return rows.map((row) => ({ ...row, language: toLanguage(row.language) }));
  }

  async count(): Promise<number> {
    const [row] = await this.run('count', () =>
      this.db
        .select({ total: count() })
        .from(chunks)
        .where(eq(chunks.collection, this.collection))
    );
    return row?.total ?? 0;
  }

  async uniqueValues(attribute: UniqueAttribute): Promise<ValueCount[]> {
    const column = chunks[attribute];
    const total = count();

    const rows = await this.run('uniqueValues', () =>
      this.db
        .select({ value: column, count: total })
        .from(chunks)
        .where(eq(chunks.collection, this.collection))
        .groupBy(column)
        .orderBy(desc(total), asc(column))
    );

    return rows.map((row) => ({ value: row.value, count: row.count }));
  }

  async clear(): Promise<void> {
    await this.run('clear', () =>
      this.db.delete(chunks).where(eq(chunks.collection, this.collection))
    );
  }

  async close(): Promise<void> {
    // The connection is owned by whoever created the database handle
  }

  private documentScope(documentId: string): SQL | undefined {
    return and(eq(chunks.collection, this.collection), eq(chunks.documentId, documentId));
  }

  private filterConditions(filters: SearchFilters): SQL[] {
    const conditions: SQL[] = [eq(chunks.collection, this.collection)];
    if (filters.author !== undefined) conditions.push(eq(chunks.author, filters.author));
    if (filters.region !== undefined) conditions.push(eq(chunks.region, filters.region));
    if (filters.documentId !== undefined) conditions.push(eq(chunks.documentId, filters.documentId));
    if (filters.language !== undefined) conditions.push(eq(chunks.language, filters.language));
    if (filters.dateFrom !== undefined) conditions.push(gte(chunks.date, filters.dateFrom));
    if (filters.dateTo !== undefined) conditions.push(lte(chunks.date, filters.dateTo));
    return conditions;
  }

  private toIndexedChunk(row: Omit<IndexedChunk, 'language'> & { language: string }): IndexedChunk {
    return { ...row, language: toLanguage(row.language) };
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isConnectionError(error)) {
        logger.error(
          { store: this.name, operation, error: errorMessage(error) },
          'Vector store unreachable'
        );
        throw new IndexUnavailableError(`Vector store unreachable during ${operation}`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
