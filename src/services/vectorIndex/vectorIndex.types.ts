/**
 * Types for the vector index and its storage backends.
 */

import type { LanguageFamily } from '../parser/parser.types';

/** Document attributes copied onto every chunk for filtering and listing. */
export interface DocumentMetadata {
  documentId: string;
  author: string;
  region: string | null;
  /** ISO date, YYYY-MM-DD */
  date: string | null;
  language: LanguageFamily;
  /** File size in MB, two decimals */
  sizeMb: number;
  /** ISO timestamp of the ingest that wrote the chunks */
  uploadTime: string;
  contentHash: string;
}

export interface ChunkRecord extends DocumentMetadata {
  /** Deterministic from document id and ordinal */
  id: string;
  ordinal: number;
  text: string;
  tokenCount: number;
  pageStart: number;
  pageEnd: number;
  embedding: number[];
}

export type IndexedChunk = Omit<ChunkRecord, 'embedding'>;

export interface SearchFilters {
  author?: string;
  region?: string;
  documentId?: string;
  language?: LanguageFamily;
  /** Inclusive lower bound, YYYY-MM-DD */
  dateFrom?: string;
  /** Inclusive upper bound, YYYY-MM-DD */
  dateTo?: string;
}

export interface SearchHit {
  chunk: IndexedChunk;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}

export interface DocumentSummary extends DocumentMetadata {
  chunkCount: number;
}

export const UNIQUE_ATTRIBUTES = ['author', 'region', 'date', 'language', 'documentId'] as const;
export type UniqueAttribute = (typeof UNIQUE_ATTRIBUTES)[number];

export interface ValueCount {
  value: string | null;
  /** Number of chunks carrying the value */
  count: number;
}

/**
 * Storage backend. `replaceDocument` must swap a document's chunk set in one
 * step as seen by `search`. Unreachable storage surfaces as
 * IndexUnavailableError.
 */
export interface VectorStore {
  readonly name: string;
  init(): Promise<void>;
  replaceDocument(documentId: string, records: readonly ChunkRecord[]): Promise<void>;
  /** Returns the number of chunks removed */
  deleteDocument(documentId: string): Promise<number>;
  search(vector: readonly number[], filters: SearchFilters, limit: number): Promise<SearchHit[]>;
  listDocuments(): Promise<DocumentSummary[]>;
  count(): Promise<number>;
  uniqueValues(attribute: UniqueAttribute): Promise<ValueCount[]>;
  clear(): Promise<void>;
  close(): Promise<void>;
}
