import type { IndexedChunk, SearchFilters } from '../vectorIndex/vectorIndex.types';

export interface Evidence {
  chunk: IndexedChunk;
  /** Cosine similarity between query and chunk */
  similarity: number;
  /** Cross-encoder score, when reranking ran */
  rerankScore?: number;
}

export interface RetrievalResult {
  query: string;
  filters: SearchFilters;
  topK: number;
  /** False when the reranker was missing or failed and vector order was kept */
  reranked: boolean;
  evidence: Evidence[];
}

export interface RetrieverOptions {
  topKDefault: number;
  overfetchFactor: number;
}
