import type { IndexedChunk, SearchFilters, SearchHit } from './vectorIndex.types';

/**
 * Conjunctive filter match. Date bounds are inclusive; chunks without a date
 * never match a date bound.
 */
export function matchesFilters(chunk: IndexedChunk, filters: SearchFilters): boolean {
  if (filters.author !== undefined && chunk.author !== filters.author) return false;
  if (filters.region !== undefined && chunk.region !== filters.region) return false;
  if (filters.documentId !== undefined && chunk.documentId !== filters.documentId) return false;
  if (filters.language !== undefined && chunk.language !== filters.language) return false;

  if (filters.dateFrom !== undefined || filters.dateTo !== undefined) {
    if (chunk.date === null) return false;
    if (filters.dateFrom !== undefined && chunk.date < filters.dateFrom) return false;
    if (filters.dateTo !== undefined && chunk.date > filters.dateTo) return false;
  }

  return true;
}

/** Drop empty-string filters so they mean "no filter". */
export function normalizeFilters(filters: SearchFilters): SearchFilters {
  const normalized: SearchFilters = {};
  if (filters.author) normalized.author = filters.author;
  if (filters.region) normalized.region = filters.region;
  if (filters.documentId) normalized.documentId = filters.documentId;
  if (filters.language) normalized.language = filters.language;
  if (filters.dateFrom) normalized.dateFrom = filters.dateFrom;
  if (filters.dateTo) normalized.dateTo = filters.dateTo;
  return normalized;
}

/**
 * Similarity descending, then ordinal ascending, then document id ascending.
 */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  if (a.chunk.ordinal !== b.chunk.ordinal) return a.chunk.ordinal - b.chunk.ordinal;
  if (a.chunk.documentId < b.chunk.documentId) return -1;
  if (a.chunk.documentId > b.chunk.documentId) return 1;
  return 0;
}
