export { VectorIndex } from './vectorIndex';
export { MemoryVectorStore } from './memory.store';
export { PostgresVectorStore, isConnectionError } from './postgres.store';
export { compareHits, matchesFilters, normalizeFilters } from './filters';
export { UNIQUE_ATTRIBUTES } from './vectorIndex.types';
export type {
  ChunkRecord,
  DocumentMetadata,
  DocumentSummary,
  IndexedChunk,
  SearchFilters,
  SearchHit,
  UniqueAttribute,
  ValueCount,
  VectorStore,
} from './vectorIndex.types';
