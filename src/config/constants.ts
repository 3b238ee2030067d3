// Chunking
/** Upper bound on double-pass merge sweeps; adjacent merges either settle or stop here. */
export const MAX_MERGE_PASSES = 2;
/** Tolerance when comparing cosine similarity against the configured threshold. */
export const SIMILARITY_EPSILON = 1e-9;

// Retrieval
export const MAX_TOP_K = 100;
/** Cap on candidates one search may return, overfetch included. */
export const MAX_SEARCH_LIMIT = 1000;
export const INDEX_RETRY_ATTEMPTS = 3;
export const INDEX_RETRY_BASE_MS = 200;

// Embeddings
export const EMBEDDING_BATCH_SIZE = 100;

// Documents
export const MAX_DOCUMENT_BYTES = 200 * 1024 * 1024;
export const PDF_MAGIC = '%PDF-';
