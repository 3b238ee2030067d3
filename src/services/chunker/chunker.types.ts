/**
 * Types for semantic chunking.
 */

export interface Tokenizer {
  count(text: string): number;
}

export interface ChunkOptions {
  /** Maximum tokens per chunk */
  tokenBudget: number;
  /** Minimum cosine similarity for a segment to join the running chunk */
  similarityThreshold: number;
  /** Run the adjacent-pair merge sweep after the greedy walk */
  doublePassMerge: boolean;
}

/** A piece of a segment small enough to fit the budget on its own. */
export interface ChunkPiece {
  text: string;
  tokenCount: number;
  page: number;
  /** Order of the segment the piece came from */
  segmentOrder: number;
  embedding: number[];
}

/** Chunk before it is assigned to a document and embedded for the index. */
export interface ChunkDraft {
  ordinal: number;
  text: string;
  tokenCount: number;
  pageStart: number;
  pageEnd: number;
  /** Token-weighted centroid of the member embeddings */
  centroid: number[];
}
