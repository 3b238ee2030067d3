export { SemanticChunker, chunkId, hardSplit, isCoherent, joinPieces } from './chunker';
export { CharEstimateTokenizer } from './tokenizer';
export type { ChunkDraft, ChunkOptions, ChunkPiece, Tokenizer } from './chunker.types';
