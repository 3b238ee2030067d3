export { createEmbeddingProvider } from './factory';
export { CachedEmbeddingProvider, RedisEmbeddingCacheStore } from './cache';
export type { EmbeddingCacheStore } from './cache';
export { OpenAIEmbeddingProvider } from './providers/openai.provider';
export { cosineSimilarity, weightedCentroid } from './similarity';
export type { EmbeddingProvider } from './provider.interface';
