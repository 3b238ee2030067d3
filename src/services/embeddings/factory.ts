import type { Env } from '../../config/env';
import { isKnownEmbeddingModel } from '../../config/models';
import { logger } from '../../utils/logger';
import { CachedEmbeddingProvider, type EmbeddingCacheStore } from './cache';
import type { EmbeddingProvider } from './provider.interface';
import { OpenAIEmbeddingProvider } from './providers/openai.provider';

export function createEmbeddingProvider(
  config: Env,
  cacheStore?: EmbeddingCacheStore
): EmbeddingProvider {
  if (!isKnownEmbeddingModel(config.EMBEDDING_MODEL)) {
    logger.warn({ model: config.EMBEDDING_MODEL }, 'Unknown embedding model, using as given');
  }

  let provider: EmbeddingProvider;
  switch (config.EMBEDDING_PROVIDER) {
    case 'openai':
    default:
      provider = new OpenAIEmbeddingProvider({
        apiKey: config.OPENAI_API_KEY,
        model: config.EMBEDDING_MODEL,
        dimensions: config.EMBEDDING_DIMENSIONS,
        timeoutMs: config.MODEL_TIMEOUT_MS,
        maxAttempts: config.MODEL_MAX_ATTEMPTS,
        retryBaseMs: config.MODEL_RETRY_BASE_MS,
      });
  }

  return cacheStore
    ? new CachedEmbeddingProvider(provider, cacheStore, config.EMBEDDING_CACHE_TTL)
    : provider;
}
