import type { Env } from '../../config/env';
import { logger } from '../../utils/logger';
import type { RerankerProvider } from './provider.interface';
import { HttpRerankerProvider } from './providers/http.provider';

/**
 * Reranker from config, or null when no endpoint is configured (retrieval
 * then keeps vector order).
 */
export function createReranker(config: Env): RerankerProvider | null {
  if (!config.RERANKER_URL) {
    logger.warn('RERANKER_URL not configured. Results will keep vector order.');
    return null;
  }

  return new HttpRerankerProvider({
    baseUrl: config.RERANKER_URL,
    model: config.RERANKER_MODEL,
    timeoutMs: config.MODEL_TIMEOUT_MS,
    maxAttempts: config.MODEL_MAX_ATTEMPTS,
    retryBaseMs: config.MODEL_RETRY_BASE_MS,
  });
}
