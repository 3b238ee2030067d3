import { INDEX_RETRY_ATTEMPTS, INDEX_RETRY_BASE_MS, MAX_TOP_K } from '../../config/constants';
import {
  BadRequestError,
  ExternalServiceError,
  IndexUnavailableError,
  OperationCancelledError,
} from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';
import type { EmbeddingProvider } from '../embeddings/provider.interface';
import type { RerankerProvider } from '../reranker/provider.interface';
import type { VectorIndex } from '../vectorIndex/vectorIndex';
import type { SearchFilters, SearchHit } from '../vectorIndex/vectorIndex.types';
import type { Evidence, RetrievalResult, RetrieverOptions } from './retriever.types';

/**
 * Positive integers pass through (capped); anything else means "use the default".
 */
export function normalizeTopK(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    return fallback;
  }
  return Math.min(value, MAX_TOP_K);
}

export class Retriever {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly reranker: RerankerProvider | null,
    private readonly options: RetrieverOptions
  ) {}

  async retrieve(
    query: string,
    filters: SearchFilters = {},
    topK?: number,
    signal?: AbortSignal
  ): Promise<RetrievalResult> {
    const text = query.trim();
    if (!text) {
      throw new BadRequestError('Query must not be empty', 'EMPTY_QUERY');
    }

    const k = normalizeTopK(topK, this.options.topKDefault);
    const candidateCount = this.reranker
      ? k * Math.max(1, Math.ceil(this.options.overfetchFactor))
      : k;

    const queryVector = await this.embedder.embed(text, signal);
    const hits = await withRetry(
      'index.search',
      () => this.index.search(queryVector, filters, candidateCount, signal),
      {
        maxAttempts: INDEX_RETRY_ATTEMPTS,
        baseDelayMs: INDEX_RETRY_BASE_MS,
        signal,
        shouldRetry: (error) => error instanceof IndexUnavailableError,
      }
    );

    const { evidence, reranked } = await this.rerank(text, hits, signal);

    logger.info(
      { topK: k, candidates: hits.length, returned: Math.min(k, evidence.length), reranked },
      'Retrieval complete'
    );

    return { query: text, filters, topK: k, reranked, evidence: evidence.slice(0, k) };
  }

  /**
   * Order candidates by cross-encoder score. Ties keep vector order. Any
   * reranker failure other than cancellation falls back to vector order.
   */
  private async rerank(
    query: string,
    hits: SearchHit[],
    signal?: AbortSignal
  ): Promise<{ evidence: Evidence[]; reranked: boolean }> {
    const vectorOrder: Evidence[] = hits.map((hit) => ({ chunk: hit.chunk, similarity: hit.similarity }));
    if (!this.reranker || hits.length === 0) {
      return { evidence: vectorOrder, reranked: false };
    }

    try {
      const scores = await this.reranker.score(
        query,
        hits.map((hit) => hit.chunk.text),
        signal
      );
      if (scores.length !== hits.length) {
        throw new ExternalServiceError(
          'reranker',
          `Expected ${hits.length} scores, got ${scores.length}`
        );
      }
      const evidence = vectorOrder
        .map((item, position) => ({ item: { ...item, rerankScore: scores[position] }, position }))
        .sort((a, b) => b.item.rerankScore - a.item.rerankScore || a.position - b.position)
        .map(({ item }) => item);
      return { evidence, reranked: true };
    } catch (error) {
      if (error instanceof OperationCancelledError || signal?.aborted) {
        throw error;
      }
      logger.warn(
        { reranker: this.reranker.name, error: errorMessage(error) },
        'Reranker failed, keeping vector order'
      );
      return { evidence: vectorOrder, reranked: false };
    }
  }
}
