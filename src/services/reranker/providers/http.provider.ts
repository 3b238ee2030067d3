import { z } from 'zod';
import { ExternalServiceError } from '../../../utils/errors';
import { withRetry } from '../../../utils/retry';
import type { RerankerProvider } from '../provider.interface';

export interface HttpRerankerConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
}

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  })
);

/**
 * Client for a text-embeddings-inference style rerank endpoint:
 * `POST {baseUrl}/rerank {query, texts}` answers `[{index, score}]`.
 */
export class HttpRerankerProvider implements RerankerProvider {
  readonly name = 'http';
  private readonly baseUrl: string;

  constructor(private readonly config: HttpRerankerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async score(query: string, candidates: string[], signal?: AbortSignal): Promise<number[]> {
    if (candidates.length === 0) return [];

    const results = await withRetry(
      'reranker.score',
      (attemptSignal) => this.request(query, candidates, attemptSignal),
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseMs,
        timeoutMs: this.config.timeoutMs,
        signal,
      }
    );

    const scores = new Array<number | undefined>(candidates.length).fill(undefined);
    for (const result of results) {
      if (result.index >= candidates.length) {
        throw new ExternalServiceError('reranker', `Result index ${result.index} out of range`);
      }
      scores[result.index] = result.score;
    }

    return scores.map((score, index) => {
      if (score === undefined) {
        throw new ExternalServiceError('reranker', `No score returned for candidate ${index}`);
      }
      return score;
    });
  }

  private async request(
    query: string,
    texts: string[],
    signal: AbortSignal
  ): Promise<z.infer<typeof rerankResponseSchema>> {
    const response = await fetch(`${this.baseUrl}/rerank`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.config.model, query, texts, truncate: true }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ExternalServiceError('reranker', `HTTP ${response.status} ${errorText}`);
    }

    const parsed = rerankResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError('reranker', `Malformed response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
