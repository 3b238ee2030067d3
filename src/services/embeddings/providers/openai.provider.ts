import OpenAI from 'openai';
import { EMBEDDING_BATCH_SIZE } from '../../../config/constants';
import { ExternalServiceError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import { withRetry } from '../../../utils/retry';
import type { EmbeddingProvider } from '../provider.interface';

export interface OpenAIEmbeddingConfig {
  apiKey?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  readonly dimensions: number;
  private client: OpenAI | null;

  constructor(private readonly config: OpenAIEmbeddingConfig) {
    this.model = config.model;
    this.dimensions = config.dimensions;
    // Retries are ours, so the SDK's own are off
    this.client = config.apiKey ? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }) : null;
    if (!this.client) {
      logger.warn('OPENAI_API_KEY not configured');
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE);
      embeddings.push(...(await this.request(batch, signal)));
    }
    return embeddings;
  }

  private async request(input: string[], signal?: AbortSignal): Promise<number[][]> {
    const client = this.client;
    if (!client) {
      throw new ExternalServiceError('openai', 'OpenAI client not configured');
    }

    const response = await withRetry(
      'openai.embeddings',
      (attemptSignal) =>
        client.embeddings.create(
          { model: this.model, input, dimensions: this.dimensions },
          { signal: attemptSignal }
        ),
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseMs,
        timeoutMs: this.config.timeoutMs,
        signal,
      }
    );

    if (response.data.length !== input.length) {
      throw new ExternalServiceError(
        'openai',
        `Expected ${input.length} embeddings, got ${response.data.length}`
      );
    }

    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
