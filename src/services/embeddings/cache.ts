import { z } from 'zod';
import { errorMessage, logger } from '../../utils/logger';
import type { RedisService } from '../redis';
import { computeContentHash } from '../sentences';
import type { EmbeddingProvider } from './provider.interface';

/** Key-value store for serialized vectors. */
export interface EmbeddingCacheStore {
  getMany(keys: string[]): Promise<Array<string | null>>;
  setMany(entries: Array<[string, string]>, ttlSeconds: number): Promise<void>;
}

export class RedisEmbeddingCacheStore implements EmbeddingCacheStore {
  constructor(private readonly redis: RedisService) {}

  getMany(keys: string[]): Promise<Array<string | null>> {
    return this.redis.mget(keys);
  }

  setMany(entries: Array<[string, string]>, ttlSeconds: number): Promise<void> {
    return this.redis.msetWithTtl(entries, ttlSeconds);
  }
}

const vectorSchema = z.array(z.number());

function parseVector(raw: string, dimensions: number): number[] | null {
  try {
    const parsed = vectorSchema.safeParse(JSON.parse(raw));
    return parsed.success && parsed.data.length === dimensions ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Embedding provider decorator that looks vectors up by content hash before
 * calling the wrapped provider. Cache failures fall through to the provider.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly store: EmbeddingCacheStore,
    private readonly ttlSeconds: number
  ) {
    this.name = `cached:${inner.name}`;
    this.model = inner.model;
    this.dimensions = inner.dimensions;
  }

  key(text: string): string {
    return `emb:${this.model}:${this.dimensions}:${computeContentHash(text)}`;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const keys = texts.map((text) => this.key(text));
    const cached = await this.lookup(keys);
    const results: Array<number[] | null> = cached;

    const missing = texts
      .map((text, index) => ({ text, index }))
      .filter(({ index }) => results[index] === null);

    if (missing.length > 0) {
      // Duplicate texts in one batch are embedded once
      const uniqueTexts = [...new Set(missing.map((m) => m.text))];
      const fresh = await this.inner.embedBatch(uniqueTexts, signal);
      const byText = new Map(uniqueTexts.map((text, i) => [text, fresh[i]]));
      for (const { text, index } of missing) {
        results[index] = byText.get(text) ?? null;
      }
      await this.save(uniqueTexts.map((text, i) => [this.key(text), JSON.stringify(fresh[i])]));
    }

    logger.debug(
      { provider: this.name, requested: texts.length, hits: texts.length - missing.length },
      'Embedding cache lookup'
    );

    return results.map((vector, index) => {
      if (!vector) {
        throw new Error(`Missing embedding for input ${index}`);
      }
      return vector;
    });
  }

  private async lookup(keys: string[]): Promise<Array<number[] | null>> {
    try {
      const raw = await this.store.getMany(keys);
      return keys.map((_, i) => {
        const value = raw[i];
        return value ? parseVector(value, this.dimensions) : null;
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to read embedding cache');
      return keys.map(() => null);
    }
  }

  private async save(entries: Array<[string, string]>): Promise<void> {
    try {
      await this.store.setMany(entries, this.ttlSeconds);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to write embedding cache');
    }
  }
}
