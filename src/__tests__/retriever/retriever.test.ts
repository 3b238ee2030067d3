import { beforeEach, describe, expect, test } from 'vitest';
import { INDEX_RETRY_ATTEMPTS, MAX_TOP_K } from '../../config/constants';
import { Retriever, normalizeTopK } from '../../services/retriever';
import { MemoryVectorStore, VectorIndex } from '../../services/vectorIndex';
import type { SearchFilters, SearchHit } from '../../services/vectorIndex';
import {
  BadRequestError,
  ExternalServiceError,
  ExternalServiceTimeout,
  IndexUnavailableError,
  OperationCancelledError,
} from '../../utils/errors';
import { makeChunk } from '../helpers/factories';
import { FakeEmbeddingProvider, FakeReranker } from '../helpers/fakes';

const embedder = new FakeEmbeddingProvider({ carbon: [1, 0, 0] });

/** Store whose searches fail with IndexUnavailableError a set number of times. */
class UnreliableStore extends MemoryVectorStore {
  searchCalls = 0;

  constructor(private failuresLeft: number) {
    super();
  }

  async search(vector: readonly number[], filters: SearchFilters, limit: number): Promise<SearchHit[]> {
    this.searchCalls++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new IndexUnavailableError('connection reset');
    }
    return super.search(vector, filters, limit);
  }
}

async function seededIndex(store: MemoryVectorStore = new MemoryVectorStore()): Promise<VectorIndex> {
  const index = new VectorIndex(store, 3);
  await index.insert([
    makeChunk({ documentId: 'a.pdf', ordinal: 0, text: 'carbon tax design', embedding: [1, 0, 0] }),
    makeChunk({ documentId: 'a.pdf', ordinal: 1, text: 'carbon border levy', embedding: [0.9, 0.1, 0] }),
    makeChunk({ documentId: 'b.pdf', ordinal: 0, text: 'offset markets', embedding: [0.5, 0.5, 0], author: 'Beta Corp' }),
  ]);
  return index;
}

function texts(evidence: Array<{ chunk: { text: string } }>) {
  return evidence.map((item) => item.chunk.text);
}

describe('Retriever', () => {
  let index: VectorIndex;

  beforeEach(async () => {
    index = await seededIndex();
  });

  test('returns every match when fewer exist than requested', async () => {
    const retriever = new Retriever(embedder, index, null, { topKDefault: 5, overfetchFactor: 3 });

    const result = await retriever.retrieve('carbon tax', {}, 5);

    expect(result.evidence).toHaveLength(3);
    expect(result.topK).toBe(5);
    expect(result.reranked).toBe(false);
    expect(texts(result.evidence)).toEqual(['carbon tax design', 'carbon border levy', 'offset markets']);
  });

  test('reorders by reranker score and keeps the vector similarity', async () => {
    const reranker = new FakeReranker((candidate) => (candidate === 'offset markets' ? 0.9 : 0.1));
    const retriever = new Retriever(embedder, index, reranker, { topKDefault: 2, overfetchFactor: 3 });

    const result = await retriever.retrieve('carbon tax');

    expect(result.reranked).toBe(true);
    expect(texts(result.evidence)).toEqual(['offset markets', 'carbon tax design']);
    expect(result.evidence[0].rerankScore).toBe(0.9);
    expect(result.evidence[1].similarity).toBe(1);
    expect(reranker.calls[0].candidates).toHaveLength(3);
  });

  test('equal rerank scores keep vector order', async () => {
    const retriever = new Retriever(embedder, index, new FakeReranker(() => 0.5), {
      topKDefault: 3,
      overfetchFactor: 2,
    });

    const result = await retriever.retrieve('carbon tax');

    expect(texts(result.evidence)).toEqual(['carbon tax design', 'carbon border levy', 'offset markets']);
  });

  test('falls back to vector order when the reranker fails', async () => {
    const reranker = new FakeReranker(() => {
      throw new ExternalServiceError('reranker', 'connection refused');
    });
    const retriever = new Retriever(embedder, index, reranker, { topKDefault: 2, overfetchFactor: 3 });

    const result = await retriever.retrieve('carbon tax');

    expect(result.reranked).toBe(false);
    expect(texts(result.evidence)).toEqual(['carbon tax design', 'carbon border levy']);
    expect(result.evidence[0].rerankScore).toBeUndefined();
  });

  test('keeps vector order when the reranker times out', async () => {
    const reranker = new FakeReranker(() => {
      throw new ExternalServiceTimeout('reranker.score', 1000);
    });
    const retriever = new Retriever(embedder, index, reranker, { topKDefault: 2, overfetchFactor: 3 });

    const result = await retriever.retrieve('carbon tax', {}, 2);

    expect(result.reranked).toBe(false);
    expect(result.topK).toBe(2);
    expect(texts(result.evidence)).toEqual(['carbon tax design', 'carbon border levy']);
  });

  test('passes filters through to the index', async () => {
    const retriever = new Retriever(embedder, index, null, { topKDefault: 5, overfetchFactor: 3 });

    const result = await retriever.retrieve('carbon tax', { author: 'Beta Corp' });

    expect(texts(result.evidence)).toEqual(['offset markets']);
  });

  test('rejects an empty query', async () => {
    const retriever = new Retriever(embedder, index, null, { topKDefault: 5, overfetchFactor: 3 });

    await expect(retriever.retrieve('   ')).rejects.toBeInstanceOf(BadRequestError);
  });

  test('does not swallow cancellation during reranking', async () => {
    const controller = new AbortController();
    const reranker = new FakeReranker(() => {
      controller.abort();
      throw new OperationCancelledError();
    });
    const retriever = new Retriever(embedder, index, reranker, { topKDefault: 2, overfetchFactor: 3 });

    await expect(retriever.retrieve('carbon tax', {}, 2, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });
});

describe('Retriever with an unavailable index', () => {
  test('retries a search that fails once', async () => {
    const store = new UnreliableStore(1);
    const retriever = new Retriever(embedder, await seededIndex(store), null, {
      topKDefault: 5,
      overfetchFactor: 3,
    });

    const result = await retriever.retrieve('carbon tax');

    expect(store.searchCalls).toBe(2);
    expect(texts(result.evidence)).toEqual(['carbon tax design', 'carbon border levy', 'offset markets']);
  });

  test('surfaces the error once retries run out', async () => {
    const store = new UnreliableStore(Number.POSITIVE_INFINITY);
    const retriever = new Retriever(embedder, await seededIndex(store), null, {
      topKDefault: 5,
      overfetchFactor: 3,
    });

    await expect(retriever.retrieve('carbon tax')).rejects.toBeInstanceOf(IndexUnavailableError);
    expect(store.searchCalls).toBe(INDEX_RETRY_ATTEMPTS);
  });
});

describe('normalizeTopK', () => {
  test('falls back for missing or invalid values', () => {
    expect(normalizeTopK(undefined, 5)).toBe(5);
    expect(normalizeTopK(0, 5)).toBe(5);
    expect(normalizeTopK(-3, 5)).toBe(5);
    expect(normalizeTopK(2.5, 5)).toBe(5);
  });

  test('caps large values', () => {
    expect(normalizeTopK(7, 5)).toBe(7);
    expect(normalizeTopK(MAX_TOP_K + 50, 5)).toBe(MAX_TOP_K);
  });
});
