import { describe, expect, test } from 'vitest';
import {
  CharEstimateTokenizer,
  SemanticChunker,
  chunkId,
  hardSplit,
  isCoherent,
  joinPieces,
} from '../../services/chunker';
import type { Segment } from '../../services/parser/parser.types';
import { ChunkingError } from '../../utils/errors';
import { FakeEmbeddingProvider, WordTokenizer } from '../helpers/fakes';

function words(word: string, count: number): string {
  return Array.from({ length: count }, () => word).join(' ');
}

function segment(text: string, order: number, page = 1): Segment {
  return { text, page, order };
}

// 15 characters, 4 tokens at 4 characters per token
const zhSentence = '气候政策非常重要我们支持碳税。';

const topics = {
  alpha: [1, 0, 0],
  gamma: [0, 1, 0],
};

describe('SemanticChunker', () => {
  test('keeps similar segments together and splits off a dissimilar one', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 1000,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    const drafts = await chunker.chunk([
      segment(words('alpha', 600), 0, 1),
      segment(words('alpha', 50), 1, 2),
      segment(words('gamma', 700), 2, 3),
    ]);

    expect(drafts).toHaveLength(2);
    expect(drafts[0].tokenCount).toBe(650);
    expect(drafts[0].text).toBe(`${words('alpha', 600)}\n\n${words('alpha', 50)}`);
    expect(drafts[0].pageStart).toBe(1);
    expect(drafts[0].pageEnd).toBe(2);
    expect(drafts[1].tokenCount).toBe(700);
    expect(drafts[1].pageStart).toBe(3);
    expect(drafts.map((draft) => draft.ordinal)).toEqual([0, 1]);
  });

  test('splits on dissimilarity even when the budget allows joining', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    const drafts = await chunker.chunk([segment(words('alpha', 10), 0), segment(words('gamma', 10), 1)]);

    expect(drafts.map((draft) => draft.text)).toEqual([words('alpha', 10), words('gamma', 10)]);
  });

  test('threshold of zero joins by budget alone', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0,
      doublePassMerge: false,
    });

    const drafts = await chunker.chunk([segment(words('alpha', 10), 0), segment(words('gamma', 10), 1)]);

    expect(drafts).toHaveLength(1);
    expect(drafts[0].tokenCount).toBe(20);
  });

  test('double-pass merge joins neighbours whose centroids agree', async () => {
    const embedder = new FakeEmbeddingProvider({
      apple: [1, 0, 0],
      banana: [0.7, 0.7, 0],
      cherry: [1, 0.2, 0],
    });
    const segments = [
      segment(words('apple', 10), 0),
      segment(words('banana', 10), 1),
      segment(words('cherry', 10), 2),
    ];
    const options = { tokenBudget: 100, similarityThreshold: 0.75 };

    const single = await new SemanticChunker(embedder, new WordTokenizer(), {
      ...options,
      doublePassMerge: false,
    }).chunk(segments);
    const merged = await new SemanticChunker(embedder, new WordTokenizer(), {
      ...options,
      doublePassMerge: true,
    }).chunk(segments);

    expect(single).toHaveLength(2);
    expect(single[1].text).toBe(`${words('banana', 10)}\n\n${words('cherry', 10)}`);
    expect(merged).toHaveLength(1);
    expect(merged[0].tokenCount).toBe(30);
  });

  test('never emits a chunk over budget', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 8,
      similarityThreshold: 0,
      doublePassMerge: true,
    });
    const text = 'Alpha one two three. Alpha four five six seven. Alpha eight nine.';

    const drafts = await chunker.chunk([segment(text, 0), segment('alpha tail words here', 1)]);

    for (const draft of drafts) {
      expect(draft.tokenCount).toBeLessThanOrEqual(8);
    }
    expect(drafts.map((draft) => draft.text).join(' ').split(/\s+/)).toHaveLength(16);
  });

  test('orders by segment order, not input order', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0.75,
      doublePassMerge: false,
    });

    const drafts = await chunker.chunk([segment('alpha second', 1), segment('alpha first', 0)]);

    expect(drafts[0].text).toBe('alpha first\n\nalpha second');
  });

  test('returns no chunks for blank input without calling the embedder', async () => {
    const embedder = new FakeEmbeddingProvider(topics);
    const chunker = new SemanticChunker(embedder, new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    expect(await chunker.chunk([])).toEqual([]);
    expect(await chunker.chunk([segment('   ', 0)])).toEqual([]);
    expect(embedder.batchCalls).toHaveLength(0);
  });

  test('embeds all pieces in one batch', async () => {
    const embedder = new FakeEmbeddingProvider(topics);
    const chunker = new SemanticChunker(embedder, new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    await chunker.chunk([segment('alpha a', 0), segment('gamma b', 1), segment('alpha c', 2)]);

    expect(embedder.batchCalls).toEqual([['alpha a', 'gamma b', 'alpha c']]);
  });

  test('rejects an invalid token budget', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 0,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    await expect(chunker.chunk([segment('alpha', 0)])).rejects.toBeInstanceOf(ChunkingError);
  });

  test('per-call options override the defaults', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(topics), new WordTokenizer(), {
      tokenBudget: 100,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });

    const drafts = await chunker.chunk([segment('alpha one two', 0), segment('alpha three four', 1)], {
      tokenBudget: 3,
    });

    expect(drafts.map((draft) => draft.text)).toEqual(['alpha one two', 'alpha three four']);
  });
});

describe('SemanticChunker on unspaced scripts', () => {
  test('splits an oversized Chinese segment at full-width sentence stops', async () => {
    const chunker = new SemanticChunker(new FakeEmbeddingProvider(), new CharEstimateTokenizer(4), {
      tokenBudget: 50,
      similarityThreshold: 0.75,
      doublePassMerge: true,
    });
    const text = zhSentence.repeat(40);

    const drafts = await chunker.chunk([segment(text, 0)]);

    expect(drafts.map((draft) => draft.text)).toEqual([
      zhSentence.repeat(13),
      zhSentence.repeat(13),
      zhSentence.repeat(13),
      zhSentence,
    ]);
    expect(drafts.map((draft) => draft.tokenCount)).toEqual([49, 49, 49, 4]);
  });
});

describe('hardSplit', () => {
  test('cuts at the last sentence boundary that fits', () => {
    const pieces = hardSplit('One two three. Four five six seven. Eight.', 5, new WordTokenizer());

    expect(pieces).toEqual(['One two three.', 'Four five six seven. Eight.']);
  });

  test('falls back to clauses, then words', () => {
    const pieces = hardSplit('red green, blue yellow purple orange', 3, new WordTokenizer());

    expect(pieces).toEqual(['red green,', 'blue yellow purple', 'orange']);
  });

  test('joins Chinese sentences without inserting spaces', () => {
    const pieces = hardSplit(zhSentence.repeat(40), 10, new CharEstimateTokenizer(4));

    expect(pieces).toHaveLength(20);
    expect(pieces.every((piece) => piece === zhSentence.repeat(2))).toBe(true);
  });

  test('splits full-width clauses', () => {
    const pieces = hardSplit('第一部分，第二部分；第三部分', 6, new CharEstimateTokenizer(1));

    expect(pieces).toEqual(['第一部分，', '第二部分；', '第三部分']);
  });

  test('cuts an unpunctuated Chinese run by character', () => {
    const text = '气候政策非常重要我们支持碳税'.repeat(3);

    const pieces = hardSplit(text, 4, new CharEstimateTokenizer(4));

    expect(pieces.map((piece) => piece.length)).toEqual([16, 16, 10]);
    expect(pieces.join('')).toBe(text);
  });

  test('throws when a single word exceeds the budget', () => {
    expect(() => hardSplit('abcdefghij', 5, new CharEstimateTokenizer(1))).toThrow(ChunkingError);
  });
});

describe('helpers', () => {
  test('chunkId is stable and distinct per ordinal', () => {
    expect(chunkId('report.pdf', 0)).toBe(chunkId('report.pdf', 0));
    expect(chunkId('report.pdf', 0)).not.toBe(chunkId('report.pdf', 1));
    expect(chunkId('report.pdf', 0)).toMatch(/^[0-9a-f]{32}$/);
  });

  test('joinPieces separates segments with a blank line', () => {
    const piece = (text: string, segmentOrder: number) => ({
      text,
      tokenCount: 1,
      page: 1,
      segmentOrder,
      embedding: [1, 0, 0],
    });

    expect(joinPieces([piece('a', 0), piece('b', 0), piece('c', 1)])).toBe('a b\n\nc');
  });

  test('isCoherent accepts similarity exactly at the threshold', () => {
    expect(isCoherent([1, 0], [1, 0], 1)).toBe(true);
    expect(isCoherent([1, 0], [0, 1], 0.5)).toBe(false);
    expect(isCoherent([1, 0], [0, 1], 0)).toBe(true);
  });

  test('CharEstimateTokenizer rounds up', () => {
    expect(new CharEstimateTokenizer(4).count('abcde')).toBe(2);
    expect(() => new CharEstimateTokenizer(0)).toThrow(RangeError);
  });
});
