import { beforeEach, describe, expect, test } from 'vitest';
import { MemoryVectorStore } from '../../services/vectorIndex/memory.store';
import { DuplicateInsertError } from '../../utils/errors';
import { makeChunk } from '../helpers/factories';

describe('MemoryVectorStore', () => {
  let store: MemoryVectorStore;

  beforeEach(() => {
    store = new MemoryVectorStore();
  });

  test('replaceDocument swaps the whole chunk set', async () => {
    await store.replaceDocument('a.pdf', [
      makeChunk({ documentId: 'a.pdf', ordinal: 0 }),
      makeChunk({ documentId: 'a.pdf', ordinal: 1 }),
    ]);
    await store.replaceDocument('a.pdf', [makeChunk({ documentId: 'a.pdf', ordinal: 0, text: 'new' })]);

    expect(await store.count()).toBe(1);
    const [hit] = await store.search([1, 0, 0], {}, 10);
    expect(hit.chunk.text).toBe('new');
  });

  test('an empty replacement removes the document', async () => {
    await store.replaceDocument('a.pdf', [makeChunk({ documentId: 'a.pdf' })]);
    await store.replaceDocument('a.pdf', []);

    expect(await store.listDocuments()).toEqual([]);
  });

  test('overlapping writes for one document are rejected', async () => {
    const records = [makeChunk({ documentId: 'a.pdf' })];
    const first = store.replaceDocument('a.pdf', records);
    const second = store.replaceDocument('a.pdf', records);

    await expect(second).rejects.toBeInstanceOf(DuplicateInsertError);
    await first;
    expect(await store.count()).toBe(1);
  });

  test('search never returns embeddings and respects the limit', async () => {
    await store.replaceDocument('a.pdf', [
      makeChunk({ documentId: 'a.pdf', ordinal: 0 }),
      makeChunk({ documentId: 'a.pdf', ordinal: 1 }),
      makeChunk({ documentId: 'a.pdf', ordinal: 2 }),
    ]);

    const hits = await store.search([1, 0, 0], {}, 2);

    expect(hits).toHaveLength(2);
    expect('embedding' in hits[0].chunk).toBe(false);
  });

  test('stored records are isolated from caller mutation', async () => {
    const record = makeChunk({ documentId: 'a.pdf', embedding: [1, 0, 0] });
    await store.replaceDocument('a.pdf', [record]);
    record.embedding[0] = 0;
    record.embedding[1] = 1;

    const [hit] = await store.search([1, 0, 0], {}, 1);
    expect(hit.similarity).toBe(1);
  });

  test('deleteDocument reports how many chunks went', async () => {
    await store.replaceDocument('a.pdf', [
      makeChunk({ documentId: 'a.pdf', ordinal: 0 }),
      makeChunk({ documentId: 'a.pdf', ordinal: 1 }),
    ]);

    expect(await store.deleteDocument('a.pdf')).toBe(2);
    expect(await store.deleteDocument('a.pdf')).toBe(0);
  });

  test('listDocuments summarises each document', async () => {
    await store.replaceDocument('b.pdf', [makeChunk({ documentId: 'b.pdf', author: 'Beta Corp' })]);
    await store.replaceDocument('a.pdf', [
      makeChunk({ documentId: 'a.pdf', ordinal: 0 }),
      makeChunk({ documentId: 'a.pdf', ordinal: 1 }),
    ]);

    const documents = await store.listDocuments();

    expect(documents.map((doc) => [doc.documentId, doc.author, doc.chunkCount])).toEqual([
      ['a.pdf', 'Acme Energy', 2],
      ['b.pdf', 'Beta Corp', 1],
    ]);
  });

  test('uniqueValues counts chunks per value, most common first', async () => {
    await store.replaceDocument('a.pdf', [
      makeChunk({ documentId: 'a.pdf', ordinal: 0, region: 'EU' }),
      makeChunk({ documentId: 'a.pdf', ordinal: 1, region: 'EU' }),
    ]);
    await store.replaceDocument('b.pdf', [makeChunk({ documentId: 'b.pdf', region: null })]);
    await store.replaceDocument('c.pdf', [makeChunk({ documentId: 'c.pdf', region: 'APAC' })]);

    expect(await store.uniqueValues('region')).toEqual([
      { value: 'EU', count: 2 },
      { value: 'APAC', count: 1 },
      { value: null, count: 1 },
    ]);
  });

  test('clear empties the collection', async () => {
    await store.replaceDocument('a.pdf', [makeChunk({ documentId: 'a.pdf' })]);
    await store.clear();

    expect(await store.count()).toBe(0);
  });
});
