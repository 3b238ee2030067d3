import { parseEnv, type Env } from '../../config/env';
import { chunkId } from '../../services/chunker';
import type { PositionedText, ReadablePage } from '../../services/parser/parser.types';
import type { Evidence } from '../../services/retriever/retriever.types';
import type { ChunkRecord } from '../../services/vectorIndex/vectorIndex.types';

export function testConfig(overrides: Record<string, string> = {}): Env {
  return parseEnv({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    EMBEDDING_DIMENSIONS: '3',
    VECTOR_STORE: 'memory',
    COLLECTION_NAME: 'test_collection',
    CHUNK_TOKEN_BUDGET: '50',
    CHUNK_SIMILARITY_THRESHOLD: '0.75',
    MODEL_MAX_ATTEMPTS: '1',
    MODEL_RETRY_BASE_MS: '1',
    ...overrides,
  });
}

export function makeChunk(overrides: Partial<ChunkRecord> = {}): ChunkRecord {
  const documentId = overrides.documentId ?? 'report.pdf';
  const ordinal = overrides.ordinal ?? 0;
  return {
    id: chunkId(documentId, ordinal),
    documentId,
    ordinal,
    text: `Chunk ${ordinal} of ${documentId}`,
    tokenCount: 10,
    pageStart: 1,
    pageEnd: 1,
    embedding: [1, 0, 0],
    author: 'Acme Energy',
    region: 'EU',
    date: '2024-03-01',
    language: 'latin-based',
    sizeMb: 0.5,
    uploadTime: '2024-03-02T10:00:00.000Z',
    contentHash: 'hash-report',
    ...overrides,
  };
}

let evidenceOrdinal = 0;

export function evidenceOf(text: string, tokenCount = 10): Evidence {
  const { embedding: _embedding, ...chunk } = makeChunk({ ordinal: evidenceOrdinal++, text, tokenCount });
  return { chunk, similarity: 0.9 };
}

/** Bytes that pass the PDF header check. The body is free text for fakes to read. */
export function pdfBytes(body = 'test document'): Uint8Array {
  return new TextEncoder().encode(`%PDF-1.7\n${body}`);
}

export function textItem(text: string, x: number, y: number, overrides: Partial<PositionedText> = {}): PositionedText {
  return {
    text,
    x,
    y,
    width: text.length * 5,
    height: 10,
    hasEOL: false,
    ...overrides,
  };
}

export function page(pageNumber: number, items: PositionedText[]): ReadablePage {
  return { pageNumber, width: 600, height: 800, items };
}

/** One line per string, 14 units apart, top down. */
export function linesPage(pageNumber: number, lines: string[]): ReadablePage {
  return page(
    pageNumber,
    lines.map((line, i) => textItem(line, 50, 700 - i * 14, { hasEOL: true }))
  );
}
