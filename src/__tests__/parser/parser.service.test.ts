import { describe, expect, test } from 'vitest';
import { DocumentParser, hasPdfHeader } from '../../services/parser';
import { ParseError } from '../../utils/errors';
import { linesPage, pdfBytes } from '../helpers/factories';
import { FakePdfBackend } from '../helpers/fakes';

const defaults = { strategy: 'layout' as const, device: 'cpu' as const, threadCount: 2 };

async function parseFailure(parser: DocumentParser, bytes: Uint8Array): Promise<ParseError> {
  try {
    await parser.parse(bytes);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('Expected parse to fail');
}

describe('DocumentParser', () => {
  test('parses readable pages and reports failed ones', async () => {
    const backend = new FakePdfBackend([
      linesPage(1, ['Carbon pricing policy']),
      { pageNumber: 2, error: 'bad content stream' },
      linesPage(3, ['Implementation timeline']),
    ]);
    const parser = new DocumentParser(backend, defaults);

    const parsed = await parser.parse(pdfBytes());

    expect(parsed.segments.map((segment) => [segment.text, segment.page, segment.order])).toEqual([
      ['Carbon pricing policy', 1, 0],
      ['Implementation timeline', 3, 1],
    ]);
    expect(parsed.pageCount).toBe(3);
    expect(parsed.failedPages).toEqual([2]);
    expect(parsed.strategy).toBe('layout');
    expect(parsed.language).toBe('latin-based');
  });

  test('uses the plain strategy when asked', async () => {
    const parser = new DocumentParser(new FakePdfBackend([linesPage(1, ['Only line'])]), defaults);

    const parsed = await parser.parse(pdfBytes(), { strategy: 'plain' });

    expect(parsed.strategy).toBe('plain');
    expect(parsed.segments).toEqual([{ text: 'Only line', page: 1, order: 0 }]);
  });

  test('detects the document language', async () => {
    const parser = new DocumentParser(
      new FakePdfBackend([linesPage(1, ['Политика в области климата'])]),
      defaults
    );

    expect((await parser.parse(pdfBytes())).language).toBe('cyrillic-based');
  });

  test('rejects bytes without a PDF header', async () => {
    const backend = new FakePdfBackend([linesPage(1, ['text'])]);
    const error = await parseFailure(
      new DocumentParser(backend, defaults),
      new TextEncoder().encode('plain text file')
    );

    expect(error.reason).toBe('unsupported_format');
    expect(backend.calls).toBe(0);
  });

  test('fails as corrupt when every page fails', async () => {
    const parser = new DocumentParser(
      new FakePdfBackend([
        { pageNumber: 1, error: 'x' },
        { pageNumber: 2, error: 'y' },
      ]),
      defaults
    );

    expect((await parseFailure(parser, pdfBytes())).reason).toBe('corrupt');
  });

  test('fails as empty when no text comes out', async () => {
    const parser = new DocumentParser(new FakePdfBackend([linesPage(1, ['   '])]), defaults);

    expect((await parseFailure(parser, pdfBytes())).reason).toBe('empty');
  });

  test('honours an aborted signal before extraction', async () => {
    const backend = new FakePdfBackend([linesPage(1, ['text'])]);
    const parser = new DocumentParser(backend, defaults);
    const controller = new AbortController();
    controller.abort();

    await expect(parser.parse(pdfBytes(), {}, controller.signal)).rejects.toMatchObject({
      code: 'CANCELLED',
    });
    expect(backend.calls).toBe(0);
  });
});

describe('hasPdfHeader', () => {
  test('finds the marker within the first KiB', () => {
    const padded = new Uint8Array(1100);
    padded.set(new TextEncoder().encode('%PDF-1.4'), 10);

    expect(hasPdfHeader(padded)).toBe(true);
    expect(hasPdfHeader(new TextEncoder().encode('%PD'))).toBe(false);
  });

  test('ignores a marker past the first KiB', () => {
    const late = new Uint8Array(2048);
    late.set(new TextEncoder().encode('%PDF-1.4'), 1500);

    expect(hasPdfHeader(late)).toBe(false);
  });
});
