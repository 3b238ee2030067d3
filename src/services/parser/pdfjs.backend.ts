import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { mapWithConcurrency } from '../../lib/semaphore';
import { OperationCancelledError, ParseError } from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/retry';
import type {
  BackendOptions,
  ExtractedPage,
  PdfTextBackend,
  PositionedText,
} from './parser.types';

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

function toPositionedText(item: TextItem): PositionedText {
  const [, , c, d, e, f] = item.transform.map(Number);
  // Font height from the text matrix; item.height is 0 for some fonts
  const fontHeight = Math.hypot(c ?? 0, d ?? 0) || item.height;
  return {
    text: item.str,
    x: e ?? 0,
    y: f ?? 0,
    width: item.width,
    height: fontHeight,
    hasEOL: item.hasEOL,
  };
}

/** The parts of a pdf.js page that text extraction touches. */
export interface TextPage {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<{ items: Array<TextItem | TextMarkedContent> }>;
  cleanup(): unknown;
}

export interface PageSource {
  getPage(pageNumber: number): Promise<TextPage>;
}

/**
 * Read one page's positioned text. The page is released whether or not
 * extraction succeeds.
 */
export async function readPage(pdf: PageSource, pageNumber: number): Promise<ExtractedPage> {
  const page = await pdf.getPage(pageNumber);
  try {
    const viewport = page.getViewport({ scale: 1 });
    const content = await page.getTextContent();
    return {
      pageNumber,
      width: viewport.width,
      height: viewport.height,
      items: content.items.filter(isTextItem).map(toPositionedText),
    };
  } finally {
    page.cleanup();
  }
}

/**
 * Text extraction with pdf.js (legacy build, which runs on Node without a DOM).
 * Pages are read independently; a page that throws is reported, not fatal.
 */
export class PdfJsBackend implements PdfTextBackend {
  readonly name = 'pdfjs';

  async extract(
    bytes: Uint8Array,
    options: BackendOptions,
    signal?: AbortSignal
  ): Promise<ExtractedPage[]> {
    throwIfAborted(signal);
    if (options.device === 'gpu') {
      logger.debug({ backend: this.name }, 'GPU requested; pdf.js extracts on the CPU');
    }

    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    // pdf.js transfers the buffer it is given, so hand it a copy
    const loadingTask = pdfjs.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
      verbosity: 0,
    });

    const onAbort = () => {
      loadingTask.destroy().catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, 'Failed to destroy PDF loading task');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const pdf = await loadingTask.promise.catch((error: unknown) => {
        throw toParseError(error, signal);
      });

      const pageNumbers = Array.from({ length: pdf.numPages }, (_, i) => i + 1);
      return await mapWithConcurrency(
        pageNumbers,
        options.threadCount,
        async (pageNumber): Promise<ExtractedPage> => {
          throwIfAborted(signal);
          try {
            return await readPage(pdf, pageNumber);
          } catch (error) {
            if (signal?.aborted) throw new OperationCancelledError();
            logger.warn({ pageNumber, error: errorMessage(error) }, 'Failed to extract page text');
            return { pageNumber, error: errorMessage(error) };
          }
        },
        signal
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await loadingTask.destroy();
    }
  }
}

function toParseError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) return new OperationCancelledError();

  const name = error instanceof Error ? error.name : '';
  if (name === 'PasswordException') {
    return new ParseError('Document is password protected', 'encrypted', { cause: error });
  }
  return new ParseError(`Document could not be read: ${errorMessage(error)}`, 'corrupt', {
    cause: error,
  });
}
