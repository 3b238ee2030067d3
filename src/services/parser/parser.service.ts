import { PDF_MAGIC } from '../../config/constants';
import { ParseError } from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/retry';
import { detectLanguage } from './language';
import { layoutSegments } from './layout';
import {
  isReadablePage,
  type ParsedDocument,
  type ParseOptions,
  type PdfTextBackend,
  type ReadablePage,
  type Segment,
} from './parser.types';
import { plainSegments } from './plain';

/** The header may sit anywhere in the first KiB. */
const HEADER_WINDOW = 1024;

export function hasPdfHeader(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, HEADER_WINDOW)).toString('latin1').includes(PDF_MAGIC);
}

/**
 * Turns PDF bytes into ordered segments. The layout strategy falls back to
 * plain text on any internal failure; a document fails only when no page is
 * readable or no text comes out.
 */
export class DocumentParser {
  constructor(
    private readonly backend: PdfTextBackend,
    private readonly defaults: ParseOptions
  ) {}

  async parse(
    bytes: Uint8Array,
    options: Partial<ParseOptions> = {},
    signal?: AbortSignal
  ): Promise<ParsedDocument> {
    const resolved: ParseOptions = { ...this.defaults, ...options };
    throwIfAborted(signal);

    if (!hasPdfHeader(bytes)) {
      throw new ParseError('Input is not a PDF document', 'unsupported_format');
    }

    const pages = await this.backend.extract(
      bytes,
      { device: resolved.device, threadCount: resolved.threadCount },
      signal
    );
    const readable = pages.filter(isReadablePage);
    const failedPages = pages.filter((page) => !isReadablePage(page)).map((page) => page.pageNumber);

    if (pages.length > 0 && readable.length === 0) {
      throw new ParseError(`All ${pages.length} pages failed to extract`, 'corrupt');
    }

    const { segments, strategy } = this.segment(readable, resolved);
    if (segments.length === 0) {
      throw new ParseError('Document contains no extractable text', 'empty');
    }

    const language = detectLanguage(segments.map((segment) => segment.text).join(' '));

    logger.info(
      {
        backend: this.backend.name,
        strategy,
        pageCount: pages.length,
        failedPages: failedPages.length,
        segments: segments.length,
        language,
      },
      'Document parsed'
    );

    return { segments, pageCount: pages.length, failedPages, strategy, language };
  }

  private segment(
    pages: ReadablePage[],
    options: ParseOptions
  ): { segments: Segment[]; strategy: ParseOptions['strategy'] } {
    if (options.strategy === 'layout') {
      try {
        return { segments: layoutSegments(pages), strategy: 'layout' };
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Layout parsing failed, falling back to plain text');
      }
    }
    return { segments: plainSegments(pages), strategy: 'plain' };
  }
}
