export { DocumentParser, hasPdfHeader } from './parser.service';
export { PdfJsBackend } from './pdfjs.backend';
export { detectLanguage, isLanguageFamily, LANGUAGE_FAMILIES } from './language';
export { layoutPage, layoutSegments } from './layout';
export { plainSegments } from './plain';
export { isReadablePage } from './parser.types';
export type {
  ExtractedPage,
  LanguageFamily,
  ParsedDocument,
  ParseOptions,
  ParserStrategy,
  PdfTextBackend,
  PositionedText,
  ReadablePage,
  Segment,
  SegmentRole,
} from './parser.types';
