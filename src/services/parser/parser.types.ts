/**
 * Types for PDF parsing.
 */

export type SegmentRole = 'heading' | 'body' | 'table' | 'list' | 'other';

/** Parsed unit of text in reading order. Exists only within one ingestion run. */
export interface Segment {
  text: string;
  /** 1-based page number */
  page: number;
  /** Position in document reading order */
  order: number;
  /** Structural role, when the strategy can tell */
  role?: SegmentRole;
}

export type ParserStrategy = 'layout' | 'plain';
export type ParserDevice = 'auto' | 'cpu' | 'gpu';

export interface BackendOptions {
  device: ParserDevice;
  threadCount: number;
}

export interface ParseOptions extends BackendOptions {
  strategy: ParserStrategy;
}

/** A run of text with its position in PDF user space (origin bottom-left). */
export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
  /** Font height */
  height: number;
  /** Backend saw a line break after this run */
  hasEOL: boolean;
}

export interface ReadablePage {
  pageNumber: number;
  width: number;
  height: number;
  items: PositionedText[];
}

export interface FailedPage {
  pageNumber: number;
  error: string;
}

export type ExtractedPage = ReadablePage | FailedPage;

/**
 * Pluggable text extraction backend (pdf.js, an OCR service, ...).
 * Failures on single pages are reported per page; document-level failures throw.
 */
export interface PdfTextBackend {
  readonly name: string;
  extract(bytes: Uint8Array, options: BackendOptions, signal?: AbortSignal): Promise<ExtractedPage[]>;
}

export type LanguageFamily =
  | 'latin-based'
  | 'cyrillic-based'
  | 'arabic-based'
  | 'bengali-based'
  | 'devanagari-based'
  | 'chinese-traditional'
  | 'chinese-simplified'
  | 'japanese'
  | 'korean'
  | 'thai'
  | 'telugu'
  | 'kannada';

export interface ParsedDocument {
  segments: Segment[];
  pageCount: number;
  failedPages: number[];
  /** Strategy that produced the segments; differs from the request after a fallback */
  strategy: ParserStrategy;
  language: LanguageFamily;
}

export function isReadablePage(page: ExtractedPage): page is ReadablePage {
  return 'items' in page;
}
