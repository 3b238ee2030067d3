import { joinLines } from './layout';
import type { ReadablePage, Segment } from './parser.types';

/**
 * Raw text of one page in content-stream order, one line per EOL marker.
 */
export function pageText(page: ReadablePage): string {
  let text = '';
  for (const item of page.items) {
    text += item.text;
    if (item.hasEOL) text += '\n';
  }
  return text;
}

/**
 * Structure-agnostic segmentation: paragraphs per page, split on blank lines.
 */
export function plainSegments(pages: ReadablePage[]): Segment[] {
  const segments: Segment[] = [];
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);

  for (const page of ordered) {
    const paragraphs = pageText(page).split(/\n[ \t]*\n/);
    for (const paragraph of paragraphs) {
      const lines = paragraph
        .split('\n')
        .map((line) => line.replace(/\s+/g, ' ').trim())
        .filter((line) => line.length > 0);
      const text = joinLines(lines);
      if (text) {
        segments.push({ text, page: page.pageNumber, order: segments.length });
      }
    }
  }

  return segments;
}
