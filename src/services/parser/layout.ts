/**
 * Layout-aware reading order.
 *
 * Positioned text runs are grouped into lines, lines are split into columns
 * at vertical gutters, and the bands between full-width lines are read column
 * by column. Blocks are tagged from font size, bullet markers and cell gaps.
 * Pure functions; no I/O.
 */

import type { PositionedText, ReadablePage, Segment, SegmentRole } from './parser.types';

const FULL_WIDTH_RATIO = 0.6;
const LINE_LIKE_RATIO = 0.2;
const MIN_GUTTER = 12;
const MIN_COLUMN_LINES = 3;
const LINE_TOLERANCE = 0.5;
const WORD_GAP = 0.1;
const CELL_GAP = 2.5;
const PARAGRAPH_GAP = 1.8;
const FONT_CHANGE_RATIO = 0.15;
const HEADING_RATIO = 1.2;
const MAX_HEADING_CHARS = 200;
const MIN_TABLE_CELLS = 3;
const BULLET_PATTERN = /^(?:[•▪◦‣●○■□–-]|\(?\d{1,3}[.)]|\(?[a-z][.)])\s+/i;

interface Line {
  y: number;
  fontSize: number;
  items: PositionedText[];
}

interface Fragment {
  y: number;
  fontSize: number;
  cells: string[];
}

interface Block {
  fontSize: number;
  fragments: Fragment[];
}

export type LaidOutSegment = Omit<Segment, 'order'>;

/**
 * Segments for every page in reading order, numbered across the document.
 */
export function layoutSegments(pages: ReadablePage[]): Segment[] {
  const segments: Segment[] = [];
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);

  for (const page of ordered) {
    for (const segment of layoutPage(page)) {
      segments.push({ ...segment, order: segments.length });
    }
  }

  return segments;
}

export function layoutPage(page: ReadablePage): LaidOutSegment[] {
  const items = page.items.filter((item) => item.text.trim().length > 0);
  if (items.length === 0) return [];

  const left = Math.min(...items.map((item) => item.x));
  const right = Math.max(...items.map((item) => item.x + item.width));
  const span = Math.max(right - left, 1);

  const boundaries = findColumnBoundaries(items, span);
  const fragments = readingOrder(groupLines(items), boundaries, span);
  const blocks = groupBlocks(fragments);
  const bodyFontSize = weightedMedianFontSize(fragments);

  return blocks
    .map((block) => toSegment(block, page.pageNumber, bodyFontSize))
    .filter((segment) => segment.text.length > 0);
}

/**
 * Group runs into visual lines, top to bottom, each sorted left to right.
 */
export function groupLines(items: PositionedText[]): Line[] {
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: Line[] = [];

  for (const item of sorted) {
    const height = Math.max(item.height, 1);
    const current = lines[lines.length - 1];
    if (current && Math.abs(current.y - item.y) <= LINE_TOLERANCE * Math.max(height, current.fontSize)) {
      current.items.push(item);
      current.fontSize = Math.max(current.fontSize, height);
    } else {
      lines.push({ y: item.y, fontSize: height, items: [item] });
    }
  }

  for (const line of lines) {
    line.items.sort((a, b) => a.x - b.x);
  }
  return lines;
}

/**
 * X positions separating text columns. Only line-like runs (wider than a
 * table cell, narrower than the page) decide where gutters are.
 */
export function findColumnBoundaries(items: PositionedText[], span: number): number[] {
  const lineLike = items.filter(
    (item) => item.width >= LINE_LIKE_RATIO * span && item.width < FULL_WIDTH_RATIO * span
  );
  if (lineLike.length < MIN_COLUMN_LINES * 2) return [];

  const intervals = lineLike
    .map((item) => ({ start: item.x, end: item.x + item.width }))
    .sort((a, b) => a.start - b.start);

  const merged: Array<{ start: number; end: number }> = [];
  for (const interval of intervals) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push({ ...interval });
    }
  }

  const boundaries: number[] = [];
  for (let i = 1; i < merged.length; i++) {
    const gap = merged[i].start - merged[i - 1].end;
    if (gap >= MIN_GUTTER) {
      boundaries.push(merged[i - 1].end + gap / 2);
    }
  }
  if (boundaries.length === 0) return [];

  const perColumn = new Array<number>(boundaries.length + 1).fill(0);
  for (const item of lineLike) {
    perColumn[columnOf(item, boundaries)]++;
  }
  return perColumn.every((count) => count >= MIN_COLUMN_LINES) ? boundaries : [];
}

function columnOf(item: PositionedText, boundaries: number[]): number {
  const center = item.x + item.width / 2;
  return boundaries.filter((boundary) => boundary < center).length;
}

function spansColumns(line: Line, boundaries: number[], span: number): boolean {
  return line.items.some(
    (item) =>
      item.width >= FULL_WIDTH_RATIO * span ||
      boundaries.some((boundary) => item.x < boundary && item.x + item.width > boundary)
  );
}

/**
 * Flatten lines into fragments in reading order: inside a band, all of the
 * first column, then the next; a line crossing a gutter closes the band.
 */
function readingOrder(lines: Line[], boundaries: number[], span: number): Fragment[] {
  if (boundaries.length === 0) {
    return lines.map((line) => toFragment(line.items, line.y));
  }

  const ordered: Fragment[] = [];
  const columns: Fragment[][] = Array.from({ length: boundaries.length + 1 }, () => []);
  const flush = () => {
    for (const column of columns) {
      ordered.push(...column);
      column.length = 0;
    }
  };

  for (const line of lines) {
    if (spansColumns(line, boundaries, span)) {
      flush();
      ordered.push(toFragment(line.items, line.y));
      continue;
    }

    const byColumn = new Map<number, PositionedText[]>();
    for (const item of line.items) {
      const column = columnOf(item, boundaries);
      byColumn.set(column, [...(byColumn.get(column) ?? []), item]);
    }
    for (const [column, columnItems] of byColumn) {
      columns[column].push(toFragment(columnItems, line.y));
    }
  }
  flush();

  return ordered;
}

function toFragment(items: PositionedText[], y: number): Fragment {
  const fontSize = Math.max(...items.map((item) => Math.max(item.height, 1)));
  const cells: string[] = [];
  let cell = '';
  let previous: PositionedText | undefined;

  for (const item of items) {
    if (previous) {
      const gap = item.x - (previous.x + previous.width);
      if (gap > CELL_GAP * fontSize) {
        cells.push(cell);
        cell = '';
      } else if (gap > WORD_GAP * fontSize && !/\s$/.test(cell) && !/^\s/.test(item.text)) {
        cell += ' ';
      }
    }
    cell += item.text;
    previous = item;
  }
  cells.push(cell);

  return {
    y,
    fontSize,
    cells: cells.map((c) => c.replace(/\s+/g, ' ').trim()).filter((c) => c.length > 0),
  };
}

function isTableRow(fragment: Fragment): boolean {
  return fragment.cells.length >= MIN_TABLE_CELLS;
}

function fragmentText(fragment: Fragment): string {
  return fragment.cells.join(' ');
}

function groupBlocks(fragments: Fragment[]): Block[] {
  const blocks: Block[] = [];
  let current: Block | undefined;
  let previous: Fragment | undefined;

  for (const fragment of fragments) {
    if (fragment.cells.length === 0) continue;

    const startsNew =
      !current ||
      !previous ||
      isTableRow(fragment) !== isTableRow(previous) ||
      Math.abs(fragment.fontSize - current.fontSize) > FONT_CHANGE_RATIO * current.fontSize ||
      fragment.y > previous.y ||
      previous.y - fragment.y > PARAGRAPH_GAP * current.fontSize ||
      (!isTableRow(fragment) && BULLET_PATTERN.test(fragmentText(fragment)));

    if (startsNew || !current) {
      current = { fontSize: fragment.fontSize, fragments: [fragment] };
      blocks.push(current);
    } else {
      current.fragments.push(fragment);
    }
    previous = fragment;
  }

  return blocks;
}

function weightedMedianFontSize(fragments: Fragment[]): number {
  const weighted = fragments
    .map((fragment) => ({ size: fragment.fontSize, weight: fragmentText(fragment).length }))
    .filter((entry) => entry.weight > 0)
    .sort((a, b) => a.size - b.size);
  const total = weighted.reduce((sum, entry) => sum + entry.weight, 0);
  if (total === 0) return 1;

  let accumulated = 0;
  for (const entry of weighted) {
    accumulated += entry.weight;
    if (accumulated * 2 >= total) return entry.size;
  }
  return weighted[weighted.length - 1].size;
}

function classify(block: Block, text: string, bodyFontSize: number): SegmentRole {
  if (block.fragments.every(isTableRow)) return 'table';
  if (block.fontSize >= HEADING_RATIO * bodyFontSize && text.length <= MAX_HEADING_CHARS) {
    return 'heading';
  }
  if (BULLET_PATTERN.test(text)) return 'list';
  return 'body';
}

function toSegment(block: Block, page: number, bodyFontSize: number): LaidOutSegment {
  const isTable = block.fragments.every(isTableRow);
  const text = isTable
    ? block.fragments.map((fragment) => fragment.cells.join(' | ')).join('\n')
    : joinLines(block.fragments.map(fragmentText));

  return { text, page, role: classify(block, text, bodyFontSize) };
}

/**
 * Join wrapped lines, rejoining words hyphenated across a line break.
 */
export function joinLines(lines: string[]): string {
  let text = '';
  for (const line of lines) {
    if (!text) {
      text = line;
    } else if (/[A-Za-zÀ-ɏ]-$/.test(text) && /^[a-zß-ÿ]/.test(line)) {
      text = text.slice(0, -1) + line;
    } else {
      text = `${text} ${line}`;
    }
  }
  return text.trim();
}
