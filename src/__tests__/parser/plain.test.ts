import { describe, expect, test } from 'vitest';
import { pageText, plainSegments } from '../../services/parser/plain';
import { page, textItem } from '../helpers/factories';

const eol = { hasEOL: true };

describe('plainSegments', () => {
  test('splits paragraphs on blank lines and rejoins hyphenation', () => {
    const pages = [
      page(1, [
        textItem('Opening para-', 50, 700, eol),
        textItem('graph continues.', 50, 686, eol),
        textItem('', 50, 672, eol),
        textItem('Second paragraph.', 50, 658, eol),
      ]),
      page(2, [textItem('Next page.', 50, 700, eol)]),
    ];

    expect(plainSegments(pages)).toEqual([
      { text: 'Opening paragraph continues.', page: 1, order: 0 },
      { text: 'Second paragraph.', page: 1, order: 1 },
      { text: 'Next page.', page: 2, order: 2 },
    ]);
  });

  test('pageText adds a newline only at end-of-line runs', () => {
    const text = pageText(
      page(1, [textItem('Hello ', 50, 700), textItem('world', 80, 700, eol), textItem('Bye', 50, 686)])
    );

    expect(text).toBe('Hello world\nBye');
  });
});
