import { describe, expect, test } from 'vitest';
import { detectLanguage, isLanguageFamily } from '../../services/parser/language';

describe('detectLanguage', () => {
  test.each([
    ['The committee reviewed the emissions policy.', 'latin-based'],
    ['Комитет рассмотрел политику выбросов.', 'cyrillic-based'],
    ['东京是日本的首都', 'chinese-simplified'],
    ['東京は日本の首都です', 'japanese'],
    ['위원회는 정책을 검토했다', 'korean'],
    ['नीति की समीक्षा की गई', 'devanagari-based'],
  ])('%s -> %s', (text, expected) => {
    expect(detectLanguage(text)).toBe(expected);
  });

  test('picks the dominant script in mixed text', () => {
    expect(detectLanguage('Report: Комитет рассмотрел политику')).toBe('cyrillic-based');
  });

  test('defaults to latin-based without letters', () => {
    expect(detectLanguage('')).toBe('latin-based');
    expect(detectLanguage('2024 - 2030')).toBe('latin-based');
  });
});

describe('isLanguageFamily', () => {
  test('accepts known families only', () => {
    expect(isLanguageFamily('thai')).toBe(true);
    expect(isLanguageFamily('klingon')).toBe(false);
  });
});
