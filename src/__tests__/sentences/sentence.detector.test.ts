import { describe, expect, test } from 'vitest';
import { joinText, splitIntoClauses, splitIntoSentences } from '../../services/sentences';

function sentenceTexts(text: string): string[] {
  return splitIntoSentences(text).map((sentence) => sentence.text);
}

describe('splitIntoSentences', () => {
  test('skips abbreviations and decimals', () => {
    expect(sentenceTexts('Dr. Smith arrived. It was 3.5 hours late.')).toEqual([
      'Dr. Smith arrived.',
      'It was 3.5 hours late.',
    ]);
  });

  test('ends sentences at full-width stops without whitespace', () => {
    expect(sentenceTexts('第一句。第二句！第三句')).toEqual(['第一句。', '第二句！', '第三句']);
  });

  test('keeps closing brackets with the stop', () => {
    expect(sentenceTexts('他说「好。」然后离开。')).toEqual(['他说「好。」', '然后离开。']);
  });
});

describe('splitIntoClauses', () => {
  test('splits at ASCII punctuation followed by whitespace', () => {
    expect(splitIntoClauses('first, second; third')).toEqual(['first,', 'second;', 'third']);
  });

  test('splits at full-width punctuation', () => {
    expect(splitIntoClauses('碳税、排放：目标')).toEqual(['碳税、', '排放：', '目标']);
  });
});

describe('joinText', () => {
  test('spaces words in spaced scripts', () => {
    expect(joinText('climate', 'policy')).toBe('climate policy');
  });

  test('joins unspaced scripts directly', () => {
    expect(joinText('气候', '政策')).toBe('气候政策');
    expect(joinText('碳税。', 'Net zero')).toBe('碳税。Net zero');
  });

  test('ignores empty sides', () => {
    expect(joinText('', 'policy')).toBe('policy');
    expect(joinText('climate', '')).toBe('climate');
  });
});
