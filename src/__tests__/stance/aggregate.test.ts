import { describe, expect, test } from 'vitest';
import {
  aggregateScores,
  labelFor,
  recomputeVerdict,
  roundHalfAwayFromZero,
} from '../../services/stance/aggregate';
import type { StanceVerdict } from '../../services/stance/stance.types';
import { evidenceOf } from '../helpers/factories';

function items(...scores: number[]) {
  return scores.map((score) => ({ score, tokenCount: 10 }));
}

describe('roundHalfAwayFromZero', () => {
  test.each([
    [0.5, 1],
    [-0.5, -1],
    [1.5, 2],
    [-1.5, -2],
    [0.49, 0],
    [1.2, 1],
    [-1.7, -2],
  ])('%d -> %d', (value, expected) => {
    expect(roundHalfAwayFromZero(value)).toBe(expected);
  });

  test('never returns negative zero', () => {
    expect(Object.is(roundHalfAwayFromZero(-0.4), 0)).toBe(true);
  });
});

describe('aggregateScores', () => {
  test('averages valid scores and reports sign agreement', () => {
    expect(aggregateScores(items(2, 1, 2, -1), 'mean')).toEqual({
      score: 1,
      label: 'supporting',
      confidence: 0.75,
      validCount: 4,
    });
  });

  test('rounds an exact half away from zero', () => {
    expect(aggregateScores(items(1, 0), 'mean').score).toBe(1);
    expect(aggregateScores(items(-1, -2), 'mean')).toEqual({
      score: -2,
      label: 'strongly_opposing',
      confidence: 1,
      validCount: 2,
    });
  });

  test('a neutral aggregate agrees only with neutral items', () => {
    expect(aggregateScores(items(1, -1, 0), 'mean')).toEqual({
      score: 0,
      label: 'neutral',
      confidence: 1 / 3,
      validCount: 3,
    });
  });

  test('token weighting favours longer evidence', () => {
    const weighted = [
      { score: 2, tokenCount: 10 },
      { score: -2, tokenCount: 30 },
    ];

    expect(aggregateScores(weighted, 'mean').score).toBe(0);
    expect(aggregateScores(weighted, 'token_weighted').score).toBe(-1);
  });

  test('no valid items means no evidence', () => {
    expect(aggregateScores([], 'mean')).toEqual({
      score: 0,
      label: 'no_evidence',
      confidence: 0,
      validCount: 0,
    });
  });
});

describe('labelFor', () => {
  test('maps each score to its label', () => {
    expect([-2, -1, 0, 1, 2].map(labelFor)).toEqual([
      'strongly_opposing',
      'opposing',
      'neutral',
      'supporting',
      'strongly_supporting',
    ]);
  });
});

describe('recomputeVerdict', () => {
  test('re-derives the aggregate from stored evidence alone', () => {
    const stored: StanceVerdict = {
      question: 'Does the company support carbon pricing?',
      score: 99,
      label: 'neutral',
      confidence: 0,
      validCount: 0,
      excludedCount: 0,
      weighting: 'mean',
      diagnostics: [],
      evidence: [
        { ...evidenceOf('one'), stance: 2, rationale: 'clear support' },
        { ...evidenceOf('two'), stance: 1, rationale: 'qualified support' },
        { ...evidenceOf('three'), stance: null, rationale: null },
      ],
    };

    const verdict = recomputeVerdict(stored);

    expect(verdict.score).toBe(2);
    expect(verdict.label).toBe('strongly_supporting');
    expect(verdict.confidence).toBe(1);
    expect(verdict.validCount).toBe(2);
    expect(verdict.excludedCount).toBe(1);
  });
});
