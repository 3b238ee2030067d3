/**
 * Aggregation of per-item stance scores into a verdict.
 * Pure functions; the verdict fields are re-derivable from its evidence.
 */

import type {
  JudgedEvidence,
  StanceLabel,
  StanceVerdict,
  StanceWeighting,
} from './stance.types';

const LABELS: Record<number, StanceLabel> = {
  [-2]: 'strongly_opposing',
  [-1]: 'opposing',
  0: 'neutral',
  1: 'supporting',
  2: 'strongly_supporting',
};

export interface ScoredItem {
  score: number;
  tokenCount: number;
}

export interface AggregateResult {
  score: number;
  label: StanceLabel;
  confidence: number;
  validCount: number;
}

/** Nearest integer; exact halves go away from zero. */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.floor(Math.abs(value) + 0.5);
  return rounded === 0 ? 0 : rounded;
}

export function labelFor(score: number): StanceLabel {
  return LABELS[score] ?? 'neutral';
}

function weightedMean(items: readonly ScoredItem[], weighting: StanceWeighting): number {
  if (weighting === 'token_weighted') {
    const totalWeight = items.reduce((sum, item) => sum + item.tokenCount, 0);
    if (totalWeight > 0) {
      return items.reduce((sum, item) => sum + item.score * item.tokenCount, 0) / totalWeight;
    }
  }
  return items.reduce((sum, item) => sum + item.score, 0) / items.length;
}

export function aggregateScores(
  items: readonly ScoredItem[],
  weighting: StanceWeighting
): AggregateResult {
  if (items.length === 0) {
    return { score: 0, label: 'no_evidence', confidence: 0, validCount: 0 };
  }

  const score = Math.max(-2, Math.min(2, roundHalfAwayFromZero(weightedMean(items, weighting))));
  const direction = Math.sign(score);
  const agreeing = items.filter((item) => Math.sign(item.score) === direction).length;

  return {
    score,
    label: labelFor(score),
    confidence: agreeing / items.length,
    validCount: items.length,
  };
}

export function scoredItems(evidence: readonly JudgedEvidence[]): ScoredItem[] {
  const items: ScoredItem[] = [];
  for (const item of evidence) {
    if (item.stance !== null) {
      items.push({ score: item.stance, tokenCount: item.chunk.tokenCount });
    }
  }
  return items;
}

/**
 * Re-derive score, label, confidence and counts from the stored evidence.
 */
export function recomputeVerdict(verdict: StanceVerdict): StanceVerdict {
  const result = aggregateScores(scoredItems(verdict.evidence), verdict.weighting);
  return {
    ...verdict,
    ...result,
    excludedCount: verdict.evidence.length - result.validCount,
  };
}
