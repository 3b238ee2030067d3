/**
 * Structured output schema for stance judgments.
 */
import { GeminiType } from '../core';

export const stanceJudgmentSchema = {
  type: GeminiType.OBJECT,
  properties: {
    evidence_scores: {
      type: GeminiType.ARRAY,
      minItems: 1,
      items: {
        type: GeminiType.OBJECT,
        properties: {
          score: { type: GeminiType.INTEGER, minimum: -2, maximum: 2 },
          reason: { type: GeminiType.STRING },
        },
        required: ['score', 'reason'],
      },
    },
  },
  required: ['evidence_scores'],
};
