import { z } from 'zod';
import { JudgmentParseError } from '../../utils/errors';
import type { Judgment, StanceScore } from './stance.types';

const stanceScoreSchema = z
  .number()
  .int()
  .min(-2)
  .max(2)
  .transform((value): StanceScore => {
    switch (value) {
      case -2:
        return -2;
      case -1:
        return -1;
      case 1:
        return 1;
      case 2:
        return 2;
      default:
        return 0;
    }
  });

export const judgmentResponseSchema = z.object({
  evidence_scores: z
    .array(
      z.object({
        score: stanceScoreSchema,
        reason: z.string(),
      })
    )
    .min(1),
});

export type JudgmentResponse = z.infer<typeof judgmentResponseSchema>;

/**
 * Validate raw model output. The first entry is the judgment for the item.
 */
export function parseJudgment(raw: unknown): Judgment {
  const result = judgmentResponseSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new JudgmentParseError(`Malformed judgment: ${issues.join('; ')}`, { cause: result.error });
  }
  const [first] = result.data.evidence_scores;
  return { score: first.score, reason: first.reason };
}
