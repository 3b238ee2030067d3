export { StanceAggregator } from './stance.service';
export type { StanceAggregatorOptions } from './stance.service';
export { aggregateScores, labelFor, recomputeVerdict, roundHalfAwayFromZero } from './aggregate';
export { judgmentResponseSchema, parseJudgment } from './stance.schema';
export type { JudgmentModel } from './judgment.interface';
export type {
  AssessOptions,
  Judgment,
  JudgedEvidence,
  StanceDiagnostic,
  StanceLabel,
  StanceScore,
  StanceVerdict,
  StanceWeighting,
} from './stance.types';
