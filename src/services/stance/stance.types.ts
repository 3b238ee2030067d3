/**
 * Types for stance judgment and aggregation.
 */

import type { Evidence } from '../retriever/retriever.types';

export type StanceScore = -2 | -1 | 0 | 1 | 2;

export type StanceLabel =
  | 'strongly_opposing'
  | 'opposing'
  | 'neutral'
  | 'supporting'
  | 'strongly_supporting'
  | 'no_evidence';

export type StanceWeighting = 'mean' | 'token_weighted';

export interface Judgment {
  score: StanceScore;
  reason: string;
}

export interface JudgedEvidence extends Evidence {
  /** Null when the item was excluded */
  stance: StanceScore | null;
  rationale: string | null;
}

export type DiagnosticKind = 'parse_error' | 'judge_error';

export interface StanceDiagnostic {
  /** Position of the item in the evidence list */
  position: number;
  chunkId: string;
  documentId: string;
  kind: DiagnosticKind;
  message: string;
}

export interface StanceVerdict {
  question: string;
  subject?: string;
  score: number;
  label: StanceLabel;
  /** Share of valid items agreeing in sign with the score, 0..1 */
  confidence: number;
  validCount: number;
  excludedCount: number;
  weighting: StanceWeighting;
  diagnostics: StanceDiagnostic[];
  evidence: JudgedEvidence[];
}

export interface AssessOptions {
  subject?: string;
  signal?: AbortSignal;
}
