/**
 * Sentences module - sentence and clause boundaries for oversized segment splits.
 */

export {
  splitIntoSentences,
  splitIntoClauses,
  splitIntoWords,
  isUnspacedScript,
  joinText,
  computeContentHash,
} from './sentence.detector';
export type { Sentence } from './sentence.types';
