/**
 * Types for sentence and clause splitting.
 */

export interface Sentence {
  /** Start position relative to the input text */
  start: number;
  /** End position relative to the input text */
  end: number;
  /** The sentence text, trimmed */
  text: string;
}
