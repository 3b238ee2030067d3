import type { Tokenizer } from './chunker.types';

/**
 * Estimate token count from character count.
 * Uses a model-specific chars-per-token ratio.
 */
export class CharEstimateTokenizer implements Tokenizer {
  constructor(private readonly charsPerToken: number) {
    if (!(charsPerToken > 0)) {
      throw new RangeError(`charsPerToken must be positive, got ${charsPerToken}`);
    }
  }

  count(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }
}
