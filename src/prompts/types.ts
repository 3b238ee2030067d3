/**
 * Prompt management types.
 * Prompts are versioned so judgments can be traced to the wording that produced them.
 */

export interface PromptDefinition<TInput = unknown> {
  /** Unique identifier for this prompt (used for tracking) */
  id: string;

  /** Bumped whenever the wording changes */
  version: number;

  /** Human-readable description of what this prompt does */
  description: string;

  /** Function that builds the prompt string from input */
  build: (input: TInput) => string;
}
