/**
 * Judgment model capability: returns the model's structured output as
 * parsed JSON. Shape checking is the caller's job.
 */
export interface JudgmentModel {
  readonly name: string;
  judge(prompt: string, signal?: AbortSignal): Promise<unknown>;
}
