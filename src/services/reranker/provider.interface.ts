/**
 * Cross-encoder scorer. Scores are returned in candidate order; a higher
 * score means more relevant.
 */
export interface RerankerProvider {
  readonly name: string;
  score(query: string, candidates: string[], signal?: AbortSignal): Promise<number[]>;
}
