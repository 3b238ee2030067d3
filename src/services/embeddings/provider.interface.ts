export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  /** Vectors in input order */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
