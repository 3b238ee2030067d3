/**
 * Compute cosine similarity between two embedding vectors.
 * Mismatched or zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Weighted mean of vectors. Weights are token counts in practice.
 */
export function weightedCentroid(
  vectors: ReadonlyArray<readonly number[]>,
  weights: readonly number[]
): number[] {
  if (vectors.length === 0) return [];

  const dimensions = vectors[0].length;
  const centroid = new Array<number>(dimensions).fill(0);
  let total = 0;

  for (let i = 0; i < vectors.length; i++) {
    const weight = weights[i] ?? 0;
    total += weight;
    for (let d = 0; d < dimensions; d++) {
      centroid[d] += vectors[i][d] * weight;
    }
  }

  if (total === 0) {
    return weightedCentroid(vectors, vectors.map(() => 1));
  }
  return centroid.map((value) => value / total);
}
