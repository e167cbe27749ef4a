/**
 * Vector similarity for embedding-based ranking
 */

/**
 * Cosine of the angle between two vectors, in [-1, 1].
 * A zero vector has no direction and scores 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let sumSqA = 0;
  let sumSqB = 0;
  a.forEach((x, i) => {
    const y = b[i];
    dot += x * y;
    sumSqA += x * x;
    sumSqB += y * y;
  });

  if (sumSqA === 0 || sumSqB === 0) return 0;
  return dot / Math.sqrt(sumSqA * sumSqB);
}
