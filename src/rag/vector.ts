/** Threshold for detecting zero/near-zero vectors during normalization */
const ZERO_VECTOR_THRESHOLD = 1e-10;

/**
 * Normalize vector to unit length for cosine similarity
 * @returns Unit vector, or null when the input is zero/near-zero
 */
export function normalizeVector(vec: readonly number[]): readonly number[] | null {
  let sumSquares = 0;
  for (const val of vec) {
    sumSquares += val * val;
  }

  const magnitude = Math.sqrt(sumSquares);

  // Zero or near-zero vectors cannot be normalized meaningfully
  if (!Number.isFinite(magnitude) || magnitude < ZERO_VECTOR_THRESHOLD) {
    return null;
  }

  return vec.map((val) => val / magnitude);
}

/**
 * Calculate dot product of two vectors
 * @returns Dot product (cosine similarity for normalized vectors)
 * @throws Error if vector dimensions don't match
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }

  return sum;
}
