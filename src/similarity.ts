/**
 * Cosine similarity shared by the semantic ranking path.
 * Accepts Float32Array or number[] since only index access is used.
 * Callers check that both vectors share a dimension.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0,
    normA = 0,
    normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Check if a vector is all zeros (failed embedding).
 */
export function isZeroVector(v: ArrayLike<number>): boolean {
  for (let i = 0; i < v.length; i++) {
    if (v[i] !== 0) return false;
  }
  return true;
}

/** Cosine rescaled onto the lexical 0–100 scale; opposed vectors floor at 0. */
export function semanticSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const cos = Math.max(0, Math.min(1, cosineSimilarity(a, b)));
  return Math.round(cos * 10000) / 100;
}
