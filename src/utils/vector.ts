export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** `1 - cosine_distance`, clamped into [0, 1]. */
export function toSimilarity(cosine: number): number {
  if (!Number.isFinite(cosine)) {
    return 0;
  }
  return Math.min(1, Math.max(0, cosine));
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
