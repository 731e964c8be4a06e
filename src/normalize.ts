/**
 * Case- and whitespace-insensitive form used for duplicate checks and the
 * "longest text wins" merge rule. Trailing sentence punctuation is dropped so
 * "Lives in Paris." and "lives in paris" compare equal.
 */
export function normalizeFactText(text: string): string {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[.!?;,\s]+$/u, "");
}

export function textuallyEquivalent(a: string, b: string): boolean {
  return normalizeFactText(a) === normalizeFactText(b);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  // Clamp rounding drift so identical vectors never score above 1.
  return Math.max(-1, Math.min(1, dot / denom));
}

export const SIMILARITY_TIE_EPSILON = 1e-9;

/**
 * Ranking used wherever scored memories are ordered: similarity descending,
 * near-equal scores broken by most recent `updatedAt`, then by id.
 */
export function compareScored(
  a: { similarity: number; record: { updatedAt: string; id: string } },
  b: { similarity: number; record: { updatedAt: string; id: string } },
): number {
  if (Math.abs(a.similarity - b.similarity) > SIMILARITY_TIE_EPSILON) {
    return b.similarity - a.similarity;
  }
  if (a.record.updatedAt !== b.record.updatedAt) {
    return a.record.updatedAt < b.record.updatedAt ? 1 : -1;
  }
  return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
}
