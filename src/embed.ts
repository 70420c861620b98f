/**
 * Similarity measures used by retrieval: cosine similarity over embeddings,
 * and a shared-term ratio for items that carry no embedding.
 */

const STOP_WORDS = new Set([
  'the', 'and', 'are', 'was', 'were', 'with', 'for', 'that', 'this', 'from',
  'not', 'but', 'have', 'has', 'had', 'does', 'did', 'will', 'would', 'could',
  'should', 'may', 'might', 'can', 'its', 'all', 'each', 'how', 'many', 'much',
  'what', 'when', 'which', 'who', 'into', 'than', 'then', 'there', 'their',
]);

/** Cosine similarity between two vectors. Must be same length. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom < 1e-9 ? 0 : dot / denom;
}

/** Lowercased content words of at least three characters, stop words removed. */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .replace(/[^a-z0-9\s]/g, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 2 && !STOP_WORDS.has(w)),
  );
}

/** Fraction of query terms that also appear in the document: |Q ∩ D| / |Q|. */
export function termOverlap(query: Set<string>, doc: Set<string>): number {
  if (query.size === 0) return 0;
  let shared = 0;
  for (const term of query) {
    if (doc.has(term)) shared++;
  }
  return shared / query.size;
}
