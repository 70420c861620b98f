import type { EmbeddingFn, MemoryItem, ScoredMemory } from './types.js';
import { cosineSimilarity, termOverlap, tokenize } from './embed.js';
import { formatMemoriesForPrompt as _formatMemoriesForPrompt } from './prompt.js';
import { getLogger, type Logger } from './logger.js';

/** Options for constructing a MemoryRetriever. */
export interface MemoryRetrieverOptions {
  /** Embeds the query; candidates with a matching embedding are scored by cosine. */
  embeddingFn?: EmbeddingFn;
  logger?: Logger;
}

/**
 * True when the memory's content or description contains the expected value
 * as a literal substring. "42" also matches "420" and misses "42.0".
 */
export function leaksExpectedValue(item: MemoryItem, expectedValue: string): boolean {
  return item.content.includes(expectedValue) || item.description.includes(expectedValue);
}

function byScoreThenAge(a: ScoredMemory, b: ScoredMemory): number {
  if (b.score !== a.score) return b.score - a.score;
  const age = Date.parse(a.item.createdAt) - Date.parse(b.item.createdAt);
  return age !== 0 ? age : a.item.createdAt.localeCompare(b.item.createdAt);
}

/**
 * Selects the memories most relevant to a problem without handing the model
 * its answer.
 */
export class MemoryRetriever {
  private readonly embeddingFn: EmbeddingFn | undefined;
  private readonly logger: Logger;

  constructor(options?: MemoryRetrieverOptions) {
    this.embeddingFn = options?.embeddingFn;
    this.logger = options?.logger ?? getLogger();
  }

  /**
   * Rank `pool` against `query` and return at most `topK` results, best
   * first. Candidates that would leak `expectedValue` are removed before
   * scoring. Ties go to the older memory.
   */
  retrieve(
    query: string,
    pool: readonly MemoryItem[],
    topK: number,
    expectedValue?: string | number,
  ): ScoredMemory[] {
    if (!(topK > 0)) return [];

    const needle = expectedValue === undefined ? '' : String(expectedValue);
    const candidates = needle
      ? pool.filter((item) => !leaksExpectedValue(item, needle))
      : [...pool];
    const filtered = pool.length - candidates.length;
    if (filtered > 0) {
      this.logger.debug({ filtered }, 'leak guard removed memories');
    }
    if (candidates.length === 0) return [];

    const queryTerms = tokenize(query);
    let queryVec: number[] | undefined;

    const scored = candidates.map((item): ScoredMemory => {
      if (this.embeddingFn && item.embedding !== null) {
        queryVec ??= this.embeddingFn(query);
        if (queryVec.length === item.embedding.length) {
          return { item, score: cosineSimilarity(queryVec, item.embedding), scoredBy: 'vector' };
        }
      }
      const docTerms = tokenize(`${item.title} ${item.description}`);
      return { item, score: termOverlap(queryTerms, docTerms), scoredBy: 'lexical' };
    });

    // Array.prototype.sort is stable, so equal scores and timestamps keep bank order.
    scored.sort(byScoreThenAge);
    return scored.slice(0, Math.floor(topK));
  }

  /** Render retrieved memories for the solver prompt; empty string for none. */
  formatMemoriesForPrompt(retrieved: readonly ScoredMemory[]): string {
    return _formatMemoriesForPrompt(retrieved);
  }
}
