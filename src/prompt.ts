/**
 * Prompt helper: renders retrieved memories as a markdown block that can be
 * placed ahead of the problem text.
 */

import type { ScoredMemory } from './types.js';

const HEADER = '## Relevant Memories\n';
const SEPARATOR = '---\n';

/**
 * Format retrieved memories for prompt injection, in the order given.
 *
 * @returns Formatted markdown, or an empty string when nothing was retrieved
 */
export function formatMemoriesForPrompt(retrieved: readonly ScoredMemory[]): string {
  if (retrieved.length === 0) return '';

  const blocks = retrieved.map(({ item }, i) => {
    const kind = item.success ? 'Strategy that worked' : 'Pitfall to avoid';
    return (
      `### Memory ${i + 1}: ${item.title}\n` +
      `**Kind:** ${kind}\n` +
      `**Description:** ${item.description}\n` +
      `**Content:** ${item.content}\n`
    );
  });

  return HEADER + '\n' + blocks.join(`\n${SEPARATOR}\n`);
}
