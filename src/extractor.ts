import { z } from 'zod';
import type { EmbeddingFn, Extractor, MemoryItem, TextCompleter, Trajectory } from './types.js';
import { createMemoryItem } from './memory.js';
import { extractJsonBlock } from './parse.js';
import { getLogger, type Logger } from './logger.js';

const DraftSchema = z.array(
  z.object({
    title: z.string().trim().min(1),
    description: z.string().trim().min(1),
    content: z.string().trim().min(1),
  }),
);

export function buildExtractionPrompt(
  question: string,
  trajectory: Trajectory,
  success: boolean,
  maxItems: number,
): string {
  const outcome = success
    ? 'The attempt was CORRECT. Extract reusable strategies that led to the right answer.'
    : 'The attempt was WRONG. Extract warnings about the mistakes so they are avoided next time.';

  return `You are building a memory of math problem-solving lessons. ${outcome}

Rules:
- Each memory must generalize to other problems; describe the method, not this problem's numbers
- Never state the final answer of this problem
- At most ${maxItems} memories; fewer is fine
- title: a few words; description: one sentence; content: the full lesson in 1-3 sentences

Return JSON only:
[{"title": "...", "description": "...", "content": "..."}]

PROBLEM:
${question}

ATTEMPTED SOLUTION:
${trajectory.reasoning}

MODEL ANSWER: ${trajectory.answer}
EXPECTED ANSWER: ${trajectory.expected}`;
}

/** Options for constructing a MemoryExtractor. */
export interface MemoryExtractorOptions {
  maxItems?: number;
  /** When set, each new item is embedded from its title and description. */
  embeddingFn?: EmbeddingFn;
  logger?: Logger;
}

/**
 * Asks the model to distill a solved problem into memory items.
 */
export class MemoryExtractor implements Extractor {
  private readonly llm: TextCompleter;
  private readonly maxItems: number;
  private readonly embeddingFn: EmbeddingFn | undefined;
  private readonly logger: Logger;

  constructor(llm: TextCompleter, options?: MemoryExtractorOptions) {
    this.llm = llm;
    this.maxItems = options?.maxItems ?? 3;
    this.embeddingFn = options?.embeddingFn;
    this.logger = options?.logger ?? getLogger();
  }

  async extract(
    problemId: string,
    question: string,
    trajectory: Trajectory,
    success: boolean,
  ): Promise<MemoryItem[]> {
    const reply = await this.llm.complete(
      buildExtractionPrompt(question, trajectory, success, this.maxItems),
      { maxTokens: 1024 },
    );

    const drafts = DraftSchema.safeParse(extractJsonBlock(reply, 'array'));
    if (!drafts.success) {
      this.logger.warn({ problemId, reply: reply.slice(0, 200) }, 'extractor reply was not a memory list');
      return [];
    }

    const now = new Date();
    return drafts.data.slice(0, this.maxItems).map((draft) =>
      createMemoryItem(
        {
          ...draft,
          sourceProblemId: problemId,
          success,
          embedding: this.embeddingFn
            ? this.embeddingFn(`${draft.title} ${draft.description}`)
            : null,
        },
        now,
      ),
    );
  }
}
