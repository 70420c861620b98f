import pino from 'pino';
import type {
  CompletionOptions,
  Evaluation,
  MemoryItem,
  Solution,
  Solver,
  TextCompleter,
} from '../src/types.js';

export const silentLogger = pino({ level: 'silent' });

export function makeMemoryFixture(overrides: Partial<MemoryItem> = {}): MemoryItem {
  return {
    title: 'Set up equations',
    description: 'Translate word problems into equations before solving',
    content: 'Name each unknown, write one equation per stated relation, then solve.',
    sourceProblemId: 'train-1',
    success: true,
    createdAt: '2026-01-01T00:00:00.000Z',
    embedding: null,
    ...overrides,
  };
}

export function makeEvaluation(success: boolean): Evaluation {
  return { success, expected: '1', extracted: success ? '1' : '0', method: 'numeric', rationale: '' };
}

/** Returns queued replies in order, repeating the last one; records prompts. */
export class FakeCompleter implements TextCompleter {
  readonly prompts: string[] = [];
  private readonly replies: string[];

  constructor(...replies: string[]) {
    this.replies = replies;
  }

  async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length - 1, this.replies.length - 1);
    return this.replies[index] ?? '';
  }
}

/** Answers from a lookup keyed by question; records memory contexts. */
export class FakeSolver implements Solver {
  readonly calls: Array<{ question: string; memoryContext: string | undefined }> = [];
  private readonly answers: (question: string, memoryContext: string | undefined) => string;

  constructor(answers: (question: string, memoryContext: string | undefined) => string) {
    this.answers = answers;
  }

  async solve(question: string, memoryContext?: string): Promise<Solution> {
    this.calls.push({ question, memoryContext });
    const answer = this.answers(question, memoryContext);
    return { answer, reasoning: `Final Answer: ${answer}`, model: 'fake-model' };
  }
}
