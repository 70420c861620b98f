/**
 * A single reusable lesson derived from one solved problem attempt.
 * Field names use camelCase in TS but map to snake_case on disk.
 */
export interface MemoryItem {
  readonly title: string;
  readonly description: string;
  readonly content: string;
  readonly sourceProblemId: string;
  /** True for a strategy that worked, false for a failure to avoid. */
  readonly success: boolean;
  readonly createdAt: string;
  readonly embedding: readonly number[] | null;
}

/** Fields supplied when creating a memory item. */
export interface NewMemoryItem {
  title: string;
  description: string;
  content: string;
  sourceProblemId: string;
  success: boolean;
  embedding?: readonly number[] | null;
}

/** How a candidate was scored during retrieval. */
export type ScoringMethod = 'vector' | 'lexical';

/** A retrieved memory and its relevance score. */
export interface ScoredMemory {
  item: MemoryItem;
  score: number;
  scoredBy: ScoringMethod;
}

/** A user-provided embedding function. */
export type EmbeddingFn = (text: string) => number[];

/** A math problem with its known answer. */
export interface Problem {
  id: string;
  question: string;
  expectedValue: string;
}

/** A model's attempt at a problem. */
export interface Solution {
  answer: string;
  reasoning: string;
  model: string;
}

/** A solution annotated with the expected value, handed to the extractor. */
export type Trajectory = Solution & { expected: string };

export type JudgeMethod = 'numeric' | 'exact' | 'llm';

/** The judge's verdict on a candidate answer. */
export interface Evaluation {
  success: boolean;
  expected: string;
  extracted: string;
  method: JudgeMethod;
  rationale: string;
}

/** Per-problem record of one experiment arm. */
export interface ExperimentOutcome {
  problemId: string;
  question: string;
  solution: Solution;
  evaluation: Evaluation;
  retrievedMemories?: string[];
  numMemoriesRetrieved?: number;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

/** Plain text completion, shared by the judge and the extractor. */
export interface TextCompleter {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/** Produces a solution for a problem statement. */
export interface Solver {
  solve(question: string, memoryContext?: string): Promise<Solution>;
}

/** Decides whether a candidate answer matches the expected value. */
export interface Judge {
  evaluate(question: string, candidateAnswer: string, expectedValue: string): Promise<Evaluation>;
}

/** Turns a solved problem's trajectory into new memory items. */
export interface Extractor {
  extract(
    problemId: string,
    question: string,
    trajectory: Trajectory,
    success: boolean,
  ): Promise<MemoryItem[]>;
}
