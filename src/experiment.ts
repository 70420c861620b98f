import { ulid } from 'ulid';
import type { ReasoningBank } from './bank.js';
import type { MemoryRetriever } from './retriever.js';
import type { ExperimentOutcome, Extractor, Judge, Problem, Solver } from './types.js';
import { compare, type ComparisonSummary } from './stats.js';
import { getLogger, type Logger } from './logger.js';

export const DEFAULT_TOP_K = 2;

/** Collaborators and settings for one experiment run. */
export interface ExperimentOptions {
  bank: ReasoningBank;
  retriever: MemoryRetriever;
  solver: Solver;
  judge: Judge;
  extractor: Extractor;
  topK?: number;
  randomSeed?: number;
  logger?: Logger;
}

/** Comparison of both arms plus the metadata needed to reproduce the run. */
export interface ExperimentSummary extends ComparisonSummary {
  runId: string;
  createdAt: string;
  memoryBankSize: number;
  problemsTested: number;
  randomSeed: number;
  topK: number;
}

export interface ExperimentResults {
  baseline: ExperimentOutcome[];
  withMemory: ExperimentOutcome[];
}

function successRate(outcomes: readonly ExperimentOutcome[]): number {
  if (outcomes.length === 0) return 0;
  return outcomes.filter((o) => o.evaluation.success).length / outcomes.length;
}

/**
 * Phase 1: does retrieval help? Builds the bank from training problems, then
 * runs the test set once without memory and once with retrieved memories.
 * Problems are processed one at a time; collaborator errors abort the phase.
 */
export class Phase1Experiment {
  readonly results: ExperimentResults = { baseline: [], withMemory: [] };
  private readonly bank: ReasoningBank;
  private readonly retriever: MemoryRetriever;
  private readonly solver: Solver;
  private readonly judge: Judge;
  private readonly extractor: Extractor;
  private readonly topK: number;
  private readonly randomSeed: number;
  private readonly logger: Logger;

  constructor(options: ExperimentOptions) {
    this.bank = options.bank;
    this.retriever = options.retriever;
    this.solver = options.solver;
    this.judge = options.judge;
    this.extractor = options.extractor;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.randomSeed = options.randomSeed ?? 42;
    this.logger = options.logger ?? getLogger();
  }

  /** Solve, judge and extract memories for each training problem. Returns the number of items added. */
  async buildMemoryBank(problems: readonly Problem[], limit: number = problems.length): Promise<number> {
    const batch = problems.slice(0, limit);
    let added = 0;

    for (const [i, problem] of batch.entries()) {
      const solution = await this.solver.solve(problem.question);
      const evaluation = await this.judge.evaluate(problem.question, solution.answer, problem.expectedValue);
      const memories = await this.extractor.extract(
        problem.id,
        problem.question,
        { ...solution, expected: problem.expectedValue },
        evaluation.success,
      );
      this.bank.addBatch(memories);
      added += memories.length;
      this.logger.info(
        { phase: 'train', progress: `${i + 1}/${batch.length}`, problemId: problem.id, success: evaluation.success, extracted: memories.length },
        'training problem processed',
      );
    }

    this.logger.info({ bankSize: this.bank.size(), added }, 'memory bank built');
    return added;
  }

  /** Solve without memory. Does not touch the bank. */
  async runBaseline(problems: readonly Problem[], limit: number = problems.length): Promise<ExperimentOutcome[]> {
    this.logger.info({ seed: this.randomSeed }, 'baseline run started');
    const batch = problems.slice(0, limit);

    for (const [i, problem] of batch.entries()) {
      const solution = await this.solver.solve(problem.question);
      const evaluation = await this.judge.evaluate(problem.question, solution.answer, problem.expectedValue);
      this.results.baseline.push({ problemId: problem.id, question: problem.question, solution, evaluation });
      this.logger.info(
        { phase: 'baseline', progress: `${i + 1}/${batch.length}`, problemId: problem.id, success: evaluation.success },
        'problem evaluated',
      );
    }

    this.logger.info({ accuracy: successRate(this.results.baseline) }, 'baseline run finished');
    return this.results.baseline;
  }

  /**
   * Solve with the top memories retrieved for each problem. Skipped with a
   * warning when the bank is empty.
   */
  async runWithMemory(problems: readonly Problem[], limit: number = problems.length): Promise<ExperimentOutcome[]> {
    if (this.bank.size() === 0) {
      this.logger.warn('memory bank is empty; skipping memory run');
      return this.results.withMemory;
    }

    const batch = problems.slice(0, limit);
    for (const [i, problem] of batch.entries()) {
      const retrieved = this.retriever.retrieve(
        problem.question,
        this.bank.getAll(),
        this.topK,
        problem.expectedValue,
      );
      const context = this.retriever.formatMemoriesForPrompt(retrieved);
      const solution = await this.solver.solve(problem.question, context);
      const evaluation = await this.judge.evaluate(problem.question, solution.answer, problem.expectedValue);

      this.results.withMemory.push({
        problemId: problem.id,
        question: problem.question,
        solution,
        evaluation,
        retrievedMemories: retrieved.map((r) => r.item.title),
        numMemoriesRetrieved: retrieved.length,
      });
      this.logger.info(
        { phase: 'memory', progress: `${i + 1}/${batch.length}`, problemId: problem.id, success: evaluation.success, retrieved: retrieved.length },
        'problem evaluated',
      );
    }

    this.logger.info(
      { accuracy: successRate(this.results.withMemory), bankSize: this.bank.size() },
      'memory run finished',
    );
    return this.results.withMemory;
  }

  summarize(): ExperimentSummary {
    const comparison = compare(
      this.results.baseline.map((o) => o.evaluation.success),
      this.results.withMemory.map((o) => o.evaluation.success),
    );
    return {
      ...comparison,
      runId: ulid(),
      createdAt: new Date().toISOString(),
      memoryBankSize: this.bank.size(),
      problemsTested: this.results.baseline.length,
      randomSeed: this.randomSeed,
      topK: this.topK,
    };
  }
}
