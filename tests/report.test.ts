import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { RESULTS_FILE, SUMMARY_FILE, formatSummary, summaryToRecord, writeResults } from '../src/report.js';
import type { ExperimentResults, ExperimentSummary } from '../src/experiment.js';
import { makeEvaluation } from './helpers.js';

function makeSummary(overrides: Partial<ExperimentSummary> = {}): ExperimentSummary {
  return {
    baseline: { successes: 30, n: 50, accuracy: 0.6, ci: { lower: 0.5, upper: 0.7 } },
    withMemory: { successes: 40, n: 50, accuracy: 0.8, ci: { lower: 0.75, upper: 0.9 } },
    absoluteImprovement: 0.2,
    relativeImprovement: 0.333333,
    intervalsOverlap: false,
    significant: true,
    runId: '01JTESTRUN0000000000000000',
    createdAt: '2026-03-01T12:00:00.000Z',
    memoryBankSize: 12,
    problemsTested: 50,
    randomSeed: 42,
    topK: 2,
    ...overrides,
  };
}

const RESULTS: ExperimentResults = {
  baseline: [
    {
      problemId: 'x1',
      question: 'What is 6 times 7?',
      solution: { answer: '40', reasoning: 'Final Answer: 40', model: 'fake-model' },
      evaluation: makeEvaluation(false),
    },
  ],
  withMemory: [
    {
      problemId: 'x1',
      question: 'What is 6 times 7?',
      solution: { answer: '42', reasoning: 'Final Answer: 42', model: 'fake-model' },
      evaluation: makeEvaluation(true),
      retrievedMemories: ['Count groups'],
      numMemoriesRetrieved: 1,
    },
  ],
};

describe('summaryToRecord', () => {
  it('flattens the summary into snake_case fields', () => {
    expect(summaryToRecord(makeSummary())).toEqual({
      run_id: '01JTESTRUN0000000000000000',
      created_at: '2026-03-01T12:00:00.000Z',
      baseline_accuracy: 0.6,
      baseline_ci_lower: 0.5,
      baseline_ci_upper: 0.7,
      with_memory_accuracy: 0.8,
      with_memory_ci_lower: 0.75,
      with_memory_ci_upper: 0.9,
      absolute_improvement: 0.2,
      relative_improvement: 0.333333,
      confidence_intervals_overlap: false,
      statistically_significant: true,
      memory_bank_size: 12,
      problems_tested: 50,
      with_memory_problems_tested: 50,
      top_k: 2,
      random_seed: 42,
    });
  });
});

describe('writeResults', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'rbank-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes the per-problem log and the summary', () => {
    const dir = join(tmpDir, 'results');
    const paths = writeResults(dir, RESULTS, makeSummary());

    expect(paths).toEqual({ resultsPath: join(dir, RESULTS_FILE), summaryPath: join(dir, SUMMARY_FILE) });

    const log = JSON.parse(readFileSync(paths.resultsPath, 'utf-8'));
    expect(log.baseline[0]).toEqual({
      problem_id: 'x1',
      question: 'What is 6 times 7?',
      solution: { answer: '40', reasoning: 'Final Answer: 40', model: 'fake-model' },
      evaluation: { success: false, expected: '1', extracted: '0', method: 'numeric', rationale: '' },
    });
    expect(log.with_memory[0].retrieved_memories).toEqual(['Count groups']);
    expect(log.with_memory[0].num_memories_retrieved).toBe(1);

    const summary = JSON.parse(readFileSync(paths.summaryPath, 'utf-8'));
    expect(summary.statistically_significant).toBe(true);
    expect(summary.run_id).toBe('01JTESTRUN0000000000000000');
  });
});

describe('formatSummary', () => {
  it('reports a significant improvement', () => {
    expect(formatSummary(makeSummary()).split('\n')).toEqual([
      '='.repeat(70),
      'PHASE 1 RESULTS',
      '='.repeat(70),
      'Baseline Accuracy:    60.00% (95% CI: [50.00%, 70.00%])',
      'With Memory Accuracy: 80.00% (95% CI: [75.00%, 90.00%])',
      'Absolute Improvement: +20.00%',
      'Relative Improvement: +33.33%',
      'Memory Bank Size:     12 items',
      '',
      '✓ Improvement is statistically significant at 95% confidence',
      '  (Memory CI lower bound > Baseline CI upper bound)',
      '='.repeat(70),
    ]);
  });

  it('reports overlapping intervals and a regression', () => {
    const lines = formatSummary(
      makeSummary({ absoluteImprovement: -0.1, relativeImprovement: -0.25, significant: false, intervalsOverlap: true }),
    ).split('\n');
    expect(lines[5]).toBe('Absolute Improvement: -10.00%');
    expect(lines[6]).toBe('Relative Improvement: -25.00%');
    expect(lines[9]).toBe('⚠ Improvement not statistically significant at 95% confidence');
    expect(lines[10]).toBe('  (Confidence intervals overlap)');
  });
});
