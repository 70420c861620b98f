import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { ExperimentResults, ExperimentSummary } from './experiment.js';
import type { ExperimentOutcome } from './types.js';

export const RESULTS_FILE = 'phase1_results.json';
export const SUMMARY_FILE = 'phase1_summary.json';

function outcomeToRecord(outcome: ExperimentOutcome): Record<string, unknown> {
  const record: Record<string, unknown> = {
    problem_id: outcome.problemId,
    question: outcome.question,
    solution: outcome.solution,
    evaluation: outcome.evaluation,
  };
  if (outcome.retrievedMemories !== undefined) {
    record.retrieved_memories = outcome.retrievedMemories;
    record.num_memories_retrieved = outcome.numMemoriesRetrieved ?? outcome.retrievedMemories.length;
  }
  return record;
}

/** Flat snake_case record written to the summary file. */
export function summaryToRecord(summary: ExperimentSummary): Record<string, unknown> {
  return {
    run_id: summary.runId,
    created_at: summary.createdAt,
    baseline_accuracy: summary.baseline.accuracy,
    baseline_ci_lower: summary.baseline.ci.lower,
    baseline_ci_upper: summary.baseline.ci.upper,
    with_memory_accuracy: summary.withMemory.accuracy,
    with_memory_ci_lower: summary.withMemory.ci.lower,
    with_memory_ci_upper: summary.withMemory.ci.upper,
    absolute_improvement: summary.absoluteImprovement,
    relative_improvement: summary.relativeImprovement,
    confidence_intervals_overlap: summary.intervalsOverlap,
    statistically_significant: summary.significant,
    memory_bank_size: summary.memoryBankSize,
    problems_tested: summary.problemsTested,
    with_memory_problems_tested: summary.withMemory.n,
    top_k: summary.topK,
    random_seed: summary.randomSeed,
  };
}

/** Write the per-problem log and the summary into `dir`. Returns both paths. */
export function writeResults(
  dir: string,
  results: ExperimentResults,
  summary: ExperimentSummary,
): { resultsPath: string; summaryPath: string } {
  mkdirSync(dir, { recursive: true });
  const resultsPath = join(dir, RESULTS_FILE);
  const summaryPath = join(dir, SUMMARY_FILE);

  const log = {
    baseline: results.baseline.map(outcomeToRecord),
    with_memory: results.withMemory.map(outcomeToRecord),
  };
  writeFileSync(resultsPath, JSON.stringify(log, null, 2), 'utf-8');
  writeFileSync(summaryPath, JSON.stringify(summaryToRecord(summary), null, 2), 'utf-8');
  return { resultsPath, summaryPath };
}

function pct(x: number): string {
  return `${(x * 100).toFixed(2)}%`;
}

function signedPct(x: number): string {
  return `${x >= 0 ? '+' : ''}${pct(x)}`;
}

/** Human-readable results block. */
export function formatSummary(summary: ExperimentSummary): string {
  const rule = '='.repeat(70);
  const { baseline, withMemory } = summary;
  const lines = [
    rule,
    'PHASE 1 RESULTS',
    rule,
    `Baseline Accuracy:    ${pct(baseline.accuracy)} (95% CI: [${pct(baseline.ci.lower)}, ${pct(baseline.ci.upper)}])`,
    `With Memory Accuracy: ${pct(withMemory.accuracy)} (95% CI: [${pct(withMemory.ci.lower)}, ${pct(withMemory.ci.upper)}])`,
    `Absolute Improvement: ${signedPct(summary.absoluteImprovement)}`,
    `Relative Improvement: ${signedPct(summary.relativeImprovement)}`,
    `Memory Bank Size:     ${summary.memoryBankSize} items`,
    '',
  ];
  if (summary.significant) {
    lines.push('✓ Improvement is statistically significant at 95% confidence');
    lines.push('  (Memory CI lower bound > Baseline CI upper bound)');
  } else {
    lines.push('⚠ Improvement not statistically significant at 95% confidence');
    lines.push('  (Confidence intervals overlap)');
  }
  lines.push(rule);
  return lines.join('\n');
}
