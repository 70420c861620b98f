/**
 * Accuracy statistics for comparing a baseline arm against a
 * memory-augmented arm.
 */

/** z for a two-sided 95% interval. */
export const Z_95 = 1.96;

/** A closed confidence interval within [0, 1]. */
export interface Interval {
  lower: number;
  upper: number;
}

/** Accuracy and interval for one arm of the experiment. */
export interface ArmStats {
  successes: number;
  n: number;
  accuracy: number;
  ci: Interval;
}

/** Outcome of comparing two arms. */
export interface ComparisonSummary {
  baseline: ArmStats;
  withMemory: ArmStats;
  absoluteImprovement: number;
  relativeImprovement: number;
  intervalsOverlap: boolean;
  /** True only when the memory arm's lower bound clears the baseline's upper bound. */
  significant: boolean;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

/** successes / n, or 0 when there is no data. */
export function accuracy(successes: number, n: number): number {
  return n === 0 ? 0 : successes / n;
}

/**
 * Wilson score interval for a binomial proportion. Returns {0, 0} for n = 0.
 */
export function wilsonInterval(successes: number, n: number, confidenceZ: number = Z_95): Interval {
  if (n === 0) return { lower: 0, upper: 0 };

  const p = successes / n;
  const z2 = confidenceZ * confidenceZ;
  const denominator = 1 + z2 / n;
  const center = (p + z2 / (2 * n)) / denominator;
  const margin = (confidenceZ * Math.sqrt((p * (1 - p)) / n + z2 / (4 * n * n))) / denominator;

  return { lower: clamp01(center - margin), upper: clamp01(center + margin) };
}

export function armStats(outcomes: readonly boolean[], confidenceZ: number = Z_95): ArmStats {
  const n = outcomes.length;
  const successes = outcomes.filter(Boolean).length;
  return {
    successes,
    n,
    accuracy: accuracy(successes, n),
    ci: wilsonInterval(successes, n, confidenceZ),
  };
}

/**
 * Compare per-problem success flags of the two arms. The improvement counts
 * as significant only if the intervals do not overlap, which is stricter than
 * a two-sample test.
 */
export function compare(
  baselineOutcomes: readonly boolean[],
  memoryOutcomes: readonly boolean[],
  confidenceZ: number = Z_95,
): ComparisonSummary {
  const baseline = armStats(baselineOutcomes, confidenceZ);
  const withMemory = armStats(memoryOutcomes, confidenceZ);

  const absoluteImprovement = withMemory.accuracy - baseline.accuracy;
  const relativeImprovement = baseline.accuracy > 0 ? absoluteImprovement / baseline.accuracy : 0;
  const significant = withMemory.ci.lower > baseline.ci.upper;

  return {
    baseline,
    withMemory,
    absoluteImprovement,
    relativeImprovement,
    intervalsOverlap: !significant,
    significant,
  };
}
