/**
 * Evaluation Metrics
 *
 * Compute aggregate metrics from episode records.
 */

import type { EpisodeRecord, EvaluationMetrics, TerminalReason } from "../types";

const TERMINAL_REASONS: readonly TerminalReason[] = [
  "SUCCESS",
  "MAX_STEPS",
  "NATURAL_STOP",
  "INVALID_ACTION",
];

function emptyOutcomes(): Record<TerminalReason, number> {
  return { SUCCESS: 0, MAX_STEPS: 0, NATURAL_STOP: 0, INVALID_ACTION: 0 };
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population variance.
 */
function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
}

/**
 * Compute aggregate metrics from a list of episodes.
 * An empty list gives zeros rather than NaN.
 */
export function computeMetrics(
  episodes: readonly EpisodeRecord[],
  maxSamplePrograms: number = 5
): EvaluationMetrics {
  const n = episodes.length;
  const rewards = episodes.map((e) => e.totalReward);
  const lengths = episodes.map((e) => e.steps);

  const outcomes = emptyOutcomes();
  for (const ep of episodes) {
    if (ep.terminalReason) {
      outcomes[ep.terminalReason]++;
    }
  }

  // Distinct programs, in first-seen order
  const samplePrograms: string[] = [];
  for (const ep of episodes) {
    if (samplePrograms.length >= maxSamplePrograms) break;
    if (!samplePrograms.includes(ep.program)) {
      samplePrograms.push(ep.program);
    }
  }

  const rewardVariance = variance(rewards);

  return {
    numEpisodes: n,
    successRate: n === 0 ? 0 : episodes.filter((e) => e.success).length / n,
    meanReward: mean(rewards),
    rewardVariance,
    stdReward: Math.sqrt(rewardVariance),
    meanLength: mean(lengths),
    stdLength: Math.sqrt(variance(lengths)),
    outcomes,
    samplePrograms,
  };
}

/**
 * Compute rolling average for learning curve smoothing.
 */
export function computeRollingAverage(values: readonly number[], windowSize: number): number[] {
  const result: number[] = [];

  for (let i = 0; i < values.length; i++) {
    const start = Math.max(0, i - windowSize + 1);
    result.push(mean(values.slice(start, i + 1)));
  }

  return result;
}

export interface SampleEfficiency {
  meanAuc: number;
  meanEpisodesToThreshold: number;
  convergenceRate: number;
}

/**
 * Trapezoidal area under a curve with unit spacing.
 */
export function trapezoidArea(curve: readonly number[]): number {
  let area = 0;
  for (let i = 1; i < curve.length; i++) {
    area += (curve[i - 1] + curve[i]) / 2;
  }
  return area;
}

/**
 * Sample-efficiency summary over several training curves (e.g. rolling
 * success rates). Episodes-to-threshold counts the episodes needed to first
 * reach the threshold, or the curve length if it never does.
 */
export function computeSampleEfficiency(
  curves: readonly (readonly number[])[],
  threshold: number = 0.8
): SampleEfficiency {
  if (curves.length === 0) {
    return { meanAuc: 0, meanEpisodesToThreshold: 0, convergenceRate: 0 };
  }

  const aucs = curves.map(trapezoidArea);
  const episodesToThreshold = curves.map((curve) => {
    const index = curve.findIndex((v) => v >= threshold);
    return index === -1 ? curve.length : index + 1;
  });

  const meanEpisodes = mean(episodesToThreshold);
  return {
    meanAuc: mean(aucs),
    meanEpisodesToThreshold: meanEpisodes,
    convergenceRate: meanEpisodes > 0 ? 1 / meanEpisodes : 0,
  };
}

/**
 * Format metrics for display.
 */
export function formatMetrics(metrics: EvaluationMetrics): string {
  const outcomes = TERMINAL_REASONS.filter((r) => metrics.outcomes[r] > 0)
    .map((r) => `${r}=${metrics.outcomes[r]}`)
    .join(", ");

  return [
    `Episodes: ${metrics.numEpisodes}`,
    `Success Rate: ${(metrics.successRate * 100).toFixed(1)}%`,
    `Mean Reward: ${metrics.meanReward.toFixed(3)} ± ${metrics.stdReward.toFixed(3)}`,
    `Mean Length: ${metrics.meanLength.toFixed(1)} steps`,
    `Outcomes: ${outcomes || "none"}`,
  ].join("\n");
}

export interface MetricComparison {
  baseline: number;
  learned: number;
  improvement: number; // Percent change relative to |baseline|
}

/**
 * Compare two sets of metrics.
 */
export function compareMetrics(
  baseline: EvaluationMetrics,
  learned: EvaluationMetrics
): Record<"meanReward" | "successRate" | "meanLength", MetricComparison> {
  const compare = (b: number, l: number): MetricComparison => ({
    baseline: b,
    learned: l,
    improvement: b !== 0 ? ((l - b) / Math.abs(b)) * 100 : l > 0 ? 100 : 0,
  });

  return {
    meanReward: compare(baseline.meanReward, learned.meanReward),
    successRate: compare(baseline.successRate, learned.successRate),
    meanLength: compare(baseline.meanLength, learned.meanLength),
  };
}
