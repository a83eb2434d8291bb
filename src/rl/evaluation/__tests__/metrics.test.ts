/**
 * Metrics Tests
 */

import {
  compareMetrics,
  computeMetrics,
  computeRollingAverage,
  computeSampleEfficiency,
  formatMetrics,
  trapezoidArea,
} from "../metrics";
import type { EpisodeRecord } from "../../types";

function record(overrides: Partial<EpisodeRecord>): EpisodeRecord {
  return {
    episode: 1,
    totalReward: 0,
    success: false,
    steps: 1,
    terminalReason: "NATURAL_STOP",
    program: "",
    ...overrides,
  };
}

const EPISODES = [
  record({ episode: 1, totalReward: 1, steps: 2, success: true, terminalReason: "SUCCESS", program: "42" }),
  record({ episode: 2, totalReward: 3, steps: 4, program: "42" }),
];

describe("computeMetrics", () => {
  it("should aggregate rewards, lengths and outcomes", () => {
    const metrics = computeMetrics(EPISODES);

    expect(metrics.numEpisodes).toBe(2);
    expect(metrics.successRate).toBe(0.5);
    expect(metrics.meanReward).toBe(2);
    expect(metrics.rewardVariance).toBe(1);
    expect(metrics.stdReward).toBe(1);
    expect(metrics.meanLength).toBe(3);
    expect(metrics.stdLength).toBe(1);
    expect(metrics.outcomes).toEqual({ SUCCESS: 1, MAX_STEPS: 0, NATURAL_STOP: 1, INVALID_ACTION: 0 });
    expect(metrics.samplePrograms).toEqual(["42"]);
  });

  it("should give zeros for no episodes", () => {
    const metrics = computeMetrics([]);

    expect(metrics.numEpisodes).toBe(0);
    expect(metrics.successRate).toBe(0);
    expect(metrics.meanReward).toBe(0);
    expect(metrics.stdReward).toBe(0);
    expect(metrics.samplePrograms).toEqual([]);
  });

  it("should cap the sample programs", () => {
    const many = ["a", "b", "a", "c"].map((program, i) => record({ episode: i + 1, program }));
    expect(computeMetrics(many, 2).samplePrograms).toEqual(["a", "b"]);
  });
});

describe("computeRollingAverage", () => {
  it("should average over a trailing window", () => {
    expect(computeRollingAverage([1, 2, 3, 4], 2)).toEqual([1, 1.5, 2.5, 3.5]);
  });
});

describe("computeSampleEfficiency", () => {
  it("should summarize curves", () => {
    const result = computeSampleEfficiency([
      [0, 0.5, 1],
      [0, 0, 0],
    ]);

    expect(result.meanAuc).toBe(0.5);
    expect(result.meanEpisodesToThreshold).toBe(3);
    expect(result.convergenceRate).toBeCloseTo(1 / 3);
  });

  it("should count episodes up to the first crossing", () => {
    expect(computeSampleEfficiency([[0.9, 0.1]], 0.8).meanEpisodesToThreshold).toBe(1);
    expect(trapezoidArea([2])).toBe(0);
  });

  it("should give zeros for no curves", () => {
    expect(computeSampleEfficiency([])).toEqual({
      meanAuc: 0,
      meanEpisodesToThreshold: 0,
      convergenceRate: 0,
    });
  });
});

describe("formatMetrics", () => {
  it("should render one line per figure", () => {
    expect(formatMetrics(computeMetrics(EPISODES))).toBe(
      [
        "Episodes: 2",
        "Success Rate: 50.0%",
        "Mean Reward: 2.000 ± 1.000",
        "Mean Length: 3.0 steps",
        "Outcomes: SUCCESS=1, NATURAL_STOP=1",
      ].join("\n")
    );
  });

  it("should say none without outcomes", () => {
    expect(formatMetrics(computeMetrics([]))).toContain("Outcomes: none");
  });
});

describe("compareMetrics", () => {
  it("should report percent improvements", () => {
    const baseline = computeMetrics([record({ totalReward: 2 })]);
    const learned = computeMetrics([record({ totalReward: 3, success: true, terminalReason: "SUCCESS" })]);
    const comparison = compareMetrics(baseline, learned);

    expect(comparison.meanReward).toEqual({ baseline: 2, learned: 3, improvement: 50 });
    expect(comparison.successRate.improvement).toBe(100);
    expect(comparison.meanLength.improvement).toBe(0);
  });
});
