/**
 * Baseline Agent Tests
 */

import { RandomAgent } from "../baselines";
import { Evaluator } from "../../evaluation/evaluator";
import { DSLEnv } from "../../environment/gym-wrapper";
import { CorrectnessReward } from "../../environment/reward";
import { EchoExecutor } from "../../../lib/dsl/echo";
import { createSeededRng } from "../../../lib/utils/random";
import { ConfigurationError } from "../../errors";
import type { Observation } from "../../types";

const SPACES = { actionSpaceSize: 3, featureDimension: 4 };
const OBS: Observation = { tokenIds: [], progress: 0, context: [], features: [0, 0, 0, 1] };

describe("RandomAgent", () => {
  it("should pick actions from the random source", () => {
    expect(new RandomAgent(SPACES, () => 0).act(OBS)).toBe(0);
    expect(new RandomAgent(SPACES, () => 0.5).act(OBS)).toBe(1);
    expect(new RandomAgent(SPACES, () => 0.999).act(OBS)).toBe(2);
  });

  it("should ignore the exploration flag", () => {
    const agent = new RandomAgent(SPACES, () => 0.7);
    expect(agent.act(OBS, false)).toBe(2);
  });

  it("should only count episodes when learning", () => {
    const agent = new RandomAgent(SPACES);
    agent.learn(OBS, 0, 10, OBS, false);
    expect(agent.episodesTrained).toBe(0);

    agent.learn(OBS, 0, 10, OBS, true);
    expect(agent.episodesTrained).toBe(1);

    agent.reset();
    expect(agent.episodesTrained).toBe(0);
  });

  it("should reject observations of the wrong dimension", () => {
    expect(() => new RandomAgent(SPACES).act({ ...OBS, features: [1] })).toThrow(ConfigurationError);
  });

  it("should round-trip its counters", () => {
    const agent = new RandomAgent(SPACES);
    agent.learn(OBS, 0, 0, OBS, true);
    agent.learn(OBS, 0, 0, OBS, true);

    const restored = new RandomAgent(SPACES);
    restored.load(agent.save());
    expect(restored.episodesTrained).toBe(2);
  });

  it("should succeed about as often as chance on a three-token task", () => {
    const env = new DSLEnv(
      { id: "t1", dslName: "echo", source: "42", expectedOutput: "42" },
      ["4", "2", "END"],
      new EchoExecutor(),
      new CorrectnessReward(),
      { maxSteps: 3 }
    );
    const agent = new RandomAgent(env.spaces, createSeededRng(1));
    const metrics = new Evaluator().evaluateAgent(agent, env, 1000);

    // "4", "2", END is the only winning sequence of 27
    expect(Math.abs(metrics.successRate - 1 / 27)).toBeLessThan(0.02);
  });
});
