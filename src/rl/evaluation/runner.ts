/**
 * Episode Runner
 *
 * Runs one episode of the observe / act / step / learn loop.
 */

import type { Agent, EpisodeRecord } from "../types";
import type { DSLEnv } from "../environment/gym-wrapper";

/**
 * Run a single episode. With train=false the agent acts greedily and
 * learn() is never called.
 */
export function runEpisode(
  env: DSLEnv,
  agent: Agent,
  train: boolean,
  episode: number
): EpisodeRecord {
  let observation = env.reset();
  if (train) {
    agent.startEpisode();
  }
  let totalReward = 0;
  let steps = 0;
  let success = false;

  while (!env.isDone()) {
    const action = agent.act(observation, train);
    const result = env.step(action);

    if (train) {
      agent.learn(observation, action, result.reward, result.observation, result.done);
    }

    totalReward += result.reward;
    success = result.info.success;
    observation = result.observation;
    steps++;
  }

  const trajectory = env.getTrajectory();
  return {
    episode,
    totalReward,
    success,
    steps,
    terminalReason: trajectory.outcome,
    program: trajectory.program,
  };
}

/**
 * Simple progress bar for console output.
 */
export function progressBar(current: number, total: number, width: number = 30): string {
  const percent = total > 0 ? current / total : 1;
  const filled = Math.round(width * percent);
  return `[${"=".repeat(filled)}${" ".repeat(width - filled)}] ${(percent * 100).toFixed(1)}%`;
}
