/**
 * Evaluator
 *
 * Runs frozen agents (exploration off, no learning) and aggregates metrics.
 */

import type { Agent, EpisodeRecord, EvaluationMetrics } from "../types";
import type { DSLEnv } from "../environment/gym-wrapper";
import { ConfigurationError } from "../errors";
import { computeMetrics, formatMetrics } from "./metrics";
import { runEpisode } from "./runner";

/**
 * An environment, or a factory producing a fresh one per agent.
 */
export type EnvironmentSource = DSLEnv | (() => DSLEnv);

export interface EvaluatorOptions {
  verbose?: boolean;
}

export class Evaluator {
  private readonly verbose: boolean;

  constructor(options: EvaluatorOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  /**
   * Run nEpisodes greedy episodes and return the records.
   */
  runEpisodes(agent: Agent, env: DSLEnv, nEpisodes: number): EpisodeRecord[] {
    if (!Number.isInteger(nEpisodes) || nEpisodes < 0) {
      throw new ConfigurationError(`nEpisodes must be a non-negative integer, got ${nEpisodes}`);
    }

    const records: EpisodeRecord[] = [];
    for (let i = 1; i <= nEpisodes; i++) {
      records.push(runEpisode(env, agent, false, i));
    }
    return records;
  }

  /**
   * Evaluate an agent. Zero episodes give zeroed metrics.
   */
  evaluateAgent(agent: Agent, env: DSLEnv, nEpisodes: number): EvaluationMetrics {
    const metrics = computeMetrics(this.runEpisodes(agent, env, nEpisodes));

    if (this.verbose) {
      console.log(`[Evaluator] ${agent.type} on ${env.task.dslName}/${env.task.id}`);
      console.log(formatMetrics(metrics));
    }

    return metrics;
  }

  /**
   * Evaluate several agents on the same task. Each agent gets its own
   * environment when a factory is given.
   */
  compareAgents(
    agents: ReadonlyMap<string, Agent>,
    envSource: EnvironmentSource,
    nEpisodes: number
  ): Map<string, EvaluationMetrics> {
    const results = new Map<string, EvaluationMetrics>();

    for (const [name, agent] of Array.from(agents.entries())) {
      const env = typeof envSource === "function" ? envSource() : envSource;
      if (this.verbose) {
        console.log(`\n=== Evaluating ${name} ===`);
      }
      results.set(name, this.evaluateAgent(agent, env, nEpisodes));
    }

    return results;
  }
}
