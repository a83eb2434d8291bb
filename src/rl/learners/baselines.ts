/**
 * Baseline Policies
 *
 * RandomAgent: uniform action selection. Establishes floor performance that
 * any working learner should beat.
 */

import type { Observation } from "../types";
import { BaseAgent } from "./base";
import { randomInt } from "../../lib/utils/random";

export class RandomAgent extends BaseAgent {
  readonly type = "random" as const;

  act(observation: Observation, _explore: boolean = true): number {
    this.featuresOf(observation);
    return randomInt(this.random, this.actionSpaceSize);
  }

  learn(
    _observation: Observation,
    _action: number,
    _reward: number,
    _nextObservation: Observation,
    done: boolean
  ): void {
    // No learning - just track episodes
    if (done) {
      this.incrementEpisode();
    }
  }

  save(): string {
    return JSON.stringify({
      ...this.baseState(),
      config: {},
      weights: [],
      state: {},
    });
  }

  load(data: string): void {
    this.restoreCounters(this.parseOwnState(data));
  }

  reset(): void {
    this.episodeCount = 0;
    this.lastUpdated = new Date();
  }

  describe(): Record<string, number | string> {
    return {
      type: this.type,
      actionSpaceSize: this.actionSpaceSize,
      episodesTrained: this.episodeCount,
    };
  }
}
