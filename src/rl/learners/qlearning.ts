/**
 * Linear Q-Learning Agent
 *
 * Learns Q(state, action) = weights[action] · features(state) with one-step
 * temporal difference updates and epsilon-greedy exploration.
 */

import type { Observation, QLearningConfig, SpaceSpec } from "../types";
import { DEFAULT_QLEARNING_CONFIG } from "../types";
import { ConfigurationError } from "../errors";
import {
  BaseAgent,
  argmax,
  clip,
  dotProduct,
  epsilonGreedy,
  initMatrix,
  requireInRange,
  requireKnownKeys,
} from "./base";
import type { RandomSource } from "../../lib/utils/random";

/**
 * Validate a Q-learning configuration.
 */
export function validateQLearningConfig(config: QLearningConfig): void {
  requireInRange(config.learningRate, "learningRate", 0, Infinity, { minExclusive: true, maxExclusive: true });
  requireInRange(config.gamma, "gamma", 0, 1, { minExclusive: true });
  requireInRange(config.epsilon, "epsilon", 0, 1);
  requireInRange(config.epsilonDecay, "epsilonDecay", 0, 1, { minExclusive: true });
  requireInRange(config.epsilonMin, "epsilonMin", 0, 1);
  requireInRange(config.tdErrorClip, "tdErrorClip", 0, Infinity, { minExclusive: true });
  requireInRange(config.weightInit, "weightInit", 0, Infinity, { maxExclusive: true });
  if (config.epsilonMin > config.epsilon) {
    throw new ConfigurationError(
      `epsilonMin (${config.epsilonMin}) must not exceed epsilon (${config.epsilon})`
    );
  }
}

/**
 * Linear Q-learning agent.
 */
export class QLearningAgent extends BaseAgent {
  readonly type = "qlearning" as const;

  private config: QLearningConfig;
  private weights: number[][]; // One row per action
  private epsilon: number;

  constructor(
    spaces: SpaceSpec,
    config: Partial<QLearningConfig> = {},
    random?: RandomSource
  ) {
    super(spaces, random);
    requireKnownKeys(config, DEFAULT_QLEARNING_CONFIG, this.type);
    this.config = { ...DEFAULT_QLEARNING_CONFIG, ...config };
    validateQLearningConfig(this.config);
    this.epsilon = this.config.epsilon;
    this.weights = this.initialWeights();
  }

  private initialWeights(): number[][] {
    return initMatrix(this.actionSpaceSize, this.featureDimension, this.config.weightInit, this.random);
  }

  /**
   * Q-values of every action for an observation.
   */
  qValues(observation: Observation): number[] {
    const features = this.featuresOf(observation);
    return this.weights.map((w) => dotProduct(w, features));
  }

  /**
   * Select action using epsilon-greedy. explore=false is pure argmax.
   */
  act(observation: Observation, explore: boolean = true): number {
    const values = this.qValues(observation);
    if (!explore) {
      return argmax(values);
    }
    return epsilonGreedy(values, this.epsilon, this.random);
  }

  /**
   * TD update with a clipped error:
   * w[a] <- w[a] + lr * clip(r + gamma * max_a' Q(s',a') - Q(s,a)) * x(s)
   */
  learn(
    observation: Observation,
    action: number,
    reward: number,
    nextObservation: Observation,
    done: boolean
  ): void {
    this.checkAction(action);
    const features = this.featuresOf(observation);
    const row = this.weights[action];
    const currentQ = dotProduct(row, features);

    let target: number;
    if (done) {
      // Terminal state - no future reward
      target = reward;
    } else {
      target = reward + this.config.gamma * Math.max(...this.qValues(nextObservation));
    }

    const tdError = clip(target - currentQ, this.config.tdErrorClip);
    for (let i = 0; i < row.length; i++) {
      row[i] += this.config.learningRate * tdError * features[i];
    }

    if (done) {
      this.decayEpsilon();
      this.incrementEpisode();
    }
  }

  /**
   * Multiply epsilon by the decay factor, down to the floor.
   */
  decayEpsilon(): void {
    this.epsilon = Math.max(this.config.epsilonMin, this.epsilon * this.config.epsilonDecay);
  }

  get currentEpsilon(): number {
    return this.epsilon;
  }

  /**
   * Override exploration, e.g. when continuing a saved run.
   */
  setEpsilon(epsilon: number): void {
    requireInRange(epsilon, "epsilon", 0, 1);
    this.epsilon = epsilon;
  }

  /**
   * Copy of the weight matrix.
   */
  getWeights(): number[][] {
    return this.weights.map((row) => [...row]);
  }

  getConfig(): QLearningConfig {
    return { ...this.config };
  }

  save(): string {
    return JSON.stringify({
      ...this.baseState(),
      config: this.config,
      weights: this.weights,
      state: { epsilon: this.epsilon },
    });
  }

  load(data: string): void {
    const saved = this.parseOwnState(data);
    requireKnownKeys(saved.config, DEFAULT_QLEARNING_CONFIG, this.type);
    const config: QLearningConfig = { ...DEFAULT_QLEARNING_CONFIG, ...saved.config };
    validateQLearningConfig(config);

    this.config = config;
    this.weights = this.checkWeights(saved.weights);
    this.epsilon = saved.state.epsilon ?? config.epsilon;
    this.restoreCounters(saved);
  }

  reset(): void {
    this.weights = this.initialWeights();
    this.epsilon = this.config.epsilon;
    this.episodeCount = 0;
    this.lastUpdated = new Date();
  }

  describe(): Record<string, number | string> {
    return {
      type: this.type,
      learningRate: this.config.learningRate,
      gamma: this.config.gamma,
      epsilon: this.epsilon,
      episodesTrained: this.episodeCount,
    };
  }
}
