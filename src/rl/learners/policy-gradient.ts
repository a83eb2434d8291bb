/**
 * Policy-Gradient (REINFORCE) Agent
 *
 * A linear softmax policy trained with Monte-Carlo returns. Transitions are
 * buffered for the episode; at the terminal step the discounted return of
 * every step, minus a running baseline, scales the log-likelihood gradient.
 *
 * The baseline is an exponential moving average of episode returns. The
 * first completed episode seeds it directly.
 */

import type { Observation, PolicyGradientConfig, SpaceSpec } from "../types";
import { DEFAULT_POLICY_GRADIENT_CONFIG } from "../types";
import {
  BaseAgent,
  argmax,
  clip,
  dotProduct,
  initMatrix,
  requireInRange,
  requireKnownKeys,
  sampleCategorical,
  softmax,
} from "./base";
import type { RandomSource } from "../../lib/utils/random";

interface BufferedStep {
  features: number[];
  action: number;
  reward: number;
}

export function validatePolicyGradientConfig(config: PolicyGradientConfig): void {
  requireInRange(config.learningRate, "learningRate", 0, Infinity, { minExclusive: true, maxExclusive: true });
  requireInRange(config.gamma, "gamma", 0, 1, { minExclusive: true });
  requireInRange(config.baselineMomentum, "baselineMomentum", 0, 1, { maxExclusive: true });
  requireInRange(config.gradientClip, "gradientClip", 0, Infinity, { minExclusive: true });
  requireInRange(config.weightInit, "weightInit", 0, Infinity, { maxExclusive: true });
}

/**
 * Discounted return at every step: G_t = r_t + gamma * G_{t+1}.
 */
export function discountedReturns(rewards: readonly number[], gamma: number): number[] {
  const returns: number[] = new Array(rewards.length).fill(0);
  let g = 0;
  for (let t = rewards.length - 1; t >= 0; t--) {
    g = rewards[t] + gamma * g;
    returns[t] = g;
  }
  return returns;
}

export class PolicyGradientAgent extends BaseAgent {
  readonly type = "policy_gradient" as const;

  private config: PolicyGradientConfig;
  private weights: number[][]; // One row of logit weights per action
  private baseline: number = 0;
  private baselineInitialized: boolean = false;
  private buffer: BufferedStep[] = [];

  constructor(
    spaces: SpaceSpec,
    config: Partial<PolicyGradientConfig> = {},
    random?: RandomSource
  ) {
    super(spaces, random);
    requireKnownKeys(config, DEFAULT_POLICY_GRADIENT_CONFIG, this.type);
    this.config = { ...DEFAULT_POLICY_GRADIENT_CONFIG, ...config };
    validatePolicyGradientConfig(this.config);
    this.weights = this.initialWeights();
  }

  private initialWeights(): number[][] {
    return initMatrix(this.actionSpaceSize, this.featureDimension, this.config.weightInit, this.random);
  }

  private probabilitiesFor(features: readonly number[]): number[] {
    return softmax(this.weights.map((w) => dotProduct(w, features)));
  }

  /**
   * Softmax policy over actions for an observation.
   */
  actionProbabilities(observation: Observation): number[] {
    return this.probabilitiesFor(this.featuresOf(observation));
  }

  /**
   * Sample from the policy; explore=false takes its mode.
   */
  act(observation: Observation, explore: boolean = true): number {
    const probs = this.actionProbabilities(observation);
    return explore ? sampleCategorical(probs, this.random) : argmax(probs);
  }

  /**
   * Discard transitions of an episode that was cut short.
   */
  startEpisode(): void {
    this.buffer = [];
  }

  /**
   * Buffer the step; update the policy when the episode ends.
   */
  learn(
    observation: Observation,
    action: number,
    reward: number,
    _nextObservation: Observation,
    done: boolean
  ): void {
    this.checkAction(action);
    this.buffer.push({ features: [...this.featuresOf(observation)], action, reward });

    if (done) {
      this.updatePolicy();
      this.buffer = [];
      this.incrementEpisode();
    }
  }

  /**
   * One REINFORCE ascent step from the buffered episode.
   */
  private updatePolicy(): void {
    if (this.buffer.length === 0) return;

    const returns = discountedReturns(
      this.buffer.map((s) => s.reward),
      this.config.gamma
    );

    // Gradient summed over the episode with the pre-update policy
    const gradient = initMatrix(this.actionSpaceSize, this.featureDimension, 0, this.random);
    this.buffer.forEach((step, t) => {
      const advantage = clip(returns[t] - this.baseline, this.config.gradientClip);
      if (advantage === 0) return;

      const probs = this.probabilitiesFor(step.features);
      for (let a = 0; a < this.actionSpaceSize; a++) {
        const coeff = advantage * ((a === step.action ? 1 : 0) - probs[a]);
        const row = gradient[a];
        for (let i = 0; i < this.featureDimension; i++) {
          row[i] += coeff * step.features[i];
        }
      }
    });

    for (let a = 0; a < this.actionSpaceSize; a++) {
      for (let i = 0; i < this.featureDimension; i++) {
        this.weights[a][i] += this.config.learningRate * gradient[a][i];
      }
    }

    const episodeReturn = this.buffer.reduce((sum, s) => sum + s.reward, 0);
    this.updateBaseline(episodeReturn);
  }

  private updateBaseline(episodeReturn: number): void {
    if (!this.baselineInitialized) {
      this.baseline = episodeReturn;
      this.baselineInitialized = true;
      return;
    }
    const m = this.config.baselineMomentum;
    this.baseline = m * this.baseline + (1 - m) * episodeReturn;
  }

  get currentBaseline(): number {
    return this.baseline;
  }

  /**
   * Steps buffered for the episode in progress.
   */
  get bufferedSteps(): number {
    return this.buffer.length;
  }

  getWeights(): number[][] {
    return this.weights.map((row) => [...row]);
  }

  getConfig(): PolicyGradientConfig {
    return { ...this.config };
  }

  save(): string {
    return JSON.stringify({
      ...this.baseState(),
      config: this.config,
      weights: this.weights,
      state: {
        baseline: this.baseline,
        baselineInitialized: this.baselineInitialized ? 1 : 0,
      },
    });
  }

  load(data: string): void {
    const saved = this.parseOwnState(data);
    requireKnownKeys(saved.config, DEFAULT_POLICY_GRADIENT_CONFIG, this.type);
    const config: PolicyGradientConfig = { ...DEFAULT_POLICY_GRADIENT_CONFIG, ...saved.config };
    validatePolicyGradientConfig(config);

    this.config = config;
    this.weights = this.checkWeights(saved.weights);
    this.baseline = saved.state.baseline ?? 0;
    this.baselineInitialized = saved.state.baselineInitialized === 1;
    this.buffer = [];
    this.restoreCounters(saved);
  }

  reset(): void {
    this.weights = this.initialWeights();
    this.baseline = 0;
    this.baselineInitialized = false;
    this.buffer = [];
    this.episodeCount = 0;
    this.lastUpdated = new Date();
  }

  describe(): Record<string, number | string> {
    return {
      type: this.type,
      learningRate: this.config.learningRate,
      gamma: this.config.gamma,
      baseline: this.baseline,
      episodesTrained: this.episodeCount,
    };
  }
}
