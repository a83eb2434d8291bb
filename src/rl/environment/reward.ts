/**
 * Reward Functions
 *
 * Pure strategies over (previous state, action, execution outcome, expected
 * output). They keep no per-episode tracker: two calls with the same inputs
 * return the same number.
 */

import type {
  EpisodeState,
  ExecutionOutcome,
  RewardFunction,
  RewardName,
  CorrectnessRewardConfig,
  EfficiencyRewardConfig,
} from "../types";
import {
  DEFAULT_CORRECTNESS_REWARD_CONFIG,
  DEFAULT_EFFICIENCY_REWARD_CONFIG,
} from "../types";
import { ConfigurationError } from "../errors";

function requireFinite(config: object, name: string): void {
  for (const [key, value] of Object.entries(config)) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigurationError(`${name}.${key} must be a finite number`);
    }
  }
}

/**
 * Correctness-shaped reward.
 *
 * Exact match earns the success reward. Any other step costs the step
 * penalty, plus the error penalty when the program failed (or the action was
 * invalid), or partial credit proportional to output similarity when it ran.
 */
export class CorrectnessReward implements RewardFunction {
  readonly name: RewardName = "correctness";
  private readonly config: CorrectnessRewardConfig;

  constructor(config: Partial<CorrectnessRewardConfig> = {}) {
    this.config = { ...DEFAULT_CORRECTNESS_REWARD_CONFIG, ...config };
    requireFinite(this.config, "correctness");
    if (this.config.partialCreditWeight < 0) {
      throw new ConfigurationError("correctness.partialCreditWeight must be >= 0");
    }
  }

  compute(
    _state: Readonly<EpisodeState>,
    _action: number,
    execution: ExecutionOutcome,
    _expectedOutput: string
  ): number {
    if (execution.matched) {
      return this.config.successReward;
    }

    let reward = this.config.stepPenalty;
    if (execution.error !== null) {
      reward += this.config.errorPenalty;
    } else if (execution.attempted && execution.success && execution.output) {
      reward += execution.similarity * this.config.partialCreditWeight;
    }
    return reward;
  }

  getConfig(): CorrectnessRewardConfig {
    return { ...this.config };
  }
}

/**
 * Efficiency-shaped reward.
 *
 * A match earns the success reward plus a bonus that shrinks as the program
 * grows past the target length, minus a penalty linear in that excess.
 * Everything else is scored like CorrectnessReward.
 */
export class EfficiencyReward implements RewardFunction {
  readonly name: RewardName = "efficiency";
  private readonly config: EfficiencyRewardConfig;
  private readonly fallback: CorrectnessReward;

  constructor(config: Partial<EfficiencyRewardConfig> = {}) {
    this.config = { ...DEFAULT_EFFICIENCY_REWARD_CONFIG, ...config };
    requireFinite(this.config, "efficiency");
    if (!Number.isInteger(this.config.targetLength) || this.config.targetLength < 1) {
      throw new ConfigurationError("efficiency.targetLength must be a positive integer");
    }
    if (this.config.lengthPenalty < 0 || this.config.efficiencyBonus < 0) {
      throw new ConfigurationError("efficiency.lengthPenalty and efficiencyBonus must be >= 0");
    }
    this.fallback = new CorrectnessReward({
      successReward: this.config.successReward,
      stepPenalty: this.config.stepPenalty,
      errorPenalty: this.config.errorPenalty,
      partialCreditWeight: this.config.partialCreditWeight,
    });
  }

  compute(
    state: Readonly<EpisodeState>,
    action: number,
    execution: ExecutionOutcome,
    expectedOutput: string
  ): number {
    if (!execution.matched) {
      return this.fallback.compute(state, action, execution, expectedOutput);
    }

    // A match always follows a valid action, so the program grew by one
    const length = state.tokens.length + 1;
    const excess = Math.max(0, length - this.config.targetLength);

    return (
      this.config.successReward +
      this.config.efficiencyBonus / (1 + excess) -
      this.config.lengthPenalty * excess
    );
  }

  getConfig(): EfficiencyRewardConfig {
    return { ...this.config };
  }
}

/**
 * Create a reward function by name.
 */
export function createRewardFunction(
  name: string,
  options: Partial<EfficiencyRewardConfig> = {}
): RewardFunction {
  switch (name) {
    case "correctness": {
      const { successReward, stepPenalty, errorPenalty, partialCreditWeight } = options;
      return new CorrectnessReward({
        ...(successReward !== undefined && { successReward }),
        ...(stepPenalty !== undefined && { stepPenalty }),
        ...(errorPenalty !== undefined && { errorPenalty }),
        ...(partialCreditWeight !== undefined && { partialCreditWeight }),
      });
    }
    case "efficiency":
      return new EfficiencyReward(options);
    default:
      throw new ConfigurationError(`Unknown reward function: ${name}`);
  }
}
