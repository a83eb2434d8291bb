/**
 * Base Agent and Utilities
 *
 * Shared selection rules, linear-model math and the abstract base class
 * every agent extends.
 */

import type { Agent, AgentType, Observation, SpaceSpec } from "../types";
import { ConfigurationError } from "../errors";
import { defaultRandom, randomInt, randomNormal, type RandomSource } from "../../lib/utils/random";

/**
 * Index of the largest value. Ties go to the lowest index.
 */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

/**
 * Epsilon-greedy action selection.
 * With probability epsilon, pick uniformly. Otherwise pick the argmax.
 */
export function epsilonGreedy(
  actionValues: readonly number[],
  epsilon: number,
  random: RandomSource = defaultRandom
): number {
  if (epsilon > 0 && random() < epsilon) {
    return randomInt(random, actionValues.length);
  }
  return argmax(actionValues);
}

/**
 * Softmax probabilities with temperature.
 */
export function softmax(logits: readonly number[], temperature: number = 1.0): number[] {
  const maxLogit = Math.max(...logits);

  // Subtract max for numerical stability
  const expValues = logits.map((v) => Math.exp((v - maxLogit) / temperature));
  const sumExp = expValues.reduce((a, b) => a + b, 0);
  return expValues.map((e) => e / sumExp);
}

/**
 * Sample an index from a categorical distribution.
 */
export function sampleCategorical(
  probs: readonly number[],
  random: RandomSource = defaultRandom
): number {
  const r = random();
  let cumulative = 0;

  for (let i = 0; i < probs.length; i++) {
    cumulative += probs[i];
    if (r < cumulative) {
      return i;
    }
  }

  // Rounding left the cumulative sum just below 1
  return probs.length - 1;
}

/**
 * Dot product of two equal-length arrays.
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function clip(value: number, bound: number): number {
  return Math.max(-bound, Math.min(bound, value));
}

/**
 * Weight matrix of shape rows x cols, zero or normal(0, scale).
 */
export function initMatrix(
  rows: number,
  cols: number,
  scale: number,
  random: RandomSource
): number[][] {
  const matrix: number[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: number[] = new Array(cols).fill(0);
    if (scale > 0) {
      for (let c = 0; c < cols; c++) {
        row[c] = randomNormal(random) * scale;
      }
    }
    matrix.push(row);
  }
  return matrix;
}

// ============ Validation ============

export function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

export function requireInRange(
  value: number,
  name: string,
  min: number,
  max: number,
  { minExclusive = false, maxExclusive = false } = {}
): void {
  const belowMin = minExclusive ? value <= min : value < min;
  const aboveMax = maxExclusive ? value >= max : value > max;
  if (!Number.isFinite(value) || belowMin || aboveMax) {
    const lo = minExclusive ? "(" : "[";
    const hi = maxExclusive ? ")" : "]";
    throw new ConfigurationError(`${name} must be in ${lo}${min}, ${max}${hi}, got ${value}`);
  }
}

/**
 * Reject configuration keys the agent does not define.
 */
export function requireKnownKeys(config: object, known: object, agentType: AgentType): void {
  const unknown = Object.keys(config).filter((key) => !Object.prototype.hasOwnProperty.call(known, key));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown ${agentType} config key(s): ${unknown.join(", ")}`);
  }
}

export function validateSpaces(spaces: SpaceSpec): void {
  requirePositiveInteger(spaces.actionSpaceSize, "actionSpaceSize");
  requirePositiveInteger(spaces.featureDimension, "featureDimension");
}

// ============ Serialization ============

/**
 * JSON shape written by save().
 */
export interface SavedAgentState {
  type: AgentType;
  actionSpaceSize: number;
  featureDimension: number;
  config: Record<string, number>;
  weights: number[][];
  state: Record<string, number>;
  episodesTrained: number;
  lastUpdated: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberRecord(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "number");
}

function isMatrix(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((v) => typeof v === "number"))
  );
}

function isAgentType(value: unknown): value is AgentType {
  return value === "random" || value === "qlearning" || value === "policy_gradient";
}

/**
 * Parse and validate a saved agent payload.
 */
export function parseSavedAgentState(data: string): SavedAgentState {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    throw new ConfigurationError("Agent state is not valid JSON");
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError("Agent state must be a JSON object");
  }

  const { type, actionSpaceSize, featureDimension, config, weights, state, episodesTrained, lastUpdated } =
    raw;

  if (
    !isAgentType(type) ||
    typeof actionSpaceSize !== "number" ||
    typeof featureDimension !== "number" ||
    !isNumberRecord(config) ||
    !isMatrix(weights) ||
    !isNumberRecord(state) ||
    typeof episodesTrained !== "number" ||
    typeof lastUpdated !== "string"
  ) {
    throw new ConfigurationError("Agent state is missing required fields");
  }

  return { type, actionSpaceSize, featureDimension, config, weights, state, episodesTrained, lastUpdated };
}

// ============ Base Class ============

/**
 * Abstract base class providing common functionality.
 */
export abstract class BaseAgent implements Agent {
  abstract readonly type: AgentType;

  protected readonly actionSpaceSize: number;
  protected readonly featureDimension: number;
  protected readonly random: RandomSource;
  protected episodeCount: number = 0;
  protected lastUpdated: Date = new Date();

  constructor(spaces: SpaceSpec, random: RandomSource = defaultRandom) {
    validateSpaces(spaces);
    this.actionSpaceSize = spaces.actionSpaceSize;
    this.featureDimension = spaces.featureDimension;
    this.random = random;
  }

  get episodesTrained(): number {
    return this.episodeCount;
  }

  abstract act(observation: Observation, explore?: boolean): number;

  startEpisode(): void {
    // Nothing carried across episodes by default
  }

  abstract learn(
    observation: Observation,
    action: number,
    reward: number,
    nextObservation: Observation,
    done: boolean
  ): void;

  abstract save(): string;

  abstract load(data: string): void;

  abstract reset(): void;

  abstract describe(): Record<string, number | string>;

  /**
   * Features of an observation, checked against the agent's dimension.
   */
  protected featuresOf(observation: Observation): number[] {
    if (observation.features.length !== this.featureDimension) {
      throw new ConfigurationError(
        `Feature vector has length ${observation.features.length}, agent expects ${this.featureDimension}`
      );
    }
    return observation.features;
  }

  protected checkAction(action: number): void {
    if (!Number.isInteger(action) || action < 0 || action >= this.actionSpaceSize) {
      throw new ConfigurationError(
        `Action ${action} is outside the agent's action space [0, ${this.actionSpaceSize})`
      );
    }
  }

  /**
   * Increment episode counter.
   */
  protected incrementEpisode(): void {
    this.episodeCount++;
    this.lastUpdated = new Date();
  }

  /**
   * Common fields of a saved state.
   */
  protected baseState(): Pick<
    SavedAgentState,
    "type" | "actionSpaceSize" | "featureDimension" | "episodesTrained" | "lastUpdated"
  > {
    return {
      type: this.type,
      actionSpaceSize: this.actionSpaceSize,
      featureDimension: this.featureDimension,
      episodesTrained: this.episodeCount,
      lastUpdated: this.lastUpdated.toISOString(),
    };
  }

  /**
   * Parse a payload and check it belongs to this agent's type and shape.
   */
  protected parseOwnState(data: string): SavedAgentState {
    const saved = parseSavedAgentState(data);
    if (saved.type !== this.type) {
      throw new ConfigurationError(`Cannot load ${saved.type} state into a ${this.type} agent`);
    }
    if (
      saved.actionSpaceSize !== this.actionSpaceSize ||
      saved.featureDimension !== this.featureDimension
    ) {
      throw new ConfigurationError(
        `Saved state has shape ${saved.actionSpaceSize}x${saved.featureDimension}, ` +
          `agent has ${this.actionSpaceSize}x${this.featureDimension}`
      );
    }
    return saved;
  }

  /**
   * Copy of a saved weight matrix, checked to be actions x features.
   */
  protected checkWeights(weights: number[][]): number[][] {
    const wellShaped =
      weights.length === this.actionSpaceSize &&
      weights.every((row) => row.length === this.featureDimension);
    if (!wellShaped) {
      throw new ConfigurationError(
        `Saved weights are not ${this.actionSpaceSize}x${this.featureDimension}`
      );
    }
    return weights.map((row) => [...row]);
  }

  protected restoreCounters(saved: SavedAgentState): void {
    this.episodeCount = saved.episodesTrained;
    this.lastUpdated = new Date(saved.lastUpdated);
  }
}
