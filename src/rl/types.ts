/**
 * Core RL types for the DSL program-synthesis gym.
 *
 * These types define the observation/action/reward interface that agents
 * interact with. The environment is agnostic to the DSL being generated: it
 * only sees tokens, an executor adapter and an expected output.
 */

// ============ Tasks & Vocabulary ============

/**
 * Ordered, fixed set of emittable tokens for one DSL instance.
 * Action indices address this sequence.
 */
export type Vocabulary = readonly string[];

/**
 * A single program-synthesis task.
 */
export interface TaskDescriptor {
  readonly id: string;
  readonly dslName: string;
  readonly source: string; // Reference program the expected output came from
  readonly expectedOutput: string;
  readonly description?: string;
}

// ============ Execution ============

/**
 * Result of handing a candidate program to an executor adapter.
 */
export interface ExecutionResult {
  success: boolean;
  output: string | null;
  error: string | null;
}

/**
 * Narrow interface onto a DSL interpreter.
 */
export interface ExecutorAdapter {
  readonly name: string;
  execute(program: string): ExecutionResult;
  /** Similarity of two outputs in [0, 1]. */
  similarity(a: string, b: string): number;
}

/**
 * What the environment learned from executing (or not) the current program.
 */
export interface ExecutionOutcome {
  attempted: boolean;
  success: boolean;
  matched: boolean; // Trimmed output equals trimmed expected output
  output: string | null;
  error: string | null;
  similarity: number; // 0 unless execution succeeded
}

// ============ Episode State ============

/**
 * Reasons for episode termination.
 */
export type TerminalReason =
  | "SUCCESS"
  | "MAX_STEPS"
  | "NATURAL_STOP"
  | "INVALID_ACTION";

/**
 * Mutable per-episode state owned by one environment.
 * Snapshots handed out are deep copies.
 */
export interface EpisodeState {
  task: TaskDescriptor;
  tokens: string[]; // Emitted tokens, including the end token if emitted
  actions: number[]; // Action ids of emitted tokens
  stepCount: number; // Includes steps spent on invalid actions
  done: boolean;
  terminalReason: TerminalReason | null;
  lastSimilarity: number;
}

/**
 * Observation seen by agents.
 */
export interface Observation {
  tokenIds: number[]; // Last N action ids, most recent first, padded with -1
  progress: number; // stepCount / maxSteps
  context: number[]; // [emitted / maxSteps, last similarity]
  features: number[]; // Fixed-length encoding for linear agents
}

/**
 * Sizes an agent needs to allocate its parameters.
 */
export interface SpaceSpec {
  actionSpaceSize: number;
  featureDimension: number;
}

// ============ Environment Interface ============

/**
 * Diagnostic information from a step.
 */
export interface StepInfo {
  step: number;
  token: string | null; // null for an invalid action
  invalidAction: boolean;
  program: string;
  executionAttempted: boolean;
  executionSucceeded: boolean;
  output: string | null;
  error: string | null;
  similarity: number;
  success: boolean;
  terminalReason?: TerminalReason;
}

/**
 * Result of taking a step in the environment.
 */
export interface StepResult {
  observation: Observation;
  reward: number;
  done: boolean;
  info: StepInfo;
}

// ============ Trajectory ============

/**
 * A single transition in the environment.
 */
export interface Transition {
  observation: Observation;
  action: number;
  reward: number;
  nextObservation: Observation;
  done: boolean;
  info: StepInfo;
}

/**
 * The transitions of the current (or last) episode.
 */
export interface Trajectory {
  transitions: Transition[];
  totalReturn: number;
  length: number;
  outcome: TerminalReason | null;
  program: string;
}

// ============ Reward ============

/**
 * Pure reward strategy: identical inputs give identical outputs.
 */
export interface RewardFunction {
  readonly name: string;
  compute(
    state: Readonly<EpisodeState>,
    action: number,
    execution: ExecutionOutcome,
    expectedOutput: string
  ): number;
}

/**
 * Configuration for the correctness-shaped reward.
 */
export interface CorrectnessRewardConfig {
  successReward: number;
  stepPenalty: number;
  errorPenalty: number;
  partialCreditWeight: number;
}

export const DEFAULT_CORRECTNESS_REWARD_CONFIG: CorrectnessRewardConfig = {
  successReward: 10.0,
  stepPenalty: -0.1,
  errorPenalty: -1.0,
  partialCreditWeight: 2.0,
};

/**
 * Configuration for the efficiency-shaped reward.
 * Non-matching steps fall back to the correctness terms.
 */
export interface EfficiencyRewardConfig extends CorrectnessRewardConfig {
  targetLength: number;
  efficiencyBonus: number;
  lengthPenalty: number;
}

export const DEFAULT_EFFICIENCY_REWARD_CONFIG: EfficiencyRewardConfig = {
  ...DEFAULT_CORRECTNESS_REWARD_CONFIG,
  successReward: 20.0,
  targetLength: 20,
  efficiencyBonus: 5.0,
  lengthPenalty: 0.1,
};

export type RewardName = "correctness" | "efficiency";

// ============ Agent Interface ============

export type AgentType = "random" | "qlearning" | "policy_gradient";

/**
 * Common interface for all agents.
 */
export interface Agent {
  readonly type: AgentType;
  readonly episodesTrained: number;

  /**
   * Select an action index. With explore=false the choice is deterministic.
   */
  act(observation: Observation, explore?: boolean): number;

  /**
   * Called before the first step of a training episode. Drops any state left
   * by an episode that never reached its terminal step.
   */
  startEpisode(): void;

  /**
   * Update internal parameters from one transition.
   */
  learn(
    observation: Observation,
    action: number,
    reward: number,
    nextObservation: Observation,
    done: boolean
  ): void;

  /**
   * Serialize parameters to JSON.
   */
  save(): string;

  /**
   * Restore parameters from JSON produced by save().
   */
  load(data: string): void;

  /**
   * Reset parameters to their initial state.
   */
  reset(): void;

  /**
   * Hyperparameters and counters for logging.
   */
  describe(): Record<string, number | string>;
}

// ============ Agent Configuration ============

/**
 * Configuration for linear Q-learning.
 */
export interface QLearningConfig {
  learningRate: number;
  gamma: number; // Discount factor, (0, 1]
  epsilon: number; // Initial exploration rate
  epsilonDecay: number; // Multiplied in after each episode
  epsilonMin: number;
  tdErrorClip: number; // Bound on |target - Q| per update
  weightInit: number; // Scale of random initial weights
}

export const DEFAULT_QLEARNING_CONFIG: QLearningConfig = {
  learningRate: 0.1,
  gamma: 0.95,
  epsilon: 1.0,
  epsilonDecay: 0.995,
  epsilonMin: 0.05,
  tdErrorClip: 10,
  weightInit: 0,
};

/**
 * Configuration for REINFORCE.
 */
export interface PolicyGradientConfig {
  learningRate: number;
  gamma: number;
  baselineMomentum: number; // EMA momentum for the return baseline, [0, 1)
  gradientClip: number; // Bound on |advantage| per step
  weightInit: number;
}

export const DEFAULT_POLICY_GRADIENT_CONFIG: PolicyGradientConfig = {
  learningRate: 0.05,
  gamma: 0.99,
  baselineMomentum: 0.9,
  gradientClip: 5,
  weightInit: 0.01,
};

// ============ Environment Configuration ============

export type ExecutionPolicy = "on_stop" | "every_step";
export type InvalidActionPolicy = "continue" | "terminate";

/**
 * Configuration for the DSL environment.
 */
export interface EnvironmentConfig {
  maxSteps: number;
  endToken: string | null; // null disables natural stop
  observationLength: number; // Window of recent tokens in the observation
  separator: string; // Joins tokens into program text
  executionPolicy: ExecutionPolicy;
  invalidActionPolicy: InvalidActionPolicy;
}

export const DEFAULT_ENV_CONFIG: EnvironmentConfig = {
  maxSteps: 20,
  endToken: "END",
  observationLength: 4,
  separator: "",
  executionPolicy: "on_stop",
  invalidActionPolicy: "continue",
};

// ============ Evaluation Metrics ============

/**
 * Per-episode training record.
 */
export interface EpisodeRecord {
  episode: number;
  totalReward: number;
  success: boolean;
  steps: number;
  terminalReason: TerminalReason | null;
  program: string;
}

/**
 * Aggregate metrics over evaluation episodes.
 */
export interface EvaluationMetrics {
  numEpisodes: number;
  successRate: number;
  meanReward: number;
  rewardVariance: number;
  stdReward: number;
  meanLength: number;
  stdLength: number;
  outcomes: Record<TerminalReason, number>;
  samplePrograms: string[];
}

/**
 * Evaluation recorded during training.
 */
export interface EvaluationPoint {
  episode: number;
  metrics: EvaluationMetrics;
}

/**
 * Aggregate statistics returned by Trainer.train().
 */
export interface TrainingResult {
  totalEpisodes: number;
  elapsedMs: number;
  rollingSuccessRate: number;
  averageReward: number;
  lastEvaluation: EvaluationMetrics | null;
  evaluations: EvaluationPoint[];
  checkpoints: string[];
  checkpointFailures: Array<{ episode: number; key: string; error: string }>;
  history: readonly EpisodeRecord[];
}

// ============ Checkpoints ============

/**
 * Durable storage for serialized agent parameters.
 */
export interface CheckpointStore {
  save(key: string, payload: string): void;
  load(key: string): string;
  list(): string[];
}
