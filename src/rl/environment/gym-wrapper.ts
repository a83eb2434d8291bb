/**
 * Gym-style Environment Wrapper
 *
 * Provides reset() / step() over a token vocabulary for any DSL.
 * Integrates the executor adapter, observation encoder and reward function.
 */

import type {
  EpisodeState,
  EnvironmentConfig,
  ExecutionOutcome,
  ExecutorAdapter,
  Observation,
  RewardFunction,
  SpaceSpec,
  StepInfo,
  StepResult,
  TaskDescriptor,
  TerminalReason,
  Trajectory,
  Transition,
  Vocabulary,
} from "../types";
import { DEFAULT_ENV_CONFIG } from "../types";
import { ConfigurationError, EpisodeStateError } from "../errors";
import { encodeObservation, getFeatureDimension, type EncoderSpec } from "./observation";
import { CorrectnessReward } from "./reward";
import type { TaskCatalog } from "../../lib/dsl/catalog";
import { createExecutor } from "../../lib/dsl/registry";

/**
 * Validate and complete an environment configuration.
 */
export function resolveEnvironmentConfig(
  vocabulary: Vocabulary,
  config: Partial<EnvironmentConfig> = {}
): EnvironmentConfig {
  const resolved: EnvironmentConfig = { ...DEFAULT_ENV_CONFIG, ...config };

  if (vocabulary.length === 0) {
    throw new ConfigurationError("Vocabulary must not be empty");
  }
  if (new Set(vocabulary).size !== vocabulary.length) {
    throw new ConfigurationError("Vocabulary tokens must be unique");
  }
  if (!Number.isInteger(resolved.maxSteps) || resolved.maxSteps < 1) {
    throw new ConfigurationError(`maxSteps must be a positive integer, got ${resolved.maxSteps}`);
  }
  if (!Number.isInteger(resolved.observationLength) || resolved.observationLength < 1) {
    throw new ConfigurationError(
      `observationLength must be a positive integer, got ${resolved.observationLength}`
    );
  }
  if (resolved.endToken !== null && !vocabulary.includes(resolved.endToken)) {
    throw new ConfigurationError(`End token '${resolved.endToken}' is not in the vocabulary`);
  }
  if (resolved.executionPolicy !== "on_stop" && resolved.executionPolicy !== "every_step") {
    throw new ConfigurationError(`Unknown execution policy: ${String(resolved.executionPolicy)}`);
  }
  if (
    resolved.invalidActionPolicy !== "continue" &&
    resolved.invalidActionPolicy !== "terminate"
  ) {
    throw new ConfigurationError(
      `Unknown invalid-action policy: ${String(resolved.invalidActionPolicy)}`
    );
  }

  return resolved;
}

function createEpisodeState(task: TaskDescriptor): EpisodeState {
  return {
    task,
    tokens: [],
    actions: [],
    stepCount: 0,
    done: false,
    terminalReason: null,
    lastSimilarity: 0,
  };
}

function snapshotState(state: EpisodeState): EpisodeState {
  return {
    ...state,
    tokens: [...state.tokens],
    actions: [...state.actions],
  };
}

/**
 * Gym-style RL environment that builds a program one token at a time.
 */
export class DSLEnv {
  private readonly config: EnvironmentConfig;
  private readonly taskDescriptor: TaskDescriptor;
  private readonly vocab: Vocabulary;
  private readonly executor: ExecutorAdapter;
  private readonly rewardFn: RewardFunction;
  private readonly encoderSpec: EncoderSpec;

  private state: EpisodeState;
  private trajectory: Transition[];

  constructor(
    task: TaskDescriptor,
    vocabulary: Vocabulary,
    executor: ExecutorAdapter,
    rewardFn: RewardFunction = new CorrectnessReward(),
    config: Partial<EnvironmentConfig> = {}
  ) {
    this.config = resolveEnvironmentConfig(vocabulary, config);
    this.taskDescriptor = task;
    this.vocab = Object.freeze([...vocabulary]);
    this.executor = executor;
    this.rewardFn = rewardFn;
    this.encoderSpec = {
      vocabularySize: this.vocab.length,
      observationLength: this.config.observationLength,
      maxSteps: this.config.maxSteps,
    };

    this.state = createEpisodeState(task);
    this.trajectory = [];
  }

  get actionSpaceSize(): number {
    return this.vocab.length;
  }

  get featureDimension(): number {
    return getFeatureDimension(this.encoderSpec);
  }

  get spaces(): SpaceSpec {
    return { actionSpaceSize: this.actionSpaceSize, featureDimension: this.featureDimension };
  }

  get vocabulary(): Vocabulary {
    return this.vocab;
  }

  get maxSteps(): number {
    return this.config.maxSteps;
  }

  get task(): TaskDescriptor {
    return this.taskDescriptor;
  }

  get rewardName(): string {
    return this.rewardFn.name;
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }

  /**
   * Reset environment for a new episode.
   */
  reset(): Observation {
    this.state = createEpisodeState(this.taskDescriptor);
    this.trajectory = [];
    return this.observe();
  }

  /**
   * Take a step in the environment.
   *
   * An out-of-range action is not a fault: it consumes a step, emits nothing
   * and is scored like an execution error.
   */
  step(action: number): StepResult {
    if (this.state.done) {
      throw new EpisodeStateError("Episode is done. Call reset() to start a new episode.");
    }

    const prevState = snapshotState(this.state);
    const prevObservation = this.observe();
    const invalidAction = !this.isValidAction(action);

    this.state.stepCount++;

    let token: string | null = null;
    let execution: ExecutionOutcome;
    let isStop = false;

    if (invalidAction) {
      execution = {
        attempted: false,
        success: false,
        matched: false,
        output: null,
        error: `invalid action ${action}: expected an index in [0, ${this.actionSpaceSize})`,
        similarity: 0,
      };
    } else {
      token = this.vocab[action];
      this.state.tokens.push(token);
      this.state.actions.push(action);
      isStop = token === this.config.endToken;
      execution = this.maybeExecute(isStop);
    }

    this.state.lastSimilarity = execution.similarity;

    // Success is checked before max steps, max steps before natural stop
    let terminalReason: TerminalReason | null = null;
    if (execution.matched) {
      terminalReason = "SUCCESS";
    } else if (this.state.stepCount >= this.config.maxSteps) {
      terminalReason = "MAX_STEPS";
    } else if (isStop) {
      terminalReason = "NATURAL_STOP";
    } else if (invalidAction && this.config.invalidActionPolicy === "terminate") {
      terminalReason = "INVALID_ACTION";
    }

    this.state.done = terminalReason !== null;
    this.state.terminalReason = terminalReason;

    const reward = this.rewardFn.compute(
      prevState,
      action,
      execution,
      this.taskDescriptor.expectedOutput
    );

    const info: StepInfo = {
      step: this.state.stepCount,
      token,
      invalidAction,
      program: this.getProgram(),
      executionAttempted: execution.attempted,
      executionSucceeded: execution.success,
      output: execution.output,
      error: execution.error,
      similarity: execution.similarity,
      success: execution.matched,
      ...(terminalReason && { terminalReason }),
    };

    const observation = this.observe();
    this.trajectory.push({
      observation: prevObservation,
      action,
      reward,
      nextObservation: observation,
      done: this.state.done,
      info,
    });

    return { observation, reward, done: this.state.done, info };
  }

  /**
   * Run the current program if the execution policy calls for it.
   */
  private maybeExecute(isStop: boolean): ExecutionOutcome {
    const program = this.getProgram();
    const shouldExecute =
      program.trim().length > 0 &&
      (this.config.executionPolicy === "every_step" ||
        isStop ||
        this.state.stepCount >= this.config.maxSteps);

    if (!shouldExecute) {
      return {
        attempted: false,
        success: false,
        matched: false,
        output: null,
        error: null,
        similarity: 0,
      };
    }

    // Executor faults (as opposed to reported errors) propagate to the caller
    const result = this.executor.execute(program);
    const expected = this.taskDescriptor.expectedOutput;
    const output = result.success ? result.output : null;

    return {
      attempted: true,
      success: result.success,
      matched: output !== null && output.trim() === expected.trim(),
      output: result.output,
      error: result.success ? null : result.error ?? "execution failed",
      similarity: output !== null ? this.executor.similarity(output, expected) : 0,
    };
  }

  private isValidAction(action: number): boolean {
    return Number.isInteger(action) && action >= 0 && action < this.vocab.length;
  }

  private observe(): Observation {
    return encodeObservation(this.state, this.encoderSpec);
  }

  /**
   * Program text: emitted tokens without the end token.
   */
  getProgram(): string {
    const endToken = this.config.endToken;
    return this.state.tokens.filter((t) => t !== endToken).join(this.config.separator);
  }

  /**
   * Snapshot of the current episode state.
   */
  getState(): EpisodeState {
    return snapshotState(this.state);
  }

  /**
   * Transitions of the current episode.
   */
  getTrajectory(): Trajectory {
    const totalReturn = this.trajectory.reduce((sum, t) => sum + t.reward, 0);
    return {
      transitions: [...this.trajectory],
      totalReturn,
      length: this.trajectory.length,
      outcome: this.state.terminalReason,
      program: this.getProgram(),
    };
  }

  /**
   * Mask of valid actions. Every token is always emittable.
   */
  getActionMask(): number[] {
    return new Array(this.vocab.length).fill(1);
  }

  isDone(): boolean {
    return this.state.done;
  }

  /**
   * Human-readable view of the current episode.
   */
  render(): string {
    const status = this.state.terminalReason ? ` [${this.state.terminalReason}]` : "";
    return `Step ${this.state.stepCount}/${this.config.maxSteps}${status}\n${this.getProgram()}`;
  }
}

/**
 * Factory function to create an environment from a task catalog.
 */
export function makeEnvironment(
  catalog: TaskCatalog,
  dslName: string,
  taskId: string,
  maxSteps: number = DEFAULT_ENV_CONFIG.maxSteps,
  rewardFn: RewardFunction = new CorrectnessReward(),
  config: Partial<Omit<EnvironmentConfig, "maxSteps">> = {},
  executor: ExecutorAdapter = createExecutor(dslName)
): DSLEnv {
  const task = catalog.loadTask(dslName, taskId);
  const vocabulary = catalog.vocabularyFor(dslName);
  return new DSLEnv(task, vocabulary, executor, rewardFn, { ...config, maxSteps });
}
