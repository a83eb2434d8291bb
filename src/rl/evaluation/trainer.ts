/**
 * Trainer
 *
 * Drives training episodes against one environment/agent pair, evaluates
 * periodically, checkpoints agent parameters and keeps per-episode statistics.
 */

import { mkdirSync, renameSync, writeFileSync } from "fs";
import { join } from "path";
import type {
  Agent,
  CheckpointStore,
  EpisodeRecord,
  EvaluationMetrics,
  EvaluationPoint,
  TrainingResult,
} from "../types";
import type { DSLEnv } from "../environment/gym-wrapper";
import { CheckpointError, ConfigurationError, errorMessage } from "../errors";
import { FileCheckpointStore } from "../../lib/db/file-store";
import { Evaluator } from "./evaluator";
import { progressBar, runEpisode } from "./runner";

export const TRAINING_CURVE_FILE = "training_curve.json";
export const TRAINING_CURVE_KEY = "training_curve";

export interface TrainerOptions {
  checkpointStore?: CheckpointStore; // Defaults to JSON files under <logDir>/checkpoints
  evaluator?: Evaluator;
  rollingWindow?: number; // K for the rolling success rate
  evalEpisodes?: number; // Episodes per evaluation pass
  verbose?: boolean;
  onEpisode?: (record: EpisodeRecord, evaluation?: EvaluationMetrics) => void;
  stopOnCheckpointError?: boolean;
}

/**
 * Shape of training_curve.json.
 */
export interface TrainingCurve {
  rewards: number[];
  lengths: number[];
  successes: number[]; // 1 for a successful episode, else 0
}

export function checkpointKey(episode: number): string {
  return `checkpoint_ep${episode}`;
}

export class Trainer {
  private readonly env: DSLEnv;
  private readonly agent: Agent;
  private readonly logDir: string;
  private readonly store: CheckpointStore;
  private readonly evaluator: Evaluator;
  private readonly rollingWindow: number;
  private readonly evalEpisodes: number;
  private readonly verbose: boolean;
  private readonly onEpisode?: TrainerOptions["onEpisode"];
  private readonly stopOnCheckpointError: boolean;

  // Append-only
  private readonly history: EpisodeRecord[] = [];
  private readonly evaluations: EvaluationPoint[] = [];
  private readonly checkpoints: string[] = [];
  private readonly checkpointFailures: TrainingResult["checkpointFailures"] = [];

  constructor(env: DSLEnv, agent: Agent, logDir: string, options: TrainerOptions = {}) {
    this.env = env;
    this.agent = agent;
    this.logDir = logDir;
    this.store = options.checkpointStore ?? new FileCheckpointStore(join(logDir, "checkpoints"));
    this.evaluator = options.evaluator ?? new Evaluator();
    this.rollingWindow = options.rollingWindow ?? 100;
    this.evalEpisodes = options.evalEpisodes ?? 10;
    this.verbose = options.verbose ?? true;
    this.onEpisode = options.onEpisode;
    this.stopOnCheckpointError = options.stopOnCheckpointError ?? false;

    if (!Number.isInteger(this.rollingWindow) || this.rollingWindow < 1) {
      throw new ConfigurationError(`rollingWindow must be a positive integer, got ${this.rollingWindow}`);
    }
    if (!Number.isInteger(this.evalEpisodes) || this.evalEpisodes < 0) {
      throw new ConfigurationError(`evalEpisodes must be a non-negative integer, got ${this.evalEpisodes}`);
    }
  }

  /**
   * Train for numEpisodes more episodes. evalEvery / saveEvery are integers;
   * values <= 0 disable periodic evaluation / checkpointing. Episode numbers continue across calls.
   */
  train(numEpisodes: number, evalEvery: number = 100, saveEvery: number = 500): TrainingResult {
    if (!Number.isInteger(numEpisodes) || numEpisodes < 0) {
      throw new ConfigurationError(`numEpisodes must be a non-negative integer, got ${numEpisodes}`);
    }
    if (!Number.isInteger(evalEvery)) {
      throw new ConfigurationError(`evalEvery must be an integer, got ${evalEvery}`);
    }
    if (!Number.isInteger(saveEvery)) {
      throw new ConfigurationError(`saveEvery must be an integer, got ${saveEvery}`);
    }

    const task = this.env.task;
    if (this.verbose) {
      console.log(`[Trainer] Training ${this.agent.type} on ${task.dslName}/${task.id}`);
      console.log(`[Trainer] Episodes: ${numEpisodes} | Target: ${JSON.stringify(task.expectedOutput)}`);
    }

    const startTime = Date.now();
    const firstEpisode = this.history.length + 1;
    const lastEpisode = this.history.length + numEpisodes;

    for (let ep = firstEpisode; ep <= lastEpisode; ep++) {
      const record = runEpisode(this.env, this.agent, true, ep);
      this.history.push(record);

      let evaluation: EvaluationMetrics | undefined;
      if (evalEvery > 0 && ep % evalEvery === 0) {
        evaluation = this.evaluate(ep);
        if (this.verbose) {
          this.logProgress(ep, lastEpisode, evalEvery, evaluation);
        }
      }

      if (saveEvery > 0 && ep % saveEvery === 0) {
        this.saveCheckpoint(ep);
      }

      this.onEpisode?.(record, evaluation);
    }

    // Final evaluation unless the last episode was just evaluated
    const last = this.evaluations[this.evaluations.length - 1];
    let lastEvaluation: EvaluationMetrics | null = null;
    if (last && last.episode === lastEpisode) {
      lastEvaluation = last.metrics;
    } else if (this.evalEpisodes > 0 && numEpisodes > 0) {
      lastEvaluation = this.evaluate(lastEpisode);
    }

    const elapsedMs = Date.now() - startTime;
    this.saveTrainingCurve(lastEpisode);

    const result: TrainingResult = {
      totalEpisodes: this.history.length,
      elapsedMs,
      rollingSuccessRate: this.rollingSuccessRate(),
      averageReward: this.averageReward(),
      lastEvaluation,
      evaluations: [...this.evaluations],
      checkpoints: [...this.checkpoints],
      checkpointFailures: [...this.checkpointFailures],
      history: this.getStatistics(),
    };

    if (this.verbose) {
      console.log(`[Trainer] Training complete in ${(elapsedMs / 1000).toFixed(1)}s`);
      console.log(`[Trainer] Rolling success rate: ${(result.rollingSuccessRate * 100).toFixed(1)}%`);
      if (this.checkpointFailures.length > 0) {
        console.warn(`[Trainer] ${this.checkpointFailures.length} checkpoint write(s) failed`);
      }
    }

    return result;
  }

  private evaluate(episode: number): EvaluationMetrics {
    const metrics = this.evaluator.evaluateAgent(this.agent, this.env, this.evalEpisodes);
    this.evaluations.push({ episode, metrics });
    return metrics;
  }

  private logProgress(
    episode: number,
    total: number,
    window: number,
    evaluation: EvaluationMetrics
  ): void {
    const details = this.agent.describe();
    const epsilon = typeof details.epsilon === "number" ? ` | Epsilon: ${details.epsilon.toFixed(3)}` : "";
    console.log(
      `${progressBar(episode, total)} Episode ${episode}/${total} | ` +
        `Avg Reward: ${this.averageReward(window).toFixed(2)} | ` +
        `Success: ${(this.rollingSuccessRate(window) * 100).toFixed(1)}%${epsilon}`
    );
    console.log(
      `  Eval @ ${episode}: Reward ${evaluation.meanReward.toFixed(3)} | ` +
        `Success ${(evaluation.successRate * 100).toFixed(1)}%`
    );
  }

  /**
   * Persist the agent. A failure is logged and recorded; it only stops
   * training when stopOnCheckpointError is set.
   */
  private saveCheckpoint(episode: number): void {
    const key = checkpointKey(episode);
    this.persist(episode, key, () => {
      this.store.save(key, this.agent.save());
      this.checkpoints.push(key);
    });
  }

  /**
   * Write training_curve.json through a temporary file, under the same
   * failure policy as checkpoints.
   */
  private saveTrainingCurve(episode: number): void {
    const curve: TrainingCurve = {
      rewards: this.history.map((r) => r.totalReward),
      lengths: this.history.map((r) => r.steps),
      successes: this.history.map((r) => (r.success ? 1 : 0)),
    };
    this.persist(episode, TRAINING_CURVE_KEY, () => {
      const target = join(this.logDir, TRAINING_CURVE_FILE);
      const tmp = `${target}.tmp`;
      mkdirSync(this.logDir, { recursive: true });
      writeFileSync(tmp, JSON.stringify(curve, null, 2), "utf-8");
      renameSync(tmp, target);
    });
  }

  private persist(episode: number, key: string, write: () => void): void {
    try {
      write();
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[Trainer] Checkpoint ${key} failed: ${message}`);
      this.checkpointFailures.push({ episode, key, error: message });

      if (this.stopOnCheckpointError) {
        throw err instanceof CheckpointError
          ? err
          : new CheckpointError(`Failed to write checkpoint ${key}: ${message}`, key, { cause: err });
      }
    }
  }

  /**
   * Read-only view of the episode history.
   */
  getStatistics(): readonly EpisodeRecord[] {
    return Object.freeze(this.history.map((r) => Object.freeze({ ...r })));
  }

  /**
   * Fraction of the last k episodes that ended in success.
   */
  rollingSuccessRate(k: number = this.rollingWindow): number {
    const recent = this.history.slice(-k);
    if (recent.length === 0) return 0;
    return recent.filter((r) => r.success).length / recent.length;
  }

  /**
   * Mean total reward over the last k episodes.
   */
  averageReward(k: number = this.rollingWindow): number {
    const recent = this.history.slice(-k);
    if (recent.length === 0) return 0;
    return recent.reduce((sum, r) => sum + r.totalReward, 0) / recent.length;
  }
}
