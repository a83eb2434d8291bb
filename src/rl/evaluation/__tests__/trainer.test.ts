/**
 * Trainer Tests
 */

import { Trainer, TRAINING_CURVE_FILE, TRAINING_CURVE_KEY, checkpointKey, type TrainingCurve } from "../trainer";
import { makeEnvironment } from "../../environment/gym-wrapper";
import { RandomAgent } from "../../learners/baselines";
import { QLearningAgent } from "../../learners/qlearning";
import { TaskCatalog } from "../../../lib/dsl/catalog";
import { createSeededRng } from "../../../lib/utils/random";
import { CheckpointError, ConfigurationError } from "../../errors";
import type { CheckpointStore, EvaluationMetrics } from "../../types";
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

const catalog = TaskCatalog.fromFile();

class MemoryStore implements CheckpointStore {
  readonly entries = new Map<string, string>();
  save(key: string, payload: string): void {
    this.entries.set(key, payload);
  }
  load(key: string): string {
    const payload = this.entries.get(key);
    if (payload === undefined) throw new Error(`missing ${key}`);
    return payload;
  }
  list(): string[] {
    return Array.from(this.entries.keys());
  }
}

const failingStore: CheckpointStore = {
  save: () => {
    throw new Error("disk full");
  },
  load: () => "",
  list: () => [],
};

describe("Trainer", () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), "trainer-"));
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(logDir, { recursive: true, force: true });
  });

  function setup(store: CheckpointStore, options: { evalEpisodes?: number; stopOnCheckpointError?: boolean } = {}) {
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const agent = new QLearningAgent(env.spaces, {}, createSeededRng(11));
    const trainer = new Trainer(env, agent, logDir, {
      checkpointStore: store,
      evalEpisodes: options.evalEpisodes ?? 0,
      stopOnCheckpointError: options.stopOnCheckpointError,
      verbose: false,
    });
    return { env, agent, trainer };
  }

  it("should name checkpoints by episode", () => {
    expect(checkpointKey(500)).toBe("checkpoint_ep500");
  });

  it("should checkpoint on schedule", () => {
    const store = new MemoryStore();
    const { env, trainer } = setup(store);
    const result = trainer.train(10, 0, 5);

    expect(result.checkpoints).toEqual(["checkpoint_ep5", "checkpoint_ep10"]);
    expect(store.list()).toEqual(["checkpoint_ep5", "checkpoint_ep10"]);

    const restored = new QLearningAgent(env.spaces);
    restored.load(store.load("checkpoint_ep10"));
    expect(restored.episodesTrained).toBe(10);
  });

  it("should keep training when a checkpoint fails", () => {
    const { trainer } = setup(failingStore);
    const result = trainer.train(10, 0, 5);

    expect(result.totalEpisodes).toBe(10);
    expect(result.checkpoints).toEqual([]);
    expect(result.checkpointFailures).toEqual([
      { episode: 5, key: "checkpoint_ep5", error: "disk full" },
      { episode: 10, key: "checkpoint_ep10", error: "disk full" },
    ]);
    expect(console.error).toHaveBeenCalledWith("[Trainer] Checkpoint checkpoint_ep5 failed: disk full");
  });

  it("should stop on a checkpoint failure when asked", () => {
    const { trainer } = setup(failingStore, { stopOnCheckpointError: true });

    expect(() => trainer.train(10, 0, 5)).toThrow(CheckpointError);
    expect(trainer.getStatistics()).toHaveLength(5);
  });

  it("should continue episode numbering across calls", () => {
    const { agent, trainer } = setup(new MemoryStore());
    trainer.train(3, 0, 0);
    const result = trainer.train(2, 0, 0);

    expect(result.totalEpisodes).toBe(5);
    expect(trainer.getStatistics().map((r) => r.episode)).toEqual([1, 2, 3, 4, 5]);
    expect(agent.episodesTrained).toBe(5);
  });

  it("should evaluate periodically and once more at the end", () => {
    const { trainer } = setup(new MemoryStore(), { evalEpisodes: 2 });

    expect(trainer.train(10, 5, 0).evaluations.map((e) => e.episode)).toEqual([5, 10]);
    const result = trainer.train(7, 5, 0);

    // Episodes 11-17: periodic at 15, final at 17
    expect(result.evaluations.map((e) => e.episode)).toEqual([5, 10, 15, 17]);
    expect(result.lastEvaluation?.numEpisodes).toBe(2);
  });

  it("should report each episode to the callback", () => {
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const seen: Array<[number, EvaluationMetrics | undefined]> = [];
    const trainer = new Trainer(env, new RandomAgent(env.spaces, createSeededRng(4)), logDir, {
      checkpointStore: new MemoryStore(),
      evalEpisodes: 1,
      verbose: false,
      onEpisode: (record, evaluation) => seen.push([record.episode, evaluation]),
    });
    trainer.train(4, 2, 0);

    expect(seen.map(([ep]) => ep)).toEqual([1, 2, 3, 4]);
    expect(seen.filter(([, evaluation]) => evaluation !== undefined).map(([ep]) => ep)).toEqual([2, 4]);
  });

  it("should log progress with a bar at each evaluation", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const trainer = new Trainer(env, new RandomAgent(env.spaces, createSeededRng(4)), logDir, {
      checkpointStore: new MemoryStore(),
      evalEpisodes: 1,
    });
    trainer.train(4, 2, 0);

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines.filter((l) => l.startsWith(`[${"=".repeat(15)}${" ".repeat(15)}] 50.0% Episode 2/4 |`))).toHaveLength(1);
    expect(lines.filter((l) => l.startsWith(`[${"=".repeat(30)}] 100.0% Episode 4/4 |`))).toHaveLength(1);
  });

  it("should write the training curve", () => {
    const { trainer } = setup(new MemoryStore());
    trainer.train(6, 0, 0);

    const path = join(logDir, TRAINING_CURVE_FILE);
    expect(existsSync(path)).toBe(true);

    const curve: TrainingCurve = JSON.parse(readFileSync(path, "utf-8"));
    const history = trainer.getStatistics();
    expect(curve.rewards).toEqual(history.map((r) => r.totalReward));
    expect(curve.lengths).toEqual(history.map((r) => r.steps));
    expect(curve.successes).toEqual(history.map((r) => (r.success ? 1 : 0)));
  });

  it("should return its result when the training curve cannot be written", () => {
    const notADir = join(logDir, "not-a-dir");
    writeFileSync(notADir, "occupied", "utf-8");
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const trainer = new Trainer(env, new RandomAgent(env.spaces, createSeededRng(3)), notADir, {
      checkpointStore: new MemoryStore(),
      evalEpisodes: 0,
      verbose: false,
    });

    const result = trainer.train(4, 0, 0);

    expect(result.totalEpisodes).toBe(4);
    expect(result.checkpointFailures).toHaveLength(1);
    expect(result.checkpointFailures[0]).toMatchObject({ episode: 4, key: TRAINING_CURVE_KEY });
    expect(readFileSync(notADir, "utf-8")).toBe("occupied");
  });

  it("should raise a CheckpointError for an unwritable curve when asked to stop", () => {
    const notADir = join(logDir, "not-a-dir");
    writeFileSync(notADir, "occupied", "utf-8");
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const trainer = new Trainer(env, new RandomAgent(env.spaces, createSeededRng(3)), notADir, {
      checkpointStore: new MemoryStore(),
      evalEpisodes: 0,
      verbose: false,
      stopOnCheckpointError: true,
    });

    expect(() => trainer.train(2, 0, 0)).toThrow(CheckpointError);
    expect(trainer.getStatistics()).toHaveLength(2);
  });

  it("should leave no temporary file beside the training curve", () => {
    const { trainer } = setup(new MemoryStore());
    trainer.train(2, 0, 0);

    expect(readdirSync(logDir)).toEqual([TRAINING_CURVE_FILE]);
  });

  it("should reject fractional evaluation and checkpoint intervals", () => {
    const { trainer } = setup(new MemoryStore());

    expect(() => trainer.train(5, 2.5, 0)).toThrow(ConfigurationError);
    expect(() => trainer.train(5, 0, 2.5)).toThrow("saveEvery must be an integer, got 2.5");
    expect(trainer.getStatistics()).toHaveLength(0);
  });

  it("should expose frozen statistics and rolling figures", () => {
    const { trainer } = setup(new MemoryStore());
    trainer.train(4, 0, 0);
    const stats = trainer.getStatistics();

    expect(Object.isFrozen(stats)).toBe(true);
    expect(Object.isFrozen(stats[0])).toBe(true);

    const lastTwo = stats.slice(-2);
    expect(trainer.averageReward(2)).toBeCloseTo((lastTwo[0].totalReward + lastTwo[1].totalReward) / 2);
    expect(trainer.rollingSuccessRate(2)).toBe(lastTwo.filter((r) => r.success).length / 2);
  });

  it("should default to file checkpoints under the log directory", () => {
    const env = makeEnvironment(catalog, "echo", "001", 5);
    const trainer = new Trainer(env, new RandomAgent(env.spaces), logDir, {
      evalEpisodes: 0,
      verbose: false,
    });
    trainer.train(2, 0, 2);

    expect(existsSync(join(logDir, "checkpoints", "checkpoint_ep2.json"))).toBe(true);
  });
});
