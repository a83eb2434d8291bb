/**
 * SQLite database for storing training runs, episodes and checkpoints
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import type {
  AgentType,
  CheckpointStore,
  EpisodeRecord,
  EvaluationMetrics,
  TerminalReason,
} from "../../rl/types";
import { CheckpointError, errorMessage } from "../../rl/errors";

export { FileCheckpointStore } from "./file-store";

export type DatabaseHandle = Database.Database;

export const DEFAULT_DB_PATH = join(process.cwd(), "output", "training.db");

let db: DatabaseHandle | null = null;

/**
 * Open (or create) a database at path and ensure the schema exists.
 * ":memory:" gives a private in-process database.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const handle = new Database(path);
  if (path !== ":memory:") {
    handle.pragma("journal_mode = WAL");
  }
  handle.pragma("foreign_keys = ON");
  initSchema(handle);
  return handle;
}

/**
 * Shared connection, opened lazily at RL_DB_PATH.
 */
export function getDb(): DatabaseHandle {
  if (!db) {
    db = openDatabase(process.env.RL_DB_PATH || DEFAULT_DB_PATH);
  }
  return db;
}

/**
 * Replace the shared connection (e.g. with an in-memory database).
 */
export function useDatabase(handle: DatabaseHandle): void {
  db = handle;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function initSchema(handle: DatabaseHandle): void {
  handle.exec(`
    -- Experiments: one training, comparison or curriculum run
    CREATE TABLE IF NOT EXISTS experiments (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL CHECK (type IN ('training', 'comparison', 'curriculum')),
      agent_type TEXT CHECK (agent_type IN ('random', 'qlearning', 'policy_gradient')),
      dsl_name TEXT NOT NULL,
      task_id TEXT NOT NULL,
      reward_name TEXT,
      config_json TEXT,
      status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'completed')),
      final_metrics_json TEXT,
      agent_state TEXT,
      train_time_ms INTEGER,
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Episodes: per-episode training statistics
    CREATE TABLE IF NOT EXISTS episodes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      experiment_id TEXT NOT NULL REFERENCES experiments(id) ON DELETE CASCADE,
      episode_num INTEGER NOT NULL,
      total_reward REAL NOT NULL,
      success INTEGER NOT NULL,
      steps INTEGER NOT NULL,
      terminal_reason TEXT,
      program TEXT
    );

    -- Evaluations: periodic greedy evaluation passes
    CREATE TABLE IF NOT EXISTS evaluations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      experiment_id TEXT NOT NULL REFERENCES experiments(id) ON DELETE CASCADE,
      episode_num INTEGER NOT NULL,
      success_rate REAL NOT NULL,
      mean_reward REAL NOT NULL,
      metrics_json TEXT NOT NULL
    );

    -- Checkpoints: serialized agent parameters, one row per key
    CREATE TABLE IF NOT EXISTS checkpoints (
      namespace TEXT NOT NULL,
      key TEXT NOT NULL,
      payload TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now')),
      PRIMARY KEY (namespace, key)
    );

    CREATE INDEX IF NOT EXISTS idx_episodes_experiment ON episodes(experiment_id);
    CREATE INDEX IF NOT EXISTS idx_evaluations_experiment ON evaluations(experiment_id);
  `);
}

// ============ Checkpoints ============

/**
 * Checkpoint store backed by the checkpoints table. Each save is a single
 * upsert inside a transaction.
 */
export class SqliteCheckpointStore implements CheckpointStore {
  constructor(
    private readonly handle: DatabaseHandle,
    private readonly namespace: string = "default"
  ) {}

  save(key: string, payload: string): void {
    try {
      const upsert = this.handle.prepare<[string, string, string]>(`
        INSERT INTO checkpoints (namespace, key, payload) VALUES (?, ?, ?)
        ON CONFLICT (namespace, key) DO UPDATE SET payload = excluded.payload, updated_at = datetime('now')
      `);
      this.handle.transaction(() => {
        upsert.run(this.namespace, key, payload);
      })();
    } catch (err) {
      throw new CheckpointError(`Failed to write checkpoint ${key}: ${errorMessage(err)}`, key, {
        cause: err,
      });
    }
  }

  load(key: string): string {
    const row = this.handle
      .prepare<[string, string], { payload: string }>(
        "SELECT payload FROM checkpoints WHERE namespace = ? AND key = ?"
      )
      .get(this.namespace, key);
    if (!row) {
      throw new CheckpointError(`Checkpoint not found: ${key}`, key);
    }
    return row.payload;
  }

  list(): string[] {
    return this.handle
      .prepare<[string], { key: string }>("SELECT key FROM checkpoints WHERE namespace = ? ORDER BY key")
      .all(this.namespace)
      .map((row) => row.key);
  }
}

// ============ Experiment Operations ============

export type ExperimentType = "training" | "comparison" | "curriculum";

export interface ExperimentRow {
  id: string;
  type: ExperimentType;
  agent_type: AgentType | null;
  dsl_name: string;
  task_id: string;
  reward_name: string | null;
  config_json: string | null;
  status: "running" | "completed";
  final_metrics_json: string | null;
  agent_state: string | null;
  train_time_ms: number | null;
  created_at: string;
}

export function createExperiment(data: {
  id: string;
  type: ExperimentType;
  agentType?: AgentType;
  dslName: string;
  taskId: string;
  rewardName?: string;
  config?: object;
}): void {
  getDb()
    .prepare<[string, string, string | null, string, string, string | null, string | null]>(`
      INSERT INTO experiments (id, type, agent_type, dsl_name, task_id, reward_name, config_json)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      data.id,
      data.type,
      data.agentType ?? null,
      data.dslName,
      data.taskId,
      data.rewardName ?? null,
      data.config ? JSON.stringify(data.config) : null
    );
}

/**
 * Mark an experiment completed and store its results.
 */
export function finishExperiment(
  id: string,
  data: {
    finalMetrics?: object;
    agentState?: string;
    trainTimeMs?: number;
  }
): void {
  getDb()
    .prepare<[string | null, string | null, number | null, string]>(`
      UPDATE experiments
      SET status = 'completed', final_metrics_json = ?, agent_state = ?, train_time_ms = ?
      WHERE id = ?
    `)
    .run(
      data.finalMetrics ? JSON.stringify(data.finalMetrics) : null,
      data.agentState ?? null,
      data.trainTimeMs ?? null,
      id
    );
}

export function listExperiments(type?: ExperimentType): ExperimentRow[] {
  const handle = getDb();
  if (type) {
    return handle
      .prepare<[string], ExperimentRow>("SELECT * FROM experiments WHERE type = ? ORDER BY created_at DESC, id")
      .all(type);
  }
  return handle.prepare<[], ExperimentRow>("SELECT * FROM experiments ORDER BY created_at DESC, id").all();
}

export function getExperiment(id: string): ExperimentRow | undefined {
  return getDb().prepare<[string], ExperimentRow>("SELECT * FROM experiments WHERE id = ?").get(id);
}

// ============ Episode Operations ============

export interface EpisodeRow {
  id: number;
  experiment_id: string;
  episode_num: number;
  total_reward: number;
  success: number;
  steps: number;
  terminal_reason: TerminalReason | null;
  program: string | null;
}

export function recordEpisodes(experimentId: string, records: readonly EpisodeRecord[]): void {
  const handle = getDb();
  const stmt = handle.prepare<[string, number, number, number, number, string | null, string]>(`
    INSERT INTO episodes (experiment_id, episode_num, total_reward, success, steps, terminal_reason, program)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const insertMany = handle.transaction((items: readonly EpisodeRecord[]) => {
    for (const r of items) {
      stmt.run(experimentId, r.episode, r.totalReward, r.success ? 1 : 0, r.steps, r.terminalReason, r.program);
    }
  });

  insertMany(records);
}

export function listEpisodes(experimentId: string): EpisodeRow[] {
  return getDb()
    .prepare<[string], EpisodeRow>("SELECT * FROM episodes WHERE experiment_id = ? ORDER BY episode_num")
    .all(experimentId);
}

// ============ Evaluation Operations ============

export interface EvaluationRow {
  id: number;
  experiment_id: string;
  episode_num: number;
  success_rate: number;
  mean_reward: number;
  metrics_json: string;
}

export function recordEvaluation(experimentId: string, episode: number, metrics: EvaluationMetrics): void {
  getDb()
    .prepare<[string, number, number, number, string]>(`
      INSERT INTO evaluations (experiment_id, episode_num, success_rate, mean_reward, metrics_json)
      VALUES (?, ?, ?, ?, ?)
    `)
    .run(experimentId, episode, metrics.successRate, metrics.meanReward, JSON.stringify(metrics));
}

export function listEvaluations(experimentId: string): EvaluationRow[] {
  return getDb()
    .prepare<[string], EvaluationRow>("SELECT * FROM evaluations WHERE experiment_id = ? ORDER BY episode_num")
    .all(experimentId);
}

// ============ Aggregation Queries ============

export function getExperimentStats(experimentId: string): {
  totalEpisodes: number;
  avgReward: number;
  successRate: number;
  outcomeDistribution: Record<string, number>;
} {
  const handle = getDb();

  const stats = handle
    .prepare<[string], { total: number; avg_reward: number | null; successes: number | null }>(`
      SELECT COUNT(*) AS total, AVG(total_reward) AS avg_reward, SUM(success) AS successes
      FROM episodes WHERE experiment_id = ?
    `)
    .get(experimentId);

  const outcomes = handle
    .prepare<[string], { terminal_reason: string | null; count: number }>(`
      SELECT terminal_reason, COUNT(*) AS count
      FROM episodes WHERE experiment_id = ?
      GROUP BY terminal_reason
    `)
    .all(experimentId);

  const total = stats?.total ?? 0;
  const outcomeDistribution: Record<string, number> = {};
  for (const row of outcomes) {
    outcomeDistribution[row.terminal_reason ?? "NONE"] = row.count;
  }

  return {
    totalEpisodes: total,
    avgReward: stats?.avg_reward ?? 0,
    successRate: total > 0 ? (stats?.successes ?? 0) / total : 0,
    outcomeDistribution,
  };
}
