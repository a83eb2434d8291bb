#!/usr/bin/env node
/**
 * Training Script
 *
 * Main entry point for running RL experiments on DSL tasks.
 * Run with: npx tsx src/rl/train.ts [command] [options]
 */

// Load environment variables from .env.local
import { config } from "dotenv";
config({ path: ".env.local" });

import { join } from "path";
import type { Agent, AgentType, EvaluationMetrics, RewardFunction, TrainingResult } from "./types";
import { ConfigurationError, errorMessage } from "./errors";
import { DSLEnv, makeEnvironment } from "./environment/gym-wrapper";
import { createRewardFunction } from "./environment/reward";
import { createAgent, createAgentFromState, parseAgentType } from "./learners/factory";
import { QLearningAgent } from "./learners/qlearning";
import { Evaluator } from "./evaluation/evaluator";
import { Trainer } from "./evaluation/trainer";
import { runCurriculum } from "./evaluation/curriculum";
import { compareMetrics, computeSampleEfficiency, computeRollingAverage, formatMetrics } from "./evaluation/metrics";
import { TaskCatalog, DEFAULT_TASKS_PATH } from "../lib/dsl/catalog";
import { createSeededRng, defaultRandom, type RandomSource } from "../lib/utils/random";
import * as db from "../lib/db";

// ============ Configuration ============

export type Command = "train" | "compare" | "curriculum" | "evaluate" | "list" | "tasks";

const COMMANDS: readonly Command[] = ["train", "compare", "curriculum", "evaluate", "list", "tasks"];

export interface CliOptions {
  command: Command;
  dsl: string;
  task: string;
  tasks: string[]; // Curriculum sequence
  agent: AgentType;
  episodes: number;
  evalEvery: number;
  evalEpisodes: number;
  saveEvery: number;
  maxSteps: number;
  reward: string;
  seed?: number;
  logDir: string;
  continueFrom?: string;
  quiet: boolean;
  help: boolean;
}

const DEFAULT_OPTIONS: Omit<CliOptions, "command" | "logDir" | "seed"> = {
  dsl: "calc",
  task: "001",
  tasks: [],
  agent: "qlearning",
  episodes: 1000,
  evalEvery: 100,
  evalEpisodes: 10,
  saveEvery: 500,
  maxSteps: 20,
  reward: "correctness",
  quiet: false,
  help: false,
};

// Default epsilon for continued training (some exploration, but less than fresh start)
const CONTINUED_TRAINING_EPSILON = 0.1;

const VALUE_FLAGS = new Set([
  "--dsl",
  "--task",
  "--tasks",
  "--agent",
  "--episodes",
  "--eval-every",
  "--eval-episodes",
  "--save-every",
  "--max-steps",
  "--reward",
  "--seed",
  "--log-dir",
  "--continue",
]);

function parseInteger(flag: string, value: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigurationError(`${flag} expects an integer >= ${min}, got '${value}'`);
  }
  return n;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Parse command-line arguments. env supplies RL_LOG_DIR and RL_SEED defaults.
 */
export function parseArgs(args: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const values = new Map<string, string>();
  const positional: string[] = [];
  let quiet = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--quiet") {
      quiet = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`${arg} needs a value`);
      }
      values.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const commandName = positional[0] ?? "train";
  if (!isCommand(commandName)) {
    throw new ConfigurationError(`Unknown command: ${commandName}`);
  }

  const intFlag = (flag: string, fallback: number, min: number): number => {
    const raw = values.get(flag);
    return raw === undefined ? fallback : parseInteger(flag, raw, min);
  };

  const seedRaw = values.get("--seed") ?? env.RL_SEED;
  const tasksRaw = values.get("--tasks");

  return {
    ...DEFAULT_OPTIONS,
    command: commandName,
    dsl: values.get("--dsl") ?? DEFAULT_OPTIONS.dsl,
    task: values.get("--task") ?? DEFAULT_OPTIONS.task,
    tasks: tasksRaw ? tasksRaw.split(",").map((t) => t.trim()).filter((t) => t.length > 0) : [],
    agent: parseAgentType(values.get("--agent") ?? DEFAULT_OPTIONS.agent),
    episodes: intFlag("--episodes", DEFAULT_OPTIONS.episodes, 0),
    evalEvery: intFlag("--eval-every", DEFAULT_OPTIONS.evalEvery, 0),
    evalEpisodes: intFlag("--eval-episodes", DEFAULT_OPTIONS.evalEpisodes, 0),
    saveEvery: intFlag("--save-every", DEFAULT_OPTIONS.saveEvery, 0),
    maxSteps: intFlag("--max-steps", DEFAULT_OPTIONS.maxSteps, 1),
    reward: values.get("--reward") ?? DEFAULT_OPTIONS.reward,
    ...(seedRaw !== undefined && seedRaw !== "" && { seed: parseInteger("--seed", seedRaw, 0) }),
    logDir: values.get("--log-dir") ?? env.RL_LOG_DIR ?? join("output", "rl_logs"),
    ...(values.has("--continue") && { continueFrom: values.get("--continue") }),
    quiet,
    help,
  };
}

// ============ Setup ============

function loadCatalog(): TaskCatalog {
  return TaskCatalog.fromFile(process.env.RL_TASKS_PATH || DEFAULT_TASKS_PATH);
}

function createRandom(options: CliOptions): RandomSource {
  return options.seed !== undefined ? createSeededRng(options.seed) : defaultRandom;
}

function buildEnvironment(catalog: TaskCatalog, options: CliOptions, taskId: string = options.task): DSLEnv {
  const rewardFn: RewardFunction = createRewardFunction(options.reward);
  return makeEnvironment(catalog, options.dsl, taskId, options.maxSteps, rewardFn);
}

function newExperimentId(name: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  return `${name}-${timestamp}`;
}

/**
 * Load an agent from a previous experiment.
 */
function loadAgentFromExperiment(experimentId: string, env: DSLEnv, random: RandomSource): Agent {
  const experiment = db.getExperiment(experimentId);
  if (!experiment) {
    throw new ConfigurationError(`Experiment not found: ${experimentId}`);
  }
  if (!experiment.agent_state) {
    throw new ConfigurationError(`Experiment has no saved agent state: ${experimentId}`);
  }

  const agent = createAgentFromState(experiment.agent_state, env.spaces, random);
  console.log(`Loaded ${agent.type} from ${experimentId}`);
  console.log(`  Episodes previously trained: ${agent.episodesTrained}`);

  if (agent instanceof QLearningAgent) {
    // Reset epsilon for continued exploration
    agent.setEpsilon(CONTINUED_TRAINING_EPSILON);
    console.log(`  Epsilon reset to: ${CONTINUED_TRAINING_EPSILON}`);
  }
  return agent;
}

// ============ Results ============

function saveTrainingResults(
  experimentId: string,
  agent: Agent,
  result: TrainingResult
): void {
  db.recordEpisodes(experimentId, result.history);
  for (const point of result.evaluations) {
    db.recordEvaluation(experimentId, point.episode, point.metrics);
  }
  db.finishExperiment(experimentId, {
    finalMetrics: {
      rollingSuccessRate: result.rollingSuccessRate,
      averageReward: result.averageReward,
      lastEvaluation: result.lastEvaluation,
      totalEpisodes: result.totalEpisodes,
    },
    agentState: agent.save(),
    trainTimeMs: result.elapsedMs,
  });
  console.log(`Saved ${result.history.length} episodes to database (experiment: ${experimentId})`);
}

function printTrainingSummary(result: TrainingResult): void {
  console.log("\n--- Final Results ---");
  console.log(`Rolling success rate: ${(result.rollingSuccessRate * 100).toFixed(1)}%`);
  console.log(`Average reward: ${result.averageReward.toFixed(3)}`);
  if (result.lastEvaluation) {
    console.log(formatMetrics(result.lastEvaluation));
  }
  console.log(`Training time: ${(result.elapsedMs / 1000).toFixed(1)}s`);
  for (const failure of result.checkpointFailures) {
    console.warn(`Checkpoint ${failure.key} failed: ${failure.error}`);
  }
}

// ============ Experiment Runners ============

function runTrainCommand(catalog: TaskCatalog, options: CliOptions): void {
  const env = buildEnvironment(catalog, options);
  const random = createRandom(options);
  const agent = options.continueFrom
    ? loadAgentFromExperiment(options.continueFrom, env, random)
    : createAgent(options.agent, env.spaces, {}, random);

  const experimentId = newExperimentId(agent.type);
  db.createExperiment({
    id: experimentId,
    type: "training",
    agentType: agent.type,
    dslName: options.dsl,
    taskId: options.task,
    rewardName: env.rewardName,
    config: {
      numEpisodes: options.episodes,
      maxSteps: options.maxSteps,
      seed: options.seed ?? null,
      continuedFrom: options.continueFrom ?? null,
      agent: agent.describe(),
    },
  });

  console.log("\n" + "=".repeat(60));
  console.log(options.continueFrom ? `${agent.type.toUpperCase()} TRAINING (CONTINUED)` : `${agent.type.toUpperCase()} TRAINING`);
  console.log("=".repeat(60));

  const trainer = new Trainer(env, agent, join(options.logDir, experimentId), {
    checkpointStore: new db.SqliteCheckpointStore(db.getDb(), experimentId),
    evalEpisodes: options.evalEpisodes,
    verbose: !options.quiet,
  });
  const result = trainer.train(options.episodes, options.evalEvery, options.saveEvery);

  printTrainingSummary(result);
  saveTrainingResults(experimentId, agent, result);
  if (options.continueFrom) {
    console.log(`Continued from: ${options.continueFrom}`);
  }
}

/**
 * Train every agent type on the same task, then compare them greedily.
 */
function runCompareCommand(catalog: TaskCatalog, options: CliOptions): void {
  console.log("\n" + "=".repeat(60));
  console.log("AGENT COMPARISON");
  console.log("=".repeat(60));

  const types: AgentType[] = ["random", "qlearning", "policy_gradient"];
  const agents = new Map<string, Agent>();
  const curves: number[][] = [];

  types.forEach((type, index) => {
    const env = buildEnvironment(catalog, options);
    const random = options.seed !== undefined ? createSeededRng(options.seed + index) : defaultRandom;
    const agent = createAgent(type, env.spaces, {}, random);

    console.log(`\n=== Training ${type} ===`);
    const experimentId = newExperimentId(type);
    db.createExperiment({
      id: experimentId,
      type: "comparison",
      agentType: type,
      dslName: options.dsl,
      taskId: options.task,
      rewardName: env.rewardName,
      config: { numEpisodes: options.episodes, maxSteps: options.maxSteps, seed: options.seed ?? null },
    });

    const trainer = new Trainer(env, agent, join(options.logDir, experimentId), {
      evalEpisodes: options.evalEpisodes,
      verbose: !options.quiet,
    });
    const result = trainer.train(options.episodes, options.evalEvery, 0);
    saveTrainingResults(experimentId, agent, result);

    agents.set(type, agent);
    if (type !== "random") {
      curves.push(computeRollingAverage(result.history.map((r) => (r.success ? 1 : 0)), 100));
    }
  });

  const evaluator = new Evaluator();
  const results = evaluator.compareAgents(agents, () => buildEnvironment(catalog, options), Math.max(1, options.evalEpisodes));

  console.log("\n" + "=".repeat(60));
  console.log("COMPARISON SUMMARY");
  console.log("=".repeat(60));

  const baseline = results.get("random");
  for (const [name, metrics] of Array.from(results.entries())) {
    console.log(`\n${name}:`);
    console.log(formatMetrics(metrics));
    if (baseline && name !== "random") {
      const comparison = compareMetrics(baseline, metrics);
      console.log(`  Reward improvement vs random: ${comparison.meanReward.improvement.toFixed(1)}%`);
      console.log(`  Success improvement vs random: ${comparison.successRate.improvement.toFixed(1)}%`);
    }
  }

  const efficiency = computeSampleEfficiency(curves);
  console.log(`\nSample efficiency (learning agents): AUC ${efficiency.meanAuc.toFixed(1)}, ` +
    `episodes to 80% ${efficiency.meanEpisodesToThreshold.toFixed(0)}`);
}

function runCurriculumCommand(catalog: TaskCatalog, options: CliOptions): void {
  const sequence = options.tasks.length > 0
    ? options.tasks
    : catalog.listTasks(options.dsl).map((t) => t.id);
  if (sequence.length === 0) {
    throw new ConfigurationError(`No tasks for DSL: ${options.dsl}`);
  }

  console.log(`Curriculum Learning on ${options.dsl}`);
  const stages = sequence.map((taskId) => ({
    name: taskId,
    env: buildEnvironment(catalog, options, taskId),
    episodes: options.episodes,
    evalEvery: options.evalEvery,
    saveEvery: options.saveEvery,
  }));

  const agent = createAgent(options.agent, stages[0].env.spaces, {}, createRandom(options));
  const experimentId = newExperimentId(`curriculum-${agent.type}`);
  db.createExperiment({
    id: experimentId,
    type: "curriculum",
    agentType: agent.type,
    dslName: options.dsl,
    taskId: sequence.join(","),
    rewardName: stages[0].env.rewardName,
    config: { episodesPerStage: options.episodes, maxSteps: options.maxSteps, seed: options.seed ?? null },
  });

  const result = runCurriculum(agent, stages, {
    logDir: join(options.logDir, experimentId),
    finalEvalEpisodes: Math.max(1, options.evalEpisodes),
    verbose: !options.quiet,
    trainerOptions: { evalEpisodes: options.evalEpisodes },
  });

  console.log("\n" + "=".repeat(60));
  console.log("FINAL EVALUATION ON ALL TASKS");
  console.log("=".repeat(60));
  const finalEvaluation: Record<string, EvaluationMetrics> = {};
  for (const [taskId, metrics] of Array.from(result.finalEvaluation.entries())) {
    finalEvaluation[taskId] = metrics;
    console.log(`\nTask ${taskId}:`);
    console.log(`  Success Rate: ${(metrics.successRate * 100).toFixed(1)}%`);
    console.log(`  Mean Reward: ${metrics.meanReward.toFixed(2)}`);
  }

  db.finishExperiment(experimentId, {
    finalMetrics: finalEvaluation,
    agentState: agent.save(),
    trainTimeMs: result.stages.reduce((sum, s) => sum + s.result.elapsedMs, 0),
  });
}

function runEvaluateCommand(catalog: TaskCatalog, options: CliOptions): void {
  if (!options.continueFrom) {
    throw new ConfigurationError("evaluate needs --continue <experiment-id>");
  }
  const env = buildEnvironment(catalog, options);
  const agent = loadAgentFromExperiment(options.continueFrom, env, createRandom(options));
  const metrics = new Evaluator().evaluateAgent(agent, env, Math.max(1, options.evalEpisodes));
  console.log(`\nEvaluation on ${options.dsl}/${options.task}:`);
  console.log(formatMetrics(metrics));
  if (metrics.samplePrograms.length > 0) {
    console.log(`Sample programs: ${metrics.samplePrograms.map((p) => JSON.stringify(p)).join(", ")}`);
  }
}

/**
 * List stored experiments.
 */
function listAvailableExperiments(): void {
  const experiments = db.listExperiments();
  if (experiments.length === 0) {
    console.log("No experiments found.");
    return;
  }

  console.log("\nAvailable experiments:\n");
  console.log("ID                                          Agent             Task          Status");
  console.log("-".repeat(90));

  for (const exp of experiments.slice(0, 20)) {
    console.log(
      `${exp.id.padEnd(44)} ${(exp.agent_type ?? "?").padEnd(17)} ` +
        `${`${exp.dsl_name}/${exp.task_id}`.padEnd(13)} ${exp.status}`
    );
  }

  if (experiments.length > 20) {
    console.log(`\n... and ${experiments.length - 20} more`);
  }
}

function listTasks(catalog: TaskCatalog): void {
  for (const dslName of catalog.listDsls()) {
    console.log(`\n${dslName} (vocabulary: ${catalog.vocabularyFor(dslName).map((t) => JSON.stringify(t)).join(" ")})`);
    for (const task of catalog.listTasks(dslName)) {
      console.log(`  ${task.id}  ${JSON.stringify(task.source)} -> ${JSON.stringify(task.expectedOutput)}`);
    }
  }
}

// ============ CLI Interface ============

function printUsage(): void {
  console.log(`
RL Training Script for DSL Program Synthesis

Usage: npx tsx src/rl/train.ts [command] [options]

Commands:
  train         Train one agent on one task (default)
  compare       Train random, Q-learning and policy-gradient agents and compare them
  curriculum    Train one agent through a sequence of tasks
  evaluate      Evaluate a stored agent greedily (needs --continue)
  list          List stored experiments
  tasks         List DSLs and tasks

Options:
  --dsl NAME          DSL to generate (default: calc)
  --task ID           Task id (default: 001)
  --tasks A,B,C       Curriculum task sequence (default: every task of the DSL)
  --agent TYPE        random | qlearning | pg (default: qlearning)
  --episodes N        Training episodes (per stage for curriculum, default: 1000)
  --eval-every N      Evaluate every N episodes, 0 disables (default: 100)
  --eval-episodes N   Episodes per evaluation (default: 10)
  --save-every N      Checkpoint every N episodes, 0 disables (default: 500)
  --max-steps N       Token budget per episode (default: 20)
  --reward NAME       correctness | efficiency (default: correctness)
  --seed N            Seed for reproducible runs (env: RL_SEED)
  --log-dir DIR       Directory for training curves (env: RL_LOG_DIR)
  --continue ID       Continue training (or evaluate) a stored experiment
  --quiet             Only print the summary
  --help              Show this help message

Examples:
  npx tsx src/rl/train.ts train --dsl echo --task 001 --episodes 2000
  npx tsx src/rl/train.ts train --agent pg --reward efficiency --seed 7
  npx tsx src/rl/train.ts compare --dsl calc --task 002 --episodes 1000
  npx tsx src/rl/train.ts curriculum --dsl calc --tasks 001,002,003
  npx tsx src/rl/train.ts train --continue <experiment-id> --episodes 500

Continued Training:
  The agent's weights are loaded from the experiment, Q-learning epsilon is reset
  to ${CONTINUED_TRAINING_EPSILON}, and each continuation creates a new experiment entry.
`);
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printUsage();
    return;
  }

  // Handle list command (doesn't need the catalog)
  if (options.command === "list") {
    listAvailableExperiments();
    return;
  }

  const catalog = loadCatalog();

  switch (options.command) {
    case "tasks":
      listTasks(catalog);
      break;
    case "train":
      runTrainCommand(catalog, options);
      break;
    case "compare":
      runCompareCommand(catalog, options);
      break;
    case "curriculum":
      runCurriculumCommand(catalog, options);
      break;
    case "evaluate":
      runEvaluateCommand(catalog, options);
      break;
  }
}

// Run if executed directly
if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    if (err instanceof ConfigurationError) {
      console.error("Run with --help for usage.");
    }
    process.exitCode = 1;
  } finally {
    db.closeDb();
  }
}
