/**
 * Curriculum Training
 *
 * Trains one agent through an ordered list of tasks (easy to hard), then
 * evaluates it on every stage's task.
 */

import { join } from "path";
import type { Agent, EvaluationMetrics, TrainingResult } from "../types";
import type { DSLEnv } from "../environment/gym-wrapper";
import { ConfigurationError } from "../errors";
import { Evaluator } from "./evaluator";
import { Trainer, type TrainerOptions } from "./trainer";

export interface CurriculumStage {
  name: string;
  env: DSLEnv;
  episodes: number;
  evalEvery?: number;
  saveEvery?: number;
}

export interface CurriculumOptions {
  logDir: string; // Each stage logs to <logDir>/stage_<n>_<name>
  finalEvalEpisodes?: number;
  verbose?: boolean;
  trainerOptions?: Omit<TrainerOptions, "verbose">;
}

export interface CurriculumStageResult {
  stage: number;
  name: string;
  result: TrainingResult;
}

export interface CurriculumResult {
  stages: CurriculumStageResult[];
  finalEvaluation: Map<string, EvaluationMetrics>;
}

export function stageLogDir(logDir: string, stage: number, name: string): string {
  return join(logDir, `stage_${stage}_${name.replace(/[^A-Za-z0-9_-]/g, "_")}`);
}

/**
 * Run the curriculum. Every stage must expose the agent's action and
 * feature spaces.
 */
export function runCurriculum(
  agent: Agent,
  stages: readonly CurriculumStage[],
  options: CurriculumOptions
): CurriculumResult {
  if (stages.length === 0) {
    throw new ConfigurationError("Curriculum needs at least one stage");
  }
  const { actionSpaceSize, featureDimension } = stages[0].env.spaces;
  for (const stage of stages) {
    const spaces = stage.env.spaces;
    if (spaces.actionSpaceSize !== actionSpaceSize || spaces.featureDimension !== featureDimension) {
      throw new ConfigurationError(
        `Stage ${stage.name} has spaces ${spaces.actionSpaceSize}x${spaces.featureDimension}, ` +
          `expected ${actionSpaceSize}x${featureDimension}`
      );
    }
  }

  const verbose = options.verbose ?? true;
  if (verbose) {
    console.log(`[Curriculum] Task sequence: ${stages.map((s) => s.name).join(" -> ")}`);
  }

  const results: CurriculumStageResult[] = [];
  stages.forEach((stage, index) => {
    const n = index + 1;
    if (verbose) {
      console.log(`\n[Curriculum] Stage ${n}/${stages.length}: ${stage.name}`);
    }

    // Same agent, continues learning
    const trainer = new Trainer(stage.env, agent, stageLogDir(options.logDir, n, stage.name), {
      ...options.trainerOptions,
      verbose,
    });
    const result = trainer.train(stage.episodes, stage.evalEvery ?? 0, stage.saveEvery ?? 0);
    results.push({ stage: n, name: stage.name, result });

    if (verbose) {
      console.log(
        `[Curriculum] Stage ${n} complete: success rate ${(result.rollingSuccessRate * 100).toFixed(1)}%`
      );
    }
  });

  const evaluator = new Evaluator({ verbose });
  const finalEvaluation = new Map<string, EvaluationMetrics>();
  for (const stage of stages) {
    finalEvaluation.set(stage.name, evaluator.evaluateAgent(agent, stage.env, options.finalEvalEpisodes ?? 20));
  }

  return { stages: results, finalEvaluation };
}
