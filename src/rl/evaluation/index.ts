export {
  computeMetrics,
  computeRollingAverage,
  computeSampleEfficiency,
  trapezoidArea,
  formatMetrics,
  compareMetrics,
  type SampleEfficiency,
  type MetricComparison,
} from "./metrics";
export { runEpisode, progressBar } from "./runner";
export { Evaluator, type EnvironmentSource, type EvaluatorOptions } from "./evaluator";
export {
  Trainer,
  checkpointKey,
  TRAINING_CURVE_FILE,
  type TrainerOptions,
  type TrainingCurve,
} from "./trainer";
export {
  runCurriculum,
  stageLogDir,
  type CurriculumStage,
  type CurriculumOptions,
  type CurriculumResult,
  type CurriculumStageResult,
} from "./curriculum";
