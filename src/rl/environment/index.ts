export { DSLEnv, makeEnvironment, resolveEnvironmentConfig } from "./gym-wrapper";
export { encodeObservation, getFeatureDimension, recentTokenIds, PAD_TOKEN_ID } from "./observation";
export type { EncoderSpec } from "./observation";
export { CorrectnessReward, EfficiencyReward, createRewardFunction } from "./reward";
