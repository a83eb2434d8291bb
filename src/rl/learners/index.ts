export {
  BaseAgent,
  argmax,
  epsilonGreedy,
  softmax,
  sampleCategorical,
  dotProduct,
  clip,
  parseSavedAgentState,
  type SavedAgentState,
} from "./base";
export { RandomAgent } from "./baselines";
export { QLearningAgent, validateQLearningConfig } from "./qlearning";
export {
  PolicyGradientAgent,
  discountedReturns,
  validatePolicyGradientConfig,
} from "./policy-gradient";
export { createAgent, createAgentFromState, parseAgentType, type AgentConfig } from "./factory";
