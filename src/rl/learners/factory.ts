/**
 * Agent Factory
 *
 * Creates agents by type, fresh or from saved state (for loading trained policies).
 */

import type {
  Agent,
  AgentType,
  PolicyGradientConfig,
  QLearningConfig,
  SpaceSpec,
} from "../types";
import { ConfigurationError } from "../errors";
import type { RandomSource } from "../../lib/utils/random";
import { parseSavedAgentState, requireKnownKeys } from "./base";
import { RandomAgent } from "./baselines";
import { QLearningAgent } from "./qlearning";
import { PolicyGradientAgent } from "./policy-gradient";

export type AgentConfig = Partial<QLearningConfig> | Partial<PolicyGradientConfig>;

const AGENT_ALIASES = new Map<string, AgentType>([
  ["random", "random"],
  ["qlearning", "qlearning"],
  ["q", "qlearning"],
  ["policy_gradient", "policy_gradient"],
  ["pg", "policy_gradient"],
  ["reinforce", "policy_gradient"],
]);

/**
 * Resolve a user-facing agent name ("pg", "qlearning", ...) to its type.
 */
export function parseAgentType(name: string): AgentType {
  const type = AGENT_ALIASES.get(name.toLowerCase());
  if (type === undefined) {
    throw new ConfigurationError(
      `Unknown agent type: ${name}. Available: ${Array.from(AGENT_ALIASES.keys()).join(", ")}`
    );
  }
  return type;
}

/**
 * Create a fresh (untrained) agent of the specified type. Keys the agent
 * does not define are rejected.
 */
export function createAgent(
  type: AgentType,
  spaces: SpaceSpec,
  config: AgentConfig = {},
  random?: RandomSource
): Agent {
  switch (type) {
    case "random":
      requireKnownKeys(config, {}, type);
      return new RandomAgent(spaces, random);
    case "qlearning":
      return new QLearningAgent(spaces, config, random);
    case "policy_gradient":
      return new PolicyGradientAgent(spaces, config, random);
  }
}

/**
 * Create an agent from saved state. The payload's type picks the class.
 */
export function createAgentFromState(
  data: string,
  spaces: SpaceSpec,
  random?: RandomSource
): Agent {
  const { type } = parseSavedAgentState(data);
  const agent = createAgent(type, spaces, {}, random);
  agent.load(data);
  return agent;
}
