/**
 * Agent Factory Tests
 */

import { createAgent, createAgentFromState, parseAgentType } from "../factory";
import { RandomAgent } from "../baselines";
import { QLearningAgent } from "../qlearning";
import { PolicyGradientAgent } from "../policy-gradient";
import { ConfigurationError } from "../../errors";

const SPACES = { actionSpaceSize: 3, featureDimension: 4 };

describe("parseAgentType", () => {
  it("should resolve aliases", () => {
    expect(parseAgentType("q")).toBe("qlearning");
    expect(parseAgentType("QLearning")).toBe("qlearning");
    expect(parseAgentType("pg")).toBe("policy_gradient");
    expect(parseAgentType("reinforce")).toBe("policy_gradient");
    expect(parseAgentType("random")).toBe("random");
  });

  it("should reject unknown names", () => {
    expect(() => parseAgentType("dqn")).toThrow(ConfigurationError);
    expect(() => parseAgentType("constructor")).toThrow(ConfigurationError);
  });
});

describe("createAgent", () => {
  it("should create each agent type", () => {
    expect(createAgent("random", SPACES)).toBeInstanceOf(RandomAgent);
    expect(createAgent("qlearning", SPACES)).toBeInstanceOf(QLearningAgent);
    expect(createAgent("policy_gradient", SPACES)).toBeInstanceOf(PolicyGradientAgent);
  });

  it("should pass the configuration through", () => {
    const agent = createAgent("qlearning", SPACES, { epsilon: 0.3, epsilonMin: 0.1 });
    expect(agent).toBeInstanceOf(QLearningAgent);
    if (agent instanceof QLearningAgent) {
      expect(agent.currentEpsilon).toBe(0.3);
    }
  });

  it("should reject keys the agent does not define", () => {
    expect(() => createAgent("qlearning", SPACES, { baselineMomentum: 0.5 })).toThrow(
      "Unknown qlearning config key(s): baselineMomentum"
    );
    expect(() => createAgent("policy_gradient", SPACES, { epsilon: 0.5 })).toThrow(ConfigurationError);
    expect(() => createAgent("random", SPACES, { learningRate: 5 })).toThrow(
      "Unknown random config key(s): learningRate"
    );
  });

  it("should reject saved state carrying foreign config keys", () => {
    const saved = new QLearningAgent(SPACES).save().replace('"config":{', '"config":{"gradientClip":2,');
    expect(saved).toContain('"gradientClip":2');
    expect(() => createAgentFromState(saved, SPACES)).toThrow("Unknown qlearning config key(s): gradientClip");
  });
});

describe("createAgentFromState", () => {
  it("should pick the class from the saved type", () => {
    const saved = new PolicyGradientAgent(SPACES).save();
    const agent = createAgentFromState(saved, SPACES);

    expect(agent).toBeInstanceOf(PolicyGradientAgent);
    expect(agent.type).toBe("policy_gradient");
  });

  it("should reject state for other spaces", () => {
    const saved = new QLearningAgent(SPACES).save();
    expect(() => createAgentFromState(saved, { actionSpaceSize: 5, featureDimension: 4 })).toThrow(
      ConfigurationError
    );
  });

  it("should reject an unknown type", () => {
    const saved = new RandomAgent(SPACES).save().replace('"type":"random"', '"type":"dqn"');
    expect(saved).toContain('"type":"dqn"');
    expect(() => createAgentFromState(saved, SPACES)).toThrow(ConfigurationError);
  });
});
