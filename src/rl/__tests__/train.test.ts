/**
 * CLI argument parsing tests
 */

import { join } from "path";
import { parseArgs } from "../train";
import { ConfigurationError } from "../errors";

describe("parseArgs", () => {
  it("should apply defaults", () => {
    const options = parseArgs([], {});

    expect(options).toEqual({
      command: "train",
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
      logDir: join("output", "rl_logs"),
      quiet: false,
      help: false,
    });
  });

  it("should read the command and flags", () => {
    const options = parseArgs(
      ["compare", "--dsl", "echo", "--task", "002", "--agent", "pg", "--episodes", "50", "--max-steps", "8", "--quiet"],
      {}
    );

    expect(options.command).toBe("compare");
    expect(options.dsl).toBe("echo");
    expect(options.task).toBe("002");
    expect(options.agent).toBe("policy_gradient");
    expect(options.episodes).toBe(50);
    expect(options.maxSteps).toBe(8);
    expect(options.quiet).toBe(true);
  });

  it("should split the curriculum task list", () => {
    expect(parseArgs(["curriculum", "--tasks", "001, 002,,003"], {}).tasks).toEqual(["001", "002", "003"]);
  });

  it("should take defaults from the environment", () => {
    const options = parseArgs([], { RL_LOG_DIR: "/tmp/runs", RL_SEED: "7" });

    expect(options.logDir).toBe("/tmp/runs");
    expect(options.seed).toBe(7);
    expect(parseArgs(["--seed", "3"], { RL_SEED: "7" }).seed).toBe(3);
  });

  it("should keep the experiment to continue from", () => {
    const options = parseArgs(["evaluate", "--continue", "train-qlearning-1"], {});
    expect(options.continueFrom).toBe("train-qlearning-1");
  });

  it("should recognize help", () => {
    expect(parseArgs(["-h"], {}).help).toBe(true);
  });

  it.each([
    [["deploy"], "Unknown command: deploy"],
    [["--verbose"], "Unknown option: --verbose"],
    [["--episodes"], "--episodes needs a value"],
    [["--episodes", "--quiet"], "--episodes needs a value"],
    [["--episodes", "ten"], "--episodes expects an integer >= 0, got 'ten'"],
    [["--max-steps", "0"], "--max-steps expects an integer >= 1, got '0'"],
    [["--agent", "dqn"], "Unknown agent type: dqn"],
  ])("should reject %j", (args, message) => {
    expect(() => parseArgs(args, {})).toThrow(ConfigurationError);
    expect(() => parseArgs(args, {})).toThrow(message);
  });
});
