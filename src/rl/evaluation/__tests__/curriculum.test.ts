/**
 * Curriculum Tests
 */

import { runCurriculum, stageLogDir } from "../curriculum";
import { makeEnvironment } from "../../environment/gym-wrapper";
import { QLearningAgent } from "../../learners/qlearning";
import { TaskCatalog } from "../../../lib/dsl/catalog";
import { createSeededRng } from "../../../lib/utils/random";
import { ConfigurationError } from "../../errors";
import { TRAINING_CURVE_FILE } from "../trainer";
import { existsSync, mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

const catalog = TaskCatalog.fromFile();

describe("runCurriculum", () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), "curriculum-"));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  it("should carry one agent through every stage", () => {
    const first = makeEnvironment(catalog, "echo", "001", 5);
    const second = makeEnvironment(catalog, "echo", "002", 5);
    const agent = new QLearningAgent(first.spaces, {}, createSeededRng(8));

    const result = runCurriculum(
      agent,
      [
        { name: "echo-001", env: first, episodes: 50 },
        { name: "echo-002", env: second, episodes: 50, saveEvery: 50 },
      ],
      { logDir, finalEvalEpisodes: 2, verbose: false, trainerOptions: { evalEpisodes: 0 } }
    );

    expect(agent.episodesTrained).toBe(100);
    expect(result.stages.map((s) => [s.stage, s.name, s.result.totalEpisodes])).toEqual([
      [1, "echo-001", 50],
      [2, "echo-002", 50],
    ]);
    expect(Array.from(result.finalEvaluation.keys())).toEqual(["echo-001", "echo-002"]);
    expect(result.finalEvaluation.get("echo-002")?.numEpisodes).toBe(2);

    expect(existsSync(join(stageLogDir(logDir, 1, "echo-001"), TRAINING_CURVE_FILE))).toBe(true);
    expect(existsSync(join(stageLogDir(logDir, 2, "echo-002"), "checkpoints", "checkpoint_ep50.json"))).toBe(
      true
    );
  });

  it("should sanitize stage directory names", () => {
    expect(stageLogDir("logs", 3, "calc/004 (hard)")).toBe(join("logs", "stage_3_calc_004__hard_"));
  });

  it("should reject an empty curriculum", () => {
    const agent = new QLearningAgent({ actionSpaceSize: 9, featureDimension: 40 });
    expect(() => runCurriculum(agent, [], { logDir, verbose: false })).toThrow(ConfigurationError);
  });

  it("should reject stages with different spaces", () => {
    const echo = makeEnvironment(catalog, "echo", "001");
    const calc = makeEnvironment(catalog, "calc", "001");
    const agent = new QLearningAgent(echo.spaces);

    expect(() =>
      runCurriculum(
        agent,
        [
          { name: "echo", env: echo, episodes: 1 },
          { name: "calc", env: calc, episodes: 1 },
        ],
        { logDir, verbose: false }
      )
    ).toThrow(ConfigurationError);
    expect(agent.episodesTrained).toBe(0);
  });
});
