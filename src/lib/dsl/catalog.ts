/**
 * Task catalog.
 *
 * An immutable set of tasks and per-DSL vocabularies, passed explicitly to
 * whoever needs it. Loaded from `data/tasks.json` by default.
 */

import { readFileSync } from "fs";
import { join } from "path";
import type { TaskDescriptor, Vocabulary } from "../../rl/types";
import { ConfigurationError, UnknownTaskError } from "../../rl/errors";

export const DEFAULT_TASKS_PATH = join(__dirname, "..", "..", "..", "data", "tasks.json");

export interface CatalogData {
  vocabularies: Record<string, string[]>;
  tasks: TaskDescriptor[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTask(raw: unknown, index: number): TaskDescriptor {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Task #${index} is not an object`);
  }
  const { id, dslName, source, expectedOutput, description } = raw;
  if (
    typeof id !== "string" ||
    typeof dslName !== "string" ||
    typeof source !== "string" ||
    typeof expectedOutput !== "string"
  ) {
    throw new ConfigurationError(
      `Task #${index} needs string id, dslName, source and expectedOutput`
    );
  }
  return {
    id,
    dslName,
    source,
    expectedOutput,
    ...(typeof description === "string" && { description }),
  };
}

/**
 * Validate parsed JSON into catalog data.
 */
export function parseCatalogData(raw: unknown): CatalogData {
  if (!isRecord(raw)) {
    throw new ConfigurationError("Task catalog must be a JSON object");
  }

  const vocabularies: Record<string, string[]> = {};
  const rawVocabs = raw.vocabularies ?? {};
  if (!isRecord(rawVocabs)) {
    throw new ConfigurationError("'vocabularies' must be an object");
  }
  for (const [dslName, tokens] of Object.entries(rawVocabs)) {
    if (!isStringArray(tokens)) {
      throw new ConfigurationError(`Vocabulary for ${dslName} must be a string array`);
    }
    vocabularies[dslName] = tokens;
  }

  if (!Array.isArray(raw.tasks)) {
    throw new ConfigurationError("'tasks' must be an array");
  }
  const tasks = raw.tasks.map((t, i) => parseTask(t, i));

  return { vocabularies, tasks };
}

export class TaskCatalog {
  private readonly tasks: ReadonlyMap<string, TaskDescriptor>;
  private readonly vocabularies: ReadonlyMap<string, Vocabulary>;

  constructor(data: CatalogData) {
    const tasks = new Map<string, TaskDescriptor>();
    for (const task of data.tasks) {
      const key = `${task.dslName}/${task.id}`;
      if (tasks.has(key)) {
        throw new ConfigurationError(`Duplicate task ${key}`);
      }
      tasks.set(key, Object.freeze({ ...task }));
    }

    const vocabularies = new Map<string, Vocabulary>();
    for (const [dslName, tokens] of Object.entries(data.vocabularies)) {
      vocabularies.set(dslName, Object.freeze([...tokens]));
    }

    this.tasks = tasks;
    this.vocabularies = vocabularies;
  }

  /**
   * Load a catalog from a JSON file.
   */
  static fromFile(path: string = DEFAULT_TASKS_PATH): TaskCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read task catalog ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    return new TaskCatalog(parseCatalogData(raw));
  }

  loadTask(dslName: string, taskId: string): TaskDescriptor {
    const task = this.tasks.get(`${dslName}/${taskId}`);
    if (!task) {
      throw new UnknownTaskError(dslName, taskId);
    }
    return task;
  }

  listTasks(dslName?: string): TaskDescriptor[] {
    const all = Array.from(this.tasks.values());
    return dslName ? all.filter((t) => t.dslName === dslName) : all;
  }

  vocabularyFor(dslName: string): Vocabulary {
    const vocabulary = this.vocabularies.get(dslName);
    if (!vocabulary) {
      throw new ConfigurationError(`No vocabulary for DSL: ${dslName}`);
    }
    return vocabulary;
  }

  listDsls(): string[] {
    return Array.from(this.vocabularies.keys());
  }
}
