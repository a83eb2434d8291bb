/**
 * Checkpoints as JSON files in a directory.
 *
 * Each save writes a temporary file and renames it over the target, so a
 * reader sees either the previous checkpoint or the new one.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { join } from "path";
import type { CheckpointStore } from "../../rl/types";
import { CheckpointError, errorMessage } from "../../rl/errors";

const KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;

export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key) || key.startsWith(".")) {
      throw new CheckpointError(`Invalid checkpoint key: ${key}`, key);
    }
    return join(this.dir, `${key}.json`);
  }

  save(key: string, payload: string): void {
    const target = this.pathFor(key);
    const tmp = `${target}.tmp`;
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(tmp, payload, "utf-8");
      renameSync(tmp, target);
    } catch (err) {
      throw new CheckpointError(`Failed to write checkpoint ${key}: ${errorMessage(err)}`, key, {
        cause: err,
      });
    }
  }

  load(key: string): string {
    const path = this.pathFor(key);
    if (!existsSync(path)) {
      throw new CheckpointError(`Checkpoint not found: ${key}`, key);
    }
    try {
      return readFileSync(path, "utf-8");
    } catch (err) {
      throw new CheckpointError(`Failed to read checkpoint ${key}: ${errorMessage(err)}`, key, {
        cause: err,
      });
    }
  }

  list(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((f) => f.endsWith(".json"))
      .map((f) => f.slice(0, -".json".length))
      .sort();
  }
}
