/**
 * Error taxonomy for the gym.
 *
 * Episode-level mistakes (bad action, program that fails to run) are not
 * errors: they become rewards. These classes cover faults of the caller or
 * the infrastructure.
 */

export type RLErrorCode =
  | "CONFIGURATION"
  | "UNKNOWN_TASK"
  | "EPISODE_STATE"
  | "CHECKPOINT";

export class RLError extends Error {
  public readonly code: RLErrorCode;

  constructor(message: string, code: RLErrorCode) {
    super(message);
    this.name = "RLError";
    this.code = code;
  }
}

/**
 * Invalid hyperparameters, dimensions or names. Raised at construction.
 */
export class ConfigurationError extends RLError {
  constructor(message: string, code: RLErrorCode = "CONFIGURATION") {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

export class UnknownTaskError extends ConfigurationError {
  public readonly dslName: string;
  public readonly taskId: string;

  constructor(dslName: string, taskId: string) {
    super(`Unknown task ${dslName}/${taskId}`, "UNKNOWN_TASK");
    this.name = "UnknownTaskError";
    this.dslName = dslName;
    this.taskId = taskId;
  }
}

/**
 * step() called on a finished episode.
 */
export class EpisodeStateError extends RLError {
  constructor(message: string) {
    super(message, "EPISODE_STATE");
    this.name = "EpisodeStateError";
  }
}

export class CheckpointError extends RLError {
  public readonly key: string;

  constructor(message: string, key: string, options?: { cause?: unknown }) {
    super(message, "CHECKPOINT");
    this.name = "CheckpointError";
    this.key = key;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
