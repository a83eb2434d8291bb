/**
 * Executor registry.
 *
 * DSLs are resolved through an explicit factory table at construction time.
 */

import type { ExecutorAdapter } from "../../rl/types";
import { ConfigurationError } from "../../rl/errors";
import { CalcExecutor } from "./calc";
import { EchoExecutor } from "./echo";

const EXECUTOR_FACTORIES = new Map<string, () => ExecutorAdapter>([
  ["echo", () => new EchoExecutor()],
  ["calc", () => new CalcExecutor()],
]);

/**
 * Create the executor adapter for a DSL.
 */
export function createExecutor(dslName: string): ExecutorAdapter {
  const factory = EXECUTOR_FACTORIES.get(dslName);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown DSL: ${dslName}. Available: ${getAvailableDsls().join(", ")}`
    );
  }
  return factory();
}

export function getAvailableDsls(): string[] {
  return Array.from(EXECUTOR_FACTORIES.keys());
}
