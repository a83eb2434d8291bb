/**
 * Echo DSL: a program prints its own text.
 *
 * The smallest useful interpreter for exercising the gym. Whitespace-only
 * programs are a syntax error.
 */

import type { ExecutionResult, ExecutorAdapter } from "../../rl/types";
import { positionalSimilarity } from "./similarity";

export class EchoExecutor implements ExecutorAdapter {
  readonly name = "echo";

  execute(program: string): ExecutionResult {
    const text = program.trim();
    if (text.length === 0) {
      return { success: false, output: null, error: "empty program" };
    }
    return { success: true, output: text, error: null };
  }

  similarity(a: string, b: string): number {
    return positionalSimilarity(a, b);
  }
}
