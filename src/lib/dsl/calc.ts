/**
 * Calc DSL: integer arithmetic expressions.
 *
 *   expr   := term (("+" | "-") term)*
 *   term   := factor (("*" | "/") factor)*
 *   factor := "-" factor | "(" expr ")" | digits
 *
 * Values are arbitrary-precision integers (bigint). Division truncates toward
 * zero. Parse failures and division by zero are
 * reported in the result, never thrown.
 */

import type { ExecutionResult, ExecutorAdapter } from "../../rl/types";
import { positionalSimilarity } from "./similarity";

class CalcSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalcSyntaxError";
  }
}

type CalcToken =
  | { kind: "num"; value: bigint }
  | { kind: "op"; value: "+" | "-" | "*" | "/" | "(" | ")" };

function tokenize(source: string): CalcToken[] {
  const tokens: CalcToken[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[0-9]/.test(ch)) {
      let j = i;
      while (j < source.length && /[0-9]/.test(source[j])) j++;
      tokens.push({ kind: "num", value: BigInt(source.slice(i, j)) });
      i = j;
      continue;
    }
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/" || ch === "(" || ch === ")") {
      tokens.push({ kind: "op", value: ch });
      i++;
      continue;
    }
    throw new CalcSyntaxError(`unexpected character '${ch}' at ${i}`);
  }

  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: CalcToken[]) {}

  parse(): bigint {
    if (this.tokens.length === 0) {
      throw new CalcSyntaxError("empty program");
    }
    const value = this.expr();
    if (this.pos < this.tokens.length) {
      throw new CalcSyntaxError(`unexpected token at ${this.pos}`);
    }
    return value;
  }

  private peekOp(): string | null {
    const token = this.tokens[this.pos];
    return token && token.kind === "op" ? token.value : null;
  }

  private expr(): bigint {
    let value = this.term();
    for (let op = this.peekOp(); op === "+" || op === "-"; op = this.peekOp()) {
      this.pos++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): bigint {
    let value = this.factor();
    for (let op = this.peekOp(); op === "*" || op === "/"; op = this.peekOp()) {
      this.pos++;
      const rhs = this.factor();
      if (op === "*") {
        value = value * rhs;
      } else {
        if (rhs === 0n) throw new CalcSyntaxError("division by zero");
        value = value / rhs;
      }
    }
    return value;
  }

  private factor(): bigint {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new CalcSyntaxError("unexpected end of program");
    }
    if (token.kind === "num") {
      this.pos++;
      return token.value;
    }
    if (token.value === "-") {
      this.pos++;
      return -this.factor();
    }
    if (token.value === "(") {
      this.pos++;
      const value = this.expr();
      if (this.peekOp() !== ")") {
        throw new CalcSyntaxError("missing ')'");
      }
      this.pos++;
      return value;
    }
    throw new CalcSyntaxError(`unexpected '${token.value}'`);
  }
}

/**
 * Evaluate an expression. Throws CalcSyntaxError on malformed input.
 */
export function evaluateCalc(source: string): bigint {
  return new Parser(tokenize(source)).parse();
}

export class CalcExecutor implements ExecutorAdapter {
  readonly name = "calc";

  execute(program: string): ExecutionResult {
    try {
      const value = evaluateCalc(program);
      return { success: true, output: value.toString(), error: null };
    } catch (err) {
      if (err instanceof CalcSyntaxError) {
        return { success: false, output: null, error: err.message };
      }
      throw err;
    }
  }

  similarity(a: string, b: string): number {
    return positionalSimilarity(a, b);
  }
}
