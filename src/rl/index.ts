/**
 * RL Gym for DSL Program Synthesis
 *
 * Environment, agents, trainer and evaluator for generating programs one
 * token at a time against a checkable expected output.
 */

// Core types
export * from "./types";
export * from "./errors";

// Environment components
export * from "./environment";

// Learning algorithms
export * from "./learners";

// Training and evaluation
export * from "./evaluation";
