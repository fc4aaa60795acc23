/**
 * lambda-levels: normal-order reduction for the untyped lambda calculus over
 * De Bruijn levels.
 *
 * This module re-exports the public API:
 * - Level terms, factories, structural equality and printing
 * - Lift and capture-safe substitution
 * - One-step leftmost-outermost reduction and bounded normalization
 * - Binding towers for programs with global helpers
 * - Church encodings and classic combinators
 *
 * @example
 * ```ts
 * import { mkApp, mkFunc, mkVar, normalize, prettyPrint } from "lambda-levels";
 * const { term, steps } = normalize(mkApp(mkFunc(mkVar(0)), mkVar(5)));
 * console.log(prettyPrint(term), steps); // "5" 1
 * ```
 *
 * @module
 */

// Term exports
export {
  applyMany,
  equivalent,
  type LevelApp,
  type LevelFunc,
  type LevelTerm,
  type LevelVar,
  mkApp,
  mkFunc,
  mkVar,
  size,
} from "./level/term.ts";
export { TermError } from "./level/termError.ts";
/** Generates a fully parenthesized representation of a level term. */
export { prettyPrint } from "./level/prettyPrint.ts";

// Index algebra exports
export { clone, lift } from "./level/lift.ts";
export { substitute } from "./level/substitute.ts";

// Evaluator exports
export { reduceOneStep } from "./evaluator/reduction.ts";
export {
  DEFAULT_LIMITS,
  normalize,
  type NormalizeOptions,
  type NormalizeResult,
  type ReductionLimits,
} from "./evaluator/normalize.ts";

// Program exports
export {
  constructProgram,
  type LocalRef,
  ProgramBuilder,
} from "./level/program.ts";

// Church encoding exports
export {
  churchBoolean,
  churchNumeral,
  unChurchBoolean,
  unChurchNumeral,
} from "./level/church.ts";
export {
  type ChurchPrelude,
  createChurchPrelude,
  succChain,
} from "./consts/church.ts";
export { I, K, Omega, S, SelfApply } from "./consts/combinators.ts";

// Generator exports
export { randLevelTerm, type RandomSource } from "./level/generator.ts";

export { VERSION } from "./shared/version.ts";
