/**
 * Church encodings as program helpers.
 *
 * Each helper is written relative to its own position in a binding tower, so
 * that a main term built on top of the prelude can refer to `ZERO`, `SUCC` and
 * the rest as global constants.
 *
 * @module
 */
import { ProgramBuilder } from "../level/program.ts";
import { type LevelTerm, type LevelVar, mkApp, mkFunc } from "../level/term.ts";
import { TermError } from "../level/termError.ts";

export interface ChurchPrelude {
  program: ProgramBuilder;
  TRUE: LevelVar;
  FALSE: LevelVar;
  ZERO: LevelVar;
  SUCC: LevelVar;
  ADD: LevelVar;
  MULT: LevelVar;
}

/**
 * @returns a fresh program holding, in order, TRUE, FALSE, ZERO, SUCC, ADD and
 * MULT, together with their global references.
 */
export const createChurchPrelude = (): ChurchPrelude => {
  const program = new ProgramBuilder();

  /*
   * true is the first alternative of two arguments
   *
   * λab.a
   */
  const TRUE = program.define("true", (l) => mkFunc(mkFunc(l(0))));

  /*
   * false is the second alternative of two arguments
   *
   * λab.b
   */
  const FALSE = program.define("false", (l) => mkFunc(mkFunc(l(1))));

  /*
   * Zero. apply a function to its argument zero times.
   *
   * λfx.x
   */
  const ZERO = program.define("zero", (l) => mkFunc(mkFunc(l(1))));

  /*
   * Successor function
   *
   * λnfx.f(nfx)
   */
  const SUCC = program.define(
    "succ",
    (l) => mkFunc(mkFunc(mkFunc(mkApp(l(1), mkApp(mkApp(l(0), l(1)), l(2)))))),
  );

  /*
   * Binary addition
   *
   * λmnfx.mf((nf)x)
   */
  const ADD = program.define(
    "add",
    (l) =>
      mkFunc(mkFunc(mkFunc(mkFunc(
        mkApp(mkApp(l(0), l(2)), mkApp(mkApp(l(1), l(2)), l(3))),
      )))),
  );

  /*
   * Multiplication is composition
   *
   * λmnfx.m(nf)x
   */
  const MULT = program.define(
    "mult",
    (l) =>
      mkFunc(mkFunc(mkFunc(mkFunc(
        mkApp(mkApp(l(0), mkApp(l(1), l(2))), l(3)),
      )))),
  );

  return { program, TRUE, FALSE, ZERO, SUCC, ADD, MULT };
};

/**
 * @returns `SUCC (SUCC ( … ZERO))` with `n` applications of SUCC, unreduced.
 */
export const succChain = (prelude: ChurchPrelude, n: number): LevelTerm => {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new TermError("only non-negative integers represented");
  }
  let term: LevelTerm = prelude.ZERO;
  for (let i = 0; i < n; i++) {
    term = mkApp(prelude.SUCC, term);
  }
  return term;
};
