/**
 * Capture-safe substitution over De Bruijn levels.
 *
 * @module
 */
import { lift } from "./lift.ts";
import { type LevelTerm, mkVar } from "./term.ts";
import { mapVars } from "./traverse.ts";

/**
 * Replaces the binder at level `varIndex` with `arg`, removing that binder.
 *
 * Variables above `varIndex` were bound inside the redex and move down one
 * level. Variables below it were bound outside and stay put. Each occurrence of
 * `varIndex` receives a copy of `arg` lifted by `liftAmount`, the number of
 * abstractions crossed between the redex and the occurrence.
 *
 * @param term the body of the abstraction being eliminated
 * @param liftAmount zero at the redex, one more per abstraction crossed
 * @param varIndex the level of the eliminated binder, counted from the root of
 * the whole reduction
 * @param arg the argument of the redex
 */
export const substitute = (
  term: LevelTerm,
  liftAmount: number,
  varIndex: number,
  arg: LevelTerm,
): LevelTerm =>
  mapVars(term, liftAmount, ({ index }, crossed) => {
    if (index > varIndex) {
      return mkVar(index - 1);
    } else if (index < varIndex) {
      return mkVar(index);
    } else {
      return lift(arg, crossed, varIndex);
    }
  });
