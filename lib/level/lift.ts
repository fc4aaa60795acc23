/**
 * Lifting of free variable levels.
 *
 * @module
 */
import { type LevelTerm, mkVar } from "./term.ts";
import { mapVars } from "./traverse.ts";

/**
 * Adds `amount` to every variable whose level is at least `cutoff`.
 *
 * The cutoff stays fixed when descending through an abstraction: with levels,
 * a binder introduced inside the subtree always sits above the cutoff, so the
 * whole subtree moves by the same amount.
 */
export const lift = (
  term: LevelTerm,
  amount: number,
  cutoff: number,
): LevelTerm =>
  mapVars(
    term,
    0,
    ({ index }) => index < cutoff ? mkVar(index) : mkVar(index + amount),
  );

/**
 * @returns a deep copy of the term sharing no nodes with the original.
 */
export const clone = (term: LevelTerm): LevelTerm => lift(term, 0, 0);
