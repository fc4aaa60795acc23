/**
 * Random level term generation.
 *
 * This module provides functionality for generating random level terms of a
 * specified size using a random source, so that results are reproducible from
 * a seed.
 *
 * @module
 */
import { type LevelTerm, mkApp, mkFunc, mkVar } from "./term.ts";
import { TermError } from "./termError.ts";

/**
 * Source of random integers, satisfied by a `random-seed` generator.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

/**
 * @param rs the random source to use.
 * @param n the exact number of nodes in the result.
 * @param freeLevels the depth the term is meant to sit at: levels below it may
 * occur free, and the outermost abstraction binds level `freeLevels`. With the
 * default of 0 the result is closed, which needs at least two nodes.
 * @returns a term whose variables all refer to a binder in scope or to one of
 * the `freeLevels` outer levels.
 */
export const randLevelTerm = (
  rs: RandomSource,
  n: number,
  freeLevels = 0,
): LevelTerm => {
  if (!Number.isInteger(n) || n <= 0) {
    throw new TermError("A valid term must contain at least one node.");
  }
  if (n === 1 && freeLevels <= 0) {
    throw new TermError("A closed term must contain at least two nodes.");
  }
  return randomTerm(rs, n, freeLevels);
};

/*
 * Variables are drawn from [0, scope), where scope counts the free levels
 * plus every abstraction enclosing the position.
 */
const randomTerm = (
  rs: RandomSource,
  n: number,
  scope: number,
): LevelTerm => {
  if (n === 1) {
    return mkVar(rs.intBetween(0, scope - 1));
  }

  // an application needs three nodes, and variables need something in scope
  if (n === 2 || scope === 0 || rs.intBetween(0, 1) === 0) {
    return mkFunc(randomTerm(rs, n - 1, scope + 1));
  }

  const lftSize = rs.intBetween(1, n - 2);
  return mkApp(
    randomTerm(rs, lftSize, scope),
    randomTerm(rs, n - 1 - lftSize, scope),
  );
};
