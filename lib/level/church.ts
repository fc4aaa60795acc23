/**
 * Church encoding utilities for level terms.
 *
 * This module converts between JavaScript numbers and booleans and the normal
 * forms of their Church encodings. Because levels depend on where a term sits,
 * every function takes the depth at which the encoding's outer abstraction
 * appears; after a program is normalized its result sits at depth 0.
 *
 * @see https://en.wikipedia.org/wiki/Church_encoding
 * @module
 */
import { type LevelTerm, mkApp, mkFunc, mkVar } from "./term.ts";
import { TermError } from "./termError.ts";

/**
 * @param n a number
 * @param depth the level bound by the numeral's outer abstraction
 * @returns `λf.λx.f (f … (f x))` in normal form, with n applications of f.
 */
export const churchNumeral = (n: number, depth = 0): LevelTerm => {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new TermError("only non-negative integers represented");
  }

  let body: LevelTerm = mkVar(depth + 1);
  for (let i = 0; i < n; i++) {
    body = mkApp(mkVar(depth), body);
  }
  return mkFunc(mkFunc(body));
};

/**
 * @returns `λa.λb.a` for true, `λa.λb.b` for false.
 */
export const churchBoolean = (b: boolean, depth = 0): LevelTerm =>
  mkFunc(mkFunc(mkVar(b ? depth : depth + 1)));

/**
 * @returns the number a normal-form Church numeral denotes, or undefined if
 * the term is not one.
 */
export const unChurchNumeral = (
  term: LevelTerm,
  depth = 0,
): number | undefined => {
  if (term.kind !== "level-func" || term.body.kind !== "level-func") {
    return undefined;
  }

  let count = 0;
  let body = term.body.body;
  while (
    body.kind === "non-terminal" &&
    body.lft.kind === "level-var" &&
    body.lft.index === depth
  ) {
    count++;
    body = body.rgt;
  }

  return body.kind === "level-var" && body.index === depth + 1
    ? count
    : undefined;
};

/**
 * @returns the boolean a normal-form Church boolean denotes, or undefined if
 * the term is not one.
 */
export const unChurchBoolean = (
  term: LevelTerm,
  depth = 0,
): boolean | undefined => {
  if (
    term.kind !== "level-func" ||
    term.body.kind !== "level-func" ||
    term.body.body.kind !== "level-var"
  ) {
    return undefined;
  }

  switch (term.body.body.index) {
    case depth:
      return true;
    case depth + 1:
      return false;
    default:
      return undefined;
  }
};
