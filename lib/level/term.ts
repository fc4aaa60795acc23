/**
 * Untyped lambda terms over De Bruijn levels.
 *
 * This module defines the AST for nameless lambda terms in which a variable
 * counts binders from the outermost enclosing abstraction inward, rather than
 * from the occurrence outward. Every node caches the node count of its subtree.
 *
 * @example
 * ```ts
 * import { mkApp, mkFunc, mkVar, prettyPrint } from "lambda-levels";
 *
 * // (λ.0) 5
 * const redex = mkApp(mkFunc(mkVar(0)), mkVar(5));
 * console.log(redex.size); // 4
 * console.log(prettyPrint(redex)); // "(λ.(0) 5)"
 * ```
 *
 * @module
 */
import { TermError } from "./termError.ts";

/**
 * A reference to the binder at the given level.
 *
 * Level 0 is the outermost abstraction of the tree under consideration.
 */
export interface LevelVar {
  readonly kind: "level-var";
  readonly index: number;
  readonly size: 1;
}

/**
 * λ.<body>, introducing one binder. Inside the body that binder's level is the
 * number of abstractions between the body and the root.
 */
export interface LevelFunc {
  readonly kind: "level-func";
  readonly body: LevelTerm;
  readonly size: number;
}

/**
 * An application of lft to rgt.
 */
export interface LevelApp {
  readonly kind: "non-terminal";
  readonly lft: LevelTerm;
  readonly rgt: LevelTerm;
  readonly size: number;
}

/**
 * The legal terms of the nameless untyped lambda calculus.
 * e ::= n | λ.e | e e, where n is a binder level
 */
export type LevelTerm = LevelVar | LevelFunc | LevelApp;

export const mkVar = (index: number): LevelVar => {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new TermError(
      `variable level must be a non-negative integer, got ${index}`,
    );
  }
  return {
    kind: "level-var",
    index,
    size: 1,
  };
};

export const mkFunc = (body: LevelTerm): LevelFunc => ({
  kind: "level-func",
  body,
  size: 1 + body.size,
});

/**
 * @param lft the function term
 * @param rgt the argument term
 * @returns a new application node
 */
export const mkApp = (lft: LevelTerm, rgt: LevelTerm): LevelApp => ({
  kind: "non-terminal",
  lft,
  rgt,
  size: 1 + lft.size + rgt.size,
});

/**
 * Apply a term to its arguments, associating to the left.
 * @param terms the head followed by its arguments.
 * @returns an unevaluated result.
 */
export const applyMany = (...terms: LevelTerm[]): LevelTerm => {
  const [head, ...args] = terms;
  if (head === undefined) {
    throw new TermError("there must be at least one term to apply");
  }
  return args.reduce<LevelTerm>(mkApp, head);
};

/**
 * @returns how many nodes are present in the term.
 */
export const size = (term: LevelTerm): number => term.size;

/**
 * Compare two level terms for structural equality.
 *
 * Level terms are already canonical, so no renaming is involved.
 */
export const equivalent = (lft: LevelTerm, rgt: LevelTerm): boolean => {
  const firstStack: LevelTerm[] = [lft];
  const secondStack: LevelTerm[] = [rgt];

  while (firstStack.length > 0 && secondStack.length > 0) {
    const firstItem = firstStack.pop();
    const secondItem = secondStack.pop();

    if (firstItem === undefined || secondItem === undefined) {
      throw new Error("stack underflow");
    }

    switch (firstItem.kind) {
      case "level-var":
        if (
          secondItem.kind !== "level-var" ||
          firstItem.index !== secondItem.index
        ) {
          return false;
        }
        break;
      case "level-func":
        if (secondItem.kind !== "level-func") {
          return false;
        }
        firstStack.push(firstItem.body);
        secondStack.push(secondItem.body);
        break;
      case "non-terminal":
        if (secondItem.kind !== "non-terminal") {
          return false;
        }
        firstStack.push(firstItem.rgt, firstItem.lft);
        secondStack.push(secondItem.rgt, secondItem.lft);
        break;
    }
  }

  return firstStack.length === secondStack.length;
};
