/**
 * Leftmost-outermost beta-reduction.
 *
 * @module
 */
import { clone } from "../level/lift.ts";
import { substitute } from "../level/substitute.ts";
import { type LevelTerm, mkApp, mkFunc } from "../level/term.ts";

/** A subterm together with the way back to the root. */
interface Position {
  readonly term: LevelTerm;
  readonly depth: number;
  readonly parent?: Position;
  /** Which child of `parent` this is; only read for applications. */
  readonly side: "lft" | "rgt";
}

/**
 * Contracts the leftmost-outermost redex of the term.
 *
 * An application whose left side is an abstraction is contracted before either
 * side is searched, and the left side is searched before the right. This is
 * normal order, which reaches a normal form whenever one exists.
 *
 * The result never shares nodes with the input.
 *
 * @param term the term to reduce
 * @param depth the number of abstractions between the reduction root and
 * `term`; a redex found here eliminates the binder at this level
 * @returns the reduced term, or undefined when `term` is in normal form
 */
export const reduceOneStep = (
  term: LevelTerm,
  depth = 0,
): LevelTerm | undefined => {
  const stack: Position[] = [{ term, depth, side: "lft" }];

  while (stack.length > 0) {
    const position = stack.pop();

    if (position === undefined) {
      throw new Error("stack underflow");
    }

    const { term: item } = position;
    switch (item.kind) {
      case "level-var":
        break;
      case "level-func":
        stack.push({
          term: item.body,
          depth: position.depth + 1,
          parent: position,
          side: "lft",
        });
        break;
      case "non-terminal":
        if (item.lft.kind === "level-func") {
          return rebuildPath(
            position,
            substitute(item.lft.body, 0, position.depth, item.rgt),
          );
        }
        // popped in reverse: the whole of lft is searched before rgt
        stack.push(
          {
            term: item.rgt,
            depth: position.depth,
            parent: position,
            side: "rgt",
          },
          {
            term: item.lft,
            depth: position.depth,
            parent: position,
            side: "lft",
          },
        );
        break;
    }
  }

  return undefined;
};

/**
 * Replaces the subterm at `position` by `reduct`, copying every enclosing
 * node up to the root.
 */
const rebuildPath = (position: Position, reduct: LevelTerm): LevelTerm => {
  let result = reduct;
  for (
    let current = position;
    current.parent !== undefined;
    current = current.parent
  ) {
    const enclosing = current.parent.term;
    switch (enclosing.kind) {
      case "level-var":
        throw new Error("a variable has no subterms");
      case "level-func":
        result = mkFunc(result);
        break;
      case "non-terminal":
        result = current.side === "lft"
          ? mkApp(result, clone(enclosing.rgt))
          : mkApp(clone(enclosing.lft), result);
        break;
    }
  }
  return result;
};
