/**
 * Pretty-printing for level terms.
 *
 * The output is fully parenthesized and shows raw binder levels. It is meant
 * for logs and test names; there is no parser for it.
 *
 * @module
 */
import type { LevelTerm } from "./term.ts";

/**
 * @param term the level term
 * @returns `λ.(body)` for abstractions, `(lft rgt)` for applications and the
 * decimal level for variables
 */
export const prettyPrint = (term: LevelTerm): string => {
  const parts: string[] = [];
  // The stack can hold either terms or literal text.
  const stack: (LevelTerm | string)[] = [term];

  while (stack.length > 0) {
    const item = stack.pop();

    if (item === undefined) {
      throw new Error("stack underflow");
    } else if (typeof item === "string") {
      parts.push(item);
    } else {
      switch (item.kind) {
        case "level-var":
          parts.push(`${item.index}`);
          break;
        case "level-func":
          stack.push(")", item.body, "λ.(");
          break;
        case "non-terminal":
          stack.push(")", item.rgt, " ", item.lft, "(");
          break;
      }
    }
  }

  return parts.join("");
};
