/**
 * Stack-based rebuilding of level terms.
 *
 * Terms can nest far deeper than the JavaScript call stack allows, so every
 * whole-tree walk in this package keeps its own work stack instead of
 * recursing.
 *
 * @module
 */
import {
  type LevelTerm,
  type LevelVar,
  mkApp,
  mkFunc,
} from "./term.ts";

type Task =
  | { readonly kind: "visit"; readonly term: LevelTerm; readonly binders: number }
  | { readonly kind: "build-func" }
  | { readonly kind: "build-app" };

const popResult = (results: LevelTerm[]): LevelTerm => {
  const result = results.pop();
  if (result === undefined) {
    throw new Error("stack underflow");
  }
  return result;
};

/**
 * Rebuilds a term with fresh nodes, replacing every variable by the term
 * `onVar` returns for it.
 *
 * @param binders the count passed to `onVar` for a variable at the root; it
 * grows by one for each abstraction enclosing the variable
 * @param onVar must return a term that shares no nodes with `term`
 */
export const mapVars = (
  term: LevelTerm,
  binders: number,
  onVar: (variable: LevelVar, binders: number) => LevelTerm,
): LevelTerm => {
  const results: LevelTerm[] = [];
  const tasks: Task[] = [{ kind: "visit", term, binders }];

  while (tasks.length > 0) {
    const task = tasks.pop();

    if (task === undefined) {
      throw new Error("stack underflow");
    }

    switch (task.kind) {
      case "visit": {
        const { term: item, binders: crossed } = task;
        switch (item.kind) {
          case "level-var":
            results.push(onVar(item, crossed));
            break;
          case "level-func":
            tasks.push(
              { kind: "build-func" },
              { kind: "visit", term: item.body, binders: crossed + 1 },
            );
            break;
          case "non-terminal":
            // popped in reverse: lft is rebuilt first, then rgt
            tasks.push(
              { kind: "build-app" },
              { kind: "visit", term: item.rgt, binders: crossed },
              { kind: "visit", term: item.lft, binders: crossed },
            );
            break;
        }
        break;
      }
      case "build-func":
        results.push(mkFunc(popResult(results)));
        break;
      case "build-app": {
        const rgt = popResult(results);
        const lft = popResult(results);
        results.push(mkApp(lft, rgt));
        break;
      }
    }
  }

  return popResult(results);
};
