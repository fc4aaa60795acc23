/**
 * Binding towers.
 *
 * A program is a main term preceded by helper terms. Each helper is bound by
 * its own outer abstraction, so that after normalization the main term can
 * refer to helper `k` simply as `Var(k)`. No extra reduction rule is needed for
 * these global constants: beta-reduction does all the work.
 *
 * @example
 * ```ts
 * import { ProgramBuilder, mkApp, mkFunc, normalize } from "lambda-levels";
 *
 * const program = new ProgramBuilder();
 * const zero = program.define("zero", (l) => mkFunc(mkFunc(l(1))));
 * const succ = program.define("succ", (l) =>
 *   mkFunc(mkFunc(mkFunc(
 *     mkApp(l(1), mkApp(mkApp(l(0), l(1)), l(2))),
 *   ))));
 * const { term } = normalize(program.build(mkApp(succ, zero)));
 * ```
 *
 * @module
 */
import { clone } from "./lift.ts";
import { type LevelTerm, type LevelVar, mkApp, mkFunc, mkVar } from "./term.ts";
import { TermError } from "./termError.ts";

/**
 * Builds `((λ.((λ.( … mainFn … )) h1)) h0)`.
 *
 * Helper `k` sits at depth `k` of the tower, so its own binders start at
 * level `k`, and `mainFn` sits at depth `helpers.length`.
 */
export const constructProgram = (
  helpers: readonly LevelTerm[],
  mainFn: LevelTerm,
): LevelTerm => {
  const [first, ...rest] = helpers;
  if (first === undefined) {
    return clone(mainFn);
  }
  return mkApp(mkFunc(constructProgram(rest, mainFn)), clone(first));
};

/**
 * Produces the variable for the binder `offset` levels below the current
 * tower depth.
 */
export type LocalRef = (offset: number) => LevelVar;

/**
 * Accumulates helpers in definition order and addresses them by level.
 */
export class ProgramBuilder {
  private readonly helpers: LevelTerm[] = [];
  private readonly names = new Map<string, number>();

  /** The number of helpers defined so far, which is also the main depth. */
  get depth(): number {
    return this.helpers.length;
  }

  /**
   * Registers a helper.
   *
   * @param name a unique name used by {@link ProgramBuilder.ref}
   * @param build receives a {@link LocalRef} relative to the helper's depth
   * @returns the global reference through which later terms reach the helper
   */
  define(name: string, build: (local: LocalRef) => LevelTerm): LevelVar {
    if (this.names.has(name)) {
      throw new TermError(`helper ${name} is already defined`);
    }
    const index = this.helpers.length;
    this.helpers.push(build(this.local));
    this.names.set(name, index);
    return mkVar(index);
  }

  /** The variable bound to the helper registered under `name`. */
  ref(name: string): LevelVar {
    const index = this.names.get(name);
    if (index === undefined) {
      throw new TermError(`unknown helper: ${name}`);
    }
    return mkVar(index);
  }

  global(index: number): LevelVar {
    if (index >= this.helpers.length) {
      throw new TermError(
        `helper ${index} is not defined, only ${this.helpers.length} exist`,
      );
    }
    return mkVar(index);
  }

  readonly local: LocalRef = (offset) => mkVar(this.helpers.length + offset);

  /** Wraps `mainFn` in the tower of every helper defined so far. */
  build(mainFn: LevelTerm): LevelTerm {
    return constructProgram(this.helpers, mainFn);
  }
}
