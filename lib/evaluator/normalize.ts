/**
 * Bounded normalization.
 *
 * Beta-reduction need not terminate: `(λ.(0 0)) (λ.(0 0))` reduces to itself
 * forever, and some terms grow without bound before reaching a normal form.
 * The driver below repeats {@link reduceOneStep} under a step limit and a term
 * size limit, and reports which limit stopped it.
 *
 * @example
 * ```ts
 * import { mkApp, mkFunc, mkVar, normalize } from "lambda-levels";
 *
 * const selfApply = mkFunc(mkApp(mkVar(0), mkVar(0)));
 * const omega = mkApp(selfApply, selfApply);
 * const { steps, stepExcess } = normalize(omega, 100);
 * // steps === 100, stepExcess === true
 * ```
 *
 * @module
 */
import { clone } from "../level/lift.ts";
import type { LevelTerm } from "../level/term.ts";
import { TermError } from "../level/termError.ts";
import { reduceOneStep } from "./reduction.ts";

export interface NormalizeResult {
  /** The last committed term; in normal form when neither flag is set. */
  term: LevelTerm;
  /** Reductions committed. */
  steps: number;
  /** Largest size among committed reducts, 0 when nothing was reduced. */
  sizePeak: number;
  /** A further reduction was possible but `stepLimit` had been reached. */
  stepExcess: boolean;
  /** The next reduct was larger than `sizeLimit` and was discarded. */
  sizeExcess: boolean;
}

export interface NormalizeOptions {
  /**
   * Called with the starting term as step 0, then after every committed
   * reduction.
   */
  onStep?: (term: LevelTerm, step: number) => void;
}

export interface ReductionLimits {
  stepLimit: number;
  sizeLimit: number;
}

export const DEFAULT_LIMITS: Readonly<ReductionLimits> = {
  stepLimit: Number.POSITIVE_INFINITY,
  sizeLimit: Number.POSITIVE_INFINITY,
};

const checkLimit = (name: string, value: number): void => {
  if (
    Number.isNaN(value) || value < 0 ||
    (Number.isFinite(value) && !Number.isInteger(value))
  ) {
    throw new TermError(
      `${name} must be a non-negative integer or Infinity, got ${value}`,
    );
  }
};

/**
 * Reduces a copy of `term` in normal order until it reaches a normal form or
 * a limit is hit. A reduction that would exceed a limit is neither applied
 * nor counted.
 *
 * @param stepLimit the maximum number of reductions to commit
 * @param sizeLimit the maximum size of any committed term
 */
export const normalize = (
  term: LevelTerm,
  stepLimit = DEFAULT_LIMITS.stepLimit,
  sizeLimit = DEFAULT_LIMITS.sizeLimit,
  options: NormalizeOptions = {},
): NormalizeResult => {
  checkLimit("stepLimit", stepLimit);
  checkLimit("sizeLimit", sizeLimit);
  const { onStep } = options;

  const result: NormalizeResult = {
    term: clone(term),
    steps: 0,
    sizePeak: 0,
    stepExcess: false,
    sizeExcess: false,
  };
  onStep?.(result.term, result.steps);

  for (
    let reduced = reduceOneStep(result.term, 0);
    reduced !== undefined;
    reduced = reduceOneStep(result.term, 0)
  ) {
    if (result.steps === stepLimit) {
      result.stepExcess = true;
      break;
    }

    if (reduced.size > sizeLimit) {
      result.sizeExcess = true;
      break;
    }

    result.steps++;
    result.sizePeak = Math.max(result.sizePeak, reduced.size);
    result.term = reduced;
    onStep?.(result.term, result.steps);
  }

  return result;
};
