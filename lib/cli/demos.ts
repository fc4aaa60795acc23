/**
 * Built-in programs the CLI can normalize.
 *
 * @module
 */
import rsexport from "random-seed";
import type { ReductionLimits } from "../evaluator/normalize.ts";
import { createChurchPrelude, succChain } from "../consts/church.ts";
import { K, Omega, S } from "../consts/combinators.ts";
import { unChurchNumeral } from "../level/church.ts";
import { randLevelTerm } from "../level/generator.ts";
import { applyMany, type LevelTerm, mkVar } from "../level/term.ts";
import { CliError } from "./options.ts";
const { create } = rsexport;

export interface Demo {
  term: LevelTerm;
  /** Renders the normal form as a JavaScript value, when it has one. */
  describe?: (normalForm: LevelTerm) => string | undefined;
  /** Used for any limit not given on the command line. */
  limits?: ReductionLimits;
}

const DEFAULT_SEED = "lambda-levels";

// random terms often contain a divergent or exploding subterm
const RANDOM_LIMITS: ReductionLimits = {
  stepLimit: 10000,
  sizeLimit: 10000,
};

const describeNumeral = (normalForm: LevelTerm): string | undefined => {
  const n = unChurchNumeral(normalForm);
  return n === undefined ? undefined : `church numeral ${n}`;
};

const natArg = (demo: string, value: string | undefined): number => {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new CliError(
      `${demo} expects non-negative integer arguments, got '${value ?? ""}'`,
    );
  }
  return Number.parseInt(value, 10);
};

const arity = (demo: string, args: readonly string[], max: number): void => {
  if (args.length > max) {
    throw new CliError(
      `Too many arguments for ${demo}. Use --help for usage information.`,
    );
  }
};

export const buildDemo = (
  name: string,
  args: readonly string[],
): Demo => {
  switch (name) {
    case "numeral": {
      arity(name, args, 1);
      const prelude = createChurchPrelude();
      return {
        term: prelude.program.build(succChain(prelude, natArg(name, args[0]))),
        describe: describeNumeral,
      };
    }
    case "add":
    case "mult": {
      arity(name, args, 2);
      const prelude = createChurchPrelude();
      const op = name === "add" ? prelude.ADD : prelude.MULT;
      const main = applyMany(
        op,
        succChain(prelude, natArg(name, args[0])),
        succChain(prelude, natArg(name, args[1])),
      );
      return {
        term: prelude.program.build(main),
        describe: describeNumeral,
      };
    }
    case "omega":
      arity(name, args, 0);
      return { term: Omega };
    case "skk":
      arity(name, args, 0);
      return { term: applyMany(S, K, K, mkVar(10)) };
    case "random": {
      arity(name, args, 2);
      const n = natArg(name, args[0]);
      if (n < 2) {
        throw new CliError("random needs at least 2 nodes");
      }
      return {
        term: randLevelTerm(create(args[1] ?? DEFAULT_SEED), n),
        limits: RANDOM_LIMITS,
      };
    }
    default:
      throw new CliError(
        `Unknown demo: ${name}\nUse --help for usage information.`,
      );
  }
};
