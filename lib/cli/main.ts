/**
 * Entry point logic for the lambda-levels CLI, kept apart from the executable
 * so that it can be driven with any console.
 *
 * @module
 */
import { DEFAULT_LIMITS, normalize } from "../evaluator/normalize.ts";
import { prettyPrint } from "../level/prettyPrint.ts";
import { TermError } from "../level/termError.ts";
import { VERSION } from "../shared/version.ts";
import { buildDemo } from "./demos.ts";
import { CliError, helpText, parseArgs } from "./options.ts";

export type CliConsole = Pick<Console, "log" | "error">;

const yesNo = (flag: boolean): string => flag ? "yes" : "no";

/**
 * @returns the process exit code
 */
export function runCli(args: readonly string[], out: CliConsole): number {
  try {
    const { options, positional } = parseArgs(args);

    if (options.help) {
      out.log(helpText());
      return 0;
    }

    if (options.version) {
      out.log(`lambda-levels v${VERSION}`);
      return 0;
    }

    const [name, ...demoArgs] = positional;
    if (name === undefined) {
      throw new CliError(
        "Error: No demo specified.\nUse --help for usage information.",
      );
    }

    const demo = buildDemo(name, demoArgs);
    const limits = demo.limits ?? DEFAULT_LIMITS;
    const stepLimit = options.stepLimit ?? limits.stepLimit;
    const sizeLimit = options.sizeLimit ?? limits.sizeLimit;
    const result = normalize(demo.term, stepLimit, sizeLimit, {
      onStep: options.verbose
        ? (term, step) => out.error(`[${step}] ${prettyPrint(term)}`)
        : undefined,
    });

    out.log(`normal form: ${prettyPrint(result.term)}`);
    out.log(`steps: ${result.steps}`);
    out.log(`size peak: ${result.sizePeak}`);
    out.log(`step limit exceeded: ${yesNo(result.stepExcess)}`);
    out.log(`size limit exceeded: ${yesNo(result.sizeExcess)}`);

    const value = demo.describe?.(result.term);
    if (value !== undefined) {
      out.log(`value: ${value}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof CliError || error instanceof TermError) {
      out.error(error.message);
      return 1;
    }
    throw error;
  }
}
