/**
 * Command-line argument parsing for the lambda-levels CLI.
 *
 * @module
 */
import { VERSION } from "../shared/version.ts";

export class CliError extends Error {}

export interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  /** Unset unless given on the command line. */
  stepLimit?: number;
  sizeLimit?: number;
}

export interface CLIInvocation {
  options: CLIOptions;
  /** The demo name followed by its arguments. */
  positional: string[];
}

const parseLimit = (flag: string, value: string | undefined): number => {
  if (value === undefined) {
    throw new CliError(`${flag} requires a value`);
  }
  if (!/^\d+$/.test(value)) {
    throw new CliError(
      `${flag} must be a non-negative integer, got '${value}'`,
    );
  }
  return Number.parseInt(value, 10);
};

export function parseArgs(args: readonly string[]): CLIInvocation {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--step-limit":
      case "-s":
        options.stepLimit = parseLimit(arg, args[++i]);
        break;
      case "--size-limit":
      case "-m":
        options.sizeLimit = parseLimit(arg, args[++i]);
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CliError(
            `Unknown option: ${arg}\nUse --help for usage information.`,
          );
        }
        positional.push(arg);
        break;
    }
  }

  return { options, positional };
}

export const helpText = (): string => `
lambda-levels v${VERSION}

USAGE:
    lambda-levels [OPTIONS] <demo> [ARGS]

DEMOS:
    numeral <n>          SUCC applied n times to ZERO
    add <m> <n>          Church addition
    mult <m> <n>         Church multiplication
    omega                (λ.(0 0)) (λ.(0 0)), which never terminates
    skk                  S K K applied to a free variable
    random <n> [seed]    A random closed term with n nodes; it may diverge, so
                         step and size limits default to 10000 each

OPTIONS:
    -h, --help               Show this help message
    -v, --version            Show version information
    -V, --verbose            Print every reduction step to stderr
    -s, --step-limit <n>     Stop after n reductions (default: unbounded)
    -m, --size-limit <n>     Refuse reductions producing terms larger than n
                             (default: unbounded)

EXAMPLES:
    lambda-levels numeral 3
    lambda-levels --step-limit 50 omega
    lambda-levels -V mult 2 3
`;
