#!/usr/bin/env -S node --import tsx

/**
 * lambda-levels CLI
 *
 * Normalizes one of the built-in demo programs and reports the normal form,
 * the number of reductions and whether a limit stopped the reduction.
 *
 * Usage:
 *   lambda-levels [OPTIONS] <demo> [ARGS]
 *
 * Examples:
 *   lambda-levels numeral 3
 *   lambda-levels --step-limit 50 omega
 *   lambda-levels --help
 */

import process from "node:process";
import { runCli } from "../lib/cli/main.ts";

process.exitCode = runCli(process.argv.slice(2), console);
