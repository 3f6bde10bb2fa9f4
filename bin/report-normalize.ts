#!/usr/bin/env node
/**
 * report-normalize entry point
 *
 * Usage:
 *   report-normalize <input.csv|xlsx> <output.csv|xlsx> [--strategy adaptive|triplet]
 *   report-normalize series [normalized.csv] [series.csv | -]
 */

import { createProgram } from "../src/cli.js";
import { describeError } from "../src/errors.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
