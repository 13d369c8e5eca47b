#!/usr/bin/env node
/**
 * column-scrambler
 *
 * Randomly shuffles the values of selected columns in a CSV (or XLSX) file,
 * each column independently, and writes the result back out.
 *
 * Usage:
 *   column-scrambler data.csv -c 0,2 -o output.csv
 *   column-scrambler data.csv -c 1
 *   column-scrambler data.csv -c 0,1,2,3 --log-level DEBUG --seed 42
 */

import { runCli } from "./lib/run";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
