#!/usr/bin/env node

/**
 * Todo Query CLI entry point
 */

import { runCli } from "./program.js";

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
);
