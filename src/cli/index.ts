#!/usr/bin/env node

/**
 * CLI entry point.
 */

import { runCli } from "./program.js";
import { logError } from "./colors.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  logError(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
