#!/usr/bin/env node
/**
 * b24-relay executable.
 *
 * Logger settings are read from the environment when `@elizaos/core` first
 * loads, so flags are mapped to env here and the CLI is imported afterwards.
 */
import process from "node:process";

process.title = "b24-relay";

const argv = process.argv;

if (argv.includes("--no-color")) {
  process.env.NO_COLOR = "1";
  process.env.FORCE_COLOR = "0";
}

// An explicit LOG_LEVEL wins over --debug / --verbose.
process.env.LOG_LEVEL ||= argv.includes("--debug")
  ? "debug"
  : argv.includes("--verbose")
    ? "info"
    : "error";

import("./cli/run-main.js")
  .then(({ runCli }) => runCli(argv))
  .catch((error: unknown) => {
    console.error(
      "[b24-relay] CLI failed:",
      error instanceof Error ? (error.stack ?? error.message) : error,
    );
    process.exit(1);
  });
