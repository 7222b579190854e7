#!/usr/bin/env -S node --import tsx
/**
 * recordlens CLI - command-line interface for the record member classifier
 */

import { runCli } from "./cli.js";

// Ctrl+C cancels the running analysis; a second one kills the process
const controller = new AbortController();
process.once("SIGINT", () => {
  controller.abort(new Error("Interrupted"));
});

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args, { signal: controller.signal })
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
