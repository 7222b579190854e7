/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  showHelp,
  parseArgs,
  runCli,
  type ParsedArgs,
  type RunOptions,
} from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { createConsoleLogger, type Logger } from "./logger.js";
