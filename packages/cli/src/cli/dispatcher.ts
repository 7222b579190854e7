/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import { classifyCommand } from "../commands/classify.js";
import { inspectCommand } from "../commands/inspect.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import type { CommandFailure, RecordLensConfig, Result } from "../types.js";
import {
  EXIT_CANCELLED,
  EXIT_OK,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

export type RunOptions = {
  /** Directory to look for recordlens.json from; defaults to process.cwd() */
  readonly cwd?: string;
  /** Aborts the running command; the CLI then exits with 130 */
  readonly signal?: AbortSignal;
  /** Defaults to the console */
  readonly logger?: Logger;
};

const COMMANDS = ["classify", "inspect"] as const;
type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command =>
  COMMANDS.some((c) => c === value);

const reportFailure = (logger: Logger, failure: CommandFailure): number => {
  logger.error(failure.message);
  for (const detail of failure.details) {
    logger.error(detail);
  }
  return failure.exitCode;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  runOptions: RunOptions = {}
): Promise<number> => {
  const { cwd = process.cwd(), signal } = runOptions;
  const parsed = parseArgs(args);
  const { command } = parsed;

  // Handle version and help
  if (command === "version") {
    console.log(`recordlens v${VERSION}`);
    return EXIT_OK;
  }

  if (command === "help" || !command) {
    showHelp();
    return EXIT_OK;
  }

  const earlyLogger =
    runOptions.logger ?? createConsoleLogger({ verbose: false, quiet: false });

  if (!isCommand(command)) {
    earlyLogger.error(`Unknown command '${command}'`);
    earlyLogger.error("Run 'recordlens --help' for usage information");
    return EXIT_USAGE;
  }

  if (parsed.unknownOptions.length > 0) {
    earlyLogger.error(`Unknown option '${parsed.unknownOptions.join("', '")}'`);
    return EXIT_USAGE;
  }

  if (parsed.options.config === "") {
    earlyLogger.error("--config requires a file path");
    return EXIT_USAGE;
  }

  if (!parsed.dumpFile) {
    earlyLogger.error("Dump file required");
    earlyLogger.error(`Usage: recordlens ${command} <dump.yaml>`);
    return EXIT_USAGE;
  }

  // Load config (optional unless named with --config)
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: RecordLensConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      earlyLogger.error(configResult.error);
      return EXIT_USAGE;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(fileConfig, parsed.options);
  const logger = runOptions.logger ?? createConsoleLogger(config);
  if (configPath) {
    logger.verbose(`Using config ${configPath}`);
  }

  const dumpPath = resolve(cwd, parsed.dumpFile);

  let result: Result<string, CommandFailure>;
  try {
    switch (command) {
      case "classify":
        result = await classifyCommand(dumpPath, config, logger, signal);
        break;

      case "inspect":
        result = await inspectCommand(dumpPath, logger, signal);
        break;

      default: {
        const exhaustiveCheck: never = command;
        throw new Error(`ICE: Unhandled command: ${exhaustiveCheck}`);
      }
    }
  } catch (error) {
    if (signal?.aborted) {
      logger.error("Cancelled");
      return EXIT_CANCELLED;
    }
    throw error;
  }

  if (!result.ok) {
    return reportFailure(logger, result.error);
  }
  logger.result(result.value);
  return EXIT_OK;
};
