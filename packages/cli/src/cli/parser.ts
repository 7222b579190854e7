/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly dumpFile?: string;
  readonly options: CliOptions;
  /** Options the parser did not recognize */
  readonly unknownOptions: readonly string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknownOptions: string[] = [];
  let command = "";
  let dumpFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !dumpFile && !arg.startsWith("-")) {
      dumpFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknownOptions: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknownOptions: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--json":
        options.json = true;
        break;
      case "--only-generated":
        options.onlyGenerated = true;
        break;
      case "--debug-assertions":
        options.debugAssertions = true;
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, dumpFile, options, unknownOptions };
};
