/**
 * Type definitions for CLI
 */

export type OutputFormat = "text" | "json";

/**
 * recordlens configuration file (recordlens.json)
 */
export type RecordLensConfig = {
  readonly $schema?: string;
  readonly format?: OutputFormat;
  readonly onlyGenerated?: boolean;
  readonly debugAssertions?: boolean;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  json?: boolean;
  onlyGenerated?: boolean;
  debugAssertions?: boolean;
};

/**
 * Resolved configuration (after merging config file + CLI args)
 */
export type ResolvedConfig = {
  readonly format: OutputFormat;
  readonly onlyGenerated: boolean;
  readonly debugAssertions: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Why a command failed: a one-line message, the exit code, and any formatted
 * diagnostics to print below it.
 */
export type CommandFailure = {
  readonly exitCode: number;
  readonly message: string;
  readonly details: readonly string[];
};

export type { Result } from "@recordlens/core";
