/**
 * Configuration loading and validation
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type {
  CliOptions,
  OutputFormat,
  RecordLensConfig,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "recordlens.json";

const BOOLEAN_KEYS = [
  "onlyGenerated",
  "debugAssertions",
  "verbose",
  "quiet",
] as const;

type BooleanKey = (typeof BOOLEAN_KEYS)[number];

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isOutputFormat = (value: unknown): value is OutputFormat =>
  value === "text" || value === "json";

/**
 * Check a parsed recordlens.json document
 */
export const validateConfig = (
  value: unknown
): Result<RecordLensConfig, string> => {
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: must be a JSON object` };
  }

  const { $schema, format } = value;
  if ($schema !== undefined && typeof $schema !== "string") {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: '$schema' must be a string`,
    };
  }
  if (format !== undefined && !isOutputFormat(format)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'format' must be "text" or "json"`,
    };
  }

  const flags: Partial<Record<BooleanKey, boolean>> = {};
  for (const key of BOOLEAN_KEYS) {
    const flag = value[key];
    if (flag === undefined) continue;
    if (typeof flag !== "boolean") {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: '${key}' must be a boolean`,
      };
    }
    flags[key] = flag;
  }

  return {
    ok: true,
    value: {
      $schema: typeof $schema === "string" ? $schema : undefined,
      format: isOutputFormat(format) ? format : undefined,
      ...flags,
    },
  };
};

/**
 * Load recordlens.json
 */
export const loadConfig = (
  configPath: string
): Result<RecordLensConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(parsed);
};

/**
 * Find recordlens.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 */
export const resolveConfig = (
  config: RecordLensConfig,
  cliOptions: CliOptions
): ResolvedConfig => {
  const quiet = cliOptions.quiet ?? config.quiet ?? false;
  return {
    format: cliOptions.json ? "json" : (config.format ?? "text"),
    onlyGenerated: cliOptions.onlyGenerated ?? config.onlyGenerated ?? false,
    debugAssertions:
      cliOptions.debugAssertions ?? config.debugAssertions ?? false,
    // --quiet wins over --verbose
    verbose: !quiet && (cliOptions.verbose ?? config.verbose ?? false),
    quiet,
  };
};
