/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const packageJson: unknown = require("../../package.json");
  return typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
};

export const VERSION = readVersion();

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_LOAD_FAILED = 2;
/** 128 + SIGINT */
export const EXIT_CANCELLED = 130;
