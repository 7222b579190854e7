/**
 * Console logging gated by --verbose / --quiet
 */

import type { ResolvedConfig } from "./types.js";

export type Logger = {
  /** Command results */
  readonly result: (text: string) => void;
  /** Progress detail, shown with --verbose unless --quiet is set */
  readonly verbose: (text: string) => void;
  readonly error: (text: string) => void;
};

/**
 * Results go to stdout; verbose detail and errors to stderr, so that
 * `--json --verbose` output still parses.
 */
export const createConsoleLogger = (
  config: Pick<ResolvedConfig, "verbose" | "quiet">,
  out: Pick<Console, "log" | "error"> = console
): Logger => ({
  result: (text) => out.log(text),
  verbose: (text) => {
    if (config.verbose && !config.quiet) {
      out.error(text);
    }
  },
  error: (text) => out.error(`Error: ${text}`),
});
