/**
 * recordlens classify command - report which record members are generated
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
  classifyRecord,
  createDumpDecompiler,
  createTypeSystem,
  formatReport,
  type RecordReport,
} from "@recordlens/core";
import type { Logger } from "../logger.js";
import type { CommandFailure, ResolvedConfig, Result } from "../types.js";
import { loadDump } from "./load-dump.js";

const renderJson = (report: RecordReport, onlyGenerated: boolean): string =>
  JSON.stringify(
    onlyGenerated
      ? { ...report, members: report.members.filter((m) => m.generated) }
      : report,
    null,
    2
  );

/**
 * Load a record dump and classify all of its members.
 * Returns the rendered report.
 */
export const classifyCommand = async (
  dumpPath: string,
  config: ResolvedConfig,
  logger: Logger,
  signal?: AbortSignal
): Promise<Result<string, CommandFailure>> => {
  const loaded = loadDump(dumpPath, logger);
  if (!loaded.ok) {
    return loaded;
  }
  const dump = loaded.value;

  // Let a pending SIGINT land before the analysis starts
  await yieldToEventLoop();

  const report = classifyRecord(
    dump.record,
    createTypeSystem(createDumpDecompiler(dump)),
    { signal, debugAssertions: config.debugAssertions }
  );

  const generated = report.members.filter((m) => m.generated).length;
  logger.verbose(
    `Classified ${report.members.length} members of ${report.record}: ${generated} generated`
  );

  return {
    ok: true,
    value:
      config.format === "json"
        ? renderJson(report, config.onlyGenerated)
        : formatReport(report, config.onlyGenerated),
  };
};
