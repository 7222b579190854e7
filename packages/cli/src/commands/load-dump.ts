/**
 * Dump loading shared by the commands
 */

import {
  formatDiagnostic,
  loadRecordDump,
  type RecordDump,
} from "@recordlens/core";
import { EXIT_LOAD_FAILED } from "../cli/constants.js";
import type { Logger } from "../logger.js";
import type { CommandFailure, Result } from "../types.js";

export const loadDump = (
  dumpPath: string,
  logger: Logger
): Result<RecordDump, CommandFailure> => {
  const result = loadRecordDump(dumpPath);
  if (!result.ok) {
    return {
      ok: false,
      error: {
        exitCode: EXIT_LOAD_FAILED,
        message: `Failed to load ${dumpPath}`,
        details: result.error.map(formatDiagnostic),
      },
    };
  }

  const { record, bodies } = result.value;
  logger.verbose(
    `Loaded ${result.value.fileName}: ${record.fields.length} fields, ${record.properties.length} properties, ${record.methods.length} methods (${bodies.size} with bodies)`
  );
  return result;
};
