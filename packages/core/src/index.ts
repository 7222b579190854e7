/**
 * recordlens core - record member classification over normalized method bodies
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./type-system/types.js";
export * from "./type-system/known-types.js";
export * from "./type-system/type-ops.js";
export * from "./type-system/type-strings.js";
export * from "./type-system/type-system.js";

export * from "./il/instructions.js";
export * as il from "./il/builders.js";
export { printInstruction, printBody } from "./il/printer.js";

export { BackingFieldMap, type BackingFieldPair } from "./record/backing-field-map.js";
export {
  RecordClassifier,
  type ClassifierOptions,
} from "./record/classifier.js";
export * from "./record/report.js";
export { backingFieldName } from "./record/names.js";

export type { RecordDump } from "./dump/types.js";
export {
  loadRecordDump,
  parseRecordDump,
  createDumpDecompiler,
} from "./dump/loader.js";
