/**
 * Diagnostic types for record dump loading
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Record dump loading errors (RLN9001-RLN9014)
  | "RLN9001" // Dump file not found
  | "RLN9002" // Failed to read dump file
  | "RLN9003" // Invalid YAML in dump file
  | "RLN9004" // Dump document must be an object
  | "RLN9005" // Missing or invalid 'record' section
  | "RLN9006" // Invalid field declaration
  | "RLN9007" // Invalid method declaration
  | "RLN9008" // Invalid property declaration
  | "RLN9009" // Invalid type string
  | "RLN9010" // Unknown member reference
  | "RLN9011" // Unknown variable
  | "RLN9012" // Invalid instruction
  | "RLN9013" // Duplicate member declaration
  | "RLN9014"; // Invalid method body

export type SourceLocation = {
  readonly file: string;
  readonly path: string; // e.g. "methods[3].body.instructions[1]"
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(`${diagnostic.location.file}:${diagnostic.location.path}`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
