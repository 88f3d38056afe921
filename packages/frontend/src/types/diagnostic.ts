/**
 * Diagnostic types for introgen
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Configuration (IGN1001-IGN1099)
  | "IGN1001" // Config file not found
  | "IGN1002" // Failed to read config file
  | "IGN1003" // Invalid JSON in config file
  | "IGN1004" // Config must be an object
  | "IGN1005" // Invalid option value
  | "IGN1006" // Object entry has neither 'name' nor 'pattern'
  | "IGN1007" // 'name' looks like a pattern
  | "IGN1008" // Invalid 'pattern' regular expression
  | "IGN1009" // Unknown operation kind in 'unhide'
  // Type model (IGN2001-IGN2099)
  | "IGN2001" // Model file not found
  | "IGN2002" // Failed to read model file
  | "IGN2003" // Invalid JSON in model file
  | "IGN2004" // Model must be an object with a 'types' array
  | "IGN2005" // Invalid type entry
  | "IGN2006" // Invalid function entry
  // Versions (IGN3001-IGN3099)
  | "IGN3001"; // Malformed version string

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly file?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  file?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  file,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.file) {
    parts.push(`${diagnostic.file}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
