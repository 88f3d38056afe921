/**
 * introgen frontend - library model, versions and type model loading
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./library/types.js";
export * from "./library/version.js";
export {
  loadTypeModel,
  validateTypeModel,
  isRecord,
} from "./library/model-loader.js";
