/**
 * Type identifiers in introgen.json - an exact name or an anchored pattern.
 */

import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@introgen/frontend";
import type { Ident, IntrogenObjectConfig } from "./types.js";

const PATTERN_CHARS = /[*+]/;

/**
 * Read the identifier of object entry `index`. `pattern` takes precedence
 * over `name`.
 */
export const parseIdent = (
  entry: IntrogenObjectConfig,
  index: number,
  fileName?: string
): Result<Ident, Diagnostic> => {
  if (entry.pattern !== undefined) {
    try {
      return ok({
        kind: "pattern",
        source: entry.pattern,
        regex: new RegExp(`^(?:${entry.pattern})$`),
      });
    } catch (err) {
      return error(
        createDiagnostic(
          "IGN1008",
          "error",
          `Bad pattern '${entry.pattern}' in object ${index}: ${err instanceof Error ? err.message : String(err)}`,
          fileName
        )
      );
    }
  }

  if (entry.name !== undefined) {
    if (PATTERN_CHARS.test(entry.name)) {
      return error(
        createDiagnostic(
          "IGN1007",
          "error",
          `'name' of object ${index} looks like a pattern: '${entry.name}'`,
          fileName,
          "Use 'pattern' instead of 'name'"
        )
      );
    }
    return ok({ kind: "name", name: entry.name });
  }

  return error(
    createDiagnostic(
      "IGN1006",
      "error",
      `Object ${index} has neither 'name' nor 'pattern'`,
      fileName
    )
  );
};

export const identMatches = (ident: Ident, typeName: string): boolean =>
  ident.kind === "name"
    ? ident.name === typeName
    : ident.regex.test(typeName);

export const formatIdent = (ident: Ident): string =>
  ident.kind === "name" ? ident.name : `/${ident.source}/`;
