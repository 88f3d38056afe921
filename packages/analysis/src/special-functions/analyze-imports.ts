import type { Imports } from "../imports.js";
import type { ReadonlySpecialFunctions } from "./registry.js";

/**
 * Support declarations that generated operation implementations rely on
 */
export const ORDERING_SUPPORT = "ordering";
export const FORMATTING_SUPPORT = "formatting";
export const HASHING_SUPPORT = "hashing";
export const STATIC_STRING_SUPPORT = "static-string-ref";

/**
 * Register the declarations needed by the operations in `specials`, each
 * gated at the version of the function it comes from.
 */
export const analyzeImports = (
  specials: ReadonlySpecialFunctions,
  imports: Imports
): void => {
  for (const [kind, info] of specials.traits()) {
    switch (kind) {
      case "compare":
        imports.addWithVersion(ORDERING_SUPPORT, info.version);
        break;
      case "format":
        imports.addWithVersion(FORMATTING_SUPPORT, info.version);
        break;
      case "hash":
        imports.addWithVersion(HASHING_SUPPORT, info.version);
        break;
      default:
        break;
    }
  }

  for (const [, info] of specials.functions()) {
    switch (info.kind) {
      case "staticStringify":
        imports.addWithVersion(STATIC_STRING_SUPPORT, info.version);
        break;
    }
  }
};
