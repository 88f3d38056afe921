/**
 * Per-type analysis driver
 */

import type { LibraryType, Version } from "@introgen/frontend";
import { Imports } from "./imports.js";
import {
  analyzeImports,
  extract,
  unhide,
  type OperationKind,
  type ReadonlySpecialFunctions,
} from "./special-functions/index.js";

export type TypePolicy = {
  readonly trustReturnValueNullability: boolean;
  /** Operations whose backing function must stay directly callable */
  readonly unhide: readonly OperationKind[];
  readonly minCfgVersion?: Version;
};

export type TypeAnalysis = {
  readonly specials: ReadonlySpecialFunctions;
  readonly imports: Imports;
};

/**
 * Reference-counted types get their clone from ref/unref
 */
export const isRefCounted = (specials: ReadonlySpecialFunctions): boolean =>
  specials.hasTrait("refIncrement") && specials.hasTrait("refDecrement");

/**
 * Classify a type's functions (mutating them in place) and collect the
 * declarations its generated operations need.
 */
export const analyzeType = (
  type: LibraryType,
  policy: TypePolicy
): TypeAnalysis => {
  const specials = extract(type.functions, {
    kind: type.kind,
    trustReturnValueNullability: policy.trustReturnValueNullability,
  });

  // `copy` duplicates the value while the generated clone only adds a
  // reference, so both stay available
  if (isRefCounted(specials)) {
    unhide(type.functions, specials, "clone");
  }
  for (const kind of policy.unhide) {
    unhide(type.functions, specials, kind);
  }

  const imports = new Imports(policy.minCfgVersion);
  analyzeImports(specials, imports);

  return { specials, imports };
};
