import type { FunctionInfo } from "@introgen/frontend";
import type { OperationKind } from "./kinds.js";
import type { ReadonlySpecialFunctions } from "./registry.js";

/**
 * Make the function backing `kind` public again.
 *
 * Some operations must stay directly callable even though `extract` hid them,
 * e.g. `copy` on a reference-counted type, where the generated clone only
 * adds a reference.
 */
export const unhide = (
  functions: FunctionInfo[],
  specials: ReadonlySpecialFunctions,
  kind: OperationKind
): void => {
  const trait = specials.getTrait(kind);
  if (!trait) {
    return;
  }

  const func = functions.find(
    (f) =>
      f.rawName === trait.sourceFunctionName && f.visibility !== "suppressed"
  );
  if (func) {
    func.visibility = "public";
  }
};
