/**
 * Operation classification for one type's function list.
 *
 * A single ordered pass over the functions:
 * 1. The stringify check runs first for every function. It may rename
 *    `to_string` to `to_str`, and every later decision in the same step reads
 *    the final name.
 * 2. Stringify functions may become the formatting operation and, on
 *    enumerations and bitfields, static-string accessors.
 * 3. Other functions are looked up in the operation vocabulary.
 *
 * `destroy` is only a fallback destructor: it is held back during the pass
 * and registered afterwards if the type has a `copy` but no `free`.
 */

import {
  isEnumLike,
  type FunctionInfo,
  type TypeContext,
} from "@introgen/frontend";
import {
  DESTROY_CONVENTION_NAME,
  FORMAT_CANDIDATE_NAMES,
  parseOperationKind,
  visibilityFor,
  type OperationKind,
} from "./kinds.js";
import { SpecialFunctions } from "./registry.js";
import { isStringify } from "./stringify.js";

type DeferredDestroy = {
  readonly rawName: string;
  readonly position: number;
};

const applyVisibility = (func: FunctionInfo, kind: OperationKind): void => {
  if (func.visibility !== "suppressed") {
    func.visibility = visibilityFor(kind);
  }
};

const returnsStaticString = (
  func: FunctionInfo,
  context: TypeContext
): boolean =>
  func.ret?.transfer === "none" &&
  // Only enumeration and bitfield strings are assumed to be static
  isEnumLike(context.kind) &&
  // A lifetime can't be promised for a function that isn't generated
  func.generate;

/**
 * Classify `functions` in place and return what they implement.
 */
export const extract = (
  functions: FunctionInfo[],
  context: TypeContext
): SpecialFunctions => {
  const specials = new SpecialFunctions();
  let hasClone = false;
  let hasDestroy = false;
  let deferredDestroy: DeferredDestroy | undefined;

  for (const [position, func] of functions.entries()) {
    if (isStringify(func, context)) {
      if (returnsStaticString(func, context)) {
        specials.setFunction(func.rawName, {
          kind: "staticStringify",
          version: func.version,
        });
      }

      // Several candidates: the last one in list order wins
      if (FORMAT_CANDIDATE_NAMES.has(func.name)) {
        specials.setTrait("format", {
          sourceFunctionName: func.rawName,
          version: func.version,
        });
      }
      continue;
    }

    const kind = parseOperationKind(func.name);
    if (kind === undefined) {
      continue;
    }

    if (kind === "destroy" && func.name === DESTROY_CONVENTION_NAME) {
      deferredDestroy = { rawName: func.rawName, position };
      continue;
    }

    applyVisibility(func, kind);
    if (kind === "clone") {
      hasClone = true;
    } else if (kind === "destroy") {
      hasDestroy = true;
    }

    specials.setTrait(kind, {
      sourceFunctionName: func.rawName,
      version: func.version,
    });
  }

  if (hasClone && !hasDestroy && deferredDestroy) {
    const func = functions[deferredDestroy.position];
    if (func) {
      applyVisibility(func, "destroy");
      specials.setTrait("destroy", {
        sourceFunctionName: deferredDestroy.rawName,
        version: func.version,
      });
    }
  }

  return specials;
};
