/**
 * Stringify detection - functions that take only the instance and return a
 * string.
 */

import {
  UTF8_TYPE_NAME,
  isEnumLike,
  type FunctionInfo,
  type TypeContext,
} from "@introgen/frontend";
import { RENAMED_FORMAT_NAME, RESERVED_FORMAT_NAME } from "./kinds.js";

/**
 * Returns true for `(instance) -> non-null utf8` functions.
 *
 * Side effects, applied before the final nullability check and kept even
 * when the function is rejected:
 * - `to_string` is renamed to `to_str`
 * - outside enumerations and bitfields, and unless the type trusts its
 *   annotations, the renamed function's return is marked non-null. Existing
 *   bindings have always treated it that way; enumeration and bitfield
 *   annotations are accurate upstream.
 */
export const isStringify = (
  func: FunctionInfo,
  context: TypeContext
): boolean => {
  if (func.parameters.length !== 1) {
    return false;
  }
  if (!func.parameters[0]?.instanceParameter) {
    return false;
  }

  const ret = func.ret;
  if (!ret || ret.typeName !== UTF8_TYPE_NAME) {
    return false;
  }

  if (func.name === RESERVED_FORMAT_NAME) {
    func.name = RENAMED_FORMAT_NAME;

    if (!context.trustReturnValueNullability && !isEnumLike(context.kind)) {
      ret.nullable = false;
    }
  }

  // A nullable result cannot back a non-optional formatting contract
  return !ret.nullable;
};
