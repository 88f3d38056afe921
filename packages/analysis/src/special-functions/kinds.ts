/**
 * Operation vocabulary - the conventional operations a raw function can
 * implement, and the names that identify them.
 */

import type { Visibility } from "@introgen/frontend";

/**
 * Operation kinds in registry key order
 */
export const OPERATION_KINDS = [
  "compare",
  "clone",
  "equal",
  "destroy",
  "refIncrement",
  "refDecrement",
  "format",
  "hash",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * Kinds recognized from a function name alone. Formatting is recognized from
 * the signature instead, see stringify.ts.
 */
export type NamedOperationKind = Exclude<OperationKind, "format">;

const OPERATION_NAMES: Readonly<Record<NamedOperationKind, readonly string[]>> =
  {
    compare: ["compare"],
    clone: ["copy"],
    equal: ["equal", "is_equal"],
    destroy: ["free", "destroy"],
    refIncrement: ["ref", "ref_"],
    refDecrement: ["unref"],
    hash: ["hash"],
  };

const NAME_TO_KIND: ReadonlyMap<string, NamedOperationKind> = new Map(
  OPERATION_KINDS.filter(
    (kind): kind is NamedOperationKind => kind !== "format"
  ).flatMap((kind) =>
    OPERATION_NAMES[kind].map(
      (name): [string, NamedOperationKind] => [name, kind]
    )
  )
);

/**
 * Name of the destroy function that only counts as the destructor when a
 * `copy` exists and no `free` does
 */
export const DESTROY_CONVENTION_NAME = "destroy";

/**
 * Reserved formatting name, renamed so wrappers don't shadow the target's own
 * to-owned-string conversion
 */
export const RESERVED_FORMAT_NAME = "to_string";
export const RENAMED_FORMAT_NAME = "to_str";

/**
 * Stringify functions whose result can back the formatting operation
 */
export const FORMAT_CANDIDATE_NAMES: ReadonlySet<string> = new Set([
  RESERVED_FORMAT_NAME,
  RENAMED_FORMAT_NAME,
  "name",
  "get_name",
]);

/**
 * Auxiliary function classifications
 */
export type StringifyKind = "staticStringify";

/**
 * Case-exact lookup of a function name in the vocabulary.
 */
export const parseOperationKind = (
  name: string
): NamedOperationKind | undefined => NAME_TO_KIND.get(name);

/**
 * Visibility given to a function once it backs an operation.
 *
 * Lifecycle functions are wrapped by the generated operation and hidden;
 * comparison helpers stay bound for the generated implementations only.
 */
export const visibilityFor = (kind: OperationKind): Visibility => {
  switch (kind) {
    case "clone":
    case "destroy":
    case "refIncrement":
    case "refDecrement":
      return "hidden";
    case "hash":
    case "compare":
    case "equal":
      return "private";
    case "format":
      return "public";
    default: {
      const exhaustive: never = kind;
      throw new Error(`ICE: Unhandled operation kind '${String(exhaustive)}'`);
    }
  }
};
