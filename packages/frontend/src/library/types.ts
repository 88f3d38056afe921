/**
 * Library model - the structural view of an introspected C library that the
 * analysis passes work on.
 *
 * Function descriptors are owned by the caller. Analysis passes mutate
 * `name`, `ret.nullable` and `visibility` in place; every other field is
 * read-only.
 */

import type { Version } from "./version.js";

/**
 * How ownership of a returned value moves to the caller
 */
export type Transfer = "none" | "full" | "container";

/**
 * How a raw function surfaces in generated code.
 *
 * - public: bound and exported
 * - private: bound, used only by generated operation implementations
 * - hidden: not bound directly, wrapped by a generated operation
 * - suppressed: emitted commented-out; analysis never changes it
 */
export type Visibility = "public" | "private" | "hidden" | "suppressed";

/**
 * Variant of the type that owns a function list
 */
export type LibraryTypeKind = "enumeration" | "bitfield" | "other";

/**
 * Introspected type name of UTF-8 strings
 */
export const UTF8_TYPE_NAME = "utf8";

export type ParameterInfo = {
  readonly name: string;
  readonly typeName: string;
  readonly instanceParameter: boolean;
};

export type ReturnInfo = {
  readonly typeName: string;
  nullable: boolean;
  readonly transfer: Transfer;
};

export type FunctionInfo = {
  /** C symbol, e.g. "gtk_widget_get_name" */
  readonly rawName: string;
  /** Short name used for wrappers, e.g. "get_name" */
  name: string;
  readonly parameters: readonly ParameterInfo[];
  readonly ret?: ReturnInfo;
  visibility: Visibility;
  readonly version?: Version;
  /** Whether the function produces any generated code at all */
  readonly generate: boolean;
};

export type LibraryType = {
  readonly name: string;
  readonly kind: LibraryTypeKind;
  readonly functions: FunctionInfo[];
};

/**
 * Read-only per-type input of the analysis passes
 */
export type TypeContext = {
  readonly kind: LibraryTypeKind;
  /**
   * Trust upstream nullability annotations on return values instead of
   * assuming non-null formatting results
   */
  readonly trustReturnValueNullability: boolean;
};

export const isEnumLike = (kind: LibraryTypeKind): boolean =>
  kind === "enumeration" || kind === "bitfield";
