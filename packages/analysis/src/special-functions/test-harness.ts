/**
 * Function descriptor builders for special function tests.
 */

import type {
  FunctionInfo,
  ReturnInfo,
  Transfer,
  Version,
} from "@introgen/frontend";

export type MethodOptions = {
  readonly rawName?: string;
  readonly ret?: ReturnInfo;
  readonly version?: Version;
  readonly visibility?: FunctionInfo["visibility"];
  readonly generate?: boolean;
};

/**
 * Instance method `<type>_<name>(self)` returning `options.ret`.
 */
export const method = (
  name: string,
  options: MethodOptions = {}
): FunctionInfo => ({
  rawName: options.rawName ?? `test_obj_${name}`,
  name,
  parameters: [{ name: "self", typeName: "TestObj", instanceParameter: true }],
  ret: options.ret,
  visibility: options.visibility ?? "public",
  version: options.version,
  generate: options.generate ?? true,
});

export const utf8Return = (nullable: boolean, transfer: Transfer): ReturnInfo => ({
  typeName: "utf8",
  nullable,
  transfer,
});

export const stringMethod = (
  name: string,
  nullable: boolean,
  transfer: Transfer,
  options: MethodOptions = {}
): FunctionInfo => method(name, { ...options, ret: utf8Return(nullable, transfer) });
