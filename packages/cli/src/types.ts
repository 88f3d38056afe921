/**
 * Type definitions for CLI
 */

import type { Version } from "@introgen/frontend";
import type { OperationKind } from "@introgen/analysis";

/**
 * Per-type entry in introgen.json. Exactly one of `name` and `pattern`.
 */
export type IntrogenObjectConfig = {
  readonly name?: string;
  readonly pattern?: string;
  readonly trustReturnValueNullability?: boolean;
  readonly unhide?: readonly string[];
};

/**
 * Configuration file (introgen.json)
 */
export type IntrogenConfig = {
  readonly $schema?: string;
  readonly options?: {
    readonly library?: string;
    readonly version?: string;
    readonly minCfgVersion?: string;
    readonly trustReturnValueNullability?: boolean;
  };
  readonly objects?: readonly IntrogenObjectConfig[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  config?: string;
  trustNullability?: boolean;
  minCfgVersion?: string;
};

/**
 * Identifier selecting the types an object entry applies to
 */
export type Ident =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "pattern"; readonly source: string; readonly regex: RegExp };

export type ObjectPolicy = {
  readonly ident: Ident;
  readonly trustReturnValueNullability?: boolean;
  readonly unhide: readonly OperationKind[];
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly library: string | undefined;
  readonly libraryVersion: string | undefined;
  readonly minCfgVersion: Version | undefined;
  readonly trustReturnValueNullability: boolean;
  readonly objects: readonly ObjectPolicy[];
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly json: boolean;
};
