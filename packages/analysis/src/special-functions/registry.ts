/**
 * Special function registry - what one type's function list implements.
 *
 * Built by `extract` for a single type and read-only for everything after it.
 */

import type { Version } from "@introgen/frontend";
import {
  OPERATION_KINDS,
  type OperationKind,
  type StringifyKind,
} from "./kinds.js";

/**
 * The raw function backing an operation
 */
export type TraitInfo = {
  readonly sourceFunctionName: string;
  readonly version?: Version;
};

/**
 * Extra metadata for a raw function, keyed by its C symbol
 */
export type SpecialFunctionInfo = {
  readonly kind: StringifyKind;
  readonly version?: Version;
};

/**
 * Read side of the registry, handed to the emitter and the later passes
 */
export type ReadonlySpecialFunctions = {
  hasTrait(kind: OperationKind): boolean;
  getTrait(kind: OperationKind): TraitInfo | undefined;
  /** Entries in operation kind order */
  traits(): readonly (readonly [OperationKind, TraitInfo])[];
  /** Entries in raw name order */
  functions(): readonly (readonly [string, SpecialFunctionInfo])[];
};

export class SpecialFunctions implements ReadonlySpecialFunctions {
  private readonly traitInfos = new Map<OperationKind, TraitInfo>();
  private readonly functionInfos = new Map<string, SpecialFunctionInfo>();

  /**
   * Record the function backing `kind`. A later call for the same kind
   * replaces the earlier one.
   */
  setTrait(kind: OperationKind, info: TraitInfo): void {
    this.traitInfos.set(kind, info);
  }

  setFunction(rawName: string, info: SpecialFunctionInfo): void {
    this.functionInfos.set(rawName, info);
  }

  hasTrait(kind: OperationKind): boolean {
    return this.traitInfos.has(kind);
  }

  getTrait(kind: OperationKind): TraitInfo | undefined {
    return this.traitInfos.get(kind);
  }

  traits(): readonly (readonly [OperationKind, TraitInfo])[] {
    return OPERATION_KINDS.flatMap(
      (kind): (readonly [OperationKind, TraitInfo])[] => {
        const info = this.traitInfos.get(kind);
        return info ? [[kind, info]] : [];
      }
    );
  }

  functions(): readonly (readonly [string, SpecialFunctionInfo])[] {
    return [...this.functionInfos.entries()].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
  }
}
