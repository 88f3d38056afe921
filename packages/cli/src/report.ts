/**
 * Analysis report - what the CLI prints for each analyzed type
 */

import {
  formatVersion,
  type LibraryType,
  type LibraryTypeKind,
  type Version,
  type Visibility,
} from "@introgen/frontend";
import type { OperationKind, TypeAnalysis } from "@introgen/analysis";

export type TypeReport = {
  readonly name: string;
  readonly kind: LibraryTypeKind;
  readonly traits: readonly {
    readonly kind: OperationKind;
    readonly source: string;
    readonly since?: string;
  }[];
  readonly staticStrings: readonly {
    readonly source: string;
    readonly since?: string;
  }[];
  readonly imports: readonly {
    readonly name: string;
    readonly since?: string;
  }[];
  readonly functions: readonly {
    readonly cName: string;
    readonly name: string;
    readonly visibility: Visibility;
  }[];
};

const since = (version: Version | undefined): { since?: string } =>
  version ? { since: formatVersion(version) } : {};

/**
 * Snapshot a type after analysis. Call it after `analyzeType`, since function
 * names and visibility are read from the mutated list.
 */
export const buildTypeReport = (
  type: LibraryType,
  analysis: TypeAnalysis
): TypeReport => ({
  name: type.name,
  kind: type.kind,
  traits: analysis.specials.traits().map(([kind, info]) => ({
    kind,
    source: info.sourceFunctionName,
    ...since(info.version),
  })),
  staticStrings: analysis.specials.functions().map(([source, info]) => ({
    source,
    ...since(info.version),
  })),
  imports: analysis.imports.entries().map((entry) => ({
    name: entry.name,
    ...since(entry.version),
  })),
  functions: type.functions.map((func) => ({
    cName: func.rawName,
    name: func.name,
    visibility: func.visibility,
  })),
});

const gate = (value: string | undefined): string =>
  value ? ` (since ${value})` : "";

export const formatTypeReport = (report: TypeReport): string => {
  const lines: string[] = [`${report.name} (${report.kind})`];

  if (report.traits.length > 0) {
    lines.push("  operations:");
    for (const trait of report.traits) {
      lines.push(`    ${trait.kind} <- ${trait.source}${gate(trait.since)}`);
    }
  }

  if (report.staticStrings.length > 0) {
    lines.push("  static strings:");
    for (const entry of report.staticStrings) {
      lines.push(`    ${entry.source}${gate(entry.since)}`);
    }
  }

  if (report.imports.length > 0) {
    lines.push("  requires:");
    for (const entry of report.imports) {
      lines.push(`    ${entry.name}${gate(entry.since)}`);
    }
  }

  if (report.functions.length > 0) {
    lines.push("  functions:");
    for (const func of report.functions) {
      lines.push(`    ${func.cName} as ${func.name}: ${func.visibility}`);
    }
  }

  return lines.join("\n");
};
