/**
 * introgen analyze command - classify the special functions of every type in
 * a model file
 */

import {
  loadTypeModel,
  map,
  type Diagnostic,
  type LibraryType,
  type Result,
} from "@introgen/frontend";
import { analyzeType } from "@introgen/analysis";
import { findObjectPolicy, policyForType } from "../config.js";
import { formatIdent } from "../ident.js";
import { buildTypeReport, formatTypeReport, type TypeReport } from "../report.js";
import type { ResolvedConfig } from "../types.js";

/**
 * Analyze already-loaded types. Mutates their function lists.
 */
export const analyzeTypes = (
  types: readonly LibraryType[],
  config: ResolvedConfig
): TypeReport[] =>
  types.map((type) => {
    const policy = policyForType(config, type.name);

    if (config.verbose) {
      const entry = findObjectPolicy(config, type.name);
      console.log(
        `Analyzing ${type.name} (${type.kind}, ${type.functions.length} functions)`
      );
      console.log(
        `  trustReturnValueNullability=${policy.trustReturnValueNullability}` +
          (entry ? ` from object ${formatIdent(entry.ident)}` : "")
      );
    }

    const analysis = analyzeType(type, policy);

    if (config.verbose) {
      for (const [kind, info] of analysis.specials.traits()) {
        console.log(`  ${kind} <- ${info.sourceFunctionName}`);
      }
    }

    return buildTypeReport(type, analysis);
  });

/**
 * Load `modelPath`, analyze it and print the report
 */
export const analyzeCommand = (
  modelPath: string,
  config: ResolvedConfig
): Result<readonly TypeReport[], Diagnostic[]> => {
  const result = map(loadTypeModel(modelPath), (types) =>
    analyzeTypes(types, config)
  );

  if (result.ok && !config.quiet) {
    console.log(
      config.json
        ? JSON.stringify(result.value, null, 2)
        : result.value.map(formatTypeReport).join("\n\n")
    );
  }

  return result;
};
