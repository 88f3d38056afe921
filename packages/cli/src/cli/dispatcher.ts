/**
 * CLI command dispatcher
 */

import { basename, resolve } from "node:path";
import {
  flatMap,
  formatDiagnostic,
  type Diagnostic,
  type Result,
} from "@introgen/frontend";
import { analyzeCommand } from "../commands/analyze.js";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import type { CliOptions, IntrogenConfig, ResolvedConfig } from "../types.js";
import {
  EXIT_CONFIG,
  EXIT_MODEL,
  EXIT_OK,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Load and resolve the config named on the command line, or the nearest
 * introgen.json. Without either, defaults apply.
 */
const loadResolvedConfig = (
  options: CliOptions,
  cwd: string
): Result<ResolvedConfig, Diagnostic[]> => {
  const configPath = options.config
    ? resolve(cwd, options.config)
    : findConfig(cwd);

  if (!configPath) {
    const empty: IntrogenConfig = {};
    return resolveConfig(empty, options);
  }

  return flatMap(loadConfig(configPath), (config) =>
    resolveConfig(config, options, basename(configPath))
  );
};

/**
 * Main CLI entry point
 */
export const runCli = (args: string[], cwd = process.cwd()): number => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`introgen v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (parsed.command !== "analyze") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'introgen --help' for usage");
    return EXIT_USAGE;
  }

  if (parsed.unknown.length > 0) {
    console.error(`Error: Unknown option '${parsed.unknown[0]}'`);
    return EXIT_USAGE;
  }

  if (!parsed.modelFile) {
    console.error("Error: Model file required");
    console.error("Usage: introgen analyze <model.json>");
    return EXIT_USAGE;
  }

  const configResult = loadResolvedConfig(parsed.options, cwd);
  if (!configResult.ok) {
    reportDiagnostics(configResult.error);
    return EXIT_CONFIG;
  }

  const result = analyzeCommand(
    resolve(cwd, parsed.modelFile),
    configResult.value
  );
  if (!result.ok) {
    reportDiagnostics(result.error);
    return EXIT_MODEL;
  }

  return EXIT_OK;
};
