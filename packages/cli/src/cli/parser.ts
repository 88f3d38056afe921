/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  modelFile?: string;
  options: CliOptions;
  unknown: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknown: string[] = [];
  let command = "";
  let modelFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !modelFile && !arg.startsWith("-")) {
      modelFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknown: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknown: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--json":
        options.json = true;
        break;
      case "--trust-nullability":
        options.trustNullability = true;
        break;
      case "--min-cfg-version":
        options.minCfgVersion = args[++i] ?? "";
        break;
      default:
        unknown.push(arg);
        break;
    }
  }

  return { command, modelFile, options, unknown };
};
