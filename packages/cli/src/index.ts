#!/usr/bin/env node
/**
 * introgen CLI - command-line interface for special function analysis
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
process.exitCode = runCli(process.argv.slice(2));

// Export for testing
export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export * from "./report.js";
